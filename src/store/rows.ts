/** Column codecs: dates are ISO-8601 text, booleans are 0/1 integers. */

export function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function fromIso(value: string | null): Date | null {
  if (value === null) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** For NOT NULL timestamp columns the store itself writes. */
export function fromIsoRequired(value: string): Date {
  return fromIso(value) ?? new Date(0);
}

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function fromFlag(value: number): boolean {
  return value !== 0;
}

export function nowIso(): string {
  return new Date().toISOString();
}
