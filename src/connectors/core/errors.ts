/**
 * Error taxonomy.
 *
 * - ConfigurationError: the caller asked for something that cannot run
 *   (empty project scope, unknown source type, missing credentials).
 * - SourceError: the external tracker failed or returned garbage. Fatal to
 *   the sync run that raised it.
 * - StoreError: SQLite rejected a statement.
 */

export class VulntrackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends VulntrackError {}

export class SourceError extends VulntrackError {
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    opts: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: opts.cause });
    this.status = opts.status;
    this.retryable = opts.retryable ?? isRetryableStatus(opts.status);
  }
}

export class StoreError extends VulntrackError {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.code = code;
  }

  get isConstraintViolation(): boolean {
    return this.code.startsWith("SQLITE_CONSTRAINT");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap a better-sqlite3 failure; anything else passes through untouched. */
export function toStoreError(err: unknown, operation: string): unknown {
  if (err instanceof StoreError) return err;
  if (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("SQLITE_")
  ) {
    return new StoreError(`${operation}: ${err.message}`, err.code, err);
  }
  return err;
}

const NETWORK_ERROR_MARKERS = [
  "econnreset",
  "etimedout",
  "enotfound",
  "socket hang up",
  "fetch failed",
];

export function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return NETWORK_ERROR_MARKERS.some((marker) => msg.includes(marker));
}

function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 429 || (status >= 500 && status < 600);
}
