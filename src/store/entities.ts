/** Domain entities persisted by the store, and values derived from them. */

// ─── Entities ───

export interface Team {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Project {
  id: number;
  key: string;
  name: string;
  teamId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Cve {
  id: number;
  /** Canonical upper-case identifier, e.g. "CVE-2024-1234". */
  cveId: string;
  url: string | null;
  description: string | null;
  severity: string | null;
  cvssScore: number | null;
  isEmbargoed: boolean;
  publishedDate: Date | null;
  embargoEndDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Tracker {
  id: number;
  sourceType: string;
  externalKey: string;
  projectId: number;
  /** The last CVE processed for this tracker; every CVE is in tracker_cves. */
  cveId: number | null;
  summary: string | null;
  status: string | null;
  resolution: string | null;
  priority: string | null;
  severity: string | null;
  assignee: string | null;
  reporter: string | null;
  createdDate: Date | null;
  updatedDate: Date | null;
  resolvedDate: Date | null;
  dueDate: Date | null;
  slaDate: Date | null;
  slaBreach: boolean;
  lastSyncedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// ─── Derived values ───

export const CLOSED_STATUSES: readonly string[] = [
  "done",
  "closed",
  "resolved",
  "cancelled",
];

const CLOSED = new Set(CLOSED_STATUSES);

const DAY_MS = 86_400_000;

export function isOpen(tracker: Pick<Tracker, "status">): boolean {
  if (!tracker.status) return true;
  return !CLOSED.has(tracker.status.toLowerCase());
}

/** Whole days from creation to resolution, or to `now` while unresolved. */
export function daysOpen(
  tracker: Pick<Tracker, "createdDate" | "resolvedDate">,
  now: Date = new Date(),
): number | null {
  if (!tracker.createdDate) return null;
  const end = tracker.resolvedDate ?? now;
  return wholeDaysBetween(tracker.createdDate, end);
}

export function wholeDaysBetween(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / DAY_MS);
}

/** True when the SLA date has passed, at resolution or (if open) now. */
export function computeSlaBreach(
  slaDate: Date | null,
  resolvedDate: Date | null,
  now: Date = new Date(),
): boolean {
  if (!slaDate) return false;
  const reference = resolvedDate ?? now;
  return reference.getTime() > slaDate.getTime();
}

const SEVERITY_RANK: Record<string, number> = {
  critical: 4,
  important: 3,
  moderate: 2,
  low: 1,
};

/** 0 for null or unrecognized severities. */
export function severityRank(severity: string | null): number {
  if (!severity) return 0;
  return SEVERITY_RANK[severity.toLowerCase()] ?? 0;
}

/** Highest known severity across trackers, in the tracker's own spelling. */
export function highestSeverity(
  trackers: Pick<Tracker, "severity">[],
): string | null {
  let best: string | null = null;
  let bestRank = 0;
  for (const t of trackers) {
    const rank = severityRank(t.severity);
    if (rank > bestRank) {
      bestRank = rank;
      best = t.severity;
    }
  }
  return best;
}
