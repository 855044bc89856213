import { ConfigurationError } from "../connectors/core/index.js";
import type { EntityStore } from "../store/index.js";
import { wholeDaysBetween } from "../store/index.js";

const DAY_MS = 86_400_000;
export const DEFAULT_SLA_WINDOW_DAYS = 90;

export interface SlaFilters {
  /** Defaults to `dateRangeEnd` minus 90 days. */
  dateRangeStart?: Date;
  /** Defaults to now. */
  dateRangeEnd?: Date;
  teamId?: number;
  /** Defaults to the configured SLA. */
  slaDays?: number;
}

export interface TeamSlaBreakdown {
  team: string;
  withinSla: number;
  breached: number;
}

export interface SlaCompliance {
  totalResolved: number;
  withinSla: number;
  breached: number;
  /** Percentage, one decimal place; 0 when nothing resolved. */
  complianceRate: number;
  slaDays: number;
  dateRangeStart: Date;
  dateRangeEnd: Date;
  byTeam: TeamSlaBreakdown[];
}

export interface SlaDefaults {
  slaDays: number;
  now?: Date;
}

/**
 * Trackers resolved in the range, split by whether creation → resolution
 * took at most `slaDays` whole days. Trackers without a creation date are
 * not counted.
 */
export function slaCompliance(
  store: EntityStore,
  filters: SlaFilters,
  defaults: SlaDefaults,
): SlaCompliance {
  const slaDays = filters.slaDays ?? defaults.slaDays;
  if (!Number.isInteger(slaDays) || slaDays < 0) {
    throw new ConfigurationError(`SLA days must be a non-negative integer, got ${slaDays}`);
  }
  const end = filters.dateRangeEnd ?? defaults.now ?? new Date();
  const start =
    filters.dateRangeStart ??
    new Date(end.getTime() - DEFAULT_SLA_WINDOW_DAYS * DAY_MS);
  if (start.getTime() > end.getTime()) {
    throw new ConfigurationError(
      `SLA range start ${start.toISOString()} is after end ${end.toISOString()}`,
    );
  }

  let withinSla = 0;
  let breached = 0;
  const teams = new Map<string, TeamSlaBreakdown>();

  for (const { tracker, teamName } of store.trackers.listResolvedBetween(
    start,
    end,
    filters.teamId,
  )) {
    if (!tracker.createdDate || !tracker.resolvedDate) continue;
    const within =
      wholeDaysBetween(tracker.createdDate, tracker.resolvedDate) <= slaDays;
    if (within) withinSla++;
    else breached++;

    if (teamName === null) continue;
    let entry = teams.get(teamName);
    if (!entry) {
      entry = { team: teamName, withinSla: 0, breached: 0 };
      teams.set(teamName, entry);
    }
    if (within) entry.withinSla++;
    else entry.breached++;
  }

  const total = withinSla + breached;
  return {
    totalResolved: total,
    withinSla,
    breached,
    complianceRate: total > 0 ? Math.round((withinSla / total) * 1000) / 10 : 0,
    slaDays,
    dateRangeStart: start,
    dateRangeEnd: end,
    byTeam: [...teams.values()],
  };
}
