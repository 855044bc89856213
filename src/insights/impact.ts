import type { EntityStore } from "../store/index.js";
import { highestSeverity, isOpen, wholeDaysBetween } from "../store/index.js";

/** Who and what a single CVE touches, computed from its trackers. */
export interface BlastRadius {
  cveId: string;
  /** Highest severity over the CVE's trackers. */
  severity: string | null;
  isEmbargoed: boolean;
  affectedTeams: string[];
  affectedProjects: string[];
  totalTrackers: number;
  openTrackers: number;
  teamTrackerCounts: Record<string, number>;
  /** Days between the earliest and latest tracker creation; null with fewer than two dates. */
  dateSkewDays: number | null;
}

export function blastRadius(store: EntityStore, cveId: string): BlastRadius | null {
  const cve = store.cves.findByCveId(cveId);
  if (!cve) return null;

  const owned = store.trackers.listForCve(cve.id);
  const trackers = owned.map((o) => o.tracker);

  const teamTrackerCounts: Record<string, number> = {};
  for (const { teamName } of owned) {
    if (teamName === null) continue;
    teamTrackerCounts[teamName] = (teamTrackerCounts[teamName] ?? 0) + 1;
  }

  const created = trackers
    .map((t) => t.createdDate)
    .filter((d): d is Date => d !== null)
    .map((d) => d.getTime());
  const dateSkewDays =
    created.length > 1
      ? wholeDaysBetween(new Date(Math.min(...created)), new Date(Math.max(...created)))
      : null;

  return {
    cveId: cve.cveId,
    severity: highestSeverity(trackers),
    isEmbargoed: cve.isEmbargoed,
    affectedTeams: store.cves.affectedTeams(cve.id).map((t) => t.name),
    affectedProjects: store.cves.affectedProjects(cve.id).map((p) => p.key),
    totalTrackers: trackers.length,
    openTrackers: trackers.filter(isOpen).length,
    teamTrackerCounts,
    dateSkewDays,
  };
}
