import { StoreError } from "../connectors/core/index.js";
import type { Db } from "./database.js";
import type { Tracker } from "./entities.js";
import { CLOSED_STATUSES } from "./entities.js";
import { fromFlag, fromIso, fromIsoRequired, nowIso, toFlag, toIso } from "./rows.js";

interface TrackerRow {
  id: number;
  source_type: string;
  external_key: string;
  project_id: number;
  cve_id: number | null;
  summary: string | null;
  status: string | null;
  resolution: string | null;
  priority: string | null;
  severity: string | null;
  assignee: string | null;
  reporter: string | null;
  created_date: string | null;
  updated_date: string | null;
  resolved_date: string | null;
  due_date: string | null;
  sla_date: string | null;
  sla_breach: number;
  last_synced_at: string | null;
  created_at: string;
  updated_at: string;
}

interface TrackerOwnerRow extends TrackerRow {
  project_key: string;
  team_name: string | null;
}

function toTracker(row: TrackerRow): Tracker {
  return {
    id: row.id,
    sourceType: row.source_type,
    externalKey: row.external_key,
    projectId: row.project_id,
    cveId: row.cve_id,
    summary: row.summary,
    status: row.status,
    resolution: row.resolution,
    priority: row.priority,
    severity: row.severity,
    assignee: row.assignee,
    reporter: row.reporter,
    createdDate: fromIso(row.created_date),
    updatedDate: fromIso(row.updated_date),
    resolvedDate: fromIso(row.resolved_date),
    dueDate: fromIso(row.due_date),
    slaDate: fromIso(row.sla_date),
    slaBreach: fromFlag(row.sla_breach),
    lastSyncedAt: fromIso(row.last_synced_at),
    createdAt: fromIsoRequired(row.created_at),
    updatedAt: fromIsoRequired(row.updated_at),
  };
}

function toOwned(row: TrackerOwnerRow): TrackerWithOwner {
  return {
    tracker: toTracker(row),
    projectKey: row.project_key,
    teamName: row.team_name,
  };
}

/** Every mutable tracker column, written as a whole on each upsert. */
export interface TrackerInput {
  sourceType: string;
  externalKey: string;
  projectId: number;
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
  lastSyncedAt: Date;
}

export interface TrackerFilters {
  projectId?: number;
  /** Database id of a CVE; matches any tracker naming it. */
  cveId?: number;
  teamId?: number;
  status?: string;
  openOnly?: boolean;
  limit?: number;
}

export interface TrackerWithOwner {
  tracker: Tracker;
  projectKey: string;
  teamName: string | null;
}

export const DEFAULT_TRACKER_LIMIT = 100;

const OWNER_SELECT = `
  SELECT t.*, p.key AS project_key, tm.name AS team_name
  FROM trackers t
  JOIN projects p ON p.id = t.project_id
  LEFT JOIN teams tm ON tm.id = p.team_id`;

export class TrackerRepository {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  findById(id: number): Tracker | null {
    const row = this.db
      .prepare<[number], TrackerRow>("SELECT * FROM trackers WHERE id = ?")
      .get(id);
    return row ? toTracker(row) : null;
  }

  findByKey(sourceType: string, externalKey: string): Tracker | null {
    const row = this.db
      .prepare<[string, string], TrackerRow>(
        "SELECT * FROM trackers WHERE source_type = ? AND external_key = ?",
      )
      .get(sourceType, externalKey);
    return row ? toTracker(row) : null;
  }

  count(): number {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM trackers")
      .get();
    return row?.n ?? 0;
  }

  /** Insert, or overwrite every mutable column of the tracker with the same key. */
  upsert(input: TrackerInput): { tracker: Tracker; created: boolean } {
    const existing = this.findByKey(input.sourceType, input.externalKey);
    const now = nowIso();
    const values = [
      input.projectId,
      input.cveId,
      input.summary,
      input.status,
      input.resolution,
      input.priority,
      input.severity,
      input.assignee,
      input.reporter,
      toIso(input.createdDate),
      toIso(input.updatedDate),
      toIso(input.resolvedDate),
      toIso(input.dueDate),
      toIso(input.slaDate),
      toFlag(input.slaBreach),
      input.lastSyncedAt.toISOString(),
      now,
    ];

    let id: number;
    if (existing) {
      this.db
        .prepare<unknown[]>(
          `UPDATE trackers SET
             project_id = ?, cve_id = ?, summary = ?, status = ?, resolution = ?,
             priority = ?, severity = ?, assignee = ?, reporter = ?,
             created_date = ?, updated_date = ?, resolved_date = ?, due_date = ?,
             sla_date = ?, sla_breach = ?, last_synced_at = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(...values, existing.id);
      id = existing.id;
    } else {
      const result = this.db
        .prepare<unknown[]>(
          `INSERT INTO trackers (
             project_id, cve_id, summary, status, resolution,
             priority, severity, assignee, reporter,
             created_date, updated_date, resolved_date, due_date,
             sla_date, sla_breach, last_synced_at, updated_at,
             source_type, external_key, created_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(...values, input.sourceType, input.externalKey, now);
      id = Number(result.lastInsertRowid);
    }

    const tracker = this.findById(id);
    if (!tracker) {
      throw new StoreError(`tracker ${input.externalKey} not found after upsert`, "NOT_FOUND");
    }
    return { tracker, created: existing === null };
  }

  /** Replace the set of CVEs the tracker names. */
  setCves(trackerId: number, cveIds: number[]): void {
    this.db
      .prepare<[number]>("DELETE FROM tracker_cves WHERE tracker_id = ?")
      .run(trackerId);
    const insert = this.db.prepare<[number, number]>(
      "INSERT OR IGNORE INTO tracker_cves (tracker_id, cve_id) VALUES (?, ?)",
    );
    for (const cveId of cveIds) {
      insert.run(trackerId, cveId);
    }
  }

  /** Every CVE the tracker names, by identifier. */
  cvesOf(trackerId: number): string[] {
    return this.db
      .prepare<[number], { cve_id: string }>(
        `SELECT c.cve_id FROM tracker_cves tc
         JOIN cves c ON c.id = tc.cve_id
         WHERE tc.tracker_id = ?
         ORDER BY c.cve_id`,
      )
      .all(trackerId)
      .map((row) => row.cve_id);
  }

  list(filters: TrackerFilters = {}): Tracker[] {
    const where: string[] = [];
    const params: (string | number)[] = [];

    if (filters.projectId !== undefined) {
      where.push("t.project_id = ?");
      params.push(filters.projectId);
    }
    if (filters.cveId !== undefined) {
      where.push(
        "EXISTS (SELECT 1 FROM tracker_cves tc WHERE tc.tracker_id = t.id AND tc.cve_id = ?)",
      );
      params.push(filters.cveId);
    }
    if (filters.teamId !== undefined) {
      where.push("p.team_id = ?");
      params.push(filters.teamId);
    }
    if (filters.status !== undefined) {
      where.push("t.status = ?");
      params.push(filters.status);
    }
    if (filters.openOnly) {
      where.push(
        `(t.status IS NULL OR LOWER(t.status) NOT IN (${CLOSED_STATUSES.map(() => "?").join(", ")}))`,
      );
      params.push(...CLOSED_STATUSES);
    }
    params.push(filters.limit ?? DEFAULT_TRACKER_LIMIT);

    const sql = `
      SELECT t.* FROM trackers t
      JOIN projects p ON p.id = t.project_id
      ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY t.created_date DESC, t.id DESC
      LIMIT ?`;

    return this.db.prepare<unknown[], TrackerRow>(sql).all(...params).map(toTracker);
  }

  /** Trackers naming the CVE, with their project key and owning team. */
  listForCve(cveId: number): TrackerWithOwner[] {
    return this.db
      .prepare<[number], TrackerOwnerRow>(
        `${OWNER_SELECT}
         JOIN tracker_cves tc ON tc.tracker_id = t.id
         WHERE tc.cve_id = ?
         ORDER BY t.created_date, t.id`,
      )
      .all(cveId)
      .map(toOwned);
  }

  /** Trackers resolved within [start, end], optionally for one team. */
  listResolvedBetween(
    start: Date,
    end: Date,
    teamId?: number,
  ): TrackerWithOwner[] {
    const teamClause = teamId !== undefined ? "AND p.team_id = ?" : "";
    const params: (string | number)[] = [start.toISOString(), end.toISOString()];
    if (teamId !== undefined) params.push(teamId);

    return this.db
      .prepare<unknown[], TrackerOwnerRow>(
        `${OWNER_SELECT}
         WHERE t.resolved_date IS NOT NULL
           AND t.resolved_date >= ? AND t.resolved_date <= ?
           ${teamClause}
         ORDER BY t.resolved_date, t.id`,
      )
      .all(...params)
      .map(toOwned);
  }

  /** Tracker counts per raw status value. */
  statusCounts(): { status: string | null; count: number }[] {
    return this.db
      .prepare<[], { status: string | null; count: number }>(
        "SELECT status, COUNT(*) AS count FROM trackers GROUP BY status ORDER BY count DESC",
      )
      .all();
  }
}
