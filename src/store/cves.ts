import { StoreError } from "../connectors/core/index.js";
import type { Db } from "./database.js";
import type { Cve, Project, Team } from "./entities.js";
import type { ProjectRow } from "./projects.js";
import { toProject } from "./projects.js";
import { fromFlag, fromIso, fromIsoRequired, nowIso } from "./rows.js";
import type { TeamRow } from "./teams.js";
import { toTeam } from "./teams.js";

interface CveRow {
  id: number;
  cve_id: string;
  url: string | null;
  description: string | null;
  severity: string | null;
  cvss_score: number | null;
  is_embargoed: number;
  published_date: string | null;
  embargo_end_date: string | null;
  created_at: string;
  updated_at: string;
}

function toCve(row: CveRow): Cve {
  return {
    id: row.id,
    cveId: row.cve_id,
    url: row.url,
    description: row.description,
    severity: row.severity,
    cvssScore: row.cvss_score,
    isEmbargoed: fromFlag(row.is_embargoed),
    publishedDate: fromIso(row.published_date),
    embargoEndDate: fromIso(row.embargo_end_date),
    createdAt: fromIsoRequired(row.created_at),
    updatedAt: fromIsoRequired(row.updated_at),
  };
}

export class CveRepository {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  findById(id: number): Cve | null {
    const row = this.db
      .prepare<[number], CveRow>("SELECT * FROM cves WHERE id = ?")
      .get(id);
    return row ? toCve(row) : null;
  }

  /** Lookup by identifier, case-insensitively. */
  findByCveId(cveId: string): Cve | null {
    const row = this.db
      .prepare<[string], CveRow>("SELECT * FROM cves WHERE cve_id = ?")
      .get(cveId.toUpperCase());
    return row ? toCve(row) : null;
  }

  list(): Cve[] {
    return this.db
      .prepare<[], CveRow>("SELECT * FROM cves ORDER BY cve_id")
      .all()
      .map(toCve);
  }

  create(cveId: string): Cve {
    const now = nowIso();
    const result = this.db
      .prepare<[string, string, string]>(
        "INSERT INTO cves (cve_id, created_at, updated_at) VALUES (?, ?, ?)",
      )
      .run(cveId.toUpperCase(), now, now);
    const cve = this.findById(Number(result.lastInsertRowid));
    if (!cve) {
      throw new StoreError(`${cveId} not found after insert`, "NOT_FOUND");
    }
    return cve;
  }

  getOrCreate(cveId: string): { cve: Cve; created: boolean } {
    const existing = this.findByCveId(cveId);
    if (existing) return { cve: existing, created: false };
    return { cve: this.create(cveId), created: true };
  }

  // ─── Derived relations ───

  /** Distinct projects with at least one tracker naming this CVE. */
  affectedProjects(cveId: number): Project[] {
    return this.db
      .prepare<[number], ProjectRow>(
        `SELECT DISTINCT p.id, p.key, p.name, p.team_id, p.created_at, p.updated_at
         FROM tracker_cves tc
         JOIN trackers t ON t.id = tc.tracker_id
         JOIN projects p ON p.id = t.project_id
         WHERE tc.cve_id = ?
         ORDER BY p.key`,
      )
      .all(cveId)
      .map(toProject);
  }

  /** Distinct owning teams of the affected projects. */
  affectedTeams(cveId: number): Team[] {
    return this.db
      .prepare<[number], TeamRow>(
        `SELECT DISTINCT tm.id, tm.name, tm.description, tm.created_at, tm.updated_at
         FROM tracker_cves tc
         JOIN trackers t ON t.id = tc.tracker_id
         JOIN projects p ON p.id = t.project_id
         JOIN teams tm ON tm.id = p.team_id
         WHERE tc.cve_id = ?
         ORDER BY tm.name`,
      )
      .all(cveId)
      .map(toTeam);
  }
}
