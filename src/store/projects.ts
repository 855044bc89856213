import { StoreError } from "../connectors/core/index.js";
import type { Db } from "./database.js";
import type { Project } from "./entities.js";
import { fromIsoRequired, nowIso } from "./rows.js";

export interface ProjectRow {
  id: number;
  key: string;
  name: string;
  team_id: number | null;
  created_at: string;
  updated_at: string;
}

export function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    key: row.key,
    name: row.name,
    teamId: row.team_id,
    createdAt: fromIsoRequired(row.created_at),
    updatedAt: fromIsoRequired(row.updated_at),
  };
}

/** Outcome of adding an upstream → downstream edge. */
export type DependencyResult = "added" | "exists" | "cycle";

export class ProjectRepository {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  findById(id: number): Project | null {
    const row = this.db
      .prepare<[number], ProjectRow>("SELECT * FROM projects WHERE id = ?")
      .get(id);
    return row ? toProject(row) : null;
  }

  findByKey(key: string): Project | null {
    const row = this.db
      .prepare<[string], ProjectRow>("SELECT * FROM projects WHERE key = ?")
      .get(key);
    return row ? toProject(row) : null;
  }

  list(): Project[] {
    return this.db
      .prepare<[], ProjectRow>("SELECT * FROM projects ORDER BY key")
      .all()
      .map(toProject);
  }

  listByTeam(teamId: number): Project[] {
    return this.db
      .prepare<[number], ProjectRow>(
        "SELECT * FROM projects WHERE team_id = ? ORDER BY key",
      )
      .all(teamId)
      .map(toProject);
  }

  create(key: string, name: string = key, teamId: number | null = null): Project {
    const now = nowIso();
    const result = this.db
      .prepare<[string, string, number | null, string, string]>(
        "INSERT INTO projects (key, name, team_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
      )
      .run(key, name, teamId, now, now);
    const project = this.findById(Number(result.lastInsertRowid));
    if (!project) {
      throw new StoreError(`project ${key} not found after insert`, "NOT_FOUND");
    }
    return project;
  }

  /** Existing project by key, or a new one named after its key. */
  getOrCreate(key: string): { project: Project; created: boolean } {
    const existing = this.findByKey(key);
    if (existing) return { project: existing, created: false };
    return { project: this.create(key), created: true };
  }

  assignTeam(id: number, teamId: number | null): void {
    this.db
      .prepare<[number | null, string, number]>(
        "UPDATE projects SET team_id = ?, updated_at = ? WHERE id = ?",
      )
      .run(teamId, nowIso(), id);
  }

  // ─── Dependencies ───

  hasDependency(upstreamId: number, downstreamId: number): boolean {
    const row = this.db
      .prepare<[number, number], { found: number }>(
        "SELECT 1 AS found FROM project_dependencies WHERE upstream_id = ? AND downstream_id = ?",
      )
      .get(upstreamId, downstreamId);
    return row !== undefined;
  }

  /** True if `to` is reachable from `from` by following upstream → downstream edges. */
  isReachable(from: number, to: number): boolean {
    const row = this.db
      .prepare<[number, number], { found: number }>(
        `WITH RECURSIVE reach(id) AS (
           SELECT downstream_id FROM project_dependencies WHERE upstream_id = ?
           UNION
           SELECT d.downstream_id FROM project_dependencies d JOIN reach r ON d.upstream_id = r.id
         )
         SELECT 1 AS found FROM reach WHERE id = ? LIMIT 1`,
      )
      .get(from, to);
    return row !== undefined;
  }

  /** Record that `upstreamId` must deliver before `downstreamId`. Edges that close a cycle are refused. */
  addDependency(upstreamId: number, downstreamId: number): DependencyResult {
    if (upstreamId === downstreamId) return "cycle";
    if (this.hasDependency(upstreamId, downstreamId)) return "exists";
    if (this.isReachable(downstreamId, upstreamId)) return "cycle";

    this.db
      .prepare<[number, number]>(
        "INSERT INTO project_dependencies (upstream_id, downstream_id) VALUES (?, ?)",
      )
      .run(upstreamId, downstreamId);
    return "added";
  }

  /** Projects that must deliver before this one. */
  upstreamOf(projectId: number): Project[] {
    return this.db
      .prepare<[number], ProjectRow>(
        `SELECT p.* FROM projects p
         JOIN project_dependencies d ON d.upstream_id = p.id
         WHERE d.downstream_id = ?
         ORDER BY p.key`,
      )
      .all(projectId)
      .map(toProject);
  }

  /** Projects waiting on this one. */
  downstreamOf(projectId: number): Project[] {
    return this.db
      .prepare<[number], ProjectRow>(
        `SELECT p.* FROM projects p
         JOIN project_dependencies d ON d.downstream_id = p.id
         WHERE d.upstream_id = ?
         ORDER BY p.key`,
      )
      .all(projectId)
      .map(toProject);
  }
}
