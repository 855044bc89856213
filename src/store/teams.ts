import { StoreError } from "../connectors/core/index.js";
import type { Db } from "./database.js";
import type { Team } from "./entities.js";
import { fromIsoRequired, nowIso } from "./rows.js";

export interface TeamRow {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
}

export function toTeam(row: TeamRow): Team {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: fromIsoRequired(row.created_at),
    updatedAt: fromIsoRequired(row.updated_at),
  };
}

export class TeamRepository {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  findById(id: number): Team | null {
    const row = this.db
      .prepare<[number], TeamRow>("SELECT * FROM teams WHERE id = ?")
      .get(id);
    return row ? toTeam(row) : null;
  }

  findByName(name: string): Team | null {
    const row = this.db
      .prepare<[string], TeamRow>("SELECT * FROM teams WHERE name = ?")
      .get(name);
    return row ? toTeam(row) : null;
  }

  list(): Team[] {
    return this.db
      .prepare<[], TeamRow>("SELECT * FROM teams ORDER BY name")
      .all()
      .map(toTeam);
  }

  create(name: string, description: string | null = null): Team {
    const now = nowIso();
    const result = this.db
      .prepare<[string, string | null, string, string]>(
        "INSERT INTO teams (name, description, created_at, updated_at) VALUES (?, ?, ?, ?)",
      )
      .run(name, description, now, now);
    return this.mustFind(Number(result.lastInsertRowid));
  }

  updateDescription(id: number, description: string | null): void {
    this.db
      .prepare<[string | null, string, number]>(
        "UPDATE teams SET description = ?, updated_at = ? WHERE id = ?",
      )
      .run(description, nowIso(), id);
  }

  private mustFind(id: number): Team {
    const team = this.findById(id);
    if (!team) throw new StoreError(`team ${id} not found after insert`, "NOT_FOUND");
    return team;
  }
}
