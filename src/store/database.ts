/**
 * SQLite connection bootstrap: pragmas, migrations and the `util`
 * key-value table.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import { toStoreError } from "../connectors/core/index.js";
import type { Migration } from "./schema.js";
import { MIGRATIONS } from "./schema.js";

export type Db = Database.Database;

export const IN_MEMORY = ":memory:";

export function openDb(dbPath: string, migrations: Migration[] = MIGRATIONS): Db {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  let db: Db;
  try {
    db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.pragma("busy_timeout = 5000");
  } catch (err) {
    throw toStoreError(err, `open ${dbPath}`);
  }

  migrate(db, migrations);
  return db;
}

export function getSchemaVersion(db: Db): number {
  const version: unknown = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

/** Apply every migration newer than the current user_version. Returns versions applied. */
export function migrate(db: Db, migrations: Migration[]): number[] {
  const current = getSchemaVersion(db);
  const pending = migrations
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  const applied: number[] = [];
  for (const migration of pending) {
    try {
      db.transaction(() => {
        db.exec(migration.up);
        db.pragma(`user_version = ${migration.version}`);
      })();
    } catch (err) {
      throw toStoreError(
        err,
        `migration ${migration.version} (${migration.description})`,
      );
    }
    applied.push(migration.version);
  }
  return applied;
}

// ─── util key-value ───

export function getMeta(db: Db, key: string): string | null {
  const row = db
    .prepare<[string], { value: string | null }>(
      "SELECT value FROM util WHERE key = ?",
    )
    .get(key);
  return row?.value ?? null;
}

export function setMeta(db: Db, key: string, value: string): void {
  db.prepare<[string, string, string]>(
    `INSERT INTO util (key, value, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
  ).run(key, value, new Date().toISOString());
}
