/**
 * EntityStore groups the repositories over one SQLite connection and
 * exposes the transaction primitives the sync engine drives by hand.
 */

import { StoreError, toStoreError } from "../connectors/core/index.js";
import { CveRepository } from "./cves.js";
import type { Db } from "./database.js";
import { IN_MEMORY, openDb } from "./database.js";
import { ProjectRepository } from "./projects.js";
import { TeamRepository } from "./teams.js";
import { TrackerRepository } from "./trackers.js";
import { WatermarkStore } from "./watermark.js";

const SAVEPOINT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class EntityStore {
  readonly db: Db;
  readonly teams: TeamRepository;
  readonly projects: ProjectRepository;
  readonly cves: CveRepository;
  readonly trackers: TrackerRepository;
  readonly watermark: WatermarkStore;

  constructor(db: Db) {
    this.db = db;
    this.teams = new TeamRepository(db);
    this.projects = new ProjectRepository(db);
    this.cves = new CveRepository(db);
    this.trackers = new TrackerRepository(db);
    this.watermark = new WatermarkStore(db);
  }

  static open(dbPath: string): EntityStore {
    return new EntityStore(openDb(dbPath));
  }

  static inMemory(): EntityStore {
    return new EntityStore(openDb(IN_MEMORY));
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  // ─── Transactions ───

  begin(): void {
    this.exec("BEGIN IMMEDIATE", "begin");
  }

  commit(): void {
    this.exec("COMMIT", "commit");
  }

  rollback(): void {
    if (this.db.inTransaction) this.exec("ROLLBACK", "rollback");
  }

  savepoint(name: string): void {
    this.exec(`SAVEPOINT ${checkName(name)}`, "savepoint");
  }

  release(name: string): void {
    this.exec(`RELEASE SAVEPOINT ${checkName(name)}`, "release");
  }

  /** Undo everything since the savepoint, then discard it. */
  rollbackTo(name: string): void {
    const safe = checkName(name);
    this.exec(`ROLLBACK TO SAVEPOINT ${safe}`, "rollback to savepoint");
    this.exec(`RELEASE SAVEPOINT ${safe}`, "release");
  }

  /** Run `fn` atomically. Nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      throw toStoreError(err, "transaction");
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private exec(sql: string, operation: string): void {
    try {
      this.db.exec(sql);
    } catch (err) {
      throw toStoreError(err, operation);
    }
  }
}

function checkName(name: string): string {
  if (!SAVEPOINT_NAME.test(name)) {
    throw new StoreError(`invalid savepoint name "${name}"`, "INVALID_NAME");
  }
  return name;
}

export type { Db } from "./database.js";
export { getMeta, getSchemaVersion, IN_MEMORY, migrate, openDb, setMeta } from "./database.js";
export type {
  Cve,
  Project,
  Team,
  Tracker,
} from "./entities.js";
export {
  CLOSED_STATUSES,
  computeSlaBreach,
  daysOpen,
  highestSeverity,
  isOpen,
  severityRank,
  wholeDaysBetween,
} from "./entities.js";
export { CveRepository } from "./cves.js";
export type { DependencyResult } from "./projects.js";
export { ProjectRepository } from "./projects.js";
export { TeamRepository } from "./teams.js";
export type { TrackerFilters, TrackerInput, TrackerWithOwner } from "./trackers.js";
export { DEFAULT_TRACKER_LIMIT, TrackerRepository } from "./trackers.js";
export { LAST_SYNC_KEY, WatermarkStore } from "./watermark.js";
export { MIGRATIONS, SCHEMA_VERSION } from "./schema.js";
export type { Migration } from "./schema.js";
