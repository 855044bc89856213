import type { Db } from "./database.js";
import { getMeta, setMeta } from "./database.js";
import { fromIso } from "./rows.js";

export const LAST_SYNC_KEY = "last_sync_datetime";

/** The instant of the last successful sync, kept in the `util` table. */
export class WatermarkStore {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  /** Null when no sync has completed, or the stored value is unreadable. */
  getLastSync(): Date | null {
    return fromIso(getMeta(this.db, LAST_SYNC_KEY));
  }

  setLastSync(at: Date): void {
    setMeta(this.db, LAST_SYNC_KEY, at.toISOString());
  }
}
