/**
 * One sync run end to end: preflight, watermark lookup, reconciliation, and
 * advancing the watermark only when the run completed.
 */

import type { Logger } from "../connectors/core/index.js";
import { ConfigurationError, SourceError } from "../connectors/core/index.js";
import type { TrackerSource } from "../connectors/types.js";
import type { WatermarkStore } from "../store/index.js";
import type { ReconciliationEngine, SyncStats } from "./engine.js";

export interface SyncRunRequest {
  /** Ignore the watermark and fetch everything in scope. */
  full?: boolean;
  signal?: AbortSignal;
}

export interface SyncRunResult {
  stats: SyncStats;
  /** Lower bound used for the fetch; null for a full sync. */
  since: Date | null;
  /** The new watermark: the instant the run started. */
  watermark: Date;
  durationMs: number;
}

export interface SyncServiceOptions {
  engine: ReconciliationEngine;
  watermark: WatermarkStore;
  logger: Logger;
  clock?: () => Date;
}

export class SyncService {
  private readonly engine: ReconciliationEngine;
  private readonly watermark: WatermarkStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(opts: SyncServiceOptions) {
    this.engine = opts.engine;
    this.watermark = opts.watermark;
    this.logger = opts.logger;
    this.clock = opts.clock ?? (() => new Date());
  }

  async run(
    source: TrackerSource,
    projectKeys: string[],
    request: SyncRunRequest = {},
  ): Promise<SyncRunResult> {
    if (projectKeys.length === 0) {
      throw new ConfigurationError(
        "No projects configured. Add projects to the teams config first.",
      );
    }

    const connection = await source.testConnection();
    if (!connection.ok) {
      throw new SourceError(connection.message);
    }

    const since = request.full ? null : this.watermark.getLastSync();
    const startedAt = this.clock();
    this.logger.info(
      since
        ? `Incremental sync since ${since.toISOString()}`
        : "Full sync (no watermark)",
    );

    const stats = await this.engine.sync(source, projectKeys, since, {
      signal: request.signal,
    });

    // Reached only when the run committed; per-record errors still advance.
    this.watermark.setLastSync(startedAt);
    const durationMs = this.clock().getTime() - startedAt.getTime();
    this.logger.info(`Watermark advanced to ${startedAt.toISOString()}`, {
      durationMs,
    });

    return { stats, since, watermark: startedAt, durationMs };
  }
}
