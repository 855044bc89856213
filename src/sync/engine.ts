/**
 * Reconciliation engine: drains a TrackerSource into the entity store.
 *
 * The whole run is one transaction, committed only after the source's
 * sequence is exhausted. Each record runs inside its own savepoint so a
 * failing record leaves nothing behind while the run carries on.
 */

import type { Logger } from "../connectors/core/index.js";
import {
  ConfigurationError,
  errorMessage,
  SourceError,
} from "../connectors/core/index.js";
import type { NormalizedRecord, TrackerSource } from "../connectors/types.js";
import type { EntityStore } from "../store/index.js";
import { computeSlaBreach } from "../store/index.js";

export interface SyncStats {
  trackersCreated: number;
  trackersUpdated: number;
  cvesCreated: number;
  projectsCreated: number;
  /** One entry per failed record: "<record key>: <message>". */
  errors: string[];
}

type SyncCounts = Omit<SyncStats, "errors">;

export interface ReconciliationEngineOptions {
  logger: Logger;
  /** Source of "now" for last_synced_at and SLA breach. */
  clock?: () => Date;
  /** Log progress every N records. */
  progressEvery?: number;
}

export interface SyncRunOptions {
  signal?: AbortSignal;
}

const RECORD_SAVEPOINT = "sync_record";
const DEFAULT_PROGRESS_EVERY = 50;

export class ReconciliationEngine {
  private readonly store: EntityStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly progressEvery: number;

  constructor(store: EntityStore, opts: ReconciliationEngineOptions) {
    this.store = store;
    this.logger = opts.logger;
    this.clock = opts.clock ?? (() => new Date());
    this.progressEvery = opts.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  }

  async sync(
    source: TrackerSource,
    projectKeys: string[],
    since: Date | null,
    opts: SyncRunOptions = {},
  ): Promise<SyncStats> {
    if (projectKeys.length === 0) {
      throw new ConfigurationError(
        "project keys are required: cannot sync without specifying projects",
      );
    }
    if (this.store.inTransaction) {
      throw new ConfigurationError("a sync is already running on this store");
    }

    const scope = projectKeys.join(", ");
    if (since) {
      this.logger.info(
        `Starting incremental sync from ${source.displayName} for projects: ${scope} (since ${since.toISOString()})`,
      );
    } else {
      this.logger.info(
        `Starting full sync from ${source.displayName} for projects: ${scope}`,
      );
    }

    const records = source.fetchTrackers(projectKeys, since);
    const stats: SyncStats = { ...emptyCounts(), errors: [] };
    let seen = 0;

    this.store.begin();
    try {
      for await (const record of records) {
        if (opts.signal?.aborted) {
          throw new SourceError("Sync aborted");
        }

        const delta = emptyCounts();
        this.store.savepoint(RECORD_SAVEPOINT);
        try {
          this.applyRecord(record, delta);
          this.store.release(RECORD_SAVEPOINT);
          addCounts(stats, delta);
        } catch (err) {
          this.store.rollbackTo(RECORD_SAVEPOINT);
          const message = errorMessage(err);
          this.logger.warn(`Error processing ${record.sourceKey}: ${message}`);
          stats.errors.push(`${record.sourceKey}: ${message}`);
        }

        seen++;
        if (seen % this.progressEvery === 0) {
          this.logger.info(`Processed ${seen} trackers...`);
        }
      }

      this.logger.info(`Committing ${seen} trackers to database...`);
      this.store.commit();
    } catch (err) {
      this.store.rollback();
      this.logger.error(
        `Sync aborted after ${seen} records, nothing committed: ${errorMessage(err)}`,
      );
      throw err;
    }

    this.logger.info(
      `Sync complete: ${stats.trackersCreated} created, ${stats.trackersUpdated} updated, ` +
        `${stats.cvesCreated} CVEs, ${stats.errors.length} errors`,
    );
    return stats;
  }

  private applyRecord(record: NormalizedRecord, counts: SyncCounts): void {
    if (!record.projectKey) {
      throw new SourceError("record has no project key");
    }
    const now = this.clock();
    const { store, logger } = this;

    const { project, created: projectCreated } = store.projects.getOrCreate(
      record.projectKey,
    );
    if (projectCreated) {
      counts.projectsCreated++;
      logger.debug(`Created project: ${project.key}`);
    }

    // The last CVE processed becomes tracker.cve_id; all of them are linked.
    const cveIds: number[] = [];
    for (const id of record.cveIds) {
      const { cve, created } = store.cves.getOrCreate(id);
      if (created) {
        counts.cvesCreated++;
        logger.debug(`Created CVE: ${cve.cveId}`);
      }
      cveIds.push(cve.id);
    }

    const { tracker, created } = store.trackers.upsert({
      sourceType: record.sourceType,
      externalKey: record.sourceKey,
      projectId: project.id,
      cveId: cveIds.at(-1) ?? null,
      summary: record.summary,
      status: record.status,
      resolution: record.resolution,
      priority: record.priority,
      severity: record.severity,
      assignee: record.assignee,
      reporter: record.reporter,
      createdDate: record.createdDate,
      updatedDate: record.updatedDate,
      resolvedDate: record.resolvedDate,
      dueDate: record.dueDate,
      slaDate: record.slaDate,
      slaBreach: computeSlaBreach(record.slaDate, record.resolvedDate, now),
      lastSyncedAt: now,
    });
    store.trackers.setCves(tracker.id, cveIds);

    if (created) {
      counts.trackersCreated++;
      logger.debug(`Created tracker: ${tracker.externalKey}`);
    } else {
      counts.trackersUpdated++;
    }
  }
}

function emptyCounts(): SyncCounts {
  return {
    trackersCreated: 0,
    trackersUpdated: 0,
    cvesCreated: 0,
    projectsCreated: 0,
  };
}

function addCounts(target: SyncCounts, delta: SyncCounts): void {
  target.trackersCreated += delta.trackersCreated;
  target.trackersUpdated += delta.trackersUpdated;
  target.cvesCreated += delta.cvesCreated;
  target.projectsCreated += delta.projectsCreated;
}
