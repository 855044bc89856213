#!/usr/bin/env node
import { Command } from "commander";
import type { AppConfig } from "./config.js";
import { loadConfig, loadEnvFiles } from "./config.js";
import type { Logger } from "./connectors/core/index.js";
import {
  ConfigurationError,
  createLogger,
  errorMessage,
} from "./connectors/core/index.js";
import type { SourceRegistry } from "./connectors/registry.js";
import { createDefaultSourceRegistry } from "./connectors/registry.js";
import type { TrackerSource } from "./connectors/types.js";
import { blastRadius, slaCompliance } from "./insights/index.js";
import { EntityStore, isOpen } from "./store/index.js";
import type { SyncRunResult } from "./sync/index.js";
import {
  ConfigReconciler,
  loadTeamsConfig,
  projectKeysOf,
  ReconciliationEngine,
  SyncService,
} from "./sync/index.js";

loadEnvFiles();

interface CliContext {
  config: AppConfig;
  logger: Logger;
  store: EntityStore;
  registry: SourceRegistry;
}

function openContext(): CliContext {
  const config = loadConfig();
  const logger = createLogger("vulntrack", config.logLevel);
  const store = EntityStore.open(config.databasePath);
  return { config, logger, store, registry: createDefaultSourceRegistry() };
}

/** Run a command against a fresh context; fatal errors exit with status 1. */
async function withContext(
  fn: (ctx: CliContext) => Promise<number> | number,
): Promise<void> {
  let ctx: CliContext | undefined;
  let code: number;
  try {
    ctx = openContext();
    code = await fn(ctx);
  } catch (err) {
    console.error(`✗ ${errorMessage(err)}`);
    code = 1;
  } finally {
    ctx?.store.close();
  }
  process.exit(code);
}

function createSource(
  ctx: CliContext,
  sourceType: string | undefined,
  signal?: AbortSignal,
): TrackerSource {
  return ctx.registry.create(
    sourceType ?? ctx.config.sourceType,
    ctx.config.sources,
    { logger: ctx.logger, signal },
  );
}

function seedFromConfig(ctx: CliContext): string[] {
  const teamsConfig = loadTeamsConfig(ctx.config.teamsConfigPath);
  new ConfigReconciler(ctx.store, ctx.logger.child("config")).apply(teamsConfig);
  return projectKeysOf(teamsConfig);
}

async function runSync(
  ctx: CliContext,
  opts: { full?: boolean; source?: string },
): Promise<SyncRunResult> {
  const ac = new AbortController();
  const sigHandler = () => {
    ctx.logger.warn("Received interrupt, aborting sync (nothing will be committed)...");
    ac.abort();
  };
  process.on("SIGINT", sigHandler);

  try {
    const projectKeys = seedFromConfig(ctx);
    const source = createSource(ctx, opts.source, ac.signal);
    const engine = new ReconciliationEngine(ctx.store, {
      logger: ctx.logger.child("sync"),
    });
    const service = new SyncService({
      engine,
      watermark: ctx.store.watermark,
      logger: ctx.logger.child("sync"),
    });
    return await service.run(source, projectKeys, {
      full: opts.full,
      signal: ac.signal,
    });
  } finally {
    process.removeListener("SIGINT", sigHandler);
  }
}

function printSyncResult(result: SyncRunResult): void {
  const { stats } = result;
  const status = stats.errors.length === 0 ? "✓" : "⚠";
  console.log("\n═══ Sync Summary ═══\n");
  console.log(
    `${status} ${result.since ? "incremental" : "full"}: ${stats.trackersCreated} created, ` +
      `${stats.trackersUpdated} updated, ${stats.cvesCreated} CVEs, ` +
      `${stats.projectsCreated} projects [${(result.durationMs / 1000).toFixed(1)}s]`,
  );
  for (const err of stats.errors.slice(0, 5)) {
    console.log(`  ✗ ${err}`);
  }
  if (stats.errors.length > 5) {
    console.log(`  ... and ${stats.errors.length - 5} more errors`);
  }
}

function parseDay(value: string, endOfDay: boolean): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new ConfigurationError(`Expected a date as YYYY-MM-DD, got "${value}"`);
  }
  const date = new Date(`${value}T${endOfDay ? "23:59:59.999" : "00:00:00.000"}Z`);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid date "${value}"`);
  }
  return date;
}

function parsePositiveInt(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

const program = new Command()
  .name("vulntrack")
  .description("Track CVE remediation across projects from an issue tracker")
  .version("0.1.0");

program
  .command("seed")
  .description("Load teams, projects and dependencies from the teams config")
  .action(() =>
    withContext((ctx) => {
      const stats = new ConfigReconciler(
        ctx.store,
        ctx.logger.child("config"),
      ).syncFromFile(ctx.config.teamsConfigPath);
      console.log(
        `Teams: ${stats.teamsCreated} created, ${stats.teamsUpdated} updated`,
      );
      console.log(
        `Projects: ${stats.projectsCreated} created, ${stats.projectsUpdated} reassigned`,
      );
      console.log(`Dependencies: ${stats.dependenciesAdded} added`);
      for (const skipped of stats.dependenciesSkipped) {
        console.log(`  ⚠ skipped ${skipped}`);
      }
      return 0;
    }),
  );

program
  .command("sync")
  .description("Sync trackers for every project in the teams config")
  .option("--full", "Ignore the watermark and fetch everything")
  .option("--source <type>", "Source type (defaults to SOURCE_TYPE)")
  .action((opts: { full?: boolean; source?: string }) =>
    withContext(async (ctx) => {
      const result = await runSync(ctx, opts);
      printSyncResult(result);
      return result.stats.errors.length > 0 ? 1 : 0;
    }),
  );

program
  .command("status")
  .description("Show the watermark and what the store holds")
  .action(() =>
    withContext((ctx) => {
      const { store } = ctx;
      const lastSync = store.watermark.getLastSync();
      const statusCounts = store.trackers.statusCounts();
      const total = statusCounts.reduce((sum, s) => sum + s.count, 0);
      const open = statusCounts
        .filter((s) => isOpen(s))
        .reduce((sum, s) => sum + s.count, 0);

      console.log(`Last sync: ${lastSync ? lastSync.toISOString() : "never"}`);
      console.log(`Teams: ${store.teams.list().length}`);
      console.log(`Projects: ${store.projects.list().length}`);
      console.log(`CVEs: ${store.cves.list().length}`);
      console.log(`Trackers: ${total} (${open} open)`);
      for (const s of statusCounts) {
        console.log(`  ${s.status ?? "(none)"}: ${s.count}`);
      }
      return 0;
    }),
  );

program
  .command("test-connection")
  .description("Check credentials against the tracker source")
  .option("--source <type>", "Source type (defaults to SOURCE_TYPE)")
  .action((opts: { source?: string }) =>
    withContext(async (ctx) => {
      const source = createSource(ctx, opts.source);
      const result = await source.testConnection();
      console.log(`${result.ok ? "✓" : "✗"} ${source.displayName}: ${result.message}`);
      return result.ok ? 0 : 1;
    }),
  );

program
  .command("projects")
  .description("List projects visible to the source credentials")
  .option("--source <type>", "Source type (defaults to SOURCE_TYPE)")
  .action((opts: { source?: string }) =>
    withContext(async (ctx) => {
      const projects = await createSource(ctx, opts.source).fetchProjects();
      for (const p of projects) {
        console.log(`  ${p.key.padEnd(16)} ${p.name}`);
      }
      return 0;
    }),
  );

program
  .command("impact <cveId>")
  .description("Blast radius of a CVE: affected teams, projects and trackers")
  .action((cveId: string) =>
    withContext((ctx) => {
      const radius = blastRadius(ctx.store, cveId);
      if (!radius) {
        console.error(`✗ ${cveId.toUpperCase()} not found`);
        return 1;
      }
      console.log(`${radius.cveId}${radius.isEmbargoed ? " (embargoed)" : ""}`);
      console.log(`Severity: ${radius.severity ?? "unknown"}`);
      console.log(
        `Trackers: ${radius.totalTrackers} (${radius.openTrackers} open)`,
      );
      console.log(`Projects: ${radius.affectedProjects.join(", ") || "-"}`);
      console.log(`Teams: ${radius.affectedTeams.join(", ") || "-"}`);
      for (const [team, count] of Object.entries(radius.teamTrackerCounts)) {
        console.log(`  ${team}: ${count}`);
      }
      if (radius.dateSkewDays !== null) {
        console.log(`Date skew: ${radius.dateSkewDays} days`);
      }
      return 0;
    }),
  );

program
  .command("sla")
  .description("SLA compliance of trackers resolved in a date range")
  .option("--days <n>", "SLA target in days (defaults to DEFAULT_SLA_DAYS)")
  .option("--from <date>", "Range start, YYYY-MM-DD (defaults to 90 days before --to)")
  .option("--to <date>", "Range end, YYYY-MM-DD (defaults to today)")
  .option("--team <name>", "Only trackers of this team")
  .action((opts: { days?: string; from?: string; to?: string; team?: string }) =>
    withContext((ctx) => {
      let teamId: number | undefined;
      if (opts.team !== undefined) {
        const team = ctx.store.teams.findByName(opts.team);
        if (!team) throw new ConfigurationError(`Unknown team "${opts.team}"`);
        teamId = team.id;
      }

      const report = slaCompliance(
        ctx.store,
        {
          slaDays: opts.days !== undefined ? parsePositiveInt(opts.days, "--days") : undefined,
          dateRangeStart: opts.from !== undefined ? parseDay(opts.from, false) : undefined,
          dateRangeEnd: opts.to !== undefined ? parseDay(opts.to, true) : undefined,
          teamId,
        },
        { slaDays: ctx.config.defaultSlaDays },
      );

      console.log(
        `SLA ${report.slaDays} days, ${report.dateRangeStart.toISOString().slice(0, 10)} → ` +
          `${report.dateRangeEnd.toISOString().slice(0, 10)}`,
      );
      console.log(
        `Resolved: ${report.totalResolved}, within SLA: ${report.withinSla}, ` +
          `breached: ${report.breached} (${report.complianceRate}%)`,
      );
      for (const t of report.byTeam) {
        console.log(`  ${t.team}: ${t.withinSla} within, ${t.breached} breached`);
      }
      return 0;
    }),
  );

program
  .command("daemon")
  .description("Run as a long-lived daemon with periodic incremental sync")
  .option("--interval <minutes>", "Minutes between sync cycles", "15")
  .option("--source <type>", "Source type (defaults to SOURCE_TYPE)")
  .action((opts: { interval: string; source?: string }) =>
    withContext(async (ctx) => {
      const intervalMs = parsePositiveInt(opts.interval, "--interval") * 60_000;
      const log = ctx.logger.child("daemon");

      let shuttingDown = false;
      const shutdown = () => {
        if (shuttingDown) return;
        shuttingDown = true;
        log.info("Graceful shutdown requested");
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      log.info(`Sync interval: ${opts.interval} minutes`);

      while (!shuttingDown) {
        log.info("Starting sync cycle...");
        try {
          printSyncResult(await runSync(ctx, { source: opts.source }));
        } catch (err) {
          // A failed cycle leaves the watermark alone; the next cycle re-covers it.
          log.error(`Sync cycle failed: ${errorMessage(err)}`);
        }

        const nextSync = new Date(Date.now() + intervalMs);
        log.info(`Next sync at ${nextSync.toLocaleTimeString()}`);

        // Sleep in 1-second increments so we can respond to shutdown quickly
        const sleepUntil = Date.now() + intervalMs;
        while (Date.now() < sleepUntil && !shuttingDown) {
          await new Promise((resolve) => setTimeout(resolve, 1_000));
        }
      }

      log.info("Shutdown complete.");
      return 0;
    }),
  );

await program.parseAsync();
