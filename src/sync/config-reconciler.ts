/**
 * Reconciles the declarative teams file (teams, their projects, and
 * project dependencies) into the store.
 */

import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Logger } from "../connectors/core/index.js";
import { ConfigurationError, errorMessage } from "../connectors/core/index.js";
import type { EntityStore } from "../store/index.js";

// ─── Config file shape ───

const teamSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  projects: z.array(z.string().min(1)).default([]),
});

export const teamsConfigSchema = z.object({
  teams: z.array(teamSchema).default([]),
  /** downstream project key → upstream project keys it depends on */
  project_dependencies: z.record(z.array(z.string().min(1))).default({}),
});

export type TeamsConfig = z.infer<typeof teamsConfigSchema>;

export const EMPTY_TEAMS_CONFIG: TeamsConfig = {
  teams: [],
  project_dependencies: {},
};

export interface ConfigSyncStats {
  teamsCreated: number;
  teamsUpdated: number;
  projectsCreated: number;
  projectsUpdated: number;
  dependenciesAdded: number;
  /** "<downstream> <- <upstream>: <reason>" for every edge not stored. */
  dependenciesSkipped: string[];
}

/**
 * Read a JSON or YAML teams file. A missing file is an empty config; an
 * unreadable or invalid one is a ConfigurationError.
 */
export function loadTeamsConfig(configPath: string): TeamsConfig {
  if (!fs.existsSync(configPath)) {
    return EMPTY_TEAMS_CONFIG;
  }

  let raw: unknown;
  try {
    // YAML is a superset of JSON, one parser covers both.
    raw = parseYaml(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read teams config ${configPath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return parseTeamsConfig(raw ?? {}, configPath);
}

export function parseTeamsConfig(raw: unknown, origin = "teams config"): TeamsConfig {
  const parsed = teamsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${origin}: ${issues}`);
  }
  return parsed.data;
}

/** Every project key named by a team, in file order, without duplicates. */
export function projectKeysOf(config: TeamsConfig): string[] {
  const keys = new Set<string>();
  for (const team of config.teams) {
    for (const key of team.projects) keys.add(key);
  }
  return [...keys];
}

// ─── Reconciler ───

export class ConfigReconciler {
  private readonly store: EntityStore;
  private readonly logger: Logger;

  constructor(store: EntityStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  syncFromFile(configPath: string): ConfigSyncStats {
    return this.apply(loadTeamsConfig(configPath));
  }

  /** Idempotent: applying the same config twice changes nothing the second time. */
  apply(config: TeamsConfig): ConfigSyncStats {
    return this.store.transaction(() => {
      const stats: ConfigSyncStats = {
        teamsCreated: 0,
        teamsUpdated: 0,
        projectsCreated: 0,
        projectsUpdated: 0,
        dependenciesAdded: 0,
        dependenciesSkipped: [],
      };

      for (const teamConfig of config.teams) {
        this.applyTeam(teamConfig, stats);
      }
      this.applyDependencies(config.project_dependencies, stats);

      this.logger.info(
        `Config applied: ${stats.teamsCreated} teams created, ${stats.teamsUpdated} updated, ` +
          `${stats.projectsCreated} projects created, ${stats.projectsUpdated} reassigned, ` +
          `${stats.dependenciesAdded} dependencies added`,
      );
      for (const skipped of stats.dependenciesSkipped) {
        this.logger.warn(`Dependency skipped: ${skipped}`);
      }
      return stats;
    });
  }

  private applyTeam(
    teamConfig: TeamsConfig["teams"][number],
    stats: ConfigSyncStats,
  ): void {
    const { teams, projects } = this.store;
    const description = teamConfig.description ?? null;

    let team = teams.findByName(teamConfig.name);
    if (!team) {
      team = teams.create(teamConfig.name, description);
      stats.teamsCreated++;
      this.logger.debug(`Created team: ${team.name}`);
    } else if (team.description !== description) {
      teams.updateDescription(team.id, description);
      stats.teamsUpdated++;
    }

    for (const key of teamConfig.projects) {
      const project = projects.findByKey(key);
      if (!project) {
        projects.create(key, key, team.id);
        stats.projectsCreated++;
      } else if (project.teamId !== team.id) {
        projects.assignTeam(project.id, team.id);
        stats.projectsUpdated++;
      }
    }
  }

  private applyDependencies(
    dependencies: TeamsConfig["project_dependencies"],
    stats: ConfigSyncStats,
  ): void {
    const { projects } = this.store;

    for (const [downstreamKey, upstreamKeys] of Object.entries(dependencies)) {
      const downstream = projects.findByKey(downstreamKey);
      for (const upstreamKey of upstreamKeys) {
        const edge = `${downstreamKey} <- ${upstreamKey}`;
        if (!downstream) {
          stats.dependenciesSkipped.push(`${edge}: unknown project ${downstreamKey}`);
          continue;
        }
        const upstream = projects.findByKey(upstreamKey);
        if (!upstream) {
          stats.dependenciesSkipped.push(`${edge}: unknown project ${upstreamKey}`);
          continue;
        }

        const result = projects.addDependency(upstream.id, downstream.id);
        if (result === "added") {
          stats.dependenciesAdded++;
        } else if (result === "cycle") {
          stats.dependenciesSkipped.push(`${edge}: would create a cycle`);
        }
      }
    }
  }
}
