/**
 * Runtime configuration, read from the environment (.env, then .env.local).
 */

import * as path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { LogLevel } from "./connectors/core/index.js";
import { ConfigurationError } from "./connectors/core/index.js";
import {
  DEFAULT_JIRA_LABELS,
  DEFAULT_SEVERITY_FIELD,
  DEFAULT_SLA_FIELD,
} from "./connectors/jira/index.js";
import { DEFAULT_LINEAR_LABELS } from "./connectors/linear/index.js";

export interface JiraSettings {
  server: string | undefined;
  apiToken: string | undefined;
  labels: string[];
  severityField: string;
  slaField: string;
}

export interface LinearSettings {
  apiKey: string | undefined;
  labels: string[];
}

export interface SourceSettings {
  jira: JiraSettings;
  linear: LinearSettings;
}

export interface AppConfig {
  databasePath: string;
  teamsConfigPath: string;
  sourceType: string;
  sources: SourceSettings;
  defaultSlaDays: number;
  logLevel: LogLevel;
}

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const envSchema = z.object({
  DATABASE_PATH: z.preprocess(
    blankToUndefined,
    z.string().default("./data/vulntrack.db"),
  ),
  TEAMS_CONFIG: z.preprocess(
    blankToUndefined,
    z.string().default("./config/teams.yaml"),
  ),
  SOURCE_TYPE: z.preprocess(
    blankToUndefined,
    z.string().toLowerCase().default("jira"),
  ),
  JIRA_SERVER: z.preprocess(blankToUndefined, z.string().url().optional()),
  JIRA_API_TOKEN: optionalString,
  JIRA_LABELS: optionalString,
  JIRA_SEVERITY_FIELD: optionalString,
  JIRA_SLA_FIELD: optionalString,
  LINEAR_API_KEY: optionalString,
  LINEAR_LABELS: optionalString,
  DEFAULT_SLA_DAYS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(30),
  ),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  ),
});

/**
 * Load `<dir>/.env` then `<dir>/.env.local` into process.env. `.env` never
 * replaces a variable already set; `.env.local` overrides both.
 */
export function loadEnvFiles(dir = "."): void {
  loadDotenv({ path: path.join(dir, ".env") });
  loadDotenv({ path: path.join(dir, ".env.local"), override: true });
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  return {
    databasePath: e.DATABASE_PATH,
    teamsConfigPath: e.TEAMS_CONFIG,
    sourceType: e.SOURCE_TYPE,
    sources: {
      jira: {
        server: e.JIRA_SERVER,
        apiToken: e.JIRA_API_TOKEN,
        labels: parseCommaSeparated(e.JIRA_LABELS) ?? DEFAULT_JIRA_LABELS,
        severityField: e.JIRA_SEVERITY_FIELD ?? DEFAULT_SEVERITY_FIELD,
        slaField: e.JIRA_SLA_FIELD ?? DEFAULT_SLA_FIELD,
      },
      linear: {
        apiKey: e.LINEAR_API_KEY,
        labels: parseCommaSeparated(e.LINEAR_LABELS) ?? DEFAULT_LINEAR_LABELS,
      },
    },
    defaultSlaDays: e.DEFAULT_SLA_DAYS,
    logLevel: e.LOG_LEVEL,
  };
}

// ─── Helper Functions ───

export function parseCommaSeparated(
  value: string | undefined,
): string[] | undefined {
  if (!value) return undefined;
  const parts = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return parts.length > 0 ? parts : undefined;
}
