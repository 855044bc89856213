/**
 * Jira tracker source: offset-paginated JQL search scoped to a project list,
 * mapped to NormalizedRecords one issue at a time.
 */

import type { ConnectorDeps, Logger } from "../core/index.js";
import {
  ConfigurationError,
  createRateLimiter,
  errorMessage,
  SourceError,
} from "../core/index.js";
import type {
  ConnectionStatus,
  NormalizedRecord,
  SourceProject,
  TrackerSource,
} from "../types.js";
import { JiraRestClient } from "./client.js";
import { toNormalizedRecord } from "./mapping.js";
import type { JiraApi, JiraConfig, JiraSearchResponse } from "./types.js";
import { BASE_SEARCH_FIELDS, DEFAULT_PAGE_SIZE } from "./types.js";

export interface JiraSourceOptions {
  labels: string[];
  severityField: string;
  slaField: string;
  pageSize?: number;
}

export class JiraSource implements TrackerSource {
  static readonly SOURCE_TYPE = "jira";

  readonly sourceType = JiraSource.SOURCE_TYPE;
  readonly displayName = "Jira";

  private readonly api: JiraApi;
  private readonly options: JiraSourceOptions;
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(api: JiraApi, options: JiraSourceOptions, logger: Logger) {
    this.api = api;
    this.options = options;
    this.logger = logger;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      this.logger.info("Testing Jira connection...");
      const user = await this.api.myself();
      const name = user.displayName ?? user.name ?? "unknown";
      this.logger.info(`Connected as: ${name}`);
      return { ok: true, message: `Connected as ${name}` };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Jira connection failed: ${message}`);
      return { ok: false, message: `Connection failed: ${message}` };
    }
  }

  fetchTrackers(
    projectKeys: string[],
    since: Date | null,
  ): AsyncIterable<NormalizedRecord> {
    if (projectKeys.length === 0) {
      throw new ConfigurationError(
        "project keys are required: refusing to fetch trackers without a project scope",
      );
    }

    const jql = buildJql(projectKeys, since, this.options.labels);
    if (since) {
      this.logger.info(
        `Incremental sync: fetching issues updated since ${formatJqlDate(since)}`,
      );
    }
    this.logger.info(`Fetching issues with JQL: ${jql}`);
    return this.paginate(jql);
  }

  async fetchProjects(): Promise<SourceProject[]> {
    this.logger.info("Fetching available Jira projects...");
    const projects = await this.api.listProjects();
    this.logger.info(`Found ${projects.length} projects`);
    return projects.map((p) => ({ key: p.key, name: p.name }));
  }

  private async *paginate(jql: string): AsyncGenerator<NormalizedRecord> {
    const fields = [
      ...BASE_SEARCH_FIELDS,
      this.options.severityField,
      this.options.slaField,
    ];
    let startAt = 0;
    let totalFetched = 0;

    while (true) {
      this.logger.info(
        `Fetching issues ${startAt} to ${startAt + this.pageSize}...`,
      );

      let page: JiraSearchResponse;
      try {
        page = await this.api.searchIssues({
          jql,
          startAt,
          maxResults: this.pageSize,
          fields,
        });
      } catch (err) {
        this.logger.error(`Jira search failed: ${errorMessage(err)}`);
        throw err instanceof SourceError
          ? err
          : new SourceError(`Jira search failed: ${errorMessage(err)}`, {
              cause: err,
            });
      }

      const batchSize = page.issues.length;
      if (batchSize === 0) {
        if (totalFetched === 0) {
          this.logger.warn(`No issues found matching JQL: ${jql}`);
        } else {
          this.logger.info("No more issues to fetch");
        }
        return;
      }

      totalFetched += batchSize;
      this.logger.info(`Fetched ${batchSize} issues (total: ${totalFetched})`);

      for (const issue of page.issues) {
        yield toNormalizedRecord(issue, this.options);
      }

      startAt += batchSize;
      if (batchSize < this.pageSize) {
        this.logger.info(
          `Reached end of results. Total issues fetched: ${totalFetched}`,
        );
        return;
      }
    }
  }
}

// ─── JQL ───

export function buildJql(
  projectKeys: string[],
  since: Date | null,
  labels: string[],
): string {
  const parts = [`project IN (${projectKeys.map(quote).join(", ")})`];
  if (since) {
    parts.push(`updated >= "${formatJqlDate(since)}"`);
  }
  if (labels.length > 0) {
    parts.push(`labels in (${labels.map(quote).join(", ")})`);
  }
  return parts.join(" AND ");
}

/** JQL date literal, "YYYY-MM-DD HH:mm", rendered in UTC. */
export function formatJqlDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

// ─── Factory ───

export function createJiraSource(
  config: JiraConfig,
  deps: ConnectorDeps,
): JiraSource {
  const logger = deps.logger.child("jira");
  const client = new JiraRestClient({
    server: config.server,
    apiToken: config.apiToken,
    rateLimiter:
      deps.rateLimiter ??
      createRateLimiter({ minDelayMs: 100, maxRequests: 100, windowMs: 60_000 }),
    logger,
    signal: deps.signal,
    maxRetries: config.maxRetries,
  });
  return new JiraSource(
    client,
    {
      labels: config.labels,
      severityField: config.severityField,
      slaField: config.slaField,
      pageSize: config.pageSize,
    },
    logger,
  );
}
