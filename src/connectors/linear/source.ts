/**
 * Linear tracker source: cursor-paginated issue query filtered by team key,
 * tracker labels and update time.
 */

import type { ConnectorDeps, Logger } from "../core/index.js";
import {
  ConfigurationError,
  createRateLimiter,
  errorMessage,
  SourceError,
} from "../core/index.js";
import { extractCveIds } from "../cve.js";
import type {
  ConnectionStatus,
  NormalizedRecord,
  SourceProject,
  TrackerSource,
} from "../types.js";
import { LinearGraphQLClient } from "./graphql.js";
import type {
  IssueFilter,
  IssueNode,
  LinearApi,
  LinearConfig,
  PaginatedResponse,
} from "./types.js";
import { DEFAULT_LINEAR_PAGE_SIZE, PRIORITY_LABELS } from "./types.js";

const SEVERITY_LABEL = /^severity\s*[:/]\s*(.+)$/i;

export class LinearSource implements TrackerSource {
  static readonly SOURCE_TYPE = "linear";

  readonly sourceType = LinearSource.SOURCE_TYPE;
  readonly displayName = "Linear";

  private readonly api: LinearApi;
  private readonly labels: string[];
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(
    api: LinearApi,
    options: { labels: string[]; pageSize?: number },
    logger: Logger,
  ) {
    this.api = api;
    this.labels = options.labels;
    this.logger = logger;
    this.pageSize = options.pageSize ?? DEFAULT_LINEAR_PAGE_SIZE;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const viewer = await this.api.viewer();
      this.logger.info(`Authenticated as ${viewer.name} (${viewer.email})`);
      return { ok: true, message: `Connected as ${viewer.name}` };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Linear connection failed: ${message}`);
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
    return this.paginate(buildIssueFilter(projectKeys, since, this.labels));
  }

  async fetchProjects(): Promise<SourceProject[]> {
    const teams = await this.api.teams();
    this.logger.info(`Found ${teams.length} teams`);
    return teams.map((t) => ({ key: t.key, name: t.name }));
  }

  private async *paginate(filter: IssueFilter): AsyncGenerator<NormalizedRecord> {
    let cursor: string | null = null;
    let total = 0;

    do {
      let page: PaginatedResponse<IssueNode>;
      let records: NormalizedRecord[];
      try {
        page = await this.api.issuePage(filter, this.pageSize, cursor);
        records = page.nodes.map(toNormalizedRecord);
      } catch (err) {
        this.logger.error(`Linear issue fetch failed: ${errorMessage(err)}`);
        throw err instanceof SourceError
          ? err
          : new SourceError(`Linear issue fetch failed: ${errorMessage(err)}`, {
              cause: err,
            });
      }

      total += records.length;
      this.logger.debug(`Fetched ${records.length} issues (total: ${total})`);

      for (const record of records) {
        yield record;
      }

      cursor =
        page.pageInfo.hasNextPage && page.pageInfo.endCursor
          ? page.pageInfo.endCursor
          : null;
    } while (cursor);

    this.logger.info(`Fetched ${total} issues`);
  }
}

// ─── Filter ───

export function buildIssueFilter(
  teamKeys: string[],
  since: Date | null,
  labels: string[],
): IssueFilter {
  const filter: IssueFilter = { team: { key: { in: teamKeys } } };
  if (since) filter.updatedAt = { gte: since.toISOString() };
  if (labels.length > 0) filter.labels = { some: { name: { in: labels } } };
  return filter;
}

// ─── Mapping ───

export function toNormalizedRecord(node: IssueNode): NormalizedRecord {
  const labels = node.labels.nodes.map((l) => l.name);
  const severity = labels
    .map((name) => SEVERITY_LABEL.exec(name)?.[1]?.trim())
    .find((value): value is string => Boolean(value));

  const customFields: Record<string, unknown> = {};
  if (node.slaBreachesAt) customFields.slaBreachesAt = node.slaBreachesAt;

  return {
    sourceKey: node.identifier,
    sourceType: LinearSource.SOURCE_TYPE,
    projectKey: node.team.key,
    summary: node.title,
    status: node.state?.name ?? null,
    resolution: resolutionOf(node),
    priority: PRIORITY_LABELS[node.priority] ?? null,
    severity: severity ?? null,
    assignee: node.assignee?.displayName ?? null,
    reporter: node.creator?.displayName ?? null,
    createdDate: parseDate(node.createdAt),
    updatedDate: parseDate(node.updatedAt),
    resolvedDate: parseDate(node.completedAt ?? node.canceledAt),
    dueDate: parseDate(node.dueDate),
    slaDate: parseDate(node.slaBreachesAt),
    cveIds: extractCveIds(node.title),
    labels,
    customFields,
  };
}

function resolutionOf(node: IssueNode): string | null {
  if (node.completedAt) return "Done";
  if (node.canceledAt) return "Cancelled";
  return null;
}

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

// ─── Factory ───

export function createLinearSource(
  config: LinearConfig,
  deps: ConnectorDeps,
): LinearSource {
  const logger = deps.logger.child("linear");
  const client = new LinearGraphQLClient({
    apiKey: config.apiKey,
    rateLimiter:
      deps.rateLimiter ??
      createRateLimiter({ minDelayMs: 100, maxRequests: 1500, windowMs: 3_600_000 }),
    logger,
    signal: deps.signal,
  });
  return new LinearSource(
    client,
    { labels: config.labels, pageSize: config.pageSize },
    logger,
  );
}
