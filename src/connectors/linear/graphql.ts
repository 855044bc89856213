/**
 * GraphQL client for the Linear API with rate limiting, retry, and pagination.
 */

import { GraphQLClient } from "graphql-request";
import type { z } from "zod";
import type { Logger, RateLimiter } from "../core/index.js";
import {
  errorMessage,
  isNetworkError,
  SourceError,
  withRetry,
} from "../core/index.js";
import { ISSUES_QUERY, TEAMS_QUERY, VIEWER_QUERY } from "./queries.js";
import type {
  IssueFilter,
  IssueNode,
  LinearApi,
  PaginatedResponse,
  TeamNode,
  TeamsResponse,
  ViewerNode,
} from "./types.js";
import {
  issuesResponseSchema,
  teamsResponseSchema,
  viewerResponseSchema,
} from "./types.js";

const LINEAR_API_URL = "https://api.linear.app/graphql";

/** Thresholds for pre-emptive rate limit pausing. */
const REQUEST_REMAINING_THRESHOLD = 200;
const DEFAULT_RETRY_AFTER_MS = 60_000;

export interface LinearGraphQLClientOptions {
  apiKey: string;
  rateLimiter: RateLimiter;
  logger: Logger;
  signal?: AbortSignal;
  endpoint?: string;
  fetch?: typeof fetch;
}

export class LinearGraphQLClient implements LinearApi {
  private readonly client: GraphQLClient;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: LinearGraphQLClientOptions) {
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.signal = opts.signal;

    this.client = new GraphQLClient(opts.endpoint ?? LINEAR_API_URL, {
      headers: {
        Authorization: opts.apiKey,
        "Content-Type": "application/json",
      },
      signal: opts.signal,
      fetch: opts.fetch,
    });
  }

  async viewer(): Promise<ViewerNode> {
    const result = await this.request(VIEWER_QUERY, viewerResponseSchema);
    return result.viewer;
  }

  async issuePage(
    filter: IssueFilter,
    first: number,
    after: string | null,
  ): Promise<PaginatedResponse<IssueNode>> {
    const result = await this.request(ISSUES_QUERY, issuesResponseSchema, {
      filter,
      first,
      after,
    });
    return result.issues;
  }

  async teams(): Promise<TeamNode[]> {
    const allNodes: TeamNode[] = [];
    let cursor: string | null = null;

    do {
      const result: TeamsResponse = await this.request(
        TEAMS_QUERY,
        teamsResponseSchema,
        { after: cursor },
      );
      allNodes.push(...result.teams.nodes);
      cursor =
        result.teams.pageInfo.hasNextPage && result.teams.pageInfo.endCursor
          ? result.teams.pageInfo.endCursor
          : null;
    } while (cursor);

    return allNodes;
  }

  /**
   * Execute a GraphQL query with rate limiting and retry logic, then
   * validate the data against `schema`. Failures that survive the retries
   * and data of the wrong shape surface as SourceError.
   */
  async request<S extends z.ZodTypeAny>(
    query: string,
    schema: S,
    variables?: Record<string, unknown>,
  ): Promise<z.infer<S>> {
    this.checkAbort();

    try {
      return await withRetry(
        async () => {
          this.checkAbort();
          await this.rateLimiter.acquire();

          const response = await this.client.rawRequest<unknown>(query, variables);
          this.processRateLimitHeaders(response.headers);

          const parsed = schema.safeParse(response.data);
          if (!parsed.success) {
            throw new SourceError(
              `Malformed Linear response: ${parsed.error.message}`,
            );
          }
          return parsed.data;
        },
        {
          maxRetries: 3,
          baseDelayMs: 1000,
          maxDelayMs: 60_000,
          retryOn: (err: unknown) => this.isRetryable(err),
          signal: this.signal,
          onRetry: (attempt, delayMs, err) =>
            this.logger.warn(`Linear retry ${attempt} in ${delayMs}ms`, {
              error: errorMessage(err),
            }),
        },
      );
    } catch (err) {
      if (err instanceof SourceError) throw err;
      throw new SourceError(`Linear request failed: ${errorMessage(err)}`, {
        status: httpStatusOf(err),
        cause: err,
      });
    }
  }

  private processRateLimitHeaders(headers: Headers): void {
    const headerMap: Record<string, string> = {};

    const requestsRemaining = headers.get("x-ratelimit-requests-remaining");
    const requestsReset = headers.get("x-ratelimit-requests-reset");

    if (requestsRemaining)
      headerMap["x-ratelimit-requests-remaining"] = requestsRemaining;
    if (requestsReset) headerMap["x-ratelimit-requests-reset"] = requestsReset;

    this.rateLimiter.updateFromHeaders(headerMap);

    // Pre-emptive pausing for request budget
    if (requestsRemaining && requestsReset) {
      const remaining = parseInt(requestsRemaining, 10);
      if (remaining < REQUEST_REMAINING_THRESHOLD) {
        const resetMs = parseResetTimestamp(requestsReset);
        if (resetMs > 0) {
          this.logger.warn(
            `Request rate limit low (${remaining} remaining), pausing`,
            { resetInMs: resetMs },
          );
          this.rateLimiter.backoff(resetMs);
        }
      }
    }
  }

  private isRetryable(err: unknown): boolean {
    const status = httpStatusOf(err);

    if (status === 429) {
      const retryAfter = getRetryAfterMs(err);
      this.rateLimiter.backoff(retryAfter);
      this.logger.warn(`Rate limited (429), backing off ${retryAfter}ms`, {
        ...this.rateLimiter.reported,
      });
      return true;
    }

    if (status !== undefined && status >= 500 && status < 600) {
      return true;
    }

    return isNetworkError(err);
  }

  private checkAbort(): void {
    if (this.signal?.aborted) {
      throw new SourceError("Sync aborted");
    }
  }
}

// ─── Helpers ───

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("response" in err) {
    const response: unknown = err.response;
    if (
      typeof response === "object" &&
      response !== null &&
      "status" in response &&
      typeof response.status === "number"
    ) {
      return response.status;
    }
  }
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

function getRetryAfterMs(err: unknown): number {
  if (typeof err !== "object" || err === null || !("response" in err)) {
    return DEFAULT_RETRY_AFTER_MS;
  }
  const response: unknown = err.response;
  if (
    typeof response === "object" &&
    response !== null &&
    "headers" in response &&
    response.headers instanceof Headers
  ) {
    const seconds = parseInt(response.headers.get("retry-after") ?? "", 10);
    if (!Number.isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }
  }
  return DEFAULT_RETRY_AFTER_MS;
}

function parseResetTimestamp(reset: string): number {
  const val = parseInt(reset, 10);
  if (Number.isNaN(val)) return 0;
  // If small number, treat as seconds from now; if epoch, compute delta
  const epochMs = val < 1e12 ? val * 1000 : val;
  const delta = epochMs - Date.now();
  return delta > 0 ? delta : 0;
}
