/**
 * REST client for Jira (API v2) with rate limiting, retry, and response
 * validation.
 */

import type { z } from "zod";
import type { Logger, RateLimiter } from "../core/index.js";
import {
  errorMessage,
  isNetworkError,
  SourceError,
  withRetry,
} from "../core/index.js";
import type {
  JiraApi,
  JiraProject,
  JiraSearchRequest,
  JiraSearchResponse,
  JiraUser,
} from "./types.js";
import {
  jiraProjectListSchema,
  jiraSearchResponseSchema,
  jiraUserSchema,
} from "./types.js";

const DEFAULT_RETRY_AFTER_MS = 30_000;

export interface JiraRestClientOptions {
  server: string;
  apiToken: string;
  rateLimiter: RateLimiter;
  logger: Logger;
  signal?: AbortSignal;
  maxRetries?: number;
}

export class JiraRestClient implements JiraApi {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly maxRetries: number;

  constructor(opts: JiraRestClientOptions) {
    this.baseUrl = opts.server.replace(/\/+$/, "");
    this.apiToken = opts.apiToken;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.signal = opts.signal;
    this.maxRetries = opts.maxRetries ?? 3;
  }

  async myself(): Promise<JiraUser> {
    return this.get("/rest/api/2/myself", {}, jiraUserSchema);
  }

  async searchIssues(request: JiraSearchRequest): Promise<JiraSearchResponse> {
    return this.get(
      "/rest/api/2/search",
      {
        jql: request.jql,
        startAt: String(request.startAt),
        maxResults: String(request.maxResults),
        fields: request.fields.join(","),
      },
      jiraSearchResponseSchema,
    );
  }

  async listProjects(): Promise<JiraProject[]> {
    return this.get("/rest/api/2/project", {}, jiraProjectListSchema);
  }

  /**
   * GET a JSON resource and validate it. Transient failures are retried;
   * everything else surfaces as a SourceError.
   */
  private async get<S extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string>,
    schema: S,
  ): Promise<z.infer<S>> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }

    return withRetry(
      async () => {
        this.checkAbort();
        await this.rateLimiter.acquire();

        let response: Response;
        try {
          response = await fetch(url, {
            headers: {
              Authorization: `Bearer ${this.apiToken}`,
              Accept: "application/json",
            },
            signal: this.signal,
          });
        } catch (err) {
          throw new SourceError(
            `Jira request to ${path} failed: ${errorMessage(err)}`,
            { retryable: isNetworkError(err), cause: err },
          );
        }

        this.processRateLimitHeaders(response.headers);

        if (!response.ok) {
          if (response.status === 429) {
            const retryAfter = parseRetryAfter(response.headers);
            this.logger.warn(`Rate limited (429), backing off ${retryAfter}ms`, {
              ...this.rateLimiter.reported,
            });
            this.rateLimiter.backoff(retryAfter);
          }
          throw new SourceError(
            `Jira request to ${path} returned HTTP ${response.status}`,
            { status: response.status },
          );
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (err) {
          throw new SourceError(`Jira returned invalid JSON for ${path}`, {
            cause: err,
          });
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new SourceError(
            `Malformed Jira response from ${path}: ${parsed.error.message}`,
          );
        }
        return parsed.data;
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: 1000,
        maxDelayMs: 60_000,
        signal: this.signal,
        onRetry: (attempt, delayMs, err) =>
          this.logger.warn(`Retry ${attempt} for ${path} in ${delayMs}ms`, {
            error: errorMessage(err),
          }),
      },
    );
  }

  private processRateLimitHeaders(headers: Headers): void {
    const headerMap: Record<string, string> = {};
    const remaining = headers.get("x-ratelimit-remaining");
    const reset = headers.get("x-ratelimit-reset");
    if (remaining) headerMap["x-ratelimit-remaining"] = remaining;
    if (reset) headerMap["x-ratelimit-reset"] = reset;
    this.rateLimiter.updateFromHeaders(headerMap);
  }

  private checkAbort(): void {
    if (this.signal?.aborted) {
      throw new SourceError("Sync aborted");
    }
  }
}

function parseRetryAfter(headers: Headers): number {
  const retryAfter = headers.get("retry-after");
  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    if (!Number.isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }
  }
  return DEFAULT_RETRY_AFTER_MS;
}
