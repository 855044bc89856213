/** Core type definitions shared by every connector. */

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

/** Budget last reported by the server's rate limit headers. */
export interface RateLimitSnapshot {
  remaining: number | null;
  /** Epoch milliseconds. */
  resetAt: number | null;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
  readonly reported: RateLimitSnapshot;
}

// ─── Logger ───

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

// ─── Connector dependencies (injected by the registry) ───

export interface ConnectorDeps {
  logger: Logger;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
}
