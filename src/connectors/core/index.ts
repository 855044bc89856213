// Errors
export {
  ConfigurationError,
  errorMessage,
  isNetworkError,
  SourceError,
  StoreError,
  toStoreError,
  VulntrackError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { backoffDelay, isRetryableError, withRetry } from "./retry.js";
// Types
export type {
  ConnectorDeps,
  Logger,
  LogLevel,
  RateLimiter,
  RateLimiterConfig,
  RateLimitSnapshot,
} from "./types.js";
