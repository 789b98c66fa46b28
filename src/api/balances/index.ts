/**
 * Balances API Exports
 *
 * HTTP client, retry policy and rate limiter for the multi-chain balances
 * endpoint.
 */

// Types
export type {
  BalancesClientConfig,
  RawBalanceItem,
  RawBalancesResponse,
  ChainId,
  ChainBalanceEntry,
  FetchError,
} from "./types";

export { FetchErrorType, TransientFetchError, PermanentFetchError, FetchAbortedError } from "./types";

// Client
export {
  BalancesClient,
  createBalancesClient,
  isBalancesResponse,
  toBalanceEntry,
  parseRetryAfter,
  errorForStatus,
} from "./client";

// Retry
export type { RetryPolicy, SleepFn, RetryDependencies, ExecuteOptions, RetryResult } from "./error-handler";

export {
  DEFAULT_RETRY_POLICY,
  ErrorHandler,
  computeBackoffDelay,
  createRetryPolicy,
  defaultSleep,
  executeWithRetry,
  shouldRetry,
  toFetchError,
  validateRetryPolicy,
} from "./error-handler";

// Rate limiting
export type { RateLimiterConfig, RateLimiterClock, RateLimiterStats } from "./rate-limiter";

export { RateLimiter, createRateLimiter } from "./rate-limiter";
