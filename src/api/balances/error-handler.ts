/**
 * Error Handler for balance queries
 *
 * Retry with exponential backoff for transient failures. The backoff is a
 * pure function of (attempt, policy, random) and the handler takes its sleep
 * and random source as dependencies, so retries can be tested without real
 * waiting.
 */

import { ConfigError } from "../../utils/errors";
import type { Logger } from "../../utils/logger";
import {
  FetchAbortedError,
  FetchErrorType,
  PermanentFetchError,
  TransientFetchError,
  type FetchError,
} from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Retry policy for one logical query
 */
export interface RetryPolicy {
  /**
   * Maximum number of attempts, the first one included
   * @default 3
   */
  maxAttempts: number;

  /**
   * Base delay in milliseconds for exponential backoff
   * @default 1000
   */
  baseDelayMs: number;

  /**
   * Maximum delay in milliseconds for a single wait
   * @default 30000
   */
  maxDelayMs: number;

  /**
   * Jitter factor (0-1): the delay is scaled by a factor in [1 - j, 1 + j]
   * @default 0.2
   */
  jitterRatio: number;

  /**
   * Upper bound on the total time spent waiting between attempts
   * @default 60000
   */
  maxCumulativeBackoffMs: number;
}

/**
 * Sleep that can be interrupted by an abort signal
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Injected effects for the retry loop
 */
export interface RetryDependencies {
  sleep?: SleepFn;
  /** Uniform random source in [0, 1) */
  random?: () => number;
  logger?: Pick<Logger, "warn" | "error" | "debug">;
}

/**
 * Options for one execution
 */
export interface ExecuteOptions {
  /** Description of the operation for logging */
  operation?: string;
  /** Extra context for log lines */
  context?: Record<string, unknown>;
  /** Cancellation */
  signal?: AbortSignal;
}

/**
 * Outcome of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalBackoffMs: number }
  | { success: false; error: FetchError; attempts: number; totalBackoffMs: number };

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterRatio: 0.2,
  maxCumulativeBackoffMs: 60000,
};

/**
 * Default sleep backed by setTimeout, resolving early on abort
 */
export const defaultSleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Validate a retry policy, returning a list of problems
 */
export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    errors.push(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (!(policy.baseDelayMs >= 0)) {
    errors.push(`baseDelayMs must be >= 0, got ${policy.baseDelayMs}`);
  }
  if (!(policy.maxDelayMs >= 0)) {
    errors.push(`maxDelayMs must be >= 0, got ${policy.maxDelayMs}`);
  }
  if (policy.baseDelayMs > policy.maxDelayMs) {
    errors.push(`baseDelayMs (${policy.baseDelayMs}) must not exceed maxDelayMs (${policy.maxDelayMs})`);
  }
  if (!(policy.jitterRatio >= 0 && policy.jitterRatio <= 1)) {
    errors.push(`jitterRatio must be within [0, 1], got ${policy.jitterRatio}`);
  }
  if (!(policy.maxCumulativeBackoffMs >= 0)) {
    errors.push(`maxCumulativeBackoffMs must be >= 0, got ${policy.maxCumulativeBackoffMs}`);
  }
  return errors;
}

/**
 * Merge overrides onto the default policy and fail fast if invalid
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  const errors = validateRetryPolicy(policy);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return policy;
}

/**
 * Delay before the next attempt, after `attempt` (1-based) has failed.
 *
 * base × 2^(attempt − 1), scaled by jitter, capped at maxDelayMs.
 * `random = 0.5` yields the un-jittered delay.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, random = 0.5): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const jitterMultiplier = 1 + (random * 2 - 1) * policy.jitterRatio;
  const delay = Math.min(exponentialDelay * jitterMultiplier, policy.maxDelayMs);
  return Math.max(0, Math.round(delay));
}

/**
 * Normalize anything thrown by a query into the fetch error taxonomy.
 * Unknown errors are treated as transient network failures.
 */
export function toFetchError(error: unknown): FetchError {
  if (
    error instanceof TransientFetchError ||
    error instanceof PermanentFetchError ||
    error instanceof FetchAbortedError
  ) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientFetchError(message, FetchErrorType.NETWORK, { cause: error });
}

/**
 * Check whether another attempt is allowed
 */
export function shouldRetry(error: FetchError, attempt: number, policy: RetryPolicy): boolean {
  return error instanceof TransientFetchError && attempt < policy.maxAttempts;
}

// ============================================================================
// Retry loop
// ============================================================================

/**
 * Run `fn` under the retry policy. Never throws for fetch errors: the last
 * error is returned in the result instead.
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  deps: RetryDependencies = {},
  options: ExecuteOptions = {}
): Promise<RetryResult<T>> {
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const operation = options.operation ?? "Balance query";
  let totalBackoffMs = 0;
  let attempt = 0;

  while (true) {
    attempt++;
    if (options.signal?.aborted) {
      return { success: false, error: new FetchAbortedError(), attempts: attempt - 1, totalBackoffMs };
    }

    try {
      const data = await fn(attempt);
      return { success: true, data, attempts: attempt, totalBackoffMs };
    } catch (thrown) {
      const error = toFetchError(thrown);

      if (error instanceof FetchAbortedError) {
        return { success: false, error, attempts: attempt, totalBackoffMs };
      }

      const logData = {
        ...options.context,
        errorType: error.type,
        statusCode: error.statusCode,
        attempt,
        maxAttempts: policy.maxAttempts,
      };

      if (!shouldRetry(error, attempt, policy)) {
        deps.logger?.error(`${operation} failed: ${error.message}`, logData);
        return { success: false, error, attempts: attempt, totalBackoffMs };
      }

      let delay = computeBackoffDelay(attempt, policy, random());
      if (error instanceof TransientFetchError && error.retryAfterMs !== undefined) {
        delay = Math.min(Math.max(delay, error.retryAfterMs), policy.maxDelayMs);
      }

      if (totalBackoffMs + delay > policy.maxCumulativeBackoffMs) {
        deps.logger?.error(`${operation} failed: backoff budget exhausted`, {
          ...logData,
          totalBackoffMs,
          nextDelay: delay,
        });
        return { success: false, error, attempts: attempt, totalBackoffMs };
      }

      deps.logger?.warn(`${operation} failed, retrying in ${delay}ms: ${error.message}`, logData);
      await sleep(delay, options.signal);
      totalBackoffMs += delay;
    }
  }
}

/**
 * Retry handler bound to one policy and set of dependencies
 *
 * @example
 * ```typescript
 * const handler = new ErrorHandler({ maxAttempts: 5 });
 * const result = await handler.execute(() => client.getChainBalances(wallet, 1));
 * if (!result.success) {
 *   log.error("chain failed", { reason: result.error.message });
 * }
 * ```
 */
export class ErrorHandler {
  private readonly policy: RetryPolicy;
  private readonly deps: RetryDependencies;

  constructor(policy: Partial<RetryPolicy> = {}, deps: RetryDependencies = {}) {
    this.policy = createRetryPolicy(policy);
    this.deps = deps;
  }

  /**
   * Get the current policy
   */
  public getPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Execute an async function with retry logic
   */
  public execute<T>(fn: (attempt: number) => Promise<T>, options?: ExecuteOptions): Promise<RetryResult<T>> {
    return executeWithRetry(fn, this.policy, this.deps, options);
  }
}
