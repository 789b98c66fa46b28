/**
 * Rate Limiter for the balances API
 *
 * Token bucket shared by every worker. Tokens refill lazily from an injected
 * clock, so nothing keeps running between calls, and a 429 response pauses
 * the whole bucket until the server's Retry-After has elapsed.
 */

import { defaultSleep, type SleepFn } from "./error-handler";
import { FetchAbortedError, FetchErrorType, TransientFetchError } from "./types";

/**
 * Configuration options for the rate limiter
 */
export interface RateLimiterConfig {
  /**
   * Maximum number of tokens in the bucket
   * @default 5
   */
  maxTokens?: number;

  /**
   * Number of tokens to refill per interval
   * @default 1
   */
  refillRate?: number;

  /**
   * Interval in milliseconds between token refills
   * @default 250
   */
  refillInterval?: number;

  /**
   * Maximum time in milliseconds to wait for a token
   * @default 30000
   */
  maxWaitTime?: number;

  /**
   * Pause applied after a 429 without Retry-After
   * @default 1000
   */
  retryDelay?: number;
}

/**
 * Injected time source
 */
export interface RateLimiterClock {
  now: () => number;
  sleep: SleepFn;
}

/**
 * Statistics about rate limiter usage
 */
export interface RateLimiterStats {
  /** Current number of tokens available */
  currentTokens: number;

  /** Maximum tokens the bucket can hold */
  maxTokens: number;

  /** Total number of acquire calls */
  totalRequests: number;

  /** Number of acquisitions that had to wait */
  throttledRequests: number;

  /** Number of 429 responses reported */
  rateLimitedResponses: number;

  /** Average wait time in ms for throttled requests */
  averageWaitTime: number;

  /** Whether the limiter is paused after a 429 */
  isPaused: boolean;
}

const DEFAULT_CONFIG: Required<RateLimiterConfig> = {
  maxTokens: 5,
  refillRate: 1,
  refillInterval: 250,
  maxWaitTime: 30000,
  retryDelay: 1000,
};

const SYSTEM_CLOCK: RateLimiterClock = {
  now: () => Date.now(),
  sleep: defaultSleep,
};

/**
 * Token bucket rate limiter
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ maxTokens: 5, refillInterval: 250 });
 * await limiter.acquire(signal);
 * const entries = await client.getChainBalances(wallet, chainId, signal);
 * ```
 */
export class RateLimiter {
  private readonly config: Required<RateLimiterConfig>;
  private readonly clock: RateLimiterClock;
  private tokens: number;
  private lastRefillTime: number;
  private pausedUntil = 0;

  // Statistics
  private totalRequests = 0;
  private throttledRequests = 0;
  private rateLimitedResponses = 0;
  private totalWaitTime = 0;

  constructor(config: RateLimiterConfig = {}, clock: RateLimiterClock = SYSTEM_CLOCK) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = clock;
    this.tokens = this.config.maxTokens;
    this.lastRefillTime = clock.now();
  }

  /**
   * Refill tokens based on elapsed time. No tokens accrue while paused.
   */
  private refill(now: number): void {
    if (now < this.pausedUntil) {
      return;
    }
    if (this.lastRefillTime < this.pausedUntil) {
      this.lastRefillTime = this.pausedUntil;
    }

    const intervalsElapsed = Math.floor((now - this.lastRefillTime) / this.config.refillInterval);
    if (intervalsElapsed > 0) {
      this.tokens = Math.min(this.config.maxTokens, this.tokens + intervalsElapsed * this.config.refillRate);
      this.lastRefillTime += intervalsElapsed * this.config.refillInterval;
    }
  }

  /**
   * Milliseconds until a token could next be available
   */
  private timeUntilNextToken(now: number): number {
    if (now < this.pausedUntil) {
      return this.pausedUntil - now;
    }
    return Math.max(1, this.lastRefillTime + this.config.refillInterval - now);
  }

  /**
   * Try to acquire a token without waiting
   */
  public tryAcquire(): boolean {
    const now = this.clock.now();
    this.refill(now);
    if (now < this.pausedUntil || this.tokens < 1) {
      return false;
    }
    this.tokens -= 1;
    this.totalRequests++;
    return true;
  }

  /**
   * Acquire a token, waiting if necessary
   *
   * @throws TransientFetchError (RATE_LIMIT) if maxWaitTime would be exceeded,
   *   with the remaining wait as `retryAfterMs`
   * @throws FetchAbortedError if the signal is aborted while waiting
   */
  public async acquire(signal?: AbortSignal): Promise<void> {
    this.totalRequests++;
    const startedAt = this.clock.now();
    let throttled = false;

    while (true) {
      if (signal?.aborted) {
        throw new FetchAbortedError();
      }

      const now = this.clock.now();
      this.refill(now);

      if (now >= this.pausedUntil && this.tokens >= 1) {
        this.tokens -= 1;
        if (throttled) {
          this.totalWaitTime += now - startedAt;
        }
        return;
      }

      const wait = this.timeUntilNextToken(now);
      if (now + wait - startedAt > this.config.maxWaitTime) {
        throw new TransientFetchError(
          `Timed out waiting for rate limit token after ${this.config.maxWaitTime}ms`,
          FetchErrorType.RATE_LIMIT,
          { retryAfterMs: wait }
        );
      }

      if (!throttled) {
        throttled = true;
        this.throttledRequests++;
      }
      await this.clock.sleep(wait, signal);
    }
  }

  /**
   * Handle a 429 from the API by pausing every acquisition
   *
   * @param retryAfterMs - Server-requested wait; falls back to `retryDelay`
   */
  public handleRateLimitResponse(retryAfterMs?: number): void {
    this.rateLimitedResponses++;
    this.pause(retryAfterMs ?? this.config.retryDelay);
  }

  /**
   * Pause the limiter for a duration, at most `maxWaitTime`, so a waiting
   * acquisition can always outlast the pause. Overlapping pauses keep the
   * later end.
   */
  public pause(duration: number): void {
    const capped = Math.min(Math.max(0, duration), this.config.maxWaitTime);
    this.pausedUntil = Math.max(this.pausedUntil, this.clock.now() + capped);
  }

  /**
   * Check if the rate limiter is currently paused
   */
  public isPausedState(): boolean {
    return this.clock.now() < this.pausedUntil;
  }

  /**
   * Get current rate limiter statistics
   */
  public getStats(): RateLimiterStats {
    const now = this.clock.now();
    this.refill(now);
    return {
      currentTokens: this.tokens,
      maxTokens: this.config.maxTokens,
      totalRequests: this.totalRequests,
      throttledRequests: this.throttledRequests,
      rateLimitedResponses: this.rateLimitedResponses,
      averageWaitTime: this.throttledRequests > 0 ? this.totalWaitTime / this.throttledRequests : 0,
      isPaused: now < this.pausedUntil,
    };
  }

  /**
   * Reset tokens, pause state and statistics
   */
  public reset(): void {
    this.tokens = this.config.maxTokens;
    this.lastRefillTime = this.clock.now();
    this.pausedUntil = 0;
    this.totalRequests = 0;
    this.throttledRequests = 0;
    this.rateLimitedResponses = 0;
    this.totalWaitTime = 0;
  }
}

/**
 * Create a new rate limiter
 */
export function createRateLimiter(config: RateLimiterConfig = {}, clock?: RateLimiterClock): RateLimiter {
  return new RateLimiter(config, clock);
}
