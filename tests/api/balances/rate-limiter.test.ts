/**
 * Tests for the token bucket rate limiter
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";

import { RateLimiter, createRateLimiter, type RateLimiterClock } from "@/api/balances/rate-limiter";
import { FetchAbortedError, FetchErrorType, TransientFetchError } from "@/api/balances/types";

describe("RateLimiter", () => {
  let time: number;
  let clock: RateLimiterClock;
  let sleep: Mock<RateLimiterClock["sleep"]>;

  beforeEach(() => {
    time = 0;
    sleep = vi.fn<RateLimiterClock["sleep"]>(async (ms) => {
      time += ms;
    });
    clock = { now: () => time, sleep };
  });

  // ============================================================================
  // Token bucket
  // ============================================================================

  describe("tryAcquire", () => {
    it("should allow a burst up to maxTokens", () => {
      const limiter = new RateLimiter({ maxTokens: 3 }, clock);

      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);
      expect(limiter.getStats().currentTokens).toBe(0);
    });

    it("should refill per elapsed interval without exceeding capacity", () => {
      const limiter = createRateLimiter({ maxTokens: 2, refillInterval: 100 }, clock);
      limiter.tryAcquire();
      limiter.tryAcquire();

      time = 150;
      expect(limiter.getStats().currentTokens).toBe(1);

      time = 1000;
      expect(limiter.getStats().currentTokens).toBe(2);
    });
  });

  describe("acquire", () => {
    it("should wait for the next token when the bucket is empty", async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillInterval: 100 }, clock);

      await limiter.acquire();
      await limiter.acquire();

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(100, undefined);
      expect(time).toBe(100);
      expect(limiter.getStats()).toMatchObject({
        totalRequests: 2,
        throttledRequests: 1,
        averageWaitTime: 100,
      });
    });

    it("should fail when the wait would exceed maxWaitTime", async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillInterval: 100, maxWaitTime: 50 }, clock);
      await limiter.acquire();

      const error = await limiter.acquire().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientFetchError);
      expect(error).toMatchObject({
        type: FetchErrorType.RATE_LIMIT,
        message: "Timed out waiting for rate limit token after 50ms",
        retryAfterMs: 100,
      });
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should throw when aborted", async () => {
      const limiter = new RateLimiter({}, clock);
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(FetchAbortedError);
    });
  });

  // ============================================================================
  // 429 handling
  // ============================================================================

  describe("handleRateLimitResponse", () => {
    it("should pause every acquisition until Retry-After elapses", async () => {
      const limiter = new RateLimiter({ maxTokens: 5 }, clock);

      limiter.handleRateLimitResponse(500);
      expect(limiter.isPausedState()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);

      await limiter.acquire();

      expect(sleep).toHaveBeenCalledWith(500, undefined);
      expect(time).toBe(500);
      expect(limiter.isPausedState()).toBe(false);
      expect(limiter.getStats()).toMatchObject({ rateLimitedResponses: 1, currentTokens: 4, isPaused: false });
    });

    it("should fall back to retryDelay and keep the later pause end", () => {
      const limiter = new RateLimiter({ retryDelay: 2000 }, clock);

      limiter.handleRateLimitResponse();
      limiter.pause(100);

      time = 1999;
      expect(limiter.isPausedState()).toBe(true);
      time = 2000;
      expect(limiter.isPausedState()).toBe(false);
    });
  });

  describe("pause", () => {
    it("should never pause longer than maxWaitTime", async () => {
      const limiter = new RateLimiter({ maxWaitTime: 30000 }, clock);

      limiter.handleRateLimitResponse(120_000);

      time = 29_999;
      expect(limiter.isPausedState()).toBe(true);
      time = 0;
      await limiter.acquire();

      expect(sleep).toHaveBeenCalledWith(30000, undefined);
      expect(time).toBe(30000);
    });

    it("should report the time until the next token when the pause uses up the wait", async () => {
      const limiter = new RateLimiter({ maxTokens: 1, refillInterval: 100, maxWaitTime: 30000 }, clock);
      await limiter.acquire();
      limiter.pause(30000);

      const error = await limiter.acquire().catch((e: unknown) => e);

      expect(sleep).toHaveBeenCalledWith(30000, undefined);
      expect(error).toBeInstanceOf(TransientFetchError);
      expect(error).toMatchObject({ type: FetchErrorType.RATE_LIMIT, retryAfterMs: 100 });
    });
  });

  describe("reset", () => {
    it("should restore tokens and clear statistics", () => {
      const limiter = new RateLimiter({ maxTokens: 2 }, clock);
      limiter.tryAcquire();
      limiter.handleRateLimitResponse(1000);

      limiter.reset();

      expect(limiter.getStats()).toEqual({
        currentTokens: 2,
        maxTokens: 2,
        totalRequests: 0,
        throttledRequests: 0,
        rateLimitedResponses: 0,
        averageWaitTime: 0,
        isPaused: false,
      });
    });
  });
});
