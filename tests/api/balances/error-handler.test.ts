/**
 * Tests for the retry policy and retry loop
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

import {
  DEFAULT_RETRY_POLICY,
  ErrorHandler,
  computeBackoffDelay,
  createRetryPolicy,
  executeWithRetry,
  shouldRetry,
  toFetchError,
  validateRetryPolicy,
  type RetryPolicy,
  type SleepFn,
} from "@/api/balances/error-handler";
import {
  FetchAbortedError,
  FetchErrorType,
  PermanentFetchError,
  TransientFetchError,
} from "@/api/balances/types";
import { ConfigError } from "@/utils/errors";

function transient(message = "HTTP 503", retryAfterMs?: number): TransientFetchError {
  return new TransientFetchError(message, FetchErrorType.SERVER, { statusCode: 503, retryAfterMs });
}

describe("computeBackoffDelay", () => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY };

  it("should double the delay per attempt without jitter", () => {
    expect(computeBackoffDelay(1, policy, 0.5)).toBe(1000);
    expect(computeBackoffDelay(2, policy, 0.5)).toBe(2000);
    expect(computeBackoffDelay(3, policy, 0.5)).toBe(4000);
  });

  it("should stay within the jitter band", () => {
    expect(computeBackoffDelay(1, policy, 0)).toBe(800);
    expect(computeBackoffDelay(1, policy, 1)).toBe(1200);
  });

  it("should cap at maxDelayMs", () => {
    expect(computeBackoffDelay(10, policy, 0.5)).toBe(30000);
    expect(computeBackoffDelay(10, policy, 1)).toBe(30000);
  });
});

describe("validateRetryPolicy", () => {
  it("should accept the default policy", () => {
    expect(validateRetryPolicy(DEFAULT_RETRY_POLICY)).toEqual([]);
  });

  it("should report every problem", () => {
    const errors = validateRetryPolicy({
      maxAttempts: 0,
      baseDelayMs: 5000,
      maxDelayMs: 1000,
      jitterRatio: 2,
      maxCumulativeBackoffMs: -1,
    });
    expect(errors).toEqual([
      "maxAttempts must be an integer >= 1, got 0",
      "baseDelayMs (5000) must not exceed maxDelayMs (1000)",
      "jitterRatio must be within [0, 1], got 2",
      "maxCumulativeBackoffMs must be >= 0, got -1",
    ]);
  });

  it("should throw ConfigError from createRetryPolicy", () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(ConfigError);
    expect(createRetryPolicy({ maxAttempts: 5 })).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 5 });
  });
});

describe("toFetchError / shouldRetry", () => {
  it("should wrap unknown errors as transient network failures", () => {
    const error = toFetchError(new Error("socket hang up"));
    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ type: FetchErrorType.NETWORK, message: "socket hang up" });
  });

  it("should only retry transient errors below the attempt limit", () => {
    const permanent = new PermanentFetchError("HTTP 404", FetchErrorType.CLIENT);
    expect(shouldRetry(transient(), 1, DEFAULT_RETRY_POLICY)).toBe(true);
    expect(shouldRetry(transient(), 3, DEFAULT_RETRY_POLICY)).toBe(false);
    expect(shouldRetry(permanent, 1, DEFAULT_RETRY_POLICY)).toBe(false);
  });
});

describe("executeWithRetry", () => {
  const sleep = vi.fn<SleepFn>(async () => {});
  const random = (): number => 0.5;
  const logger = { warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return data after transient failures", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce("ok");

    const result = await executeWithRetry(fn, DEFAULT_RETRY_POLICY, { sleep, random, logger });

    expect(result).toEqual({ success: true, data: "ok", attempts: 3, totalBackoffMs: 3000 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Balance query failed, retrying in 1000ms: HTTP 503",
      expect.objectContaining({ attempt: 1, maxAttempts: 3, errorType: FetchErrorType.SERVER })
    );
  });

  it("should not retry permanent errors", async () => {
    const permanent = new PermanentFetchError("HTTP 401", FetchErrorType.AUTH, { statusCode: 401 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(permanent);

    const result = await executeWithRetry(fn, DEFAULT_RETRY_POLICY, { sleep, random, logger });

    expect(result).toEqual({ success: false, error: permanent, attempts: 1, totalBackoffMs: 0 });
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("should give up after maxAttempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

    const result = await executeWithRetry(fn, DEFAULT_RETRY_POLICY, { sleep, random });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.totalBackoffMs).toBe(3000);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should honor Retry-After up to maxDelayMs", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient("HTTP 429", 5000))
      .mockRejectedValueOnce(transient("HTTP 429", 90000))
      .mockResolvedValueOnce("ok");

    const result = await executeWithRetry(fn, DEFAULT_RETRY_POLICY, { sleep, random });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 30000]);
    expect(result).toMatchObject({ success: true, totalBackoffMs: 35000 });
  });

  it("should stop when the cumulative backoff budget would be exceeded", async () => {
    const policy = createRetryPolicy({ maxAttempts: 10, maxCumulativeBackoffMs: 1500 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

    const result = await executeWithRetry(fn, policy, { sleep, random, logger });

    expect(result).toMatchObject({ success: false, attempts: 2, totalBackoffMs: 1000 });
    expect(logger.error).toHaveBeenCalledWith(
      "Balance query failed: backoff budget exhausted",
      expect.objectContaining({ totalBackoffMs: 1000, nextDelay: 2000 })
    );
  });

  it("should stop retrying once aborted", async () => {
    const controller = new AbortController();
    const abortingSleep = vi.fn<SleepFn>(async () => {
      controller.abort();
    });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

    const result = await executeWithRetry(
      fn,
      DEFAULT_RETRY_POLICY,
      { sleep: abortingSleep, random },
      { signal: controller.signal }
    );

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.success ? null : result.error).toBeInstanceOf(FetchAbortedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should return abort errors from the operation immediately", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new FetchAbortedError());

    const result = await executeWithRetry(fn, DEFAULT_RETRY_POLICY, { sleep, random });

    expect(result).toMatchObject({ success: false, attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("ErrorHandler", () => {
  it("should merge policy overrides", () => {
    const handler = new ErrorHandler({ maxAttempts: 5, jitterRatio: 0 });
    expect(handler.getPolicy()).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 5, jitterRatio: 0 });
  });

  it("should run the retry loop with its dependencies", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const handler = new ErrorHandler({ jitterRatio: 0 }, { sleep });
    const fn = vi.fn<() => Promise<number>>().mockRejectedValueOnce(transient()).mockResolvedValueOnce(42);

    const result = await handler.execute(fn, { operation: "Test query" });

    expect(result).toEqual({ success: true, data: 42, attempts: 2, totalBackoffMs: 1000 });
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });
});
