import { describe, it, expect, afterEach, vi } from "vitest";
import { env, envUtils, initializeEnv, logConfig, validateEnv } from "../../config/env";

describe("Environment Configuration", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("isValidUrl", () => {
    it("should return true for valid HTTP URLs", () => {
      expect(envUtils.isValidUrl("https://api.covalenthq.com")).toBe(true);
      expect(envUtils.isValidUrl("http://localhost:8080/v1")).toBe(true);
    });

    it("should return false for invalid URLs", () => {
      expect(envUtils.isValidUrl("not-a-url")).toBe(false);
      expect(envUtils.isValidUrl("")).toBe(false);
      expect(envUtils.isValidUrl("example.com")).toBe(false);
    });
  });

  describe("redactSecret", () => {
    it("should return (not set) for undefined or empty values", () => {
      expect(envUtils.redactSecret(undefined)).toBe("(not set)");
      expect(envUtils.redactSecret("")).toBe("(not set)");
    });

    it("should return **** for short values", () => {
      expect(envUtils.redactSecret("abc")).toBe("****");
      expect(envUtils.redactSecret("12345678")).toBe("****");
    });

    it("should show first and last 4 characters for longer values", () => {
      expect(envUtils.redactSecret("test-secret-key")).toBe("test****-key");
    });
  });

  describe("getEnvVarAsNumber", () => {
    it("should parse integers and fall back to the default", () => {
      vi.stubEnv("TEST_NUM", "42");
      expect(envUtils.getEnvVarAsNumber("TEST_NUM")).toBe(42);
      vi.stubEnv("TEST_NUM", "");
      expect(envUtils.getEnvVarAsNumber("TEST_NUM", 7)).toBe(7);
    });

    it("should throw for non-numeric or missing values", () => {
      vi.stubEnv("TEST_NUM", "abc");
      expect(() => envUtils.getEnvVarAsNumber("TEST_NUM")).toThrow(/must be a number/);
      vi.stubEnv("TEST_NUM", "");
      expect(() => envUtils.getEnvVarAsNumber("TEST_NUM")).toThrow("Missing required environment variable: TEST_NUM");
    });
  });

  describe("getEnvVarAsFloat", () => {
    it("should parse decimals", () => {
      vi.stubEnv("TEST_RATIO", "0.35");
      expect(envUtils.getEnvVarAsFloat("TEST_RATIO")).toBe(0.35);
    });

    it("should throw for non-numeric values", () => {
      vi.stubEnv("TEST_RATIO", "high");
      expect(() => envUtils.getEnvVarAsFloat("TEST_RATIO")).toThrow(
        "Environment variable TEST_RATIO must be a number, got: high"
      );
    });
  });

  describe("getEnvVarAsNumberList", () => {
    it("should return the default when unset", () => {
      vi.stubEnv("TEST_NUMS", "");
      expect(envUtils.getEnvVarAsNumberList("TEST_NUMS")).toEqual([]);
      expect(envUtils.getEnvVarAsNumberList("TEST_NUMS", [1, 137])).toEqual([1, 137]);
    });

    it("should parse comma-separated numbers, trimming and dropping blanks", () => {
      vi.stubEnv("TEST_NUMS", " 1 , 137,,56 ");
      expect(envUtils.getEnvVarAsNumberList("TEST_NUMS")).toEqual([1, 137, 56]);
    });

    it("should throw for non-numeric values", () => {
      vi.stubEnv("TEST_NUMS", "1,abc,3");
      expect(() => envUtils.getEnvVarAsNumberList("TEST_NUMS")).toThrow(
        "Environment variable TEST_NUMS[1] must be a number, got: abc"
      );
    });
  });
});

describe("Environment Configuration - env object", () => {
  it("should carry the documented defaults", () => {
    expect(env.BALANCES_API_URL).toBe("https://api.covalenthq.com");
    expect(env.REQUEST_TIMEOUT_MS).toBe(15000);
    expect(env.RETRY_MAX_ATTEMPTS).toBe(3);
    expect(env.CONCURRENCY).toBe(4);
    expect(env.SCORING_PRESET).toBe("balanced");
    expect(env.isTest).toBe(true);
  });
});

describe("validateEnv", () => {
  const valid = { ...env, BALANCES_API_KEY: "test-secret", CHAIN_IDS: [1, 137] };

  it("should accept a complete configuration", () => {
    expect(validateEnv(valid)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("should warn when the API key is missing", () => {
    const result = validateEnv({ ...valid, BALANCES_API_KEY: undefined });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["BALANCES_API_KEY not set - the balances API will reject requests"]);
  });

  it("should warn when concurrency far exceeds the rate limit burst", () => {
    const result = validateEnv({ ...valid, CONCURRENCY: 30, RATE_LIMIT_MAX_TOKENS: 5 });

    expect(result.warnings).toEqual([
      "CONCURRENCY is well above the rate limit burst - workers will mostly wait for tokens",
    ]);
  });

  it("should report every invalid setting", () => {
    const result = validateEnv({
      ...valid,
      CHAIN_IDS: [],
      REQUEST_TIMEOUT_MS: 0,
      RETRY_MAX_ATTEMPTS: 0,
      CONCURRENCY: 0,
      SCORING_PRESET: "aggressive",
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "CHAIN_IDS must list at least one chain id",
      "REQUEST_TIMEOUT_MS must be positive, got 0",
      "Retry policy: maxAttempts must be an integer >= 1, got 0",
      "CONCURRENCY must be >= 1, got 0",
      "SCORING_PRESET must be one of balanced, size-focused, diversification-focused, got: aggressive",
    ]);
  });

  it("should reject non-positive chain ids and an empty rate limit", () => {
    const result = validateEnv({ ...valid, CHAIN_IDS: [1, -5], RATE_LIMIT_MAX_TOKENS: 0, CONCURRENCY: 1 });

    expect(result.errors).toEqual([
      "CHAIN_IDS entries must be positive, got -5",
      "RATE_LIMIT_MAX_TOKENS must be >= 1, got 0",
    ]);
  });
});

describe("logConfig", () => {
  it("should not throw when called", () => {
    expect(() => logConfig()).not.toThrow();
  });
});

describe("initializeEnv", () => {
  it("should not throw for a valid configuration", () => {
    expect(() => initializeEnv({ ...env, BALANCES_API_KEY: "test-secret", CHAIN_IDS: [1] })).not.toThrow();
  });

  it("should throw with the error count when validation fails", () => {
    expect(() => initializeEnv({ ...env, CHAIN_IDS: [], CONCURRENCY: 0 })).toThrow(
      "Environment validation failed with 2 error(s)"
    );
  });
});
