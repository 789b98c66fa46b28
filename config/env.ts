import dotenv from "dotenv";

import { validateRetryPolicy } from "../src/api/balances/error-handler";
import { isWeightPreset, WeightPreset } from "../src/scoring/scorer";
import { logger } from "../src/utils/logger";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get a required environment variable
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable
 */
function getEnvVarOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === "" ? undefined : value;
}

/**
 * Get a required URL environment variable with validation
 */
function getEnvVarUrl(key: string, defaultValue?: string): string {
  const value = getEnvVar(key, defaultValue);
  if (!isValidUrl(value)) {
    throw new Error(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as an integer
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a decimal number
 */
function getEnvVarAsFloat(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Parse a comma-separated list of numbers
 */
function getEnvVarAsNumberList(key: string, defaultValue?: number[]): number[] {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    return [];
  }
  const items = value.split(",").map((item) => item.trim()).filter((item) => item !== "");
  return items.map((item, index) => {
    const parsed = parseInt(item, 10);
    if (isNaN(parsed)) {
      throw new Error(`Environment variable ${key}[${index}] must be a number, got: ${item}`);
    }
    return parsed;
  });
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

const DEFAULT_API_URL = "https://api.covalenthq.com";

/**
 * All environment configuration with validation
 */
export const env = {
  // Application
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  isDevelopment: getEnvVar("NODE_ENV", "development") === "development",
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",

  // Balances API
  BALANCES_API_URL: getEnvVarUrl("BALANCES_API_URL", DEFAULT_API_URL),
  BALANCES_API_KEY: getEnvVarOptional("BALANCES_API_KEY"),
  CHAIN_IDS: getEnvVarAsNumberList("CHAIN_IDS", [1]),
  REQUEST_TIMEOUT_MS: getEnvVarAsNumber("REQUEST_TIMEOUT_MS", 15000),

  // Retry policy
  RETRY_MAX_ATTEMPTS: getEnvVarAsNumber("RETRY_MAX_ATTEMPTS", 3),
  RETRY_BASE_DELAY_MS: getEnvVarAsNumber("RETRY_BASE_DELAY_MS", 1000),
  RETRY_MAX_DELAY_MS: getEnvVarAsNumber("RETRY_MAX_DELAY_MS", 30000),
  RETRY_JITTER_RATIO: getEnvVarAsFloat("RETRY_JITTER_RATIO", 0.2),
  RETRY_MAX_CUMULATIVE_MS: getEnvVarAsNumber("RETRY_MAX_CUMULATIVE_MS", 60000),

  // Rate limiting
  RATE_LIMIT_MAX_TOKENS: getEnvVarAsNumber("RATE_LIMIT_MAX_TOKENS", 5),
  RATE_LIMIT_REFILL_INTERVAL_MS: getEnvVarAsNumber("RATE_LIMIT_REFILL_INTERVAL_MS", 250),

  // Pipeline
  CONCURRENCY: getEnvVarAsNumber("CONCURRENCY", 4),
  SCORING_PRESET: getEnvVar("SCORING_PRESET", WeightPreset.BALANCED),

  // Files
  CHECKPOINT_PATH: getEnvVar("CHECKPOINT_PATH", "data/checkpoint.jsonl"),
  WALLETS_CSV: getEnvVar("WALLETS_CSV", "data/wallets.csv"),
  OUTPUT_CSV: getEnvVar("OUTPUT_CSV", "data/wallet_risk_scores.csv"),
  FINAL_CSV: getEnvVar("FINAL_CSV", "data/final_results.csv"),
} as const;

export type Env = typeof env;

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(config: Env = env): void {
  logger.info("Environment configuration (secrets redacted)", {
    NODE_ENV: config.NODE_ENV,
    BALANCES_API_URL: config.BALANCES_API_URL,
    BALANCES_API_KEY: redactSecret(config.BALANCES_API_KEY),
    CHAIN_IDS: config.CHAIN_IDS.join(","),
    REQUEST_TIMEOUT_MS: config.REQUEST_TIMEOUT_MS,
    RETRY_MAX_ATTEMPTS: config.RETRY_MAX_ATTEMPTS,
    RETRY_BASE_DELAY_MS: config.RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS: config.RETRY_MAX_DELAY_MS,
    RETRY_JITTER_RATIO: config.RETRY_JITTER_RATIO,
    RETRY_MAX_CUMULATIVE_MS: config.RETRY_MAX_CUMULATIVE_MS,
    RATE_LIMIT_MAX_TOKENS: config.RATE_LIMIT_MAX_TOKENS,
    RATE_LIMIT_REFILL_INTERVAL_MS: config.RATE_LIMIT_REFILL_INTERVAL_MS,
    CONCURRENCY: config.CONCURRENCY,
    SCORING_PRESET: config.SCORING_PRESET,
    CHECKPOINT_PATH: config.CHECKPOINT_PATH,
    WALLETS_CSV: config.WALLETS_CSV,
    OUTPUT_CSV: config.OUTPUT_CSV,
    FINAL_CSV: config.FINAL_CSV,
  });
}

/**
 * Validate that the environment is properly configured
 * Returns an object with validation results
 */
export function validateEnv(config: Env = env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.BALANCES_API_KEY) {
    warnings.push("BALANCES_API_KEY not set - the balances API will reject requests");
  }

  if (config.CHAIN_IDS.length === 0) {
    errors.push("CHAIN_IDS must list at least one chain id");
  }
  for (const chainId of config.CHAIN_IDS) {
    if (chainId <= 0) {
      errors.push(`CHAIN_IDS entries must be positive, got ${chainId}`);
    }
  }

  if (config.REQUEST_TIMEOUT_MS <= 0) {
    errors.push(`REQUEST_TIMEOUT_MS must be positive, got ${config.REQUEST_TIMEOUT_MS}`);
  }

  const retryErrors = validateRetryPolicy({
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    jitterRatio: config.RETRY_JITTER_RATIO,
    maxCumulativeBackoffMs: config.RETRY_MAX_CUMULATIVE_MS,
  });
  errors.push(...retryErrors.map((error) => `Retry policy: ${error}`));

  if (config.RATE_LIMIT_MAX_TOKENS < 1) {
    errors.push(`RATE_LIMIT_MAX_TOKENS must be >= 1, got ${config.RATE_LIMIT_MAX_TOKENS}`);
  }
  if (config.RATE_LIMIT_REFILL_INTERVAL_MS <= 0) {
    errors.push(`RATE_LIMIT_REFILL_INTERVAL_MS must be positive, got ${config.RATE_LIMIT_REFILL_INTERVAL_MS}`);
  }

  if (config.CONCURRENCY < 1) {
    errors.push(`CONCURRENCY must be >= 1, got ${config.CONCURRENCY}`);
  }
  if (config.CONCURRENCY > config.RATE_LIMIT_MAX_TOKENS * 4) {
    warnings.push("CONCURRENCY is well above the rate limit burst - workers will mostly wait for tokens");
  }

  if (!isWeightPreset(config.SCORING_PRESET)) {
    errors.push(
      `SCORING_PRESET must be one of ${Object.values(WeightPreset).join(", ")}, got: ${config.SCORING_PRESET}`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws if critical errors are found
 */
export function initializeEnv(config: Env = env): void {
  logConfig(config);

  const validation = validateEnv(config);

  for (const warning of validation.warnings) {
    logger.warn(warning);
  }

  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }

  logger.debug("Environment configuration validated");
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  redactSecret,
  getEnvVarAsNumber,
  getEnvVarAsFloat,
  getEnvVarAsNumberList,
};
