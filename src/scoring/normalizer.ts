/**
 * Feature normalization
 *
 * Three independent piecewise maps from a raw feature to a safety value in
 * [0, 1], where 1 is safest.
 */

import { ConfigError } from "../utils/errors";
import type { FeatureVector, NormalizationThresholds, NormalizedFeatures } from "./types";

export const DEFAULT_THRESHOLDS: NormalizationThresholds = {
  minPortfolioUsd: 100,
  maxPortfolioUsd: 1_000_000,
  minAssets: 1,
  maxAssets: 15,
  minConcentration: 0.1,
  maxConcentration: 1.0,
};

/**
 * Clamp to [0, 1]; non-finite values map to 0
 */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Validate thresholds, returning a list of problems
 */
export function validateThresholds(thresholds: NormalizationThresholds): string[] {
  const errors: string[] = [];
  if (!(thresholds.minPortfolioUsd > 0)) {
    errors.push(`minPortfolioUsd must be > 0 for log scaling, got ${thresholds.minPortfolioUsd}`);
  }
  if (!(thresholds.minPortfolioUsd < thresholds.maxPortfolioUsd)) {
    errors.push(
      `minPortfolioUsd (${thresholds.minPortfolioUsd}) must be below maxPortfolioUsd (${thresholds.maxPortfolioUsd})`
    );
  }
  if (!(thresholds.minAssets < thresholds.maxAssets)) {
    errors.push(`minAssets (${thresholds.minAssets}) must be below maxAssets (${thresholds.maxAssets})`);
  }
  if (!(thresholds.minConcentration >= 0 && thresholds.maxConcentration <= 1)) {
    errors.push("concentration thresholds must lie within [0, 1]");
  }
  if (!(thresholds.minConcentration < thresholds.maxConcentration)) {
    errors.push(
      `minConcentration (${thresholds.minConcentration}) must be below maxConcentration (${thresholds.maxConcentration})`
    );
  }
  return errors;
}

/**
 * Merge overrides onto the defaults and fail fast if invalid
 */
export function createThresholds(overrides: Partial<NormalizationThresholds> = {}): NormalizationThresholds {
  const thresholds = { ...DEFAULT_THRESHOLDS, ...overrides };
  const errors = validateThresholds(thresholds);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return thresholds;
}

/**
 * Portfolio size: log-interpolated between the USD thresholds
 */
export function normalizeSize(valueUsd: number, thresholds: NormalizationThresholds = DEFAULT_THRESHOLDS): number {
  if (!Number.isFinite(valueUsd) || valueUsd <= thresholds.minPortfolioUsd) {
    return 0;
  }
  if (valueUsd >= thresholds.maxPortfolioUsd) {
    return 1;
  }
  const logMin = Math.log10(thresholds.minPortfolioUsd);
  const logMax = Math.log10(thresholds.maxPortfolioUsd);
  return clamp01((Math.log10(valueUsd) - logMin) / (logMax - logMin));
}

/**
 * Asset count: linear between the count thresholds
 */
export function normalizeDiversification(
  assetCount: number,
  thresholds: NormalizationThresholds = DEFAULT_THRESHOLDS
): number {
  if (!Number.isFinite(assetCount) || assetCount <= thresholds.minAssets) {
    return 0;
  }
  if (assetCount >= thresholds.maxAssets) {
    return 1;
  }
  return clamp01((assetCount - thresholds.minAssets) / (thresholds.maxAssets - thresholds.minAssets));
}

/**
 * Concentration ratio: linear inverse between the ratio thresholds
 */
export function normalizeConcentration(
  ratio: number,
  thresholds: NormalizationThresholds = DEFAULT_THRESHOLDS
): number {
  if (!Number.isFinite(ratio) || ratio >= thresholds.maxConcentration) {
    return 0;
  }
  if (ratio <= thresholds.minConcentration) {
    return 1;
  }
  return clamp01(
    (thresholds.maxConcentration - ratio) / (thresholds.maxConcentration - thresholds.minConcentration)
  );
}

/**
 * Normalize every feature of a vector
 */
export function normalizeFeatures(
  features: FeatureVector,
  thresholds: NormalizationThresholds = DEFAULT_THRESHOLDS
): NormalizedFeatures {
  return {
    sizeSafety: normalizeSize(features.totalValueUsd, thresholds),
    diversificationSafety: normalizeDiversification(features.assetCount, thresholds),
    concentrationSafety: normalizeConcentration(features.concentrationRatio, thresholds),
  };
}
