/**
 * Tests for feature normalization
 */

import { describe, it, expect } from "vitest";

import {
  DEFAULT_THRESHOLDS,
  clamp01,
  createThresholds,
  normalizeConcentration,
  normalizeDiversification,
  normalizeFeatures,
  normalizeSize,
  validateThresholds,
} from "@/scoring/normalizer";
import { ConfigError } from "@/utils/errors";

describe("clamp01", () => {
  it("should clamp into [0, 1] and map non-finite values to 0", () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("normalizeSize", () => {
  it("should be 0 at or below the minimum and 1 at or above the maximum", () => {
    expect(normalizeSize(0)).toBe(0);
    expect(normalizeSize(100)).toBe(0);
    expect(normalizeSize(1_000_000)).toBe(1);
    expect(normalizeSize(50_000_000)).toBe(1);
  });

  it("should interpolate on a log scale", () => {
    expect(normalizeSize(10_000)).toBeCloseTo(0.5, 10);
    expect(normalizeSize(1_000)).toBeCloseTo(0.25, 10);
  });

  it("should be non-decreasing in portfolio value", () => {
    const values = [0, 50, 100, 250, 1_000, 9_999, 10_000, 500_000, 1_000_000, 2_000_000];
    const safeties = values.map((value) => normalizeSize(value));
    for (let i = 1; i < safeties.length; i++) {
      expect(safeties[i]).toBeGreaterThanOrEqual(safeties[i - 1] ?? 0);
    }
  });
});

describe("normalizeDiversification", () => {
  it("should interpolate linearly between the asset thresholds", () => {
    expect(normalizeDiversification(0)).toBe(0);
    expect(normalizeDiversification(1)).toBe(0);
    expect(normalizeDiversification(8)).toBe(0.5);
    expect(normalizeDiversification(15)).toBe(1);
    expect(normalizeDiversification(40)).toBe(1);
  });
});

describe("normalizeConcentration", () => {
  it("should reward low concentration", () => {
    expect(normalizeConcentration(1)).toBe(0);
    expect(normalizeConcentration(0.1)).toBe(1);
    expect(normalizeConcentration(0.05)).toBe(1);
    expect(normalizeConcentration(0)).toBe(1);
    expect(normalizeConcentration(0.55)).toBeCloseTo(0.5, 10);
  });

  it("should be non-increasing in concentration", () => {
    const ratios = [0, 0.1, 0.2, 0.4, 0.6, 0.8, 0.99, 1];
    const safeties = ratios.map((ratio) => normalizeConcentration(ratio));
    for (let i = 1; i < safeties.length; i++) {
      expect(safeties[i]).toBeLessThanOrEqual(safeties[i - 1] ?? 1);
    }
  });
});

describe("normalizeFeatures", () => {
  it("should normalize every feature with custom thresholds", () => {
    const thresholds = createThresholds({ minPortfolioUsd: 10, maxPortfolioUsd: 1_000, maxAssets: 5 });

    const normalized = normalizeFeatures(
      { totalValueUsd: 100, assetCount: 3, concentrationRatio: 1, largestHoldingUsd: 100 },
      thresholds
    );

    expect(normalized.sizeSafety).toBeCloseTo(0.5, 10);
    expect(normalized.diversificationSafety).toBe(0.5);
    expect(normalized.concentrationSafety).toBe(0);
  });
});

describe("threshold validation", () => {
  it("should accept the defaults", () => {
    expect(validateThresholds(DEFAULT_THRESHOLDS)).toEqual([]);
  });

  it("should reject inverted ranges", () => {
    const errors = validateThresholds({
      ...DEFAULT_THRESHOLDS,
      minPortfolioUsd: 5_000_000,
      minAssets: 20,
    });

    expect(errors).toEqual([
      "minPortfolioUsd (5000000) must be below maxPortfolioUsd (1000000)",
      "minAssets (20) must be below maxAssets (15)",
    ]);
  });

  it("should reject a non-positive minimum portfolio value", () => {
    expect(() => createThresholds({ minPortfolioUsd: 0 })).toThrow(ConfigError);
  });
});
