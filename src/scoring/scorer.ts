/**
 * Wallet Risk Scorer
 *
 * Combines normalized features with fixed weights into a safety value,
 * inverts it into a 0-1000 risk score and buckets the score into a tier.
 *
 * Score ranges:
 * - 0-200: VeryLow (large, well-diversified portfolio)
 * - 201-400: Low
 * - 401-600: Medium
 * - 601-800: High
 * - 801-1000: VeryHigh (small, concentrated portfolio)
 */

import { ConfigError, NoDataError } from "../utils/errors";
import { extractFeatures, type FeatureExtractionOptions } from "./features";
import { DEFAULT_THRESHOLDS, clamp01, normalizeFeatures, validateThresholds } from "./normalizer";
import {
  RiskTier,
  type FeatureVector,
  type NormalizationThresholds,
  type RiskResult,
  type ScoreBreakdown,
  type ScoringWeights,
  type WalletSnapshot,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

export const MIN_SCORE = 0;
export const MAX_SCORE = 1000;

/** Tolerance for the weight-sum check */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Named weight sets
 */
export enum WeightPreset {
  BALANCED = "balanced",
  SIZE_FOCUSED = "size-focused",
  DIVERSIFICATION_FOCUSED = "diversification-focused",
}

export const WEIGHT_PRESETS: Record<WeightPreset, ScoringWeights> = {
  [WeightPreset.BALANCED]: { size: 0.35, diversification: 0.35, concentration: 0.3 },
  [WeightPreset.SIZE_FOCUSED]: { size: 0.5, diversification: 0.25, concentration: 0.25 },
  [WeightPreset.DIVERSIFICATION_FOCUSED]: { size: 0.25, diversification: 0.45, concentration: 0.3 },
};

export const DEFAULT_WEIGHTS: ScoringWeights = WEIGHT_PRESETS[WeightPreset.BALANCED];

/**
 * Upper bound (inclusive) of each tier, in ascending order
 */
const TIER_UPPER_BOUNDS: ReadonlyArray<[number, RiskTier]> = [
  [200, RiskTier.VERY_LOW],
  [400, RiskTier.LOW],
  [600, RiskTier.MEDIUM],
  [800, RiskTier.HIGH],
  [MAX_SCORE, RiskTier.VERY_HIGH],
];

// ============================================================================
// Pure helpers
// ============================================================================

export function isWeightPreset(value: string): value is WeightPreset {
  return Object.values<string>(WeightPreset).includes(value);
}

/**
 * Validate scoring weights, returning a list of problems
 */
export function validateWeights(weights: ScoringWeights): string[] {
  const errors: string[] = [];
  for (const [name, weight] of Object.entries(weights)) {
    if (!(weight >= 0 && weight <= 1)) {
      errors.push(`Weight "${name}" must be within [0, 1], got ${weight}`);
    }
  }
  const sum = weights.size + weights.diversification + weights.concentration;
  if (!(Math.abs(sum - 1) <= WEIGHT_SUM_TOLERANCE)) {
    errors.push(`Scoring weights must sum to 1.0, got ${sum.toFixed(4)}`);
  }
  return errors;
}

/**
 * Resolve a preset name or custom weights, failing fast if invalid
 */
export function resolveWeights(weights: ScoringWeights | WeightPreset | string = DEFAULT_WEIGHTS): ScoringWeights {
  let resolved: ScoringWeights;
  if (typeof weights === "string") {
    if (!isWeightPreset(weights)) {
      throw new ConfigError(
        `Unknown scoring preset "${weights}" (expected one of ${Object.values(WeightPreset).join(", ")})`
      );
    }
    resolved = WEIGHT_PRESETS[weights];
  } else {
    resolved = weights;
  }

  const errors = validateWeights(resolved);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return { ...resolved };
}

/**
 * Map a score to its tier: [0,200] VeryLow, (200,400] Low, ... (800,1000] VeryHigh
 */
export function tierForScore(score: number): RiskTier {
  for (const [upper, tier] of TIER_UPPER_BOUNDS) {
    if (score <= upper) {
      return tier;
    }
  }
  return RiskTier.VERY_HIGH;
}

/**
 * Invert a safety value into an integer score within [0, 1000]
 */
export function safetyToScore(safety: number): number {
  const score = Math.round((1 - clamp01(safety)) * MAX_SCORE);
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

// ============================================================================
// RiskScorer Class
// ============================================================================

/**
 * Configuration for the scorer
 */
export interface RiskScorerConfig {
  /** Custom weights or a preset name (default: balanced) */
  weights?: ScoringWeights | WeightPreset | string;
  /** Threshold overrides */
  thresholds?: Partial<NormalizationThresholds>;
  /** Feature extraction options */
  features?: FeatureExtractionOptions;
}

/**
 * Deterministic rule-based scorer. Configuration is validated in the
 * constructor, so an invalid setup fails before any wallet is processed.
 */
export class RiskScorer {
  private readonly weights: ScoringWeights;
  private readonly thresholds: NormalizationThresholds;
  private readonly featureOptions: FeatureExtractionOptions;

  constructor(config: RiskScorerConfig = {}) {
    const weightErrors: string[] = [];
    let weights: ScoringWeights = DEFAULT_WEIGHTS;
    try {
      weights = resolveWeights(config.weights);
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      weightErrors.push(...error.errors);
    }

    const thresholds = { ...DEFAULT_THRESHOLDS, ...config.thresholds };
    const errors = [...weightErrors, ...validateThresholds(thresholds)];
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }

    this.weights = weights;
    this.thresholds = thresholds;
    this.featureOptions = { ...config.features };
  }

  public getWeights(): ScoringWeights {
    return { ...this.weights };
  }

  public getThresholds(): NormalizationThresholds {
    return { ...this.thresholds };
  }

  /**
   * Score a feature vector
   */
  public scoreFeatures(features: FeatureVector): ScoreBreakdown {
    const normalized = normalizeFeatures(features, this.thresholds);
    const safety = clamp01(
      this.weights.size * normalized.sizeSafety +
        this.weights.diversification * normalized.diversificationSafety +
        this.weights.concentration * normalized.concentrationSafety
    );
    const score = safetyToScore(safety);

    return { normalized, safety, score, tier: tierForScore(score) };
  }

  /**
   * Score a snapshot into a terminal result.
   *
   * @throws NoDataError when every chain failed or no chain returned a priced holding
   */
  public scoreSnapshot(snapshot: WalletSnapshot): RiskResult {
    if (snapshot.status === "failed") {
      throw new NoDataError(snapshot.wallet, "all_chains_failed");
    }

    const features = extractFeatures(snapshot, this.featureOptions);
    if (features.totalValueUsd <= 0) {
      throw new NoDataError(snapshot.wallet, "no_priced_holdings");
    }

    const { score, tier } = this.scoreFeatures(features);

    return {
      wallet: snapshot.wallet,
      score,
      tier,
      status: snapshot.status,
      failedChains: snapshot.failedChains.map((failure) => failure.chainId),
      features,
      asOf: snapshot.fetchedAt,
    };
  }
}

/**
 * Create a new scorer
 */
export function createRiskScorer(config: RiskScorerConfig = {}): RiskScorer {
  return new RiskScorer(config);
}
