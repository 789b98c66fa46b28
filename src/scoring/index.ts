/**
 * Scoring Exports
 */

export type {
  SnapshotStatus,
  ChainFailure,
  ChainFailureReason,
  WalletSnapshot,
  FeatureVector,
  NormalizedFeatures,
  ScoringWeights,
  NormalizationThresholds,
  ScoreBreakdown,
  RiskResult,
} from "./types";

export { RiskTier } from "./types";

export { extractFeatures, pricedEntries } from "./features";
export type { FeatureExtractionOptions } from "./features";

export {
  DEFAULT_THRESHOLDS,
  clamp01,
  createThresholds,
  normalizeConcentration,
  normalizeDiversification,
  normalizeFeatures,
  normalizeSize,
  validateThresholds,
} from "./normalizer";

export {
  DEFAULT_WEIGHTS,
  MAX_SCORE,
  MIN_SCORE,
  RiskScorer,
  WEIGHT_PRESETS,
  WEIGHT_SUM_TOLERANCE,
  WeightPreset,
  createRiskScorer,
  isWeightPreset,
  resolveWeights,
  safetyToScore,
  tierForScore,
  validateWeights,
} from "./scorer";
export type { RiskScorerConfig } from "./scorer";
