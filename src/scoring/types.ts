/**
 * Domain records for wallet risk scoring
 */

import type { ChainBalanceEntry, ChainId } from "../api/balances/types";

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Overall collection outcome for a wallet
 */
export type SnapshotStatus = "complete" | "partial" | "failed";

/**
 * Why a chain contributed no entries
 */
export type ChainFailureReason = "transient" | "permanent" | "aborted";

/**
 * A chain whose query did not succeed
 */
export interface ChainFailure {
  chainId: ChainId;
  reason: ChainFailureReason;
  message: string;
  attempts: number;
}

/**
 * All balances collected for one wallet at one point in time.
 * Frozen once produced.
 */
export interface WalletSnapshot {
  readonly wallet: string;
  readonly chains: readonly ChainId[];
  readonly entries: readonly ChainBalanceEntry[];
  readonly status: SnapshotStatus;
  readonly failedChains: readonly ChainFailure[];
  readonly fetchedAt: string;
}

// ============================================================================
// Features
// ============================================================================

/**
 * Scalar features derived from a snapshot
 */
export interface FeatureVector {
  /** Sum of priced holdings in USD */
  totalValueUsd: number;
  /** Distinct assets with value above the threshold */
  assetCount: number;
  /** Largest single holding ÷ total; 0 when total is 0 */
  concentrationRatio: number;
  /** Largest single holding in USD */
  largestHoldingUsd: number;
}

/**
 * Feature safety values, each within [0, 1], 1 = safest
 */
export interface NormalizedFeatures {
  sizeSafety: number;
  diversificationSafety: number;
  concentrationSafety: number;
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Named risk bucket
 */
export enum RiskTier {
  /** 0-200: large, well-diversified portfolio */
  VERY_LOW = "VeryLow",
  /** 201-400 */
  LOW = "Low",
  /** 401-600 */
  MEDIUM = "Medium",
  /** 601-800 */
  HIGH = "High",
  /** 801-1000: small, concentrated portfolio */
  VERY_HIGH = "VeryHigh",
}

/**
 * Weight of each feature in the combined safety value. Must sum to 1.
 */
export interface ScoringWeights {
  size: number;
  diversification: number;
  concentration: number;
}

/**
 * Piecewise normalization boundaries
 */
export interface NormalizationThresholds {
  /** At or below this USD value, size safety is 0 */
  minPortfolioUsd: number;
  /** At or above this USD value, size safety is 1 */
  maxPortfolioUsd: number;
  /** At or below this count, diversification safety is 0 */
  minAssets: number;
  /** At or above this count, diversification safety is 1 */
  maxAssets: number;
  /** At or below this ratio, concentration safety is 1 */
  minConcentration: number;
  /** At or above this ratio, concentration safety is 0 */
  maxConcentration: number;
}

/**
 * Score computed from a feature vector
 */
export interface ScoreBreakdown {
  normalized: NormalizedFeatures;
  safety: number;
  score: number;
  tier: RiskTier;
}

/**
 * Terminal per-wallet artifact. Written once, never mutated.
 */
export interface RiskResult {
  wallet: string;
  /** Integer in [0, 1000]; null when no data could be scored */
  score: number | null;
  tier: RiskTier | null;
  status: SnapshotStatus;
  failedChains: ChainId[];
  features?: FeatureVector;
  /** Failure description for failed results */
  error?: string;
  /** Time of the balance snapshot the result reflects */
  asOf: string;
}
