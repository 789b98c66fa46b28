/**
 * Portfolio feature extraction
 *
 * Reduces a wallet snapshot to total value, asset count and concentration.
 */

import type { ChainBalanceEntry } from "../api/balances/types";
import type { FeatureVector, WalletSnapshot } from "./types";

/**
 * Options for feature extraction
 */
export interface FeatureExtractionOptions {
  /**
   * Holdings must be worth strictly more than this to count as an asset
   * @default 0
   */
  minAssetValueUsd?: number;
}

/**
 * Entries that carry a price and a positive value
 */
export function pricedEntries(entries: readonly ChainBalanceEntry[]): ChainBalanceEntry[] {
  return entries.filter(
    (entry) => entry.unitPriceUsd !== null && Number.isFinite(entry.valueUsd) && entry.valueUsd > 0
  );
}

/**
 * Merge duplicate rows for the same asset, summing their values
 */
function valueByAsset(entries: readonly ChainBalanceEntry[]): Map<string, number> {
  const values = new Map<string, number>();
  for (const entry of entries) {
    values.set(entry.assetId, (values.get(entry.assetId) ?? 0) + entry.valueUsd);
  }
  return values;
}

/**
 * Derive the feature vector of a snapshot. Never throws; partial and failed
 * snapshots yield features from whatever entries are present.
 */
export function extractFeatures(
  snapshot: Pick<WalletSnapshot, "entries">,
  options: FeatureExtractionOptions = {}
): FeatureVector {
  const minAssetValueUsd = options.minAssetValueUsd ?? 0;
  const values = valueByAsset(pricedEntries(snapshot.entries));

  let totalValueUsd = 0;
  let assetCount = 0;
  let largestHoldingUsd = 0;

  for (const value of values.values()) {
    totalValueUsd += value;
    if (value > minAssetValueUsd) {
      assetCount++;
    }
    largestHoldingUsd = Math.max(largestHoldingUsd, value);
  }

  // No holdings means no concentration
  const concentrationRatio = totalValueUsd > 0 ? Math.min(1, largestHoldingUsd / totalValueUsd) : 0;

  return { totalValueUsd, assetCount, concentrationRatio, largestHoldingUsd };
}
