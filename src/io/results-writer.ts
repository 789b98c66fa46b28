/**
 * Results writer
 *
 * Renders pipeline results as a detailed CSV, a two-column final CSV
 * (`wallet_id,score`) or JSON, and writes them atomically.
 */

import * as fs from "fs";
import * as path from "path";

import type { RiskResult } from "../scoring/types";

export type OutputFormat = "csv" | "final-csv" | "json";

export const RESULTS_CSV_HEADER = "wallet_id,score,tier,status,failed_chains";
export const FINAL_CSV_HEADER = "wallet_id,score";

/**
 * Detailed CSV: one row per wallet, failed chains joined with ";"
 */
export function formatResultsCsv(results: readonly RiskResult[]): string {
  const rows = results.map((result) =>
    [
      result.wallet,
      result.score ?? "",
      result.tier ?? "",
      result.status,
      result.failedChains.join(";"),
    ].join(",")
  );
  return [RESULTS_CSV_HEADER, ...rows].join("\n") + "\n";
}

/**
 * Final CSV: wallet and score only; failed wallets have an empty score
 */
export function formatFinalCsv(results: readonly RiskResult[]): string {
  const rows = results.map((result) => `${result.wallet},${result.score ?? ""}`);
  return [FINAL_CSV_HEADER, ...rows].join("\n") + "\n";
}

export function formatResultsJson(results: readonly RiskResult[]): string {
  return JSON.stringify(results, null, 2) + "\n";
}

export function formatResults(results: readonly RiskResult[], format: OutputFormat): string {
  switch (format) {
    case "csv":
      return formatResultsCsv(results);
    case "final-csv":
      return formatFinalCsv(results);
    case "json":
      return formatResultsJson(results);
  }
}

/**
 * Pick a format from a file extension (.json, otherwise detailed CSV)
 */
export function formatForPath(filePath: string): OutputFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "csv";
}

/**
 * Write results via a temp file and rename, creating parent directories
 */
export async function writeResults(
  filePath: string,
  results: readonly RiskResult[],
  format: OutputFormat = formatForPath(filePath)
): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(tempPath, formatResults(results, format), "utf8");
  await fs.promises.rename(tempPath, filePath);
}
