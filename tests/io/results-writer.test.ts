/**
 * Tests for result formatting and writing
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect } from "vitest";

import {
  formatFinalCsv,
  formatForPath,
  formatResults,
  formatResultsCsv,
  formatResultsJson,
  writeResults,
} from "@/io/results-writer";
import { RiskTier, type RiskResult } from "@/scoring/types";
import { FETCHED_AT, WALLET_A, WALLET_B, WALLET_C } from "../helpers/snapshots";

const RESULTS: RiskResult[] = [
  { wallet: WALLET_A, score: 0, tier: RiskTier.VERY_LOW, status: "complete", failedChains: [], asOf: FETCHED_AT },
  {
    wallet: WALLET_B,
    score: 1000,
    tier: RiskTier.VERY_HIGH,
    status: "partial",
    failedChains: [137, 56],
    asOf: FETCHED_AT,
  },
  {
    wallet: WALLET_C,
    score: null,
    tier: null,
    status: "failed",
    failedChains: [1],
    error: `No data for ${WALLET_C}: every chain query failed`,
    asOf: FETCHED_AT,
  },
];

describe("formatResultsCsv", () => {
  it("should write one row per wallet with empty cells for missing scores", () => {
    expect(formatResultsCsv(RESULTS)).toBe(
      [
        "wallet_id,score,tier,status,failed_chains",
        `${WALLET_A},0,VeryLow,complete,`,
        `${WALLET_B},1000,VeryHigh,partial,137;56`,
        `${WALLET_C},,,failed,1`,
        "",
      ].join("\n")
    );
  });

  it("should write only the header for no results", () => {
    expect(formatResultsCsv([])).toBe("wallet_id,score,tier,status,failed_chains\n");
  });
});

describe("formatFinalCsv", () => {
  it("should keep wallet and score only", () => {
    expect(formatFinalCsv(RESULTS)).toBe(`wallet_id,score\n${WALLET_A},0\n${WALLET_B},1000\n${WALLET_C},\n`);
  });
});

describe("formatResultsJson", () => {
  it("should write an indented array that parses back to the results", () => {
    const json = formatResultsJson(RESULTS);

    expect(json.endsWith("]\n")).toBe(true);
    expect(JSON.parse(json)).toEqual(RESULTS);
  });
});

describe("formatResults", () => {
  it("should dispatch on the format", () => {
    expect(formatResults(RESULTS, "final-csv")).toBe(formatFinalCsv(RESULTS));
    expect(formatResults(RESULTS, "csv")).toBe(formatResultsCsv(RESULTS));
    expect(formatResults(RESULTS, "json")).toBe(formatResultsJson(RESULTS));
  });
});

describe("formatForPath", () => {
  it("should choose JSON for .json files and CSV otherwise", () => {
    expect(formatForPath("out/results.JSON")).toBe("json");
    expect(formatForPath("out/results.csv")).toBe("csv");
    expect(formatForPath("out/results")).toBe("csv");
  });
});

describe("writeResults", () => {
  it("should create parent directories and leave no temp file behind", async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "results-writer-"));
    try {
      const filePath = path.join(dir, "nested", "final.csv");

      await writeResults(filePath, RESULTS, "final-csv");

      expect(await fs.promises.readFile(filePath, "utf8")).toBe(formatFinalCsv(RESULTS));
      expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it("should infer the format from the extension", async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "results-writer-"));
    try {
      const filePath = path.join(dir, "results.json");

      await writeResults(filePath, RESULTS.slice(0, 1));

      expect(JSON.parse(await fs.promises.readFile(filePath, "utf8"))).toEqual(RESULTS.slice(0, 1));
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });
});
