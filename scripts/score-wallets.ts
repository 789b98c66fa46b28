/**
 * Score a list of wallets
 *
 * Usage:
 *   npx tsx scripts/score-wallets.ts [--input wallets.csv] [--output scores.csv]
 *     [--final final.csv] [--checkpoint data/checkpoint.jsonl] [--json] [--compact]
 *
 * Defaults come from the environment (see config/env.ts). Ctrl+C stops
 * taking new wallets; everything scored so far stays checkpointed, so the
 * next run resumes.
 */

import { parseArgs } from "util";

import { env, initializeEnv } from "../config/env";
import { BalancesClient } from "../src/api/balances/client";
import { RateLimiter } from "../src/api/balances/rate-limiter";
import { FileCheckpointStore } from "../src/db/checkpoint-store";
import { loadWalletList } from "../src/io/wallet-list";
import { writeResults } from "../src/io/results-writer";
import type { RiskResult } from "../src/scoring/types";
import { WalletCollector } from "../src/services/wallet-collector";
import { RiskPipeline } from "../src/services/risk-pipeline";
import { errorMessage } from "../src/utils/errors";
import { logger } from "../src/utils/logger";

const EXIT_INTERRUPTED = 130;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      input: { type: "string" },
      output: { type: "string" },
      final: { type: "string" },
      checkpoint: { type: "string" },
      json: { type: "boolean", default: false },
      compact: { type: "boolean", default: false },
    },
  });
  const inputPath = values.input ?? env.WALLETS_CSV;
  const outputPath = values.output ?? env.OUTPUT_CSV;
  const finalPath = values.final ?? env.FINAL_CSV;
  const checkpointPath = values.checkpoint ?? env.CHECKPOINT_PATH;

  initializeEnv();

  if (!env.BALANCES_API_KEY) {
    logger.fatal("BALANCES_API_KEY is required to query balances");
    return 1;
  }

  const wallets = await loadWalletList(inputPath);
  if (wallets.length === 0) {
    logger.error("No wallet addresses found", { path: inputPath });
    return 1;
  }
  logger.info("Loaded wallet list", { path: inputPath, wallets: wallets.length });

  const collector = new WalletCollector({
    client: new BalancesClient({
      baseUrl: env.BALANCES_API_URL,
      apiKey: env.BALANCES_API_KEY,
      timeout: env.REQUEST_TIMEOUT_MS,
    }),
    rateLimiter: new RateLimiter({
      maxTokens: env.RATE_LIMIT_MAX_TOKENS,
      refillInterval: env.RATE_LIMIT_REFILL_INTERVAL_MS,
    }),
    retryPolicy: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitterRatio: env.RETRY_JITTER_RATIO,
      maxCumulativeBackoffMs: env.RETRY_MAX_CUMULATIVE_MS,
    },
  });

  const store = new FileCheckpointStore(checkpointPath);
  const pipeline = new RiskPipeline({
    collector,
    chains: env.CHAIN_IDS,
    scorer: { weights: env.SCORING_PRESET },
    checkpointStore: store,
    concurrency: env.CONCURRENCY,
  });

  pipeline.on("wallet:scored", (result: RiskResult) => {
    logger.info("Wallet scored", { wallet: result.wallet, score: result.score, tier: result.tier });
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      logger.warn("Second interrupt, exiting immediately");
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn("Interrupt received, stopping the run (press Ctrl+C again to force)");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);
  process.on("SIGTERM", onInterrupt);

  try {
    const summary = await pipeline.run(wallets, { signal: controller.signal });

    await writeResults(outputPath, summary.results, values.json === true ? "json" : "csv");
    await writeResults(finalPath, summary.results, "final-csv");
    logger.info("Results written", { output: outputPath, final: finalPath, results: summary.results.length });

    if (values.compact === true) {
      await store.compact();
    }

    if (summary.cancelled) {
      logger.warn("Run interrupted; re-run the same command to resume", {
        remaining: summary.total - summary.results.length,
      });
      return EXIT_INTERRUPTED;
    }
    return 0;
  } finally {
    process.off("SIGINT", onInterrupt);
    process.off("SIGTERM", onInterrupt);
    await store.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal("Run failed", { error: errorMessage(error) });
    process.exitCode = 1;
  }
);
