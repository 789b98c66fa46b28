/**
 * Risk Pipeline Service
 *
 * Orchestrates a batch: for each wallet, collect balances, score them and
 * durably checkpoint the result before the worker moves on. Wallets already
 * in the checkpoint are skipped, so an interrupted run resumes where it
 * stopped.
 *
 * Events:
 * - 'wallet:scored'  (RiskResult) a wallet received a numeric score
 * - 'wallet:failed'  (RiskResult) a wallet was recorded with a failure marker
 * - 'wallet:skipped' (CheckpointRecord) a wallet was already checkpointed
 * - 'run:complete'   (PipelineSummary)
 */

import { EventEmitter } from "events";

import { FetchAbortedError, type ChainId } from "../api/balances/types";
import { MemoryCheckpointStore, type CheckpointStore } from "../db/checkpoint-store";
import { RiskScorer, type RiskScorerConfig } from "../scoring/scorer";
import type { RiskResult, WalletSnapshot } from "../scoring/types";
import { ConfigError, NoDataError, PartialDataError, errorMessage } from "../utils/errors";
import { serviceLoggers, type Logger } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can produce a snapshot for a wallet
 */
export interface SnapshotSource {
  fetch(wallet: string, chains: readonly ChainId[], signal?: AbortSignal): Promise<WalletSnapshot>;
}

/**
 * Configuration for the pipeline
 */
export interface RiskPipelineConfig {
  /** Balance collector */
  collector: SnapshotSource;

  /** Chains queried for every wallet */
  chains: readonly ChainId[];

  /** Scorer instance or scorer configuration */
  scorer?: RiskScorer | RiskScorerConfig;

  /** Checkpoint store (default: in-memory) */
  checkpointStore?: CheckpointStore;

  /** Maximum wallets processed at once (default: 4) */
  concurrency?: number;

  /** Re-process wallets whose checkpoint is a failure marker (default: true) */
  retryFailed?: boolean;

  /** Clock */
  now?: () => Date;

  /** Logger (default: Pipeline service logger) */
  logger?: Logger;
}

/**
 * Options for one run
 */
export interface RunOptions {
  /** Cancellation: no new wallets start and in-flight requests abort */
  signal?: AbortSignal;
}

/**
 * Outcome of a run
 */
export interface PipelineSummary {
  /** Results in input order, including ones restored from the checkpoint */
  results: RiskResult[];
  /** Unique wallets in the input */
  total: number;
  /** Wallets processed during this run */
  processed: number;
  /** Scored with data from every chain */
  scored: number;
  /** Scored with data from some chains */
  partial: number;
  /** Recorded with a failure marker */
  failed: number;
  /** Restored from the checkpoint */
  skipped: number;
  /** Share of results carrying a numeric score */
  successRate: number;
  cancelled: boolean;
  durationMs: number;
}

const DEFAULT_CONCURRENCY = 4;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Trim, lower-case and de-duplicate wallet addresses, keeping first-seen order
 */
export function normalizeWalletList(wallets: Iterable<string>): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const wallet of wallets) {
    const address = wallet.trim().toLowerCase();
    if (address === "" || seen.has(address)) {
      continue;
    }
    seen.add(address);
    normalized.push(address);
  }
  return normalized;
}

/**
 * Validate pipeline settings, returning a list of problems
 */
export function validatePipelineConfig(config: Pick<RiskPipelineConfig, "chains" | "concurrency">): string[] {
  const errors: string[] = [];
  if (config.chains.length === 0) {
    errors.push("At least one chain must be configured");
  }
  for (const chainId of config.chains) {
    if (!Number.isInteger(chainId) || chainId <= 0) {
      errors.push(`Chain id must be a positive integer, got ${chainId}`);
    }
  }
  const concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    errors.push(`concurrency must be an integer >= 1, got ${concurrency}`);
  }
  return errors;
}

// ============================================================================
// RiskPipeline Class
// ============================================================================

/**
 * Batch orchestrator with a bounded worker pool
 *
 * @example
 * ```typescript
 * const pipeline = new RiskPipeline({ collector, chains: [1, 137], checkpointStore });
 * pipeline.on("wallet:failed", (result) => log.warn("no data", { wallet: result.wallet }));
 * const summary = await pipeline.run(wallets, { signal });
 * ```
 */
export class RiskPipeline extends EventEmitter {
  private readonly collector: SnapshotSource;
  private readonly chains: readonly ChainId[];
  private readonly scorer: RiskScorer;
  private readonly store: CheckpointStore;
  private readonly concurrency: number;
  private readonly retryFailed: boolean;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(config: RiskPipelineConfig) {
    super();
    const errors = validatePipelineConfig(config);
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }

    this.collector = config.collector;
    this.chains = [...config.chains];
    this.scorer = config.scorer instanceof RiskScorer ? config.scorer : new RiskScorer(config.scorer);
    this.store = config.checkpointStore ?? new MemoryCheckpointStore();
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    this.retryFailed = config.retryFailed ?? true;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? serviceLoggers.pipeline;
  }

  /**
   * Process a list of wallets
   *
   * @throws the checkpoint store's error if a result cannot be persisted
   */
  public async run(wallets: Iterable<string>, options: RunOptions = {}): Promise<PipelineSummary> {
    const startedAt = this.now().getTime();
    const ordered = normalizeWalletList(wallets);
    const existing = await this.store.load();

    const results = new Map<string, RiskResult>();
    const pending: string[] = [];
    let skipped = 0;

    for (const wallet of ordered) {
      const record = existing.get(wallet);
      if (record && (record.result.status !== "failed" || !this.retryFailed)) {
        results.set(wallet, record.result);
        skipped++;
        this.emit("wallet:skipped", record);
      } else {
        pending.push(wallet);
      }
    }

    this.logger.info("Starting risk analysis", {
      total: ordered.length,
      pending: pending.length,
      skipped,
      chains: this.chains,
      concurrency: this.concurrency,
    });

    // Internal controller: stops the other workers if a checkpoint write fails
    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });

    let cursor = 0;
    let processed = 0;
    let storeError: unknown = null;

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const wallet = pending[cursor++];
        if (wallet === undefined) {
          return;
        }

        const result = await this.processWallet(wallet, controller.signal);
        if (result === null) {
          return;
        }

        try {
          await this.store.record(wallet, result);
        } catch (error) {
          storeError = storeError ?? error;
          controller.abort();
          return;
        }

        results.set(wallet, result);
        processed++;
        this.emit(result.status === "failed" ? "wallet:failed" : "wallet:scored", result);
      }
    };

    try {
      const workerCount = Math.min(this.concurrency, pending.length);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      options.signal?.removeEventListener("abort", onExternalAbort);
    }

    if (storeError !== null) {
      this.logger.fatal("Checkpoint write failed, stopping run", { error: errorMessage(storeError) });
      throw storeError;
    }

    const summary = this.summarize(ordered, results, {
      processed,
      skipped,
      cancelled: options.signal?.aborted ?? false,
      durationMs: this.now().getTime() - startedAt,
    });
    this.logSummary(summary);
    this.emit("run:complete", summary);
    return summary;
  }

  /**
   * Collect and score one wallet. Returns null when the run was cancelled
   * mid-wallet, so nothing is recorded for it.
   */
  private async processWallet(wallet: string, signal: AbortSignal): Promise<RiskResult | null> {
    let snapshot: WalletSnapshot;
    try {
      snapshot = await this.collector.fetch(wallet, this.chains, signal);
    } catch (error) {
      if (error instanceof FetchAbortedError || signal.aborted) {
        this.logger.debug("Wallet abandoned after cancellation", { wallet });
        return null;
      }
      this.logger.error("Unexpected collection error", { wallet, error: errorMessage(error) });
      return this.failedResult(wallet, errorMessage(error));
    }

    try {
      const result = this.scorer.scoreSnapshot(snapshot);
      if (result.status === "partial") {
        const partial = new PartialDataError(wallet, result.failedChains);
        this.logger.warn(partial.message, { wallet, failedChains: result.failedChains });
      }
      this.logger.debug("Wallet scored", { wallet, score: result.score, tier: result.tier });
      return result;
    } catch (error) {
      if (error instanceof NoDataError) {
        this.logger.warn(error.message, { wallet, reason: error.reason });
      } else {
        this.logger.error("Unexpected scoring error", { wallet, error: errorMessage(error) });
      }
      return this.failedResult(wallet, errorMessage(error), snapshot);
    }
  }

  private failedResult(wallet: string, message: string, snapshot?: WalletSnapshot): RiskResult {
    return {
      wallet,
      score: null,
      tier: null,
      status: "failed",
      failedChains: snapshot ? snapshot.failedChains.map((failure) => failure.chainId) : [...this.chains],
      error: message,
      asOf: snapshot?.fetchedAt ?? this.now().toISOString(),
    };
  }

  private summarize(
    ordered: string[],
    results: Map<string, RiskResult>,
    run: Pick<PipelineSummary, "processed" | "skipped" | "cancelled" | "durationMs">
  ): PipelineSummary {
    const orderedResults = ordered.flatMap((wallet) => {
      const result = results.get(wallet);
      return result ? [result] : [];
    });

    let scored = 0;
    let partial = 0;
    let failed = 0;
    for (const result of orderedResults) {
      if (result.status === "complete") scored++;
      else if (result.status === "partial") partial++;
      else failed++;
    }

    return {
      results: orderedResults,
      total: ordered.length,
      scored,
      partial,
      failed,
      successRate: orderedResults.length > 0 ? (scored + partial) / orderedResults.length : 0,
      ...run,
    };
  }

  private logSummary(summary: PipelineSummary): void {
    this.logger.info("Analysis complete", {
      total: summary.total,
      processed: summary.processed,
      scored: summary.scored,
      partial: summary.partial,
      failed: summary.failed,
      skipped: summary.skipped,
      successRate: `${(summary.successRate * 100).toFixed(1)}%`,
      durationMs: summary.durationMs,
      avgMsPerWallet: summary.processed > 0 ? Math.round(summary.durationMs / summary.processed) : 0,
      cancelled: summary.cancelled,
    });

    const failures = summary.results.filter((result) => result.status === "failed");
    for (const result of failures.slice(0, 5)) {
      this.logger.warn("Failed wallet", { wallet: result.wallet, reason: result.error });
    }
    if (failures.length > 5) {
      this.logger.warn(`... and ${failures.length - 5} more failed wallets`);
    }
  }
}

/**
 * Create a new pipeline
 */
export function createRiskPipeline(config: RiskPipelineConfig): RiskPipeline {
  return new RiskPipeline(config);
}
