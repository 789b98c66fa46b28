/**
 * Wallet Collector Service
 *
 * Turns a wallet address into a WalletSnapshot by querying every requested
 * chain concurrently. Each chain query has its own retry loop; a failed
 * chain contributes no entries and is listed in the snapshot's failures.
 */

import { BalancesClient } from "../api/balances/client";
import { ErrorHandler, type RetryDependencies, type RetryPolicy } from "../api/balances/error-handler";
import { RateLimiter } from "../api/balances/rate-limiter";
import {
  FetchAbortedError,
  FetchErrorType,
  TransientFetchError,
  type ChainBalanceEntry,
  type ChainId,
} from "../api/balances/types";
import { serviceLoggers, type Logger } from "../utils/logger";
import type { ChainFailure, SnapshotStatus, WalletSnapshot } from "../scoring/types";

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can answer a single balance query
 */
export interface ChainBalanceSource {
  getChainBalances(wallet: string, chainId: ChainId, signal?: AbortSignal): Promise<ChainBalanceEntry[]>;
}

/**
 * Configuration for the collector
 */
export interface WalletCollectorConfig {
  /** Balance source (default: a BalancesClient with default config) */
  client?: ChainBalanceSource;

  /** Shared rate limiter; omitted means unthrottled */
  rateLimiter?: RateLimiter;

  /** Retry policy overrides */
  retryPolicy?: Partial<RetryPolicy>;

  /** Injected sleep/random for retries */
  retryDependencies?: Omit<RetryDependencies, "logger">;

  /** Clock for snapshot timestamps */
  now?: () => Date;

  /** Logger (default: Collector service logger) */
  logger?: Logger;
}

type ChainOutcome =
  | { ok: true; chainId: ChainId; entries: ChainBalanceEntry[] }
  | { ok: false; failure: ChainFailure };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Derive a snapshot status from the per-chain outcome counts
 */
export function snapshotStatus(requested: number, failed: number): SnapshotStatus {
  if (requested === 0 || failed >= requested) {
    return "failed";
  }
  return failed > 0 ? "partial" : "complete";
}

/**
 * Deep-freeze a snapshot so downstream stages cannot mutate it
 */
function freezeSnapshot(snapshot: WalletSnapshot): WalletSnapshot {
  snapshot.entries.forEach((entry) => Object.freeze(entry));
  snapshot.failedChains.forEach((failure) => Object.freeze(failure));
  Object.freeze(snapshot.entries);
  Object.freeze(snapshot.failedChains);
  Object.freeze(snapshot.chains);
  return Object.freeze(snapshot);
}

// ============================================================================
// WalletCollector Class
// ============================================================================

/**
 * Collects balances for one wallet across chains
 *
 * @example
 * ```typescript
 * const collector = new WalletCollector({ client, rateLimiter });
 * const snapshot = await collector.fetch("0xab...", [1, 137]);
 * if (snapshot.status === "partial") {
 *   log.warn("some chains failed", { failed: snapshot.failedChains });
 * }
 * ```
 */
export class WalletCollector {
  private readonly client: ChainBalanceSource;
  private readonly rateLimiter?: RateLimiter;
  private readonly errorHandler: ErrorHandler;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(config: WalletCollectorConfig = {}) {
    this.client = config.client ?? new BalancesClient();
    this.rateLimiter = config.rateLimiter;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? serviceLoggers.collector;
    this.errorHandler = new ErrorHandler(config.retryPolicy, { ...config.retryDependencies, logger: this.logger });
  }

  public getRetryPolicy(): RetryPolicy {
    return this.errorHandler.getPolicy();
  }

  /**
   * Collect a snapshot for a wallet across the given chains
   *
   * @throws FetchAbortedError if `signal` is aborted before every chain settles
   */
  public async fetch(wallet: string, chains: readonly ChainId[], signal?: AbortSignal): Promise<WalletSnapshot> {
    const address = wallet.trim().toLowerCase();
    const uniqueChains = [...new Set(chains)];
    const fetchedAt = this.now().toISOString();

    const outcomes = await Promise.all(uniqueChains.map((chainId) => this.fetchChain(address, chainId, signal)));

    if (signal?.aborted) {
      throw new FetchAbortedError(`Collection aborted for ${address}`);
    }

    const entries: ChainBalanceEntry[] = [];
    const failedChains: ChainFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        entries.push(...outcome.entries);
      } else {
        failedChains.push(outcome.failure);
      }
    }

    const status = snapshotStatus(uniqueChains.length, failedChains.length);
    this.logger.debug("Snapshot collected", {
      wallet: address,
      status,
      entries: entries.length,
      failedChains: failedChains.map((failure) => failure.chainId),
    });

    return freezeSnapshot({
      wallet: address,
      chains: uniqueChains,
      entries,
      status,
      failedChains,
      fetchedAt,
    });
  }

  /**
   * One logical query with its own retry state
   */
  private async fetchChain(wallet: string, chainId: ChainId, signal?: AbortSignal): Promise<ChainOutcome> {
    const result = await this.errorHandler.execute(
      async () => {
        if (this.rateLimiter) {
          await this.rateLimiter.acquire(signal);
        }
        try {
          return await this.client.getChainBalances(wallet, chainId, signal);
        } catch (error) {
          if (error instanceof TransientFetchError && error.type === FetchErrorType.RATE_LIMIT) {
            this.rateLimiter?.handleRateLimitResponse(error.retryAfterMs);
          }
          throw error;
        }
      },
      { operation: `Balances query (chain ${chainId})`, context: { wallet, chainId }, signal }
    );

    if (result.success) {
      return { ok: true, chainId, entries: result.data };
    }

    const error = result.error;
    const reason =
      error instanceof FetchAbortedError ? "aborted" : error instanceof TransientFetchError ? "transient" : "permanent";

    return {
      ok: false,
      failure: { chainId, reason, message: error.message, attempts: result.attempts },
    };
  }
}

/**
 * Create a new collector
 */
export function createWalletCollector(config: WalletCollectorConfig = {}): WalletCollector {
  return new WalletCollector(config);
}
