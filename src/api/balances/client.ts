/**
 * Multi-chain Balances API Client
 *
 * Issues one balance query per (chain, wallet) pair and maps the response to
 * ChainBalanceEntry records. A single call makes exactly one HTTP attempt;
 * retries are the error handler's job.
 */

import { isAddress, formatUnits } from "viem";

import {
  type BalancesClientConfig,
  type ChainBalanceEntry,
  type ChainId,
  type RawBalanceItem,
  type RawBalancesResponse,
  FetchAbortedError,
  FetchErrorType,
  PermanentFetchError,
  TransientFetchError,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Default balances API base URL */
const DEFAULT_BASE_URL = "https://api.covalenthq.com";

/** Default request timeout in ms */
const DEFAULT_TIMEOUT = 15000;

const DEFAULT_USER_AGENT = "WalletRiskScorer/1.0";

/** Raw integer balances only */
const INTEGER_PATTERN = /^\d+$/;

// ============================================================================
// Response parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isRawBalanceItem(value: unknown): value is RawBalanceItem {
  return isRecord(value) && typeof value.contract_address === "string";
}

/**
 * Check that a parsed body has the balances envelope
 */
export function isBalancesResponse(value: unknown): value is RawBalancesResponse {
  if (!isRecord(value)) {
    return false;
  }
  if (value.error === true) {
    return true;
  }
  const data = value.data;
  return isRecord(data) && Array.isArray(data.items);
}

/**
 * Map a raw API item to a balance entry.
 * Returns null for items whose balance or decimals cannot be interpreted.
 */
export function toBalanceEntry(item: RawBalanceItem, chainId: ChainId): ChainBalanceEntry | null {
  const decimals = item.contract_decimals;
  if (decimals === null || !Number.isInteger(decimals) || decimals < 0) {
    return null;
  }
  if (item.balance === null || !INTEGER_PATTERN.test(item.balance)) {
    return null;
  }

  const quantity = Number(formatUnits(BigInt(item.balance), decimals));
  const unitPriceUsd =
    typeof item.quote_rate === "number" && Number.isFinite(item.quote_rate) ? item.quote_rate : null;
  const rawValue = unitPriceUsd === null ? 0 : quantity * unitPriceUsd;
  const contractAddress = item.contract_address.toLowerCase();

  return {
    chainId,
    assetId: `${chainId}:${contractAddress}`,
    symbol: item.contract_ticker_symbol ?? "UNKNOWN",
    contractAddress,
    quantity,
    unitPriceUsd,
    valueUsd: Number.isFinite(rawValue) ? Math.max(0, rawValue) : 0,
  };
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === "") {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Turn an HTTP (or API-level) status into a fetch error
 */
export function errorForStatus(
  statusCode: number,
  message: string,
  chainId?: ChainId,
  retryAfterMs?: number
): TransientFetchError | PermanentFetchError {
  if (statusCode === 429) {
    return new TransientFetchError(message, FetchErrorType.RATE_LIMIT, {
      chainId,
      statusCode,
      retryAfterMs,
    });
  }
  if (statusCode >= 500) {
    return new TransientFetchError(message, FetchErrorType.SERVER, { chainId, statusCode });
  }
  if (statusCode === 401 || statusCode === 403) {
    return new PermanentFetchError(message, FetchErrorType.AUTH, { chainId, statusCode });
  }
  return new PermanentFetchError(message, FetchErrorType.CLIENT, { chainId, statusCode });
}

// ============================================================================
// BalancesClient Class
// ============================================================================

/**
 * Client for the balances endpoint
 *
 * @example
 * ```typescript
 * const client = new BalancesClient({ apiKey: process.env.BALANCES_API_KEY });
 * const entries = await client.getChainBalances("0xab...", 1);
 * ```
 */
export class BalancesClient {
  private readonly config: Required<BalancesClientConfig>;

  constructor(config: BalancesClientConfig = {}) {
    this.config = {
      baseUrl: (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
      apiKey: config.apiKey ?? "",
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    };
  }

  /**
   * Get the configured timeout in milliseconds
   */
  public getTimeout(): number {
    return this.config.timeout;
  }

  /**
   * Check if an API key is configured
   */
  public hasApiKey(): boolean {
    return this.config.apiKey.length > 0;
  }

  /**
   * Build the balances URL for one chain
   */
  public buildUrl(wallet: string, chainId: ChainId): string {
    return `${this.config.baseUrl}/v1/${chainId}/address/${wallet}/balances_v2/`;
  }

  /**
   * Fetch the token balances of a wallet on one chain (single attempt)
   *
   * @throws PermanentFetchError for invalid addresses, auth and other 4xx
   * @throws TransientFetchError for 429, 5xx, timeouts, network and parse failures
   * @throws FetchAbortedError when `signal` is aborted
   */
  public async getChainBalances(
    wallet: string,
    chainId: ChainId,
    signal?: AbortSignal
  ): Promise<ChainBalanceEntry[]> {
    const address = wallet.trim().toLowerCase();
    if (!isAddress(address, { strict: false })) {
      throw new PermanentFetchError(`Invalid address: ${wallet}`, FetchErrorType.INVALID_ADDRESS, {
        chainId,
      });
    }
    if (signal?.aborted) {
      throw new FetchAbortedError();
    }

    const body = await this.requestJson(this.buildUrl(address, chainId), chainId, signal);

    if (!isBalancesResponse(body)) {
      throw new TransientFetchError(
        `Unexpected response shape for chain ${chainId}`,
        FetchErrorType.PARSE,
        { chainId }
      );
    }

    if (body.error) {
      throw errorForStatus(
        body.error_code ?? 400,
        body.error_message ?? `API error on chain ${chainId}`,
        chainId
      );
    }

    const entries: ChainBalanceEntry[] = [];
    for (const item of body.data?.items ?? []) {
      if (!isRawBalanceItem(item)) {
        continue;
      }
      const entry = toBalanceEntry(item, chainId);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  /**
   * Perform the GET with timeout and cancellation, returning parsed JSON
   */
  private async requestJson(url: string, chainId: ChainId, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      let text: string;
      try {
        response = await fetch(url, {
          method: "GET",
          signal: controller.signal,
          headers: this.buildHeaders(),
        });
        text = await response.text();
      } catch (error) {
        if (signal?.aborted) {
          throw new FetchAbortedError();
        }
        if (timedOut) {
          throw new TransientFetchError(
            `Request timeout after ${this.config.timeout}ms`,
            FetchErrorType.TIMEOUT,
            { chainId, cause: error }
          );
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new TransientFetchError(`Network error: ${message}`, FetchErrorType.NETWORK, {
          chainId,
          cause: error,
        });
      }

      if (!response.ok) {
        throw errorForStatus(
          response.status,
          `HTTP ${response.status}: ${response.statusText}`,
          chainId,
          parseRetryAfter(response.headers.get("retry-after"))
        );
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        throw new TransientFetchError(`Invalid JSON from chain ${chainId}`, FetchErrorType.PARSE, {
          chainId,
          cause: error,
        });
      }
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": this.config.userAgent,
    };
    if (this.config.apiKey) {
      headers["Authorization"] = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }
}

/**
 * Create a new balances client
 */
export function createBalancesClient(config: BalancesClientConfig = {}): BalancesClient {
  return new BalancesClient(config);
}
