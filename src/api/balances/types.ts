/**
 * Types for the multi-chain balances API
 *
 * The API follows the `balances_v2` shape: one request per chain and
 * address, returning token holdings with quantity, decimals and USD quote.
 */

import { WalletRiskError } from "../../utils/errors";

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Balances client configuration
 */
export interface BalancesClientConfig {
  /** API base URL (default: https://api.covalenthq.com) */
  baseUrl?: string;

  /** Bearer credential */
  apiKey?: string;

  /** Per-request timeout in milliseconds (default: 15000) */
  timeout?: number;

  /** User agent sent with each request */
  userAgent?: string;
}

// ============================================================================
// Raw API Responses
// ============================================================================

/**
 * One token holding as returned by the API
 */
export interface RawBalanceItem {
  contract_decimals: number | null;
  contract_name: string | null;
  contract_ticker_symbol: string | null;
  contract_address: string;
  balance: string | null;
  quote_rate: number | null;
  quote: number | null;
  type?: string;
}

/**
 * Envelope returned by the balances endpoint
 */
export interface RawBalancesResponse {
  data: {
    address: string;
    chain_id: number;
    chain_name?: string;
    updated_at?: string;
    /** Validated one by one; a malformed item is dropped, not the whole chain */
    items: unknown[];
  } | null;
  error: boolean;
  error_message: string | null;
  error_code: number | null;
}

// ============================================================================
// Domain Types
// ============================================================================

/**
 * A blockchain network identifier (1 = Ethereum, 137 = Polygon, 56 = BSC)
 */
export type ChainId = number;

/**
 * One token holding on one chain
 */
export interface ChainBalanceEntry {
  /** Chain the holding lives on */
  chainId: ChainId;

  /** Stable identifier: `<chainId>:<contract address>` */
  assetId: string;

  /** Ticker symbol, "UNKNOWN" when the API has none */
  symbol: string;

  /** Contract address, lower-cased */
  contractAddress: string;

  /** Balance scaled by contract decimals */
  quantity: number;

  /** USD unit price, null when the API has no quote */
  unitPriceUsd: number | null;

  /** quantity × unitPriceUsd, clamped to ≥ 0; 0 when unpriced */
  valueUsd: number;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Classification of a failed balance request
 */
export enum FetchErrorType {
  /** Network-level errors (connection refused, DNS failure, etc.) */
  NETWORK = "NETWORK",

  /** Request timeout */
  TIMEOUT = "TIMEOUT",

  /** Server errors (5xx status codes) */
  SERVER = "SERVER",

  /** Rate limiting (429 status code) */
  RATE_LIMIT = "RATE_LIMIT",

  /** Response body could not be understood */
  PARSE = "PARSE",

  /** Authentication/authorization errors (401, 403) */
  AUTH = "AUTH",

  /** Malformed wallet address, rejected before any request */
  INVALID_ADDRESS = "INVALID_ADDRESS",

  /** Other client errors (4xx except 429) */
  CLIENT = "CLIENT",
}

interface FetchErrorDetails {
  chainId?: ChainId;
  statusCode?: number;
  cause?: unknown;
}

/**
 * Retryable failure: rate limit, timeout, network, 5xx
 */
export class TransientFetchError extends WalletRiskError {
  public readonly retryable = true;
  public readonly type: FetchErrorType;
  public readonly chainId?: ChainId;
  public readonly statusCode?: number;

  /** Server-requested wait in milliseconds (Retry-After) */
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    type: FetchErrorType,
    details: FetchErrorDetails & { retryAfterMs?: number } = {}
  ) {
    super(message, "TRANSIENT_FETCH", { cause: details.cause });
    this.name = "TransientFetchError";
    this.type = type;
    this.chainId = details.chainId;
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * Non-retryable failure: invalid address, auth failure, other 4xx
 */
export class PermanentFetchError extends WalletRiskError {
  public readonly retryable = false;
  public readonly type: FetchErrorType;
  public readonly chainId?: ChainId;
  public readonly statusCode?: number;

  constructor(message: string, type: FetchErrorType, details: FetchErrorDetails = {}) {
    super(message, "PERMANENT_FETCH", { cause: details.cause });
    this.name = "PermanentFetchError";
    this.type = type;
    this.chainId = details.chainId;
    this.statusCode = details.statusCode;
  }
}

/**
 * The caller cancelled the request (user interrupt)
 */
export class FetchAbortedError extends WalletRiskError {
  public readonly aborted = true;

  constructor(message = "Request aborted") {
    super(message, "FETCH_ABORTED");
    this.name = "FetchAbortedError";
  }
}

/**
 * Any error a balance request can end with
 */
export type FetchError = TransientFetchError | PermanentFetchError | FetchAbortedError;
