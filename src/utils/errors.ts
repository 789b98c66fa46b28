/**
 * Error taxonomy shared across the scorer.
 *
 * Fetch-level errors live with the balances client (see api/balances/types);
 * the classes here describe wallet-level outcomes and startup failures.
 */

/**
 * Error codes for wallet risk scoring
 */
export type WalletRiskErrorCode =
  | "TRANSIENT_FETCH"
  | "PERMANENT_FETCH"
  | "FETCH_ABORTED"
  | "PARTIAL_DATA"
  | "NO_DATA"
  | "CONFIG"
  | "INPUT";

/**
 * Base class for every error raised by the scorer
 */
export class WalletRiskError extends Error {
  public readonly code: WalletRiskErrorCode;

  constructor(message: string, code: WalletRiskErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WalletRiskError";
    this.code = code;
  }
}

/**
 * Invalid configuration: weights not summing to 1, inverted thresholds,
 * impossible retry policy. Always fatal at startup.
 */
export class ConfigError extends WalletRiskError {
  public readonly errors: string[];

  constructor(errors: string[] | string) {
    const list = Array.isArray(errors) ? errors : [errors];
    super(`Invalid configuration: ${list.join("; ")}`, "CONFIG");
    this.name = "ConfigError";
    this.errors = list;
  }
}

/**
 * Some chains failed and some succeeded. Scoring proceeds on the data that
 * arrived; the result is flagged partial.
 */
export class PartialDataError extends WalletRiskError {
  public readonly wallet: string;
  public readonly failedChains: number[];

  constructor(wallet: string, failedChains: number[]) {
    super(`Partial data for ${wallet}: chains ${failedChains.join(", ")} failed`, "PARTIAL_DATA");
    this.name = "PartialDataError";
    this.wallet = wallet;
    this.failedChains = failedChains;
  }
}

/**
 * Why a wallet produced no scorable data
 */
export type NoDataReason = "all_chains_failed" | "no_priced_holdings";

/**
 * No usable balance data for a wallet. Scoring is skipped and the wallet is
 * recorded with a failure marker, never a default score.
 */
export class NoDataError extends WalletRiskError {
  public readonly wallet: string;
  public readonly reason: NoDataReason;

  constructor(wallet: string, reason: NoDataReason) {
    super(
      reason === "all_chains_failed"
        ? `No data for ${wallet}: every chain query failed`
        : `No data for ${wallet}: no priced holdings on any chain`,
      "NO_DATA"
    );
    this.name = "NoDataError";
    this.wallet = wallet;
    this.reason = reason;
  }
}

/**
 * An input file the CLI cannot read as a wallet list
 */
export class InputFormatError extends WalletRiskError {
  constructor(message: string) {
    super(message, "INPUT");
    this.name = "InputFormatError";
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
