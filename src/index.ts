/**
 * Wallet Risk Scorer
 * Library entry point
 */

export const APP_NAME = "Wallet Risk Scorer";
export const VERSION = "1.0.0";

export * from "./api/balances";
export * from "./scoring";
export * from "./io";

export {
  WalletCollector,
  createWalletCollector,
  snapshotStatus,
} from "./services/wallet-collector";
export type { ChainBalanceSource, WalletCollectorConfig } from "./services/wallet-collector";

export {
  RiskPipeline,
  createRiskPipeline,
  normalizeWalletList,
  validatePipelineConfig,
} from "./services/risk-pipeline";
export type { PipelineSummary, RiskPipelineConfig, RunOptions, SnapshotSource } from "./services/risk-pipeline";

export {
  FileCheckpointStore,
  MemoryCheckpointStore,
  checkpointKey,
  createFileCheckpointStore,
  isCheckpointRecord,
} from "./db/checkpoint-store";
export type { CheckpointRecord, CheckpointStore, CheckpointStoreOptions } from "./db/checkpoint-store";

export {
  ConfigError,
  InputFormatError,
  NoDataError,
  PartialDataError,
  WalletRiskError,
  errorMessage,
} from "./utils/errors";
export type { NoDataReason, WalletRiskErrorCode } from "./utils/errors";

export { createLogger, logger } from "./utils/logger";
export type { LogLevel, Logger, LoggerConfig } from "./utils/logger";
