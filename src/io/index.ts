/**
 * I/O Exports
 */

export { WALLET_COLUMN, loadWalletList, parseWalletList } from "./wallet-list";

export {
  FINAL_CSV_HEADER,
  RESULTS_CSV_HEADER,
  formatFinalCsv,
  formatForPath,
  formatResults,
  formatResultsCsv,
  formatResultsJson,
  writeResults,
} from "./results-writer";
export type { OutputFormat } from "./results-writer";
