/**
 * Wallet list loader
 *
 * Accepts either a CSV with a `wallet_id` column or a plain list with one
 * address per line. Addresses come back trimmed, lower-cased and
 * de-duplicated in first-seen order.
 */

import * as fs from "fs";
import { isAddress } from "viem";

import { normalizeWalletList } from "../services/risk-pipeline";
import { InputFormatError } from "../utils/errors";

export const WALLET_COLUMN = "wallet_id";

function splitCsvLine(line: string): string[] {
  return line.split(",").map((cell) => cell.trim().replace(/^"(.*)"$/, "$1").trim());
}

/**
 * Parse wallet addresses from file content
 *
 * @throws InputFormatError when the file has no `wallet_id` header and is not
 *   a plain list of addresses
 */
export function parseWalletList(content: string): string[] {
  const lines = content
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "");

  const [first, ...rest] = lines;
  if (first === undefined) {
    return [];
  }

  const header = splitCsvLine(first).map((cell) => cell.toLowerCase());
  const column = header.indexOf(WALLET_COLUMN);

  if (column === -1) {
    // A plain list starts with an address; anything else is a header naming the wrong column
    if (header.length > 1 || !isAddress(header[0] ?? "", { strict: false })) {
      throw new InputFormatError(`Wallet list has no "${WALLET_COLUMN}" column (found: ${header.join(", ")})`);
    }
    return normalizeWalletList(lines.map((line) => splitCsvLine(line)[0] ?? ""));
  }

  return normalizeWalletList(rest.map((line) => splitCsvLine(line)[column] ?? ""));
}

/**
 * Read and parse a wallet list file
 */
export async function loadWalletList(filePath: string): Promise<string[]> {
  const content = await fs.promises.readFile(filePath, "utf8");
  return parseWalletList(content);
}
