/**
 * Checkpoint Store
 *
 * Durable record of wallets already processed, so an interrupted run can
 * resume without re-querying them. Any medium that satisfies the
 * CheckpointStore interface works; a JSON Lines file and an in-memory map
 * ship here.
 */

import * as fs from "fs";
import * as path from "path";

import { serviceLoggers, type Logger } from "../utils/logger";
import { RiskTier, type RiskResult, type SnapshotStatus } from "../scoring/types";

// ============================================================================
// Types
// ============================================================================

/**
 * One persisted result
 */
export interface CheckpointRecord {
  wallet: string;
  result: RiskResult;
  recordedAt: string;
}

/**
 * Storage capability used by the pipeline
 */
export interface CheckpointStore {
  /** All recorded wallets, latest record per wallet */
  load(): Promise<Map<string, CheckpointRecord>>;
  has(wallet: string): Promise<boolean>;
  get(wallet: string): Promise<CheckpointRecord | undefined>;
  /** Resolves only once the record is durable */
  record(wallet: string, result: RiskResult): Promise<void>;
  /** Wait for pending writes */
  close(): Promise<void>;
}

/**
 * Options shared by the bundled stores
 */
export interface CheckpointStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

// ============================================================================
// Validation
// ============================================================================

const STATUSES: readonly SnapshotStatus[] = ["complete", "partial", "failed"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isRiskTier(value: unknown): value is RiskTier {
  return Object.values<unknown>(RiskTier).includes(value);
}

function isRiskResult(value: unknown): value is RiskResult {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.wallet === "string" &&
    (value.score === null || typeof value.score === "number") &&
    (value.tier === null || isRiskTier(value.tier)) &&
    STATUSES.some((status) => status === value.status) &&
    Array.isArray(value.failedChains) &&
    typeof value.asOf === "string"
  );
}

/**
 * Check that a parsed line is a checkpoint record
 */
export function isCheckpointRecord(value: unknown): value is CheckpointRecord {
  return (
    isRecord(value) &&
    typeof value.wallet === "string" &&
    typeof value.recordedAt === "string" &&
    isRiskResult(value.result)
  );
}

/**
 * Checkpoint key for a wallet
 */
export function checkpointKey(wallet: string): string {
  return wallet.trim().toLowerCase();
}

// ============================================================================
// In-memory store
// ============================================================================

/**
 * Store backed by a Map. Nothing survives the process; used in tests and
 * dry runs.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, CheckpointRecord>();
  private readonly now: () => Date;

  constructor(options: CheckpointStoreOptions = {}, initial: Iterable<CheckpointRecord> = []) {
    this.now = options.now ?? (() => new Date());
    for (const record of initial) {
      this.records.set(checkpointKey(record.wallet), record);
    }
  }

  public async load(): Promise<Map<string, CheckpointRecord>> {
    return new Map(this.records);
  }

  public async has(wallet: string): Promise<boolean> {
    return this.records.has(checkpointKey(wallet));
  }

  public async get(wallet: string): Promise<CheckpointRecord | undefined> {
    return this.records.get(checkpointKey(wallet));
  }

  public async record(wallet: string, result: RiskResult): Promise<void> {
    const key = checkpointKey(wallet);
    this.records.set(key, { wallet: key, result, recordedAt: this.now().toISOString() });
  }

  public async close(): Promise<void> {}
}

// ============================================================================
// File store
// ============================================================================

/**
 * Append-only JSON Lines store.
 *
 * Each record is one line, fdatasync'ed before `record` resolves. Writes go
 * through a single promise chain, so concurrent callers never interleave.
 * On load the last line per wallet wins, and a malformed line (a write torn
 * by a crash) is skipped. A torn final line is closed off before the next
 * append so the new record lands on a line of its own.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly filePath: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private cache: Map<string, CheckpointRecord> | null = null;
  private loading: Promise<Map<string, CheckpointRecord>> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  /** The log ends in a torn line, so the next append must start a new line */
  private tornTail = false;

  constructor(filePath: string, options: CheckpointStoreOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? serviceLoggers.checkpoint;
  }

  public getPath(): string {
    return this.filePath;
  }

  public async load(): Promise<Map<string, CheckpointRecord>> {
    return new Map(await this.ensureLoaded());
  }

  public async has(wallet: string): Promise<boolean> {
    return (await this.ensureLoaded()).has(checkpointKey(wallet));
  }

  public async get(wallet: string): Promise<CheckpointRecord | undefined> {
    return (await this.ensureLoaded()).get(checkpointKey(wallet));
  }

  public record(wallet: string, result: RiskResult): Promise<void> {
    const key = checkpointKey(wallet);
    const record: CheckpointRecord = { wallet: key, result, recordedAt: this.now().toISOString() };

    return this.enqueue(async () => {
      const cache = await this.ensureLoaded();
      const prefix = this.tornTail ? "\n" : "";
      await this.appendDurably(prefix + JSON.stringify(record) + "\n");
      this.tornTail = false;
      cache.set(key, record);
    });
  }

  /**
   * Rewrite the log with one line per wallet (temp file + rename)
   */
  public compact(): Promise<number> {
    let written = 0;
    return this.enqueue(async () => {
      const cache = await this.ensureLoaded();
      const tempPath = `${this.filePath}.tmp`;
      const body = [...cache.values()].map((record) => JSON.stringify(record) + "\n").join("");

      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.promises.open(tempPath, "w");
      try {
        await handle.writeFile(body, "utf8");
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
      this.tornTail = false;
      written = cache.size;
      this.logger.info("Checkpoint compacted", { path: this.filePath, records: written });
    }).then(() => written);
  }

  public async close(): Promise<void> {
    await this.writeQueue;
  }

  /**
   * Serialize an operation behind every earlier write. The returned promise
   * carries the operation's own failure; the queue itself keeps going.
   */
  private enqueue(operation: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(operation);
    this.writeQueue = run.catch((error: unknown) => {
      this.logger.error("Checkpoint write failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return run;
  }

  private async appendDurably(line: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await fs.promises.open(this.filePath, "a");
    try {
      await handle.appendFile(line, "utf8");
      await handle.datasync();
    } finally {
      await handle.close();
    }
  }

  private ensureLoaded(): Promise<Map<string, CheckpointRecord>> {
    if (this.cache) {
      return Promise.resolve(this.cache);
    }
    if (!this.loading) {
      this.loading = this.readLog().then(
        (records) => {
          this.cache = records;
          return records;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readLog(): Promise<Map<string, CheckpointRecord>> {
    const records = new Map<string, CheckpointRecord>();
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        return records;
      }
      throw error;
    }

    this.tornTail = content !== "" && !content.endsWith("\n");
    if (this.tornTail) {
      this.logger.warn("Checkpoint ends in an incomplete line", { path: this.filePath });
    }

    const lines = content.split("\n");
    lines.forEach((line, index) => {
      if (line.trim() === "") {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger.warn("Skipping unreadable checkpoint line", { path: this.filePath, line: index + 1 });
        return;
      }
      if (!isCheckpointRecord(parsed)) {
        this.logger.warn("Skipping malformed checkpoint record", { path: this.filePath, line: index + 1 });
        return;
      }
      records.set(checkpointKey(parsed.wallet), parsed);
    });

    this.logger.debug("Checkpoint loaded", { path: this.filePath, records: records.size });
    return records;
  }
}

/**
 * Create a file-backed store
 */
export function createFileCheckpointStore(filePath: string, options?: CheckpointStoreOptions): FileCheckpointStore {
  return new FileCheckpointStore(filePath, options);
}
