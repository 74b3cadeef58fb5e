/**
 * @fxwallet/store — File-based JSONL transaction journal.
 *
 * Stores one TransactionRecord per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial or malformed lines are skipped on load
 * - In-memory state is updated only after the write succeeds
 *
 * The file is append-only: it is never truncated or rewritten.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isTransactionRecord } from "@fxwallet/types";
import type {
  TransactionJournal,
  TransactionQuery,
  TransactionRecord,
} from "@fxwallet/types";
import { StoreError } from "./types.js";

export interface JsonlTransactionJournalOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

export class JsonlTransactionJournal implements TransactionJournal {
  private readonly _filePath: string;
  private readonly _records: TransactionRecord[] = [];
  private _skipped = 0;

  /**
   * Existing records are loaded from the file.
   * The file and its directory are created on first append.
   */
  constructor(options: JsonlTransactionJournalOptions) {
    this._filePath = options.filePath;
    this._loadFromFile();
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(record: TransactionRecord): void {
    if (!isTransactionRecord(record)) {
      throw new StoreError(
        "INVALID_DOCUMENT",
        "Refusing to journal a malformed transaction record",
        this._filePath,
      );
    }

    this._writeAndSync(JSON.stringify(record) + "\n");

    // Update in-memory state only after successful write
    this._records.push(record);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  list(query: TransactionQuery = {}): readonly TransactionRecord[] {
    let result: TransactionRecord[] = this._records;

    if (query.userId !== undefined) {
      result = result.filter((r) => r.userId === query.userId);
    }

    // Newest first
    result = [...result].reverse();

    if (query.limit !== undefined && query.limit > 0) {
      result = result.slice(0, query.limit);
    }

    return result;
  }

  get size(): number {
    return this._records.length;
  }

  /** Lines ignored on load because they were torn or malformed. */
  get skippedLines(): number {
    return this._skipped;
  }

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn write from an unclean shutdown
        this._skipped++;
        continue;
      }

      if (!isTransactionRecord(parsed)) {
        this._skipped++;
        continue;
      }
      this._records.push(parsed);
    }
  }

  private _writeAndSync(data: string): void {
    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      const fd = openSync(this._filePath, "a");
      try {
        appendFileSync(fd, data, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err) {
      throw new StoreError("WRITE_FAILED", `Cannot append to ${this._filePath}`, this._filePath, err);
    }
  }
}
