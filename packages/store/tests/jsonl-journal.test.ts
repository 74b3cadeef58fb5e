/**
 * Tests for JsonlTransactionJournal.
 *
 * Verifies:
 * - Records persist across reopen
 * - Listing is newest first with user and limit filters
 * - Torn and malformed lines are skipped on load
 * - Malformed records are refused before anything is written
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { TransactionRecord } from "@fxwallet/types";
import { JsonlTransactionJournal } from "../src/jsonl-journal.js";
import { StoreError } from "../src/types.js";

let testDir: string;
let filePath: string;

function record(id: string, userId: number, overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    id,
    userId,
    action: "buy",
    currency: "BTC",
    amount: "0.05",
    baseCurrency: "USD",
    baseAmount: "2966.86",
    rate: "59337.21",
    timestamp: "2025-01-06T14:47:30.000Z",
    ...overrides,
  };
}

beforeEach(() => {
  testDir = join(
    tmpdir(),
    `fxwallet-journal-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
  );
  mkdirSync(testDir, { recursive: true });
  filePath = join(testDir, "transactions.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe("JsonlTransactionJournal", () => {
  it("starts empty when the file does not exist", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    expect(journal.size).toBe(0);
    expect(journal.list()).toEqual([]);
    expect(existsSync(filePath)).toBe(false);
  });

  it("writes one line per record", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    journal.append(record("tx-1", 1));
    journal.append(record("tx-2", 1, { action: "sell" }));

    const lines = readFileSync(filePath, "utf-8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[0] ?? "")).toEqual(record("tx-1", 1));
  });

  it("reloads records on reopen", () => {
    const first = new JsonlTransactionJournal({ filePath });
    first.append(record("tx-1", 1));
    first.append(record("tx-2", 2));

    const second = new JsonlTransactionJournal({ filePath });
    expect(second.size).toBe(2);
    expect(second.list().map((r) => r.id)).toEqual(["tx-2", "tx-1"]);
  });

  it("filters by user and limits newest first", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    journal.append(record("tx-1", 1));
    journal.append(record("tx-2", 2));
    journal.append(record("tx-3", 1));
    journal.append(record("tx-4", 1));

    expect(journal.list({ userId: 1 }).map((r) => r.id)).toEqual(["tx-4", "tx-3", "tx-1"]);
    expect(journal.list({ userId: 1, limit: 2 }).map((r) => r.id)).toEqual(["tx-4", "tx-3"]);
    expect(journal.list({ userId: 3 })).toEqual([]);
  });

  it("skips torn and malformed lines", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    journal.append(record("tx-1", 1));
    appendFileSync(filePath, '{"id":"tx-2","userId":1\n');
    appendFileSync(filePath, JSON.stringify({ id: "tx-3", userId: 1, action: "gift" }) + "\n");
    appendFileSync(filePath, "\n");

    const reopened = new JsonlTransactionJournal({ filePath });
    expect(reopened.size).toBe(1);
    expect(reopened.skippedLines).toBe(2);
  });

  it("appends after skipped lines without losing them", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    journal.append(record("tx-1", 1));
    appendFileSync(filePath, "garbage\n");

    const reopened = new JsonlTransactionJournal({ filePath });
    reopened.append(record("tx-2", 1));
    expect(readFileSync(filePath, "utf-8").split("\n")).toHaveLength(4);
    expect(new JsonlTransactionJournal({ filePath }).list().map((r) => r.id)).toEqual([
      "tx-2",
      "tx-1",
    ]);
  });

  it("refuses a malformed record", () => {
    const journal = new JsonlTransactionJournal({ filePath });
    expect(() => journal.append(record("tx-1", 1, { amount: "-1" }))).toThrow(StoreError);
    expect(journal.size).toBe(0);
    expect(existsSync(filePath)).toBe(false);
  });

  it("creates the directory on first append", () => {
    const nested = join(testDir, "logs", "transactions.jsonl");
    const journal = new JsonlTransactionJournal({ filePath: nested });
    journal.append(record("tx-1", 1, { rate: null, currency: "USD", baseAmount: "0.05" }));
    expect(existsSync(nested)).toBe(true);
  });
});
