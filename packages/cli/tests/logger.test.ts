/**
 * Tests for the pino logger and the action hook that feeds it.
 */

import { describe, it, expect, afterEach } from "vitest";
import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import type { Logger } from "pino";
import type { ActionLogEntry } from "@fxwallet/wallet";
import { createActionLogger, createLogger } from "../src/logger.js";

function captureLogger(): { logger: Logger; records: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const logger = pino(
    { level: "info", timestamp: false, base: undefined },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  return {
    logger,
    records: () =>
      lines.map((line) => {
        const record: Record<string, unknown> = JSON.parse(line);
        return record;
      }),
  };
}

const ENTRY: ActionLogEntry = {
  action: "buy",
  actor: "alice",
  outcome: "success",
  durationMs: 1.5,
  timestamp: "2025-01-06T14:47:30.000Z",
  details: { currency: "BTC", amount: "0.05", transactionId: "tx-1" },
};

// =============================================================================
// createActionLogger
// =============================================================================

describe("createActionLogger", () => {
  it("logs success at info with the entry details", () => {
    const { logger, records } = captureLogger();
    createActionLogger(logger)(ENTRY);

    expect(records()).toEqual([
      {
        level: 30,
        msg: "buy success",
        action: "buy",
        actor: "alice",
        outcome: "success",
        durationMs: 1.5,
        currency: "BTC",
        amount: "0.05",
        transactionId: "tx-1",
      },
    ]);
  });

  it("logs a domain failure at warn with its code", () => {
    const { logger, records } = captureLogger();
    createActionLogger(logger)({
      ...ENTRY,
      outcome: "failure",
      code: "INSUFFICIENT_FUNDS",
      message: "Insufficient funds",
    });

    const [record] = records();
    expect(record?.level).toBe(40);
    expect(record?.code).toBe("INSUFFICIENT_FUNDS");
    expect(record?.reason).toBe("Insufficient funds");
  });

  it("logs an unexpected error at error", () => {
    const { logger, records } = captureLogger();
    createActionLogger(logger)({ ...ENTRY, outcome: "error", message: "disk full" });

    const [record] = records();
    expect(record?.level).toBe(50);
    expect(record?.msg).toBe("buy error");
  });
});

// =============================================================================
// createLogger
// =============================================================================

describe("createLogger", () => {
  const logDir = join(tmpdir(), `fxwallet-log-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  it("writes JSON lines to the log file, creating its directory", () => {
    const file = join(logDir, "nested", "actions.log");
    const logger = createLogger({ LOG_FILE: file, LOG_LEVEL: "info", NODE_ENV: "production" });

    logger.debug("hidden");
    logger.info({ userId: 1 }, "hello");

    const lines = readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const record: Record<string, unknown> = JSON.parse(lines[0] ?? "");
    expect(record.msg).toBe("hello");
    expect(record.userId).toBe(1);
  });
});
