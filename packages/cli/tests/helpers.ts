/**
 * Shared fixtures for shell tests.
 */

import { Chalk } from "chalk";
import type { RateEntry, RateTable, WalletPersistence } from "@fxwallet/types";
import {
  InMemoryPersistence,
  InMemoryTransactionJournal,
  createWallet,
} from "@fxwallet/wallet";
import type { TransactionJournal } from "@fxwallet/types";
import type { Wallet } from "@fxwallet/wallet";
import { Formatter } from "../src/format.js";
import { Shell } from "../src/shell.js";

export const REFRESHED_AT = "2025-01-06T14:47:30.000Z";

export function rate(from: string, to: string, value: string): RateEntry {
  return { from, to, rate: value, updatedAt: REFRESHED_AT, source: "test-feed" };
}

export const RATES: RateTable = {
  pairs: [rate("BTC", "USD", "59337.21"), rate("ETH", "USD", "3720.00"), rate("EUR", "USD", "1.0786")],
  lastRefresh: REFRESHED_AT,
};

export const plain = new Formatter(new Chalk({ level: 0 }));

export interface TestShell {
  readonly shell: Shell;
  readonly wallet: Wallet;

  /** Everything the shell printed */
  readonly lines: string[];

  /** Run a command and return only the lines it printed */
  run(line: string): string[];
}

export interface TestShellOptions {
  readonly persistence?: WalletPersistence | undefined;
  readonly journal?: TransactionJournal | undefined;
  readonly now?: Date | undefined;
}

export function makeShell(options: TestShellOptions = {}): TestShell {
  const lines: string[] = [];
  let seq = 0;
  const now = options.now ?? new Date(REFRESHED_AT);
  const wallet = createWallet({
    persistence: options.persistence ?? new InMemoryPersistence({ rates: RATES }),
    journal: options.journal ?? new InMemoryTransactionJournal(),
    baseCurrency: "USD",
    now: () => now,
    generateId: () => `tx-${String(++seq)}`,
  });
  const shell = new Shell({
    session: wallet.session,
    formatter: plain,
    write: (line) => {
      lines.push(line);
    },
  });

  return {
    shell,
    wallet,
    lines,
    run(line: string): string[] {
      const start = lines.length;
      shell.execute(line);
      return lines.slice(start);
    },
  };
}
