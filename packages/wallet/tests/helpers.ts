/**
 * Shared fixtures for wallet tests.
 */

import type { RateEntry, RateTable } from "@fxwallet/types";
import { CurrencyCatalog } from "../src/currencies.js";
import type { WalletResult } from "../src/errors.js";
import {
  InMemoryPersistence,
  InMemoryTransactionJournal,
} from "../src/in-memory-persistence.js";
import type { ActionLogEntry } from "../src/types.js";
import { createWallet } from "../src/wallet.js";
import type { Wallet } from "../src/wallet.js";

export const REFRESHED_AT = "2025-01-06T14:47:30.000Z";

export function rate(from: string, to: string, value: string, source = "test-feed"): RateEntry {
  return { from, to, rate: value, updatedAt: REFRESHED_AT, source };
}

export const RATES: RateTable = {
  pairs: [
    rate("BTC", "USD", "59337.21"),
    rate("ETH", "USD", "3720.00"),
    rate("EUR", "USD", "1.0786"),
    rate("JPY", "USD", "0.0067"),
  ],
  lastRefresh: REFRESHED_AT,
};

export const catalog = CurrencyCatalog.fromFile();

export interface TestWallet extends Wallet {
  readonly persistence: InMemoryPersistence;
  readonly journal: InMemoryTransactionJournal;
  readonly actions: ActionLogEntry[];
}

export function makeWallet(
  rates: RateTable = RATES,
  persistence: InMemoryPersistence = new InMemoryPersistence({ rates }),
): TestWallet {
  const journal = new InMemoryTransactionJournal();
  const actions: ActionLogEntry[] = [];
  let seq = 0;
  const wallet = createWallet({
    persistence,
    journal,
    baseCurrency: "USD",
    catalog,
    onAction: (entry) => {
      actions.push(entry);
    },
    now: () => new Date(REFRESHED_AT),
    generateId: () => `tx-${String(++seq)}`,
  });
  return { ...wallet, persistence, journal, actions };
}

/** Unwrap a successful result or fail the test with its error. */
export function unwrap<T>(result: WalletResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

/** The error code of a failed result, or undefined on success. */
export function errorCode<T>(result: WalletResult<T>): string | undefined {
  return result.ok ? undefined : result.error.code;
}
