/**
 * In-memory persistence and journal.
 *
 * Suitable for testing and short-lived processes.
 * Saved collections are copied, so later changes by the caller
 * never leak into what was stored.
 */

import type {
  PortfolioRecord,
  RateTable,
  TransactionJournal,
  TransactionQuery,
  TransactionRecord,
  UserRecord,
  WalletPersistence,
} from "@fxwallet/types";

export interface InMemorySeed {
  readonly users?: readonly UserRecord[] | undefined;
  readonly portfolios?: readonly PortfolioRecord[] | undefined;
  readonly rates?: RateTable | undefined;
}

export class InMemoryPersistence implements WalletPersistence {
  private users: readonly UserRecord[];
  private portfolios: readonly PortfolioRecord[];
  private readonly rates: RateTable;

  /** Number of save calls, per collection */
  readonly saves = { users: 0, portfolios: 0 };

  constructor(seed: InMemorySeed = {}) {
    this.users = [...(seed.users ?? [])];
    this.portfolios = [...(seed.portfolios ?? [])];
    this.rates = seed.rates ?? { pairs: [], lastRefresh: null };
  }

  loadUsers(): readonly UserRecord[] {
    return this.users;
  }

  saveUsers(users: readonly UserRecord[]): void {
    this.users = users.map((u) => ({ ...u }));
    this.saves.users++;
  }

  loadPortfolios(): readonly PortfolioRecord[] {
    return this.portfolios;
  }

  savePortfolios(portfolios: readonly PortfolioRecord[]): void {
    this.portfolios = portfolios.map((p) => ({ userId: p.userId, balances: { ...p.balances } }));
    this.saves.portfolios++;
  }

  loadRates(): RateTable {
    return this.rates;
  }
}

export class InMemoryTransactionJournal implements TransactionJournal {
  private readonly records: TransactionRecord[] = [];

  append(record: TransactionRecord): void {
    this.records.push(record);
  }

  list(query: TransactionQuery = {}): readonly TransactionRecord[] {
    let results = this.records;

    if (query.userId !== undefined) {
      results = results.filter((r) => r.userId === query.userId);
    }

    // Newest first
    results = [...results].reverse();

    if (query.limit !== undefined && query.limit > 0) {
      results = results.slice(0, query.limit);
    }

    return results;
  }

  get size(): number {
    return this.records.length;
  }
}
