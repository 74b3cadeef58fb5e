/**
 * Persistence Contracts
 *
 * The wallet core keeps its stores in memory and hands whole
 * collections to these collaborators after each mutation.
 * Implementations are synchronous: a call returns once the data is stored.
 */

import type { PortfolioRecord, UserRecord } from "./account.js";
import type { RateTable } from "./rate.js";
import type { TransactionRecord } from "./transaction.js";

export interface WalletPersistence {
  loadUsers(): readonly UserRecord[];
  saveUsers(users: readonly UserRecord[]): void;

  loadPortfolios(): readonly PortfolioRecord[];
  savePortfolios(portfolios: readonly PortfolioRecord[]): void;

  /** Rates are reference data: there is no save */
  loadRates(): RateTable;
}

export interface TransactionQuery {
  readonly userId?: number | undefined;

  /** Maximum number of records, newest first */
  readonly limit?: number | undefined;
}

/**
 * Append-only journal of completed trades.
 */
export interface TransactionJournal {
  append(record: TransactionRecord): void;

  /** Newest first */
  list(query?: TransactionQuery): readonly TransactionRecord[];
}
