/**
 * Transaction Types
 *
 * Completed trades, recorded append-only after the portfolio commits.
 */

import type { Currency } from "./financial.js";

export type TransactionAction = "buy" | "sell";

export interface TransactionRecord {
  /** Unique record ID */
  readonly id: string;

  readonly userId: number;
  readonly action: TransactionAction;

  /** The currency bought or sold */
  readonly currency: Currency;
  readonly amount: string;

  /** The unit of account the trade was settled in */
  readonly baseCurrency: Currency;

  /** Cost (buy) or proceeds (sell) in the base currency */
  readonly baseAmount: string;

  /** Rate applied, or null for a base-currency deposit/withdrawal */
  readonly rate: string | null;

  /** ISO 8601 timestamp */
  readonly timestamp: string;
}
