/**
 * Rate Types
 *
 * Exchange rates are global, read-only reference data.
 * A pair (from, to) maps to the amount of `to` worth one unit of `from`.
 */

import type { Currency } from "./financial.js";

export interface RateEntry {
  readonly from: Currency;
  readonly to: Currency;

  /** Positive decimal string */
  readonly rate: string;

  /** ISO 8601 timestamp */
  readonly updatedAt: string;

  /** Where the rate came from (e.g., "CoinGecko") */
  readonly source: string;
}

/**
 * The full rate table as loaded from storage.
 */
export interface RateTable {
  readonly pairs: readonly RateEntry[];

  /** When the table as a whole was last refreshed, if known */
  readonly lastRefresh: string | null;
}
