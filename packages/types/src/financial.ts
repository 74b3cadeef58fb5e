/**
 * Financial Types
 *
 * Core financial primitives for the wallet.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit USD)
 * - Precision is fixed per currency by its catalog entry
 */

/**
 * Currency code: ISO 4217 for fiat, ticker for crypto.
 * Two to five upper-case letters.
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "0.05000000") */
  readonly amount: string;

  /** Currency code (e.g., "USD", "BTC") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * JPY = 0, USD = 2, BTC = 8.
   */
  readonly decimals: number;
}

export type CurrencyKind = "fiat" | "crypto";

/**
 * A catalog entry describing a tradable currency.
 */
export interface CurrencyInfo {
  readonly code: Currency;
  readonly name: string;
  readonly kind: CurrencyKind;
  readonly decimals: number;

  /** Issuing country or zone (fiat only) */
  readonly issuingCountry?: string | undefined;

  /** Consensus algorithm (crypto only) */
  readonly algorithm?: string | undefined;
}
