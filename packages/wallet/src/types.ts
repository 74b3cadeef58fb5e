/**
 * @fxwallet/wallet — Use case types.
 */

import type {
  Balances,
  Currency,
  TransactionAction,
  UserProfile,
} from "@fxwallet/types";
import type { WalletErrorCode } from "./errors.js";

// =============================================================================
// Receipts
// =============================================================================

/**
 * Outcome of a completed buy or sell.
 */
export interface TradeReceipt {
  readonly transactionId: string;
  readonly action: TransactionAction;
  readonly currency: Currency;

  /** Quantity bought or sold, at the currency's precision */
  readonly amount: string;

  /** Rate applied, or null for a base-currency deposit/withdrawal */
  readonly rate: string | null;

  readonly baseCurrency: Currency;

  /** Cost (buy) or proceeds (sell) in the base currency */
  readonly baseAmount: string;

  readonly before: Balances;
  readonly after: Balances;
}

// =============================================================================
// Valuation
// =============================================================================

export interface ValuationLine {
  readonly currency: Currency;
  readonly amount: string;

  /** Rate into the valuation currency; null for a zero balance */
  readonly rate: string | null;

  /** Value in the valuation currency, rounded to its precision */
  readonly converted: string;
}

export interface Valuation {
  readonly user: UserProfile;
  readonly baseCurrency: Currency;
  readonly lines: readonly ValuationLine[];
  readonly total: string;

  /** When the rate table was last refreshed */
  readonly ratesUpdatedAt: string | null;
}

// =============================================================================
// Action log
// =============================================================================

export type WalletAction = "register" | "login" | "buy" | "sell" | "change_password";

export type ActionOutcome = "success" | "failure" | "error";

/**
 * One audited use case call.
 * `failure` is a domain error; `error` is anything unexpected.
 */
export interface ActionLogEntry {
  readonly action: WalletAction;
  readonly actor: string;
  readonly outcome: ActionOutcome;
  readonly code?: WalletErrorCode | undefined;
  readonly message?: string | undefined;
  readonly durationMs: number;
  readonly timestamp: string;
  readonly details: Readonly<Record<string, unknown>>;
}

/**
 * Called after each mutating use case. Must not affect the outcome.
 */
export type ActionHook = (entry: ActionLogEntry) => void;
