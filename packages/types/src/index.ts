/**
 * @fxwallet/types — Shared domain types for the wallet stack.
 *
 * These types are used across all fxwallet packages:
 * - Financial primitives (Money, currencies)
 * - Users and portfolios
 * - Exchange rates
 * - Trade journal records
 * - Persistence contracts
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  Money,
  Currency,
  CurrencyKind,
  CurrencyInfo,
} from "./financial.js";

// Account types
export type {
  UserRecord,
  UserProfile,
  Balances,
  PortfolioRecord,
} from "./account.js";

// Rate types
export type { RateEntry, RateTable } from "./rate.js";

// Transaction types
export type { TransactionAction, TransactionRecord } from "./transaction.js";

// Persistence contracts
export type {
  WalletPersistence,
  TransactionJournal,
  TransactionQuery,
} from "./persistence.js";

// Runtime type guards
export {
  isTransactionAction,
  isTransactionRecord,
} from "./guards.js";
