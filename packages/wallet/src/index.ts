/**
 * @fxwallet/wallet — Core wallet logic.
 *
 * Stores for rates, users and portfolios, the use cases that trade
 * between them, and the session that guards them behind a login.
 *
 * Rules:
 * - Balances never go negative
 * - Multi-leg trades commit atomically
 * - Domain failures come back as WalletResult, never as throws
 */

// Errors and results
export { WalletError, ok, fail, capture, toWalletError } from "./errors.js";
export type { WalletErrorCode, WalletResult } from "./errors.js";

// Currencies
export { CurrencyCatalog, CurrencyCatalogSchema, normalizeCode } from "./currencies.js";

// Passwords
export { hashPassword, verifyPassword, generateSalt } from "./password.js";
export type { PasswordHash } from "./password.js";

// Stores
export { RateStore, pairKey, IDENTITY_SOURCE } from "./rate-store.js";
export type { RateQuote, RateListOptions, RateStoreOptions } from "./rate-store.js";
export {
  UserStore,
  toProfile,
  validateUsername,
  validatePassword,
  MIN_PASSWORD_LENGTH,
} from "./user-store.js";
export type { UserStoreOptions } from "./user-store.js";
export { PortfolioStore, decimalsOf } from "./portfolio-store.js";
export type { BalanceChange, BalanceChangeKind } from "./portfolio-store.js";

// Service and session
export { WalletService } from "./wallet-service.js";
export type { WalletServiceOptions } from "./wallet-service.js";
export { Session } from "./session.js";
export type { SessionState } from "./session.js";
export { createWallet } from "./wallet.js";
export type { Wallet, WalletOptions } from "./wallet.js";

// In-memory collaborators
export { InMemoryPersistence, InMemoryTransactionJournal } from "./in-memory-persistence.js";
export type { InMemorySeed } from "./in-memory-persistence.js";

// Use case types
export type {
  TradeReceipt,
  Valuation,
  ValuationLine,
  WalletAction,
  ActionOutcome,
  ActionLogEntry,
  ActionHook,
} from "./types.js";
