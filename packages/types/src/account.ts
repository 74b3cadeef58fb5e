/**
 * Account Types
 *
 * Users and their portfolios, in the shape they are persisted.
 */

import type { Currency } from "./financial.js";

/**
 * A registered user.
 * The password is never stored in clear: only a salted hash.
 */
export interface UserRecord {
  /** Sequential identifier, starting at 1 */
  readonly id: number;

  /** Unique login name */
  readonly username: string;

  /** Hex SHA-256 of password + salt */
  readonly passwordHash: string;

  /** Hex salt used for the hash */
  readonly salt: string;

  /** ISO 8601 timestamp */
  readonly registeredAt: string;
}

/**
 * Public view of a user (no credential material).
 */
export interface UserProfile {
  readonly id: number;
  readonly username: string;
  readonly registeredAt: string;
}

/**
 * Per-user balances keyed by currency code.
 * Key order is insertion order: the order currencies were first held.
 */
export type Balances = Readonly<Record<Currency, string>>;

/**
 * One portfolio per user.
 */
export interface PortfolioRecord {
  readonly userId: number;
  readonly balances: Balances;
}
