/**
 * Wallet errors and explicit results.
 *
 * Stores throw `WalletError`. The service and session catch it at
 * their boundary and hand back a `WalletResult`; anything that is not
 * a domain failure keeps propagating.
 */

import { MoneyError } from "@fxwallet/money";

// =============================================================================
// Error
// =============================================================================

export type WalletErrorCode =
  | "DUPLICATE_USER"
  | "INVALID_CREDENTIALS"
  | "NOT_AUTHENTICATED"
  | "INSUFFICIENT_FUNDS"
  | "RATE_NOT_FOUND"
  | "INVALID_AMOUNT"
  | "UNKNOWN_CURRENCY"
  | "INVALID_INPUT";

export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: WalletErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }
}

// =============================================================================
// Result
// =============================================================================

export type WalletResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: WalletError };

export function ok<T>(value: T): WalletResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: WalletError): WalletResult<T> {
  return { ok: false, error };
}

/**
 * Translate a thrown value into a WalletError.
 * Returns undefined for anything that is not a domain failure.
 */
export function toWalletError(err: unknown): WalletError | undefined {
  if (err instanceof WalletError) {
    return err;
  }
  if (err instanceof MoneyError) {
    return new WalletError("INVALID_AMOUNT", err.message, { cause: err.code });
  }
  return undefined;
}

/**
 * Run `fn`, capturing domain failures as a failed result.
 * Non-domain errors are rethrown unchanged.
 */
export function capture<T>(fn: () => T): WalletResult<T> {
  try {
    return ok(fn());
  } catch (err) {
    const walletError = toWalletError(err);
    if (walletError === undefined) {
      throw err;
    }
    return fail(walletError);
  }
}
