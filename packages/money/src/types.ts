/**
 * @fxwallet/money — Error types.
 */

/** Error codes for money arithmetic. */
export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_RATE"
  | "CURRENCY_MISMATCH";

/**
 * Structured error from the arithmetic layer.
 * Always thrown, never returned as an error code.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}
