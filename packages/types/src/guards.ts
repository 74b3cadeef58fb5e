/**
 * Runtime Type Guards
 *
 * Narrowing for transaction records read back from the journal.
 */

import type { TransactionAction, TransactionRecord } from "./transaction.js";

const CURRENCY_CODE = /^[A-Z]{2,5}$/;
const DECIMAL = /^\d+(\.\d+)?$/;

function isCurrencyCode(value: unknown): boolean {
  return typeof value === "string" && CURRENCY_CODE.test(value);
}

/** Non-negative decimal string without sign or exponent. */
function isDecimalString(value: unknown): boolean {
  return typeof value === "string" && DECIMAL.test(value);
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTransactionAction(value: unknown): value is TransactionAction {
  return value === "buy" || value === "sell";
}

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.userId === "number" &&
    isTransactionAction(v.action) &&
    isCurrencyCode(v.currency) &&
    isDecimalString(v.amount) &&
    isCurrencyCode(v.baseCurrency) &&
    isDecimalString(v.baseAmount) &&
    (v.rate === null || isDecimalString(v.rate)) &&
    typeof v.timestamp === "string"
  );
}
