/**
 * @fxwallet/money — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 */

import type { Money } from "@fxwallet/types";
import { MoneyError } from "./types.js";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=8 → 10000000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5000000n with decimals=8 → "0.05000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * How a quotient is brought back to an integer.
 *
 * - `half-up`: nearest, halves away from zero
 * - `up`: toward positive infinity (ceiling)
 * - `down`: toward negative infinity (floor)
 */
export type RoundingMode = "half-up" | "up" | "down";

/**
 * Divide and round. The divisor must be positive.
 */
export function divideRounded(
  numerator: bigint,
  divisor: bigint,
  mode: RoundingMode = "half-up",
): bigint {
  const quotient = numerator / divisor;
  const remainder = numerator % divisor;
  if (remainder === 0n) {
    return quotient;
  }

  switch (mode) {
    case "up":
      return remainder > 0n ? quotient + 1n : quotient;
    case "down":
      return remainder < 0n ? quotient - 1n : quotient;
    case "half-up": {
      const twice = remainder < 0n ? -remainder * 2n : remainder * 2n;
      if (twice >= divisor) {
        return numerator < 0n ? quotient - 1n : quotient + 1n;
      }
      return quotient;
    }
  }
}

/**
 * Move a scaled value from one scale to another, rounding by `mode`
 * when precision is dropped.
 */
export function rescale(
  scaled: bigint,
  fromDecimals: number,
  toDecimals: number,
  mode: RoundingMode = "half-up",
): bigint {
  if (toDecimals >= fromDecimals) {
    return scaled * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return divideRounded(scaled, 10n ** BigInt(fromDecimals - toDecimals), mode);
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Build a Money value from user input, normalised to the currency's precision.
 *
 * toMoney("0.05", "BTC", 8) → { amount: "0.05000000", currency: "BTC", decimals: 8 }
 */
export function toMoney(amount: string, currency: string, decimals: number): Money {
  return {
    amount: formatAmount(parseAmount(amount, decimals), decimals),
    currency,
    decimals,
  };
}

/**
 * Assert two Money values have the same currency and decimals.
 */
function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return {
    amount: formatAmount(sum, a.decimals),
    currency: a.currency,
    decimals: a.decimals,
  };
}

export function isZero(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) === 0n;
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

export function zeroMoney(currency: string, decimals: number): Money {
  return {
    amount: formatAmount(0n, decimals),
    currency,
    decimals,
  };
}

/**
 * Sum a list of Money values of one currency.
 * An empty list sums to zero in the given currency.
 */
export function sumMoney(values: readonly Money[], currency: string, decimals: number): Money {
  let total = zeroMoney(currency, decimals);
  for (const value of values) {
    total = addMoney(total, value);
  }
  return total;
}
