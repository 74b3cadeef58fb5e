/**
 * @fxwallet/money — Rate arithmetic.
 *
 * A rate is a positive decimal string: the amount of the quote
 * currency worth one unit of the base currency. Conversions multiply
 * the scaled amount by the scaled rate and round once, at the target
 * currency's precision.
 */

import type { Money } from "@fxwallet/types";
import { MoneyError } from "./types.js";
import { divideRounded, formatAmount, parseAmount, rescale } from "./money-math.js";
import type { RoundingMode } from "./money-math.js";

/** Fractional digits kept when a rate is derived by inversion. */
export const RATE_DECIMALS = 12;

/** A rate as a scaled integer. */
export interface ScaledRate {
  readonly units: bigint;
  readonly scale: number;
}

/**
 * Parse a rate string into units and scale.
 *
 * "59337.21" → { units: 5933721n, scale: 2 }
 */
export function parseRate(rate: string): ScaledRate {
  const trimmed = typeof rate === "string" ? rate.trim() : "";
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_RATE", `Invalid rate: "${String(rate)}"`);
  }
  const scale = trimmed.includes(".") ? trimmed.length - trimmed.indexOf(".") - 1 : 0;
  const units = parseAmount(trimmed, scale);
  if (units <= 0n) {
    throw new MoneyError("INVALID_RATE", `Rate must be positive, got "${trimmed}"`);
  }
  return { units, scale };
}

/**
 * Drop insignificant trailing zeros from a decimal string.
 *
 * "0.500000000000" → "0.5", "12.000" → "12"
 */
export function stripTrailingZeros(value: string): string {
  if (!value.includes(".")) return value;
  return value.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * Convert an amount into another currency at the given rate.
 *
 * convertMoney({ amount: "0.05000000", currency: "BTC", decimals: 8 }, "59337.21", "USD", 2)
 *   → { amount: "2966.86", currency: "USD", decimals: 2 }
 * The same call with mode "up" gives "2966.87".
 */
export function convertMoney(
  money: Money,
  rate: string,
  currency: string,
  decimals: number,
  mode: RoundingMode = "half-up",
): Money {
  const { units, scale } = parseRate(rate);
  const product = parseAmount(money.amount, money.decimals) * units;
  return {
    amount: formatAmount(rescale(product, money.decimals + scale, decimals, mode), decimals),
    currency,
    decimals,
  };
}

/**
 * Reciprocal of a rate, rounded half-up to `decimals` fractional digits.
 *
 * invertRate("0.00001685") → "59347.181008902077"
 */
export function invertRate(rate: string, decimals: number = RATE_DECIMALS): string {
  const { units, scale } = parseRate(rate);
  const inverted = divideRounded(10n ** BigInt(scale + decimals), units);
  if (inverted === 0n) {
    throw new MoneyError(
      "INVALID_RATE",
      `Inverse of "${rate}" is below ${String(decimals)} fractional digits`,
    );
  }
  return stripTrailingZeros(formatAmount(inverted, decimals));
}

/**
 * Compare two rate strings numerically. Returns -1, 0, or 1.
 */
export function compareRates(a: string, b: string): -1 | 0 | 1 {
  const ra = parseRate(a);
  const rb = parseRate(b);
  const scale = Math.max(ra.scale, rb.scale);
  const va = rescale(ra.units, ra.scale, scale);
  const vb = rescale(rb.units, rb.scale, scale);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}
