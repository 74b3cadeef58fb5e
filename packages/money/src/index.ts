/**
 * @fxwallet/money — Deterministic decimal arithmetic for wallet amounts.
 *
 * - Amounts are decimal strings, scaled to bigint for every operation
 * - Rates are positive decimal strings
 * - Rounding is applied once at the target precision: half-up unless
 *   the caller picks a direction
 */

export { MoneyError } from "./types.js";
export type { MoneyErrorCode } from "./types.js";

export {
  parseAmount,
  formatAmount,
  divideRounded,
  rescale,
  toMoney,
  addMoney,
  isZero,
  isPositive,
  zeroMoney,
  sumMoney,
} from "./money-math.js";
export type { RoundingMode } from "./money-math.js";

export {
  RATE_DECIMALS,
  parseRate,
  stripTrailingZeros,
  convertMoney,
  invertRate,
  compareRates,
} from "./rate-math.js";
export type { ScaledRate } from "./rate-math.js";
