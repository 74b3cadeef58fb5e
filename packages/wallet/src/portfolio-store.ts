/**
 * Portfolio Store — per-user balances.
 *
 * Rules:
 * - Every balance is ≥ 0 at all times
 * - A batch of changes applies completely or not at all
 * - Amounts are kept at each currency's precision
 * - Balances keep the order in which currencies were first held
 */

import { MoneyError, formatAmount, parseAmount, toMoney } from "@fxwallet/money";
import type {
  Balances,
  Currency,
  PortfolioRecord,
  WalletPersistence,
} from "@fxwallet/types";
import type { CurrencyCatalog } from "./currencies.js";
import { WalletError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export type BalanceChangeKind = "credit" | "debit";

export interface BalanceChange {
  readonly kind: BalanceChangeKind;
  readonly currency: Currency;

  /** Positive decimal string */
  readonly amount: string;
}

/**
 * Number of fractional digits written in a decimal string.
 */
export function decimalsOf(amount: string): number {
  const point = amount.indexOf(".");
  return point === -1 ? 0 : amount.length - point - 1;
}

// =============================================================================
// Portfolio Store
// =============================================================================

export class PortfolioStore {
  private readonly persistence: WalletPersistence;
  private readonly catalog: CurrencyCatalog;
  private portfolios: Map<number, Balances>;

  constructor(persistence: WalletPersistence, catalog: CurrencyCatalog) {
    this.persistence = persistence;
    this.catalog = catalog;
    this.portfolios = new Map(
      persistence.loadPortfolios().map((p) => [p.userId, this.normalize(p.balances)]),
    );
  }

  has(userId: number): boolean {
    return this.portfolios.has(userId);
  }

  /**
   * Balances for a user; empty if the user holds nothing yet.
   */
  getBalances(userId: number): Balances {
    return this.portfolios.get(userId) ?? {};
  }

  /**
   * Balance of one currency, at its precision. Zero if not held.
   */
  balanceOf(userId: number, currency: Currency): string {
    const decimals = this.catalog.get(currency).decimals;
    const held = this.getBalances(userId)[currency];
    return held ?? formatAmount(0n, decimals);
  }

  /**
   * Create the portfolio with a zero balance in `currency` if it does not exist.
   */
  ensure(userId: number, currency: Currency): Balances {
    const existing = this.portfolios.get(userId);
    if (existing !== undefined) {
      return existing;
    }
    const decimals = this.catalog.get(currency).decimals;
    const created: Balances = { [currency]: formatAmount(0n, decimals) };
    this.commit(userId, created);
    return created;
  }

  credit(userId: number, currency: Currency, amount: string): Balances {
    return this.apply(userId, [{ kind: "credit", currency, amount }]);
  }

  debit(userId: number, currency: Currency, amount: string): Balances {
    return this.apply(userId, [{ kind: "debit", currency, amount }]);
  }

  /**
   * Apply changes in order against a working copy, then persist once.
   * The first failing change aborts the batch with nothing written.
   */
  apply(userId: number, changes: readonly BalanceChange[]): Balances {
    const next = this.preview(userId, changes);
    this.commit(userId, next);
    return next;
  }

  /**
   * Balances that `apply` would produce, without storing them.
   * Throws exactly as `apply` would.
   */
  preview(userId: number, changes: readonly BalanceChange[]): Balances {
    const working: Record<Currency, string> = { ...this.getBalances(userId) };

    for (const change of changes) {
      const decimals = this.catalog.get(change.currency).decimals;
      const amount = this.parsePositive(change.amount, decimals);
      const current = parseAmount(working[change.currency] ?? "0", decimals);

      if (change.kind === "debit" && amount > current) {
        throw new WalletError(
          "INSUFFICIENT_FUNDS",
          `Insufficient funds: available ${formatAmount(current, decimals)} ${change.currency}, required ${formatAmount(amount, decimals)} ${change.currency}`,
          {
            currency: change.currency,
            available: formatAmount(current, decimals),
            required: formatAmount(amount, decimals),
          },
        );
      }

      const next = change.kind === "credit" ? current + amount : current - amount;
      working[change.currency] = formatAmount(next, decimals);
    }

    return working;
  }

  /** All portfolios, in user order of first creation. */
  list(): readonly PortfolioRecord[] {
    return [...this.portfolios.entries()].map(([userId, balances]) => ({ userId, balances }));
  }

  // ─────────────────────────────────────────────────────────────────────
  // Private
  // ─────────────────────────────────────────────────────────────────────

  private parsePositive(amount: string, decimals: number): bigint {
    let value: bigint;
    try {
      value = parseAmount(amount, decimals);
    } catch (err) {
      if (err instanceof MoneyError) {
        throw new WalletError("INVALID_AMOUNT", err.message, { amount });
      }
      throw err;
    }
    if (value <= 0n) {
      throw new WalletError("INVALID_AMOUNT", `Amount must be positive, got "${amount}"`, {
        amount,
      });
    }
    return value;
  }

  /** Rewrite known currencies at their catalog precision. */
  private normalize(balances: Balances): Balances {
    const out: Record<Currency, string> = {};
    for (const [currency, amount] of Object.entries(balances)) {
      out[currency] = this.catalog.has(currency)
        ? toMoney(amount, currency, this.catalog.get(currency).decimals).amount
        : amount;
    }
    return out;
  }

  private commit(userId: number, balances: Balances): void {
    const next = new Map(this.portfolios);
    next.set(userId, balances);
    this.persistence.savePortfolios(
      [...next.entries()].map(([id, b]) => ({ userId: id, balances: b })),
    );
    this.portfolios = next;
  }
}
