/**
 * Wallet Service — the use cases behind every shell command.
 *
 * Composes:
 * - CurrencyCatalog (what can be traded, at which precision)
 * - RateStore (read-only prices)
 * - UserStore (accounts)
 * - PortfolioStore (balances)
 * - TransactionJournal (completed trades)
 *
 * Every use case returns a WalletResult. Mutating use cases report to
 * the action hook after they finish, whatever the outcome.
 */

import { randomUUID } from "node:crypto";
import {
  convertMoney,
  isPositive,
  isZero,
  sumMoney,
  toMoney,
  zeroMoney,
} from "@fxwallet/money";
import type {
  Currency,
  CurrencyInfo,
  Money,
  RateEntry,
  TransactionAction,
  TransactionJournal,
  TransactionRecord,
  UserProfile,
} from "@fxwallet/types";
import { normalizeCode } from "./currencies.js";
import type { CurrencyCatalog } from "./currencies.js";
import { WalletError, capture } from "./errors.js";
import type { WalletResult } from "./errors.js";
import { decimalsOf } from "./portfolio-store.js";
import type { BalanceChange, PortfolioStore } from "./portfolio-store.js";
import type { RateListOptions, RateQuote, RateStore } from "./rate-store.js";
import type { UserStore } from "./user-store.js";
import type {
  ActionHook,
  ActionLogEntry,
  TradeReceipt,
  Valuation,
  ValuationLine,
  WalletAction,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface WalletServiceOptions {
  /** Unit of account for deposits, trades and default valuation */
  readonly baseCurrency: Currency;
  readonly catalog: CurrencyCatalog;
  readonly rates: RateStore;
  readonly users: UserStore;
  readonly portfolios: PortfolioStore;
  readonly journal: TransactionJournal;
  readonly onAction?: ActionHook | undefined;
  readonly now?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Wallet Service
// =============================================================================

export class WalletService {
  readonly baseCurrency: Currency;
  private readonly catalog: CurrencyCatalog;
  private readonly rates: RateStore;
  private readonly users: UserStore;
  private readonly portfolios: PortfolioStore;
  private readonly journal: TransactionJournal;
  private readonly onAction: ActionHook | undefined;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: WalletServiceOptions) {
    this.catalog = options.catalog;
    this.baseCurrency = this.catalog.get(options.baseCurrency).code;
    this.rates = options.rates;
    this.users = options.users;
    this.portfolios = options.portfolios;
    this.journal = options.journal;
    this.onAction = options.onAction;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounts
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an account and its portfolio (zero balance in the base currency).
   * Does not log in.
   */
  register(username: string, password: string): WalletResult<UserProfile> {
    return this.track("register", username.trim(), {}, () => {
      const user = this.users.register(username, password);
      this.portfolios.ensure(user.id, this.baseCurrency);
      return user;
    }, (user) => ({ userId: user.id }));
  }

  login(username: string, password: string): WalletResult<UserProfile> {
    return this.track("login", username.trim(), {}, () => {
      const user = this.users.authenticate(username, password);
      this.portfolios.ensure(user.id, this.baseCurrency);
      return user;
    }, (user) => ({ userId: user.id }));
  }

  changePassword(
    user: UserProfile,
    oldPassword: string,
    newPassword: string,
  ): WalletResult<UserProfile> {
    return this.track("change_password", user.username, { userId: user.id }, () =>
      this.users.changePassword(user.id, oldPassword, newPassword),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Trading
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Buy `amount` of `currency`, paying in the base currency.
   * Buying the base currency itself is a deposit.
   */
  buy(user: UserProfile, currency: string, amount: string): WalletResult<TradeReceipt> {
    return this.track(
      "buy",
      user.username,
      { currency: normalizeCode(currency), amount },
      () => this.trade("buy", user, currency, amount),
      describeReceipt,
    );
  }

  /**
   * Sell `amount` of `currency` for the base currency.
   * Selling the base currency itself is a withdrawal.
   */
  sell(user: UserProfile, currency: string, amount: string): WalletResult<TradeReceipt> {
    return this.track(
      "sell",
      user.username,
      { currency: normalizeCode(currency), amount },
      () => this.trade("sell", user, currency, amount),
      describeReceipt,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Value every holding in `baseCurrency` (default: the configured base).
   * A missing rate for any held currency fails the whole valuation.
   */
  valuation(user: UserProfile, baseCurrency?: string): WalletResult<Valuation> {
    return capture(() => {
      const base = this.catalog.get(baseCurrency ?? this.baseCurrency);
      const lines: ValuationLine[] = [];

      for (const [currency, amount] of Object.entries(this.portfolios.getBalances(user.id))) {
        lines.push(this.valueHolding(currency, amount, base));
      }

      const total = sumMoney(
        lines.map((l) => ({ amount: l.converted, currency: base.code, decimals: base.decimals })),
        base.code,
        base.decimals,
      );

      return {
        user,
        baseCurrency: base.code,
        lines,
        total: total.amount,
        ratesUpdatedAt: this.rates.lastRefresh,
      };
    });
  }

  getRate(from: string, to: string): WalletResult<RateQuote> {
    return capture(() => {
      const source = this.catalog.get(from).code;
      const target = this.catalog.get(to).code;
      return this.rates.getRate(source, target);
    });
  }

  listRates(options: RateListOptions = {}): WalletResult<readonly RateEntry[]> {
    return capture(() => {
      if (options.top !== undefined && (!Number.isInteger(options.top) || options.top <= 0)) {
        throw new WalletError("INVALID_INPUT", "--top must be a positive integer", {
          top: options.top,
        });
      }
      const currency =
        options.currency === undefined ? undefined : this.catalog.get(options.currency).code;
      return this.rates.list({ currency, top: options.top });
    });
  }

  /**
   * Completed trades, newest first.
   */
  history(user: UserProfile, limit?: number): WalletResult<readonly TransactionRecord[]> {
    return capture(() => {
      if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
        throw new WalletError("INVALID_INPUT", "--limit must be a positive integer", { limit });
      }
      return this.journal.list({ userId: user.id, limit });
    });
  }

  /** Whether the rate table is older than its TTL. */
  ratesAreStale(): boolean {
    return this.rates.isStale();
  }

  listCurrencies(): readonly CurrencyInfo[] {
    return this.catalog.list();
  }

  // ─────────────────────────────────────────────────────────────────────
  // Private
  // ─────────────────────────────────────────────────────────────────────

  private trade(
    action: TransactionAction,
    user: UserProfile,
    currencyInput: string,
    amountInput: string,
  ): TradeReceipt {
    const info = this.catalog.get(currencyInput);
    const base = this.catalog.get(this.baseCurrency);
    const quantity = toMoney(amountInput, info.code, info.decimals);
    if (!isPositive(quantity)) {
      throw new WalletError("INVALID_AMOUNT", `Amount must be positive, got "${amountInput}"`, {
        amount: amountInput,
      });
    }

    const before = this.portfolios.ensure(user.id, base.code);
    const outgoing: BalanceChange = action === "buy"
      ? { kind: "credit", currency: info.code, amount: quantity.amount }
      : { kind: "debit", currency: info.code, amount: quantity.amount };

    if (action === "sell") {
      // Holdings are checked before any rate lookup
      this.portfolios.preview(user.id, [outgoing]);
    }

    let rate: string | null = null;
    let baseAmount: Money = quantity;
    let changes: readonly BalanceChange[] = [outgoing];

    if (info.code !== base.code) {
      rate = this.rates.getRate(info.code, base.code).rate;
      // Cost rounds up, proceeds round down: splitting a trade never gains
      baseAmount = convertMoney(
        quantity,
        rate,
        base.code,
        base.decimals,
        action === "buy" ? "up" : "down",
      );
      // A dust sell clears the holding for nothing
      const baseLeg: readonly BalanceChange[] = isPositive(baseAmount)
        ? [{
          kind: action === "buy" ? "debit" : "credit",
          currency: base.code,
          amount: baseAmount.amount,
        }]
        : [];
      changes = action === "buy" ? [...baseLeg, outgoing] : [outgoing, ...baseLeg];
    }

    const after = this.portfolios.apply(user.id, changes);

    const record: TransactionRecord = {
      id: this.generateId(),
      userId: user.id,
      action,
      currency: info.code,
      amount: quantity.amount,
      baseCurrency: base.code,
      baseAmount: baseAmount.amount,
      rate,
      timestamp: this.now().toISOString(),
    };
    this.appendToJournal(record);

    return {
      transactionId: record.id,
      action,
      currency: info.code,
      amount: quantity.amount,
      rate,
      baseCurrency: base.code,
      baseAmount: baseAmount.amount,
      before,
      after,
    };
  }

  /**
   * The balances are already committed when this runs, so a journal
   * failure is reported as a warning instead of failing the trade.
   */
  private appendToJournal(record: TransactionRecord): void {
    try {
      this.journal.append(record);
    } catch (err) {
      process.emitWarning(
        `Transaction ${record.id} was applied but not journaled: ${err instanceof Error ? err.message : String(err)}`,
        { code: "FXWALLET_JOURNAL" },
      );
    }
  }

  private valueHolding(currency: Currency, amount: string, base: CurrencyInfo): ValuationLine {
    const decimals = this.catalog.has(currency)
      ? this.catalog.get(currency).decimals
      : decimalsOf(amount);
    const native: Money = { amount, currency, decimals };

    if (isZero(native)) {
      return {
        currency,
        amount,
        rate: null,
        converted: zeroMoney(base.code, base.decimals).amount,
      };
    }

    const quote = this.rates.getRate(currency, base.code);
    return {
      currency,
      amount,
      rate: quote.rate,
      converted: convertMoney(native, quote.rate, base.code, base.decimals).amount,
    };
  }

  /**
   * Run a mutating use case and report it to the action hook.
   */
  private track<T>(
    action: WalletAction,
    actor: string,
    details: Readonly<Record<string, unknown>>,
    fn: () => T,
    describe?: (value: T) => Readonly<Record<string, unknown>>,
  ): WalletResult<T> {
    const started = performance.now();
    let result: WalletResult<T>;

    try {
      result = capture(fn);
    } catch (err) {
      this.report({
        action,
        actor,
        outcome: "error",
        message: err instanceof Error ? err.message : String(err),
        durationMs: performance.now() - started,
        timestamp: this.now().toISOString(),
        details,
      });
      throw err;
    }

    if (result.ok) {
      this.report({
        action,
        actor,
        outcome: "success",
        durationMs: performance.now() - started,
        timestamp: this.now().toISOString(),
        details: describe === undefined ? details : { ...details, ...describe(result.value) },
      });
    } else {
      this.report({
        action,
        actor,
        outcome: "failure",
        code: result.error.code,
        message: result.error.message,
        durationMs: performance.now() - started,
        timestamp: this.now().toISOString(),
        details,
      });
    }

    return result;
  }

  private report(entry: ActionLogEntry): void {
    if (this.onAction === undefined) {
      return;
    }
    try {
      this.onAction(entry);
    } catch (err) {
      process.emitWarning(
        `Action hook failed for "${entry.action}": ${err instanceof Error ? err.message : String(err)}`,
        { code: "FXWALLET_ACTION_HOOK" },
      );
    }
  }
}

function describeReceipt(receipt: TradeReceipt): Readonly<Record<string, unknown>> {
  return {
    transactionId: receipt.transactionId,
    rate: receipt.rate,
    baseCurrency: receipt.baseCurrency,
    baseAmount: receipt.baseAmount,
  };
}
