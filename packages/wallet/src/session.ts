/**
 * Session — the current user of an interactive shell.
 *
 * Two states: anonymous and authenticated. `login` moves to
 * authenticated, `logout` back. Wallet operations while anonymous
 * fail with NOT_AUTHENTICATED; rate lookups do not need a user.
 */

import type {
  CurrencyInfo,
  RateEntry,
  TransactionRecord,
  UserProfile,
} from "@fxwallet/types";
import { WalletError, fail, ok } from "./errors.js";
import type { WalletResult } from "./errors.js";
import type { RateListOptions, RateQuote } from "./rate-store.js";
import type { TradeReceipt, Valuation } from "./types.js";
import type { WalletService } from "./wallet-service.js";

export type SessionState =
  | { readonly status: "anonymous" }
  | { readonly status: "authenticated"; readonly user: UserProfile };

export class Session {
  private readonly service: WalletService;
  private _state: SessionState = { status: "anonymous" };

  constructor(service: WalletService) {
    this.service = service;
  }

  get state(): SessionState {
    return this._state;
  }

  get user(): UserProfile | undefined {
    return this._state.status === "authenticated" ? this._state.user : undefined;
  }

  get baseCurrency(): string {
    return this.service.baseCurrency;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /** Registration leaves the session state unchanged. */
  register(username: string, password: string): WalletResult<UserProfile> {
    return this.service.register(username, password);
  }

  login(username: string, password: string): WalletResult<UserProfile> {
    const result = this.service.login(username, password);
    if (result.ok) {
      this._state = { status: "authenticated", user: result.value };
    }
    return result;
  }

  logout(): WalletResult<UserProfile> {
    return this.withUser((user) => {
      this._state = { status: "anonymous" };
      return ok(user);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallet operations
  // ───────────────────────────────────────────────────────────────────────

  buy(currency: string, amount: string): WalletResult<TradeReceipt> {
    return this.withUser((user) => this.service.buy(user, currency, amount));
  }

  sell(currency: string, amount: string): WalletResult<TradeReceipt> {
    return this.withUser((user) => this.service.sell(user, currency, amount));
  }

  portfolio(baseCurrency?: string): WalletResult<Valuation> {
    return this.withUser((user) => this.service.valuation(user, baseCurrency));
  }

  history(limit?: number): WalletResult<readonly TransactionRecord[]> {
    return this.withUser((user) => this.service.history(user, limit));
  }

  changePassword(oldPassword: string, newPassword: string): WalletResult<UserProfile> {
    return this.withUser((user) => this.service.changePassword(user, oldPassword, newPassword));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reference data
  // ───────────────────────────────────────────────────────────────────────

  getRate(from: string, to: string): WalletResult<RateQuote> {
    return this.service.getRate(from, to);
  }

  listRates(options: RateListOptions = {}): WalletResult<readonly RateEntry[]> {
    return this.service.listRates(options);
  }

  currencies(): readonly CurrencyInfo[] {
    return this.service.listCurrencies();
  }

  ratesAreStale(): boolean {
    return this.service.ratesAreStale();
  }

  // ─────────────────────────────────────────────────────────────────────
  // Private
  // ─────────────────────────────────────────────────────────────────────

  private withUser<T>(fn: (user: UserProfile) => WalletResult<T>): WalletResult<T> {
    if (this._state.status === "anonymous") {
      return fail(new WalletError("NOT_AUTHENTICATED", "Log in first: login <username> <password>"));
    }
    return fn(this._state.user);
  }
}
