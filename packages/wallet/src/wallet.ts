/**
 * Wallet assembly.
 *
 * Builds the stores from a persistence collaborator and wires them
 * into a service and a session. Nothing here is global: every call
 * produces an independent wallet.
 */

import type { Currency, TransactionJournal, WalletPersistence } from "@fxwallet/types";
import { CurrencyCatalog } from "./currencies.js";
import { PortfolioStore } from "./portfolio-store.js";
import { RateStore } from "./rate-store.js";
import { Session } from "./session.js";
import type { ActionHook } from "./types.js";
import { UserStore } from "./user-store.js";
import { WalletService } from "./wallet-service.js";

export interface WalletOptions {
  readonly persistence: WalletPersistence;
  readonly journal: TransactionJournal;
  readonly baseCurrency: Currency;
  readonly ratesTtlSeconds?: number | undefined;
  readonly catalog?: CurrencyCatalog | undefined;
  readonly onAction?: ActionHook | undefined;
  readonly now?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export interface Wallet {
  readonly catalog: CurrencyCatalog;
  readonly rates: RateStore;
  readonly users: UserStore;
  readonly portfolios: PortfolioStore;
  readonly service: WalletService;
  readonly session: Session;
}

export function createWallet(options: WalletOptions): Wallet {
  const catalog = options.catalog ?? CurrencyCatalog.fromFile();
  const rates = new RateStore(options.persistence.loadRates(), {
    ttlSeconds: options.ratesTtlSeconds,
    now: options.now,
  });
  const users = new UserStore(options.persistence, { now: options.now });
  const portfolios = new PortfolioStore(options.persistence, catalog);
  const service = new WalletService({
    baseCurrency: options.baseCurrency,
    catalog,
    rates,
    users,
    portfolios,
    journal: options.journal,
    onAction: options.onAction,
    now: options.now,
    generateId: options.generateId,
  });

  return {
    catalog,
    rates,
    users,
    portfolios,
    service,
    session: new Session(service),
  };
}
