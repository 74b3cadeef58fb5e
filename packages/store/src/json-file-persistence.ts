/**
 * @fxwallet/store — WalletPersistence over a data directory.
 *
 * <dataDir>/users.json
 * <dataDir>/portfolios.json
 * <dataDir>/rates.json
 *
 * Missing files read as empty collections. Rates are never written.
 */

import { join } from "node:path";
import type {
  PortfolioRecord,
  RateTable,
  UserRecord,
  WalletPersistence,
} from "@fxwallet/types";
import { JsonFileStore } from "./json-file-store.js";
import { PortfoliosFileSchema, RatesFileSchema, UsersFileSchema } from "./schemas.js";

export const USERS_FILE = "users.json";
export const PORTFOLIOS_FILE = "portfolios.json";
export const RATES_FILE = "rates.json";

export class JsonFilePersistence implements WalletPersistence {
  readonly dataDir: string;
  private readonly users: JsonFileStore<UserRecord[]>;
  private readonly portfolios: JsonFileStore<PortfolioRecord[]>;
  private readonly rates: JsonFileStore<RateTable>;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.users = new JsonFileStore({
      filePath: join(dataDir, USERS_FILE),
      schema: UsersFileSchema,
      fallback: () => [],
    });
    this.portfolios = new JsonFileStore({
      filePath: join(dataDir, PORTFOLIOS_FILE),
      schema: PortfoliosFileSchema,
      fallback: () => [],
    });
    this.rates = new JsonFileStore({
      filePath: join(dataDir, RATES_FILE),
      schema: RatesFileSchema,
      fallback: () => ({ pairs: [], lastRefresh: null }),
    });
  }

  loadUsers(): readonly UserRecord[] {
    return this.users.read();
  }

  saveUsers(users: readonly UserRecord[]): void {
    this.users.write([...users]);
  }

  loadPortfolios(): readonly PortfolioRecord[] {
    return this.portfolios.read();
  }

  savePortfolios(portfolios: readonly PortfolioRecord[]): void {
    this.portfolios.write([...portfolios]);
  }

  loadRates(): RateTable {
    return this.rates.read();
  }
}
