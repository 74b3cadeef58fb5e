/**
 * @fxwallet/store — File persistence for the wallet.
 *
 * - JsonFileStore: one zod-validated JSON document, replaced atomically
 * - JsonFilePersistence: users, portfolios and rates in a data directory
 * - JsonlTransactionJournal: append-only trade journal
 */

export { StoreError } from "./types.js";
export type { StoreErrorCode } from "./types.js";

export { JsonFileStore } from "./json-file-store.js";
export type { JsonFileStoreOptions } from "./json-file-store.js";

export { UsersFileSchema, PortfoliosFileSchema, RatesFileSchema } from "./schemas.js";

export {
  JsonFilePersistence,
  USERS_FILE,
  PORTFOLIOS_FILE,
  RATES_FILE,
} from "./json-file-persistence.js";

export { JsonlTransactionJournal } from "./jsonl-journal.js";
export type { JsonlTransactionJournalOptions } from "./jsonl-journal.js";
