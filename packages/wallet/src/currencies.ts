/**
 * Currency catalog.
 *
 * The set of tradable currencies and their precision. Loaded from
 * `data/currencies.json` beside this package unless entries are given.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Currency, CurrencyInfo } from "@fxwallet/types";
import { WalletError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const CurrencyInfoSchema = z.object({
  code: z.string().regex(/^[A-Z]{2,5}$/),
  name: z.string().min(1),
  kind: z.enum(["fiat", "crypto"]),
  decimals: z.number().int().min(0).max(18),
  issuingCountry: z.string().optional(),
  algorithm: z.string().optional(),
});

export const CurrencyCatalogSchema = z.array(CurrencyInfoSchema);

const DEFAULT_CATALOG_URL = new URL("../data/currencies.json", import.meta.url);

// =============================================================================
// Catalog
// =============================================================================

/** Trim and upper-case a user-supplied currency code. */
export function normalizeCode(code: string): Currency {
  return code.trim().toUpperCase();
}

export class CurrencyCatalog {
  private readonly byCode: Map<Currency, CurrencyInfo>;

  constructor(entries: readonly CurrencyInfo[]) {
    this.byCode = new Map();
    for (const entry of entries) {
      if (this.byCode.has(entry.code)) {
        throw new WalletError("INVALID_INPUT", `Duplicate currency '${entry.code}' in catalog`);
      }
      this.byCode.set(entry.code, entry);
    }
  }

  /**
   * Load the catalog from a JSON file (an array of currency entries).
   */
  static fromFile(path: string | URL = DEFAULT_CATALOG_URL): CurrencyCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return new CurrencyCatalog(CurrencyCatalogSchema.parse(raw));
  }

  has(code: string): boolean {
    return this.byCode.has(normalizeCode(code));
  }

  /**
   * Look up a currency. Throws UNKNOWN_CURRENCY if it is not listed.
   */
  get(code: string): CurrencyInfo {
    const info = this.byCode.get(normalizeCode(code));
    if (info === undefined) {
      throw new WalletError("UNKNOWN_CURRENCY", `Unknown currency '${code}'`, {
        currency: code,
      });
    }
    return info;
  }

  /** Fiat first, then crypto; catalog order within each kind. */
  list(): readonly CurrencyInfo[] {
    const all = [...this.byCode.values()];
    return [
      ...all.filter((c) => c.kind === "fiat"),
      ...all.filter((c) => c.kind === "crypto"),
    ];
  }

  get size(): number {
    return this.byCode.size;
  }
}
