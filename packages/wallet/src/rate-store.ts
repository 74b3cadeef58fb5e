/**
 * Rate Store — read-only exchange rate lookup.
 *
 * Rules:
 * - A direct pair wins
 * - Otherwise the reciprocal of the reverse pair is derived
 * - A currency against itself is the identity rate
 * - Rates never change during a session
 */

import { compareRates, invertRate } from "@fxwallet/money";
import type { Currency, RateEntry, RateTable } from "@fxwallet/types";
import { WalletError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface RateQuote extends RateEntry {
  /** False when the rate was derived from the reverse pair */
  readonly direct: boolean;
}

export interface RateListOptions {
  /** Only pairs involving this currency */
  readonly currency?: Currency | undefined;

  /** Keep the N highest rates */
  readonly top?: number | undefined;
}

export interface RateStoreOptions {
  /** Age after which the table counts as stale */
  readonly ttlSeconds?: number | undefined;
  readonly now?: (() => Date) | undefined;
}

export const IDENTITY_SOURCE = "identity";

export function pairKey(from: Currency, to: Currency): string {
  return `${from}_${to}`;
}

// =============================================================================
// Rate Store
// =============================================================================

export class RateStore {
  private readonly pairs: Map<string, RateEntry>;
  private readonly _lastRefresh: string | null;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(table: RateTable, options: RateStoreOptions = {}) {
    this.pairs = new Map(table.pairs.map((p) => [pairKey(p.from, p.to), p]));
    this._lastRefresh = table.lastRefresh;
    this.ttlSeconds = options.ttlSeconds ?? 300;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rate to convert one unit of `from` into `to`.
   * Throws RATE_NOT_FOUND when neither direction is stored.
   */
  getRate(from: Currency, to: Currency): RateQuote {
    if (from === to) {
      return {
        from,
        to,
        rate: "1",
        updatedAt: this._lastRefresh ?? this.now().toISOString(),
        source: IDENTITY_SOURCE,
        direct: true,
      };
    }

    const direct = this.pairs.get(pairKey(from, to));
    if (direct !== undefined) {
      return { ...direct, direct: true };
    }

    const reverse = this.pairs.get(pairKey(to, from));
    if (reverse !== undefined) {
      return {
        from,
        to,
        rate: invertRate(reverse.rate),
        updatedAt: reverse.updatedAt,
        source: reverse.source,
        direct: false,
      };
    }

    throw new WalletError("RATE_NOT_FOUND", `No rate for ${from}→${to}`, { from, to });
  }

  /**
   * Stored pairs, highest rate first.
   */
  list(options: RateListOptions = {}): readonly RateEntry[] {
    let entries = [...this.pairs.values()];

    if (options.currency !== undefined) {
      const code = options.currency;
      entries = entries.filter((e) => e.from === code || e.to === code);
    }

    entries.sort((a, b) => compareRates(b.rate, a.rate));

    if (options.top !== undefined && options.top > 0) {
      entries = entries.slice(0, options.top);
    }

    return entries;
  }

  get lastRefresh(): string | null {
    return this._lastRefresh;
  }

  /**
   * Whether the table is older than the TTL.
   * A table that was never refreshed is always stale.
   */
  isStale(): boolean {
    if (this._lastRefresh === null) {
      return true;
    }
    const refreshed = Date.parse(this._lastRefresh);
    if (Number.isNaN(refreshed)) {
      return true;
    }
    return this.now().getTime() - refreshed > this.ttlSeconds * 1000;
  }

  get size(): number {
    return this.pairs.size;
  }
}
