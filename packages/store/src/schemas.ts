/**
 * @fxwallet/store — On-disk document formats.
 *
 * users.json       [{ id, username, passwordHash, salt, registeredAt }]
 * portfolios.json  [{ userId, balances: { "USD": "100.00", ... } }]
 * rates.json       { pairs: { "BTC_USD": { rate, updated_at, source } }, last_refresh }
 */

import { z } from "zod";
import type { PortfolioRecord, RateTable, UserRecord } from "@fxwallet/types";

const CURRENCY_CODE = /^[A-Z]{2,5}$/;
const DECIMAL = /^\d+(\.\d+)?$/;
const ZERO = /^0+(\.0+)?$/;
const PAIR_KEY = /^([A-Z]{2,5})_([A-Z]{2,5})$/;

// =============================================================================
// Users
// =============================================================================

export const UsersFileSchema: z.ZodType<UserRecord[], z.ZodTypeDef, unknown> = z
  .array(
    z.object({
      id: z.number().int().positive(),
      username: z.string().min(1),
      passwordHash: z.string().regex(/^[0-9a-f]+$/),
      salt: z.string(),
      registeredAt: z.string(),
    }),
  )
  .superRefine((users, ctx) => {
    const seen = new Set<string>();
    for (const user of users) {
      if (seen.has(user.username)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate username "${user.username}"`,
        });
      }
      seen.add(user.username);
    }
  });

// =============================================================================
// Portfolios
// =============================================================================

export const PortfoliosFileSchema: z.ZodType<PortfolioRecord[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    userId: z.number().int().positive(),
    balances: z.record(z.string().regex(CURRENCY_CODE), z.string().regex(DECIMAL)),
  }),
);

// =============================================================================
// Rates
// =============================================================================

/**
 * Rates are stored as decimal strings. Plain JSON numbers are accepted
 * as long as they print without an exponent.
 */
const RateValueSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const text = typeof value === "number" ? String(value) : value.trim();
  if (!DECIMAL.test(text) || ZERO.test(text)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `rate must be a positive decimal, got ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return text;
});

const RatePairSchema = z.object({
  rate: RateValueSchema,
  updated_at: z.string(),
  source: z.string().default("unknown"),
});

export const RatesFileSchema: z.ZodType<RateTable, z.ZodTypeDef, unknown> = z
  .object({
    pairs: z.record(z.string().regex(PAIR_KEY), RatePairSchema).default({}),
    last_refresh: z.string().nullable().default(null),
  })
  .transform((doc) => ({
    pairs: Object.entries(doc.pairs).map(([key, pair]) => {
      const [, from = "", to = ""] = PAIR_KEY.exec(key) ?? [];
      return {
        from,
        to,
        rate: pair.rate,
        updatedAt: pair.updated_at,
        source: pair.source,
      };
    }),
    lastRefresh: doc.last_refresh,
  }));
