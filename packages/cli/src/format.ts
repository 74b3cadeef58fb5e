/**
 * @fxwallet/cli — Terminal output.
 *
 * Every method returns the lines to print. Colour comes from the chalk
 * instance passed in, so tests can render plain text with `level: 0`.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type {
  Balances,
  CurrencyInfo,
  RateEntry,
  TransactionRecord,
  UserProfile,
} from "@fxwallet/types";
import type {
  RateQuote,
  TradeReceipt,
  Valuation,
  WalletError,
  WalletErrorCode,
} from "@fxwallet/wallet";
import { COMMANDS } from "./commands.js";
import type { CommandError } from "./commands.js";

export type Align = "left" | "right";

const ERROR_HINTS: Partial<Record<WalletErrorCode, string>> = {
  RATE_NOT_FOUND: "Type 'show_rates' to see the stored pairs.",
  UNKNOWN_CURRENCY: "Type 'currencies' to see the supported codes.",
  DUPLICATE_USER: "Choose another username, or log in.",
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Insert thousands separators into the integer part of a decimal string.
 *
 * groupThousands("10000.00") → "10,000.00"
 */
export function groupThousands(amount: string): string {
  const negative = amount.startsWith("-");
  const unsigned = negative ? amount.slice(1) : amount;
  const dot = unsigned.indexOf(".");
  const intPart = dot === -1 ? unsigned : unsigned.slice(0, dot);
  const fracPart = dot === -1 ? "" : unsigned.slice(dot);
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${negative ? "-" : ""}${grouped}${fracPart}`;
}

// =============================================================================
// Formatter
// =============================================================================

export class Formatter {
  private readonly c: ChalkInstance;

  constructor(chalkInstance: ChalkInstance = chalk) {
    this.c = chalkInstance;
  }

  /**
   * Render rows under a header, one space-padded column per cell.
   * Trailing whitespace is trimmed.
   */
  table(
    headers: readonly string[],
    rows: readonly (readonly string[])[],
    align: readonly Align[] = [],
  ): string[] {
    const widths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((row) => (row[i] ?? "").length)),
    );
    const pad = (text: string, i: number): string => {
      const width = widths[i] ?? text.length;
      return align[i] === "right" ? text.padStart(width) : text.padEnd(width);
    };

    const lines = [
      headers.map((h, i) => this.c.bold(pad(h, i))).join("  "),
      widths.map((w) => this.c.gray("─".repeat(w))).join("  "),
      ...rows.map((row) => headers.map((_, i) => pad(row[i] ?? "", i)).join("  ")),
    ];
    return lines.map((line) => line.trimEnd());
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  registered(user: UserProfile, baseCurrency: string): string[] {
    return [
      this.c.green(`Registered '${user.username}' (id ${String(user.id)}) with an empty ${baseCurrency} wallet.`),
      `Log in with: login ${user.username} <password>`,
    ];
  }

  loggedIn(user: UserProfile): string[] {
    return [this.c.green(`Logged in as '${user.username}' (id ${String(user.id)}).`)];
  }

  loggedOut(user: UserProfile): string[] {
    return [`Logged out '${user.username}'.`];
  }

  passwordChanged(): string[] {
    return [this.c.green("Password changed.")];
  }

  // ─── Trades ─────────────────────────────────────────────────────────

  receipt(receipt: TradeReceipt): string[] {
    const amount = `${groupThousands(receipt.amount)} ${receipt.currency}`;
    const value = `${groupThousands(receipt.baseAmount)} ${receipt.baseCurrency}`;

    let title: string;
    if (receipt.rate === null) {
      title = receipt.action === "buy" ? `Deposited ${amount}.` : `Withdrew ${amount}.`;
    } else {
      const price = `${receipt.rate} ${receipt.baseCurrency}/${receipt.currency}`;
      title = receipt.action === "buy"
        ? `Bought ${amount} for ${value} at ${price}.`
        : `Sold ${amount} for ${value} at ${price}.`;
    }

    return [
      this.c.green(title),
      "Portfolio changes:",
      ...balanceChanges(receipt.before, receipt.after),
      this.c.gray(`Transaction ${receipt.transactionId}`),
    ];
  }

  valuation(valuation: Valuation): string[] {
    const base = valuation.baseCurrency;
    const rows = valuation.lines.map((line) => [
      line.currency,
      groupThousands(line.amount),
      groupThousands(line.converted),
      line.rate ?? "-",
    ]);

    return [
      this.c.bold(`Portfolio of '${valuation.user.username}' (base: ${base})`),
      this.c.gray(`Rates updated: ${valuation.ratesUpdatedAt ?? "unknown"}`),
      "",
      ...this.table(["Currency", "Balance", `Value (${base})`, "Rate"], rows, [
        "left",
        "right",
        "right",
        "right",
      ]),
      "",
      this.c.bold(`Total: ${groupThousands(valuation.total)} ${base}`),
    ];
  }

  history(records: readonly TransactionRecord[]): string[] {
    if (records.length === 0) {
      return ["No transactions yet."];
    }
    const rows = records.map((r) => [
      r.timestamp,
      r.action,
      `${groupThousands(r.amount)} ${r.currency}`,
      `${groupThousands(r.baseAmount)} ${r.baseCurrency}`,
      r.rate ?? "-",
    ]);
    return this.table(["Time", "Action", "Amount", "Value", "Rate"], rows, [
      "left",
      "left",
      "right",
      "right",
      "right",
    ]);
  }

  // ─── Reference data ─────────────────────────────────────────────────

  quote(quote: RateQuote): string[] {
    const lines = [
      this.c.bold(`${quote.from}→${quote.to}: ${quote.rate}`),
      `Updated: ${quote.updatedAt}`,
      `Source: ${quote.source}`,
    ];
    if (!quote.direct) {
      lines.push(this.c.gray(`Derived from the ${quote.to}→${quote.from} rate`));
    }
    return lines;
  }

  rates(entries: readonly RateEntry[]): string[] {
    if (entries.length === 0) {
      return ["No rates stored."];
    }
    const rows = entries.map((e) => [`${e.from}_${e.to}`, e.rate, e.updatedAt, e.source]);
    return this.table(["Pair", "Rate", "Updated", "Source"], rows, [
      "left",
      "right",
      "left",
      "left",
    ]);
  }

  currencies(list: readonly CurrencyInfo[]): string[] {
    const rows = list.map((info) => [
      info.code,
      info.name,
      info.kind,
      String(info.decimals),
      info.issuingCountry ?? info.algorithm ?? "",
    ]);
    return this.table(["Code", "Name", "Kind", "Decimals", "Details"], rows, [
      "left",
      "left",
      "left",
      "right",
      "left",
    ]);
  }

  help(): string[] {
    const width = Math.max(...COMMANDS.map((c) => c.usage.length));
    return [
      "Commands:",
      ...COMMANDS.map((c) => `  ${c.usage.padEnd(width)}  ${c.summary}`),
    ];
  }

  // ─── Problems ───────────────────────────────────────────────────────

  walletError(error: WalletError): string[] {
    const lines = [this.c.red(`Error: ${error.message}`)];
    const hint = ERROR_HINTS[error.code];
    if (hint !== undefined) {
      lines.push(this.c.gray(hint));
    }
    return lines;
  }

  commandError(error: CommandError): string[] {
    return [this.c.red(error.message)];
  }

  staleRates(lastRefresh: string | null): string[] {
    return [
      this.c.yellow(
        `Warning: exchange rates were last refreshed ${lastRefresh ?? "never"}; values may be out of date.`,
      ),
    ];
  }
}

/**
 * One line per currency whose balance changed, in the order of `after`.
 */
function balanceChanges(before: Balances, after: Balances): string[] {
  const lines: string[] = [];
  for (const [currency, next] of Object.entries(after)) {
    const previous = before[currency];
    if (previous === next) continue;
    lines.push(`  ${currency}: ${groupThousands(previous ?? "0")} → ${groupThousands(next)}`);
  }
  return lines;
}
