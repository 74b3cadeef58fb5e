/**
 * @fxwallet/cli — Command parsing.
 *
 * A line is split into words (single or double quotes group words),
 * the first word selects the command and the rest are its arguments.
 * Options take the form `--name value` or `--name=value`.
 */

// =============================================================================
// Types
// =============================================================================

export type Command =
  | { readonly name: "register"; readonly username: string; readonly password: string }
  | { readonly name: "login"; readonly username: string; readonly password: string }
  | { readonly name: "logout" }
  | { readonly name: "portfolio"; readonly base?: string | undefined }
  | { readonly name: "buy"; readonly currency: string; readonly amount: string }
  | { readonly name: "sell"; readonly currency: string; readonly amount: string }
  | { readonly name: "get_rate"; readonly from: string; readonly to: string }
  | {
      readonly name: "show_rates";
      readonly top?: number | undefined;
      readonly currency?: string | undefined;
    }
  | { readonly name: "history"; readonly limit?: number | undefined }
  | {
      readonly name: "change_password";
      readonly oldPassword: string;
      readonly newPassword: string;
    }
  | { readonly name: "currencies" }
  | { readonly name: "help" }
  | { readonly name: "exit" };

export type CommandName = Command["name"];

export type CommandErrorCode = "SYNTAX" | "UNKNOWN_COMMAND" | "USAGE";

export class CommandError extends Error {
  public readonly code: CommandErrorCode;

  constructor(code: CommandErrorCode, message: string) {
    super(message);
    this.name = "CommandError";
    this.code = code;
  }
}

export interface CommandHelp {
  readonly name: CommandName;
  readonly usage: string;
  readonly summary: string;
}

/** Help table, in display order. */
export const COMMANDS: readonly CommandHelp[] = [
  { name: "register", usage: "register <username> <password>", summary: "Create an account" },
  { name: "login", usage: "login <username> <password>", summary: "Log in" },
  { name: "logout", usage: "logout", summary: "Log out" },
  { name: "portfolio", usage: "portfolio [--base CODE]", summary: "Value your holdings" },
  { name: "buy", usage: "buy <CODE> <amount>", summary: "Buy a currency with the base currency" },
  { name: "sell", usage: "sell <CODE> <amount>", summary: "Sell a currency for the base currency" },
  { name: "get_rate", usage: "get_rate <FROM> <TO>", summary: "Show one exchange rate" },
  {
    name: "show_rates",
    usage: "show_rates [--top N] [--currency CODE]",
    summary: "List stored exchange rates",
  },
  { name: "history", usage: "history [--limit N]", summary: "List your trades, newest first" },
  {
    name: "change_password",
    usage: "change_password <old> <new>",
    summary: "Change your password",
  },
  { name: "currencies", usage: "currencies", summary: "List supported currencies" },
  { name: "help", usage: "help", summary: "Show this help" },
  { name: "exit", usage: "exit", summary: "Leave the shell" },
];

const ALIASES: Readonly<Record<string, CommandName>> = {
  quit: "exit",
  "?": "help",
  rates: "show_rates",
};

// =============================================================================
// Tokenizer
// =============================================================================

/**
 * Split a line into words. Quotes group words and are removed;
 * `""` yields an empty word.
 */
export function tokenize(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (const ch of line) {
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new CommandError("SYNTAX", `Unterminated ${quote} quote`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse one input line, or words already split by the caller's shell.
 * Returns null for blank input.
 *
 * @throws {CommandError} on a syntax error, unknown command or bad usage
 */
export function parseCommand(input: string | readonly string[]): Command | null {
  const words = typeof input === "string" ? tokenize(input) : input;
  const [head, ...rest] = words;
  if (head === undefined) {
    return null;
  }

  const lowered = head.toLowerCase();
  const name = ALIASES[lowered] ?? COMMANDS.find((c) => c.name === lowered)?.name;
  if (name === undefined) {
    throw new CommandError("UNKNOWN_COMMAND", `Unknown command '${head}'. Type 'help' for a list.`);
  }

  switch (name) {
    case "register":
    case "login": {
      const [username, password] = positional(name, rest, 2);
      return { name, username, password };
    }
    case "buy":
    case "sell": {
      const [currency, amount] = positional(name, rest, 2);
      return { name, currency, amount };
    }
    case "get_rate": {
      const [from, to] = positional(name, rest, 2);
      return { name, from, to };
    }
    case "change_password": {
      const [oldPassword, newPassword] = positional(name, rest, 2);
      return { name, oldPassword, newPassword };
    }
    case "portfolio": {
      const options = withOptions(name, rest, ["base"]);
      return { name, base: options.get("base") };
    }
    case "show_rates": {
      const options = withOptions(name, rest, ["top", "currency"]);
      return {
        name,
        top: integerOption(options.get("top")),
        currency: options.get("currency"),
      };
    }
    case "history": {
      const options = withOptions(name, rest, ["limit"]);
      return { name, limit: integerOption(options.get("limit")) };
    }
    case "logout":
    case "currencies":
    case "help":
    case "exit":
      positional(name, rest, 0);
      return { name };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function usageError(name: CommandName): CommandError {
  const usage = COMMANDS.find((c) => c.name === name)?.usage ?? name;
  return new CommandError("USAGE", `Usage: ${usage}`);
}

function positional(name: CommandName, args: readonly string[], count: 0): [];
function positional(name: CommandName, args: readonly string[], count: 2): [string, string];
function positional(name: CommandName, args: readonly string[], count: number): string[] {
  if (args.length !== count) {
    throw usageError(name);
  }
  return [...args];
}

function withOptions(
  name: CommandName,
  args: readonly string[],
  allowed: readonly string[],
): ReadonlyMap<string, string> {
  const options = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      throw usageError(name);
    }

    const eq = arg.indexOf("=");
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!allowed.includes(key) || options.has(key)) {
      throw usageError(name);
    }

    if (eq !== -1) {
      options.set(key, arg.slice(eq + 1));
    } else {
      const value = args[i + 1];
      if (value === undefined) {
        throw usageError(name);
      }
      options.set(key, value);
      i++;
    }
  }

  return options;
}

/** Integer range checks are left to the wallet service. */
function integerOption(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}
