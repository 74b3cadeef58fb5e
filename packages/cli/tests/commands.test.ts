/**
 * Tests for the tokenizer and command parser.
 */

import { describe, it, expect } from "vitest";
import { CommandError, parseCommand, tokenize } from "../src/commands.js";

function parseError(input: string): CommandError | undefined {
  try {
    parseCommand(input);
  } catch (err) {
    if (err instanceof CommandError) return err;
    throw err;
  }
  return undefined;
}

// =============================================================================
// tokenize
// =============================================================================

describe("tokenize", () => {
  it("splits on whitespace", () => {
    expect(tokenize("  buy   BTC\t0.05 ")).toEqual(["buy", "BTC", "0.05"]);
  });

  it("returns nothing for a blank line", () => {
    expect(tokenize("   ")).toEqual([]);
  });

  it("groups quoted words", () => {
    expect(tokenize(`register "john doe" 'p w'`)).toEqual(["register", "john doe", "p w"]);
  });

  it("keeps an empty quoted word", () => {
    expect(tokenize('login alice ""')).toEqual(["login", "alice", ""]);
  });

  it("joins quotes inside a word", () => {
    expect(tokenize('a"b c"d')).toEqual(["ab cd"]);
  });

  it("keeps the other quote inside a quoted word", () => {
    expect(tokenize(`"it's"`)).toEqual(["it's"]);
  });

  it("rejects an unterminated quote", () => {
    expect(() => tokenize('login "alice')).toThrow(CommandError);
  });
});

// =============================================================================
// parseCommand
// =============================================================================

describe("parseCommand", () => {
  it("returns null for blank input", () => {
    expect(parseCommand("")).toBeNull();
    expect(parseCommand([])).toBeNull();
  });

  it("parses account commands", () => {
    expect(parseCommand("register alice 1234")).toEqual({
      name: "register",
      username: "alice",
      password: "1234",
    });
    expect(parseCommand("login alice 1234")).toEqual({
      name: "login",
      username: "alice",
      password: "1234",
    });
    expect(parseCommand("change_password 1234 5678")).toEqual({
      name: "change_password",
      oldPassword: "1234",
      newPassword: "5678",
    });
    expect(parseCommand("logout")).toEqual({ name: "logout" });
  });

  it("matches command names case-insensitively and keeps arguments verbatim", () => {
    expect(parseCommand("BUY btc 0.05")).toEqual({
      name: "buy",
      currency: "btc",
      amount: "0.05",
    });
  });

  it("parses trades and rate lookups", () => {
    expect(parseCommand("sell ETH 0.5")).toEqual({ name: "sell", currency: "ETH", amount: "0.5" });
    expect(parseCommand("get_rate USD BTC")).toEqual({ name: "get_rate", from: "USD", to: "BTC" });
  });

  it("parses options with a separate value", () => {
    expect(parseCommand("show_rates --top 3 --currency BTC")).toEqual({
      name: "show_rates",
      top: 3,
      currency: "BTC",
    });
  });

  it("parses options with an inline value", () => {
    expect(parseCommand("show_rates --top=5")).toEqual({ name: "show_rates", top: 5 });
    expect(parseCommand("portfolio --base=EUR")).toEqual({ name: "portfolio", base: "EUR" });
  });

  it("leaves options out when absent", () => {
    expect(parseCommand("portfolio")).toEqual({ name: "portfolio" });
    expect(parseCommand("history")).toEqual({ name: "history" });
  });

  it("passes non-numeric limits through for validation", () => {
    const command = parseCommand("history --limit many");
    expect(command?.name).toBe("history");
    expect(command?.name === "history" && Number.isNaN(command.limit)).toBe(true);
  });

  it("accepts words split by the caller", () => {
    expect(parseCommand(["register", "john doe", "pw12"])).toEqual({
      name: "register",
      username: "john doe",
      password: "pw12",
    });
  });

  it("resolves aliases", () => {
    expect(parseCommand("quit")).toEqual({ name: "exit" });
    expect(parseCommand("?")).toEqual({ name: "help" });
    expect(parseCommand("rates --top 1")).toEqual({ name: "show_rates", top: 1 });
  });

  it("rejects unknown commands", () => {
    const err = parseError("fly me");
    expect(err?.code).toBe("UNKNOWN_COMMAND");
    expect(err?.message).toBe("Unknown command 'fly'. Type 'help' for a list.");
  });

  it("rejects the wrong number of arguments with the usage line", () => {
    expect(parseError("buy BTC")?.message).toBe("Usage: buy <CODE> <amount>");
    expect(parseError("logout now")?.message).toBe("Usage: logout");
    expect(parseError("register a b c")?.code).toBe("USAGE");
  });

  it("rejects unknown, repeated and valueless options", () => {
    expect(parseError("portfolio --top 3")?.message).toBe("Usage: portfolio [--base CODE]");
    expect(parseError("show_rates --top 1 --top 2")?.code).toBe("USAGE");
    expect(parseError("show_rates --top")?.code).toBe("USAGE");
    expect(parseError("history 5")?.code).toBe("USAGE");
  });

  it("reports syntax errors", () => {
    expect(parseError("login 'alice")?.code).toBe("SYNTAX");
  });
});
