/**
 * @fxwallet/cli — Interactive shell.
 *
 * Reads one command per line, runs it against the session and prints
 * the result. Domain failures are printed and the shell carries on;
 * only `exit` or the end of input stops it.
 */

import { createInterface } from "node:readline";
import type { Logger } from "pino";
import type { Session, WalletResult } from "@fxwallet/wallet";
import { CommandError, parseCommand } from "./commands.js";
import type { Command } from "./commands.js";
import { Formatter } from "./format.js";

export type Writer = (line: string) => void;

/** `failed` covers usage errors and domain failures alike. */
export type ShellOutcome = "ok" | "failed" | "exit";

export interface ShellOptions {
  readonly session: Session;
  readonly formatter?: Formatter | undefined;

  /** Receives each output line, without a trailing newline */
  readonly write?: Writer | undefined;

  /** Unexpected errors are logged here as well as printed */
  readonly logger?: Logger | undefined;
}

export class Shell {
  private readonly session: Session;
  private readonly format: Formatter;
  private readonly write: Writer;
  private readonly logger: Logger | undefined;

  constructor(options: ShellOptions) {
    this.session = options.session;
    this.format = options.formatter ?? new Formatter();
    this.write = options.write ?? ((line) => process.stdout.write(`${line}\n`));
    this.logger = options.logger;
  }

  get prompt(): string {
    const user = this.session.user;
    return user === undefined ? "fxwallet> " : `${user.username}@fxwallet> `;
  }

  /**
   * Run one command line (or pre-split words).
   */
  execute(input: string | readonly string[]): ShellOutcome {
    try {
      const command = parseCommand(input);
      if (command === null) {
        return "ok";
      }
      return this.dispatch(command);
    } catch (err) {
      if (err instanceof CommandError) {
        this.print(this.format.commandError(err));
        return "failed";
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger?.error({ err }, "Command failed unexpectedly");
      this.print([`Unexpected error: ${message}`]);
      return "failed";
    }
  }

  /**
   * Read commands until `exit` or end of input.
   */
  async run(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ): Promise<void> {
    const rl = createInterface({ input, output, terminal: false });
    this.print(["Type 'help' for the list of commands."]);
    output.write(this.prompt);

    // Leaving the loop closes the interface
    for await (const line of rl) {
      if (this.execute(line) === "exit") {
        break;
      }
      output.write(this.prompt);
    }
  }

  // ─── Dispatch ───────────────────────────────────────────────────────

  private dispatch(command: Command): ShellOutcome {
    const session = this.session;

    switch (command.name) {
      case "register":
        return this.report(session.register(command.username, command.password), (user) =>
          this.format.registered(user, session.baseCurrency),
        );
      case "login":
        return this.report(session.login(command.username, command.password), (user) =>
          this.format.loggedIn(user),
        );
      case "logout":
        return this.report(session.logout(), (user) => this.format.loggedOut(user));
      case "change_password":
        return this.report(
          session.changePassword(command.oldPassword, command.newPassword),
          () => this.format.passwordChanged(),
        );
      case "buy":
        return this.report(session.buy(command.currency, command.amount), (receipt) =>
          this.format.receipt(receipt),
        );
      case "sell":
        return this.report(session.sell(command.currency, command.amount), (receipt) =>
          this.format.receipt(receipt),
        );
      case "portfolio":
        return this.report(session.portfolio(command.base), (valuation) => [
          ...this.staleWarning(valuation.ratesUpdatedAt),
          ...this.format.valuation(valuation),
        ]);
      case "get_rate":
        return this.report(session.getRate(command.from, command.to), (quote) =>
          this.format.quote(quote),
        );
      case "show_rates":
        return this.report(
          session.listRates({ top: command.top, currency: command.currency }),
          (entries) => this.format.rates(entries),
        );
      case "history":
        return this.report(session.history(command.limit), (records) =>
          this.format.history(records),
        );
      case "currencies":
        this.print(this.format.currencies(session.currencies()));
        return "ok";
      case "help":
        this.print(this.format.help());
        return "ok";
      case "exit":
        this.print(["Bye."]);
        return "exit";
    }
  }

  private report<T>(result: WalletResult<T>, render: (value: T) => string[]): ShellOutcome {
    if (!result.ok) {
      this.print(this.format.walletError(result.error));
      return "failed";
    }
    this.print(render(result.value));
    return "ok";
  }

  private staleWarning(lastRefresh: string | null): string[] {
    return this.session.ratesAreStale() ? this.format.staleRates(lastRefresh) : [];
  }

  private print(lines: readonly string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }
}
