/**
 * @fxwallet/cli — Entry point.
 *
 * Loads config, opens the data directory and the journal, builds the
 * wallet and runs the shell. With arguments, runs that one command
 * and exits with 0 on success or 1 on failure.
 */

import { join } from "node:path";
import { JsonFilePersistence, JsonlTransactionJournal } from "@fxwallet/store";
import { createWallet } from "@fxwallet/wallet";
import { loadConfig } from "./config.js";
import { Formatter } from "./format.js";
import { createActionLogger, createLogger } from "./logger.js";
import { Shell } from "./shell.js";

export const JOURNAL_FILE = "transactions.jsonl";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(argv: readonly string[]): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config);

  const wallet = createWallet({
    persistence: new JsonFilePersistence(config.DATA_DIR),
    journal: new JsonlTransactionJournal({ filePath: join(config.DATA_DIR, JOURNAL_FILE) }),
    baseCurrency: config.BASE_CURRENCY,
    ratesTtlSeconds: config.RATES_TTL_SECONDS,
    onAction: createActionLogger(logger),
  });

  const formatter = new Formatter();
  const shell = new Shell({ session: wallet.session, formatter, logger });

  logger.info(
    {
      dataDir: config.DATA_DIR,
      baseCurrency: config.BASE_CURRENCY,
      users: wallet.users.size,
      rates: wallet.rates.size,
    },
    "Wallet opened",
  );

  if (wallet.rates.isStale()) {
    logger.warn(
      { lastRefresh: wallet.rates.lastRefresh, ttlSeconds: config.RATES_TTL_SECONDS },
      "Exchange rates are stale",
    );
    for (const line of formatter.staleRates(wallet.rates.lastRefresh)) {
      process.stderr.write(`${line}\n`);
    }
  }

  if (argv.length > 0) {
    return shell.execute(argv) === "failed" ? 1 : 0;
  }

  await shell.run();
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
