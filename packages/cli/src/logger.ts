/**
 * @fxwallet/cli — Action logging.
 *
 * JSON lines go to LOG_FILE so they never interleave with the shell
 * output. In development the same file receives pino-pretty output.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ActionHook, ActionLogEntry } from "@fxwallet/wallet";
import type { AppConfig } from "./config.js";

export type LoggerConfig = Pick<AppConfig, "LOG_FILE" | "LOG_LEVEL" | "NODE_ENV">;

export function createLogger(config: LoggerConfig): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: { destination: config.LOG_FILE, mkdir: true, colorize: false },
      },
    });
  }

  return pino(
    { level: config.LOG_LEVEL },
    pino.destination({ dest: config.LOG_FILE, mkdir: true, sync: true }),
  );
}

/**
 * Route wallet action entries to the logger:
 * `info` on success, `warn` on a domain failure, `error` otherwise.
 */
export function createActionLogger(logger: Logger): ActionHook {
  return (entry: ActionLogEntry) => {
    const fields = {
      ...entry.details,
      action: entry.action,
      actor: entry.actor,
      outcome: entry.outcome,
      code: entry.code,
      durationMs: entry.durationMs,
    };
    const msg = `${entry.action} ${entry.outcome}`;

    switch (entry.outcome) {
      case "success":
        logger.info(fields, msg);
        break;
      case "failure":
        logger.warn({ ...fields, reason: entry.message }, msg);
        break;
      case "error":
        logger.error({ ...fields, reason: entry.message }, msg);
        break;
    }
  };
}
