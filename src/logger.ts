import { pino, type Logger } from "pino";

export type { Logger };

let baseLogger: Logger | undefined;

/**
 * Library-wide logger. Silent unless CHANGE_CACHE_LOG_LEVEL says otherwise.
 */
export function getLogger(): Logger {
  baseLogger ??= pino({
    name: "change-data-cache",
    level: process.env.CHANGE_CACHE_LOG_LEVEL ?? "silent",
  });
  return baseLogger;
}

export function createLogger(module: string, parent: Logger = getLogger()): Logger {
  return parent.child({ module });
}
