/**
 * Pluggable logging
 *
 * Messages go to the console, tagged `[dagrad]`, until an application
 * installs its own sink with setLogger(). Call sites look the logger up
 * with getLogger() each time they log, never caching it at import.
 *
 * @module dagrad/core/logger
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/** Console sink used until setLogger() is called */
const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[dagrad] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[dagrad] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[dagrad] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[dagrad] ${msg}`, ...args),
};

/** Discards every message */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

let currentLogger: Logger = consoleLogger;

/** Logger that receives messages right now */
export function getLogger(): Logger {
  return currentLogger;
}

/** Route all messages to `logger` */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** Go back to the console sink */
export function resetLogger(): void {
  currentLogger = consoleLogger;
}
