import { isLogLevelEnabled } from "./logLevelConfig";
import type { EmittedLogLevel, LogAdapter, LogEntry, Logger } from "./types";

/* eslint-disable no-console */
export const consoleAdapter: LogAdapter = {
  log(entry: LogEntry): void {
    const line = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.source}: ${entry.message}`;
    const args = entry.data === undefined ? [line] : [line, entry.data];
    switch (entry.level) {
      case "error":
        console.error(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "info":
        console.info(...args);
        break;
      default:
        console.debug(...args);
    }
  }
};
/* eslint-enable no-console */

let adapters: LogAdapter[] = [consoleAdapter];

export const setLogAdapters = (next: LogAdapter[]): void => {
  adapters = [...next];
};

export const getLogAdapters = (): readonly LogAdapter[] => adapters;

export const resetLogAdapters = (): void => {
  adapters = [consoleAdapter];
};

const emit = (source: string, level: EmittedLogLevel, message: string, data?: unknown): void => {
  if (!isLogLevelEnabled(source, level)) {
    return;
  }
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, source, message, data };
  for (const adapter of adapters) {
    adapter.log(entry);
  }
};

/**
 * Returns a logger bound to `source`. Level checks happen per call, so level changes made after
 * creation take effect immediately.
 */
export const createLogger = (source: string): Logger => ({
  trace: (message, data) => emit(source, "trace", message, data),
  debug: (message, data) => emit(source, "debug", message, data),
  info: (message, data) => emit(source, "info", message, data),
  warn: (message, data) => emit(source, "warn", message, data),
  error: (message, data) => emit(source, "error", message, data)
});
