export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "none";

export type EmittedLogLevel = Exclude<LogLevel, "none">;

export interface LogEntry {
  timestamp: string;
  level: EmittedLogLevel;
  source: string;
  message: string;
  data?: unknown;
}

export interface LogAdapter {
  log(entry: LogEntry): void;
}

export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}
