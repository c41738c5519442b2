import type { LogLevel } from "./types";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "none"];

const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5
};

interface LogLevelConfig {
  global: LogLevel;
  modules: Record<string, LogLevel>;
}

const defaultConfig = (): LogLevelConfig => ({ global: "warn", modules: {} });

let config: LogLevelConfig = defaultConfig();

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const getLogLevel = (moduleName?: string): LogLevel => {
  if (moduleName !== undefined) {
    const moduleLevel = config.modules[moduleName];
    if (moduleLevel !== undefined) {
      return moduleLevel;
    }
  }
  return config.global;
};

export const setLogLevel = (level: LogLevel, moduleName?: string): void => {
  if (moduleName !== undefined) {
    config.modules[moduleName] = level;
  } else {
    config.global = level;
  }
};

export const clearModuleLogLevels = (): void => {
  config.modules = {};
};

export const resetLogLevels = (): void => {
  config = defaultConfig();
};

export const isLogLevelEnabled = (moduleName: string, level: LogLevel): boolean =>
  level !== "none" && LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[getLogLevel(moduleName)];

export const getLogLevelConfig = (): LogLevelConfig => ({ ...config, modules: { ...config.modules } });
