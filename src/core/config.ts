import { z } from "zod";
import { ConfigurationError } from "./errors";
import { LOG_LEVELS, clearModuleLogLevels, isLogLevel, setLogLevel } from "./logging";
import type { LogLevel } from "./logging";

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine(isLogLevel, { message: `Log level must be one of ${LOG_LEVELS.join(", ")}` });

const moduleLevelsSchema = z
  .string()
  .trim()
  .transform((raw, ctx) => {
    const modules: Record<string, LogLevel> = {};
    for (const pair of raw.split(",").map((part) => part.trim()).filter(Boolean)) {
      const [name, level] = pair.split("=").map((part) => part.trim());
      const normalized = level?.toLowerCase();
      if (!name || normalized === undefined || !isLogLevel(normalized)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid module log level "${pair}"` });
        return z.NEVER;
      }
      modules[name] = normalized;
    }
    return modules;
  });

export const geodesyEnvSchema = z.object({
  GEODESY_LOG_LEVEL: logLevelSchema.optional(),
  GEODESY_LOG_MODULES: moduleLevelsSchema.optional()
});

export interface GeodesyConfig {
  logLevel: LogLevel;
  moduleLogLevels: Record<string, LogLevel>;
}

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Reads `GEODESY_LOG_LEVEL` and `GEODESY_LOG_MODULES` (`module=level,...`) from `env`.
 */
export const parseGeodesyConfig = (env: Record<string, string | undefined>): GeodesyConfig => {
  const parsed = geodesyEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid geodesy configuration: ${issues.join("; ")}`, { issues });
  }
  const level = parsed.data.GEODESY_LOG_LEVEL;
  return {
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    moduleLogLevels: parsed.data.GEODESY_LOG_MODULES ?? {}
  };
};

export const applyGeodesyConfig = (config: GeodesyConfig): void => {
  setLogLevel(config.logLevel);
  clearModuleLogLevels();
  for (const [name, level] of Object.entries(config.moduleLogLevels)) {
    setLogLevel(level, name);
  }
};

export const loadGeodesyConfig = (env: Record<string, string | undefined> = process.env): GeodesyConfig => {
  const config = parseGeodesyConfig(env);
  applyGeodesyConfig(config);
  return config;
};
