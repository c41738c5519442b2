export * from "./logger";
export * from "./logLevelConfig";
export * from "./types";
