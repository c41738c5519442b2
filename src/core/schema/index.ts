export * from "./parser";
export * from "./types";
