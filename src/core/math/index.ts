export * from "./angles";
export * from "./constants";
