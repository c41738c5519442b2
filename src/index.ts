export * from "./core/config";
export * from "./core/errors";
export * from "./core/geodesy";
export * from "./core/logging";
export * from "./core/schema";
export * from "./io/positionStream";
export { roundTo, toDegrees, toRadians, wrap360, wrapLongitude } from "./core/math";
