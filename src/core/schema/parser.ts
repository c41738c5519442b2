import { FormatError, attempt } from "../errors";
import type { Result } from "../errors";
import { DATUMS, ELLIPSOIDS, cartesian, createDatum, createEllipsoid, geographic } from "../geodesy";
import type { CartesianPosition, Datum, DatumName, Ellipsoid, EllipsoidName, GeographicPosition } from "../geodesy";
import type { PositionRecord } from "./types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const ensureRecord = (value: unknown, path: string): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new FormatError(`${path} must be an object`);
  }
  return value;
};

const ensureFiniteNumber = (value: unknown, path: string): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new FormatError(`${path} must be numeric`);
  }
  return value;
};

const ensureOptionalFiniteNumber = (value: unknown, path: string): number | undefined =>
  value === undefined ? undefined : ensureFiniteNumber(value, path);

const ensureNonEmptyString = (value: unknown, path: string): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new FormatError(`${path} must be a non-empty string`);
  }
  return value;
};

const ensureNumberArray = (value: unknown, length: number, path: string): number[] => {
  if (!Array.isArray(value) || value.length !== length) {
    throw new FormatError(`${path} must be an array of ${length} numbers`);
  }
  return value.map((item: unknown, i) => ensureFiniteNumber(item, `${path}[${i}]`));
};

const isEllipsoidName = (value: string): value is EllipsoidName => Object.hasOwn(ELLIPSOIDS, value);

const isDatumName = (value: string): value is DatumName => Object.hasOwn(DATUMS, value);

export const parseGeographicPosition = (raw: unknown, path = "position"): GeographicPosition => {
  const obj = ensureRecord(raw, path);
  const lat = ensureFiniteNumber(obj.lat, `${path}.lat`);
  return geographic(
    ensureFiniteNumber(obj.lon, `${path}.lon`),
    lat,
    ensureOptionalFiniteNumber(obj.elev, `${path}.elev`),
    ensureOptionalFiniteNumber(obj.m, `${path}.m`)
  );
};

export const parseCartesianPosition = (raw: unknown, path = "position"): CartesianPosition => {
  const obj = ensureRecord(raw, path);
  return cartesian(
    ensureFiniteNumber(obj.x, `${path}.x`),
    ensureFiniteNumber(obj.y, `${path}.y`),
    ensureOptionalFiniteNumber(obj.z, `${path}.z`),
    ensureOptionalFiniteNumber(obj.m, `${path}.m`)
  );
};

/**
 * Accepts a catalog name (`"Airy1830"`) or `{ id, name?, a, b, f? }`.
 */
export const parseEllipsoid = (raw: unknown, path = "ellipsoid"): Ellipsoid => {
  if (typeof raw === "string") {
    if (!isEllipsoidName(raw)) {
      throw new FormatError(`${path} must be one of ${Object.keys(ELLIPSOIDS).join("|")}`, raw);
    }
    return ELLIPSOIDS[raw];
  }
  const obj = ensureRecord(raw, path);
  return createEllipsoid({
    id: ensureNonEmptyString(obj.id, `${path}.id`),
    name: obj.name === undefined ? undefined : ensureNonEmptyString(obj.name, `${path}.name`),
    a: ensureFiniteNumber(obj.a, `${path}.a`),
    b: ensureFiniteNumber(obj.b, `${path}.b`),
    f: ensureOptionalFiniteNumber(obj.f, `${path}.f`)
  });
};

/**
 * Accepts a catalog name (`"OSGB36"`) or `{ id, ellipsoid, helmertParams: [tx, ty, tz, s, rx, ry, rz] }`.
 */
export const parseDatum = (raw: unknown, path = "datum"): Datum => {
  if (typeof raw === "string") {
    if (!isDatumName(raw)) {
      throw new FormatError(`${path} must be one of ${Object.keys(DATUMS).join("|")}`, raw);
    }
    return DATUMS[raw];
  }
  const obj = ensureRecord(raw, path);
  return createDatum({
    id: ensureNonEmptyString(obj.id, `${path}.id`),
    ellipsoid: parseEllipsoid(obj.ellipsoid, `${path}.ellipsoid`),
    helmertParams: ensureNumberArray(obj.helmertParams, 7, `${path}.helmertParams`)
  });
};

export const parsePositionRecord = (raw: unknown, path = "record"): PositionRecord => {
  const obj = ensureRecord(raw, path);
  const id = obj.id === undefined ? undefined : ensureNonEmptyString(obj.id, `${path}.id`);
  const datum = obj.datum === undefined ? DATUMS.WGS84 : parseDatum(obj.datum, `${path}.datum`);

  if (obj.lon !== undefined || obj.lat !== undefined) {
    return { kind: "geographic", id, datum, position: parseGeographicPosition(obj, path) };
  }
  if (obj.x !== undefined || obj.y !== undefined) {
    return { kind: "cartesian", id, datum, position: parseCartesianPosition(obj, path) };
  }
  throw new FormatError(`${path} must have lon/lat or x/y coordinates`);
};

export const tryParsePositionRecord = (raw: unknown): Result<PositionRecord> =>
  attempt(() => parsePositionRecord(raw));
