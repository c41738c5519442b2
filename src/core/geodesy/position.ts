import { clampLatitude, wrapLongitude } from "../math";

/**
 * Geographic position in degrees (lon, lat) with optional elevation in metres and measure.
 */
export interface GeographicPosition {
  readonly lon: number;
  readonly lat: number;
  readonly elev?: number;
  readonly m?: number;
}

/**
 * Geocentric (ECEF) or projected cartesian position in metres with optional measure.
 */
export interface CartesianPosition {
  readonly x: number;
  readonly y: number;
  readonly z?: number;
  readonly m?: number;
}

/**
 * Builds a geographic position; lon is wrapped to [-180, 180) and lat clamped to [-90, 90].
 */
export const geographic = (lon: number, lat: number, elev?: number, m?: number): GeographicPosition => ({
  lon: wrapLongitude(lon),
  lat: clampLatitude(lat),
  ...(elev !== undefined ? { elev } : {}),
  ...(m !== undefined ? { m } : {})
});

export const cartesian = (x: number, y: number, z?: number, m?: number): CartesianPosition => ({
  x,
  y,
  ...(z !== undefined ? { z } : {}),
  ...(m !== undefined ? { m } : {})
});

export const geographicEquals = (a: GeographicPosition, b: GeographicPosition): boolean =>
  a.lon === b.lon && a.lat === b.lat && a.elev === b.elev && a.m === b.m;
