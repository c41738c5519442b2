import { DEG2RAD, RAD2DEG } from "./constants";

export const toRadians = (deg: number): number => deg * DEG2RAD;

export const toDegrees = (rad: number): number => rad * RAD2DEG;

/** Wraps a longitude into [-180, 180). */
export const wrapLongitude = (lon: number): number =>
  -180 <= lon && lon < 180 ? lon : ((((lon + 180) % 360) + 360) % 360) - 180;

export const clampLatitude = (lat: number): number => Math.min(90, Math.max(-90, lat));

/** Wraps a bearing into [0, 360). */
export const wrap360 = (deg: number): number => (0 <= deg && deg < 360 ? deg : ((deg % 360) + 360) % 360);

export const roundTo = (value: number, decimals: number): number => Number(value.toFixed(decimals));
