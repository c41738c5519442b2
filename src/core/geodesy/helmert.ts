import { ARCSEC2RAD } from "../math";
import { datumEquals, isWgs84 } from "./datum";
import type { Datum, HelmertParams } from "./datum";
import { cartesian } from "./position";
import type { CartesianPosition } from "./position";

type Vec3 = readonly [number, number, number];

/** ka·a + kb·b */
const combine = (a: Vec3, ka: number, b: Vec3, kb: number): Vec3 => [
  ka * a[0] + kb * b[0],
  ka * a[1] + kb * b[1],
  ka * a[2] + kb * b[2]
];

const dot = (a: Vec3, b: Vec3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

const cross = (a: Vec3, b: Vec3): Vec3 => [
  a[1] * b[2] - a[2] * b[1],
  a[2] * b[0] - a[0] * b[2],
  a[0] * b[1] - a[1] * b[0]
];

interface HelmertTerms {
  translation: Vec3;
  scale: number;
  rotation: Vec3;
}

const helmertTerms = ([tx, ty, tz, s, rx, ry, rz]: HelmertParams): HelmertTerms => ({
  translation: [tx, ty, tz],
  scale: 1 + s / 1e6,
  rotation: [rx * ARCSEC2RAD, ry * ARCSEC2RAD, rz * ARCSEC2RAD]
});

const toVec3 = (position: CartesianPosition): Vec3 => [position.x, position.y, position.z ?? 0];

/**
 * Small-angle 7-parameter Helmert transform: v' = t + (1 + s·1e-6)·v + r × v.
 */
export const applyHelmert = (position: CartesianPosition, params: HelmertParams): CartesianPosition => {
  const { translation, scale, rotation } = helmertTerms(params);
  const v = toVec3(position);
  const [x, y, z] = combine(combine(translation, 1, v, scale), 1, cross(rotation, v), 1);
  return cartesian(x, y, z, position.m);
};

/**
 * Exact inverse of {@link applyHelmert} for the same parameters. With M = k·I + [r]×, the
 * inverse is M⁻¹ = (k²·I + r·rᵀ − k·[r]×) / (k·(k² + |r|²)), applied to v' − t.
 */
export const applyInverseHelmert = (position: CartesianPosition, params: HelmertParams): CartesianPosition => {
  const { translation, scale: k, rotation: r } = helmertTerms(params);
  const w = combine(toVec3(position), 1, translation, -1);
  const numerator = combine(combine(w, k * k, r, dot(r, w)), 1, cross(r, w), -k);
  const d = k * (k * k + dot(r, r));
  return cartesian(numerator[0] / d, numerator[1] / d, numerator[2] / d, position.m);
};

/**
 * Converts a geocentric position between datums. Catalog transforms are WGS84 -> datum, so any
 * other pair pivots through WGS84.
 */
export const convertGeocentric = (
  position: CartesianPosition,
  sourceDatum: Datum,
  targetDatum: Datum
): CartesianPosition => {
  if (datumEquals(sourceDatum, targetDatum)) {
    return position;
  }
  if (isWgs84(sourceDatum)) {
    return applyHelmert(position, targetDatum.helmertParams);
  }
  const wgs84 = applyInverseHelmert(position, sourceDatum.helmertParams);
  if (isWgs84(targetDatum)) {
    return wgs84;
  }
  return applyHelmert(wgs84, targetDatum.helmertParams);
};
