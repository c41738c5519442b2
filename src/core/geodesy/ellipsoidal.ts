import { ConfigurationError } from "../errors";
import { toDegrees, toRadians } from "../math";
import { DATUMS, datumEquals } from "./datum";
import type { Datum } from "./datum";
import { eccentricitySquared, ellipsoidEquals } from "./ellipsoid";
import type { Ellipsoid } from "./ellipsoid";
import { convertGeocentric } from "./helmert";
import { cartesian, geographic } from "./position";
import type { CartesianPosition, GeographicPosition } from "./position";

export interface ReferenceFrameOptions {
  datum?: Datum;
  ellipsoid?: Ellipsoid;
}

export interface ReferenceFrame {
  /** Absent when only an ellipsoid was supplied, which rules out datum transforms. */
  datum?: Datum;
  ellipsoid: Ellipsoid;
}

/**
 * Resolves the datum/ellipsoid pair used by a computation, defaulting to WGS84.
 */
export const resolveReferenceFrame = ({ datum, ellipsoid }: ReferenceFrameOptions = {}): ReferenceFrame => {
  if (datum && ellipsoid && !ellipsoidEquals(datum.ellipsoid, ellipsoid)) {
    throw new ConfigurationError(`Datum ${datum.id} and ellipsoid ${ellipsoid.id} must be compatible`, {
      datum: datum.id,
      ellipsoid: ellipsoid.id
    });
  }
  if (datum) {
    return { datum, ellipsoid: datum.ellipsoid };
  }
  if (ellipsoid) {
    return { ellipsoid };
  }
  return { datum: DATUMS.WGS84, ellipsoid: DATUMS.WGS84.ellipsoid };
};

export const toGeocentric = (
  position: GeographicPosition,
  ellipsoid: Ellipsoid = DATUMS.WGS84.ellipsoid
): CartesianPosition => {
  const lat = toRadians(position.lat);
  const lon = toRadians(position.lon);
  const h = position.elev ?? 0;
  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const eSq = eccentricitySquared(ellipsoid);
  // radius of curvature in the prime vertical
  const nu = ellipsoid.a / Math.sqrt(1 - eSq * sinLat * sinLat);
  return cartesian(
    (nu + h) * cosLat * Math.cos(lon),
    (nu + h) * cosLat * Math.sin(lon),
    (nu * (1 - eSq) + h) * sinLat,
    position.m
  );
};

/**
 * Bowring's closed-form inverse using the parametric latitude; always returns an elevation.
 */
export const toGeographic = (
  position: CartesianPosition,
  ellipsoid: Ellipsoid = DATUMS.WGS84.ellipsoid
): GeographicPosition => {
  const { x, y } = position;
  const z = position.z ?? 0;
  const { a, b } = ellipsoid;
  const eSq = eccentricitySquared(ellipsoid);
  const epsilon2 = eSq / (1 - eSq);
  const p = Math.hypot(x, y);

  if (p === 0 && z !== 0) {
    // on the rotation axis the parametric latitude is undefined, the pole is not
    return geographic(0, z > 0 ? 90 : -90, Math.abs(z) - b, position.m);
  }

  const r = Math.hypot(p, z);
  const tanBeta = ((b * z) / (a * p)) * (1 + (epsilon2 * b) / r);
  const sinBeta = tanBeta / Math.sqrt(1 + tanBeta * tanBeta);
  const cosBeta = sinBeta / tanBeta;
  const lat = Number.isNaN(cosBeta)
    ? 0
    : Math.atan2(z + epsilon2 * b * sinBeta * sinBeta * sinBeta, p - eSq * a * cosBeta * cosBeta * cosBeta);
  const lon = Math.atan2(y, x);

  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const nu = a / Math.sqrt(1 - eSq * sinLat * sinLat);
  const h = p * cosLat + z * sinLat - (a * a) / nu;

  return geographic(toDegrees(lon), toDegrees(lat), h, position.m);
};

/**
 * Geographic datum conversion through geocentric coordinates. A 2D input stays 2D.
 */
export const convertGeographicAcrossDatums = (
  position: GeographicPosition,
  sourceDatum: Datum,
  targetDatum: Datum
): GeographicPosition => {
  if (datumEquals(sourceDatum, targetDatum)) {
    return position;
  }
  const source = toGeocentric(position, sourceDatum.ellipsoid);
  const target = toGeographic(convertGeocentric(source, sourceDatum, targetDatum), targetDatum.ellipsoid);
  return position.elev === undefined ? geographic(target.lon, target.lat, undefined, target.m) : target;
};
