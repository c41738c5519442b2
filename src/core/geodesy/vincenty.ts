import { ConvergenceError, InvalidParameterError, attempt } from "../errors";
import type { Result } from "../errors";
import { createLogger } from "../logging";
import { DOUBLE_EPSILON, toDegrees, toRadians, wrap360 } from "../math";
import { resolveReferenceFrame } from "./ellipsoidal";
import type { ReferenceFrameOptions } from "./ellipsoidal";
import type { Ellipsoid } from "./ellipsoid";
import { geographic } from "./position";
import type { GeographicPosition } from "./position";

const logger = createLogger("vincenty");

const INVERSE_MAX_ITERATIONS = 1000;
const DIRECT_MAX_ITERATIONS = 100;
const TOLERANCE = 1e-12;

/**
 * A geodesic between two points; bearings are degrees in [0, 360), NaN where undefined.
 */
export interface GeodeticArcSegment {
  readonly origin: GeographicPosition;
  readonly destination: GeographicPosition;
  /** Metres along the ellipsoid. */
  readonly distance: number;
  readonly initialBearing: number;
  readonly finalBearing: number;
  readonly iterations: number;
}

export type VincentyOptions = ReferenceFrameOptions;

interface ReducedLatitude {
  sinU: number;
  cosU: number;
  tanU: number;
}

const reducedLatitude = (lat: number, f: number): ReducedLatitude => {
  const tanU = (1 - f) * Math.tan(toRadians(lat));
  const cosU = 1 / Math.sqrt(1 + tanU * tanU);
  return { sinU: tanU * cosU, cosU, tanU };
};

const seriesA = (uSq: number): number => 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));

const seriesB = (uSq: number): number => (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));

const deltaSigma = (B: number, sinSigma: number, cosSigma: number, cos2SigmaM: number): number =>
  B *
  sinSigma *
  (cos2SigmaM +
    (B / 4) *
      (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
        (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaM * cos2SigmaM)));

const inverse = (
  origin: GeographicPosition,
  destination: GeographicPosition,
  ellipsoid: Ellipsoid
): GeodeticArcSegment => {
  const { a, b, f } = ellipsoid;
  const L = toRadians(destination.lon - origin.lon);
  const p1 = reducedLatitude(origin.lat, f);
  const p2 = reducedLatitude(destination.lat, f);

  const antipodal = Math.abs(L) > Math.PI / 2 || Math.abs(toRadians(destination.lat - origin.lat)) > Math.PI / 2;

  let lambda = L;
  let sinLambda = 0;
  let cosLambda = 1;
  let sigma = antipodal ? Math.PI : 0;
  let sinSigma = 0;
  let cosSigma = antipodal ? -1 : 1;
  let sinSqSigma = 0;
  let cos2SigmaM = 1;
  let cosSqAlpha = 1;
  let iterations = 0;

  for (;;) {
    sinLambda = Math.sin(lambda);
    cosLambda = Math.cos(lambda);
    const t = p1.cosU * p2.sinU - p1.sinU * p2.cosU * cosLambda;
    sinSqSigma = (p2.cosU * sinLambda) ** 2 + t * t;
    // coincident or exactly antipodal points
    if (Math.abs(sinSqSigma) < 1e-24) break;

    sinSigma = Math.sqrt(sinSqSigma);
    cosSigma = p1.sinU * p2.sinU + p1.cosU * p2.cosU * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (p1.cosU * p2.cosU * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // equatorial line: cos²α = 0
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * p1.sinU * p2.sinU) / cosSqAlpha : 0;
    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) *
        f *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    const check = antipodal ? Math.abs(lambda) - Math.PI : Math.abs(lambda);
    if (check > Math.PI) {
      throw new ConvergenceError("Vincenty inverse diverged (λ > π)", "vincentyInverse", iterations, { antipodal });
    }
    if (Math.abs(lambda - previous) <= TOLERANCE) break;
    iterations++;
    if (iterations >= INVERSE_MAX_ITERATIONS) {
      throw new ConvergenceError("Vincenty inverse failed to converge", "vincentyInverse", iterations);
    }
  }

  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const A = seriesA(uSq);
  const B = seriesB(uSq);
  const distance = b * A * (sigma - deltaSigma(B, sinSigma, cosSigma, cos2SigmaM));

  // exactly antipodal points give atan2(0, 0); the geodesic is then meridional
  const meridional = Math.abs(sinSqSigma) < DOUBLE_EPSILON;
  const alpha1 = meridional
    ? 0
    : Math.atan2(p2.cosU * sinLambda, p1.cosU * p2.sinU - p1.sinU * p2.cosU * cosLambda);
  const alpha2 = meridional
    ? Math.PI
    : Math.atan2(p1.cosU * sinLambda, -p1.sinU * p2.cosU + p1.cosU * p2.sinU * cosLambda);
  const undefinedBearing = Math.abs(distance) < DOUBLE_EPSILON;

  return {
    origin,
    destination,
    distance,
    initialBearing: undefinedBearing ? Number.NaN : wrap360(toDegrees(alpha1)),
    finalBearing: undefinedBearing ? Number.NaN : wrap360(toDegrees(alpha2)),
    iterations
  };
};

const direct = (
  origin: GeographicPosition,
  distance: number,
  initialBearing: number,
  ellipsoid: Ellipsoid
): GeodeticArcSegment => {
  if (Number.isNaN(distance)) {
    throw new InvalidParameterError(`invalid distance ${distance}`, "distance", { distance });
  }
  if (distance === 0) {
    return {
      origin,
      destination: origin,
      distance,
      initialBearing: wrap360(initialBearing),
      finalBearing: Number.NaN,
      iterations: 0
    };
  }
  if (Number.isNaN(initialBearing)) {
    throw new InvalidParameterError(`invalid bearing ${initialBearing}`, "bearing", { initialBearing });
  }

  const { a, b, f } = ellipsoid;
  const alpha1 = toRadians(initialBearing);
  const sinAlpha1 = Math.sin(alpha1);
  const cosAlpha1 = Math.cos(alpha1);
  const { sinU: sinU1, cosU: cosU1, tanU: tanU1 } = reducedLatitude(origin.lat, f);

  // angular distance on the sphere from the equator to the origin
  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  // azimuth of the geodesic at the equator
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const A = seriesA(uSq);
  const B = seriesB(uSq);

  let sigma = distance / (b * A);
  let sinSigma = 0;
  let cosSigma = 1;
  let cos2SigmaM = 1;
  let iterations = 0;
  for (;;) {
    cos2SigmaM = Math.cos(2 * sigma1 + sigma);
    sinSigma = Math.sin(sigma);
    cosSigma = Math.cos(sigma);
    const previous = sigma;
    sigma = distance / (b * A) + deltaSigma(B, sinSigma, cosSigma, cos2SigmaM);
    if (Math.abs(sigma - previous) <= TOLERANCE) break;
    iterations++;
    if (iterations >= DIRECT_MAX_ITERATIONS) {
      throw new ConvergenceError("Vincenty direct failed to converge", "vincentyDirect", iterations);
    }
  }

  const x = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const lat2 = Math.atan2(
    sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1,
    (1 - f) * Math.sqrt(sinAlpha * sinAlpha + x * x)
  );
  const lambda = Math.atan2(sinSigma * sinAlpha1, cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1);
  const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const L =
    lambda -
    (1 - C) * f * sinAlpha * (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));
  const alpha2 = Math.atan2(sinAlpha, -x);

  return {
    origin,
    destination: geographic(origin.lon + toDegrees(L), toDegrees(lat2)),
    distance,
    initialBearing: wrap360(initialBearing),
    finalBearing: wrap360(toDegrees(alpha2)),
    iterations
  };
};

/**
 * Geodesic distance and bearings between two points (Vincenty's inverse problem).
 */
export const solveInverse = (
  origin: GeographicPosition,
  destination: GeographicPosition,
  options?: VincentyOptions
): Result<GeodeticArcSegment> => {
  const { ellipsoid } = resolveReferenceFrame(options);
  return attempt(() => inverse(origin, destination, ellipsoid));
};

/**
 * Destination reached by travelling `distance` metres from `origin` on `initialBearing` degrees.
 */
export const solveDirect = (
  origin: GeographicPosition,
  distance: number,
  initialBearing: number,
  options?: VincentyOptions
): Result<GeodeticArcSegment> => {
  const { ellipsoid } = resolveReferenceFrame(options);
  return attempt(() => direct(origin, distance, initialBearing, ellipsoid));
};

const segmentOrUndefined = (result: Result<GeodeticArcSegment>): GeodeticArcSegment | undefined => {
  if (result.ok) {
    return result.value;
  }
  logger.warn(result.error.message, result.error.details);
  return undefined;
};

export const distanceTo = (from: GeographicPosition, to: GeographicPosition, options?: VincentyOptions): number =>
  segmentOrUndefined(solveInverse(from, to, options))?.distance ?? Number.NaN;

export const initialBearingTo = (
  from: GeographicPosition,
  to: GeographicPosition,
  options?: VincentyOptions
): number => segmentOrUndefined(solveInverse(from, to, options))?.initialBearing ?? Number.NaN;

export const finalBearingTo = (from: GeographicPosition, to: GeographicPosition, options?: VincentyOptions): number =>
  segmentOrUndefined(solveInverse(from, to, options))?.finalBearing ?? Number.NaN;

export const destinationPoint = (
  origin: GeographicPosition,
  distance: number,
  initialBearing: number,
  options?: VincentyOptions
): GeographicPosition =>
  segmentOrUndefined(solveDirect(origin, distance, initialBearing, options))?.destination ??
  geographic(Number.NaN, Number.NaN);

/** Bearing on arrival after travelling `distance` metres on `initialBearing`. */
export const finalBearingOn = (
  origin: GeographicPosition,
  distance: number,
  initialBearing: number,
  options?: VincentyOptions
): number => segmentOrUndefined(solveDirect(origin, distance, initialBearing, options))?.finalBearing ?? Number.NaN;

/**
 * Point at `fraction` of the geodesic from `from` to `to`; 0 and 1 return the endpoints as given.
 */
export const intermediatePointTo = (
  from: GeographicPosition,
  to: GeographicPosition,
  fraction: number,
  options?: VincentyOptions
): GeographicPosition => {
  if (fraction === 0) return from;
  if (fraction === 1) return to;

  const segment = segmentOrUndefined(solveInverse(from, to, options));
  if (!segment) {
    return geographic(Number.NaN, Number.NaN);
  }
  if (Number.isNaN(segment.initialBearing)) {
    return from;
  }
  return destinationPoint(from, segment.distance * fraction, segment.initialBearing, options);
};

export const midPointTo = (
  from: GeographicPosition,
  to: GeographicPosition,
  options?: VincentyOptions
): GeographicPosition => intermediatePointTo(from, to, 0.5, options);
