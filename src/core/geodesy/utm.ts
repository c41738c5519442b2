import { ConvergenceError, FormatError, InvalidParameterError, attempt } from "../errors";
import type { Result } from "../errors";
import { createLogger } from "../logging";
import { roundTo, toDegrees, toRadians } from "../math";
import { DATUMS } from "./datum";
import type { Datum } from "./datum";
import { eccentricitySquared, thirdFlattening } from "./ellipsoid";
import type { Ellipsoid } from "./ellipsoid";
import { convertGeographicAcrossDatums } from "./ellipsoidal";
import { centralMeridian, isValidZone, latitudeBandOf } from "./gridZone";
import { geographic } from "./position";
import type { GeographicPosition } from "./position";

const logger = createLogger("utm");

export type Hemisphere = "N" | "S";

export interface UtmZone {
  readonly zone: number;
  readonly hemisphere: Hemisphere;
}

export interface UtmCoordinate extends UtmZone {
  readonly easting: number;
  readonly northing: number;
  readonly elev?: number;
  readonly m?: number;
  readonly datum: Datum;
}

/**
 * A projected value together with the meridian convergence (degrees) and point scale factor at it.
 */
export interface UtmProjection<T> {
  readonly position: T;
  readonly convergence: number;
  readonly scale: number;
}

export const UTM_SCALE_FACTOR = 0.9996;
export const FALSE_EASTING = 500e3;
export const FALSE_NORTHING = 10000e3;
export const MIN_LATITUDE = -80;
export const MAX_LATITUDE = 84;

// northings of the 84°N and 80°S limits
const MAX_NORTHING_NORTH = 9329006;
const MIN_NORTHING_SOUTH = 1116914;
const INVERSE_MAX_ITERATIONS = 100;
const INVERSE_TOLERANCE = 1e-12;

export const isHemisphere = (value: string): value is Hemisphere => value === "N" || value === "S";

interface KrugerSeries {
  a: number;
  e: number;
  /** 2πA is the circumference of a meridian. */
  A: number;
  alpha: readonly number[];
  beta: readonly number[];
}

const krugerSeries = (ellipsoid: Ellipsoid): KrugerSeries => {
  const n = thirdFlattening(ellipsoid);
  const n2 = n * n;
  const n3 = n * n2;
  const n4 = n * n3;
  const n5 = n * n4;
  const n6 = n * n5;

  return {
    a: ellipsoid.a,
    e: Math.sqrt(eccentricitySquared(ellipsoid)),
    A: (ellipsoid.a / (1 + n)) * (1 + (1 / 4) * n2 + (1 / 64) * n4 + (1 / 256) * n6),
    alpha: [
      (1 / 2) * n - (2 / 3) * n2 + (5 / 16) * n3 + (41 / 180) * n4 - (127 / 288) * n5 + (7891 / 37800) * n6,
      (13 / 48) * n2 - (3 / 5) * n3 + (557 / 1440) * n4 + (281 / 630) * n5 - (1983433 / 1935360) * n6,
      (61 / 240) * n3 - (103 / 140) * n4 + (15061 / 26880) * n5 + (167603 / 181440) * n6,
      (49561 / 161280) * n4 - (179 / 168) * n5 + (6601661 / 7257600) * n6,
      (34729 / 80640) * n5 - (3418889 / 1995840) * n6,
      (212378941 / 319334400) * n6
    ],
    beta: [
      (1 / 2) * n - (2 / 3) * n2 + (37 / 96) * n3 - (1 / 360) * n4 - (81 / 512) * n5 + (96199 / 604800) * n6,
      (1 / 48) * n2 + (1 / 15) * n3 - (437 / 1440) * n4 + (46 / 105) * n5 - (1118711 / 3870720) * n6,
      (17 / 480) * n3 - (37 / 840) * n4 - (209 / 4480) * n5 + (5569 / 90720) * n6,
      (4397 / 161280) * n4 - (11 / 504) * n5 - (830251 / 7257600) * n6,
      (4583 / 161280) * n5 - (108847 / 3991680) * n6,
      (20648693 / 638668800) * n6
    ]
  };
};

/** Conformal latitude tangent τ′ from the geodetic latitude tangent τ. */
const conformalTan = (tau: number, e: number): number => {
  const sigma = Math.sinh(e * Math.atanh((e * tau) / Math.sqrt(1 + tau * tau)));
  return tau * Math.sqrt(1 + sigma * sigma) - sigma * Math.sqrt(1 + tau * tau);
};

export interface TransverseMercatorPoint {
  /** Metres east of the central meridian, before any false easting. */
  x: number;
  /** Metres north of the equator, before any false northing. */
  y: number;
  convergence: number;
  scale: number;
}

/**
 * Gauss-Krüger transverse Mercator about `lon0` (Karney 2011, 6th order in n), scaled by k0.
 */
export const transverseMercator = (
  lat: number,
  lon: number,
  lon0: number,
  ellipsoid: Ellipsoid
): TransverseMercatorPoint => {
  const { a, e, A, alpha } = krugerSeries(ellipsoid);
  const phi = toRadians(lat);
  const lambda = toRadians(lon - lon0);
  const cosLambda = Math.cos(lambda);
  const sinLambda = Math.sin(lambda);

  const tau = Math.tan(phi);
  const tauP = conformalTan(tau, e);
  const xiP = Math.atan2(tauP, cosLambda);
  const etaP = Math.asinh(sinLambda / Math.sqrt(tauP * tauP + cosLambda * cosLambda));

  let xi = xiP;
  let eta = etaP;
  let pP = 1;
  let qP = 0;
  alpha.forEach((coefficient, index) => {
    const j2 = 2 * (index + 1);
    xi += coefficient * Math.sin(j2 * xiP) * Math.cosh(j2 * etaP);
    eta += coefficient * Math.cos(j2 * xiP) * Math.sinh(j2 * etaP);
    pP += j2 * coefficient * Math.cos(j2 * xiP) * Math.cosh(j2 * etaP);
    qP += j2 * coefficient * Math.sin(j2 * xiP) * Math.sinh(j2 * etaP);
  });

  const gammaP = Math.atan((tauP / Math.sqrt(1 + tauP * tauP)) * Math.tan(lambda));
  const gammaPP = Math.atan2(qP, pP);

  const sinPhi = Math.sin(phi);
  const kP =
    (Math.sqrt(1 - e * e * sinPhi * sinPhi) * Math.sqrt(1 + tau * tau)) /
    Math.sqrt(tauP * tauP + cosLambda * cosLambda);
  const kPP = (A / a) * Math.sqrt(pP * pP + qP * qP);

  return {
    x: UTM_SCALE_FACTOR * A * eta,
    y: UTM_SCALE_FACTOR * A * xi,
    convergence: toDegrees(gammaP + gammaPP),
    scale: UTM_SCALE_FACTOR * kP * kPP
  };
};

export interface UtmCoordinateOptions {
  elev?: number;
  m?: number;
  datum?: Datum;
  /** Checks easting/northing against the UTM limits; defaults to true. */
  verifyEN?: boolean;
}

const verifyEastingNorthing = (hemisphere: Hemisphere, easting: number, northing: number): void => {
  if (!(easting >= 0 && easting <= 1000e3)) {
    throw new FormatError(`invalid UTM easting ${easting}`, undefined, { easting });
  }
  if (hemisphere === "N" && !(northing >= 0 && northing < MAX_NORTHING_NORTH)) {
    throw new FormatError(`invalid UTM northing ${northing} for northern hemisphere`, undefined, { northing });
  }
  if (hemisphere === "S" && !(northing > MIN_NORTHING_SOUTH && northing <= FALSE_NORTHING)) {
    throw new FormatError(`invalid UTM northing ${northing} for southern hemisphere`, undefined, { northing });
  }
};

export const createUtm = (
  zone: number,
  hemisphere: string,
  easting: number,
  northing: number,
  { elev, m, datum = DATUMS.WGS84, verifyEN = true }: UtmCoordinateOptions = {}
): UtmCoordinate => {
  if (!isValidZone(zone)) {
    throw new InvalidParameterError(`invalid UTM zone ${zone}`, "zone", { zone });
  }
  if (!isHemisphere(hemisphere)) {
    throw new InvalidParameterError(`invalid UTM hemisphere "${hemisphere}"`, "hemisphere", { hemisphere });
  }
  if (!Number.isFinite(easting) || !Number.isFinite(northing)) {
    throw new InvalidParameterError("UTM easting and northing must be finite", "easting", { easting, northing });
  }
  if (verifyEN) {
    verifyEastingNorthing(hemisphere, easting, northing);
  }
  return {
    zone,
    hemisphere,
    easting,
    northing,
    ...(elev !== undefined ? { elev } : {}),
    ...(m !== undefined ? { m } : {}),
    datum
  };
};

const naturalZone = (lon: number): number => Math.min(60, Math.max(1, Math.floor((lon + 180) / 6) + 1));

/**
 * UTM zone and hemisphere containing a position, with the Norway and Svalbard exceptions.
 */
export const utmZoneOf = ({ lon, lat }: GeographicPosition): UtmZone => {
  let zone = naturalZone(lon);
  const band = latitudeBandOf(lat);

  if (zone === 31 && band === "V" && lon >= 3) zone++;
  if (band === "X") {
    if (zone === 32) zone = lon < 9 ? 31 : 33;
    else if (zone === 34) zone = lon < 21 ? 33 : 35;
    else if (zone === 36) zone = lon < 33 ? 35 : 37;
  }
  return { zone, hemisphere: lat >= 0 ? "N" : "S" };
};

export interface GeographicToUtmOptions {
  /** Forces the zone; the Norway/Svalbard exceptions then no longer apply. */
  zone?: number;
  datum?: Datum;
  roundResults?: boolean;
  verifyEN?: boolean;
}

export const geographicToUtm = (
  position: GeographicPosition,
  { zone: zoneOverride, datum = DATUMS.WGS84, roundResults = true, verifyEN = true }: GeographicToUtmOptions = {}
): UtmProjection<UtmCoordinate> => {
  const { lon, lat } = position;
  if (!(lat >= MIN_LATITUDE && lat <= MAX_LATITUDE)) {
    throw new InvalidParameterError(`latitude ${lat} is outside the UTM limits`, "lat", { lat });
  }
  if (zoneOverride !== undefined && !isValidZone(zoneOverride)) {
    throw new InvalidParameterError(`invalid UTM zone ${zoneOverride}`, "zone", { zone: zoneOverride });
  }

  const zone = zoneOverride ?? utmZoneOf(position).zone;
  const hemisphere: Hemisphere = lat >= 0 ? "N" : "S";
  const point = transverseMercator(lat, lon, centralMeridian(zone), datum.ellipsoid);
  const easting = point.x + FALSE_EASTING;
  const northing = point.y < 0 ? point.y + FALSE_NORTHING : point.y;

  const utm = createUtm(
    zone,
    hemisphere,
    roundResults ? roundTo(easting, 9) : easting,
    roundResults ? roundTo(northing, 9) : northing,
    { elev: position.elev, m: position.m, datum, verifyEN }
  );
  logger.trace("Projected geographic position to UTM", { lon, lat, zone, hemisphere });

  return {
    position: utm,
    convergence: roundResults ? roundTo(point.convergence, 9) : point.convergence,
    scale: roundResults ? roundTo(point.scale, 12) : point.scale
  };
};

export interface UtmToGeographicOptions {
  roundResults?: boolean;
}

export const utmToGeographic = (
  utm: UtmCoordinate,
  { roundResults = true }: UtmToGeographicOptions = {}
): UtmProjection<GeographicPosition> => {
  const { zone, hemisphere, datum } = utm;
  const { a, e, A, beta } = krugerSeries(datum.ellipsoid);
  const x = utm.easting - FALSE_EASTING;
  const y = hemisphere === "S" ? utm.northing - FALSE_NORTHING : utm.northing;

  const eta = x / (UTM_SCALE_FACTOR * A);
  const xi = y / (UTM_SCALE_FACTOR * A);

  let xiP = xi;
  let etaP = eta;
  beta.forEach((coefficient, index) => {
    const j2 = 2 * (index + 1);
    xiP -= coefficient * Math.sin(j2 * xi) * Math.cosh(j2 * eta);
    etaP -= coefficient * Math.cos(j2 * xi) * Math.sinh(j2 * eta);
  });

  const sinhEtaP = Math.sinh(etaP);
  const sinXiP = Math.sin(xiP);
  const cosXiP = Math.cos(xiP);
  const tauP = sinXiP / Math.sqrt(sinhEtaP * sinhEtaP + cosXiP * cosXiP);

  // Newton-Raphson on the conformal latitude
  const oneMinusESq = 1 - e * e;
  let tau = tauP;
  let deltaTau = Number.POSITIVE_INFINITY;
  let iterations = 0;
  while (Math.abs(deltaTau) > INVERSE_TOLERANCE) {
    if (iterations === INVERSE_MAX_ITERATIONS) {
      throw new ConvergenceError("UTM inverse failed to converge", "utmToGeographic", iterations, { zone, hemisphere });
    }
    const tauIP = conformalTan(tau, e);
    deltaTau =
      ((tauP - tauIP) / Math.sqrt(1 + tauIP * tauIP)) *
      ((1 + oneMinusESq * tau * tau) / (oneMinusESq * Math.sqrt(1 + tau * tau)));
    if (!Number.isFinite(deltaTau)) {
      throw new ConvergenceError("UTM inverse diverged", "utmToGeographic", iterations, { zone, hemisphere });
    }
    tau += deltaTau;
    iterations++;
  }

  const phi = Math.atan(tau);
  const lambda = Math.atan2(sinhEtaP, cosXiP);

  let p = 1;
  let q = 0;
  beta.forEach((coefficient, index) => {
    const j2 = 2 * (index + 1);
    p -= j2 * coefficient * Math.cos(j2 * xi) * Math.cosh(j2 * eta);
    q += j2 * coefficient * Math.sin(j2 * xi) * Math.sinh(j2 * eta);
  });
  const gammaP = Math.atan(Math.tan(xiP) * Math.tanh(etaP));
  const gammaPP = Math.atan2(q, p);

  const sinPhi = Math.sin(phi);
  const kP =
    Math.sqrt(1 - e * e * sinPhi * sinPhi) *
    Math.sqrt(1 + tau * tau) *
    Math.sqrt(sinhEtaP * sinhEtaP + cosXiP * cosXiP);
  const kPP = A / a / Math.sqrt(p * p + q * q);

  const lat = toDegrees(phi);
  const lon = centralMeridian(zone) + toDegrees(lambda);
  const convergence = toDegrees(gammaP + gammaPP);
  const scale = UTM_SCALE_FACTOR * kP * kPP;
  logger.trace("Unprojected UTM coordinate", { zone, hemisphere, iterations });

  return {
    position: roundResults
      ? geographic(roundTo(lon, 14), roundTo(lat, 14), utm.elev, utm.m)
      : geographic(lon, lat, utm.elev, utm.m),
    convergence: roundResults ? roundTo(convergence, 9) : convergence,
    scale: roundResults ? roundTo(scale, 12) : scale
  };
};

export const tryGeographicToUtm = (
  position: GeographicPosition,
  options?: GeographicToUtmOptions
): Result<UtmProjection<UtmCoordinate>> => attempt(() => geographicToUtm(position, options));

export const tryUtmToGeographic = (
  utm: UtmCoordinate,
  options?: UtmToGeographicOptions
): Result<UtmProjection<GeographicPosition>> => attempt(() => utmToGeographic(utm, options));

export interface ConvertUtmOptions {
  /** Target zone; defaults to the zone of the input. */
  zone?: number;
  /** Target datum; defaults to the datum of the input. */
  datum?: Datum;
  roundResults?: boolean;
  verifyEN?: boolean;
}

/**
 * Re-projects a UTM coordinate into another zone and/or datum.
 */
export const convertUtm = (
  utm: UtmCoordinate,
  { zone = utm.zone, datum = utm.datum, roundResults = true, verifyEN = true }: ConvertUtmOptions = {}
): UtmCoordinate => {
  const { position } = utmToGeographic(utm, { roundResults: false });
  const target = convertGeographicAcrossDatums(position, utm.datum, datum);
  logger.debug("Re-projecting UTM coordinate", { from: utm.zone, to: zone, datum: datum.id });
  return geographicToUtm(target, { zone, datum, roundResults, verifyEN }).position;
};

export interface ParseUtmOptions {
  datum?: Datum;
  verifyEN?: boolean;
}

const parseNumberField = (field: string, name: string, text: string): number => {
  const value = Number(field);
  if (field === "" || !Number.isFinite(value)) {
    throw new FormatError(`invalid UTM ${name} "${field}"`, text);
  }
  return value;
};

/**
 * Parses `"{zone} {hemisphere} {easting} {northing} [elev] [m]"`, e.g. `"31 N 448251 5411932"`.
 */
export const parseUtm = (text: string, options: ParseUtmOptions = {}): UtmCoordinate => {
  const fields = text.trim().split(/\s+/);
  if (fields.length < 4 || fields.length > 6) {
    throw new FormatError(`invalid UTM coordinate "${text}"`, text);
  }
  const [zoneField, hemisphereField, eastingField, northingField, elevField, mField] = fields;
  if (!/^\d{1,2}$/.test(zoneField)) {
    throw new FormatError(`invalid UTM zone "${zoneField}"`, text);
  }
  const hemisphere = hemisphereField.toUpperCase();
  if (!isHemisphere(hemisphere)) {
    throw new FormatError(`invalid UTM hemisphere "${hemisphereField}"`, text);
  }
  return createUtm(
    Number(zoneField),
    hemisphere,
    parseNumberField(eastingField, "easting", text),
    parseNumberField(northingField, "northing", text),
    {
      ...options,
      elev: elevField === undefined ? undefined : parseNumberField(elevField, "elevation", text),
      m: mField === undefined ? undefined : parseNumberField(mField, "measure", text)
    }
  );
};

export const tryParseUtm = (text: string, options?: ParseUtmOptions): Result<UtmCoordinate> =>
  attempt(() => parseUtm(text, options));

export interface FormatUtmOptions {
  /** Decimals for easting, northing and elevation; defaults to 0. */
  decimals?: number;
  delimiter?: string;
  zeroPadZone?: boolean;
  /** Prints integral values without decimals; defaults to true. */
  compactNums?: boolean;
}

export const formatUtm = (
  utm: UtmCoordinate,
  { decimals = 0, delimiter = " ", zeroPadZone = false, compactNums = true }: FormatUtmOptions = {}
): string => {
  const formatNumber = (value: number): string =>
    compactNums && Number.isInteger(value) ? String(value) : value.toFixed(decimals);
  const fields = [
    zeroPadZone ? String(utm.zone).padStart(2, "0") : String(utm.zone),
    utm.hemisphere,
    formatNumber(utm.easting),
    formatNumber(utm.northing)
  ];
  // m is positional, so an elevation is written whenever m is present
  if (utm.elev !== undefined || utm.m !== undefined) {
    fields.push(formatNumber(utm.elev ?? 0));
  }
  if (utm.m !== undefined) {
    fields.push(formatNumber(utm.m));
  }
  return fields.join(delimiter);
};
