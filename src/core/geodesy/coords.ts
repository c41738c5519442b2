import { FormatError, InvalidParameterError } from "../errors";
import { createLogger } from "../logging";
import type { Datum } from "./datum";
import { convertGeographicAcrossDatums } from "./ellipsoidal";
import { convertGeocentric } from "./helmert";
import { cartesian, geographic } from "./position";
import { createUtm, geographicToUtm, utmToGeographic } from "./utm";
import type { GeographicToUtmOptions, UtmZone } from "./utm";

const logger = createLogger("coords");

/**
 * Flat buffer layouts: x/y (lon/lat or easting/northing) followed by optional z and m.
 */
export type CoordLayout = "xy" | "xyz" | "xym" | "xyzm";

export const coordDimension = (layout: CoordLayout): number => layout.length;

interface FlatPosition {
  x: number;
  y: number;
  z?: number;
  m?: number;
}

const hasZ = (layout: CoordLayout): boolean => layout.includes("z");
const hasM = (layout: CoordLayout): boolean => layout.includes("m");

const checkBuffer = (coords: ArrayLike<number>, layout: CoordLayout): number => {
  const dimension = coordDimension(layout);
  if (coords.length % dimension !== 0) {
    throw new FormatError(`coordinate buffer of length ${coords.length} is not a multiple of ${dimension} (${layout})`);
  }
  return coords.length / dimension;
};

const mapPositions = (
  coords: ArrayLike<number>,
  layout: CoordLayout,
  convert: (position: FlatPosition) => FlatPosition
): Float64Array => {
  const count = checkBuffer(coords, layout);
  const dimension = coordDimension(layout);
  const withZ = hasZ(layout);
  const withM = hasM(layout);
  const out = new Float64Array(coords.length);

  for (let i = 0; i < count; i++) {
    const offset = i * dimension;
    const result = convert({
      x: coords[offset],
      y: coords[offset + 1],
      z: withZ ? coords[offset + 2] : undefined,
      m: withM ? coords[offset + dimension - 1] : undefined
    });
    out[offset] = result.x;
    out[offset + 1] = result.y;
    if (withZ) out[offset + 2] = result.z ?? 0;
    if (withM) out[offset + dimension - 1] = result.m ?? Number.NaN;
  }
  logger.debug("Converted coordinate buffer", { layout, count });
  return out;
};

/** Datum conversion of lon/lat(/elev) positions. */
export const convertGeographicCoords = (
  coords: ArrayLike<number>,
  layout: CoordLayout,
  sourceDatum: Datum,
  targetDatum: Datum
): Float64Array =>
  mapPositions(coords, layout, ({ x, y, z, m }) => {
    const { lon, lat, elev } = convertGeographicAcrossDatums(geographic(x, y, z, m), sourceDatum, targetDatum);
    return { x: lon, y: lat, z: elev, m };
  });

/** Datum conversion of geocentric x/y/z positions. */
export const convertGeocentricCoords = (
  coords: ArrayLike<number>,
  layout: CoordLayout,
  sourceDatum: Datum,
  targetDatum: Datum
): Float64Array =>
  mapPositions(coords, layout, (position) =>
    convertGeocentric(cartesian(position.x, position.y, position.z, position.m), sourceDatum, targetDatum)
  );

/**
 * Projects lon/lat positions into a single UTM zone; every position must lie in `zone.hemisphere`.
 */
export const geographicToUtmCoords = (
  coords: ArrayLike<number>,
  layout: CoordLayout,
  zone: UtmZone,
  options: Omit<GeographicToUtmOptions, "zone"> = {}
): Float64Array =>
  mapPositions(coords, layout, ({ x, y, z, m }) => {
    const { position } = geographicToUtm(geographic(x, y, z, m), { ...options, zone: zone.zone });
    if (position.hemisphere !== zone.hemisphere) {
      throw new InvalidParameterError(
        `position ${x},${y} is not in hemisphere ${zone.hemisphere}`,
        "hemisphere",
        { lon: x, lat: y }
      );
    }
    return { x: position.easting, y: position.northing, z: position.elev, m: position.m };
  });

export interface UtmToGeographicCoordsOptions {
  datum?: Datum;
  roundResults?: boolean;
}

/** Inverse of {@link geographicToUtmCoords}: easting/northing in `zone` to lon/lat. */
export const utmToGeographicCoords = (
  coords: ArrayLike<number>,
  layout: CoordLayout,
  zone: UtmZone,
  { datum, roundResults }: UtmToGeographicCoordsOptions = {}
): Float64Array =>
  mapPositions(coords, layout, ({ x, y, z, m }) => {
    const utm = createUtm(zone.zone, zone.hemisphere, x, y, { elev: z, m, datum, verifyEN: false });
    const { position } = utmToGeographic(utm, { roundResults });
    return { x: position.lon, y: position.lat, z: position.elev, m: position.m };
  });
