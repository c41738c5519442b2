import { InvalidParameterError } from "../errors";

// 8° latitude bands from 80°S; I and O are omitted, X is stretched to 84°N
export const LAT_BAND_LETTERS = [
  "C", "D", "E", "F", "G", "H", "J", "K", "L", "M",
  "N", "P", "Q", "R", "S", "T", "U", "V", "W", "X"
] as const;

export type MgrsBand = (typeof LAT_BAND_LETTERS)[number];

export interface MgrsGridZone {
  readonly zone: number;
  readonly band: MgrsBand;
}

export interface GridZoneBounds extends MgrsGridZone {
  readonly west: number;
  readonly south: number;
  readonly east: number;
  readonly north: number;
}

export const isMgrsBand = (value: string): value is MgrsBand => LAT_BAND_LETTERS.some((band) => band === value);

export const isValidZone = (zone: number): boolean => Number.isInteger(zone) && zone >= 1 && zone <= 60;

export const bandIndex = (band: MgrsBand): number => LAT_BAND_LETTERS.indexOf(band);

/** Band letter for a latitude; 80..84°N falls into X and out-of-range values are clamped. */
export const latitudeBandOf = (lat: number): MgrsBand => {
  const index = Math.floor(lat / 8 + 10);
  return LAT_BAND_LETTERS[Math.min(LAT_BAND_LETTERS.length - 1, Math.max(0, index))];
};

export const bandSouthLatitude = (band: MgrsBand): number => (bandIndex(band) - 10) * 8;

export const centralMeridian = (zone: number): number => (zone - 1) * 6 - 180 + 3;

/**
 * Longitude/latitude extent of a grid zone designator, honouring the Norway (band V) and Svalbard
 * (band X) exceptions. Zones 32X, 34X and 36X do not exist.
 */
export const gridZoneBounds = (zone: number, band: string): GridZoneBounds => {
  if (!isValidZone(zone)) {
    throw new InvalidParameterError(`invalid MGRS zone ${zone}`, "zone", { zone });
  }
  if (!isMgrsBand(band)) {
    throw new InvalidParameterError(`invalid MGRS band "${band}"`, "band", { band });
  }
  const south = bandSouthLatitude(band);
  const north = band === "X" ? 84 : south + 8;
  let west = (zone - 1) * 6 - 180;
  let east = west + 6;

  if (band === "V") {
    if (zone === 31) east = 3;
    if (zone === 32) west = 3;
  }
  if (band === "X") {
    if (zone === 32 || zone === 34 || zone === 36) {
      throw new InvalidParameterError(`grid zone ${zone}${band} does not exist`, "zone", { zone, band });
    }
    if (zone === 31) east = 9;
    if (zone === 33) {
      west = 9;
      east = 21;
    }
    if (zone === 35) {
      west = 21;
      east = 33;
    }
    if (zone === 37) west = 33;
  }

  return { zone, band, west, south, east, north };
};
