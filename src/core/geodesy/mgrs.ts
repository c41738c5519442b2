import { FormatError, InvalidParameterError, attempt } from "../errors";
import type { Result } from "../errors";
import { createLogger } from "../logging";
import { roundTo } from "../math";
import { DATUMS } from "./datum";
import type { Datum } from "./datum";
import type { Ellipsoid } from "./ellipsoid";
import {
  bandIndex,
  bandSouthLatitude,
  centralMeridian,
  isMgrsBand,
  isValidZone,
  latitudeBandOf
} from "./gridZone";
import type { MgrsBand, MgrsGridZone } from "./gridZone";
import { FALSE_NORTHING, createUtm, transverseMercator, utmToGeographic } from "./utm";
import type { UtmCoordinate } from "./utm";

const logger = createLogger("mgrs");

// 100 km square letters: columns cycle every three zones, rows alternate between odd and even zones
const COLUMN_LETTERS = ["ABCDEFGH", "JKLMNPQR", "STUVWXYZ"] as const;
const ROW_LETTERS = ["ABCDEFGHJKLMNPQRSTUV", "FGHJKLMNPQRSTUVABCDE"] as const;
const ALL_COLUMN_LETTERS = COLUMN_LETTERS.join("");

const SQUARE_SIZE = 100e3;
const NORTHING_CYCLE = 2000e3;
const MGRS_DIGITS = [2, 4, 6, 8, 10] as const;

export type MgrsDigits = (typeof MGRS_DIGITS)[number];

export interface MgrsGridSquare extends MgrsGridZone {
  readonly column: string;
  readonly row: string;
}

export interface MgrsReference {
  readonly gridSquare: MgrsGridSquare;
  /** Metres east within the 100 km square. */
  readonly easting: number;
  /** Metres north within the 100 km square. */
  readonly northing: number;
  readonly datum: Datum;
}

const columnLetters = (zone: number): string => COLUMN_LETTERS[(zone - 1) % 3];

const rowLetters = (zone: number): string => ROW_LETTERS[(zone - 1) % 2];

const isWithinSquare = (value: number): boolean => Number.isInteger(value) && value >= 0 && value < SQUARE_SIZE;

export interface MgrsOptions {
  datum?: Datum;
}

/**
 * Builds an MGRS reference, reporting every invalid component in a single format error.
 */
export const createMgrs = (
  zone: number,
  band: string,
  column: string,
  row: string,
  easting: number,
  northing: number,
  { datum = DATUMS.WGS84 }: MgrsOptions = {}
): MgrsReference => {
  const errors: string[] = [];
  const zoneValid = isValidZone(zone);
  if (!zoneValid) errors.push(`invalid zone ${zone}`);
  if (!isMgrsBand(band)) errors.push(`invalid band "${band}"`);

  const allowedColumns = zoneValid ? columnLetters(zone) : ALL_COLUMN_LETTERS;
  if (column.length !== 1 || !allowedColumns.includes(column)) {
    errors.push(zoneValid ? `invalid column "${column}" for zone ${zone}` : `invalid column "${column}"`);
  }
  if (row.length !== 1 || !ROW_LETTERS[0].includes(row)) errors.push(`invalid row "${row}"`);
  if (!isWithinSquare(easting)) errors.push(`invalid easting ${easting}`);
  if (!isWithinSquare(northing)) errors.push(`invalid northing ${northing}`);

  if (errors.length > 0 || !isMgrsBand(band)) {
    throw new FormatError(`invalid MGRS reference: ${errors.join(", ")}`, undefined, { errors });
  }
  return { gridSquare: { zone, band, column, row }, easting, northing, datum };
};

export const mgrsFromUtm = (utm: UtmCoordinate): MgrsReference => {
  const { zone, datum } = utm;
  const { position } = utmToGeographic(utm);
  const band = latitudeBandOf(roundTo(position.lat, 12));

  // round to 1 µm before truncating to whole metres
  const easting = roundTo(utm.easting, 6);
  const northing = roundTo(utm.northing, 6);
  const column = columnLetters(zone).charAt(Math.floor(easting / SQUARE_SIZE) - 1);
  const row = rowLetters(zone).charAt(Math.floor(northing / SQUARE_SIZE) % 20);

  return createMgrs(
    zone,
    band,
    column,
    row,
    Math.floor(easting % SQUARE_SIZE),
    Math.floor(northing % SQUARE_SIZE),
    { datum }
  );
};

const projectedNorthing = (lat: number, lon: number, zone: number, ellipsoid: Ellipsoid): number => {
  const { y } = transverseMercator(lat, lon, centralMeridian(zone), ellipsoid);
  return y < 0 ? y + FALSE_NORTHING : y;
};

/**
 * Lowest northing (to 100 km) of the southern edge of a latitude band within a zone. Parallels bow
 * away from the equator off the central meridian, so the zone edge is lower in the south.
 */
export const bandReferenceNorthing = (zone: number, band: MgrsBand, ellipsoid: Ellipsoid): number => {
  const lat = bandSouthLatitude(band);
  const meridian = centralMeridian(zone);
  const northing = Math.min(
    projectedNorthing(lat, meridian, zone, ellipsoid),
    projectedNorthing(lat, meridian + 3, zone, ellipsoid)
  );
  return Math.floor(northing / SQUARE_SIZE) * SQUARE_SIZE;
};

export interface MgrsToUtmOptions {
  verifyEN?: boolean;
}

/**
 * UTM coordinate of the south-west corner of the referenced square, at the stated precision.
 */
export const mgrsToUtm = (reference: MgrsReference, { verifyEN = true }: MgrsToUtmOptions = {}): UtmCoordinate => {
  const { gridSquare, datum } = reference;
  const { zone, band, column, row } = gridSquare;
  const hemisphere = bandIndex(band) >= bandIndex("N") ? "N" : "S";

  const eastingSquare = (columnLetters(zone).indexOf(column) + 1) * SQUARE_SIZE;
  const northingSquare = rowLetters(zone).indexOf(row) * SQUARE_SIZE;

  // the row letters repeat every 2000 km; the band's southern edge picks the cycle
  const bandNorthing = bandReferenceNorthing(zone, band, datum.ellipsoid);
  let cycle = 0;
  while (cycle + northingSquare + reference.northing < bandNorthing) {
    cycle += NORTHING_CYCLE;
  }
  logger.debug("Resolved MGRS northing cycle", { zone, band, bandNorthing, cycle });

  return createUtm(
    zone,
    hemisphere,
    eastingSquare + reference.easting,
    cycle + northingSquare + reference.northing,
    { datum, verifyEN }
  );
};

const parseDigitGroup = (group: string, name: string, text: string): number => {
  if (/^\d+$/.test(group)) {
    return Number(group.length < 5 ? group.padEnd(5, "0") : group);
  }
  const decimal = /^(\d+)\.\d*$/.exec(group);
  if (decimal && decimal[1].length >= 5) {
    return Math.trunc(Number(group));
  }
  throw new FormatError(`invalid MGRS ${name} "${group}"`, text);
};

const splitDigits = (digits: string, text: string): [string, string] => {
  if (digits.length % 2 !== 0) {
    throw new FormatError("MGRS easting and northing must have the same number of digits", text);
  }
  return [digits.slice(0, digits.length / 2), digits.slice(digits.length / 2)];
};

const tokenize = (text: string): string[] => {
  const trimmed = text.trim();
  if (!/\s/.test(trimmed)) {
    // military style, e.g. 31UDQ4825111932
    const military = /^(\d{1,2}[A-Za-z])([A-Za-z]{2})(\d+)$/.exec(trimmed);
    if (!military) {
      throw new FormatError(`invalid MGRS reference "${text}"`, text);
    }
    return [military[1], military[2], ...splitDigits(military[3], text)];
  }
  const parts = trimmed.split(/\s+/);
  if (parts.length === 3) {
    return [parts[0], parts[1], ...splitDigits(parts[2], text)];
  }
  return parts;
};

/**
 * Parses `"31U DQ 48251 11932"`, `"31UDQ4825111932"` or `"31U DQ 4825111932"`. Short digit groups
 * are metres at reduced precision, so `"12S TC 52 86"` is the square corner 52000 86000.
 */
export const parseMgrs = (text: string, options: MgrsOptions = {}): MgrsReference => {
  const parts = tokenize(text);
  if (parts.length !== 4) {
    throw new FormatError(`invalid MGRS reference "${text}"`, text);
  }
  const [gzd, square, eastingGroup, northingGroup] = parts;

  const zoneBand = /^(\d{1,2})([A-Za-z])$/.exec(gzd);
  if (!zoneBand) {
    throw new FormatError(`invalid MGRS grid zone designator "${gzd}"`, text);
  }
  if (!/^[A-Za-z]{2}$/.test(square)) {
    throw new FormatError(`invalid MGRS 100 km square "${square}"`, text);
  }
  const [eastingDigits] = eastingGroup.split(".");
  const [northingDigits] = northingGroup.split(".");
  if (eastingDigits.length !== northingDigits.length) {
    throw new FormatError("MGRS easting and northing must have the same number of digits", text);
  }

  const upper = square.toUpperCase();
  return createMgrs(
    Number(zoneBand[1]),
    zoneBand[2].toUpperCase(),
    upper.charAt(0),
    upper.charAt(1),
    parseDigitGroup(eastingGroup, "easting", text),
    parseDigitGroup(northingGroup, "northing", text),
    options
  );
};

export const tryParseMgrs = (text: string, options?: MgrsOptions): Result<MgrsReference> =>
  attempt(() => parseMgrs(text, options));

export interface FormatMgrsOptions {
  /** Total easting + northing digits; defaults to 10 (1 m). */
  digits?: number;
  zeroPadZone?: boolean;
  /** Omits all separators. */
  military?: boolean;
}

const isMgrsDigits = (value: number): value is MgrsDigits => MGRS_DIGITS.some((digits) => digits === value);

/**
 * Formats a reference, truncating (never rounding) easting and northing to the requested precision.
 */
export const formatMgrs = (
  reference: MgrsReference,
  { digits = 10, zeroPadZone = false, military = false }: FormatMgrsOptions = {}
): string => {
  if (!isMgrsDigits(digits)) {
    throw new InvalidParameterError(`invalid MGRS precision ${digits}`, "digits", { digits });
  }
  const { zone, band, column, row } = reference.gridSquare;
  const width = digits / 2;
  const divisor = 10 ** (5 - width);
  const easting = String(Math.floor(reference.easting / divisor)).padStart(width, "0");
  const northing = String(Math.floor(reference.northing / divisor)).padStart(width, "0");
  const zoneText = zeroPadZone ? String(zone).padStart(2, "0") : String(zone);

  return military
    ? `${zoneText}${band}${column}${row}${easting}${northing}`
    : `${zoneText}${band} ${column}${row} ${easting} ${northing}`;
};
