import { InvalidParameterError } from "../errors";

/**
 * Reference ellipsoid: semi-major axis `a` and semi-minor axis `b` in metres, flattening `f`.
 */
export interface Ellipsoid {
  readonly id: string;
  readonly name: string;
  readonly a: number;
  readonly b: number;
  readonly f: number;
}

export const ELLIPSOIDS = {
  WGS84: { id: "WGS84", name: "WGS 84", a: 6378137.0, b: 6356752.314245, f: 1 / 298.257223563 },
  GRS80: { id: "GRS80", name: "GRS 1980(IUGG, 1980)", a: 6378137.0, b: 6356752.31414, f: 1 / 298.257222101 },
  Airy1830: { id: "airy", name: "Airy 1830", a: 6377563.396, b: 6356256.909, f: 1 / 299.3249646 },
  AiryModified: { id: "mod_airy", name: "Modified Airy", a: 6377340.189, b: 6356034.448, f: 1 / 299.3249646 },
  Bessel1841: { id: "bessel", name: "Bessel 1841", a: 6377397.155, b: 6356078.962822, f: 1 / 299.15281285 },
  Clarke1866: { id: "clrk66", name: "Clarke 1866", a: 6378206.4, b: 6356583.8, f: 1 / 294.978698214 },
  Clarke1880IGN: { id: "clrk80", name: "Clarke 1880 mod.", a: 6378249.2, b: 6356515.0, f: 1 / 293.466021294 },
  International1924: {
    id: "intl",
    name: "International 1924 (Hayford)",
    a: 6378388,
    b: 6356911.946128,
    f: 1 / 297
  },
  WGS72: { id: "WGS72", name: "WGS 72", a: 6378135, b: 6356750.52, f: 1 / 298.26 }
} as const satisfies Record<string, Ellipsoid>;

export type EllipsoidName = keyof typeof ELLIPSOIDS;

export interface EllipsoidParams {
  id: string;
  name?: string;
  a: number;
  b: number;
  f?: number;
}

export const createEllipsoid = ({ id, name, a, b, f }: EllipsoidParams): Ellipsoid => {
  if (!Number.isFinite(a) || !Number.isFinite(b) || !(a > b && b > 0)) {
    throw new InvalidParameterError(`Ellipsoid axes must satisfy a > b > 0 (a=${a}, b=${b})`, "axes", { a, b });
  }
  const flattening = f ?? (a - b) / a;
  if (!Number.isFinite(flattening) || flattening <= 0 || flattening >= 1) {
    throw new InvalidParameterError(`Ellipsoid flattening ${flattening} is out of range`, "f", { f: flattening });
  }
  return Object.freeze({ id, name: name ?? id, a, b, f: flattening });
};

export const ellipsoidEquals = (x: Ellipsoid, y: Ellipsoid): boolean =>
  x === y || (x.id === y.id && x.name === y.name && x.a === y.a && x.b === y.b && x.f === y.f);

/** First eccentricity squared, (a² − b²) / a². */
export const eccentricitySquared = ({ f }: Ellipsoid): number => 2 * f - f * f;

/** Third flattening, f / (2 − f). */
export const thirdFlattening = ({ f }: Ellipsoid): number => f / (2 - f);
