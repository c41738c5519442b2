import { InvalidParameterError } from "../errors";
import { ELLIPSOIDS, ellipsoidEquals } from "./ellipsoid";
import type { Ellipsoid } from "./ellipsoid";

/**
 * Helmert parameters from WGS84 to a datum: translations in metres, scale in ppm, rotations in
 * arcseconds.
 */
export type HelmertParams = readonly [
  tx: number,
  ty: number,
  tz: number,
  scalePpm: number,
  rx: number,
  ry: number,
  rz: number
];

export interface Datum {
  readonly id: string;
  readonly ellipsoid: Ellipsoid;
  readonly helmertParams: HelmertParams;
}

// ETRS89 coincides with WGS84 at epoch 1989.0 at the one metre level, hence the null transform.
export const DATUMS = {
  ED50: {
    id: "ED50",
    ellipsoid: ELLIPSOIDS.International1924,
    helmertParams: [89.5, 93.8, 123.1, -1.2, 0.0, 0.0, 0.156]
  },
  ETRS89: { id: "ETRS89", ellipsoid: ELLIPSOIDS.GRS80, helmertParams: [0, 0, 0, 0, 0, 0, 0] },
  Irl1975: {
    id: "Irl1975",
    ellipsoid: ELLIPSOIDS.AiryModified,
    helmertParams: [-482.53, 130.596, -564.557, -8.15, 1.042, 0.214, 0.631]
  },
  NAD27: { id: "NAD27", ellipsoid: ELLIPSOIDS.Clarke1866, helmertParams: [8, -160, -176, 0, 0, 0, 0] },
  NAD83: {
    id: "NAD83",
    ellipsoid: ELLIPSOIDS.GRS80,
    helmertParams: [0.9956, -1.9103, -0.5215, -0.00062, 0.025915, 0.009426, 0.011599]
  },
  NTF: { id: "NTF", ellipsoid: ELLIPSOIDS.Clarke1880IGN, helmertParams: [168, 60, -320, 0, 0, 0, 0] },
  OSGB36: {
    id: "OSGB36",
    ellipsoid: ELLIPSOIDS.Airy1830,
    helmertParams: [-446.448, 125.157, -542.06, 20.4894, -0.1502, -0.247, -0.8421]
  },
  Potsdam: {
    id: "Potsdam",
    ellipsoid: ELLIPSOIDS.Bessel1841,
    helmertParams: [-582, -105, -414, -8.3, 1.04, 0.35, -3.08]
  },
  TokyoJapan: { id: "TokyoJapan", ellipsoid: ELLIPSOIDS.Bessel1841, helmertParams: [148, -507, -685, 0, 0, 0, 0] },
  WGS72: { id: "WGS72", ellipsoid: ELLIPSOIDS.WGS72, helmertParams: [0, 0, -4.5, -0.22, 0, 0, 0.554] },
  WGS84: { id: "WGS84", ellipsoid: ELLIPSOIDS.WGS84, helmertParams: [0, 0, 0, 0, 0, 0, 0] }
} as const satisfies Record<string, Datum>;

export type DatumName = keyof typeof DATUMS;

export interface DatumParams {
  id: string;
  ellipsoid: Ellipsoid;
  helmertParams: readonly number[];
}

export const createDatum = ({ id, ellipsoid, helmertParams }: DatumParams): Datum => {
  const [tx, ty, tz, s, rx, ry, rz] = helmertParams;
  if (helmertParams.length !== 7 || !helmertParams.every(Number.isFinite)) {
    throw new InvalidParameterError("Helmert transform must have 7 finite parameters", "helmertParams", {
      helmertParams: [...helmertParams]
    });
  }
  return Object.freeze({ id, ellipsoid, helmertParams: Object.freeze([tx, ty, tz, s, rx, ry, rz] as const) });
};

export const helmertEquals = (x: HelmertParams, y: HelmertParams): boolean => x.every((value, i) => value === y[i]);

/**
 * Structural equality: same ellipsoid and same transform. The id is only a label.
 */
export const datumEquals = (x: Datum, y: Datum): boolean =>
  x === y || (ellipsoidEquals(x.ellipsoid, y.ellipsoid) && helmertEquals(x.helmertParams, y.helmertParams));

export const isWgs84 = (datum: Datum): boolean => datumEquals(datum, DATUMS.WGS84);
