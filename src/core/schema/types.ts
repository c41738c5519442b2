import type { CartesianPosition, Datum, GeographicPosition } from "../geodesy";

export type PositionKind = "geographic" | "cartesian";

interface PositionRecordBase {
  id?: string;
  datum: Datum;
}

export interface GeographicPositionRecord extends PositionRecordBase {
  kind: "geographic";
  position: GeographicPosition;
}

export interface CartesianPositionRecord extends PositionRecordBase {
  kind: "cartesian";
  position: CartesianPosition;
}

/**
 * A position read from untrusted input: `{ lon, lat, elev?, m? }` or `{ x, y, z?, m? }`, with an
 * optional `id` and `datum` (catalog name or explicit definition, WGS84 when absent).
 */
export type PositionRecord = GeographicPositionRecord | CartesianPositionRecord;
