import { describe, expect, it } from "vitest";
import { parseJsonPositions, parseNdjsonPositions } from "../src/io/positionStream";
import { DATUMS } from "../src/core/geodesy";

describe("position streams", () => {
  it("reads NDJSON records and skips blank lines", () => {
    const records = parseNdjsonPositions('{"lon":1,"lat":2}\n\n  {"x":1,"y":2,"z":3,"datum":"NAD83"}\n');
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      kind: "geographic",
      id: undefined,
      datum: DATUMS.WGS84,
      position: { lon: 1, lat: 2 }
    });
    expect(records[1].kind).toBe("cartesian");
    expect(records[1].datum).toBe(DATUMS.NAD83);
  });

  it("reports the failing NDJSON line", () => {
    expect(() => parseNdjsonPositions('{"lon":1,"lat":2}\n{"lon":1,"lat":"x"}')).toThrow(
      "Invalid NDJSON position at line 2: record.lat must be numeric"
    );
    expect(() => parseNdjsonPositions("{not json")).toThrow(/Invalid NDJSON position at line 1/);
  });

  it("reads JSON arrays", () => {
    const records = parseJsonPositions('[{"lon":1,"lat":2},{"lon":3,"lat":4,"elev":5}]');
    expect(records.map((record) => record.position)).toEqual([
      { lon: 1, lat: 2 },
      { lon: 3, lat: 4, elev: 5 }
    ]);
  });

  it("rejects anything but an array of valid positions", () => {
    expect(() => parseJsonPositions('{"lon":1,"lat":2}')).toThrow("Expected JSON array of positions");
    expect(() => parseJsonPositions("[")).toThrow(/Invalid JSON/);
    expect(() => parseJsonPositions('[{"lon":1,"lat":2},{"lon":1}]')).toThrow("positions[1].lat must be numeric");
  });
});
