import { describe, expect, it } from "vitest";
import {
  DATUMS,
  LAT_BAND_LETTERS,
  createMgrs,
  formatMgrs,
  formatUtm,
  geographic,
  geographicToUtm,
  gridZoneBounds,
  mgrsFromUtm,
  mgrsToUtm,
  parseMgrs,
  tryParseMgrs
} from "../src/core/geodesy";
import { FormatError, InvalidParameterError, attempt } from "../src/core/errors";

const MISSING_ZONES = new Set(["32X", "34X", "36X"]);

const mgrsOf = (lon: number, lat: number) => mgrsFromUtm(geographicToUtm(geographic(lon, lat)).position);

describe("mgrs from utm", () => {
  it("encodes the Eiffel tower", () => {
    expect(formatMgrs(mgrsOf(2.2945, 48.8582))).toBe("31U DQ 48251 11932");
  });

  it("encodes positions in the widened Norway zone", () => {
    expect(formatMgrs(mgrsOf(5.3249, 60.39135))).toBe("32V KN 97508 00645");
  });

  it("encodes southern hemisphere positions", () => {
    expect(formatMgrs(mgrsOf(-1, -1))).toBe("30M YD 22561 89402");
  });

  it("keeps the datum of the utm coordinate", () => {
    const utm = geographicToUtm(geographic(2.2945, 48.8582), { datum: DATUMS.ED50 }).position;
    expect(mgrsFromUtm(utm).datum).toBe(DATUMS.ED50);
  });
});

describe("mgrs to utm", () => {
  it("decodes a full precision reference", () => {
    expect(formatUtm(mgrsToUtm(parseMgrs("01P ET 00000 68935")))).toBe("1 N 500000 1768935");
  });

  it("decodes a reduced precision reference to the square corner", () => {
    const utm = mgrsToUtm(parseMgrs("12S TC 52 86"));
    expect(utm).toMatchObject({ zone: 12, hemisphere: "N", easting: 252000, northing: 3786000 });
  });

  it("decodes southern hemisphere references", () => {
    const utm = mgrsToUtm(parseMgrs("30M YD 22561 89402"));
    expect(utm).toMatchObject({ zone: 30, hemisphere: "S", easting: 722561, northing: 9889402 });
  });

  it("truncates to the metre inside the square", () => {
    const utm = geographicToUtm(geographic(2.2945, 48.8582)).position;
    const corner = mgrsToUtm(mgrsFromUtm(utm));
    expect(corner.easting).toBe(Math.floor(utm.easting));
    expect(corner.northing).toBe(Math.floor(utm.northing));
  });

  it("resolves the 2000 km row cycle in every band", () => {
    for (const band of LAT_BAND_LETTERS) {
      for (let zone = 1; zone <= 60; zone++) {
        if (MISSING_ZONES.has(`${zone}${band}`)) continue;
        const { west, south, east, north } = gridZoneBounds(zone, band);
        for (const lat of [south + 0.05, (south + north) / 2, north - 0.05]) {
          for (const lon of [west + 0.05, (west + east) / 2, east - 0.05]) {
            const utm = geographicToUtm(geographic(lon, lat)).position;
            const reference = mgrsFromUtm(utm);
            expect(reference.gridSquare.zone).toBe(zone);
            expect(reference.gridSquare.band).toBe(band);

            const corner = mgrsToUtm(reference);
            expect(corner.hemisphere).toBe(utm.hemisphere);
            expect(Math.abs(corner.easting - utm.easting)).toBeLessThan(1.01);
            expect(Math.abs(corner.northing - utm.northing)).toBeLessThan(1.01);
          }
        }
      }
    }
  });
});

describe("mgrs references", () => {
  it("collects every invalid component", () => {
    const result = attempt(() => createMgrs(0, "I", "Z", "Z", 100000, -1));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(FormatError);
      expect(result.error.details?.errors).toEqual([
        "invalid zone 0",
        'invalid band "I"',
        'invalid row "Z"',
        "invalid easting 100000",
        "invalid northing -1"
      ]);
    }
  });

  it("checks the column letter against the zone", () => {
    expect(() => createMgrs(31, "U", "J", "Q", 0, 0)).toThrow(/invalid column "J" for zone 31/);
    expect(createMgrs(32, "U", "J", "Q", 0, 0).gridSquare.column).toBe("J");
  });

  it("rejects the I and O bands", () => {
    expect(() => parseMgrs("31I DQ 48251 11932")).toThrow(FormatError);
    expect(() => parseMgrs("31O DQ 48251 11932")).toThrow(FormatError);
  });
});

describe("mgrs text", () => {
  it("parses military style references", () => {
    const military = parseMgrs("31UDQ4825111932");
    expect(military).toEqual(parseMgrs("31U DQ 48251 11932"));
    expect(formatMgrs(military, { military: true })).toBe("31UDQ4825111932");
  });

  it("parses a single combined digit group", () => {
    expect(parseMgrs("31U DQ 4825111932")).toEqual(parseMgrs("31u dq 48251 11932"));
  });

  it("pads short digit groups to metres", () => {
    const reference = parseMgrs("4Q FJ 1 6");
    expect(reference.easting).toBe(10000);
    expect(reference.northing).toBe(60000);
    expect(formatMgrs(reference, { digits: 2 })).toBe("4Q FJ 1 6");
  });

  it("truncates decimal digit groups", () => {
    const reference = parseMgrs("31U DQ 48251.7 11932.9");
    expect(reference.easting).toBe(48251);
    expect(reference.northing).toBe(11932);
    expect(() => parseMgrs("31U DQ 4825.1 1193.2")).toThrow(FormatError);
  });

  it("rejects unbalanced digit groups", () => {
    expect(() => parseMgrs("31UDQ482511193")).toThrow(FormatError);
    expect(() => parseMgrs("31U DQ 482 11")).toThrow(FormatError);
    expect(tryParseMgrs("not a reference").ok).toBe(false);
  });

  it("formats at reduced precision by truncation", () => {
    const reference = parseMgrs("31U DQ 48251 11932");
    expect(formatMgrs(reference, { digits: 8 })).toBe("31U DQ 4825 1193");
    expect(formatMgrs(reference, { digits: 6 })).toBe("31U DQ 482 119");
    expect(formatMgrs(reference, { digits: 4 })).toBe("31U DQ 48 11");
  });

  it("pads the zone on request", () => {
    expect(formatMgrs(parseMgrs("4Q FJ 12345 67890"), { zeroPadZone: true })).toBe("04Q FJ 12345 67890");
  });

  it("only formats even precisions up to ten digits", () => {
    const reference = parseMgrs("31U DQ 48251 11932");
    expect(() => formatMgrs(reference, { digits: 3 })).toThrow(InvalidParameterError);
    expect(() => formatMgrs(reference, { digits: 12 })).toThrow(InvalidParameterError);
  });
});
