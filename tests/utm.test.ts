import { describe, expect, it } from "vitest";
import {
  DATUMS,
  convertUtm,
  createUtm,
  formatUtm,
  geographic,
  geographicToUtm,
  parseUtm,
  tryGeographicToUtm,
  tryParseUtm,
  tryUtmToGeographic,
  utmToGeographic,
  utmZoneOf
} from "../src/core/geodesy";
import { FormatError, InvalidParameterError } from "../src/core/errors";

describe("utm forward projection", () => {
  it("projects the Eiffel tower", () => {
    const { position } = geographicToUtm(geographic(2.2945, 48.8582));
    expect(position.zone).toBe(31);
    expect(position.hemisphere).toBe("N");
    expect(position.easting).toBeCloseTo(448251.795, 2);
    expect(position.northing).toBeCloseTo(5411932.678, 2);
    expect(position.datum).toBe(DATUMS.WGS84);
  });

  it("projects the origin onto the equator of zone 31", () => {
    const { position } = geographicToUtm(geographic(0, 0));
    expect(position.zone).toBe(31);
    expect(position.hemisphere).toBe("N");
    expect(position.easting).toBeCloseTo(166021.443081, 5);
    expect(position.northing).toBe(0);
  });

  it("adds the false northing in the southern hemisphere", () => {
    const { position } = geographicToUtm(geographic(-1, -1));
    expect(position.zone).toBe(30);
    expect(position.hemisphere).toBe("S");
    expect(position.easting).toBeCloseTo(722561.73648, 3);
    expect(position.northing).toBeCloseTo(9889402.02748, 3);
  });

  it("reports convergence and scale in Bergen's widened zone", () => {
    const projection = geographicToUtm(geographic(5.3249, 60.39135));
    expect(projection.position.zone).toBe(32);
    expect(projection.position.easting).toBeCloseTo(297508.41, 1);
    expect(projection.position.northing).toBeCloseTo(6700645.3, 1);
    expect(projection.convergence).toBeCloseTo(-3.19628144, 7);
    expect(projection.scale).toBeCloseTo(1.000102473211, 10);
  });

  it("passes elevation and measure through", () => {
    const { position } = geographicToUtm(geographic(2.2945, 48.8582, 330, 4));
    expect(position.elev).toBe(330);
    expect(position.m).toBe(4);
  });

  it("rejects latitudes outside -80..84", () => {
    expect(() => geographicToUtm(geographic(0, 84.0001))).toThrow(InvalidParameterError);
    expect(() => geographicToUtm(geographic(0, -80.0001))).toThrow(InvalidParameterError);
    expect(() => geographicToUtm(geographic(0, 90))).toThrow(InvalidParameterError);
    expect(tryGeographicToUtm(geographic(0, -90)).ok).toBe(false);
  });

  it("honours a zone override without the Norway exception", () => {
    const bergen = geographicToUtm(geographic(5.3249, 60.39135), { zone: 31 });
    expect(bergen.position.zone).toBe(31);
    expect(bergen.position.easting).toBeGreaterThan(500000);

    const paris = geographicToUtm(geographic(2.2945, 48.8582), { zone: 30 });
    expect(paris.position.zone).toBe(30);
    expect(paris.position.easting).toBeGreaterThan(800000);
  });

  it("verifies easting against the zone width unless disabled", () => {
    const farAway = geographic(2.2945, 48.8582);
    expect(() => geographicToUtm(farAway, { zone: 29 })).toThrow(FormatError);
    const { position } = geographicToUtm(farAway, { zone: 29, verifyEN: false });
    expect(position.easting).toBeGreaterThan(1000000);
  });

  it("rejects an invalid zone override", () => {
    expect(() => geographicToUtm(geographic(0, 0), { zone: 61 })).toThrow(InvalidParameterError);
    expect(() => geographicToUtm(geographic(0, 0), { zone: 0 })).toThrow(InvalidParameterError);
  });

  it("leaves values unrounded on request", () => {
    const rounded = geographicToUtm(geographic(2.2945, 48.8582));
    const raw = geographicToUtm(geographic(2.2945, 48.8582), { roundResults: false });
    expect(raw.position.easting).toBeCloseTo(rounded.position.easting, 8);
    expect(Number(rounded.scale.toFixed(12))).toBe(rounded.scale);
  });
});

describe("utm zones", () => {
  it("uses six degree zones by default", () => {
    expect(utmZoneOf(geographic(-180, 10))).toEqual({ zone: 1, hemisphere: "N" });
    expect(utmZoneOf(geographic(179.9, -10))).toEqual({ zone: 60, hemisphere: "S" });
    expect(utmZoneOf(geographic(2.5, 60))).toEqual({ zone: 31, hemisphere: "N" });
  });

  it("widens zone 32 over south-west Norway", () => {
    expect(utmZoneOf(geographic(5.3249, 60.39135)).zone).toBe(32);
    expect(utmZoneOf(geographic(3.5, 55)).zone).toBe(31);
  });

  it("applies the Svalbard zones in band X", () => {
    expect(utmZoneOf(geographic(8, 78)).zone).toBe(31);
    expect(utmZoneOf(geographic(10, 78)).zone).toBe(33);
    expect(utmZoneOf(geographic(20, 78)).zone).toBe(33);
    expect(utmZoneOf(geographic(22, 78)).zone).toBe(35);
    expect(utmZoneOf(geographic(32, 78)).zone).toBe(35);
    expect(utmZoneOf(geographic(34, 78)).zone).toBe(37);
  });
});

describe("utm inverse projection", () => {
  const samples: Array<[number, number]> = [
    [2.2945, 48.8582],
    [-1, -1],
    [0, 0],
    [151.2, -33.9],
    [-73.98, 40.75],
    [179.9, -79.9],
    [-179.9, 83.9],
    [5.3249, 60.39135]
  ];

  it.each(samples)("round-trips %f, %f within 5e-9 degrees", (lon, lat) => {
    const forward = geographicToUtm(geographic(lon, lat));
    const inverse = utmToGeographic(forward.position);
    expect(Math.abs(inverse.position.lon - lon)).toBeLessThan(5e-9);
    expect(Math.abs(inverse.position.lat - lat)).toBeLessThan(5e-9);
    expect(inverse.convergence).toBeCloseTo(forward.convergence, 6);
    expect(inverse.scale).toBeCloseTo(forward.scale, 9);
  });

  it("passes elevation and measure back", () => {
    const utm = createUtm(31, "N", 448251.795, 5411932.678, { elev: 330, m: 4 });
    const { position } = utmToGeographic(utm);
    expect(position.elev).toBe(330);
    expect(position.m).toBe(4);
    expect(position.lat).toBeCloseTo(48.8582, 6);
    expect(position.lon).toBeCloseTo(2.2945, 6);
  });

  it("returns a result wrapper", () => {
    const result = tryUtmToGeographic(createUtm(30, "S", 722561.73648, 9889402.02748));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.position.lat).toBeCloseTo(-1, 6);
    }
  });
});

describe("utm coordinates", () => {
  it("validates zone and hemisphere", () => {
    expect(() => createUtm(0, "N", 500000, 0)).toThrow(InvalidParameterError);
    expect(() => createUtm(61, "N", 500000, 0)).toThrow(InvalidParameterError);
    expect(() => createUtm(31, "X", 500000, 0)).toThrow(InvalidParameterError);
    expect(() => createUtm(31, "N", Number.NaN, 0)).toThrow(InvalidParameterError);
  });

  it("verifies easting and northing ranges", () => {
    expect(() => createUtm(31, "N", -1, 0)).toThrow(FormatError);
    expect(() => createUtm(31, "N", 1000001, 0)).toThrow(FormatError);
    expect(() => createUtm(31, "N", 500000, 9329006)).toThrow(FormatError);
    expect(() => createUtm(31, "S", 500000, 1116914)).toThrow(FormatError);
    expect(() => createUtm(31, "S", 500000, 10000001)).toThrow(FormatError);
    expect(createUtm(31, "S", 500000, 1116914, { verifyEN: false }).northing).toBe(1116914);
    expect(createUtm(31, "S", 500000, 10000000).northing).toBe(10000000);
  });

  it("re-projects into a neighbouring zone and back", () => {
    const utm = geographicToUtm(geographic(5.9, 48)).position;
    const east = convertUtm(utm, { zone: 32 });
    expect(east.zone).toBe(32);
    expect(east.easting).toBeLessThan(500000);
    const back = convertUtm(east, { zone: 31 });
    expect(back.easting).toBeCloseTo(utm.easting, 5);
    expect(back.northing).toBeCloseTo(utm.northing, 5);
  });

  it("re-projects into another datum in the same zone", () => {
    const utm = geographicToUtm(geographic(2.2945, 48.8582)).position;
    const ed50 = convertUtm(utm, { datum: DATUMS.ED50 });
    expect(ed50.zone).toBe(31);
    expect(ed50.datum).toBe(DATUMS.ED50);
    const shift = Math.hypot(ed50.easting - utm.easting, ed50.northing - utm.northing);
    expect(shift).toBeGreaterThan(50);
    expect(shift).toBeLessThan(500);
  });
});

describe("utm text", () => {
  it("parses a coordinate with elevation and measure", () => {
    const utm = parseUtm("31 n 448251.795 5411932.678 330 4");
    expect(utm).toMatchObject({
      zone: 31,
      hemisphere: "N",
      easting: 448251.795,
      northing: 5411932.678,
      elev: 330,
      m: 4
    });
  });

  it("parses with a datum", () => {
    expect(parseUtm(" 30 S 722561 9889402 ", { datum: DATUMS.ED50 }).datum).toBe(DATUMS.ED50);
  });

  it("rejects malformed text", () => {
    expect(() => parseUtm("31 N 448251")).toThrow(FormatError);
    expect(() => parseUtm("3a N 448251 5411932")).toThrow(FormatError);
    expect(() => parseUtm("31 Q 448251 5411932")).toThrow(FormatError);
    expect(() => parseUtm("31 N east 5411932")).toThrow(FormatError);
    expect(tryParseUtm("").ok).toBe(false);
  });

  it("formats with the requested decimals", () => {
    const utm = createUtm(31, "N", 448251.7954, 5411932.6781);
    expect(formatUtm(utm)).toBe("31 N 448252 5411933");
    expect(formatUtm(utm, { decimals: 3 })).toBe("31 N 448251.795 5411932.678");
  });

  it("formats whole numbers compactly unless asked not to", () => {
    const utm = createUtm(1, "N", 500000, 1768935);
    expect(formatUtm(utm, { decimals: 2 })).toBe("1 N 500000 1768935");
    expect(formatUtm(utm, { decimals: 2, compactNums: false })).toBe("1 N 500000.00 1768935.00");
    expect(formatUtm(utm, { zeroPadZone: true })).toBe("01 N 500000 1768935");
    expect(formatUtm(utm, { delimiter: "," })).toBe("1,N,500000,1768935");
  });

  it("writes elevation and measure", () => {
    expect(formatUtm(createUtm(1, "N", 500000, 1768935, { elev: 12.5 }), { decimals: 1 })).toBe(
      "1 N 500000 1768935 12.5"
    );
    expect(formatUtm(createUtm(1, "N", 500000, 1768935, { m: 3 }))).toBe("1 N 500000 1768935 0 3");
  });
});
