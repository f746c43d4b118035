import { describe, it, expect } from "vitest";
import { createSearchRequest } from "./create-search-request";
import { InvalidRequestError, UnsupportedFrameError } from "./errors";
import { formatCoordinates } from "./format-coordinates";
import { MISSING_UNIT_WARNING } from "./parse-radius";

const catalog = Object.freeze({ HIGAL_BLUE: 4047, HIGAL_RED: 4051 });

describe("createSearchRequest", () => {
  it("defaults to every catalog band", () => {
    const request = createSearchRequest(
      { center: { frame: "galactic", lon: 35.39, lat: -0.33 }, radius: "30arcmin" },
      catalog,
    );

    expect(request.bands).toEqual(["HIGAL_BLUE", "HIGAL_RED"]);
    expect(request.radius).toEqual({ value: 30, unit: "arcmin" });
    expect(request.warnings).toEqual([]);
  });

  it("records the missing-unit warning for a bare radius", () => {
    const request = createSearchRequest(
      { center: { frame: "fk5", lon: 284.3, lat: 2.1 }, radius: 30 },
      catalog,
    );

    expect(request.radius.value).toBe(30);
    expect(request.warnings).toEqual([MISSING_UNIT_WARNING]);
  });

  it("is frozen", () => {
    const request = createSearchRequest(
      { center: { frame: "fk5", lon: 1, lat: 2 }, radius: "1deg" },
      catalog,
    );

    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.center)).toBe(true);
    expect(Object.isFrozen(request.bands)).toBe(true);
  });

  it("deduplicates requested bands", () => {
    const request = createSearchRequest(
      {
        center: { frame: "fk5", lon: 1, lat: 2 },
        radius: "1deg",
        bands: ["HIGAL_RED", "HIGAL_RED"],
      },
      catalog,
    );

    expect(request.bands).toEqual(["HIGAL_RED"]);
  });

  it("fails on an unsupported frame instead of defaulting", () => {
    expect(() =>
      createSearchRequest(
        { center: { frame: "icrs", lon: 1, lat: 2 }, radius: "1deg" },
        catalog,
      ),
    ).toThrow(UnsupportedFrameError);
  });

  it("fails on unknown bands and out of range latitudes", () => {
    expect(() =>
      createSearchRequest(
        {
          center: { frame: "fk5", lon: 1, lat: 2 },
          radius: "1deg",
          bands: ["HIGAL_GREEN"],
        },
        catalog,
      ),
    ).toThrow("Unknown band(s): HIGAL_GREEN (known: HIGAL_BLUE, HIGAL_RED)");

    expect(() =>
      createSearchRequest(
        { center: { frame: "fk5", lon: 1, lat: 95 }, radius: "1deg" },
        catalog,
      ),
    ).toThrow(InvalidRequestError);
  });

  it("does not take inherited object keys for bands", () => {
    expect(() =>
      createSearchRequest(
        {
          center: { frame: "fk5", lon: 1, lat: 2 },
          radius: "1deg",
          bands: ["constructor"],
        },
        catalog,
      ),
    ).toThrow("Unknown band(s): constructor (known: HIGAL_BLUE, HIGAL_RED)");
  });
});

describe("formatCoordinates", () => {
  it("prints four decimals and wraps the longitude", () => {
    expect(formatCoordinates({ frame: "galactic", lon: 35.39, lat: -0.33 })).toBe(
      "35.3900 -0.3300",
    );
    expect(formatCoordinates({ frame: "fk5", lon: -10, lat: 5 })).toBe(
      "350.0000 5.0000",
    );
  });
});
