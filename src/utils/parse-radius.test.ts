import { describe, it, expect } from "vitest";
import { formatRadius, parseRadius, MISSING_UNIT_WARNING } from "./parse-radius";
import { InvalidRequestError } from "./errors";

describe("parseRadius", () => {
  it("reads a bare number as arc-minutes and warns", () => {
    expect(parseRadius(30)).toEqual({
      radius: { value: 30, unit: "arcmin" },
      warning: MISSING_UNIT_WARNING,
    });
  });

  it("reads a unit-less string as arc-minutes and warns", () => {
    const { radius, warning } = parseRadius("12.5");
    expect(radius).toEqual({ value: 12.5, unit: "arcmin" });
    expect(warning).toBe(MISSING_UNIT_WARNING);
  });

  it("converts units to arc-minutes without warning", () => {
    expect(parseRadius("0.5deg")).toEqual({
      radius: { value: 30, unit: "arcmin" },
      warning: undefined,
    });
    expect(parseRadius("1800 arcsec").radius.value).toBe(30);
    expect(parseRadius("30'").radius.value).toBe(30);
    expect(parseRadius("90\"").radius.value).toBe(1.5);
    expect(parseRadius({ value: 2, unit: "deg" }).radius.value).toBe(120);
  });

  it("rejects non-positive and unparsable radii", () => {
    expect(() => parseRadius(0)).toThrow(InvalidRequestError);
    expect(() => parseRadius(-5)).toThrow(InvalidRequestError);
    expect(() => parseRadius("ten arcmin")).toThrow(
      'Cannot parse radius "ten arcmin"',
    );
    expect(() => parseRadius({ value: Number.NaN, unit: "arcmin" })).toThrow(
      InvalidRequestError,
    );
  });
});

describe("formatRadius", () => {
  it("prints arc-minutes without unit", () => {
    expect(formatRadius({ value: 30, unit: "arcmin" })).toBe("30");
    expect(formatRadius({ value: 0.25, unit: "deg" })).toBe("15");
  });
});
