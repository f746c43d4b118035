import { describe, it, expect, vi, afterEach } from "vitest";
import { formatDuration, stats } from "./stats";
import { Tracker } from "../utils/tracker";

describe("formatDuration", () => {
  it("picks the unit by magnitude", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(2500)).toBe("2.50s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("stats", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists skipped bands and files not moved", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const tracker = new Tracker();
    tracker.recordBands([
      { ok: false, band: "HIGAL_PMW", reason: "control-not-found", details: "" },
    ]);
    tracker.recordMigration([
      { ok: false, source: "/dl/x.fits", reason: "incomplete", details: "" },
    ]);

    await stats({ tracker });

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines.some((line) => line.includes("HIGAL_PMW (control-not-found)"))).toBe(true);
    expect(lines.some((line) => line.includes("/dl/x.fits (incomplete)"))).toBe(true);
  });
});
