import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rename,
  rm,
  unlink,
  writeFile,
} from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { migrate, snapshot } from "./migrator";
import { DEFAULT_SETTLE_GRACE_MS } from "./readiness";
import { SettleTimeoutError } from "../utils/errors";

describe("migrate", () => {
  let root: string;
  let source: string;
  let dest: string;

  const write = (name: string, content = "") =>
    writeFile(path.join(source, name), content);

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "migrator-"));
    source = path.join(root, "downloads");
    dest = path.join(root, "data");
    await mkdir(source);
    await mkdir(dest);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("returns an empty report when nothing matches", async () => {
    await write("notes.txt");

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
    });

    expect(report).toEqual({ moved: [], outcomes: [] });
  });

  it("moves a finished file and waits for one still being written", async () => {
    await write("map_354_blue.fits", "blue");
    await write("map_354_red.fits", "");
    await write("map_354_red.fits.part", "");
    await write("map_355_blue.fits", "other field");

    // Simulated writer: finishes the red map after 2 seconds
    setTimeout(() => {
      void (async () => {
        await write("map_354_red.fits", "red");
        await unlink(path.join(source, "map_354_red.fits.part"));
      })();
    }, 2000);

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*354*.fits",
      markerSuffix: ".part",
      timeout: 10_000,
      interval: 50,
    });

    expect(report.moved).toEqual([
      path.join(dest, "map_354_blue.fits"),
      path.join(dest, "map_354_red.fits"),
    ]);
    expect(report.outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect(await readFile(path.join(dest, "map_354_red.fits"), "utf-8")).toBe(
      "red",
    );
    expect(await readdir(source)).toEqual(["map_355_blue.fits"]);
  });

  it("picks up downloads that only exist as a marker so far", async () => {
    await write("map_354_plw.fits.crdownload", "partial");

    // Chromium renames the marker to the final name when done
    setTimeout(() => {
      void rename(
        path.join(source, "map_354_plw.fits.crdownload"),
        path.join(source, "map_354_plw.fits"),
      );
    }, 100);

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".crdownload",
      timeout: 5000,
      interval: 20,
    });

    expect(report.moved).toEqual([path.join(dest, "map_354_plw.fits")]);
  });

  it("leaves files created after the snapshot alone", async () => {
    await write("a.fits", "a");
    await write("a.fits.part", "");

    setTimeout(() => {
      void (async () => {
        await write("late.fits", "late");
        await unlink(path.join(source, "a.fits.part"));
      })();
    }, 100);

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
      timeout: 5000,
      interval: 20,
    });

    expect(report.moved).toEqual([path.join(dest, "a.fits")]);
    expect(await readdir(source)).toEqual(["late.fits"]);
  });

  it("keeps moving the other files when one move fails", async () => {
    await write("a.fits", "a");
    await write("b.fits", "b");
    await write("c.fits", "c");
    // A non-empty directory in the way makes the move of b.fits fail
    await mkdir(path.join(dest, "b.fits"));
    await writeFile(path.join(dest, "b.fits", "keep"), "");

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
    });

    expect(report.moved).toEqual([
      path.join(dest, "a.fits"),
      path.join(dest, "c.fits"),
    ]);
    expect(report.outcomes).toHaveLength(3);
    expect(report.outcomes[1]).toMatchObject({
      ok: false,
      source: path.join(source, "b.fits"),
      reason: "move-failed",
    });
    expect(await readdir(source)).toEqual(["b.fits"]);
  });

  it("overwrites a same-named file in the destination", async () => {
    await write("a.fits", "new");
    await writeFile(path.join(dest, "a.fits"), "old");

    await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
    });

    expect(await readFile(path.join(dest, "a.fits"), "utf-8")).toBe("new");
  });

  it("reports files whose download never finishes", async () => {
    await write("stuck.fits", "");
    await write("stuck.fits.part", "");

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
      timeout: 60,
      interval: 20,
    });

    expect(report.moved).toEqual([]);
    expect(report.outcomes).toEqual([
      expect.objectContaining({ ok: false, reason: "incomplete" }),
    ]);
  });

  it("reports a marker that vanished without a file", async () => {
    await write("ghost.fits.part", "");
    setTimeout(() => void unlink(path.join(source, "ghost.fits.part")), 50);

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".part",
      timeout: 5000,
      interval: 20,
    });

    expect(report.outcomes).toEqual([
      expect.objectContaining({
        ok: false,
        source: path.join(source, "ghost.fits"),
        reason: "missing",
      }),
    ]);
  });

  it("keeps the report when checking a file fails", async () => {
    await write("a.fits", "a");
    // The marker name for this one is longer than the file system allows
    const long = "b".repeat(250) + ".fits";
    await write(long, "b");

    const report = await migrate({
      sourceDir: source,
      destDir: dest,
      pattern: "*.fits",
      markerSuffix: ".crdownload",
      timeout: 1000,
      interval: 20,
    });

    expect(report.moved).toEqual([path.join(dest, "a.fits")]);
    expect(report.outcomes).toHaveLength(2);
    expect(report.outcomes[1]).toMatchObject({
      ok: false,
      source: path.join(source, long),
      reason: "check-failed",
    });
    expect(await readdir(source)).toEqual([long]);
  });

  describe("settle first", () => {
    it("waits for pop-up windows to close before moving", async () => {
      await write("a.fits", "a");
      const counts = [3, 2, 1];
      let calls = 0;
      const windows = {
        windowCount: async () => counts[Math.min(calls++, counts.length - 1)],
      };

      const report = await migrate({
        sourceDir: source,
        destDir: dest,
        pattern: "*.fits",
        markerSuffix: ".part",
        interval: 10,
        settleFirst: true,
        windows,
        settleGrace: 0,
        settleTimeout: 5000,
      });

      expect(calls).toBe(3);
      expect(report.moved).toEqual([path.join(dest, "a.fits")]);
    });

    it("aborts without moving anything when the windows never settle", async () => {
      await write("a.fits", "a");

      const error = await migrate({
        sourceDir: source,
        destDir: dest,
        pattern: "*.fits",
        markerSuffix: ".part",
        interval: 10,
        settleFirst: true,
        windows: { windowCount: async () => 2 },
        settleGrace: 0,
        settleTimeout: 50,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SettleTimeoutError);
      expect(error).toMatchObject({ timeout: 50, windows: 2 });
      expect(await readdir(source)).toEqual(["a.fits"]);
    });

    it("gives pop-ups the default grace period to open", async () => {
      await write("a.fits", "a");
      const start = Date.now();

      const report = await migrate({
        sourceDir: source,
        destDir: dest,
        pattern: "*.fits",
        markerSuffix: ".part",
        interval: 10,
        settleFirst: true,
        windows: { windowCount: async () => 1 },
        settleTimeout: 5000,
      });

      expect(DEFAULT_SETTLE_GRACE_MS).toBe(3000);
      expect(Date.now() - start).toBeGreaterThanOrEqual(2900);
      expect(report.moved).toEqual([path.join(dest, "a.fits")]);
    });

    it("needs a window source", async () => {
      await expect(
        migrate({
          sourceDir: source,
          destDir: dest,
          pattern: "*.fits",
          markerSuffix: ".part",
          settleFirst: true,
        }),
      ).rejects.toThrow("settleFirst needs a window source to watch");
    });
  });
});

describe("snapshot", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "snapshot-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("never lists marker files as files", async () => {
    for (const name of ["a.fits", "b.fits.part", "c.txt", "d.fits", "d.fits.part"]) {
      await writeFile(path.join(dir, name), "");
    }

    const pending = await snapshot(dir, "*", ".part");

    expect(pending.map((file) => path.basename(file.path))).toEqual([
      "a.fits",
      "b.fits",
      "c.txt",
      "d.fits",
    ]);
    expect(pending[1].markerPath).toBe(path.join(dir, "b.fits.part"));
  });

  it("matches single characters with ?", async () => {
    for (const name of ["map1.fits", "map12.fits"]) {
      await writeFile(path.join(dir, name), "");
    }

    const pending = await snapshot(dir, "map?.fits", ".part");

    expect(pending.map((file) => path.basename(file.path))).toEqual([
      "map1.fits",
    ]);
  });
});
