/**
 * Migrator Module
 * Moves finished downloads from the browser's download directory to the
 * output directory
 */

import glob from "fast-glob";
import path from "node:path";
import { fileExists, moveFile, toPendingFile, waitForFileCompletion } from "../utils";
import {
  DEFAULT_LONG_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from "../utils/await-condition";
import { SettleTimeoutError } from "../utils/errors";
import { awaitWindowsSettled, DEFAULT_SETTLE_GRACE_MS } from "./readiness";
import type { Logger } from "../utils/logger";
import type { WindowSource } from "../types/page";
import type {
  MigrationOutcome,
  MigrationReport,
  PendingFile,
  PollOutcome,
} from "../types/report";
import type { FetchContext } from "../types/context";

export interface MigrateOptions {
  sourceDir: string;
  destDir: string; // Must already exist
  pattern: string; // Shell-style glob matched inside sourceDir
  markerSuffix: string;
  timeout?: number; // Per-file completion wait
  interval?: number;
  signal?: AbortSignal;
  logger?: Logger;

  // Wait for pop-up windows to close before looking at the directory
  settleFirst?: boolean;
  windows?: WindowSource;
  settleGrace?: number; // Defaults to DEFAULT_SETTLE_GRACE_MS
  settleTimeout?: number;
}

/**
 * Files in `sourceDir` that match `pattern` right now
 *
 * A file whose name matches only through its marker (the browser has not
 * created the final name yet) is still included. Marker files are never
 * returned as files.
 */
export async function snapshot(
  sourceDir: string,
  pattern: string,
  markerSuffix: string,
): Promise<PendingFile[]> {
  const options = { cwd: sourceDir, absolute: true, onlyFiles: true };
  const [files, markers] = await Promise.all([
    glob(pattern, options),
    glob(`${pattern}${glob.escapePath(markerSuffix)}`, options),
  ]);

  const targets = new Set(
    files.filter((file) => !file.endsWith(markerSuffix)),
  );
  for (const marker of markers) {
    targets.add(marker.slice(0, -markerSuffix.length));
  }

  return [...targets]
    .sort((a, b) => a.localeCompare(b))
    .map((file) => toPendingFile(file, markerSuffix));
}

/**
 * One-shot migration of matching files
 *
 * Each file is moved only after its marker is gone. A failure on one file is
 * recorded and the remaining files are still processed; files that show up
 * after the snapshot are left for the next call.
 *
 * @throws SettleTimeoutError when settling first and pop-ups never close
 */
export async function migrate(options: MigrateOptions): Promise<MigrationReport> {
  const { sourceDir, destDir, pattern, markerSuffix, signal, logger } = options;
  const report: MigrationReport = { moved: [], outcomes: [] };

  if (options.settleFirst) {
    if (!options.windows) {
      throw new Error("settleFirst needs a window source to watch");
    }

    const settleTimeout = options.settleTimeout ?? DEFAULT_LONG_TIMEOUT_MS;

    logger?.info("Waiting for the browser windows to settle...");
    const settle = await awaitWindowsSettled(options.windows, {
      grace: options.settleGrace ?? DEFAULT_SETTLE_GRACE_MS,
      timeout: settleTimeout,
      interval: options.interval ?? DEFAULT_POLL_INTERVAL_MS,
      signal,
    });

    if (settle.status === "timed-out") {
      throw new SettleTimeoutError(settleTimeout, settle.windows);
    }
    if (settle.status === "aborted") return report;
  }

  const pending = await snapshot(sourceDir, pattern, markerSuffix);
  logger?.debug(`Matched ${pending.length} file(s) with "${pattern}"`);

  for (const file of pending) {
    const outcome = await migrateFile(file, destDir, options);
    report.outcomes.push(outcome);

    if (outcome.ok) {
      report.moved.push(outcome.destination);
      logger?.debug(`Moved ${path.basename(file.path)}`);
    } else {
      logger?.warn(`Not moved ${path.basename(file.path)}: ${outcome.details}`);
    }

    if (signal?.aborted) break;
  }

  return report;
}

async function migrateFile(
  file: PendingFile,
  destDir: string,
  options: MigrateOptions,
): Promise<MigrationOutcome> {
  const source = file.path;

  let completion: PollOutcome;
  let written: boolean;
  try {
    completion = await waitForFileCompletion(source, {
      markerSuffix: options.markerSuffix,
      timeout: options.timeout,
      interval: options.interval,
      signal: options.signal,
    });
    written = completion.status === "ready" && (await fileExists(source));
  } catch (error) {
    return {
      ok: false,
      source,
      reason: "check-failed",
      details: error instanceof Error ? error.message : String(error),
    };
  }

  if (completion.status !== "ready") {
    return {
      ok: false,
      source,
      reason: "incomplete",
      details:
        completion.status === "aborted"
          ? "Aborted while the download was in progress"
          : `Download still in progress after ${completion.elapsed}ms`,
    };
  }

  if (!written) {
    return {
      ok: false,
      source,
      reason: "missing",
      details: "Marker disappeared but the file was never written",
    };
  }

  const destination = path.join(destDir, path.basename(source));
  try {
    await moveFile(source, destination);
    return { ok: true, source, destination };
  } catch (error) {
    return {
      ok: false,
      source,
      reason: "move-failed",
      details: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Pipeline step: move the downloads of this run into the output directory
 *
 * Writes to context:
 * - migration: MigrationReport
 */
export async function relocate(ctx: FetchContext): Promise<void> {
  const { config, page, logger, tracker, signal } = ctx;

  const report = await migrate({
    sourceDir: path.resolve(config.download.directory),
    destDir: path.resolve(config.output.directory),
    pattern: config.download.pattern,
    markerSuffix: config.download.markerSuffix,
    timeout: config.timeouts.completion,
    interval: config.timeouts.interval,
    settleFirst: config.download.settleFirst,
    windows: page,
    settleGrace: config.timeouts.settleGrace,
    settleTimeout: config.timeouts.settle,
    signal,
    logger,
  });

  tracker.recordMigration(report.outcomes);
  ctx.migration = report;
}
