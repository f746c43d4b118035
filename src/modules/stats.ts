/**
 * Stats Module
 * Displays the run summary: bands triggered, files moved, issues
 */

import chalk from "chalk";
import type { FetchStats, Tracker } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export interface StatsOptions {
  tracker: Tracker;
  outputDir?: string; // Exports fetch-stats.json when set
  verbose?: boolean;
}

/**
 * Export stats to JSON and display the run summary on the console
 */
export async function stats({
  tracker,
  outputDir,
  verbose,
}: StatsOptions): Promise<void> {
  if (outputDir) {
    await tracker.exportStats(outputDir);
  }

  const summary = tracker.getStats();
  const hasErrors = summary.failedBands > 0 || summary.failedFiles > 0;
  const hasWarnings = summary.warnings.length > 0 || summary.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Fetch Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayBandsSection(summary);
  displayFilesSection(summary);
  displayIssuesSection(tracker, summary, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayBandsSection(summary: FetchStats): void {
  if (summary.requestedBands === 0) {
    return;
  }

  console.log(sectionHeader("Bands"));
  console.log(
    `   ${progressBar(summary.triggeredBands, summary.requestedBands)}`,
  );
  console.log(
    statRow(chalk.green("◉"), "Triggered", summary.triggeredBands, chalk.green),
  );

  if (summary.failedBands > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", summary.failedBands, chalk.red),
    );
  }
}

function displayFilesSection(summary: FetchStats): void {
  console.log(sectionHeader("Files"));
  console.log(`   ${progressBar(summary.movedFiles, summary.matchedFiles)}`);
  console.log(
    statRow(chalk.green("◉"), "Moved", summary.movedFiles, chalk.green),
  );

  if (summary.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Not moved", summary.failedFiles, chalk.red),
    );
  }
}

function displayIssuesSection(
  tracker: Tracker,
  summary: FetchStats,
  verbose?: boolean,
): void {
  const bandIssues = tracker.getIssues("band");
  const fileIssues = tracker.getIssues("file");
  const resourceIssues = tracker.getIssues("resource");

  if (summary.warnings.length > 0) {
    console.log(sectionHeader(chalk.yellow("Warnings")));
    for (const warning of summary.warnings) {
      console.log(`      ${chalk.dim("·")} ${warning}`);
    }
  }

  if (bandIssues.length + fileIssues.length + resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (bandIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Bands skipped", bandIssues.length, chalk.red),
    );
    for (const issue of bandIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.band} (${issue.reason})`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files not moved", fileIssues.length, chalk.red),
    );
    for (const issue of fileIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} (${issue.reason})`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config skipped",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}: ${issue.details}`);
      }
    }
  }
}
