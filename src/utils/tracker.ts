/**
 * Run Tracker
 * Unified tracking for stats, warnings and issues of a fetch run
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  BandFailureReason,
  BandOutcome,
  MigrationFailureReason,
  MigrationOutcome,
} from "../types/report";

// ============================================================================
// Issue Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface BandIssue {
  type: "band";
  band: string;
  reason: BandFailureReason;
  details: string;
}

export interface FileIssue {
  type: "file";
  path: string;
  reason: MigrationFailureReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = BandIssue | FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface FetchStats {
  requestedBands: number;
  triggeredBands: number;
  failedBands: number;
  matchedFiles: number;
  movedFiles: number;
  failedFiles: number;
  warnings: string[];
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private requestedBands = 0;
  private triggeredBands = 0;
  private failedBands = 0;
  private matchedFiles = 0;
  private movedFiles = 0;
  private failedFiles = 0;
  private warnings: string[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Outcome recording
  // ============================================================================

  recordBands(outcomes: BandOutcome[]): void {
    this.requestedBands += outcomes.length;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.triggeredBands++;
        continue;
      }
      this.failedBands++;
      this.issues.push({
        type: "band",
        band: outcome.band,
        reason: outcome.reason,
        details: outcome.details,
      });
    }
  }

  recordMigration(outcomes: MigrationOutcome[]): void {
    this.matchedFiles += outcomes.length;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        this.movedFiles++;
        continue;
      }
      this.failedFiles++;
      this.issues.push({
        type: "file",
        path: outcome.source,
        reason: outcome.reason,
        details: outcome.details,
      });
    }
  }

  trackWarning(message: string): void {
    this.warnings.push(message);
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getWarnings(): string[] {
    return this.warnings;
  }

  getStats(): FetchStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      requestedBands: this.requestedBands,
      triggeredBands: this.triggeredBands,
      failedBands: this.failedBands,
      matchedFiles: this.matchedFiles,
      movedFiles: this.movedFiles,
      failedFiles: this.failedFiles,
      warnings: this.warnings,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<string> {
    const { issues, warnings, ...summary } = this.getStats();

    const exported = {
      summary,
      warnings,
      issues: {
        band: this.getIssues("band"),
        file: this.getIssues("file"),
        resource: this.getIssues("resource"),
      },
    };

    const outputPath = join(outputDir, "fetch-stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    return outputPath;
  }
}
