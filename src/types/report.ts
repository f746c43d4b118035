/**
 * Outcome types shared by the readiness, trigger and migrator modules
 */

export type PollStatus = "ready" | "timed-out" | "aborted";

export interface PollOutcome {
  status: PollStatus;
  elapsed: number; // Milliseconds
  attempts: number;
}

// ============================================================================
// Download Trigger
// ============================================================================

export type BandFailureReason =
  | "unknown-band"
  | "control-not-found"
  | "activation-failed";

export type BandOutcome =
  | { ok: true; band: string }
  | { ok: false; band: string; reason: BandFailureReason; details: string };

export interface TriggerReport {
  outcomes: BandOutcome[];
  triggered: string[];
  failed: Extract<BandOutcome, { ok: false }>[];
}

// ============================================================================
// File Migrator
// ============================================================================

export interface PendingFile {
  path: string;
  markerPath: string;
}

export type MigrationFailureReason =
  | "incomplete"
  | "missing"
  | "check-failed"
  | "move-failed";

export type MigrationOutcome =
  | { ok: true; source: string; destination: string }
  | {
      ok: false;
      source: string;
      reason: MigrationFailureReason;
      details: string;
    };

export interface MigrationReport {
  moved: string[]; // Destination paths
  outcomes: MigrationOutcome[];
}
