/**
 * Error classes for conditions that abort an operation
 * Per-band and per-file failures are reported as outcomes instead
 */

export type FetchErrorCode =
  | "navigation-timeout"
  | "missing-control"
  | "settle-timeout"
  | "aborted"
  | "unsupported-frame"
  | "invalid-request";

export class FetchError extends Error {
  constructor(
    readonly code: FetchErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NavigationTimeoutError extends FetchError {
  constructor(
    readonly timeout: number,
    readonly elapsed: number,
    readonly lastLocation: string,
  ) {
    super(
      "navigation-timeout",
      `Results page not reached after ${elapsed}ms (timeout ${timeout}ms), last location: ${lastLocation}`,
    );
  }
}

export class MissingControlError extends FetchError {
  constructor(
    readonly controlId: string,
    readonly timeout: number,
    readonly location: string,
  ) {
    super(
      "missing-control",
      `Timeout (>${timeout}ms) for the \`${controlId}\` element to load on [${location}]`,
    );
  }
}

export class SettleTimeoutError extends FetchError {
  constructor(
    readonly timeout: number,
    readonly windows: number,
  ) {
    super(
      "settle-timeout",
      `Browser windows did not settle within ${timeout}ms (${windows} still open)`,
    );
  }
}

export class UnsupportedFrameError extends FetchError {
  constructor(readonly frame: string) {
    super("unsupported-frame", `Unsupported frame "${frame}" (expected fk5 or galactic)`);
  }
}

export class InvalidRequestError extends FetchError {
  constructor(message: string) {
    super("invalid-request", message);
  }
}

export class AbortedError extends FetchError {
  constructor(step: string) {
    super("aborted", `Aborted while ${step}`);
  }
}
