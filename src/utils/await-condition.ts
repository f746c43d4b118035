/**
 * Poll Condition
 * Re-evaluates a predicate until it holds, the timeout elapses or the
 * signal aborts. All other waits in the pipeline are built on this.
 */

import type { PollOutcome } from "../types/report";

/**
 * Ceiling for waits the caller leaves unbounded (24 hours)
 * Large enough to be effectively soft-infinite for interactive use
 */
export const DEFAULT_LONG_TIMEOUT_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_POLL_INTERVAL_MS = 500;

export type Predicate = () => boolean | Promise<boolean>;

export interface PollOptions {
  timeout?: number; // Milliseconds, defaults to DEFAULT_LONG_TIMEOUT_MS
  interval?: number; // Milliseconds between attempts
  signal?: AbortSignal;
}

/**
 * Resolves after `ms`, or early (without rejecting) once `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Evaluates `predicate` immediately, then every `interval` ms until it
 * returns true or `timeout` ms have passed. Never sleeps past the deadline,
 * so a predicate that never holds reports "timed-out" right after it.
 *
 * Errors thrown by the predicate propagate to the caller.
 */
export async function awaitCondition(
  predicate: Predicate,
  options: PollOptions = {},
): Promise<PollOutcome> {
  const timeout = options.timeout ?? DEFAULT_LONG_TIMEOUT_MS;
  const interval = options.interval ?? DEFAULT_POLL_INTERVAL_MS;
  const { signal } = options;

  if (!(timeout >= 0) || !(interval > 0)) {
    throw new RangeError(
      `Invalid poll bounds (timeout ${timeout}ms, interval ${interval}ms)`,
    );
  }

  const start = Date.now();
  const deadline = start + timeout;
  let attempts = 0;

  for (;;) {
    if (signal?.aborted) {
      return { status: "aborted", elapsed: Date.now() - start, attempts };
    }

    attempts++;
    if (await predicate()) {
      return { status: "ready", elapsed: Date.now() - start, attempts };
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { status: "timed-out", elapsed: Date.now() - start, attempts };
    }

    await sleep(Math.min(interval, remaining), signal);
  }
}
