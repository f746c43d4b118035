/**
 * Readiness Module
 * Poll-based gates on the remote session: results page loaded, pop-ups closed
 */

import { awaitCondition, sleep } from "../utils/await-condition";
import { NavigationTimeoutError } from "../utils/errors";
import type { PollOutcome } from "../types/report";
import type { SurveyPage, WindowSource } from "../types/page";

export interface ResultsPageOptions {
  marker: string;
  timeout: number;
  interval: number;
  signal?: AbortSignal;
}

/**
 * Wait for the location to switch from the search form to the results view
 *
 * @throws NavigationTimeoutError with the last location seen
 */
export async function awaitResultsPage(
  page: SurveyPage,
  options: ResultsPageOptions,
): Promise<PollOutcome> {
  let lastLocation = "";

  const outcome = await awaitCondition(async () => {
    lastLocation = await page.location();
    return lastLocation.includes(options.marker);
  }, options);

  if (outcome.status === "timed-out") {
    throw new NavigationTimeoutError(
      options.timeout,
      outcome.elapsed,
      lastLocation,
    );
  }

  return outcome;
}

/** Pause before the first window count, long enough for pop-ups to open */
export const DEFAULT_SETTLE_GRACE_MS = 3000;

export interface SettleOptions {
  grace: number; // Pause before the first check, lets pop-ups open
  timeout: number;
  interval: number;
  signal?: AbortSignal;
}

export interface SettleOutcome extends PollOutcome {
  windows: number; // Open windows at the last check
}

/**
 * Wait until at most one browser window is left open
 */
export async function awaitWindowsSettled(
  source: WindowSource,
  options: SettleOptions,
): Promise<SettleOutcome> {
  await sleep(options.grace, options.signal);

  let windows = 0;
  const outcome = await awaitCondition(async () => {
    windows = await source.windowCount();
    return windows <= 1;
  }, options);

  return { ...outcome, windows };
}
