/**
 * Form Module
 * Fills the search form from the request and submits it
 */

import { formatCoordinates } from "../utils/format-coordinates";
import { formatRadius } from "../utils/parse-radius";
import { AbortedError, UnsupportedFrameError } from "../utils/errors";
import { isFrame } from "../utils/create-search-request";
import { awaitResultsPage } from "./readiness";
import type { FormConfig } from "../types/config";
import type { Selector } from "../types/page";
import type { FetchContext } from "../types/context";

const byId = (value: string): Selector => ({ by: "id", value });

/**
 * Control id of the coordinate-frame radio button
 *
 * @throws UnsupportedFrameError for anything but fk5 and galactic
 */
export function frameControlId(form: FormConfig, frame: string): string {
  if (!isFrame(frame)) {
    throw new UnsupportedFrameError(frame);
  }
  return form.frameControls[frame];
}

/**
 * Load the form and type the request into it
 *
 * Warnings raised while building the request (e.g. a radius without unit)
 * are recorded here
 */
export async function fill(ctx: FetchContext): Promise<void> {
  const { config, page, request, logger, tracker } = ctx;

  for (const warning of request.warnings) {
    logger.warn(warning);
    tracker.trackWarning(warning);
  }

  logger.info(`Loading a webpage from (${config.service.url}).`);
  await page.open(config.service.url);

  const radius = formatRadius(request.radius);
  logger.debug(`Setting the search radius to ${radius} arcmin`);
  await page.fill(byId(config.form.radiusInput), radius);

  const { frame } = request.center;
  logger.info(`Setting the coordinate system to ${frame}`);
  await page.click(byId(frameControlId(config.form, frame)));

  const coordinates = formatCoordinates(request.center);
  logger.info(`Setting the coordinates to ${coordinates}`);
  await page.fill(byId(config.form.coordinateInput), coordinates);
}

/**
 * Submit the search and wait for the results view
 *
 * @throws NavigationTimeoutError when the results page never loads
 * @throws AbortedError when the wait is cancelled
 */
export async function submit(ctx: FetchContext): Promise<void> {
  const { config, page, logger, signal } = ctx;

  logger.info("Submitting the job...");
  await page.click({ by: "xpath", value: config.form.submitXPath });

  logger.info("Waiting for the result page to load...");
  const outcome = await awaitResultsPage(page, {
    marker: config.service.resultsMarker,
    timeout: config.timeouts.results,
    interval: config.timeouts.interval,
    signal,
  });
  if (outcome.status === "aborted") {
    throw new AbortedError("waiting for the results page");
  }
  logger.debug(`Results page reached after ${outcome.elapsed}ms`);
}
