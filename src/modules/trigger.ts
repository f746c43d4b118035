/**
 * Trigger Module
 * Activates the per-band download controls of the results page
 */

import { awaitCondition } from "../utils/await-condition";
import { MissingControlError } from "../utils/errors";
import type { BandCatalog } from "../types/config";
import type { DownloadControl, SurveyPage } from "../types/page";
import type { BandOutcome, TriggerReport } from "../types/report";
import type { FetchContext } from "../types/context";

export interface DownloadTask {
  band: string;
  control: DownloadControl;
}

export interface TriggerOptions {
  timeout: number;
  interval: number;
  signal?: AbortSignal;
}

export class DownloadTrigger {
  // Resolved lazily, at most once per band for the lifetime of the page
  private tasks = new Map<string, DownloadTask>();

  constructor(
    private readonly page: SurveyPage,
    private readonly catalog: BandCatalog,
    private readonly controlId: string,
  ) {}

  /**
   * Resolve the download task of a band, reusing an earlier resolution
   * Returns a failed outcome when the band or its control is unknown
   */
  async getTask(
    band: string,
  ): Promise<DownloadTask | Extract<BandOutcome, { ok: false }>> {
    const cached = this.tasks.get(band);
    if (cached) return cached;

    if (!Object.hasOwn(this.catalog, band)) {
      return {
        ok: false,
        band,
        reason: "unknown-band",
        details: `"${band}" is not in the band catalog`,
      };
    }

    const formId = this.catalog[band];
    const control = await this.page.findDownloadControl(formId);
    if (!control) {
      return {
        ok: false,
        band,
        reason: "control-not-found",
        details: `No download control for form id ${formId}`,
      };
    }

    const task: DownloadTask = { band, control };
    this.tasks.set(band, task);
    return task;
  }

  /**
   * Activate one download per band (all catalog bands by default)
   *
   * Waits for the first download control to appear; if it never does,
   * nothing is activated and MissingControlError is thrown. After that a
   * failing band is recorded in the report and the rest still run.
   */
  async trigger(
    bands: readonly string[] | undefined,
    options: TriggerOptions,
  ): Promise<TriggerReport> {
    const selector = { by: "id", value: this.controlId } as const;
    const outcome = await awaitCondition(
      () => this.page.hasElement(selector),
      options,
    );

    if (outcome.status === "timed-out") {
      throw new MissingControlError(
        this.controlId,
        options.timeout,
        await this.page.location(),
      );
    }

    const outcomes: BandOutcome[] = [];
    if (outcome.status === "aborted") {
      return summarize(outcomes);
    }

    for (const band of new Set(bands ?? Object.keys(this.catalog))) {
      outcomes.push(await this.activate(band));
    }

    return summarize(outcomes);
  }

  private async activate(band: string): Promise<BandOutcome> {
    try {
      const task = await this.getTask(band);
      if ("ok" in task) return task;

      await task.control.activate();
      return { ok: true, band };
    } catch (error) {
      return {
        ok: false,
        band,
        reason: "activation-failed",
        details: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function summarize(outcomes: BandOutcome[]): TriggerReport {
  const triggered: string[] = [];
  const failed: Extract<BandOutcome, { ok: false }>[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      triggered.push(outcome.band);
    } else {
      failed.push(outcome);
    }
  }

  return { outcomes, triggered, failed };
}

/**
 * Pipeline step: trigger every requested band of the context's request
 *
 * Writes to context:
 * - trigger: TriggerReport
 */
export async function trigger(ctx: FetchContext): Promise<void> {
  const { config, page, request, logger, tracker, signal } = ctx;

  logger.info("Waiting for the download controls to show up...");
  const downloads = new DownloadTrigger(
    page,
    config.bands,
    config.form.downloadControl,
  );

  const report = await downloads.trigger(request.bands, {
    timeout: config.timeouts.controls,
    interval: config.timeouts.interval,
    signal,
  });

  for (const band of report.triggered) {
    logger.debug(`Download started for ${band}`);
  }
  for (const failure of report.failed) {
    logger.warn(`Skipped ${failure.band}: ${failure.details}`);
  }

  tracker.recordBands(report.outcomes);
  ctx.trigger = report;
}
