/**
 * Fetch command - Fills the search form, triggers the downloads and moves
 * the finished files into the output directory
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import ora from "ora";
import { z } from "zod";
import {
  AbortedError,
  createSearchRequest,
  FetchError,
  loadConfig,
  Logger,
  Tracker,
} from "../../utils";
import { PuppeteerSurveyPage } from "../../browser/puppeteer-page";
import * as modules from "../../modules";
import type { FetchContext } from "../../types";

const FetchOptionsSchema = z.object({
  lon: z.coerce.number(),
  lat: z.coerce.number(),
  radius: z.string(),
  frame: z.string(),
  bands: z.array(z.string()).optional(),
  downloadDir: z.string().optional(),
  output: z.string().optional(),
  pattern: z.string().optional(),
  settle: z.boolean().optional(),
  headless: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof FetchOptionsSchema>;

export async function fetchCommand(opts: Options): Promise<void> {
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !opts.verbose,
  }).start();

  // Ctrl+C ends every pending wait; the browser is closed below
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  let page: PuppeteerSurveyPage | undefined;

  try {
    const options = FetchOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.downloadDir) config.download.directory = options.downloadDir;
    if (options.output) config.output.directory = options.output;
    if (options.pattern) config.download.pattern = options.pattern;
    if (options.settle === false) config.download.settleFirst = false;
    if (options.headless) config.browser.headless = true;

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const request = createSearchRequest(
      {
        center: { frame: options.frame, lon: options.lon, lat: options.lat },
        radius: options.radius,
        bands: options.bands,
      },
      config.bands,
    );

    const downloadDir = path.resolve(config.download.directory);
    const outputDir = path.resolve(config.output.directory);
    await mkdir(downloadDir, { recursive: true });
    await mkdir(outputDir, { recursive: true });

    spinner.text = "Starting the browser...";
    page = await PuppeteerSurveyPage.launch(
      { ...config.browser, downloadDir },
      config.form,
    );

    const ctx: FetchContext = {
      config,
      tracker,
      logger,
      page,
      request,
      signal: controller.signal,
      verbose: options.verbose,
    };

    spinner.text = "Filling the search form...";
    await modules.fill(ctx);

    spinner.text = "Waiting for the results page...";
    await modules.submit(ctx);

    spinner.text = "Triggering downloads...";
    await modules.trigger(ctx);

    spinner.text = "Waiting for downloads to finish...";
    await modules.relocate(ctx);
    if (controller.signal.aborted) {
      throw new AbortedError("fetching");
    }

    spinner.clear();
    spinner.stop();

    await modules.stats({
      tracker,
      outputDir: config.output.writeStats ? outputDir : undefined,
      verbose: options.verbose,
    });
  } catch (error) {
    spinner.fail(
      error instanceof FetchError ? error.message : "Fetch failed",
    );
    if (!(error instanceof FetchError)) {
      console.error(error);
    }
    process.exitCode = 1;
  } finally {
    await page?.close();
  }
}
