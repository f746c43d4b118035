/**
 * Migrate command - Moves finished downloads without driving a browser
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import ora from "ora";
import { z } from "zod";
import { FetchError, loadConfig, Logger, Tracker } from "../../utils";
import { migrate } from "../../modules/migrator";
import * as modules from "../../modules";

const MigrateOptionsSchema = z.object({
  pattern: z.string().optional(),
  markerSuffix: z.string().min(1).optional(),
  timeout: z.coerce.number().positive().optional(), // Seconds
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof MigrateOptionsSchema>;

export async function migrateCommand(
  source: string | undefined,
  destination: string | undefined,
  opts: Options,
): Promise<void> {
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !opts.verbose,
  }).start();

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const options = MigrateOptionsSchema.parse(opts);
    const { config, errors } = await loadConfig(options.config);

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const destDir = path.resolve(destination ?? config.output.directory);
    await mkdir(destDir, { recursive: true });

    spinner.text = "Waiting for downloads to finish...";
    const report = await migrate({
      sourceDir: path.resolve(source ?? config.download.directory),
      destDir,
      pattern: options.pattern ?? config.download.pattern,
      markerSuffix: options.markerSuffix ?? config.download.markerSuffix,
      timeout:
        options.timeout !== undefined
          ? options.timeout * 1000
          : config.timeouts.completion,
      interval: config.timeouts.interval,
      signal: controller.signal,
      logger,
    });
    tracker.recordMigration(report.outcomes);

    spinner.clear();
    spinner.stop();

    await modules.stats({
      tracker,
      outputDir: config.output.writeStats ? destDir : undefined,
      verbose: options.verbose,
    });
  } catch (error) {
    spinner.fail(
      error instanceof FetchError ? error.message : "Migration failed",
    );
    if (!(error instanceof FetchError)) {
      console.error(error);
    }
    process.exitCode = 1;
  }
}
