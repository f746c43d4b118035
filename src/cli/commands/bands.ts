/**
 * Bands command - List the band catalog
 */

import chalk from "chalk";
import { z } from "zod";
import { loadConfig } from "../../utils";

const BandsOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.infer<typeof BandsOptionsSchema>;

export async function bandsCommand(opts: Options): Promise<void> {
  const options = BandsOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config);

  for (const { path } of errors) {
    console.warn(chalk.yellow(`Skipped invalid config ${path}`));
  }

  console.log("");
  for (const [band, formId] of Object.entries(config.bands)) {
    console.log(`  ${chalk.bold(band.padEnd(14))} ${chalk.dim(String(formId))}`);
  }
  console.log("");
}
