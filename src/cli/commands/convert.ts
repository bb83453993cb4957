/**
 * Convert command - Loads config and runs conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  Logger,
  Tracker,
  detectNaturalDateParser,
} from "../../utils";
import * as modules from "../../modules";
import type { ConversionContext } from "../../types";

const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) {
      config.input.directory = options.input;
    }
    if (options.output) {
      config.output.directory = options.output;
    }

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const ctx: ConversionContext = {
      config,
      tracker,
      logger,
      naturalDateParser: await detectNaturalDateParser(),
      dryRun: options.dryRun,
      verbose: options.verbose,
    };

    if (!ctx.naturalDateParser) {
      logger.debug("chrono-node not installed, skipping natural-language dates");
    }

    spinner.text = "Scanning posts...";
    await modules.scan(ctx);

    // Per-post log lines follow, so the spinner has to go first
    spinner.succeed(`Found ${ctx.posts?.length ?? 0} posts`);

    await modules.process(ctx);
    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
