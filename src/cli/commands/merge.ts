/**
 * Merge command - Loads config and runs the scan/validate/merge pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  createContext,
  InputError,
  IdentityError,
  LinkValidationError,
  loadConfig,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import type { MergeContext } from "../../types";

const MergeOptionsSchema = z.object({
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  report: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof MergeOptionsSchema>;

export async function mergeCommand(
  output: string,
  inputs: string[],
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let ctx: MergeContext | undefined;

  try {
    // Validate CLI options
    const options = MergeOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Add any config loading errors to tracker
    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    ctx = createContext({
      config,
      inputs,
      output,
      tracker,
      dryRun: options.dryRun,
      verbose: options.verbose,
      reportPath: options.report,
    });

    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    spinner.text = "Registering labels...";
    await modules.register(ctx);

    spinner.text = "Validating links...";
    await modules.validate(ctx);

    if (!ctx.dryRun) {
      spinner.text = "Merging files...";
      await modules.merge(ctx);
    }

    // Clear and stop spinner before displaying the report
    spinner.clear();
    spinner.stop();

    await modules.report(ctx);
  } catch (error) {
    if (error instanceof LinkValidationError && ctx) {
      spinner.fail(error.message);
      await modules.report(ctx);
      process.exit(1);
    }

    if (error instanceof InputError) {
      spinner.fail(error.message);
    } else if (error instanceof IdentityError) {
      spinner.fail(`Internal error: ${error.message}`);
    } else {
      // The output was opened but not completed
      const partial = ctx?.merged === false;
      spinner.fail(partial ? "Merge failed, output is incomplete" : "Merge failed");
      console.error(error);
    }
    process.exit(1);
  }
}
