/**
 * Generate command - Loads config and runs the scenario pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  requireSumoHome,
  Logger,
  Profiler,
  ToolRunner,
  Tracker,
} from "../../utils";
import * as modules from "../../modules";
import { PreconditionError, type ScenarioContext } from "../../types";

const GenerateOptionsSchema = z.object({
  osm: z.string({ error: "--osm <path> is required" }),
  out: z.string({ error: "--out <path> is required" }),
  profiling: z.boolean().optional(),
  lefthand: z.boolean().optional(),
  simulation: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof GenerateOptionsSchema>;

export async function generateCommand(opts: Options): Promise<void> {
  // Nothing runs without the toolkit
  let sumoHome: string;
  try {
    sumoHome = requireSumoHome(process.env);
  } catch (error) {
    if (error instanceof PreconditionError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const parsed = GenerateOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    console.error(z.prettifyError(parsed.error));
    process.exit(1);
  }
  const options = parsed.data;

  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let ctx: ScenarioContext | undefined;

  try {
    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    const profiler = new Profiler(options.profiling ?? false);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error);
    }

    const runner = new ToolRunner({
      tools: config.tools,
      sumoHome,
      logger,
      profiler,
    });

    const context: ScenarioContext = {
      config,
      options: {
        osmFile: options.osm,
        outDir: options.out,
        leftHand: options.lefthand ?? false,
        simulate: options.simulation ?? true,
      },
      sumoHome,
      runner,
      tracker,
      logger,
      profiler,
      verbose: options.verbose,
      onStage: (stage) => {
        spinner.text = `[${stage.position}/10] ${stage.description}...`;
      },
    };
    ctx = context;

    await profiler.measure("run", async () => {
      spinner.text = "Preparing workspace...";
      await modules.initialize(context);

      await modules.generate(context);

      spinner.text = "Writing scenario configuration...";
      await modules.assemble(context);

      spinner.text = "Running simulation...";
      await modules.simulate(context);
    });

    spinner.succeed("Scenario generated");
    await modules.stats(context);
  } catch (error) {
    spinner.fail("Scenario generation failed");
    if (ctx) {
      await modules.stats(ctx);
    }
    // Step failures are already listed in the summary
    if (!ctx || ctx.tracker.getIssues("step").length === 0) {
      console.error(error);
    }
    process.exit(1);
  }
}
