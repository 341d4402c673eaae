/**
 * Assemble Module
 * Writes the route files found in the workspace into the scenario config
 */

import { StageError, type ScenarioContext, type StepRef } from "../types";
import { setAttributeInFile } from "../utils/xml";

export const ASSEMBLE_STEP: StepRef = {
  key: "assemble",
  label: "Scenario configuration",
};

/**
 * Writes to context:
 * - routeFiles: sorted route file names joined into the config
 */
export async function assemble(ctx: ScenarioContext): Promise<void> {
  const { workspace, config, tracker, logger, profiler } = ctx;
  if (!workspace) {
    throw new Error("Workspace must be initialized before assembly");
  }

  const { marker, tag, attribute } = config.routes;
  const start = Date.now();

  try {
    const routeFiles = await workspace.routeFiles(marker);
    const updated = await profiler.measure("rewrite-config", () =>
      setAttributeInFile(
        workspace.path("scenarioConfig"),
        tag,
        attribute,
        routeFiles.join(","),
      ),
    );

    if (updated === 0) {
      logger.warn(
        `No <${tag}> element in ${workspace.name("scenarioConfig")}; configuration left unchanged`,
      );
    }

    ctx.routeFiles = routeFiles;
    tracker.setRouteFiles(routeFiles);
    tracker.recordSuccess(ASSEMBLE_STEP, Date.now() - start);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const failure = new StageError(ASSEMBLE_STEP, message, { cause: error });
    tracker.recordFailure(ASSEMBLE_STEP, Date.now() - start, failure);
    throw failure;
  }
}
