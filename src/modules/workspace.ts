/**
 * Workspace Module
 * Creates the output directory, copies the map extract and the configuration
 * templates into it, and registers the run's artifact paths
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import { DEFAULT_TEMPLATES_DIR } from "../utils/bundled-paths";
import { copyIntoDirectory } from "../utils/fs";
import { removeRouteFiles } from "../utils/route-files";
import { Workspace } from "../utils/workspace";
import type { ScenarioContext } from "../types";

/**
 * Writes to context:
 * - workspace: artifact registry rooted at the output directory
 */
export async function initialize(ctx: ScenarioContext): Promise<void> {
  const { config, options, logger, profiler, tracker } = ctx;
  const root = path.resolve(options.outDir);

  await profiler.measure("initialize", async () => {
    await mkdir(root, { recursive: true });

    // The map is referenced by its basename from here on
    const mapFile = await copyIntoDirectory(options.osmFile, root);

    const templatesDir = config.workspace.templatesDir ?? DEFAULT_TEMPLATES_DIR;
    for (const template of config.workspace.templates) {
      await copyIntoDirectory(path.join(templatesDir, template), root);
    }

    // Route files from a previous run would end up in the scenario config
    if (config.workspace.cleanRouteFiles) {
      const removed = await removeRouteFiles(root, config.routes.marker);
      if (removed.length > 0) {
        logger.debug(`Removed stale route files: ${removed.join(", ")}`);
      }
      tracker.setRemovedRouteFiles(removed);
    }

    ctx.workspace = new Workspace(root, config.artifacts, mapFile);
  });

  logger.debug(`Workspace ready at ${root}`);
}
