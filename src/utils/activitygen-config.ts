/**
 * Activity generator config
 * Anchors the file names it refers to at the workspace, so the generator
 * finds its inputs and writes its routes there whatever its own cwd is
 */

import { readFile, writeFile } from "fs/promises";
import path from "node:path";
import { z } from "zod";

const OptionalPath = z.string().optional();

// Only the path-valued fields are typed; everything else passes through
const ActivitygenPathsSchema = z.looseObject({
  outputPrefix: OptionalPath,
  sumocfg: OptionalPath,
  SUMOnetFile: OptionalPath,
  SUMOadditionals: z.record(z.string(), z.string()).optional(),
  population: z
    .looseObject({
      tazDefinition: OptionalPath,
      tazWeights: OptionalPath,
      buildingsWeight: OptionalPath,
      odMatrix: OptionalPath,
    })
    .optional(),
});

export type ActivitygenPaths = z.infer<typeof ActivitygenPathsSchema>;

function anchor(root: string, value: string): string;
function anchor(root: string, value: string | undefined): string | undefined;
function anchor(root: string, value: string | undefined): string | undefined {
  if (!value || path.isAbsolute(value)) {
    return value;
  }
  return path.join(root, value);
}

/**
 * Resolve every relative file name in the config against root
 * Empty and absolute values are kept as they are
 */
export function anchorActivitygenPaths(
  config: ActivitygenPaths,
  root: string,
): ActivitygenPaths {
  const additionals = config.SUMOadditionals;
  const population = config.population;

  return {
    ...config,
    outputPrefix: anchor(root, config.outputPrefix),
    sumocfg: anchor(root, config.sumocfg),
    SUMOnetFile: anchor(root, config.SUMOnetFile),
    SUMOadditionals: additionals
      ? Object.fromEntries(
          Object.entries(additionals).map(([name, file]) => [
            name,
            anchor(root, file),
          ]),
        )
      : undefined,
    population: population
      ? {
          ...population,
          tazDefinition: anchor(root, population.tazDefinition),
          tazWeights: anchor(root, population.tazWeights),
          buildingsWeight: anchor(root, population.buildingsWeight),
          odMatrix: anchor(root, population.odMatrix),
        }
      : undefined,
  };
}

/**
 * Rewrite a config file in place with its paths anchored at root
 */
export async function anchorActivitygenFile(
  filePath: string,
  root: string,
): Promise<ActivitygenPaths> {
  const content = await readFile(filePath, "utf-8");
  const config = ActivitygenPathsSchema.parse(JSON.parse(content));
  const anchored = anchorActivitygenPaths(config, root);
  await writeFile(filePath, JSON.stringify(anchored, null, 4), "utf-8");
  return anchored;
}
