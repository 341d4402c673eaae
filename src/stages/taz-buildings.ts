import { mkdir } from "fs/promises";
import path from "node:path";
import type { ToolStage } from "../types";

/**
 * Stage 7: TAZ from administrative boundaries, TAZ weights from buildings and
 * PoIs, and one polygon file per TAZ under the buildings prefix
 */
export const tazBuildingsStage: ToolStage = {
  kind: "tool",
  position: 7,
  key: "taz-buildings",
  label: "TAZ and buildings",
  description:
    "Generate TAZ from administrative boundaries, TAZ weights using buildings and PoIs, and the buildings infrastructure",
  tool: "tazBuildings",
  inputs: ["osm", "net"],
  outputs: ["taz", "odWeights", "buildingsPrefix"],

  async prepare(workspace) {
    await mkdir(path.dirname(workspace.path("buildingsPrefix")), {
      recursive: true,
    });
  },

  args({ workspace }) {
    return [
      "--osm", workspace.path("osm"),
      "--net", workspace.path("net"),
      "--taz-output", workspace.path("taz"),
      "--od-output", workspace.path("odWeights"),
      "--poly-output", workspace.path("buildingsPrefix"),
    ];
  },
};
