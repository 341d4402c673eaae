import { formatFloat } from "../utils/format-float";
import type { ToolStage } from "../types";

export const odMatrixStage: ToolStage = {
  kind: "tool",
  position: 8,
  key: "od-matrix",
  label: "OD matrix",
  description: "Generate the OD matrix from the TAZ weights",
  tool: "odMatrix",
  inputs: ["odWeights"],
  outputs: ["odMatrix"],

  args({ workspace, parameters }) {
    return [
      "--taz-weights", workspace.path("odWeights"),
      "--out", workspace.path("odMatrix"),
      "--density", formatFloat(parameters.odMatrix.density),
    ];
  },
};
