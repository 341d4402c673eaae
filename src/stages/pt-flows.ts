import type { ToolStage } from "../types";

/**
 * Stage 2: PT lines -> periodic PT flows
 */
export const ptFlowsStage: ToolStage = {
  kind: "tool",
  position: 2,
  key: "pt-flows",
  label: "PT flows",
  description: "Generate flows for public transportation",
  tool: "ptlines2flows",
  inputs: ["net", "ptStops", "ptLines"],
  outputs: ["ptFlows"],

  args({ workspace, parameters }) {
    const { end, period, seed, vtypePrefix } = parameters.ptFlows;
    return [
      "-n", workspace.path("net"),
      "-e", String(end),
      "-p", String(period),
      "--random-begin",
      "--seed", String(seed),
      "--ptstops", workspace.path("ptStops"),
      "--ptlines", workspace.path("ptLines"),
      "-o", workspace.path("ptFlows"),
      "--ignore-errors",
      "--vtype-prefix", vtypePrefix,
      "--verbose",
    ];
  },
};
