import type { ToolStage } from "../types";

/**
 * Stage 1: map extract -> road network plus PT stops, PT lines and road-side parking
 */
export const networkStage: ToolStage = {
  kind: "tool",
  position: 1,
  key: "network",
  label: "Network conversion",
  description:
    "Generate the network with all the additional components (public transport, parkings, ..)",
  tool: "netconvert",
  inputs: ["osm", "netconvertConfig"],
  outputs: ["net", "ptStops", "ptLines", "sideParking"],

  args({ workspace, leftHand }) {
    const args = [
      "-c", workspace.path("netconvertConfig"),
      "--osm", workspace.path("osm"),
      "-o", workspace.path("net"),
      "--ptstop-output", workspace.path("ptStops"),
      "--ptline-output", workspace.path("ptLines"),
      "--parking-output", workspace.path("sideParking"),
    ];
    if (leftHand) {
      args.push("--lefthand");
    }
    return args;
  },
};
