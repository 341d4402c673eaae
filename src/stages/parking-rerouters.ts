import { formatFloat } from "../utils/format-float";
import type { ToolStage } from "../types";

export const parkingReroutersStage: ToolStage = {
  kind: "tool",
  position: 5,
  key: "parking-rerouters",
  label: "Parking rerouters",
  description: "Generate parking area rerouters",
  tool: "parkingRerouters",
  inputs: ["completeParking", "net"],
  outputs: ["parkingRerouters"],

  args({ workspace, parameters }) {
    const r = parameters.rerouters;
    return [
      "-a", workspace.path("completeParking"),
      "-n", workspace.path("net"),
      "--max-number-alternatives", String(r.maxAlternatives),
      "--max-distance-alternatives", formatFloat(r.maxDistanceAlternatives),
      "--min-capacity-visibility-true", String(r.minCapacityVisibility),
      "--max-distance-visibility-true", formatFloat(r.maxDistanceVisibility),
      "-o", workspace.path("parkingRerouters"),
    ];
  },
};
