import type { ToolStage } from "../types";

export const parkingAreasStage: ToolStage = {
  kind: "tool",
  position: 3,
  key: "parking-areas",
  label: "Parking areas",
  description: "Generate parking area locations from the map extract",
  tool: "parkingAreas",
  inputs: ["osm", "net"],
  outputs: ["parkingAreas"],

  args({ workspace }) {
    return [
      "--osm", workspace.path("osm"),
      "--net", workspace.path("net"),
      "--out", workspace.path("parkingAreas"),
    ];
  },
};
