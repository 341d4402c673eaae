import type { ToolStage } from "../types";

export const polygonsStage: ToolStage = {
  kind: "tool",
  position: 6,
  key: "polygons",
  label: "Polygon conversion",
  description: "Generate polygons",
  tool: "polyconvert",
  inputs: ["osm", "net"],
  outputs: ["polygons"],

  args({ workspace }) {
    return [
      "--osm", workspace.path("osm"),
      "--net", workspace.path("net"),
      "-o", workspace.path("polygons"),
    ];
  },
};
