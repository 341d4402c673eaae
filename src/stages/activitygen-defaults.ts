import type { ToolStage } from "../types";

export const activitygenDefaultsStage: ToolStage = {
  kind: "tool",
  position: 9,
  key: "activitygen-defaults",
  label: "Activity generator defaults",
  description: "Generate the default values for the activity based mobility generator",
  tool: "activitygenDefaults",
  inputs: ["genericActivityGen", "odMatrix"],
  outputs: ["specificActivityGen"],

  args({ workspace }) {
    return [
      "--conf", workspace.path("genericActivityGen"),
      "--od-amitran", workspace.path("odMatrix"),
      "--out", workspace.path("specificActivityGen"),
    ];
  },
};
