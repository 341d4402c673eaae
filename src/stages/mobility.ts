import { anchorActivitygenFile } from "../utils/activitygen-config";
import type { ToolStage } from "../types";

/**
 * Stage 10: the route files it writes are named by the activity generator
 * config, so they are discovered by marker rather than registered
 */
export const mobilityStage: ToolStage = {
  kind: "tool",
  position: 10,
  key: "mobility",
  label: "Mobility generation",
  description: "Mobility generation using the activity based generator",
  tool: "activitygen",
  inputs: ["specificActivityGen"],
  outputs: [],
  producesRoutes: true,

  // File names in the config are relative to the workspace
  async prepare(workspace) {
    await anchorActivitygenFile(
      workspace.path("specificActivityGen"),
      workspace.root,
    );
  },

  args({ workspace }) {
    return ["-c", workspace.path("specificActivityGen")];
  },
};
