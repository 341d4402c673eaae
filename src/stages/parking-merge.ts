import { mergeXmlFiles } from "../utils/xml";
import type { TaskStage } from "../types";

/**
 * Stage 4: road-side parking + parking areas -> one additional file
 * The merged file is new; neither input is touched.
 */
export const parkingMergeStage: TaskStage = {
  kind: "task",
  position: 4,
  key: "parking-merge",
  label: "Parking merge",
  description: "Merge road-side parkings with the generated parking areas",
  inputs: ["sideParking", "parkingAreas"],
  outputs: ["completeParking"],

  async run({ workspace, logger, profiler }) {
    const { appended } = await profiler.measure("merge-xml", () =>
      mergeXmlFiles(
        workspace.path("sideParking"),
        workspace.path("parkingAreas"),
        workspace.path("completeParking"),
      ),
    );
    logger.debug(
      `Appended ${appended} parking areas to ${workspace.name("completeParking")}`,
    );
  },
};
