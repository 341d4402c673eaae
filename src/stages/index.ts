/**
 * Pipeline stages, in execution order
 */

import { networkStage } from "./network";
import { ptFlowsStage } from "./pt-flows";
import { parkingAreasStage } from "./parking-areas";
import { parkingMergeStage } from "./parking-merge";
import { parkingReroutersStage } from "./parking-rerouters";
import { polygonsStage } from "./polygons";
import { tazBuildingsStage } from "./taz-buildings";
import { odMatrixStage } from "./od-matrix";
import { activitygenDefaultsStage } from "./activitygen-defaults";
import { mobilityStage } from "./mobility";
import type { StageDefinition, StageKey, StepRef } from "../types";

// Export individual stages
export {
  networkStage,
  ptFlowsStage,
  parkingAreasStage,
  parkingMergeStage,
  parkingReroutersStage,
  polygonsStage,
  tazBuildingsStage,
  odMatrixStage,
  activitygenDefaultsStage,
  mobilityStage,
};

export const STAGES: readonly StageDefinition[] = [
  networkStage,
  ptFlowsStage,
  parkingAreasStage,
  parkingMergeStage,
  parkingReroutersStage,
  polygonsStage,
  tazBuildingsStage,
  odMatrixStage,
  activitygenDefaultsStage,
  mobilityStage,
];

export function getStage(key: StageKey): StageDefinition {
  const stage = STAGES.find((s) => s.key === key);
  if (!stage) {
    throw new Error(`Unknown stage: ${key}`);
  }
  return stage;
}

export function stepOf(stage: StageDefinition): StepRef {
  return { key: stage.key, label: stage.label, position: stage.position };
}
