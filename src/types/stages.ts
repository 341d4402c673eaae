/**
 * Stage type definitions
 */

import type { ArtifactKey } from "./artifacts";
import type { ParametersConfig, ToolName } from "./config";
import type { Workspace } from "../utils/workspace";
import type { Logger } from "../utils/logger";
import type { Profiler } from "../utils/profiler";

export type StageKey =
  | "network"
  | "pt-flows"
  | "parking-areas"
  | "parking-merge"
  | "parking-rerouters"
  | "polygons"
  | "taz-buildings"
  | "od-matrix"
  | "activitygen-defaults"
  | "mobility";

/**
 * Everything a stage may read to build its argument vector
 */
export interface StageArgsContext {
  workspace: Workspace;
  parameters: ParametersConfig;
  leftHand: boolean;
}

export interface StageTaskContext {
  workspace: Workspace;
  logger: Logger;
  profiler: Profiler;
}

interface BaseStage {
  position: number;
  key: StageKey;
  label: string;
  description: string;
  inputs: ArtifactKey[];
  outputs: ArtifactKey[];
  // Stage must leave at least one route file besides the PT flows
  producesRoutes?: boolean;
  // Runs after the input check, before the stage executes
  prepare?(workspace: Workspace): Promise<void>;
}

// Delegates to an external collaborator with a fixed argument vector
export interface ToolStage extends BaseStage {
  kind: "tool";
  tool: ToolName;
  args(ctx: StageArgsContext): string[];
}

// Runs inside the orchestrator (no collaborator)
export interface TaskStage extends BaseStage {
  kind: "task";
  run(ctx: StageTaskContext): Promise<void>;
}

export type StageDefinition = ToolStage | TaskStage;
