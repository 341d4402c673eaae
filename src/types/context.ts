/**
 * Scenario context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ScenarioConfig } from "./config";
import type { StageDefinition } from "./stages";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { Profiler } from "../utils/profiler";
import type { ToolRunner } from "../utils/tool-runner";
import type { Workspace } from "../utils/workspace";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  ResourceIssue,
  StepIssue,
  ResourceIssueReason,
  StepIssueReason,
  StepRecord,
  StepStatus,
  RunStats,
} from "../utils/tracker";

export interface RunOptions {
  osmFile: string; // Map extract as given on the command line
  outDir: string; // Workspace directory
  leftHand: boolean;
  simulate: boolean;
}

export interface ScenarioContext {
  // Input - provided at initialization
  config: ScenarioConfig;
  options: RunOptions;
  sumoHome: string;

  runner: ToolRunner;
  tracker: Tracker;
  logger: Logger;
  profiler: Profiler;

  // Called when a numbered stage starts (spinner updates)
  onStage?: (stage: StageDefinition) => void;

  workspace?: Workspace; // Set by the workspace initializer
  routeFiles?: string[]; // Set by the assembly step
  verbose?: boolean;
}
