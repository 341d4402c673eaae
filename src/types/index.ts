/**
 * Central type exports
 */

// Configuration
export type {
  ScenarioConfig,
  PartialScenarioConfig,
  WorkspaceConfig,
  ArtifactsConfig,
  RoutesConfig,
  ToolName,
  ToolSpec,
  ToolsConfig,
  ParametersConfig,
  SimulationConfig,
  LoggingConfig,
} from "./config";
export {
  ScenarioConfigSchema,
  PartialScenarioConfigSchema,
  TOOL_NAMES,
} from "./config";

// Artifacts
export type { ArtifactKey, ArtifactFormat } from "./artifacts";
export { ARTIFACT_FORMATS, isPrefixArtifact } from "./artifacts";

// Stages
export type {
  StageKey,
  StageDefinition,
  ToolStage,
  TaskStage,
  StageArgsContext,
  StageTaskContext,
} from "./stages";

// Errors
export type { StepRef } from "./errors";
export {
  describeStep,
  PreconditionError,
  StageError,
  MissingArtifactError,
  XmlStructureError,
} from "./errors";

// Context
export type {
  ScenarioContext,
  RunOptions,
  Issue,
  IssueType,
  ResourceIssue,
  StepIssue,
  ResourceIssueReason,
  StepIssueReason,
  StepRecord,
  StepStatus,
  RunStats,
} from "./context";

// Config loading errors
export interface ConfigError {
  path: string;
  error: unknown;
}
