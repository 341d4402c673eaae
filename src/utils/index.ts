/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, copyIntoDirectory } from "./fs";
export { listRouteFiles, removeRouteFiles } from "./route-files";
export { DEFAULT_CONFIG_PATH, DEFAULT_TEMPLATES_DIR } from "./bundled-paths";

// XML utilities
export {
  parseXml,
  mergeXmlDocuments,
  mergeXmlFiles,
  setAttributeOnTag,
  setAttributeInFile,
} from "./xml";
export type { MergeResult, RewriteResult } from "./xml";

// Config utilities
export { loadConfig, loadDefaultConfig, getUserConfigPath, mergeConfig } from "./load-config";
export { requireSumoHome, SUMO_HOME_VARIABLE } from "./sumo-home";
export { formatFloat } from "./format-float";
export {
  anchorActivitygenPaths,
  anchorActivitygenFile,
} from "./activitygen-config";
export type { ActivitygenPaths } from "./activitygen-config";

// Classes
export { Logger } from "./logger";
export { Profiler } from "./profiler";
export type { ProfileEntry } from "./profiler";
export { Tracker } from "./tracker";
export { ToolRunner } from "./tool-runner";
export type {
  EntryPoint,
  InvocationContext,
  ToolResult,
  ToolRunnerOptions,
  CommandLine,
} from "./tool-runner";
export { Workspace } from "./workspace";
