import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import { DEFAULT_CONFIG_PATH } from "./bundled-paths";
import type { ScenarioConfig, PartialScenarioConfig, ConfigError } from "../types";
import {
  ScenarioConfigSchema,
  PartialScenarioConfigSchema,
} from "../types";

// OS-specific paths (follows XDG spec on Linux)
const paths = envPaths("osm-scenario", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ScenarioConfig> {
  const content = await readFile(DEFAULT_CONFIG_PATH, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ScenarioConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialScenarioConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialScenarioConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialScenarioConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: ScenarioConfig,
  override: PartialScenarioConfig,
): ScenarioConfig {
  return {
    workspace: { ...base.workspace, ...override.workspace },
    artifacts: { ...base.artifacts, ...override.artifacts },
    routes: { ...base.routes, ...override.routes },
    tools: {
      ...base.tools,
      ...override.tools,
      // Collaborators are replaced one by one, never field by field
      collaborators: {
        ...base.tools.collaborators,
        ...override.tools?.collaborators,
      },
    },
    parameters: {
      ptFlows: { ...base.parameters.ptFlows, ...override.parameters?.ptFlows },
      rerouters: {
        ...base.parameters.rerouters,
        ...override.parameters?.rerouters,
      },
      odMatrix: {
        ...base.parameters.odMatrix,
        ...override.parameters?.odMatrix,
      },
    },
    simulation: { ...base.simulation, ...override.simulation },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ScenarioConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
