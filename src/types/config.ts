/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const WorkspaceConfigSchema = z.object({
  // Null means the templates bundled with the package (src/defaults)
  templatesDir: z.string().nullable(),
  templates: z.array(z.string()),
  cleanRouteFiles: z.boolean(),
});

// Canonical artifact filenames, relative to the workspace root
export const ArtifactsConfigSchema = z.object({
  netconvertConfig: z.string(),
  net: z.string(),
  ptStops: z.string(),
  ptLines: z.string(),
  sideParking: z.string(),
  ptFlows: z.string(),
  parkingAreas: z.string(),
  completeParking: z.string(),
  parkingRerouters: z.string(),
  polygons: z.string(),
  taz: z.string(),
  odWeights: z.string(),
  buildingsPrefix: z.string(),
  odMatrix: z.string(),
  genericActivityGen: z.string(),
  specificActivityGen: z.string(),
  scenarioConfig: z.string(),
});

export const RoutesConfigSchema = z.object({
  marker: z.string().min(1),
  tag: z.string().min(1),
  attribute: z.string().min(1),
});

export const TOOL_NAMES = [
  "netconvert",
  "ptlines2flows",
  "parkingAreas",
  "parkingRerouters",
  "polyconvert",
  "tazBuildings",
  "odMatrix",
  "activitygenDefaults",
  "activitygen",
  "sumo",
] as const;

export const ToolNameSchema = z.enum(TOOL_NAMES);

export const ToolSpecSchema = z.discriminatedUnion("mode", [
  // Out-of-process executable
  z.object({ mode: z.literal("process"), command: z.string().min(1) }),
  // Script run through the configured interpreter
  z.object({
    mode: z.literal("script"),
    root: z.enum(["sumo", "activitygen"]),
    path: z.string().min(1),
  }),
  // ES module exporting main(args), called in-process
  z.object({ mode: z.literal("module"), specifier: z.string().min(1) }),
]);

export const CollaboratorsConfigSchema = z.object({
  netconvert: ToolSpecSchema,
  ptlines2flows: ToolSpecSchema,
  parkingAreas: ToolSpecSchema,
  parkingRerouters: ToolSpecSchema,
  polyconvert: ToolSpecSchema,
  tazBuildings: ToolSpecSchema,
  odMatrix: ToolSpecSchema,
  activitygenDefaults: ToolSpecSchema,
  activitygen: ToolSpecSchema,
  sumo: ToolSpecSchema,
});

export const ToolsConfigSchema = z.object({
  interpreter: z.string(),
  // Null means the directory the generator was started from
  activitygenHome: z.string().nullable(),
  collaborators: CollaboratorsConfigSchema,
});

export const ParametersConfigSchema = z.object({
  ptFlows: z.object({
    end: z.number().int().positive(),
    period: z.number().int().positive(),
    seed: z.number().int(),
    vtypePrefix: z.string(),
  }),
  rerouters: z.object({
    maxAlternatives: z.number().int().positive(),
    maxDistanceAlternatives: z.number().positive(),
    minCapacityVisibility: z.number().int().nonnegative(),
    maxDistanceVisibility: z.number().positive(),
  }),
  odMatrix: z.object({
    density: z.number().positive(),
  }),
});

export const SimulationConfigSchema = z.object({
  run: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ScenarioConfigSchema = z.object({
  workspace: WorkspaceConfigSchema,
  artifacts: ArtifactsConfigSchema,
  routes: RoutesConfigSchema,
  tools: ToolsConfigSchema,
  parameters: ParametersConfigSchema,
  simulation: SimulationConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialScenarioConfigSchema = ScenarioConfigSchema.partial().extend({
  workspace: WorkspaceConfigSchema.partial().optional(),
  artifacts: ArtifactsConfigSchema.partial().optional(),
  routes: RoutesConfigSchema.partial().optional(),
  tools: ToolsConfigSchema.partial()
    .extend({ collaborators: CollaboratorsConfigSchema.partial().optional() })
    .optional(),
  parameters: z
    .object({
      ptFlows: ParametersConfigSchema.shape.ptFlows.partial().optional(),
      rerouters: ParametersConfigSchema.shape.rerouters.partial().optional(),
      odMatrix: ParametersConfigSchema.shape.odMatrix.partial().optional(),
    })
    .optional(),
  simulation: SimulationConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
export type ArtifactsConfig = z.infer<typeof ArtifactsConfigSchema>;
export type RoutesConfig = z.infer<typeof RoutesConfigSchema>;
export type ToolName = z.infer<typeof ToolNameSchema>;
export type ToolSpec = z.infer<typeof ToolSpecSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type ParametersConfig = z.infer<typeof ParametersConfigSchema>;
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ScenarioConfig = z.infer<typeof ScenarioConfigSchema>;
export type PartialScenarioConfig = z.infer<typeof PartialScenarioConfigSchema>;
