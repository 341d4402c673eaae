/**
 * Pipeline Module
 * Runs the numbered stages strictly in order against the workspace
 */

import path from "node:path";
import { STAGES, stepOf } from "../stages";
import {
  MissingArtifactError,
  StageError,
  type ScenarioContext,
  type StageDefinition,
} from "../types";
import type { Workspace } from "../utils/workspace";

export type StageResult =
  | { ok: true; stage: StageDefinition; durationMs: number }
  | {
      ok: false;
      stage: StageDefinition;
      durationMs: number;
      error: StageError | MissingArtifactError;
    };

/**
 * Runs every stage; stops at the first failure and marks the remaining
 * stages as skipped. The failing stage's error is rethrown.
 *
 * Reads from context: workspace (initializer must run first)
 */
export async function generate(ctx: ScenarioContext): Promise<void> {
  const { workspace, tracker } = ctx;
  if (!workspace) {
    throw new Error("Workspace must be initialized before the pipeline runs");
  }

  let failure: StageError | MissingArtifactError | undefined;

  for (const stage of STAGES) {
    const tool = stage.kind === "tool" ? stage.tool : undefined;

    if (failure) {
      tracker.recordSkipped(stepOf(stage), tool);
      continue;
    }

    ctx.onStage?.(stage);
    ctx.logger.debug(`${stage.position}. ${stage.description}`);

    const result = await ctx.profiler.measure(`stage:${stage.key}`, () =>
      runStage(ctx, workspace, stage),
    );

    if (result.ok) {
      tracker.recordSuccess(stepOf(stage), result.durationMs, tool);
    } else {
      tracker.recordFailure(stepOf(stage), result.durationMs, result.error, tool);
      failure = result.error;
    }
  }

  if (failure) {
    throw failure;
  }
}

/**
 * Run one stage and validate its artifact boundary
 */
export async function runStage(
  ctx: ScenarioContext,
  workspace: Workspace,
  stage: StageDefinition,
): Promise<StageResult> {
  const step = stepOf(stage);
  const start = Date.now();
  const fail = (error: StageError | MissingArtifactError): StageResult => ({
    ok: false,
    stage,
    durationMs: Date.now() - start,
    error,
  });

  try {
    await workspace.require(step, stage.inputs, "input");
    await stage.prepare?.(workspace);
  } catch (error) {
    if (error instanceof MissingArtifactError) return fail(error);
    return fail(
      new StageError(step, `could not prepare the workspace: ${messageOf(error)}`, {
        cause: error,
      }),
    );
  }

  if (stage.kind === "tool") {
    const args = stage.args({
      workspace,
      parameters: ctx.config.parameters,
      leftHand: ctx.options.leftHand,
    });
    const result = await ctx.runner.invoke(stage.tool, args, {
      cwd: workspace.root,
    });
    if (!result.ok) {
      return fail(
        new StageError(step, `${stage.tool}: ${result.error.message}`, {
          cause: result.error,
          tool: stage.tool,
          exitCode: result.exitCode,
        }),
      );
    }
  } else {
    try {
      await stage.run({
        workspace,
        logger: ctx.logger,
        profiler: ctx.profiler,
      });
    } catch (error) {
      return fail(new StageError(step, messageOf(error), { cause: error }));
    }
  }

  try {
    await workspace.require(step, stage.outputs, "output");
    if (stage.producesRoutes) {
      await requireGeneratedRoutes(ctx, workspace, stage);
    }
  } catch (error) {
    if (error instanceof MissingArtifactError) return fail(error);
    return fail(
      new StageError(step, `could not check outputs: ${messageOf(error)}`, {
        cause: error,
      }),
    );
  }

  return { ok: true, stage, durationMs: Date.now() - start };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * At least one route file besides the PT flows must now exist
 */
async function requireGeneratedRoutes(
  ctx: ScenarioContext,
  workspace: Workspace,
  stage: StageDefinition,
): Promise<void> {
  const routes = await workspace.routeFiles(ctx.config.routes.marker);
  const generated = routes.filter((f) => f !== workspace.name("ptFlows"));
  if (generated.length === 0) {
    throw new MissingArtifactError(
      stepOf(stage),
      "routes",
      path.join(workspace.root, `*${ctx.config.routes.marker}`),
      "output",
    );
  }
}
