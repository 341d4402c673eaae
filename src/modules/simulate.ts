/**
 * Simulate Module
 * Launches the simulator against the final scenario configuration
 */

import { StageError, type ScenarioContext, type StepRef } from "../types";

export const SIMULATE_STEP: StepRef = {
  key: "simulate",
  label: "Simulation",
};

export async function simulate(ctx: ScenarioContext): Promise<void> {
  const { workspace, runner, tracker, options, config } = ctx;
  if (!workspace) {
    throw new Error("Workspace must be initialized before the simulation");
  }

  if (!options.simulate || !config.simulation.run) {
    tracker.recordSkipped(SIMULATE_STEP, "sumo");
    return;
  }

  const result = await runner.invoke(
    "sumo",
    ["-c", workspace.path("scenarioConfig")],
    { cwd: workspace.root },
  );

  if (!result.ok) {
    const failure = new StageError(SIMULATE_STEP, result.error.message, {
      cause: result.error,
      tool: "sumo",
      exitCode: result.exitCode,
    });
    tracker.recordFailure(SIMULATE_STEP, result.durationMs, failure, "sumo");
    throw failure;
  }

  tracker.recordSuccess(SIMULATE_STEP, result.durationMs, "sumo");
}
