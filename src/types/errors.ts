/**
 * Error taxonomy for a scenario run
 */

import type { ArtifactKey } from "./artifacts";
import type { ToolName } from "./config";

/**
 * Identifies a pipeline step in errors and run records.
 * Numbered stages carry their position; assembly and simulation do not.
 */
export interface StepRef {
  key: string;
  label: string;
  position?: number;
}

export function describeStep(step: StepRef): string {
  return step.position === undefined
    ? step.label
    : `Stage ${step.position} (${step.label})`;
}

/**
 * Required environment is missing; raised before any stage runs
 */
export class PreconditionError extends Error {
  override name = "PreconditionError";
}

/**
 * A collaborator (or an in-process task) failed while running a step
 */
export class StageError extends Error {
  override name = "StageError";
  readonly step: StepRef;
  readonly tool?: ToolName;
  readonly exitCode?: number;

  constructor(
    step: StepRef,
    message: string,
    options: { cause?: unknown; tool?: ToolName; exitCode?: number } = {},
  ) {
    super(`${describeStep(step)} failed: ${message}`, { cause: options.cause });
    this.step = step;
    this.tool = options.tool;
    this.exitCode = options.exitCode;
  }
}

/**
 * An artifact a step depends on (or promised to produce) is absent
 */
export class MissingArtifactError extends Error {
  override name = "MissingArtifactError";

  constructor(
    readonly step: StepRef,
    readonly artifact: ArtifactKey | "routes",
    readonly path: string,
    readonly role: "input" | "output",
  ) {
    super(
      `${describeStep(step)}: missing ${role} artifact "${artifact}" (${path})`,
    );
  }
}

/**
 * An XML document lacks the structure a merge or rewrite expects
 */
export class XmlStructureError extends Error {
  override name = "XmlStructureError";

  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`${source}: ${message}`);
  }
}
