/**
 * Run Tracker
 * Unified tracking for step outcomes, route files and issues
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import {
  MissingArtifactError,
  StageError,
  XmlStructureError,
  type StepRef,
  type ToolName,
} from "../types";

// ============================================================================
// Types
// ============================================================================

export type StepStatus = "success" | "failed" | "skipped";

export interface StepRecord {
  key: string;
  label: string;
  position?: number;
  status: StepStatus;
  durationMs: number;
  tool?: ToolName;
}

export type IssueType = "resource" | "step";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export type StepIssueReason =
  | "tool-failed"
  | "missing-artifact"
  | "invalid-xml"
  | "task-failed";

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export interface StepIssue {
  type: "step";
  path: string; // Step key
  reason: StepIssueReason;
  details: string;
}

export type Issue = ResourceIssue | StepIssue;

export interface RunStats {
  steps: StepRecord[];
  succeededSteps: number;
  failedSteps: number;
  skippedSteps: number;
  routeFiles: string[];
  removedRouteFiles: string[];
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapStepError(error: unknown): IssueInfo<StepIssueReason> {
  if (error instanceof MissingArtifactError) {
    return { reason: "missing-artifact", details: error.message };
  }
  if (error instanceof StageError) {
    if (error.cause instanceof XmlStructureError) {
      return { reason: "invalid-xml", details: error.message };
    }
    return {
      reason: error.tool === undefined ? "task-failed" : "tool-failed",
      details: error.message,
    };
  }
  return {
    reason: "task-failed",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private steps: StepRecord[] = [];
  private issues: Issue[] = [];
  private routeFiles: string[] = [];
  private removedRouteFiles: string[] = [];
  private startTime = new Date();

  // ============================================================================
  // Steps
  // ============================================================================

  recordSuccess(step: StepRef, durationMs: number, tool?: ToolName): void {
    this.steps.push({ ...step, status: "success", durationMs, tool });
  }

  recordFailure(
    step: StepRef,
    durationMs: number,
    error: unknown,
    tool?: ToolName,
  ): void {
    this.steps.push({ ...step, status: "failed", durationMs, tool });
    const { reason, details } = mapStepError(error);
    this.issues.push({ type: "step", path: step.key, reason, details });
  }

  recordSkipped(step: StepRef, tool?: ToolName): void {
    this.steps.push({ ...step, status: "skipped", durationMs: 0, tool });
  }

  getSteps(): StepRecord[] {
    return this.steps;
  }

  // ============================================================================
  // Route files
  // ============================================================================

  setRouteFiles(files: string[]): void {
    this.routeFiles = [...files];
  }

  setRemovedRouteFiles(files: string[]): void {
    this.removedRouteFiles = [...files];
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const duration = Date.now() - this.startTime.getTime();
    const count = (status: StepStatus) =>
      this.steps.filter((s) => s.status === status).length;

    return {
      steps: this.steps,
      succeededSteps: count("success"),
      failedSteps: count("failed"),
      skippedSteps: count("skipped"),
      routeFiles: this.routeFiles,
      removedRouteFiles: this.removedRouteFiles,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        succeededSteps: stats.succeededSteps,
        failedSteps: stats.failedSteps,
        skippedSteps: stats.skippedSteps,
        duration: stats.duration,
      },
      steps: stats.steps,
      routeFiles: stats.routeFiles,
      removedRouteFiles: stats.removedRouteFiles,
      issues: this.groupIssuesByType(),
    };

    const outputPath = join(outputDir, "run.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByType(): {
    resource: Record<string, ResourceIssue[]>;
    step: Record<string, StepIssue[]>;
  } {
    const grouped: {
      resource: Record<string, ResourceIssue[]>;
      step: Record<string, StepIssue[]>;
    } = {
      resource: {},
      step: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
        case "step": {
          (grouped.step[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
