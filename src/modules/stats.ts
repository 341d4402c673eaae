/**
 * Stats Module
 * Displays the run summary, issues and the optional profiling report
 */

import chalk from "chalk";
import type { Tracker } from "../utils/tracker";
import type {
  RunStats,
  StepRecord,
  ResourceIssue,
  StepIssue,
  ScenarioContext,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(28))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

const STATUS_ICONS: Record<StepRecord["status"], string> = {
  success: chalk.green("◉"),
  failed: chalk.red("✖"),
  skipped: chalk.dim("○"),
};

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display the run summary to console
 */
export async function stats(ctx: ScenarioContext): Promise<void> {
  const { tracker, workspace, profiler, verbose } = ctx;
  if (workspace) {
    await tracker.exportStats(workspace.root);
  }

  const stats = tracker.getStats();
  const hasErrors = stats.failedSteps > 0;
  const hasWarnings = tracker.getIssues("resource").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = hasErrors ? "Scenario Incomplete" : "Scenario Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayStepsSection(stats);
  displayRoutesSection(stats);
  displayIssuesSection(tracker, verbose);

  if (profiler.enabled) {
    console.log(sectionHeader("Profile (top 25 by cumulative time)"));
    console.log(
      profiler
        .report(25)
        .split("\n")
        .map((line) => `   ${line}`)
        .join("\n"),
    );
  }

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayStepsSection(stats: RunStats): void {
  if (stats.steps.length === 0) {
    return;
  }

  console.log(sectionHeader("Stages"));

  for (const step of stats.steps) {
    const label =
      step.position === undefined ? step.label : `${step.position}. ${step.label}`;
    const value =
      step.status === "skipped" ? "skipped" : formatDuration(step.durationMs);
    const color =
      step.status === "failed"
        ? chalk.red
        : step.status === "skipped"
          ? chalk.dim
          : chalk.green;
    console.log(statRow(STATUS_ICONS[step.status], label, value, color));
  }
}

function displayRoutesSection(stats: RunStats): void {
  if (stats.routeFiles.length === 0 && stats.removedRouteFiles.length === 0) {
    return;
  }

  console.log(sectionHeader("Route files"));

  for (const file of stats.routeFiles) {
    console.log(`   ${chalk.cyan("◉")} ${file}`);
  }

  if (stats.removedRouteFiles.length > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Removed from previous run",
        stats.removedRouteFiles.length,
        chalk.yellow,
      ),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const stepIssues = tracker
    .getIssues("step")
    .filter((i): i is StepIssue => i.type === "step");
  const resourceIssues = tracker
    .getIssues("resource")
    .filter((i): i is ResourceIssue => i.type === "resource");

  if (stepIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  for (const issue of stepIssues) {
    console.log(statRow(chalk.red("✖"), issue.reason, issue.path, chalk.red));
    console.log(`      ${chalk.dim(issue.details)}`);
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config files ignored",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
