/**
 * Tool Runner
 * Uniform invocation of external collaborators, out-of-process or in-process
 *
 * Collaborator failure never throws here: every call resolves to a ToolResult
 * and the caller decides how the pipeline reacts.
 */

import { execa } from "execa";
import { existsSync } from "fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { Logger } from "./logger";
import type { Profiler } from "./profiler";
import type { ToolName, ToolSpec, ToolsConfig } from "../types";

/**
 * What an in-process collaborator gets besides its argv
 * Relative names it reads or writes resolve against cwd
 */
export interface InvocationContext {
  cwd: string;
}

/**
 * In-process entry point of a collaborator
 */
export type EntryPoint = (
  args: string[],
  context: InvocationContext,
) => void | Promise<void>;

export type InvocationMode = "process" | "in-process";

export type ToolResult =
  | { ok: true; tool: ToolName; mode: InvocationMode; durationMs: number }
  | {
      ok: false;
      tool: ToolName;
      mode: InvocationMode;
      durationMs: number;
      error: Error;
      exitCode?: number;
    };

export interface ToolRunnerOptions {
  tools: ToolsConfig;
  sumoHome: string;
  logger: Logger;
  profiler?: Profiler;
  // Programmatic entry points; take precedence over the configured mode
  entryPoints?: Partial<Record<ToolName, EntryPoint>>;
  // Base for a null tools.activitygenHome
  cwd?: string;
}

export interface CommandLine {
  file: string;
  args: string[];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function lastLines(output: string, count = 5): string {
  return output.trim().split("\n").slice(-count).join("\n");
}

export class ToolRunner {
  private readonly loaded = new Map<ToolName, EntryPoint>();
  private readonly activitygenHome: string;

  constructor(private readonly options: ToolRunnerOptions) {
    this.activitygenHome = path.resolve(
      options.cwd ?? process.cwd(),
      options.tools.activitygenHome ?? ".",
    );
  }

  /**
   * Invoke a collaborator with a pipeline-supplied argument vector
   */
  async invoke(
    tool: ToolName,
    args: string[],
    context: InvocationContext,
  ): Promise<ToolResult> {
    const run = () =>
      this.isInProcess(tool)
        ? this.invokeInProcess(tool, args, context)
        : this.invokeProcess(tool, args, context.cwd);

    return this.options.profiler
      ? this.options.profiler.measure(`tool:${tool}`, run)
      : run();
  }

  isInProcess(tool: ToolName): boolean {
    return (
      this.options.entryPoints?.[tool] !== undefined ||
      this.options.tools.collaborators[tool].mode === "module"
    );
  }

  /**
   * Build the command line for an out-of-process collaborator
   */
  resolveCommand(tool: ToolName, args: string[]): CommandLine {
    const spec: ToolSpec = this.options.tools.collaborators[tool];

    switch (spec.mode) {
      case "process":
        return { file: this.resolveBinary(spec.command), args };
      case "script": {
        const base =
          spec.root === "sumo"
            ? path.join(this.options.sumoHome, "tools")
            : this.activitygenHome;
        return {
          file: this.options.tools.interpreter,
          args: [path.resolve(base, spec.path), ...args],
        };
      }
      case "module":
        throw new Error(`${tool} is an in-process collaborator`);
    }
  }

  /**
   * Prefer the toolkit's own binary directory over PATH
   */
  private resolveBinary(command: string): string {
    if (path.isAbsolute(command) || command.includes(path.sep)) {
      return command;
    }
    const candidate = path.join(this.options.sumoHome, "bin", command);
    return existsSync(candidate) ? candidate : command;
  }

  private async invokeProcess(
    tool: ToolName,
    args: string[],
    cwd: string,
  ): Promise<ToolResult> {
    const { file, args: argv } = this.resolveCommand(tool, args);
    this.options.logger.debug(`$ ${[file, ...argv].join(" ")}`);

    const start = Date.now();
    const result = await execa(file, argv, {
      cwd,
      reject: false,
      all: true,
      encoding: "utf8",
    });
    const durationMs = Date.now() - start;

    if (result.all) {
      this.options.logger.debug(result.all);
    }

    if (result.failed) {
      // With reject: false the failed result is the execa error itself
      const cause = result instanceof Error ? result : undefined;
      const reason =
        result.exitCode !== undefined
          ? `exited with code ${result.exitCode}`
          : result.signal
            ? `was killed with ${result.signal}`
            : cause
              ? `could not be started: ${lastLines(cause.message, 1)}`
              : "could not be started";
      const details = result.all ? `\n${lastLines(result.all)}` : "";
      return {
        ok: false,
        tool,
        mode: "process",
        durationMs,
        error: new Error(`${file} ${reason}${details}`, { cause }),
        exitCode: result.exitCode,
      };
    }

    return { ok: true, tool, mode: "process", durationMs };
  }

  private async invokeInProcess(
    tool: ToolName,
    args: string[],
    context: InvocationContext,
  ): Promise<ToolResult> {
    this.options.logger.debug(
      `${tool}.main(${JSON.stringify(args)}) in ${context.cwd}`,
    );
    const start = Date.now();

    try {
      const main = await this.loadEntryPoint(tool);
      await main(args, context);
      return {
        ok: true,
        tool,
        mode: "in-process",
        durationMs: Date.now() - start,
      };
    } catch (error) {
      return {
        ok: false,
        tool,
        mode: "in-process",
        durationMs: Date.now() - start,
        error: toError(error),
      };
    }
  }

  private async loadEntryPoint(tool: ToolName): Promise<EntryPoint> {
    const injected = this.options.entryPoints?.[tool];
    if (injected) {
      return injected;
    }

    const cached = this.loaded.get(tool);
    if (cached) {
      return cached;
    }

    const spec = this.options.tools.collaborators[tool];
    if (spec.mode !== "module") {
      throw new Error(`${tool} has no in-process entry point`);
    }

    // Bare specifiers resolve as packages; anything path-like as a file
    const specifier =
      spec.specifier.startsWith(".") || path.isAbsolute(spec.specifier)
        ? pathToFileURL(path.resolve(this.activitygenHome, spec.specifier)).href
        : spec.specifier;

    const mod: unknown = await import(specifier);
    if (
      typeof mod !== "object" ||
      mod === null ||
      !("main" in mod) ||
      typeof mod.main !== "function"
    ) {
      throw new Error(`${spec.specifier} does not export main(args)`);
    }

    const exported = mod.main;
    const main: EntryPoint = async (args, context) => {
      await exported(args, context);
    };
    this.loaded.set(tool, main);
    return main;
  }
}
