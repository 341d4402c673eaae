/**
 * Profiler
 * Collects call-cost statistics for instrumented calls over a whole run
 */

import { performance } from "node:perf_hooks";

export interface ProfileEntry {
  name: string;
  calls: number;
  ownMs: number; // Time spent outside nested measured calls
  cumulativeMs: number;
}

interface Frame {
  name: string;
  childMs: number;
}

export class Profiler {
  private entries = new Map<string, ProfileEntry>();
  private stack: Frame[] = [];

  constructor(
    readonly enabled: boolean,
    private readonly now: () => number = () => performance.now(),
  ) {}

  /**
   * Run fn and attribute its wall-clock cost to name
   * Pass-through when profiling is disabled
   */
  async measure<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (!this.enabled) {
      return fn();
    }

    const frame: Frame = { name, childMs: 0 };
    this.stack.push(frame);
    const start = this.now();

    try {
      return await fn();
    } finally {
      const elapsed = this.now() - start;
      this.stack.pop();

      const parent = this.stack.at(-1);
      if (parent) {
        parent.childMs += elapsed;
      }

      const entry = this.entries.get(name) ?? {
        name,
        calls: 0,
        ownMs: 0,
        cumulativeMs: 0,
      };
      entry.calls++;
      entry.ownMs += elapsed - frame.childMs;
      // Recursive calls only count once towards the cumulative time
      if (!this.stack.some((f) => f.name === name)) {
        entry.cumulativeMs += elapsed;
      }
      this.entries.set(name, entry);
    }
  }

  /**
   * Entries sorted by cumulative time, most expensive first
   */
  top(limit = 25): ProfileEntry[] {
    return [...this.entries.values()]
      .sort((a, b) => b.cumulativeMs - a.cumulativeMs)
      .slice(0, limit);
  }

  report(limit = 25): string {
    const header = `${"ncalls".padStart(8)}  ${"tottime(ms)".padStart(12)}  ${"cumtime(ms)".padStart(12)}  name`;
    const rows = this.top(limit).map(
      (e) =>
        `${String(e.calls).padStart(8)}  ${e.ownMs.toFixed(1).padStart(12)}  ${e.cumulativeMs.toFixed(1).padStart(12)}  ${e.name}`,
    );
    return [header, ...rows].join("\n");
  }
}
