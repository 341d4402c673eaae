import { describe, it, expect } from "vitest";
import { Profiler } from "./profiler";

function fakeClock() {
  const clock = { now: 0 };
  return { clock, read: () => clock.now };
}

describe("Profiler", () => {
  it("splits own and cumulative time between nested calls", async () => {
    const { clock, read } = fakeClock();
    const profiler = new Profiler(true, read);

    await profiler.measure("run", async () => {
      clock.now += 5;
      await profiler.measure("stage:network", async () => {
        clock.now += 10;
      });
      await profiler.measure("stage:network", async () => {
        clock.now += 20;
      });
      clock.now += 1;
    });

    expect(profiler.top()).toEqual([
      { name: "run", calls: 1, ownMs: 6, cumulativeMs: 36 },
      { name: "stage:network", calls: 2, ownMs: 30, cumulativeMs: 30 },
    ]);
  });

  it("counts recursive calls once towards cumulative time", async () => {
    const { clock, read } = fakeClock();
    const profiler = new Profiler(true, read);

    await profiler.measure("merge-xml", () =>
      profiler.measure("merge-xml", async () => {
        clock.now += 4;
      }),
    );

    expect(profiler.top()).toEqual([
      { name: "merge-xml", calls: 2, ownMs: 4, cumulativeMs: 4 },
    ]);
  });

  it("records the call even when it throws", async () => {
    const profiler = new Profiler(true, fakeClock().read);

    await expect(
      profiler.measure("tool:polyconvert", async () => {
        throw new Error("crashed");
      }),
    ).rejects.toThrow("crashed");
    expect(profiler.top().map((e) => e.calls)).toEqual([1]);
  });

  it("limits the report to the most expensive entries", async () => {
    const { clock, read } = fakeClock();
    const profiler = new Profiler(true, read);

    for (let i = 1; i <= 30; i++) {
      await profiler.measure(`call-${i}`, async () => {
        clock.now += i;
      });
    }

    const top = profiler.top(25);
    expect(top).toHaveLength(25);
    expect(top[0].name).toBe("call-30");
    expect(top[24].name).toBe("call-6");

    const lines = profiler.report(2).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[1]).toMatch(/^\s+1\s+30\.0\s+30\.0\s+call-30$/);
  });

  it("passes through without recording when disabled", async () => {
    const profiler = new Profiler(false);

    await expect(profiler.measure("run", async () => 42)).resolves.toBe(42);
    expect(profiler.top()).toEqual([]);
  });
});
