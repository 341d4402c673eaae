import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { copyFile, mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { initialize } from "./workspace";
import { generate } from "./pipeline";
import { assemble } from "./assemble";
import { simulate } from "./simulate";
import {
  fileExists,
  loadDefaultConfig,
  parseXml,
  Logger,
  Profiler,
  ToolRunner,
  Tracker,
  Workspace,
} from "../utils";
import type { EntryPoint } from "../utils";
import {
  MissingArtifactError,
  StageError,
  type RunOptions,
  type ScenarioConfig,
  type ScenarioContext,
  type ToolName,
} from "../types";

const SIDE_PARKING = `<additional>
    <parkingArea id="side_1" lane="e1_0" startPos="0" endPos="20" roadsideCapacity="4"/>
</additional>
`;

const PARKING_AREAS = `<additional>
    <parkingArea id="area_1" lane="e2_0" roadsideCapacity="0" onRoad="false"/>
</additional>
`;

const ActivitygenOutput = z.object({ outputPrefix: z.string() });

function argValue(args: string[], flag: string): string {
  const index = args.indexOf(flag);
  if (index === -1 || index + 1 >= args.length) {
    throw new Error(`missing ${flag}`);
  }
  return args[index + 1];
}

/**
 * Stand-ins for every collaborator: each writes the files its stage promises
 */
function fakeCollaborators(
  calls: ToolName[],
  argv: Partial<Record<ToolName, string[]>>,
): Record<ToolName, EntryPoint> {
  const record =
    (tool: ToolName, write: (args: string[]) => Promise<void>): EntryPoint =>
    async (args) => {
      calls.push(tool);
      argv[tool] = args;
      await write(args);
    };

  return {
    netconvert: record("netconvert", async (args) => {
      await writeFile(argValue(args, "-o"), "<net/>");
      await writeFile(argValue(args, "--ptstop-output"), "<additional/>");
      await writeFile(argValue(args, "--ptline-output"), "<ptLines/>");
      await writeFile(argValue(args, "--parking-output"), SIDE_PARKING);
    }),
    ptlines2flows: record("ptlines2flows", (args) =>
      writeFile(argValue(args, "-o"), "<routes/>"),
    ),
    parkingAreas: record("parkingAreas", (args) =>
      writeFile(argValue(args, "--out"), PARKING_AREAS),
    ),
    parkingRerouters: record("parkingRerouters", (args) =>
      writeFile(argValue(args, "-o"), "<additional/>"),
    ),
    polyconvert: record("polyconvert", (args) =>
      writeFile(argValue(args, "-o"), "<additional/>"),
    ),
    tazBuildings: record("tazBuildings", async (args) => {
      await writeFile(argValue(args, "--taz-output"), "<additional/>");
      await writeFile(argValue(args, "--od-output"), "TAZ,Name,Weight\n1,centre,10\n");
      await writeFile(`${argValue(args, "--poly-output")}.1.add.xml`, "<additional/>");
    }),
    odMatrix: record("odMatrix", (args) =>
      writeFile(argValue(args, "--out"), "<demand/>"),
    ),
    activitygenDefaults: record("activitygenDefaults", (args) =>
      copyFile(argValue(args, "--conf"), argValue(args, "--out")),
    ),
    // Writes <outputPrefix>rou.xml resolved against its own cwd
    activitygen: record("activitygen", async (args) => {
      const { outputPrefix } = ActivitygenOutput.parse(
        JSON.parse(await readFile(argValue(args, "-c"), "utf-8")),
      );
      await writeFile(`${outputPrefix}rou.xml`, "<routes/>");
    }),
    sumo: record("sumo", async () => {}),
  };
}

interface Harness {
  ctx: ScenarioContext;
  calls: ToolName[];
  argv: Partial<Record<ToolName, string[]>>;
}

async function createHarness(
  osmFile: string,
  outDir: string,
  {
    options = {},
    entryPoints = {},
    config: configure = (config) => config,
  }: {
    options?: Partial<RunOptions>;
    entryPoints?: Partial<Record<ToolName, EntryPoint>>;
    config?: (config: ScenarioConfig) => ScenarioConfig;
  } = {},
): Promise<Harness> {
  const calls: ToolName[] = [];
  const argv: Partial<Record<ToolName, string[]>> = {};
  const config = configure(await loadDefaultConfig());
  const logger = new Logger("error");
  const profiler = new Profiler(false);

  const runner = new ToolRunner({
    tools: config.tools,
    sumoHome: "/opt/sumo-test",
    logger,
    profiler,
    entryPoints: { ...fakeCollaborators(calls, argv), ...entryPoints },
  });

  const ctx: ScenarioContext = {
    config,
    options: { osmFile, outDir, leftHand: false, simulate: true, ...options },
    sumoHome: "/opt/sumo-test",
    runner,
    tracker: new Tracker(),
    logger,
    profiler,
  };

  return { ctx, calls, argv };
}

async function runAll(ctx: ScenarioContext): Promise<void> {
  await initialize(ctx);
  await generate(ctx);
  await assemble(ctx);
  await simulate(ctx);
}

async function readRouteFilesValue(configPath: string): Promise<string | undefined> {
  const $ = parseXml(await readFile(configPath, "utf-8"));
  return $("route-files").attr("value");
}

describe("scenario pipeline", () => {
  let root: string;
  let osmFile: string;
  let outDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "osm-scenario-"));
    osmFile = join(root, "input", "city.osm");
    outDir = join(root, "scenario");
    await mkdir(dirname(osmFile), { recursive: true });
    await writeFile(osmFile, '<osm version="0.6"></osm>');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("runs every stage in order and writes the route files into the config", async () => {
    const { ctx, calls, argv } = await createHarness(osmFile, outDir);

    await runAll(ctx);

    expect(calls).toEqual([
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
    ]);
    expect(ctx.tracker.getSteps().map((s) => [s.key, s.status])).toEqual([
      ["network", "success"],
      ["pt-flows", "success"],
      ["parking-areas", "success"],
      ["parking-merge", "success"],
      ["parking-rerouters", "success"],
      ["polygons", "success"],
      ["taz-buildings", "success"],
      ["od-matrix", "success"],
      ["activitygen-defaults", "success"],
      ["mobility", "success"],
      ["assemble", "success"],
      ["simulate", "success"],
    ]);

    const scenarioConfig = join(outDir, "osm.sumocfg");
    expect(ctx.routeFiles).toEqual(["osm_activitygen.rou.xml", "osm_pt.rou.xml"]);
    expect(await readRouteFilesValue(scenarioConfig)).toBe(
      "osm_activitygen.rou.xml,osm_pt.rou.xml",
    );
    expect(argv.sumo).toEqual(["-c", scenarioConfig]);
  });

  it("leaves every intermediate artifact in the workspace", async () => {
    const { ctx } = await createHarness(osmFile, outDir);

    await runAll(ctx);

    for (const name of [
      "city.osm",
      "osm.net.xml",
      "osm_stops.add.xml",
      "osm_ptlines.xml",
      "osm_parking.xml",
      "osm_pt.rou.xml",
      "osm_parking_areas.add.xml",
      "osm_complete_parking_areas.add.xml",
      "osm_parking_rerouters.add.xml",
      "osm_polygons.add.xml",
      "osm_taz.xml",
      "osm_taz_weight.csv",
      "buildings/osm_buildings.1.add.xml",
      "osm_odmatrix_amitran.xml",
      "osm_activitygen.json",
    ]) {
      expect(await fileExists(join(outDir, name)), name).toBe(true);
    }

    const merged = parseXml(
      await readFile(join(outDir, "osm_complete_parking_areas.add.xml"), "utf-8"),
    );
    expect(merged("parkingArea").toArray().map((el) => merged(el).attr("id"))).toEqual([
      "side_1",
      "area_1",
    ]);
  });

  it("threads explicit paths instead of changing the working directory", async () => {
    const before = process.cwd();
    const { ctx, argv } = await createHarness(osmFile, outDir, {
      options: { leftHand: true },
    });

    await runAll(ctx);

    expect(process.cwd()).toBe(before);
    expect(argv.netconvert).toContain("--lefthand");
    expect(argv.netconvert).toContain(join(outDir, "city.osm"));
  });

  it("keeps the mobility generator's files in the workspace", async () => {
    const seen: string[] = [];
    const { ctx } = await createHarness(osmFile, outDir, {
      entryPoints: {
        odMatrix: async (args, { cwd }) => {
          seen.push(cwd);
          await writeFile(argValue(args, "--out"), "<demand/>");
        },
      },
    });

    await runAll(ctx);

    expect(seen).toEqual([outDir]);
    const { outputPrefix } = ActivitygenOutput.parse(
      JSON.parse(await readFile(join(outDir, "osm_activitygen.json"), "utf-8")),
    );
    expect(outputPrefix).toBe(join(outDir, "osm_activitygen."));
    expect(await fileExists(join(outDir, "osm_activitygen.rou.xml"))).toBe(true);
  });

  it("stops at the first failing collaborator and skips the rest", async () => {
    const { ctx, calls } = await createHarness(osmFile, outDir, {
      entryPoints: {
        polyconvert: () => {
          throw new Error("polyconvert crashed");
        },
      },
    });
    await initialize(ctx);

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toHaveProperty(
      "message",
      "Stage 6 (Polygon conversion) failed: polyconvert: polyconvert crashed",
    );
    expect(error).toHaveProperty("step", {
      key: "polygons",
      label: "Polygon conversion",
      position: 6,
    });
    expect(calls).toEqual([
      "netconvert",
      "ptlines2flows",
      "parkingAreas",
      "parkingRerouters",
    ]);
    expect(ctx.tracker.getSteps().map((s) => s.status)).toEqual([
      "success",
      "success",
      "success",
      "success",
      "success",
      "failed",
      "skipped",
      "skipped",
      "skipped",
      "skipped",
    ]);
    expect(ctx.tracker.getIssues("step")).toEqual([
      {
        type: "step",
        path: "polygons",
        reason: "tool-failed",
        details: "Stage 6 (Polygon conversion) failed: polyconvert: polyconvert crashed",
      },
    ]);
  });

  it("fails the stage whose collaborator did not write its output", async () => {
    const { ctx, calls } = await createHarness(osmFile, outDir, {
      entryPoints: { ptlines2flows: async () => {} },
    });
    await initialize(ctx);

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingArtifactError);
    expect(error).toMatchObject({
      artifact: "ptFlows",
      role: "output",
      path: join(outDir, "osm_pt.rou.xml"),
      step: { position: 2 },
    });
    expect(calls).toEqual(["netconvert"]);
  });

  it("requires at least one file under the buildings prefix", async () => {
    const { ctx, calls } = await createHarness(osmFile, outDir, {
      entryPoints: {
        tazBuildings: async (args) => {
          await writeFile(argValue(args, "--taz-output"), "<additional/>");
          await writeFile(argValue(args, "--od-output"), "TAZ,Name,Weight\n");
        },
      },
    });
    await initialize(ctx);

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toMatchObject({
      name: "MissingArtifactError",
      artifact: "buildingsPrefix",
      role: "output",
      step: { position: 7 },
    });
    expect(calls).not.toContain("odMatrix");
  });

  it("records an output check that cannot run as a stage failure", async () => {
    class UnreadableWorkspace extends Workspace {
      override async routeFiles(): Promise<string[]> {
        throw new Error("EACCES: permission denied, scandir");
      }
    }
    const { ctx } = await createHarness(osmFile, outDir);
    await initialize(ctx);
    ctx.workspace = new UnreadableWorkspace(outDir, ctx.config.artifacts, "city.osm");

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toHaveProperty(
      "message",
      "Stage 10 (Mobility generation) failed: could not check outputs: EACCES: permission denied, scandir",
    );
    expect(ctx.tracker.getSteps().at(-1)).toMatchObject({
      key: "mobility",
      status: "failed",
    });
    expect(ctx.tracker.getIssues("step")).toEqual([
      {
        type: "step",
        path: "mobility",
        reason: "task-failed",
        details:
          "Stage 10 (Mobility generation) failed: could not check outputs: EACCES: permission denied, scandir",
      },
    ]);
  });

  it("checks inputs before invoking a collaborator", async () => {
    const { ctx, calls } = await createHarness(osmFile, outDir, {
      config: (config) => ({
        ...config,
        workspace: {
          ...config.workspace,
          templates: config.workspace.templates.filter((t) => t !== "osm.netccfg"),
        },
      }),
    });
    await initialize(ctx);

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toMatchObject({
      name: "MissingArtifactError",
      artifact: "netconvertConfig",
      role: "input",
    });
    expect(calls).toEqual([]);
  });

  it("requires the mobility generator to write route files", async () => {
    const { ctx } = await createHarness(osmFile, outDir, {
      entryPoints: { activitygen: async () => {} },
    });
    await initialize(ctx);

    const error = await generate(ctx).catch((e: unknown) => e);

    expect(error).toMatchObject({ artifact: "routes", step: { position: 10 } });
  });

  it("replaces the route file list when re-run into the same workspace", async () => {
    const first = await createHarness(osmFile, outDir);
    await runAll(first.ctx);
    await writeFile(join(outDir, "old_run.rou.xml"), "<routes/>");

    const second = await createHarness(osmFile, outDir);
    await runAll(second.ctx);

    expect(await readRouteFilesValue(join(outDir, "osm.sumocfg"))).toBe(
      "osm_activitygen.rou.xml,osm_pt.rou.xml",
    );
    expect(await fileExists(join(outDir, "old_run.rou.xml"))).toBe(false);
    expect(second.ctx.tracker.getStats().removedRouteFiles).toEqual([
      "old_run.rou.xml",
      "osm_activitygen.rou.xml",
      "osm_pt.rou.xml",
    ]);
  });

  it("keeps earlier route files when cleaning is disabled", async () => {
    await mkdir(outDir, { recursive: true });
    await writeFile(join(outDir, "old_run.rou.xml"), "<routes/>");
    const { ctx } = await createHarness(osmFile, outDir, {
      config: (config) => ({
        ...config,
        workspace: { ...config.workspace, cleanRouteFiles: false },
      }),
    });

    await runAll(ctx);

    expect(await readRouteFilesValue(join(outDir, "osm.sumocfg"))).toBe(
      "old_run.rou.xml,osm_activitygen.rou.xml,osm_pt.rou.xml",
    );
  });

  it("leaves a config without a route-files element untouched", async () => {
    const { ctx } = await createHarness(osmFile, outDir);
    await runAll(ctx);
    const scenarioConfig = join(outDir, "osm.sumocfg");
    const content = "<configuration><input/></configuration>";
    await writeFile(scenarioConfig, content);

    await assemble(ctx);

    expect(await readFile(scenarioConfig, "utf-8")).toBe(content);
  });

  it("skips the simulator when disabled", async () => {
    const { ctx, calls } = await createHarness(osmFile, outDir, {
      options: { simulate: false },
    });

    await runAll(ctx);

    expect(calls).not.toContain("sumo");
    expect(ctx.tracker.getSteps().at(-1)).toMatchObject({
      key: "simulate",
      status: "skipped",
    });
  });
});
