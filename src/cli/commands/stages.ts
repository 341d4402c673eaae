/**
 * Stages command - Print the stage sequence and its file contract
 */

import chalk from "chalk";
import { STAGES } from "../../stages";
import { loadConfig, Workspace } from "../../utils";
import { ARTIFACT_FORMATS, type ArtifactKey } from "../../types";

export async function stagesCommand(): Promise<void> {
  const { config } = await loadConfig();
  // Names only; nothing is created
  const workspace = new Workspace(".", config.artifacts, "<map>.osm");
  const describe = (key: ArtifactKey) =>
    `${workspace.name(key)} ${chalk.dim(`[${ARTIFACT_FORMATS[key]}]`)}`;

  for (const stage of STAGES) {
    const runner = stage.kind === "tool" ? stage.tool : "(in-process merge)";
    console.log(
      `\n  ${chalk.bold(`${stage.position}. ${stage.label}`)} ${chalk.dim(runner)}`,
    );
    const inputs = stage.inputs.map(describe);
    const outputs = stage.outputs.map(describe);
    if (stage.producesRoutes) {
      outputs.push(`*${config.routes.marker} ${chalk.dim("[routes]")}`);
    }
    console.log(`     ${chalk.dim("in ")} ${inputs.join(", ")}`);
    console.log(`     ${chalk.dim("out")} ${outputs.join(", ")}`);
  }
  console.log("");
}
