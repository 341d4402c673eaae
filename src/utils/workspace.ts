/**
 * Workspace
 * Registry mapping logical artifact names to absolute paths in one run's directory
 */

import glob from "fast-glob";
import path from "node:path";
import { fileExists } from "./fs";
import { listRouteFiles } from "./route-files";
import {
  isPrefixArtifact,
  MissingArtifactError,
  type ArtifactKey,
  type ArtifactsConfig,
  type StepRef,
} from "../types";

export class Workspace {
  readonly root: string;
  private readonly names: Record<ArtifactKey, string>;

  /**
   * @param root - Workspace directory (resolved to an absolute path)
   * @param artifacts - Canonical artifact filenames, relative to root
   * @param mapFile - Name of the copied map extract inside root
   */
  constructor(root: string, artifacts: ArtifactsConfig, mapFile: string) {
    this.root = path.resolve(root);
    this.names = { ...artifacts, osm: mapFile };
  }

  /**
   * Filename of an artifact relative to the workspace root
   */
  name(key: ArtifactKey): string {
    return this.names[key];
  }

  path(key: ArtifactKey): string {
    return path.join(this.root, this.names[key]);
  }

  /**
   * Prefix artifacts exist once a file named after the prefix does
   */
  async exists(key: ArtifactKey): Promise<boolean> {
    const target = this.path(key);
    if (!isPrefixArtifact(key)) {
      return fileExists(target);
    }

    const directory = path.dirname(target);
    if (!(await fileExists(directory))) {
      return false;
    }
    const matches = await glob(`${glob.escapePath(path.basename(target))}*`, {
      cwd: directory,
      onlyFiles: true,
      dot: true,
    });
    return matches.length > 0;
  }

  /**
   * Fail fast when a step boundary finds an artifact absent
   */
  async require(
    step: StepRef,
    keys: ArtifactKey[],
    role: "input" | "output",
  ): Promise<void> {
    for (const key of keys) {
      if (!(await this.exists(key))) {
        throw new MissingArtifactError(step, key, this.path(key), role);
      }
    }
  }

  async routeFiles(marker: string): Promise<string[]> {
    return listRouteFiles(this.root, marker);
  }
}
