/**
 * Route file discovery
 */

import glob from "fast-glob";
import { rm } from "fs/promises";
import path from "node:path";

/**
 * List every file in the directory (not recursive) whose name contains marker
 * Sorted and de-duplicated so the joined list is stable across platforms
 */
export async function listRouteFiles(
  directory: string,
  marker: string,
): Promise<string[]> {
  const files = await glob(`*${glob.escapePath(marker)}*`, {
    cwd: directory,
    onlyFiles: true,
    dot: true,
  });

  return [...new Set(files)].sort();
}

/**
 * Remove route files left in the directory by a previous run
 * Returns the removed filenames
 */
export async function removeRouteFiles(
  directory: string,
  marker: string,
): Promise<string[]> {
  const files = await listRouteFiles(directory, marker);
  for (const file of files) {
    await rm(path.join(directory, file), { force: true });
  }
  return files;
}
