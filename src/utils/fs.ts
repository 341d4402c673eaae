/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, copyFile } from "fs/promises";
import { constants } from "node:fs";
import path from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(target: string): Promise<boolean> {
  try {
    await access(target, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copy a file into a directory under its own basename
 * Copying a file onto itself is a no-op
 *
 * @returns The basename of the copy
 */
export async function copyIntoDirectory(
  source: string,
  directory: string,
): Promise<string> {
  const name = path.basename(source);
  const destination = path.join(directory, name);

  if (path.resolve(source) !== path.resolve(destination)) {
    await copyFile(source, destination);
  }
  return name;
}
