/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, rm } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Delete a file, ignoring a file that is already gone
 */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}
