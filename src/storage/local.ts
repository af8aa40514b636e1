/**
 * Local filesystem helpers for the backup root
 */

import * as fs from "node:fs";
import { errorMessage } from "../core/errors";
import { logger } from "../utils/logger";

export async function ensureLocalDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

export async function localFileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Delete a file; a file that is already gone is only worth a warning.
 */
export async function deleteFromLocal(filePath: string): Promise<void> {
  if (!(await localFileExists(filePath))) {
    logger.warn(`Local file not found (already deleted?): ${filePath}`);
    return;
  }

  await fs.promises.unlink(filePath);
  logger.debug(`Deleted local file: ${filePath}`);
}

/**
 * Remove a temp file or directory during cleanup. Failures are logged, not thrown.
 */
export async function removeQuietly(targetPath: string): Promise<void> {
  try {
    await fs.promises.rm(targetPath, { recursive: true, force: true });
  } catch (error) {
    logger.warn(`Could not remove ${targetPath}: ${errorMessage(error)}`);
  }
}

/**
 * Free bytes available to this process on the volume holding `dirPath`,
 * or null when the platform cannot tell.
 */
export async function getFreeBytes(dirPath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.statfs(dirPath);
    return stats.bavail * stats.bsize;
  } catch (error) {
    logger.debug(`statfs unavailable for ${dirPath}: ${errorMessage(error)}`);
    return null;
  }
}

export async function isDirectoryWritable(dirPath: string): Promise<boolean> {
  try {
    await fs.promises.access(dirPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}
