/**
 * Save tree traversal for archives, change detection and size probes
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { logger } from "../../utils/logger";
import { toPosix } from "../../utils/path";
import { isErrnoError } from "../errors";

export interface CollectedFile {
  absolutePath: string;
  /** Relative to the scanned root, posix separators */
  relativePath: string;
  size: number;
  mtimeMs: number;
}

export interface TreeScan {
  files: CollectedFile[];
  totalBytes: number;
  /** Newest mtime across files and directories, root included */
  newestMtimeMs: number;
}

export interface CollectOptions {
  signal?: AbortSignal;
}

/**
 * Walk `rootDir` recursively. Symbolic links are skipped.
 * Rejects with the fs error when the root itself cannot be read.
 */
export async function collectFiles(
  rootDir: string,
  options: CollectOptions = {},
): Promise<TreeScan> {
  const basePath = path.resolve(rootDir);
  const rootStat = await fs.promises.stat(basePath);

  const scan: TreeScan = {
    files: [],
    totalBytes: 0,
    newestMtimeMs: rootStat.mtimeMs,
  };

  await walk(basePath, basePath, scan, options.signal);

  scan.files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  logger.debug(`Collected ${scan.files.length} files from ${basePath}`);
  return scan;
}

async function walk(
  basePath: string,
  dir: string,
  scan: TreeScan,
  signal?: AbortSignal,
): Promise<void> {
  signal?.throwIfAborted();

  const entries = await fs.promises.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      logger.debug(`Skipping symbolic link: ${absolutePath}`);
      continue;
    }

    if (entry.isDirectory()) {
      const stat = await fs.promises.stat(absolutePath);
      scan.newestMtimeMs = Math.max(scan.newestMtimeMs, stat.mtimeMs);
      await walk(basePath, absolutePath, scan, signal);
      continue;
    }

    if (!entry.isFile()) continue;

    const stat = await fs.promises.stat(absolutePath);
    scan.files.push({
      absolutePath,
      relativePath: toPosix(path.relative(basePath, absolutePath)),
      size: stat.size,
      mtimeMs: stat.mtimeMs,
    });
    scan.totalBytes += stat.size;
    scan.newestMtimeMs = Math.max(scan.newestMtimeMs, stat.mtimeMs);
  }
}

/**
 * Sum of file sizes below `rootDir`; 0 when it does not exist.
 */
export async function measureTree(rootDir: string, options: CollectOptions = {}): Promise<number> {
  try {
    const scan = await collectFiles(rootDir, options);
    return scan.totalBytes;
  } catch (error) {
    if (isErrnoError(error, "ENOENT") || isErrnoError(error, "ENOTDIR")) return 0;
    throw error;
  }
}
