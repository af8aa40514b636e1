/**
 * Snapshot archive extraction
 *
 * The archive is decoded completely into a staging directory beside the
 * destination before anything in the destination is touched.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import * as yauzl from "yauzl-promise";
import { removeQuietly } from "../../storage/local";
import type { RestoreMode } from "../../types";
import { generateShortId } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import {
  CorruptArchiveError,
  errorMessage,
  InsufficientSpaceError,
  IOError,
  isErrnoError,
  SaveguardError,
} from "../errors";

export interface ExtractOptions {
  /** replace: destination becomes exactly the archive; overlay: overwrite matching files only */
  mode?: RestoreMode;
}

export interface ExtractResult {
  destination: string;
  filesCount: number;
}

export async function extractArchive(
  sourcePath: string,
  destDir: string,
  options: ExtractOptions = {},
): Promise<ExtractResult> {
  const mode = options.mode ?? "replace";
  const target = path.resolve(destDir);
  const parent = path.dirname(target);
  const staging = path.join(parent, `.${path.basename(target)}.restore-${generateShortId()}`);

  try {
    await fs.promises.mkdir(parent, { recursive: true });
  } catch (error) {
    throw new IOError(`Cannot create ${parent}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    const filesCount = await unpack(sourcePath, staging);
    logger.debug(`Staged ${filesCount} files from ${sourcePath} into ${staging}`);

    try {
      if (mode === "replace") {
        await swapIn(staging, target);
      } else {
        await overlay(staging, target);
      }
    } catch (error) {
      throw new IOError(`Cannot write into ${target}: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`Extracted ${path.basename(sourcePath)} into ${target} (${mode})`);
    return { destination: target, filesCount };
  } finally {
    await removeQuietly(staging);
  }
}

async function unpack(sourcePath: string, stagingDir: string): Promise<number> {
  let zip: yauzl.ZipFile;
  try {
    zip = await yauzl.open(sourcePath);
  } catch (error) {
    throw classifyReadError(error, sourcePath, 0);
  }

  let filesCount = 0;
  let expectedBytes = 0;

  try {
    await fs.promises.mkdir(stagingDir, { recursive: true });

    for await (const entry of zip) {
      const entryPath = path.resolve(stagingDir, entry.filename);

      if (!isPathWithinDir(entryPath, stagingDir) || entryPath === stagingDir) {
        throw new CorruptArchiveError(sourcePath, `entry escapes destination: ${entry.filename}`);
      }

      if (entry.filename.endsWith("/")) {
        await fs.promises.mkdir(entryPath, { recursive: true });
        continue;
      }

      expectedBytes += entry.uncompressedSize;
      await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
      const readStream = await entry.openReadStream();
      await pipeline(readStream, fs.createWriteStream(entryPath));
      filesCount++;
    }
  } catch (error) {
    throw classifyReadError(error, sourcePath, expectedBytes);
  } finally {
    await zip.close();
  }

  return filesCount;
}

/**
 * Filesystem errors stay IO errors; anything the zip reader rejects is corruption.
 */
function classifyReadError(error: unknown, sourcePath: string, expectedBytes: number): SaveguardError {
  if (error instanceof SaveguardError) return error;
  if (isErrnoError(error, "ENOSPC")) {
    return new InsufficientSpaceError(expectedBytes, null, { cause: error });
  }
  if (isErrnoError(error)) {
    return new IOError(`Cannot read ${sourcePath}: ${errorMessage(error)}`, { cause: error });
  }
  return new CorruptArchiveError(sourcePath, errorMessage(error), { cause: error });
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.lstat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Move the current destination aside, move the staged tree in, then drop the old one.
 */
async function swapIn(staging: string, target: string): Promise<void> {
  if (!(await exists(target))) {
    await fs.promises.rename(staging, target);
    return;
  }

  const previous = `${target}.previous-${generateShortId()}`;
  await fs.promises.rename(target, previous);

  try {
    await fs.promises.rename(staging, target);
  } catch (error) {
    await fs.promises.rename(previous, target);
    throw error;
  }

  await removeQuietly(previous);
}

async function overlay(staging: string, target: string): Promise<void> {
  await fs.promises.mkdir(target, { recursive: true });
  const entries = await fs.promises.readdir(staging, { withFileTypes: true });

  for (const entry of entries) {
    const from = path.join(staging, entry.name);
    const to = path.join(target, entry.name);

    if (entry.isDirectory()) {
      await overlay(from, to);
    } else {
      await fs.promises.rename(from, to);
    }
  }
}
