/**
 * Snapshot archive writer
 *
 * Archives are written next to their final location under a hidden
 * `.partial` name, flushed, read back and only then renamed into place.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import archiver from "archiver";
import * as yauzl from "yauzl-promise";
import { getFreeBytes, removeQuietly } from "../../storage/local";
import { generateShortId } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { previewNameFor } from "../../utils/naming";
import {
  errorMessage,
  InsufficientSpaceError,
  IOError,
  isErrnoError,
  SaveguardError,
} from "../errors";
import { collectFiles, type TreeScan } from "./file-collector";

/** Preview image a save may carry at its root */
export const DEFAULT_PREVIEW_FILE = "thumb.png";

export const DEFAULT_COMPRESSION_LEVEL = 6;

// Local header + central directory record, rounded up
const ENTRY_OVERHEAD_BYTES = 128;

export interface WriteArchiveOptions {
  compress: boolean;
  /** zlib level 0-9, only used when compress is set */
  compressionLevel?: number;
  /** File name in the source root copied beside the archive; null disables */
  previewFile?: string | null;
  /** Reuse a scan taken by the caller instead of walking the tree again */
  scan?: TreeScan;
}

export interface ArchiveWriteResult {
  archivePath: string;
  sizeBytes: number;
  filesCount: number;
  /** Uncompressed size of the archived files */
  sourceBytes: number;
  previewPath: string | null;
}

export async function writeArchive(
  sourceDir: string,
  destPath: string,
  options: WriteArchiveOptions,
): Promise<ArchiveWriteResult> {
  const scan = options.scan ?? (await scanSource(sourceDir));
  const destDir = path.dirname(destPath);
  const requiredBytes = estimateRequiredBytes(scan);

  try {
    await fs.promises.mkdir(destDir, { recursive: true });
  } catch (error) {
    throw new IOError(`Cannot create ${destDir}: ${errorMessage(error)}`, { cause: error });
  }

  const available = await getFreeBytes(destDir);
  if (available !== null && available < requiredBytes) {
    throw new InsufficientSpaceError(requiredBytes, available);
  }

  const tempPath = path.join(destDir, `.${path.basename(destPath)}.${generateShortId()}.partial`);
  const previewSource = await findPreview(sourceDir, options.previewFile);
  const previewPath = previewSource ? path.join(destDir, previewNameFor(path.basename(destPath))) : null;
  const previewTemp = previewPath ? `${tempPath}.preview` : null;

  logger.debug(
    `Writing ${scan.files.length} files to ${tempPath} (${options.compress ? "deflate" : "store"})`,
  );

  try {
    await createZip(scan, tempPath, options.compress, options.compressionLevel);
    await syncFile(tempPath);
    await readBack(tempPath, scan.files.length);
    const { size } = await fs.promises.stat(tempPath);

    if (previewSource && previewTemp && previewPath) {
      await fs.promises.copyFile(previewSource, previewTemp);
      await fs.promises.rename(previewTemp, previewPath);
    }

    // Commit point: the archive becomes visible here
    await fs.promises.rename(tempPath, destPath);

    logger.info(`Archive written: ${destPath} (${size} bytes, ${scan.files.length} files)`);

    return {
      archivePath: destPath,
      sizeBytes: size,
      filesCount: scan.files.length,
      sourceBytes: scan.totalBytes,
      previewPath,
    };
  } catch (error) {
    await removeQuietly(tempPath);
    if (previewTemp) await removeQuietly(previewTemp);
    if (previewPath) await removeQuietly(previewPath);
    throw await classifyWriteError(error, destDir, requiredBytes);
  }
}

async function scanSource(sourceDir: string): Promise<TreeScan> {
  try {
    return await collectFiles(sourceDir);
  } catch (error) {
    throw new IOError(`Cannot read ${sourceDir}: ${errorMessage(error)}`, { cause: error });
  }
}

export function estimateRequiredBytes(scan: TreeScan): number {
  return scan.totalBytes + scan.files.length * ENTRY_OVERHEAD_BYTES;
}

async function findPreview(
  sourceDir: string,
  previewFile: string | null | undefined,
): Promise<string | null> {
  const name = previewFile === undefined ? DEFAULT_PREVIEW_FILE : previewFile;
  if (!name) return null;

  const candidate = path.join(sourceDir, name);
  try {
    const stat = await fs.promises.stat(candidate);
    return stat.isFile() ? candidate : null;
  } catch {
    return null;
  }
}

async function createZip(
  scan: TreeScan,
  archivePath: string,
  compress: boolean,
  compressionLevel: number = DEFAULT_COMPRESSION_LEVEL,
): Promise<void> {
  const output = fs.createWriteStream(archivePath);
  const archive = compress
    ? archiver("zip", { zlib: { level: compressionLevel } })
    : archiver("zip", { store: true });

  const closed = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
  });

  archive.on("warning", (warning) => {
    logger.warn(`Archive warning: ${warning.message}`);
  });

  archive.pipe(output);

  for (const file of scan.files) {
    archive.file(file.absolutePath, {
      name: file.relativePath,
      date: new Date(file.mtimeMs),
    });
  }

  try {
    await Promise.all([archive.finalize(), closed]);
  } catch (error) {
    archive.abort();
    output.destroy();
    throw error;
  }
}

async function syncFile(filePath: string): Promise<void> {
  const handle = await fs.promises.open(filePath, "r+");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Number of entries listed in an archive's central directory.
 */
export async function countArchiveEntries(archivePath: string): Promise<number> {
  const zip = await yauzl.open(archivePath);
  let count = 0;
  try {
    for await (const _entry of zip) {
      count++;
    }
  } finally {
    await zip.close();
  }
  return count;
}

/**
 * Reopen the written archive and check every entry is listed.
 */
async function readBack(archivePath: string, expectedEntries: number): Promise<void> {
  let count: number;
  try {
    count = await countArchiveEntries(archivePath);
  } catch (error) {
    throw new IOError(`Read-back failed for ${archivePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (count !== expectedEntries) {
    throw new IOError(
      `Read-back failed for ${archivePath}: expected ${expectedEntries} entries, found ${count}`,
    );
  }
}

async function classifyWriteError(
  error: unknown,
  destDir: string,
  requiredBytes: number,
): Promise<SaveguardError> {
  if (error instanceof SaveguardError) return error;

  const available = await getFreeBytes(destDir);
  if (isErrnoError(error, "ENOSPC") || (available !== null && available < requiredBytes)) {
    return new InsufficientSpaceError(requiredBytes, available, { cause: error });
  }

  return new IOError(`Archive write failed: ${errorMessage(error)}`, { cause: error });
}
