import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { SaveguardConfig, SaveSlot, Snapshot } from "../src/types";

export async function makeTempDir(label: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `saveguard-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/**
 * Write files (relative path -> content) under `root`, creating directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, content);
  }
}

/**
 * Set every file's and directory's mtime below (and including) `root`.
 */
export async function touchTree(root: string, epochMs: number): Promise<void> {
  const when = new Date(epochMs);
  const entries = await fs.promises.readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      await touchTree(entryPath, epochMs);
    } else {
      await fs.promises.utimes(entryPath, when, when);
    }
  }
  await fs.promises.utimes(root, when, when);
}

export async function readTree(root: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  async function walk(dir: string): Promise<void> {
    for (const entry of await fs.promises.readdir(dir, { withFileTypes: true })) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else {
        const key = path.relative(root, entryPath).split(path.sep).join("/");
        result[key] = await fs.promises.readFile(entryPath, "utf-8");
      }
    }
  }
  await walk(root);
  return result;
}

export function makeSlot(saveRoot: string, gameMode: string, name: string): SaveSlot {
  return {
    id: `${gameMode}/${name}`,
    name,
    gameMode,
    path: path.join(saveRoot, gameMode, name),
    lastModified: 0,
  };
}

export function makeSnapshot(id: string, createdAt: number, sizeBytes: number, sequence = 1): Snapshot {
  return {
    id,
    slotId: "Navezgane/Test",
    createdAt,
    sequence,
    archiveName: `${id}.zip`,
    archivePath: `/backups/Navezgane/Test/${id}.zip`,
    sizeBytes,
    compressed: true,
    filesCount: 1,
    sourceModifiedAt: createdAt,
    previewPath: null,
  };
}

export function makeConfig(saveRoot: string, backupRoot: string, overrides: Partial<SaveguardConfig> = {}): SaveguardConfig {
  return {
    version: "1.0",
    saveRootPath: saveRoot,
    backupRootPath: backupRoot,
    saveIntervalSeconds: 600,
    compressFolders: true,
    keepLastNSaves: 10,
    defaultQuotaBytes: 0,
    saveQuotas: {},
    gameModes: [],
    database: { path: ":memory:" },
    archive: { compression: 6 },
    restore: { mode: "replace" },
    scheduler: { paused: false, backupOnStart: true },
    preferencesPath: path.join(backupRoot, "preferences.json"),
    ...overrides,
  };
}
