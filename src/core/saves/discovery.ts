/**
 * Save slot discovery
 *
 * Saves live at `<saveRoot>/<gameMode>/<saveName>`; each such directory is one slot.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { SaveSlot } from "../../types";
import { logger } from "../../utils/logger";
import { errorMessage, isErrnoError } from "../errors";

async function listDirectories(dir: string): Promise<fs.Dirent[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory());
  } catch (error) {
    if (isErrnoError(error, "ENOENT") || isErrnoError(error, "ENOTDIR")) return [];
    throw error;
  }
}

export function slotIdFor(gameMode: string, saveName: string): string {
  return `${gameMode}/${saveName}`;
}

/**
 * Every save under the given game modes (all modes when empty), newest first.
 * A missing save root yields no slots.
 */
export async function discoverSaveSlots(
  saveRoot: string,
  gameModes: string[] = [],
): Promise<SaveSlot[]> {
  const modes =
    gameModes.length > 0
      ? gameModes
      : (await listDirectories(saveRoot)).map((entry) => entry.name);

  const slots: SaveSlot[] = [];

  for (const gameMode of modes) {
    const modeDir = path.join(saveRoot, gameMode);

    for (const entry of await listDirectories(modeDir)) {
      const savePath = path.join(modeDir, entry.name);
      try {
        const stat = await fs.promises.stat(savePath);
        slots.push({
          id: slotIdFor(gameMode, entry.name),
          name: entry.name,
          gameMode,
          path: savePath,
          lastModified: stat.mtimeMs,
        });
      } catch (error) {
        logger.warn(`Skipping unreadable save ${savePath}: ${errorMessage(error)}`);
      }
    }
  }

  slots.sort((a, b) => b.lastModified - a.lastModified || a.id.localeCompare(b.id));
  logger.debug(`Discovered ${slots.length} save(s) under ${saveRoot}`);
  return slots;
}

/**
 * Slot for `<mode>/<save>` whether or not it is on disk; null for a malformed id.
 */
export function slotFromId(saveRoot: string, slotId: string): SaveSlot | null {
  const [gameMode, saveName, ...rest] = slotId.split("/");
  if (!gameMode || !saveName || rest.length > 0) return null;
  if (gameMode === ".." || saveName === ".." || gameMode === "." || saveName === ".") return null;

  return {
    id: slotId,
    name: saveName,
    gameMode,
    path: path.join(saveRoot, gameMode, saveName),
    lastModified: 0,
  };
}

/**
 * Resolve a slot from `<mode>/<save>`; null when it is not on disk.
 */
export async function findSaveSlot(
  saveRoot: string,
  slotId: string,
): Promise<SaveSlot | null> {
  const slot = slotFromId(saveRoot, slotId);
  if (!slot) return null;

  try {
    const stat = await fs.promises.stat(slot.path);
    if (!stat.isDirectory()) return null;
    return { ...slot, lastModified: stat.mtimeMs };
  } catch {
    return null;
  }
}
