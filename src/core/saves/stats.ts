/**
 * Save metadata read from the game's own files
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import type { SaveSlot, SaveStats } from "../../types";
import { logger } from "../../utils/logger";
import { errorMessage } from "../errors";
import { parsePlayerData, type PlayerValue, professionOf, traitsOf } from "./player-data";

export const PLAYERS_DB = "players.db";
export const THUMBNAIL_FILE = "thumb.png";

const UNKNOWN_STATS: SaveStats = {
  characterName: "Unknown",
  hoursSurvived: 0,
  zombiesKilled: 0,
  profession: null,
  traits: [],
};

interface SurvivorRow {
  hours: number | null;
  zombiekills: number | null;
}

interface LocalPlayerRow {
  name: string | null;
  data: Buffer | null;
}

/**
 * Character name, profession, traits, hours survived and zombie kills from
 * `players.db`, opened read-only. Each table is optional; missing or
 * unreadable databases give the defaults.
 */
export function readSaveStats(slot: SaveSlot): SaveStats {
  const dbPath = path.join(slot.path, PLAYERS_DB);
  if (!fs.existsSync(dbPath)) {
    return { ...UNKNOWN_STATS, traits: [] };
  }

  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
    const player = firstRow<LocalPlayerRow>(db, "SELECT name, data FROM localPlayers LIMIT 1");
    const survivor = firstRow<SurvivorRow>(db, "SELECT hours, zombiekills FROM survivors LIMIT 1");
    const fields = player?.data ? parsePlayerData(player.data) : new Map<string, PlayerValue>();

    return {
      characterName: player?.name || UNKNOWN_STATS.characterName,
      hoursSurvived: survivor?.hours ?? 0,
      zombiesKilled: survivor?.zombiekills ?? 0,
      profession: professionOf(fields),
      traits: traitsOf(fields),
    };
  } catch (error) {
    logger.debug(`Could not read stats from ${dbPath}: ${errorMessage(error)}`);
    return { ...UNKNOWN_STATS, traits: [] };
  } finally {
    db?.close();
  }
}

function firstRow<T>(db: Database.Database, sql: string): T | undefined {
  try {
    return db.prepare<[], T>(sql).get();
  } catch (error) {
    logger.debug(`Skipping "${sql}": ${errorMessage(error)}`);
    return undefined;
  }
}

export function thumbnailPath(slot: SaveSlot): string | null {
  const candidate = path.join(slot.path, THUMBNAIL_FILE);
  return fs.existsSync(candidate) ? candidate : null;
}
