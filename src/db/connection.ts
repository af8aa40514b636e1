/**
 * Catalog connection management
 */

import { copyFile, mkdir, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { errorMessage } from "../core/errors";
import { logger } from "../utils/logger";
import {
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

export type Catalog = Database.Database;

export const IN_MEMORY = ":memory:";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function discardBackup(backupPath: string): Promise<void> {
  try {
    await unlink(backupPath);
  } catch (err) {
    logger.warn(`Could not remove ${backupPath}: ${errorMessage(err)}`);
  }
}

/**
 * Open (creating if needed) the snapshot catalog and bring its schema up to date.
 * An existing file is copied aside before migrating and restored if a migration fails.
 */
export async function openCatalog(dbPath: string): Promise<Catalog> {
  if (dbPath === IN_MEMORY) {
    const db = new Database(IN_MEMORY);
    initializeDatabase(db);
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (await fileExists(dbPath)) {
    const probe = new Database(dbPath, { readonly: true });
    const pending = getPendingMigrations(getCurrentVersion(probe));
    probe.close();

    if (pending.length > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      logger.info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      let db: Catalog | null = null;
      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        logger.info(`Migrations completed (now at v${getLatestVersion()})`);
      } catch (err) {
        logger.error(`Migration failed: ${errorMessage(err)}`);
        logger.info("Rolling back catalog from backup...");
        db?.close();
        await copyFile(backupPath, dbPath);
        await discardBackup(backupPath);
        throw new Error(`Catalog migration failed and was rolled back: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      await discardBackup(backupPath);
      return db;
    }
  }

  const db = new Database(dbPath);
  initializeDatabase(db);
  return db;
}

export function closeCatalog(db: Catalog): void {
  if (db.open) {
    db.close();
  }
}
