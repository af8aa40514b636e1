import type BetterSqlite3 from "better-sqlite3";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

export function getCurrentVersion(database: BetterSqlite3.Database): number {
  if (!hasVersionTable(database)) return 0;

  const row = database
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

function hasVersionTable(database: BetterSqlite3.Database): boolean {
  const row = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get();
  return row !== undefined;
}

/**
 * Apply pending migrations, each in its own transaction.
 */
export function runMigrations(database: BetterSqlite3.Database): number {
  const pending = getPendingMigrations(getCurrentVersion(database));

  for (const migration of pending) {
    database.transaction(() => {
      database.exec(migration.up);
      // schema_version only exists once the first migration has run
      database
        .prepare<[number]>("INSERT INTO schema_version (version) VALUES (?)")
        .run(migration.version);
    })();
  }

  return pending.length;
}

export function initializeDatabase(database: BetterSqlite3.Database): void {
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  runMigrations(database);
}
