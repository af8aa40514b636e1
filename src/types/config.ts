/**
 * Configuration type definitions for saveguard
 */

export type RestoreMode = "replace" | "overlay";

export interface DatabaseConfig {
  path: string;
}

export interface ArchiveConfig {
  /** zlib level used when compressFolders is on (0-9) */
  compression: number;
}

export interface RestoreConfig {
  mode: RestoreMode;
}

export interface SchedulerConfig {
  /** Suppresses interval-triggered backups; manual triggers still run */
  paused: boolean;
  /** Make every slot due as soon as the scheduler starts */
  backupOnStart: boolean;
}

export interface SaveguardConfig {
  version: string;
  /** Root holding `<gameMode>/<saveName>` directories */
  saveRootPath: string;
  /** Snapshots live under `<backupRootPath>/<slotId>/` */
  backupRootPath: string;
  saveIntervalSeconds: number;
  compressFolders: boolean;
  keepLastNSaves: number;
  defaultQuotaBytes: number;
  /** Per-slot quota overrides in bytes, keyed by slot id */
  saveQuotas: Record<string, number>;
  /** Game mode directories to watch; empty watches all of them */
  gameModes: string[];
  database: DatabaseConfig;
  archive: ArchiveConfig;
  restore: RestoreConfig;
  scheduler: SchedulerConfig;
  preferencesPath: string;
}

/**
 * Settings persisted between sessions by the preferences file.
 */
export interface Preferences {
  saveQuotas: Record<string, number>;
  saveIntervalSeconds?: number;
  keepLastNSaves?: number;
  compressFolders?: boolean;
}

/**
 * Persists an in-session quota edit. The engine holds no persistence of its own.
 */
export interface QuotaWriter {
  updateSaveQuota(slotId: string, quotaBytes: number): Promise<void>;
}
