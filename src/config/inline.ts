/**
 * Inline configuration parsing and merging utilities
 */

import { parseSize } from "../utils/format";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory holding `<gameMode>/<saveName>` saves */
  saveRoot?: string;
  /** Directory snapshots are written to */
  backupRoot?: string;
  /** Catalog file path */
  database?: string;
  preferences?: string;

  /** Seconds between interval backups */
  interval?: number;
  /** Snapshots kept per save (0 = unlimited) */
  keep?: number;
  /** Default per-save quota in bytes (0 = unlimited) */
  quota?: number;

  compress?: boolean;
  noCompress?: boolean;
  /** Compression level (0-9) */
  compression?: number;

  /** Game modes to watch (can be repeated) */
  gameMode?: string[];
  restoreMode?: string;
  paused?: boolean;
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.saveRoot) config.saveRootPath = options.saveRoot;
  if (options.backupRoot) config.backupRootPath = options.backupRoot;
  if (options.database) config.database = { path: options.database };
  if (options.preferences) config.preferencesPath = options.preferences;

  if (options.interval !== undefined) config.saveIntervalSeconds = options.interval;
  if (options.keep !== undefined) config.keepLastNSaves = options.keep;
  if (options.quota !== undefined) config.defaultQuotaBytes = options.quota;

  // --no-compress wins over --compress
  if (options.noCompress) {
    config.compressFolders = false;
  } else if (options.compress) {
    config.compressFolders = true;
  }

  if (options.compression !== undefined) {
    config.archive = { compression: options.compression };
  }

  if (options.gameMode && options.gameMode.length > 0) {
    config.gameModes = options.gameMode;
  }

  if (options.restoreMode) config.restore = { mode: options.restoreMode };
  if (options.paused) config.scheduler = { paused: true };

  return config;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "save-root": { type: "string" as const },
  "backup-root": { type: "string" as const },
  database: { type: "string" as const },
  preferences: { type: "string" as const },

  interval: { type: "string" as const },
  keep: { type: "string" as const },
  quota: { type: "string" as const },

  compress: { type: "boolean" as const },
  "no-compress": { type: "boolean" as const, default: false },
  compression: { type: "string" as const },

  "game-mode": { type: "string" as const, multiple: true },
  "restore-mode": { type: "string" as const },
  paused: { type: "boolean" as const },
} as const;

function stringValue(values: Record<string, unknown>, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

function booleanValue(values: Record<string, unknown>, key: string): boolean | undefined {
  const value = values[key];
  return typeof value === "boolean" ? value : undefined;
}

function integerValue(values: Record<string, unknown>, key: string): number | undefined {
  const raw = stringValue(values, key);
  if (raw === undefined) return undefined;

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || String(value) !== raw.trim()) {
    throw new ConfigError(`--${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function sizeValue(values: Record<string, unknown>, key: string): number | undefined {
  const raw = stringValue(values, key);
  if (raw === undefined) return undefined;

  const bytes = parseSize(raw);
  if (bytes === null) {
    throw new ConfigError(`--${key} must be a size such as 500MB, got "${raw}"`);
  }
  return bytes;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  const gameModes = values["game-mode"];

  return {
    saveRoot: stringValue(values, "save-root"),
    backupRoot: stringValue(values, "backup-root"),
    database: stringValue(values, "database"),
    preferences: stringValue(values, "preferences"),

    interval: integerValue(values, "interval"),
    keep: integerValue(values, "keep"),
    quota: sizeValue(values, "quota"),

    compress: booleanValue(values, "compress"),
    noCompress: booleanValue(values, "no-compress"),
    compression: integerValue(values, "compression"),

    gameMode: Array.isArray(gameModes)
      ? gameModes.filter((mode): mode is string => typeof mode === "string")
      : undefined,
    restoreMode: stringValue(values, "restore-mode"),
    paused: booleanValue(values, "paused"),
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.keys(buildInlineConfig(options)).length > 0;
}

/**
 * Without a config file both roots must come from flags or the environment.
 */
export function canRunWithoutConfigFile(layer: Record<string, unknown>): boolean {
  return typeof layer.saveRootPath === "string" && typeof layer.backupRootPath === "string";
}
