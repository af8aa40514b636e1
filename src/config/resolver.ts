/**
 * Configuration path resolution and derived values
 *
 * Runs on the merged, not yet validated configuration.
 */

import * as path from "node:path";
import { parseSize } from "../utils/format";
import { expandHome } from "../utils/path";
import { CATALOG_FILE, isRecord, PREFERENCES_FILE } from "./defaults";
import { ConfigError } from "./validator";

function resolvePath(value: unknown, baseDir: string): unknown {
  if (typeof value !== "string" || value === "") return value;
  return path.resolve(baseDir, expandHome(value));
}

/**
 * Resolve relative paths against `baseDir` (the config file's directory, or
 * the working directory without one), expanding a leading `~`.
 */
export function resolvePaths(
  config: Record<string, unknown>,
  baseDir: string,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {
    ...config,
    saveRootPath: resolvePath(config.saveRootPath, baseDir),
    backupRootPath: resolvePath(config.backupRootPath, baseDir),
    preferencesPath: resolvePath(config.preferencesPath, baseDir),
  };

  if (isRecord(config.database)) {
    const dbPath = config.database.path;
    resolved.database = {
      ...config.database,
      path: dbPath === ":memory:" ? dbPath : resolvePath(dbPath, baseDir),
    };
  }

  return resolved;
}

/**
 * Fill paths that default to locations under the backup root.
 */
export function applyDerivedDefaults(config: Record<string, unknown>): Record<string, unknown> {
  const backupRoot = config.backupRootPath;
  if (typeof backupRoot !== "string" || backupRoot === "") return config;

  const database = isRecord(config.database) ? config.database : {};

  return {
    ...config,
    database: {
      ...database,
      path: database.path ?? path.join(backupRoot, CATALOG_FILE),
    },
    preferencesPath: config.preferencesPath ?? path.join(backupRoot, PREFERENCES_FILE),
  };
}

function toBytes(value: unknown, field: string): unknown {
  if (typeof value !== "string") return value;
  const bytes = parseSize(value);
  if (bytes === null) {
    throw new ConfigError(`${field} is not a valid size: "${value}"`);
  }
  return bytes;
}

/**
 * Accept sizes such as "500MB" for quota fields.
 */
export function normalizeSizes(config: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {
    ...config,
    defaultQuotaBytes: toBytes(config.defaultQuotaBytes, "defaultQuotaBytes"),
  };

  if (isRecord(config.saveQuotas)) {
    const quotas: Record<string, unknown> = {};
    for (const [slotId, quota] of Object.entries(config.saveQuotas)) {
      quotas[slotId] = toBytes(quota, `saveQuotas.${slotId}`);
    }
    normalized.saveQuotas = quotas;
  }

  return normalized;
}
