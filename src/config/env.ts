/**
 * SAVEGUARD_* environment variables
 */

import { parseSize } from "../utils/format";
import { ConfigError } from "./validator";

export const ENV_PREFIX = "SAVEGUARD_";

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

/**
 * Build a config layer from the environment. Unset and empty variables are ignored.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const get = (key: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${key}`];
    return value === undefined || value === "" ? undefined : value;
  };

  const saveRoot = get("SAVE_ROOT");
  if (saveRoot) config.saveRootPath = saveRoot;

  const backupRoot = get("BACKUP_ROOT");
  if (backupRoot) config.backupRootPath = backupRoot;

  const database = get("DATABASE");
  if (database) config.database = { path: database };

  const interval = get("INTERVAL");
  if (interval) config.saveIntervalSeconds = parseInteger(`${ENV_PREFIX}INTERVAL`, interval);

  const keep = get("KEEP");
  if (keep) config.keepLastNSaves = parseInteger(`${ENV_PREFIX}KEEP`, keep);

  const quota = get("QUOTA");
  if (quota) {
    const bytes = parseSize(quota);
    if (bytes === null) {
      throw new ConfigError(`${ENV_PREFIX}QUOTA is not a valid size: "${quota}"`);
    }
    config.defaultQuotaBytes = bytes;
  }

  const compress = get("COMPRESS");
  if (compress) config.compressFolders = parseBoolean(`${ENV_PREFIX}COMPRESS`, compress);

  const gameModes = get("GAME_MODES");
  if (gameModes) {
    config.gameModes = gameModes
      .split(",")
      .map((mode) => mode.trim())
      .filter(Boolean);
  }

  const paused = get("PAUSED");
  if (paused) config.scheduler = { paused: parseBoolean(`${ENV_PREFIX}PAUSED`, paused) };

  const restoreMode = get("RESTORE_MODE");
  if (restoreMode) config.restore = { mode: restoreMode };

  const preferences = get("PREFERENCES");
  if (preferences) config.preferencesPath = preferences;

  return config;
}
