/**
 * Configuration validation
 */

import type { SaveguardConfig } from "../types";
import { isRecord, MIN_INTERVAL_SECONDS } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function requireSection(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = c[name];
  if (!isRecord(section)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return section;
}

function requirePath(value: unknown, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${field} must be a non-empty path`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  paths: (c) => {
    requirePath(c.saveRootPath, "saveRootPath");
    requirePath(c.backupRootPath, "backupRootPath");
    requirePath(c.preferencesPath, "preferencesPath");
  },

  interval: (c) => {
    const interval = c.saveIntervalSeconds;
    if (!isNonNegativeInteger(interval) || interval < MIN_INTERVAL_SECONDS) {
      throw new ConfigError(
        `saveIntervalSeconds must be an integer of at least ${MIN_INTERVAL_SECONDS}`,
      );
    }
  },

  compressFolders: (c) => {
    if (typeof c.compressFolders !== "boolean") {
      throw new ConfigError("compressFolders must be a boolean");
    }
  },

  retention: (c) => {
    if (!isNonNegativeInteger(c.keepLastNSaves)) {
      throw new ConfigError("keepLastNSaves must be a non-negative integer (0 = unlimited)");
    }
    if (!isNonNegativeInteger(c.defaultQuotaBytes)) {
      throw new ConfigError("defaultQuotaBytes must be a non-negative integer (0 = unlimited)");
    }
    if (!isRecord(c.saveQuotas)) {
      throw new ConfigError("saveQuotas must map save ids to byte counts");
    }
    for (const [slotId, quota] of Object.entries(c.saveQuotas)) {
      if (!isNonNegativeInteger(quota)) {
        throw new ConfigError(`saveQuotas.${slotId} must be a non-negative integer`);
      }
    }
  },

  gameModes: (c) => {
    const modes = c.gameModes;
    if (!Array.isArray(modes) || !modes.every((mode) => typeof mode === "string" && mode !== "")) {
      throw new ConfigError("gameModes must be an array of directory names");
    }
  },

  database: (c) => {
    const db = requireSection(c, "database");
    if (!db.path || typeof db.path !== "string") {
      throw new ConfigError("database.path must be a string");
    }
  },

  archive: (c) => {
    const archive = requireSection(c, "archive");
    const level = archive.compression;
    if (!isNonNegativeInteger(level) || level > 9) {
      throw new ConfigError("archive.compression must be an integer between 0 and 9");
    }
  },

  restore: (c) => {
    const restore = requireSection(c, "restore");
    if (restore.mode !== "replace" && restore.mode !== "overlay") {
      throw new ConfigError("restore.mode must be 'replace' or 'overlay'");
    }
  },

  scheduler: (c) => {
    const scheduler = requireSection(c, "scheduler");
    if (typeof scheduler.paused !== "boolean") {
      throw new ConfigError("scheduler.paused must be a boolean");
    }
    if (typeof scheduler.backupOnStart !== "boolean") {
      throw new ConfigError("scheduler.backupOnStart must be a boolean");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is SaveguardConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
