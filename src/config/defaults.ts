/**
 * Default configuration values
 */

export const MIN_INTERVAL_SECONDS = 10;
export const DEFAULT_INTERVAL_SECONDS = 600;
export const DEFAULT_KEEP_LAST_N = 10;
export const DEFAULT_QUOTA_BYTES = 2 * 1024 ** 3;

export const CATALOG_FILE = "catalog.db";
export const PREFERENCES_FILE = "preferences.json";

// saveRootPath, backupRootPath and version have no default; paths derived from
// backupRootPath are filled in by the resolver
export const DEFAULT_CONFIG = {
  saveIntervalSeconds: DEFAULT_INTERVAL_SECONDS,
  compressFolders: true,
  keepLastNSaves: DEFAULT_KEEP_LAST_N,
  defaultQuotaBytes: DEFAULT_QUOTA_BYTES,
  saveQuotas: {},
  gameModes: [],
  archive: {
    compression: 6,
  },
  restore: {
    mode: "replace",
  },
  scheduler: {
    paused: false,
    backupOnStart: true,
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue)) {
      result[key] = deepMerge(isRecord(targetValue) ? targetValue : {}, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Merge layers left to right; later layers win.
 */
export function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  return layers.reduce((merged, layer) => deepMerge(merged, layer), {});
}
