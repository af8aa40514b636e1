/**
 * Preferences file: settings edited at runtime and kept between sessions
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, isErrnoError } from "../core/errors";
import type { Preferences, QuotaWriter } from "../types";
import { logger } from "../utils/logger";
import { isRecord } from "./defaults";

export function emptyPreferences(): Preferences {
  return { saveQuotas: {} };
}

function parsePreferences(raw: unknown): Preferences | null {
  if (!isRecord(raw)) return null;

  const prefs = emptyPreferences();

  if (raw.saveQuotas !== undefined) {
    if (!isRecord(raw.saveQuotas)) return null;
    for (const [slotId, quota] of Object.entries(raw.saveQuotas)) {
      if (typeof quota !== "number" || !Number.isInteger(quota) || quota < 0) return null;
      prefs.saveQuotas[slotId] = quota;
    }
  }

  if (typeof raw.saveIntervalSeconds === "number") prefs.saveIntervalSeconds = raw.saveIntervalSeconds;
  if (typeof raw.keepLastNSaves === "number") prefs.keepLastNSaves = raw.keepLastNSaves;
  if (typeof raw.compressFolders === "boolean") prefs.compressFolders = raw.compressFolders;

  return prefs;
}

/**
 * Read the preferences file. A missing file gives empty preferences; an
 * unreadable one is moved aside to `<file>.corrupt` and also gives empty ones.
 */
export async function loadPreferences(filePath: string): Promise<Preferences> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoError(error, "ENOENT")) return emptyPreferences();
    throw error;
  }

  let parsed: Preferences | null = null;
  try {
    parsed = parsePreferences(JSON.parse(content));
  } catch {
    parsed = null;
  }

  if (parsed) return parsed;

  const corruptPath = `${filePath}.corrupt`;
  logger.warn(`Preferences file ${filePath} is invalid, moving it to ${corruptPath}`);
  try {
    await fs.rename(filePath, corruptPath);
  } catch (error) {
    logger.warn(`Could not move ${filePath} aside: ${errorMessage(error)}`);
  }
  return emptyPreferences();
}

/**
 * Write atomically: temp file in the same directory, then rename.
 */
export async function savePreferences(filePath: string, prefs: Preferences): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(prefs, null, 2)}\n`, "utf-8");
  await fs.rename(tempPath, filePath);
}

/**
 * Config layer from preferences: only the fields it actually holds.
 */
export function preferencesLayer(prefs: Preferences): Record<string, unknown> {
  const layer: Record<string, unknown> = { saveQuotas: { ...prefs.saveQuotas } };
  if (prefs.saveIntervalSeconds !== undefined) layer.saveIntervalSeconds = prefs.saveIntervalSeconds;
  if (prefs.keepLastNSaves !== undefined) layer.keepLastNSaves = prefs.keepLastNSaves;
  if (prefs.compressFolders !== undefined) layer.compressFolders = prefs.compressFolders;
  return layer;
}

/**
 * QuotaWriter that persists quota edits to the preferences file.
 * Writes are serialized so concurrent edits never lose one another.
 */
export class PreferencesFile implements QuotaWriter {
  private pending: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  load(): Promise<Preferences> {
    return loadPreferences(this.filePath);
  }

  updateSaveQuota(slotId: string, quotaBytes: number): Promise<void> {
    return this.update((prefs) => {
      prefs.saveQuotas[slotId] = quotaBytes;
    });
  }

  clearSaveQuota(slotId: string): Promise<void> {
    return this.update((prefs) => {
      delete prefs.saveQuotas[slotId];
    });
  }

  private update(mutate: (prefs: Preferences) => void): Promise<void> {
    const next = this.pending.then(async () => {
      const prefs = await this.load();
      mutate(prefs);
      await savePreferences(this.filePath, prefs);
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.pending = next.catch((error: unknown) => {
      logger.debug(`Preferences write failed: ${errorMessage(error)}`);
    });
    return next;
  }
}
