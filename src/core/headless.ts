/**
 * Headless backup pass: one backup per discovered save, then exit.
 */

import type { BackupJob, JobError, SaveguardConfig } from "../types";
import { formatDuration } from "../utils/format";
import { createLogger } from "../utils/logger";
import { BackupEngine, type EngineOptions } from "./engine";
import { toSaveguardError } from "./errors";

const log = createLogger("headless");

export type SlotPassStatus = "created" | "unchanged" | "failed";

export interface SlotPassResult {
  slotId: string;
  status: SlotPassStatus;
  snapshotId: string | null;
  error: JobError | null;
}

export interface BackupPassResult {
  /** 1 if any slot failed, else 0 */
  exitCode: number;
  results: SlotPassResult[];
  durationMs: number;
}

export interface BackupPassOptions extends EngineOptions {
  /** Back up saves even when they have not changed */
  force?: boolean;
}

function toPassResult(job: BackupJob): SlotPassResult {
  if (job.status === "succeeded") {
    return {
      slotId: job.slotId,
      status: job.outcome === "unchanged" ? "unchanged" : "created",
      snapshotId: job.snapshotId,
      error: null,
    };
  }
  return {
    slotId: job.slotId,
    status: "failed",
    snapshotId: null,
    error: job.error ?? { kind: "IOError", message: "Backup did not complete" },
  };
}

/**
 * Back up every discovered save once, one at a time. Each save goes through
 * the same job boundary as scheduled backups, so a failure is recorded for
 * that save and the pass moves on.
 */
export async function runBackupPass(
  config: SaveguardConfig,
  options: BackupPassOptions = {},
): Promise<BackupPassResult> {
  const startTime = Date.now();
  const engine = await BackupEngine.create(config, options);
  const results: SlotPassResult[] = [];

  try {
    for (const slot of engine.listSlots()) {
      try {
        const job = await engine.triggerBackup(slot.id, {
          trigger: "interval",
          force: options.force ?? false,
        });
        results.push(toPassResult(job));
      } catch (error) {
        const failure = toSaveguardError(error, `Backup of ${slot.id} failed`);
        results.push({
          slotId: slot.id,
          status: "failed",
          snapshotId: null,
          error: { kind: failure.kind, message: failure.message },
        });
      }
    }
  } finally {
    await engine.shutdown();
  }

  const failed = results.filter((r) => r.status === "failed").length;
  const durationMs = Date.now() - startTime;
  log.info(
    `Backup pass finished in ${formatDuration(durationMs)}: ${results.length} save(s), ${failed} failed`,
  );

  return { exitCode: failed > 0 ? 1 : 0, results, durationMs };
}
