/**
 * Restore operator
 *
 * Copies a snapshot back over a save's live directory. The extraction runs
 * through the slot's gate, so it waits for a running backup instead of
 * racing it, and the snapshot is pinned against pruning until it finishes.
 */

import * as path from "node:path";
import { isDirectoryWritable, localFileExists } from "../../storage/local";
import type { JobKind, RestoreJob, RestoreMode, SaveSlot, Snapshot } from "../../types";
import { generateShortId } from "../../utils/crypto";
import { formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { extractArchive } from "../archive/archive-extractor";
import { IOError, NotFoundError, toSaveguardError } from "../errors";
import type { EngineEvents } from "../events";
import type { SnapshotStore } from "../snapshots/store";

const log = createLogger("restore");

/** Per-slot exclusive section shared with the scheduler */
export interface SlotGate {
  runExclusive<T>(slotId: string, kind: JobKind, fn: () => Promise<T>): Promise<T>;
}

export interface RestoreOperatorOptions {
  store: SnapshotStore;
  gate: SlotGate;
  events?: EngineEvents;
  mode?: () => RestoreMode;
}

export interface RestoreOptions {
  mode?: RestoreMode;
}

export interface RestoreResult {
  /** Live directory that now holds the snapshot's contents */
  destination: string;
  snapshot: Snapshot;
  filesCount: number;
  job: RestoreJob;
}

export class RestoreOperator {
  constructor(private readonly options: RestoreOperatorOptions) {}

  /**
   * Restore `snapshotId` into the slot's directory. Failures are reported as a
   * failed restore event and rethrown to the caller.
   */
  async restore(slot: SaveSlot, snapshotId: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    const mode = options.mode ?? this.options.mode?.() ?? "replace";
    const job: RestoreJob = {
      id: generateShortId(),
      slotId: slot.id,
      snapshotId,
      status: "queued",
      enqueuedAt: Date.now(),
      startedAt: null,
      finishedAt: null,
      error: null,
    };

    try {
      const snapshot = await this.preflight(slot, snapshotId);

      const { filesCount } = await this.options.gate.runExclusive(slot.id, "restore", async () => {
        job.status = "running";
        job.startedAt = Date.now();
        log.info(`Restoring ${snapshot.archiveName} into ${slot.path} (${mode})`);

        const unpin = await this.options.store.pin(slot.id, snapshotId);
        try {
          return await extractArchive(snapshot.archivePath, slot.path, { mode });
        } finally {
          unpin();
        }
      });

      job.status = "succeeded";
      job.finishedAt = Date.now();
      log.info(
        `Restored ${slot.id} from ${snapshot.archiveName} (${filesCount} files) in ${formatDuration(
          job.finishedAt - (job.startedAt ?? job.enqueuedAt),
        )}`,
      );
      this.report(job);

      return { destination: path.resolve(slot.path), snapshot, filesCount, job };
    } catch (error) {
      const failure = toSaveguardError(error, `Restore of ${slot.id} failed`);
      job.status = "failed";
      job.finishedAt = Date.now();
      job.error = { kind: failure.kind, message: failure.message };
      log.error(`Restore failed for ${slot.id}: ${failure.message}`);
      this.report(job);
      throw failure;
    }
  }

  private async preflight(slot: SaveSlot, snapshotId: string): Promise<Snapshot> {
    const snapshot = this.options.store.getSnapshot(slot.id, snapshotId);
    if (!snapshot) {
      throw new NotFoundError(`Snapshot ${snapshotId} not found for ${slot.id}`);
    }

    if (!(await localFileExists(snapshot.archivePath))) {
      throw new NotFoundError(`Archive missing on disk: ${snapshot.archivePath}`);
    }

    const parent = path.dirname(path.resolve(slot.path));
    if (!(await isDirectoryWritable(parent))) {
      throw new IOError(`Destination is not writable: ${parent}`);
    }

    return snapshot;
  }

  private report(job: RestoreJob): void {
    this.options.events?.emit({
      type: "job",
      slotId: job.slotId,
      jobKind: "restore",
      status: job.status === "succeeded" ? "succeeded" : "failed",
      startedAt: job.startedAt ?? job.enqueuedAt,
      finishedAt: job.finishedAt ?? Date.now(),
      snapshotId: job.snapshotId,
      errorKind: job.error?.kind,
      message: job.error?.message,
    });
  }
}
