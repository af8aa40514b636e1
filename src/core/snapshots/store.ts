/**
 * Snapshot store
 *
 * Owns the per-slot snapshot set: one archive per snapshot under
 * `<backupRoot>/<slotId>/`, one catalog row per archive. Every change to a
 * slot's set runs inside that slot's exclusive section.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  type Catalog,
  getActiveSnapshotsBySlot,
  getAllActiveSnapshots,
  getDeletionLogs,
  getMaxSequence,
  getSnapshotById,
  insertSnapshot,
  logDeletion,
  markSnapshotDeleted,
  toSnapshot,
} from "../../db";
import { deleteFromLocal, localFileExists, removeQuietly } from "../../storage/local";
import type {
  DeletionLogRecord,
  DeletionReason,
  RetentionPolicy,
  SaveSlot,
  Snapshot,
  SnapshotOrder,
} from "../../types";
import { generateUUID } from "../../utils/crypto";
import { formatBytes } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { generateArchiveName, parseArchiveName, previewNameFor } from "../../utils/naming";
import { slotBackupDir } from "../../utils/path";
import { countArchiveEntries, DEFAULT_COMPRESSION_LEVEL, writeArchive } from "../archive/archive-creator";
import { collectFiles, type TreeScan } from "../archive/file-collector";
import { errorMessage, InUseError, IOError, isErrnoError, NotFoundError } from "../errors";
import { type RetentionCandidate, selectForDeletion } from "../retention/policy";
import { KeyedMutex, type Release } from "../scheduler/slot-mutex";

const log = createLogger("store");

const PARTIAL_SUFFIX = ".partial";

export interface SnapshotStoreOptions {
  catalog: Catalog;
  backupRootPath: string;
  /** Read on every prune pass so quota edits apply immediately */
  policyFor: (slotId: string) => RetentionPolicy;
  compressionLevel?: () => number;
  /** File name of the preview image inside a save; null disables previews */
  previewFile?: string | null;
  /** Called after a slot's snapshot set changed */
  onMutation?: (slotId: string) => void;
  now?: () => number;
}

export interface CreateSnapshotOptions {
  compress: boolean;
  /** Write a snapshot even if the save has not changed */
  force?: boolean;
}

export interface PruneDeletion {
  snapshot: Snapshot;
  reason: DeletionReason;
  success: boolean;
  error?: string;
}

export interface PruneResult {
  slotId: string;
  checked: number;
  deleted: PruneDeletion[];
  failed: PruneDeletion[];
}

export type CreateSnapshotResult =
  | { status: "created"; snapshot: Snapshot; pruned: PruneResult }
  | { status: "unchanged"; lastSnapshot: Snapshot };

export interface ReconcileResult {
  slotId: string;
  missing: Snapshot[];
  adopted: Snapshot[];
  removedPartials: string[];
}

export class SnapshotStore {
  private readonly catalog: Catalog;
  private readonly sections = new KeyedMutex();
  private readonly pins = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly options: SnapshotStoreOptions) {
    this.catalog = options.catalog;
    this.now = options.now ?? Date.now;
  }

  get backupRootPath(): string {
    return this.options.backupRootPath;
  }

  slotDir(slotId: string): string {
    return slotBackupDir(this.options.backupRootPath, slotId);
  }

  async createSnapshot(
    slot: SaveSlot,
    options: CreateSnapshotOptions,
  ): Promise<CreateSnapshotResult> {
    return this.sections.runExclusive(slot.id, async () => {
      const scan = await this.scanSave(slot);
      const sourceModifiedAt = Math.floor(scan.newestMtimeMs);
      const latest = this.latestRecord(slot.id);

      if (!options.force && latest && latest.sourceModifiedAt === sourceModifiedAt) {
        log.info(`No changes in ${slot.id} since ${latest.archiveName}, skipping`);
        return { status: "unchanged", lastSnapshot: latest };
      }

      // Never older than the newest archive, so file names stay in order
      const createdAt = Math.max(this.now(), latest?.createdAt ?? 0);
      const sequence = getMaxSequence(this.catalog, slot.id) + 1;
      const archiveName = generateArchiveName(createdAt, sequence, options.compress);
      const archivePath = path.join(this.slotDir(slot.id), archiveName);

      const written = await writeArchive(slot.path, archivePath, {
        compress: options.compress,
        compressionLevel: this.options.compressionLevel?.() ?? DEFAULT_COMPRESSION_LEVEL,
        previewFile: this.options.previewFile,
        scan,
      });

      const record = insertSnapshot(this.catalog, {
        snapshot_id: generateUUID(),
        slot_id: slot.id,
        archive_name: archiveName,
        archive_path: archivePath,
        size_bytes: written.sizeBytes,
        compressed: options.compress,
        files_count: written.filesCount,
        created_at: createdAt,
        sequence,
        source_modified_at: sourceModifiedAt,
        preview_path: written.previewPath,
      });
      const snapshot = toSnapshot(record);

      log.info(`Snapshot created for ${slot.id}: ${archiveName} (${formatBytes(snapshot.sizeBytes)})`);

      const pruned = await this.pruneLocked(slot.id);
      this.notify(slot.id);

      return { status: "created", snapshot, pruned };
    });
  }

  listSnapshots(slotId: string, order: SnapshotOrder = "newest"): Snapshot[] {
    const oldestFirst = getActiveSnapshotsBySlot(this.catalog, slotId).map(toSnapshot);
    return order === "oldest" ? oldestFirst : oldestFirst.reverse();
  }

  /**
   * Active snapshots of every slot, grouped by slot id, newest first within a slot.
   */
  listAll(): Map<string, Snapshot[]> {
    const bySlot = new Map<string, Snapshot[]>();
    for (const record of getAllActiveSnapshots(this.catalog)) {
      const list = bySlot.get(record.slot_id) ?? [];
      list.unshift(toSnapshot(record));
      bySlot.set(record.slot_id, list);
    }
    return bySlot;
  }

  getSnapshot(slotId: string, snapshotId: string): Snapshot | null {
    const record = getSnapshotById(this.catalog, snapshotId);
    if (!record || record.slot_id !== slotId || record.status !== "active") return null;
    return toSnapshot(record);
  }

  totalBytes(slotId: string): number {
    return this.listSnapshots(slotId).reduce((sum, s) => sum + s.sizeBytes, 0);
  }

  isPinned(snapshotId: string): boolean {
    return (this.pins.get(snapshotId) ?? 0) > 0;
  }

  /**
   * Hold a snapshot so neither retention nor a manual delete removes it.
   * The returned function releases the hold.
   */
  async pin(slotId: string, snapshotId: string): Promise<Release> {
    return this.sections.runExclusive(slotId, async () => {
      if (!this.getSnapshot(slotId, snapshotId)) {
        throw new NotFoundError(`Snapshot ${snapshotId} not found for ${slotId}`);
      }

      this.pins.set(snapshotId, (this.pins.get(snapshotId) ?? 0) + 1);
      let released = false;

      return () => {
        if (released) return;
        released = true;
        const remaining = (this.pins.get(snapshotId) ?? 1) - 1;
        if (remaining > 0) {
          this.pins.set(snapshotId, remaining);
        } else {
          this.pins.delete(snapshotId);
        }
      };
    });
  }

  async deleteSnapshot(slotId: string, snapshotId: string): Promise<Snapshot> {
    return this.sections.runExclusive(slotId, async () => {
      const snapshot = this.getSnapshot(slotId, snapshotId);
      if (!snapshot) {
        throw new NotFoundError(`Snapshot ${snapshotId} not found for ${slotId}`);
      }
      if (this.isPinned(snapshotId)) {
        throw new InUseError(snapshotId);
      }

      const deletion = await this.removeSnapshot(snapshot, "manual");
      if (!deletion.success) {
        throw new IOError(`Could not delete ${snapshot.archiveName}: ${deletion.error ?? "unknown error"}`);
      }

      log.info(`Deleted ${snapshot.archiveName} from ${slotId}`);
      this.notify(slotId);
      return snapshot;
    });
  }

  async prune(slotId: string): Promise<PruneResult> {
    const result = await this.sections.runExclusive(slotId, () => this.pruneLocked(slotId));
    if (result.deleted.length > 0) this.notify(slotId);
    return result;
  }

  /**
   * Bring the catalog and the slot directory back in line: rows whose archive
   * vanished are marked deleted, well-named archives without a row are adopted
   * and leftover `.partial` files are removed.
   */
  async reconcile(slotId: string): Promise<ReconcileResult> {
    const result = await this.sections.runExclusive(slotId, () => this.reconcileLocked(slotId));
    if (result.missing.length > 0 || result.adopted.length > 0) this.notify(slotId);
    return result;
  }

  deletionLog(slotId?: string, limit = 100): DeletionLogRecord[] {
    return getDeletionLogs(this.catalog, limit, slotId);
  }

  private latestRecord(slotId: string): Snapshot | null {
    return this.listSnapshots(slotId, "newest")[0] ?? null;
  }

  private async scanSave(slot: SaveSlot): Promise<TreeScan> {
    try {
      return await collectFiles(slot.path);
    } catch (error) {
      if (isErrnoError(error, "ENOENT")) {
        throw new NotFoundError(`Save directory not found: ${slot.path}`);
      }
      throw new IOError(`Cannot read ${slot.path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async pruneLocked(slotId: string): Promise<PruneResult> {
    const snapshots = this.listSnapshots(slotId, "oldest");
    const policy = this.options.policyFor(slotId);
    const pinned = new Set(snapshots.filter((s) => this.isPinned(s.id)).map((s) => s.id));
    const candidates = selectForDeletion(snapshots, policy, { pinned });

    const result: PruneResult = { slotId, checked: snapshots.length, deleted: [], failed: [] };

    if (candidates.length > 0) {
      log.info(
        `Retention for ${slotId} (keep ${policy.keepLastN || "all"}, quota ${
          policy.quotaBytes ? formatBytes(policy.quotaBytes) : "none"
        }): ${candidates.length} of ${snapshots.length} to delete`,
      );
    }

    for (const candidate of candidates) {
      const deletion = await this.removeCandidate(candidate);
      (deletion.success ? result.deleted : result.failed).push(deletion);
    }

    return result;
  }

  private async removeCandidate({ snapshot, reason }: RetentionCandidate): Promise<PruneDeletion> {
    if (this.isPinned(snapshot.id)) {
      return { snapshot, reason, success: false, error: "in use by a restore" };
    }
    return this.removeSnapshot(snapshot, reason);
  }

  private async removeSnapshot(snapshot: Snapshot, reason: DeletionReason): Promise<PruneDeletion> {
    try {
      await deleteFromLocal(snapshot.archivePath);
      if (snapshot.previewPath) {
        await deleteFromLocal(snapshot.previewPath);
      }
      markSnapshotDeleted(this.catalog, snapshot.id);
      this.recordDeletion(snapshot, reason, null);
      log.debug(`Removed ${snapshot.archiveName} (${reason})`);
      return { snapshot, reason, success: true };
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Failed to delete ${snapshot.archiveName}: ${message}`);
      this.recordDeletion(snapshot, reason, message);
      return { snapshot, reason, success: false, error: message };
    }
  }

  private recordDeletion(snapshot: Snapshot, reason: DeletionReason, failure: string | null): void {
    logDeletion(this.catalog, {
      snapshot_id: snapshot.id,
      slot_id: snapshot.slotId,
      archive_path: snapshot.archivePath,
      reason,
      success: failure === null,
      error_message: failure,
    });
  }

  private async reconcileLocked(slotId: string): Promise<ReconcileResult> {
    const result: ReconcileResult = { slotId, missing: [], adopted: [], removedPartials: [] };
    const known = new Set<string>();

    for (const snapshot of this.listSnapshots(slotId, "oldest")) {
      if (await localFileExists(snapshot.archivePath)) {
        known.add(snapshot.archiveName);
        continue;
      }
      markSnapshotDeleted(this.catalog, snapshot.id);
      this.recordDeletion(snapshot, "missing", null);
      result.missing.push(snapshot);
      log.warn(`Archive missing for ${slotId}: ${snapshot.archiveName}`);
    }

    const dir = this.slotDir(slotId);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoError(error, "ENOENT") || isErrnoError(error, "ENOTDIR")) return result;
      throw new IOError(`Cannot read ${dir}: ${errorMessage(error)}`, { cause: error });
    }

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const filePath = path.join(dir, entry.name);

      if (entry.name.startsWith(".") && entry.name.includes(PARTIAL_SUFFIX)) {
        await removeQuietly(filePath);
        result.removedPartials.push(filePath);
        continue;
      }

      if (known.has(entry.name)) continue;
      const adopted = await this.adopt(slotId, filePath, entry.name);
      if (adopted) result.adopted.push(adopted);
    }

    return result;
  }

  private async adopt(slotId: string, archivePath: string, archiveName: string): Promise<Snapshot | null> {
    const parsed = parseArchiveName(archiveName);
    if (!parsed) return null;

    let filesCount: number;
    let sizeBytes: number;
    try {
      filesCount = await countArchiveEntries(archivePath);
      sizeBytes = (await fs.promises.stat(archivePath)).size;
    } catch (error) {
      log.warn(`Not adopting unreadable archive ${archivePath}: ${errorMessage(error)}`);
      return null;
    }

    const previewPath = path.join(path.dirname(archivePath), previewNameFor(archiveName));
    const record = insertSnapshot(this.catalog, {
      snapshot_id: generateUUID(),
      slot_id: slotId,
      archive_name: archiveName,
      archive_path: archivePath,
      size_bytes: sizeBytes,
      compressed: parsed.compressed,
      files_count: filesCount,
      created_at: parsed.createdAt,
      sequence: parsed.sequence,
      source_modified_at: null,
      preview_path: (await localFileExists(previewPath)) ? previewPath : null,
    });

    log.info(`Adopted ${archiveName} into ${slotId}`);
    return toSnapshot(record);
  }

  private notify(slotId: string): void {
    this.options.onMutation?.(slotId);
  }
}
