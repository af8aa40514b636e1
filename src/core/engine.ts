/**
 * Backup engine
 *
 * Wires configuration, save discovery, the catalog, the snapshot store, the
 * scheduler, the restore operator and the usage probe into one object.
 */

import { type Catalog, closeCatalog, openCatalog } from "../db";
import type {
  BackupJob,
  QuotaWriter,
  RestoreMode,
  SaveguardConfig,
  SaveSlot,
  Snapshot,
  SnapshotOrder,
} from "../types";
import { createLogger } from "../utils/logger";
import { ensureLocalDir } from "../storage/local";
import { NotFoundError } from "./errors";
import { EngineEvents } from "./events";
import { RestoreOperator, type RestoreResult } from "./restore/operator";
import { resolveRetentionPolicy } from "./retention/policy";
import { discoverSaveSlots, slotFromId } from "./saves/discovery";
import { Scheduler, type SchedulerStatus, type TriggerOptions } from "./scheduler/scheduler";
import {
  type CreateSnapshotResult,
  type PruneResult,
  type ReconcileResult,
  SnapshotStore,
} from "./snapshots/store";
import { DiskUsageProbe, type ProbeRequest } from "./usage/probe";

const log = createLogger("engine");

export interface EngineOptions {
  /** Persists quota edits made through updateSaveQuota */
  quotaWriter?: QuotaWriter;
  /** Use an already open catalog instead of opening config.database.path */
  catalog?: Catalog;
  events?: EngineEvents;
  pollMs?: number;
}

export class BackupEngine {
  readonly events: EngineEvents;
  readonly store: SnapshotStore;
  readonly scheduler: Scheduler;
  readonly restorer: RestoreOperator;
  readonly probe: DiskUsageProbe;

  private config: SaveguardConfig;
  private closed = false;
  private restores = new Set<Promise<RestoreResult>>();

  private constructor(
    config: SaveguardConfig,
    slots: SaveSlot[],
    private readonly catalog: Catalog,
    private readonly options: EngineOptions,
  ) {
    this.config = config;
    const events = options.events ?? new EngineEvents();
    this.events = events;

    this.probe = new DiskUsageProbe((path, bytes) => {
      events.emit({ type: "usage", path, bytes });
    });

    this.store = new SnapshotStore({
      catalog,
      backupRootPath: config.backupRootPath,
      policyFor: (slotId) => resolveRetentionPolicy(slotId, this.config),
      compressionLevel: () => this.config.archive.compression,
      onMutation: (slotId) => {
        this.probe.estimateSize(this.store.slotDir(slotId));
      },
    });

    this.scheduler = new Scheduler(slots, {
      intervalSeconds: config.saveIntervalSeconds,
      paused: config.scheduler.paused,
      backupOnStart: config.scheduler.backupOnStart,
      pollMs: options.pollMs,
      events,
      discover: () => discoverSaveSlots(this.config.saveRootPath, this.config.gameModes),
      runBackup: async (slot, request) => {
        const result = await this.backupSlot(slot, { force: request.force });
        return result.status === "created"
          ? { outcome: "created", snapshotId: result.snapshot.id }
          : { outcome: "unchanged", snapshotId: null };
      },
    });

    this.restorer = new RestoreOperator({
      store: this.store,
      gate: this.scheduler,
      events,
      mode: () => this.config.restore.mode,
    });
  }

  /**
   * Open the catalog, discover saves and reconcile every known slot with its
   * backup directory. The scheduler is not started.
   */
  static async create(config: SaveguardConfig, options: EngineOptions = {}): Promise<BackupEngine> {
    await ensureLocalDir(config.backupRootPath);
    const catalog = options.catalog ?? (await openCatalog(config.database.path));
    const slots = await discoverSaveSlots(config.saveRootPath, config.gameModes);
    const engine = new BackupEngine(config, slots, catalog, options);

    for (const slot of slots) {
      await engine.store.reconcile(slot.id);
    }

    log.info(`Engine ready: ${slots.length} save(s) under ${config.saveRootPath}`);
    return engine;
  }

  getConfig(): SaveguardConfig {
    return this.config;
  }

  start(): void {
    this.scheduler.start();
  }

  /**
   * Stop scheduling, wait for running backups and restores, then close the
   * catalog.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.scheduler.stop();
    await this.scheduler.drain();
    // Restores still in pre-flight have not reached the slot gate yet
    await Promise.allSettled(this.restores);
    this.probe.cancelAll();
    this.closed = true;
    if (!this.options.catalog) {
      closeCatalog(this.catalog);
    }
    log.info("Engine stopped");
  }

  /**
   * Hot-reload settings. Interval, pause flag, retention, compression, restore
   * mode and game modes apply at once; root and catalog paths need a restart.
   * The save root is rescanned on every reload.
   */
  async applyConfig(next: SaveguardConfig): Promise<void> {
    const previous = this.config;

    if (
      next.saveRootPath !== previous.saveRootPath ||
      next.backupRootPath !== previous.backupRootPath ||
      next.database.path !== previous.database.path
    ) {
      log.warn("Save root, backup root and catalog path changes take effect after a restart");
      next = {
        ...next,
        saveRootPath: previous.saveRootPath,
        backupRootPath: previous.backupRootPath,
        database: previous.database,
      };
    }

    this.config = next;
    this.scheduler.setIntervalSeconds(next.saveIntervalSeconds);
    this.scheduler.setPaused(next.scheduler.paused);

    const slots = await this.scheduler.rescan();

    log.info(`Configuration reloaded: ${slots.length} save(s)`);
  }

  /**
   * Set a per-save quota: persist it through the quota writer, apply it to the
   * live configuration, then prune the slot against it.
   */
  async updateSaveQuota(slotId: string, quotaBytes: number): Promise<PruneResult> {
    if (!Number.isInteger(quotaBytes) || quotaBytes < 0) {
      throw new RangeError(`Quota must be a non-negative integer, got ${quotaBytes}`);
    }

    await this.options.quotaWriter?.updateSaveQuota(slotId, quotaBytes);
    this.config = {
      ...this.config,
      saveQuotas: { ...this.config.saveQuotas, [slotId]: quotaBytes },
    };

    return this.store.prune(slotId);
  }

  listSlots(): SaveSlot[] {
    return this.scheduler.getSlots();
  }

  rescan(): Promise<SaveSlot[]> {
    return this.scheduler.rescan();
  }

  /**
   * Known slot, or one built from its id for saves no longer on disk.
   */
  resolveSlot(slotId: string): SaveSlot {
    const slot = this.scheduler.getSlot(slotId) ?? slotFromId(this.config.saveRootPath, slotId);
    if (!slot) {
      throw new NotFoundError(`Invalid save id "${slotId}", expected <gameMode>/<saveName>`);
    }
    return slot;
  }

  /**
   * Snapshot one slot right now, outside the scheduler's admission rules.
   */
  backupSlot(slot: SaveSlot, options: { force?: boolean } = {}): Promise<CreateSnapshotResult> {
    return this.store.createSnapshot(slot, {
      compress: this.config.compressFolders,
      force: options.force,
    });
  }

  triggerBackup(slotId: string, options: TriggerOptions = {}): Promise<BackupJob> {
    return this.scheduler.triggerBackup(slotId, options);
  }

  async restore(slotId: string, snapshotId: string, mode?: RestoreMode): Promise<RestoreResult> {
    const run = this.restorer.restore(this.resolveSlot(slotId), snapshotId, { mode });
    this.restores.add(run);
    try {
      return await run;
    } finally {
      this.restores.delete(run);
    }
  }

  listSnapshots(slotId: string, order: SnapshotOrder = "newest"): Snapshot[] {
    return this.store.listSnapshots(slotId, order);
  }

  deleteSnapshot(slotId: string, snapshotId: string): Promise<Snapshot> {
    return this.store.deleteSnapshot(slotId, snapshotId);
  }

  prune(slotId: string): Promise<PruneResult> {
    return this.store.prune(slotId);
  }

  reconcile(slotId: string): Promise<ReconcileResult> {
    return this.store.reconcile(slotId);
  }

  estimateSize(path: string): ProbeRequest {
    return this.probe.estimateSize(path);
  }

  getStatus(): SchedulerStatus {
    return this.scheduler.getStatus();
  }
}
