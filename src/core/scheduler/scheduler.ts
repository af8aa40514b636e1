/**
 * Backup scheduler
 *
 * One poll loop drives a due time per save slot. Each slot is either idle or
 * running; a firing that finds the slot busy (or the scheduler paused) is
 * dropped rather than queued, so missed ticks never pile up. When a discover
 * callback is given, the save set is rescanned once per interval.
 */

import type { BackupJob, BackupOutcome, JobKind, SaveSlot, TriggerKind } from "../../types";
import { generateShortId } from "../../utils/crypto";
import { formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { BusyError, errorMessage, NotFoundError, toSaveguardError } from "../errors";
import type { EngineEvents } from "../events";
import { KeyedMutex } from "./slot-mutex";

const log = createLogger("scheduler");

export const DEFAULT_POLL_MS = 1000;

export interface BackupRunResult {
  outcome: BackupOutcome;
  snapshotId: string | null;
}

export interface BackupRequest {
  trigger: TriggerKind;
  /** Back up even when the save has not changed */
  force: boolean;
}

export type BackupRunner = (slot: SaveSlot, request: BackupRequest) => Promise<BackupRunResult>;

export interface TriggerOptions {
  trigger?: TriggerKind;
  force?: boolean;
}

export type SlotRunState = "idle" | "running";

export interface SchedulerOptions {
  intervalSeconds: number;
  runBackup: BackupRunner;
  paused?: boolean;
  /** Make every slot due as soon as the loop starts (default true) */
  backupOnStart?: boolean;
  /** Used by rescan() and the periodic rescan of the running loop */
  discover?: () => Promise<SaveSlot[]>;
  events?: EngineEvents;
  pollMs?: number;
}

interface SlotRecord {
  slot: SaveSlot;
  state: SlotRunState;
  activeJob: JobKind | null;
  nextDueAt: number;
  lastJob: BackupJob | null;
}

export interface SlotStatus {
  slotId: string;
  name: string;
  state: SlotRunState;
  activeJob: JobKind | null;
  /** A restore is waiting for the running job to finish */
  restorePending: boolean;
  nextDueAt: number;
  lastJob: BackupJob | null;
}

export interface SchedulerStatus {
  running: boolean;
  paused: boolean;
  intervalSeconds: number;
  slots: SlotStatus[];
}

export class Scheduler {
  private slots = new Map<string, SlotRecord>();
  private gate = new KeyedMutex();
  // Settles when a backup job or an exclusive section ends
  private inFlight = new Set<Promise<void>>();
  private intervalMs: number;
  private paused: boolean;
  private running = false;
  private nextRescanAt = 0;
  private rescanning = false;
  private checkInterval: NodeJS.Timeout | null = null;

  constructor(
    slots: SaveSlot[],
    private readonly options: SchedulerOptions,
  ) {
    this.intervalMs = toMs(options.intervalSeconds);
    this.paused = options.paused ?? false;

    const firstDue = Date.now() + this.intervalMs;
    for (const slot of slots) {
      this.slots.set(slot.id, newRecord(slot, firstDue));
    }
  }

  start(): void {
    if (this.running) {
      log.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    const now = Date.now();
    const firstDue = (this.options.backupOnStart ?? true) ? now : now + this.intervalMs;
    for (const record of this.slots.values()) {
      record.nextDueAt = firstDue;
    }
    this.nextRescanAt = now + this.intervalMs;

    log.info(
      `Scheduler started: ${this.slots.size} slot(s), every ${this.intervalMs / 1000}s${
        this.paused ? " (paused)" : ""
      }`,
    );

    this.tick();
    this.checkInterval = setInterval(() => {
      this.tick();
    }, this.options.pollMs ?? DEFAULT_POLL_MS);
  }

  /**
   * Stop the loop. Jobs already running finish; use drain() to wait for them.
   */
  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    log.info("Scheduler stopped");
  }

  /**
   * Wait until no backup job or exclusive section (restore, delete) is left.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Manual backup. Admitted while paused; rejected with BusyError when the
   * slot already has a job running or a restore waiting.
   */
  async triggerBackup(slotId: string, options: TriggerOptions = {}): Promise<BackupJob> {
    const record = this.slots.get(slotId);
    if (!record) {
      throw new NotFoundError(`Unknown save slot: ${slotId}`);
    }

    const launched = this.admit(record, {
      trigger: options.trigger ?? "manual",
      force: options.force ?? false,
    });
    if (!launched) {
      throw new BusyError(slotId);
    }
    return launched;
  }

  /**
   * Run `fn` with the slot's gate held, waiting behind any running backup.
   * While it waits or runs, the slot counts as busy.
   */
  runExclusive<T>(slotId: string, kind: JobKind, fn: () => Promise<T>): Promise<T> {
    const run = this.holdGate(slotId, kind, fn);
    this.track(run);
    return run;
  }

  private async holdGate<T>(slotId: string, kind: JobKind, fn: () => Promise<T>): Promise<T> {
    const release = await this.gate.acquire(slotId);
    const record = this.slots.get(slotId);
    if (record) {
      record.state = "running";
      record.activeJob = kind;
    }

    try {
      return await fn();
    } finally {
      if (record) {
        record.state = "idle";
        record.activeJob = null;
      }
      release();
    }
  }

  isBusy(slotId: string): boolean {
    return this.gate.isBusy(slotId);
  }

  setIntervalSeconds(seconds: number): void {
    const nextMs = toMs(seconds);
    if (nextMs === this.intervalMs) return;

    // Re-anchor every due time on its previous firing
    const delta = nextMs - this.intervalMs;
    for (const record of this.slots.values()) {
      record.nextDueAt += delta;
    }

    log.info(`Backup interval changed: ${this.intervalMs / 1000}s -> ${seconds}s`);
    this.intervalMs = nextMs;
  }

  setPaused(paused: boolean): void {
    if (this.paused === paused) return;
    this.paused = paused;
    log.info(paused ? "Interval backups paused" : "Interval backups resumed");
  }

  isPaused(): boolean {
    return this.paused;
  }

  /**
   * Replace the slot set. New slots are scheduled, vanished slots are dropped
   * (a job already running for one still completes).
   */
  syncSlots(slots: SaveSlot[]): void {
    const seen = new Set<string>();
    const now = Date.now();
    const firstDue = this.running && (this.options.backupOnStart ?? true) ? now : now + this.intervalMs;

    for (const slot of slots) {
      seen.add(slot.id);
      const existing = this.slots.get(slot.id);
      if (existing) {
        existing.slot = slot;
        continue;
      }
      this.slots.set(slot.id, newRecord(slot, firstDue));
      log.info(`Watching new save: ${slot.id}`);
    }

    for (const slotId of [...this.slots.keys()]) {
      if (!seen.has(slotId)) {
        this.slots.delete(slotId);
        log.info(`Save no longer present, unscheduled: ${slotId}`);
      }
    }
  }

  async rescan(): Promise<SaveSlot[]> {
    if (!this.options.discover) {
      return this.getSlots();
    }
    const slots = await this.options.discover();
    this.syncSlots(slots);
    return slots;
  }

  getSlots(): SaveSlot[] {
    return [...this.slots.values()].map((record) => record.slot);
  }

  getSlot(slotId: string): SaveSlot | null {
    return this.slots.get(slotId)?.slot ?? null;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      paused: this.paused,
      intervalSeconds: this.intervalMs / 1000,
      slots: [...this.slots.values()].map((record) => ({
        slotId: record.slot.id,
        name: record.slot.name,
        state: record.state,
        activeJob: record.activeJob,
        restorePending: this.gate.waiting(record.slot.id) > 0,
        nextDueAt: record.nextDueAt,
        lastJob: record.lastJob,
      })),
    };
  }

  private tick(): void {
    const now = Date.now();

    if (this.options.discover && !this.rescanning && now >= this.nextRescanAt) {
      this.nextRescanAt = now + this.intervalMs;
      void this.periodicRescan();
    }

    for (const record of this.slots.values()) {
      if (now < record.nextDueAt) {
        continue;
      }

      record.nextDueAt = now + this.intervalMs;

      if (this.paused) {
        log.debug(`Paused, skipping interval backup for ${record.slot.id}`);
        continue;
      }

      if (!this.admit(record, { trigger: "interval", force: false })) {
        log.debug(`${record.slot.id} is busy, dropping interval firing`);
      }
    }
  }

  private async periodicRescan(): Promise<void> {
    this.rescanning = true;
    try {
      await this.rescan();
    } catch (error) {
      log.warn(`Save rescan failed: ${errorMessage(error)}`);
    } finally {
      this.rescanning = false;
    }
  }

  private track(run: Promise<unknown>): void {
    const settled: Promise<void> = run.then(
      () => {
        this.inFlight.delete(settled);
      },
      () => {
        this.inFlight.delete(settled);
      },
    );
    this.inFlight.add(settled);
  }

  /**
   * Start a backup if the slot is idle. Returns the job's completion, or null
   * when the slot was busy.
   */
  private admit(record: SlotRecord, request: BackupRequest): Promise<BackupJob> | null {
    if (record.state !== "idle") return null;

    const release = this.gate.tryAcquire(record.slot.id);
    if (!release) return null;

    const job: BackupJob = {
      id: generateShortId(),
      slotId: record.slot.id,
      trigger: request.trigger,
      status: "queued",
      enqueuedAt: Date.now(),
      startedAt: null,
      finishedAt: null,
      outcome: null,
      snapshotId: null,
      error: null,
    };

    record.state = "running";
    record.activeJob = "backup";

    const run = this.execute(record, job, request).finally(() => {
      record.state = "idle";
      record.activeJob = null;
      record.lastJob = job;
      release();
    });
    this.track(run);
    return run;
  }

  /**
   * Job boundary: every failure ends here as a failed job and an event.
   */
  private async execute(
    record: SlotRecord,
    job: BackupJob,
    request: BackupRequest,
  ): Promise<BackupJob> {
    const { slot } = record;
    const startedAt = Date.now();
    job.status = "running";
    job.startedAt = startedAt;
    log.info(`Backup started for ${slot.id} (${job.trigger})`);

    try {
      const result = await this.options.runBackup(slot, request);
      job.status = "succeeded";
      job.outcome = result.outcome;
      job.snapshotId = result.snapshotId;
    } catch (error) {
      const failure = toSaveguardError(error, `Backup of ${slot.id} failed`);
      job.status = "failed";
      job.error = { kind: failure.kind, message: failure.message };
      log.error(`Backup failed for ${slot.id}: ${failure.message}`);
    }

    const finishedAt = Date.now();
    job.finishedAt = finishedAt;

    if (job.status === "succeeded") {
      log.info(
        `Backup ${job.outcome === "unchanged" ? "skipped (no changes)" : "completed"} for ${
          slot.id
        } in ${formatDuration(finishedAt - startedAt)}`,
      );
    }

    this.options.events?.emit({
      type: "job",
      slotId: slot.id,
      jobKind: "backup",
      trigger: job.trigger,
      status: job.status === "succeeded" ? "succeeded" : "failed",
      startedAt,
      finishedAt,
      outcome: job.outcome ?? undefined,
      snapshotId: job.snapshotId ?? undefined,
      errorKind: job.error?.kind,
      message: job.error?.message,
    });

    return job;
  }
}

function toMs(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new RangeError(`Backup interval must be a positive number of seconds, got ${seconds}`);
  }
  return Math.round(seconds * 1000);
}

function newRecord(slot: SaveSlot, nextDueAt: number): SlotRecord {
  return { slot, state: "idle", activeJob: null, nextDueAt, lastJob: null };
}
