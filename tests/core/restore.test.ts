import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BusyError, NotFoundError } from "../../src/core/errors";
import { EngineEvents } from "../../src/core/events";
import { RestoreOperator } from "../../src/core/restore";
import { Scheduler } from "../../src/core/scheduler";
import { SnapshotStore } from "../../src/core/snapshots";
import { type Catalog, closeCatalog, openCatalog } from "../../src/db";
import type { EngineEvent, SaveSlot, Snapshot } from "../../src/types";
import { makeSlot, makeTempDir, readTree, removeDir, touchTree, writeTree } from "../helpers";

const ORIGINAL = { "main.ttw": "world", "level.xml": "<level/>" };
const MODIFIED = Date.UTC(2026, 9, 19, 11, 0, 0, 0);

describe("RestoreOperator", () => {
  let tempDir: string;
  let slot: SaveSlot;
  let catalog: Catalog;
  let store: SnapshotStore;
  let scheduler: Scheduler;
  let restorer: RestoreOperator;
  let seen: EngineEvent[];
  let backupGate: Promise<void>;
  let snapshot: Snapshot;

  beforeEach(async () => {
    tempDir = await makeTempDir("restore");
    slot = makeSlot(path.join(tempDir, "saves"), "Navezgane", "MySave");
    await writeTree(slot.path, ORIGINAL);
    await touchTree(slot.path, MODIFIED);

    catalog = await openCatalog(":memory:");
    store = new SnapshotStore({
      catalog,
      backupRootPath: path.join(tempDir, "backups"),
      policyFor: () => ({ keepLastN: 0, quotaBytes: 0 }),
    });

    const events = new EngineEvents();
    seen = [];
    events.subscribe((event) => seen.push(event));

    backupGate = Promise.resolve();
    scheduler = new Scheduler([slot], {
      intervalSeconds: 600,
      events,
      runBackup: async (target, request) => {
        await backupGate;
        const result = await store.createSnapshot(target, { compress: true, force: request.force });
        return result.status === "created"
          ? { outcome: "created", snapshotId: result.snapshot.id }
          : { outcome: "unchanged", snapshotId: null };
      },
    });
    restorer = new RestoreOperator({ store, gate: scheduler, events });

    const created = await store.createSnapshot(slot, { compress: true });
    if (created.status !== "created") throw new Error("expected a snapshot");
    snapshot = created.snapshot;

    await writeTree(slot.path, { "main.ttw": "world v2", "extra.dat": "later" });
  });

  afterEach(async () => {
    await scheduler.drain();
    closeCatalog(catalog);
    await removeDir(tempDir);
  });

  test("replace mode puts the save back exactly as archived", async () => {
    const result = await restorer.restore(slot, snapshot.id);

    expect(result.filesCount).toBe(2);
    expect(result.destination).toBe(path.resolve(slot.path));
    expect(result.snapshot).toEqual(snapshot);
    expect(result.job.status).toBe("succeeded");
    expect(await readTree(slot.path)).toEqual(ORIGINAL);
    expect(seen).toEqual([
      expect.objectContaining({
        type: "job",
        slotId: "Navezgane/MySave",
        jobKind: "restore",
        status: "succeeded",
        snapshotId: snapshot.id,
      }),
    ]);
  });

  test("overlay mode keeps files the snapshot does not have", async () => {
    await restorer.restore(slot, snapshot.id, { mode: "overlay" });

    expect(await readTree(slot.path)).toEqual({ ...ORIGINAL, "extra.dat": "later" });
  });

  test("the configured mode applies when none is given", async () => {
    const overlaying = new RestoreOperator({ store, gate: scheduler, mode: () => "overlay" });

    await overlaying.restore(slot, snapshot.id);

    expect(await readTree(slot.path)).toEqual({ ...ORIGINAL, "extra.dat": "later" });
  });

  test("recreates a deleted save directory", async () => {
    await removeDir(slot.path);

    await restorer.restore(slot, snapshot.id);

    expect(await readTree(slot.path)).toEqual(ORIGINAL);
  });

  test("an unknown snapshot fails with NotFound and a failed event", async () => {
    await expect(restorer.restore(slot, "nope")).rejects.toThrow(
      new NotFoundError("Snapshot nope not found for Navezgane/MySave"),
    );

    expect(seen).toEqual([
      expect.objectContaining({
        jobKind: "restore",
        status: "failed",
        errorKind: "NotFoundError",
        message: "Snapshot nope not found for Navezgane/MySave",
      }),
    ]);
    expect(await readTree(slot.path)).toEqual({ "main.ttw": "world v2", "level.xml": "<level/>", "extra.dat": "later" });
  });

  test("a catalogued archive missing on disk is NotFound", async () => {
    fs.rmSync(snapshot.archivePath);

    await expect(restorer.restore(slot, snapshot.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  test("waits for a running backup, and blocks new ones while waiting", async () => {
    let openGate: () => void = () => {};
    backupGate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const backup = scheduler.triggerBackup(slot.id);
    const restore = restorer.restore(slot, snapshot.id);
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(await readTree(slot.path)).toEqual({ "main.ttw": "world v2", "level.xml": "<level/>", "extra.dat": "later" });
    await expect(scheduler.triggerBackup(slot.id)).rejects.toBeInstanceOf(BusyError);

    openGate();
    const job = await backup;
    await restore;

    expect(job.status).toBe("succeeded");
    expect(job.outcome).toBe("created");
    const latest = store.listSnapshots(slot.id)[0];
    expect(latest?.id).toBe(job.snapshotId);
    expect(latest?.filesCount).toBe(3);
    expect(await readTree(slot.path)).toEqual(ORIGINAL);
  });

  test("the snapshot is unpinned after the restore", async () => {
    await restorer.restore(slot, snapshot.id);

    expect(store.isPinned(snapshot.id)).toBe(false);
    await expect(store.deleteSnapshot(slot.id, snapshot.id)).resolves.toMatchObject({ id: snapshot.id });
  });
});
