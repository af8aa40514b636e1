import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { InUseError, NotFoundError } from "../../src/core/errors";
import { SnapshotStore } from "../../src/core/snapshots";
import { type Catalog, closeCatalog, openCatalog } from "../../src/db";
import type { RetentionPolicy, SaveSlot } from "../../src/types";
import { generateArchiveName } from "../../src/utils/naming";
import { makeSlot, makeTempDir, removeDir, touchTree, writeTree } from "../helpers";

const T0 = Date.UTC(2026, 9, 19, 12, 0, 0, 0);
const MODIFIED = Date.UTC(2026, 9, 19, 11, 0, 0, 0);

describe("SnapshotStore", () => {
  let tempDir: string;
  let backupRoot: string;
  let slot: SaveSlot;
  let catalog: Catalog;
  let store: SnapshotStore;
  let clock: number;
  let policy: RetentionPolicy;
  let mutations: string[];

  beforeEach(async () => {
    tempDir = await makeTempDir("store");
    backupRoot = path.join(tempDir, "backups");
    slot = makeSlot(path.join(tempDir, "saves"), "Navezgane", "MySave");
    await writeTree(slot.path, { "main.ttw": "world", "players.xml": "<players/>" });
    await touchTree(slot.path, MODIFIED);

    catalog = await openCatalog(":memory:");
    clock = T0;
    policy = { keepLastN: 0, quotaBytes: 0 };
    mutations = [];
    store = new SnapshotStore({
      catalog,
      backupRootPath: backupRoot,
      policyFor: () => policy,
      onMutation: (slotId) => mutations.push(slotId),
      now: () => clock,
    });
  });

  afterEach(async () => {
    closeCatalog(catalog);
    await removeDir(tempDir);
  });

  async function forceSnapshot() {
    const result = await store.createSnapshot(slot, { compress: true, force: true });
    if (result.status !== "created") throw new Error("expected a new snapshot");
    clock += 60_000;
    return result;
  }

  describe("createSnapshot", () => {
    test("writes an archive and records it", async () => {
      const result = await store.createSnapshot(slot, { compress: true });

      expect(result.status).toBe("created");
      if (result.status !== "created") return;

      const name = "2026-10-19T12-00-00-000Z_000001.zip";
      expect(result.snapshot).toMatchObject({
        slotId: "Navezgane/MySave",
        createdAt: T0,
        sequence: 1,
        archiveName: name,
        archivePath: path.join(backupRoot, "Navezgane", "MySave", name),
        compressed: true,
        filesCount: 2,
        sourceModifiedAt: MODIFIED,
        previewPath: null,
      });
      expect(fs.existsSync(result.snapshot.archivePath)).toBe(true);
      expect(result.snapshot.sizeBytes).toBe(fs.statSync(result.snapshot.archivePath).size);
      expect(store.listSnapshots(slot.id)).toEqual([result.snapshot]);
      expect(mutations).toEqual(["Navezgane/MySave"]);
    });

    test("uncompressed snapshots use the .stored.zip name", async () => {
      const result = await store.createSnapshot(slot, { compress: false });
      if (result.status !== "created") throw new Error("expected a new snapshot");

      expect(result.snapshot.archiveName).toBe("2026-10-19T12-00-00-000Z_000001.stored.zip");
      expect(result.snapshot.compressed).toBe(false);
    });

    test("skips a save that has not changed", async () => {
      const first = await forceSnapshot();

      const second = await store.createSnapshot(slot, { compress: true });

      expect(second).toEqual({ status: "unchanged", lastSnapshot: first.snapshot });
      expect(store.listSnapshots(slot.id)).toHaveLength(1);
    });

    test("snapshots again once the save changes", async () => {
      await forceSnapshot();
      await writeTree(slot.path, { "main.ttw": "world, later" });
      await touchTree(slot.path, MODIFIED + 5000);

      const result = await store.createSnapshot(slot, { compress: true });

      expect(result.status).toBe("created");
      if (result.status === "created") {
        expect(result.snapshot.sequence).toBe(2);
        expect(result.snapshot.sourceModifiedAt).toBe(MODIFIED + 5000);
      }
    });

    test("force snapshots an unchanged save", async () => {
      await forceSnapshot();
      const result = await store.createSnapshot(slot, { compress: true, force: true });
      expect(result.status).toBe("created");
    });

    test("a clock that went backwards never produces an older archive", async () => {
      const first = await forceSnapshot();
      clock = T0 - 3_600_000;

      const second = await forceSnapshot();

      expect(second.snapshot.createdAt).toBe(first.snapshot.createdAt);
      expect(second.snapshot.sequence).toBe(2);
      expect(store.listSnapshots(slot.id, "newest").map((s) => s.id)).toEqual([
        second.snapshot.id,
        first.snapshot.id,
      ]);
    });

    test("copies the preview image beside the archive", async () => {
      await writeTree(slot.path, { "thumb.png": "png" });

      const { snapshot } = await forceSnapshot();

      expect(snapshot.previewPath).toBe(
        path.join(backupRoot, "Navezgane", "MySave", "2026-10-19T12-00-00-000Z_000001.png"),
      );
    });

    test("a missing save directory is NotFound", async () => {
      const ghost = makeSlot(path.join(tempDir, "saves"), "Navezgane", "Ghost");
      await expect(store.createSnapshot(ghost, { compress: true })).rejects.toBeInstanceOf(NotFoundError);
      expect(store.listSnapshots(ghost.id)).toEqual([]);
    });

    test("prunes after each new snapshot", async () => {
      policy = { keepLastN: 2, quotaBytes: 0 };
      const first = await forceSnapshot();
      await forceSnapshot();

      const third = await forceSnapshot();

      expect(third.pruned.checked).toBe(3);
      expect(third.pruned.deleted.map((d) => [d.snapshot.id, d.reason])).toEqual([
        [first.snapshot.id, "retention_count"],
      ]);
      expect(fs.existsSync(first.snapshot.archivePath)).toBe(false);
      expect(store.listSnapshots(slot.id)).toHaveLength(2);

      const [log] = store.deletionLog(slot.id);
      expect(log).toMatchObject({
        snapshot_id: first.snapshot.id,
        reason: "retention_count",
        success: true,
        error_message: null,
      });
    });

    test("sequence keeps counting past deleted snapshots", async () => {
      policy = { keepLastN: 1, quotaBytes: 0 };
      await forceSnapshot();
      await forceSnapshot();

      const third = await forceSnapshot();

      expect(third.snapshot.sequence).toBe(3);
    });
  });

  describe("pins and deletion", () => {
    test("a pinned snapshot cannot be deleted until released", async () => {
      const { snapshot } = await forceSnapshot();
      await forceSnapshot();
      const release = await store.pin(slot.id, snapshot.id);

      expect(store.isPinned(snapshot.id)).toBe(true);
      await expect(store.deleteSnapshot(slot.id, snapshot.id)).rejects.toBeInstanceOf(InUseError);

      release();
      release();
      expect(store.isPinned(snapshot.id)).toBe(false);
      await expect(store.deleteSnapshot(slot.id, snapshot.id)).resolves.toEqual(snapshot);
      expect(fs.existsSync(snapshot.archivePath)).toBe(false);
    });

    test("retention never removes a pinned snapshot", async () => {
      policy = { keepLastN: 1, quotaBytes: 0 };
      const { snapshot } = await forceSnapshot();
      const release = await store.pin(slot.id, snapshot.id);

      const next = await forceSnapshot();

      expect(next.pruned.deleted).toEqual([]);
      expect(store.getSnapshot(slot.id, snapshot.id)).not.toBeNull();
      release();

      const pruned = await store.prune(slot.id);
      expect(pruned.deleted.map((d) => d.snapshot.id)).toEqual([snapshot.id]);
    });

    test("pinning or deleting an unknown snapshot is NotFound", async () => {
      await expect(store.pin(slot.id, "missing")).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.deleteSnapshot(slot.id, "missing")).rejects.toBeInstanceOf(NotFoundError);
    });

    test("a snapshot is only found under its own slot", async () => {
      const { snapshot } = await forceSnapshot();
      expect(store.getSnapshot("Navezgane/Other", snapshot.id)).toBeNull();
    });

    test("manual deletion removes the preview and logs the reason", async () => {
      await writeTree(slot.path, { "thumb.png": "png" });
      const { snapshot } = await forceSnapshot();

      await store.deleteSnapshot(slot.id, snapshot.id);

      expect(snapshot.previewPath).not.toBeNull();
      expect(fs.existsSync(snapshot.previewPath ?? "")).toBe(false);
      expect(store.deletionLog(slot.id)[0]?.reason).toBe("manual");
    });

    test("prune applies a quota lowered after the fact", async () => {
      const first = await forceSnapshot();
      const second = await forceSnapshot();
      policy = { keepLastN: 0, quotaBytes: second.snapshot.sizeBytes };

      const result = await store.prune(slot.id);

      expect(result.deleted.map((d) => [d.snapshot.id, d.reason])).toEqual([
        [first.snapshot.id, "retention_quota"],
      ]);
      expect(store.totalBytes(slot.id)).toBe(second.snapshot.sizeBytes);
    });
  });

  describe("reconcile", () => {
    test("marks rows whose archive vanished", async () => {
      const { snapshot } = await forceSnapshot();
      await fs.promises.unlink(snapshot.archivePath);

      const result = await store.reconcile(slot.id);

      expect(result.missing.map((s) => s.id)).toEqual([snapshot.id]);
      expect(store.listSnapshots(slot.id)).toEqual([]);
      expect(store.deletionLog(slot.id)[0]?.reason).toBe("missing");
    });

    test("adopts well-named archives and removes partial files", async () => {
      const { snapshot } = await forceSnapshot();
      const dir = store.slotDir(slot.id);
      const adoptedName = generateArchiveName(T0 + 3_600_000, 7, true);
      await fs.promises.copyFile(snapshot.archivePath, path.join(dir, adoptedName));
      await fs.promises.writeFile(path.join(dir, `.${adoptedName}.ab12cd.partial`), "half");
      await fs.promises.writeFile(path.join(dir, "notes.txt"), "not an archive");

      const result = await store.reconcile(slot.id);

      expect(result.missing).toEqual([]);
      expect(result.removedPartials).toEqual([path.join(dir, `.${adoptedName}.ab12cd.partial`)]);
      expect(result.adopted).toHaveLength(1);
      expect(result.adopted[0]).toMatchObject({
        archiveName: adoptedName,
        createdAt: T0 + 3_600_000,
        sequence: 7,
        compressed: true,
        filesCount: 2,
        sourceModifiedAt: null,
      });
      expect((await fs.promises.readdir(dir)).sort()).toEqual(
        [snapshot.archiveName, adoptedName, "notes.txt"].sort(),
      );

      const next = await forceSnapshot();
      expect(next.snapshot.sequence).toBe(8);
    });

    test("a slot without a backup directory reconciles to nothing", async () => {
      await expect(store.reconcile("Navezgane/Nothing")).resolves.toEqual({
        slotId: "Navezgane/Nothing",
        missing: [],
        adopted: [],
        removedPartials: [],
      });
    });
  });

  test("listAll groups by slot, newest first", async () => {
    const first = await forceSnapshot();
    const second = await forceSnapshot();

    const all = store.listAll();

    expect([...all.keys()]).toEqual(["Navezgane/MySave"]);
    expect(all.get("Navezgane/MySave")?.map((s) => s.id)).toEqual([second.snapshot.id, first.snapshot.id]);
  });
});
