import * as fs from "node:fs";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import {
  collectFiles,
  countArchiveEntries,
  extractArchive,
  measureTree,
  writeArchive,
} from "../../src/core/archive";
import {
  CorruptArchiveError,
  InsufficientSpaceError,
  NotFoundError,
  SaveguardError,
} from "../../src/core/errors";
import * as localStorage from "../../src/storage/local";
import { makeTempDir, readTree, removeDir, touchTree, writeTree } from "../helpers";

const SAVE_FILES = {
  "main.ttw": "world state",
  "level.xml": "<players/>",
  "Region/r.0.0.7rg": "region data ".repeat(200),
  "Player/123.ttp": "player",
};

describe("archive", () => {
  let tempDir: string;
  let sourceDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("archive");
    sourceDir = path.join(tempDir, "source");
    await writeTree(sourceDir, SAVE_FILES);
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  describe("collectFiles", () => {
    test("lists every file with posix relative paths, sorted", async () => {
      const scan = await collectFiles(sourceDir);

      expect(scan.files.map((f) => f.relativePath)).toEqual([
        "level.xml",
        "main.ttw",
        "Player/123.ttp",
        "Region/r.0.0.7rg",
      ]);
      expect(scan.totalBytes).toBe(11 + 10 + 2400 + 6);
    });

    test("newestMtimeMs covers files and directories", async () => {
      const dir = path.join(tempDir, "mtime");
      await writeTree(dir, { "a.txt": "a", "sub/b.txt": "b" });
      await touchTree(dir, Date.UTC(2026, 0, 1));
      const later = new Date(Date.UTC(2026, 0, 2));
      await fs.promises.utimes(path.join(dir, "sub", "b.txt"), later, later);

      const scan = await collectFiles(dir);

      expect(scan.newestMtimeMs).toBe(later.getTime());
    });

    test("rejects when the root is missing", async () => {
      await expect(collectFiles(path.join(tempDir, "nope"))).rejects.toMatchObject({ code: "ENOENT" });
    });
  });

  describe("measureTree", () => {
    test("sums file sizes", async () => {
      expect(await measureTree(sourceDir)).toBe(2427);
    });

    test("is 0 for a missing path", async () => {
      expect(await measureTree(path.join(tempDir, "missing"))).toBe(0);
    });
  });

  describe("writeArchive", () => {
    test("writes a deflated archive holding every file", async () => {
      const dest = path.join(tempDir, "out", "deflate.zip");

      const result = await writeArchive(sourceDir, dest, { compress: true, previewFile: null });

      expect(result.archivePath).toBe(dest);
      expect(result.filesCount).toBe(4);
      expect(result.sourceBytes).toBe(2427);
      expect(result.previewPath).toBeNull();
      expect(result.sizeBytes).toBe((await fs.promises.stat(dest)).size);
      expect(await countArchiveEntries(dest)).toBe(4);
    });

    test("stored archives are larger than deflated ones for repetitive data", async () => {
      const deflated = await writeArchive(sourceDir, path.join(tempDir, "cmp", "a.zip"), {
        compress: true,
        previewFile: null,
      });
      const stored = await writeArchive(sourceDir, path.join(tempDir, "cmp", "a.stored.zip"), {
        compress: false,
        previewFile: null,
      });

      expect(stored.sizeBytes).toBeGreaterThan(deflated.sizeBytes);
    });

    test("leaves no temp files behind", async () => {
      const outDir = path.join(tempDir, "clean");
      await writeArchive(sourceDir, path.join(outDir, "x.zip"), { compress: true, previewFile: null });

      expect(await fs.promises.readdir(outDir)).toEqual(["x.zip"]);
    });

    test("copies the preview image beside the archive", async () => {
      const withPreview = path.join(tempDir, "with-preview");
      await writeTree(withPreview, { "main.ttw": "w", "thumb.png": "png-bytes" });
      const outDir = path.join(tempDir, "preview-out");

      const result = await writeArchive(
        withPreview,
        path.join(outDir, "2026-10-19T13-05-07-123Z_000001.zip"),
        { compress: true },
      );

      const previewPath = path.join(outDir, "2026-10-19T13-05-07-123Z_000001.png");
      expect(result.previewPath).toBe(previewPath);
      expect(await fs.promises.readFile(previewPath, "utf-8")).toBe("png-bytes");
      // the preview is also part of the save itself
      expect(result.filesCount).toBe(2);
    });

    test("an empty save makes an empty archive", async () => {
      const empty = path.join(tempDir, "empty");
      await fs.promises.mkdir(empty, { recursive: true });

      const result = await writeArchive(empty, path.join(tempDir, "empty-out", "e.zip"), {
        compress: true,
      });

      expect(result.filesCount).toBe(0);
      expect(await countArchiveEntries(result.archivePath)).toBe(0);
    });

    test("a missing source fails with an engine error", async () => {
      await expect(
        writeArchive(path.join(tempDir, "absent"), path.join(tempDir, "never.zip"), { compress: true }),
      ).rejects.toBeInstanceOf(SaveguardError);
      expect(fs.existsSync(path.join(tempDir, "never.zip"))).toBe(false);
    });
  });

  describe("writeArchive free space", () => {
    // 2427 source bytes plus 128 per entry
    const REQUIRED = 2427 + 4 * 128;

    afterEach(() => {
      vi.restoreAllMocks();
    });

    function fsError(code: string, message: string): NodeJS.ErrnoException {
      return Object.assign(new Error(message), { code });
    }

    test("refuses to start when the volume is too small", async () => {
      vi.spyOn(localStorage, "getFreeBytes").mockResolvedValue(100);
      const outDir = path.join(tempDir, "full-precheck");

      const failure = writeArchive(sourceDir, path.join(outDir, "x.zip"), { compress: true, previewFile: null });

      await expect(failure).rejects.toBeInstanceOf(InsufficientSpaceError);
      await expect(failure).rejects.toMatchObject({ requiredBytes: REQUIRED, availableBytes: 100 });
      expect(await fs.promises.readdir(outDir)).toEqual([]);
    });

    test("ENOSPC during the write is reported as insufficient space", async () => {
      vi.spyOn(localStorage, "getFreeBytes").mockResolvedValue(1_000_000);
      vi.spyOn(fs.promises, "rename").mockRejectedValueOnce(fsError("ENOSPC", "no space left on device"));
      const outDir = path.join(tempDir, "full-enospc");

      const failure = writeArchive(sourceDir, path.join(outDir, "x.zip"), { compress: true, previewFile: null });

      await expect(failure).rejects.toBeInstanceOf(InsufficientSpaceError);
      await expect(failure).rejects.toMatchObject({ requiredBytes: REQUIRED, availableBytes: 1_000_000 });
      expect(await fs.promises.readdir(outDir)).toEqual([]);
    });

    test("a write failure with the volume since filled up is insufficient space", async () => {
      vi.spyOn(localStorage, "getFreeBytes").mockResolvedValueOnce(1_000_000).mockResolvedValueOnce(10);
      vi.spyOn(fs.promises, "rename").mockRejectedValueOnce(fsError("EIO", "i/o error"));
      const outDir = path.join(tempDir, "full-recheck");

      const failure = writeArchive(sourceDir, path.join(outDir, "x.zip"), { compress: true, previewFile: null });

      await expect(failure).rejects.toMatchObject({
        kind: "InsufficientSpaceError",
        requiredBytes: REQUIRED,
        availableBytes: 10,
      });
      expect(await fs.promises.readdir(outDir)).toEqual([]);
    });

    test("a write failure with room left stays an IO error", async () => {
      vi.spyOn(localStorage, "getFreeBytes").mockResolvedValue(1_000_000);
      vi.spyOn(fs.promises, "rename").mockRejectedValueOnce(fsError("EIO", "i/o error"));
      const outDir = path.join(tempDir, "io-failure");

      const failure = writeArchive(sourceDir, path.join(outDir, "x.zip"), { compress: true, previewFile: null });

      await expect(failure).rejects.toMatchObject({ kind: "IOError", message: "Archive write failed: i/o error" });
      expect(await fs.promises.readdir(outDir)).toEqual([]);
    });
  });

  describe("extractArchive", () => {
    let archivePath: string;

    beforeAll(async () => {
      archivePath = path.join(tempDir, "restore-src", "snap.zip");
      await writeArchive(sourceDir, archivePath, { compress: true, previewFile: null });
    });

    test("replace mode makes the destination equal to the archive", async () => {
      const dest = path.join(tempDir, "restore-replace", "MySave");
      await writeTree(dest, { "main.ttw": "newer world", "stray.tmp": "left over" });

      const result = await extractArchive(archivePath, dest, { mode: "replace" });

      expect(result).toEqual({ destination: dest, filesCount: 4 });
      expect(await readTree(dest)).toEqual(SAVE_FILES);
    });

    test("overlay mode overwrites matching files and keeps the rest", async () => {
      const dest = path.join(tempDir, "restore-overlay", "MySave");
      await writeTree(dest, { "main.ttw": "newer world", "stray.tmp": "left over" });

      await extractArchive(archivePath, dest, { mode: "overlay" });

      expect(await readTree(dest)).toEqual({ ...SAVE_FILES, "stray.tmp": "left over" });
    });

    test("creates a destination that does not exist yet", async () => {
      const dest = path.join(tempDir, "restore-new", "Fresh");

      await extractArchive(archivePath, dest);

      expect(await readTree(dest)).toEqual(SAVE_FILES);
    });

    test("leaves no staging directories behind", async () => {
      const parent = path.join(tempDir, "restore-staging");
      await extractArchive(archivePath, path.join(parent, "MySave"));

      expect(await fs.promises.readdir(parent)).toEqual(["MySave"]);
    });

    test("a corrupt archive fails and the destination is untouched", async () => {
      const corrupt = path.join(tempDir, "corrupt.zip");
      await fs.promises.writeFile(corrupt, "this is not a zip file at all");
      const dest = path.join(tempDir, "restore-corrupt", "MySave");
      await writeTree(dest, { "main.ttw": "live" });

      await expect(extractArchive(corrupt, dest)).rejects.toBeInstanceOf(CorruptArchiveError);

      expect(await readTree(dest)).toEqual({ "main.ttw": "live" });
      expect(await fs.promises.readdir(path.dirname(dest))).toEqual(["MySave"]);
    });

    test("a truncated archive is reported as corrupt", async () => {
      const bytes = await fs.promises.readFile(archivePath);
      const truncated = path.join(tempDir, "truncated.zip");
      await fs.promises.writeFile(truncated, bytes.subarray(0, Math.floor(bytes.length / 2)));

      await expect(extractArchive(truncated, path.join(tempDir, "restore-trunc", "S"))).rejects.toBeInstanceOf(
        CorruptArchiveError,
      );
    });

    test("a missing archive is an IO error, not corruption", async () => {
      const failure = extractArchive(path.join(tempDir, "gone.zip"), path.join(tempDir, "restore-gone", "S"));
      await expect(failure).rejects.toMatchObject({ kind: "IOError" });
      await expect(failure).rejects.not.toBeInstanceOf(NotFoundError);
    });
  });
});
