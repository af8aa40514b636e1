import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigError, findConfigFile, loadConfig, readConfigFile } from "../../src/config/loader";
import { makeTempDir, removeDir, writeTree } from "../helpers";

const GIB = 1024 ** 3;

describe("config loader", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("config");
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  describe("loadConfig", () => {
    test("loads YAML and fills every default", async () => {
      await writeTree(tempDir, {
        "saveguard.config.yaml": 'version: "1.0"\nsaveRootPath: ./saves\nbackupRootPath: ./backups\n',
      });

      const config = await loadConfig({ cwd: tempDir, env: {} });

      expect(config).toEqual({
        version: "1.0",
        saveRootPath: path.join(tempDir, "saves"),
        backupRootPath: path.join(tempDir, "backups"),
        saveIntervalSeconds: 600,
        compressFolders: true,
        keepLastNSaves: 10,
        defaultQuotaBytes: 2 * GIB,
        saveQuotas: {},
        gameModes: [],
        archive: { compression: 6 },
        restore: { mode: "replace" },
        scheduler: { paused: false, backupOnStart: true },
        database: { path: path.join(tempDir, "backups", "catalog.db") },
        preferencesPath: path.join(tempDir, "backups", "preferences.json"),
      });
    });

    test("resolves relative paths against the config file's directory", async () => {
      const configDir = path.join(tempDir, "etc");
      await writeTree(configDir, {
        "custom.json": JSON.stringify({
          version: "1.0",
          saveRootPath: "../saves",
          backupRootPath: "/srv/backups",
          database: { path: "state/catalog.db" },
        }),
      });

      const config = await loadConfig({ configPath: path.join(configDir, "custom.json"), cwd: tempDir, env: {} });

      expect(config.saveRootPath).toBe(path.join(tempDir, "saves"));
      expect(config.backupRootPath).toBe("/srv/backups");
      expect(config.database.path).toBe(path.join(configDir, "state", "catalog.db"));
    });

    test("accepts sizes for quotas", async () => {
      await writeTree(tempDir, {
        "saveguard.config.yml": [
          'version: "1.0"',
          "saveRootPath: /saves",
          "backupRootPath: /backups",
          "defaultQuotaBytes: 500MB",
          "saveQuotas:",
          "  Navezgane/Alpha: 1GB",
          "  Navezgane/Bravo: 4096",
        ].join("\n"),
      });

      const config = await loadConfig({ cwd: tempDir, env: {} });

      expect(config.defaultQuotaBytes).toBe(524_288_000);
      expect(config.saveQuotas).toEqual({ "Navezgane/Alpha": GIB, "Navezgane/Bravo": 4096 });
    });

    test("runs without a file when both roots are given inline", async () => {
      const config = await loadConfig({
        cwd: tempDir,
        env: {},
        inline: { saveRoot: "saves", backupRoot: "backups", interval: 60 },
      });

      expect(config.version).toBe("1.0");
      expect(config.saveRootPath).toBe(path.join(tempDir, "saves"));
      expect(config.backupRootPath).toBe(path.join(tempDir, "backups"));
      expect(config.saveIntervalSeconds).toBe(60);
    });

    test("without a file or roots it refuses to guess", async () => {
      await expect(loadConfig({ cwd: tempDir, env: {}, inline: { saveRoot: "/saves" } })).rejects.toThrow(
        "No config file found. Create saveguard.config.yaml, pass --config, or give --save-root and --backup-root",
      );
    });

    describe("layer order", () => {
      beforeEach(async () => {
        await writeTree(tempDir, {
          "saveguard.config.yaml": [
            'version: "1.0"',
            "saveRootPath: ./saves",
            "backupRootPath: ./backups",
            "saveIntervalSeconds: 300",
            "keepLastNSaves: 5",
          ].join("\n"),
          "backups/preferences.json": JSON.stringify({
            saveQuotas: { "Navezgane/Alpha": 1024 },
            saveIntervalSeconds: 120,
          }),
        });
      });

      test("preferences override the file", async () => {
        const config = await loadConfig({ cwd: tempDir, env: {} });

        expect(config.saveIntervalSeconds).toBe(120);
        expect(config.keepLastNSaves).toBe(5);
        expect(config.saveQuotas).toEqual({ "Navezgane/Alpha": 1024 });
      });

      test("the environment overrides preferences", async () => {
        const config = await loadConfig({ cwd: tempDir, env: { SAVEGUARD_INTERVAL: "60" } });
        expect(config.saveIntervalSeconds).toBe(60);
      });

      test("flags override everything", async () => {
        const config = await loadConfig({
          cwd: tempDir,
          env: { SAVEGUARD_INTERVAL: "60", SAVEGUARD_KEEP: "3" },
          inline: { interval: 30 },
        });

        expect(config.saveIntervalSeconds).toBe(30);
        expect(config.keepLastNSaves).toBe(3);
      });

      test("a moved preferences file is read from its new place", async () => {
        await writeTree(tempDir, {
          "prefs/elsewhere.json": JSON.stringify({ saveQuotas: {}, keepLastNSaves: 2 }),
        });

        const config = await loadConfig({ cwd: tempDir, env: { SAVEGUARD_PREFERENCES: "prefs/elsewhere.json" } });

        expect(config.preferencesPath).toBe(path.join(tempDir, "prefs", "elsewhere.json"));
        expect(config.keepLastNSaves).toBe(2);
        expect(config.saveIntervalSeconds).toBe(300);
      });
    });

    describe("validation", () => {
      async function loadWith(extra: string): Promise<unknown> {
        await writeTree(tempDir, {
          "saveguard.config.yaml": `version: "1.0"\nsaveRootPath: /saves\nbackupRootPath: /backups\n${extra}\n`,
        });
        return loadConfig({ cwd: tempDir, env: {} });
      }

      test("rejects short intervals", async () => {
        await expect(loadWith("saveIntervalSeconds: 5")).rejects.toThrow(
          new ConfigError("saveIntervalSeconds must be an integer of at least 10"),
        );
      });

      test("rejects unknown restore modes", async () => {
        await expect(loadWith("restore:\n  mode: merge")).rejects.toThrow(
          "restore.mode must be 'replace' or 'overlay'",
        );
      });

      test("rejects out of range compression levels", async () => {
        await expect(loadWith("archive:\n  compression: 12")).rejects.toThrow(
          "archive.compression must be an integer between 0 and 9",
        );
      });

      test("rejects unparseable quota sizes", async () => {
        await expect(loadWith("defaultQuotaBytes: lots")).rejects.toThrow(
          'defaultQuotaBytes is not a valid size: "lots"',
        );
      });

      test("rejects a missing version", async () => {
        await writeTree(tempDir, { "saveguard.config.yaml": "saveRootPath: /saves\nbackupRootPath: /backups\n" });
        await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow("Config must have a 'version' field");
      });
    });
  });

  describe("readConfigFile", () => {
    test("reports a missing file", async () => {
      const missing = path.join(tempDir, "missing.yaml");
      await expect(readConfigFile(missing)).rejects.toThrow(`Config file not found: ${missing}`);
    });

    test("reports invalid YAML", async () => {
      await writeTree(tempDir, { "bad.yaml": "version: [unclosed" });
      await expect(readConfigFile(path.join(tempDir, "bad.yaml"))).rejects.toThrow(/^Failed to parse YAML: /);
    });

    test("rejects unsupported formats", async () => {
      await writeTree(tempDir, { "config.toml": 'version = "1.0"' });
      await expect(readConfigFile(path.join(tempDir, "config.toml"))).rejects.toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });

    test("rejects a file that is not a mapping", async () => {
      const listPath = path.join(tempDir, "list.yaml");
      await writeTree(tempDir, { "list.yaml": "- one\n- two\n" });
      await expect(readConfigFile(listPath)).rejects.toThrow(`Config file must contain a mapping: ${listPath}`);
    });

    test("an empty file is an empty layer", async () => {
      await writeTree(tempDir, { "empty.yaml": "" });
      await expect(readConfigFile(path.join(tempDir, "empty.yaml"))).resolves.toEqual({});
    });
  });

  describe("findConfigFile", () => {
    test("prefers .yaml over .yml and .json", async () => {
      await writeTree(tempDir, {
        "saveguard.config.json": "{}",
        "saveguard.config.yml": "",
        "saveguard.config.yaml": "",
      });
      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, "saveguard.config.yaml"));
    });

    test("skips directories with a config file's name", () => {
      fs.mkdirSync(path.join(tempDir, "saveguard.config.yaml"));
      expect(findConfigFile(tempDir)).toBeNull();
    });
  });
});
