/**
 * Configuration loading
 *
 * Layers, later ones winning: defaults, config file, preferences file,
 * SAVEGUARD_* environment variables, CLI flags.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../core/errors";
import type { SaveguardConfig } from "../types";
import { DEFAULT_CONFIG, isRecord, mergeLayers } from "./defaults";
import { readEnvConfig } from "./env";
import { buildInlineConfig, canRunWithoutConfigFile, type InlineConfigOptions } from "./inline";
import { loadPreferences, preferencesLayer } from "./preferences";
import { applyDerivedDefaults, normalizeSizes, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export const CONFIG_FILE_NAMES = [
  "saveguard.config.yaml",
  "saveguard.config.yml",
  "saveguard.config.json",
];

/** Version stamped on configurations assembled without a file */
export const INLINE_CONFIG_VERSION = "1.0";

export interface LoadOptions {
  /** Explicit config file; otherwise searched for in `cwd` */
  configPath?: string;
  inline?: InlineConfigOptions;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Read a config file into a raw layer (not merged, not validated).
 */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${absolutePath}`);
  }
  return parsed;
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
      return configPath;
    }
  }

  return null;
}

function finalize(layers: Record<string, unknown>[], baseDir: string): Record<string, unknown> {
  const merged = mergeLayers(DEFAULT_CONFIG, ...layers);
  return applyDerivedDefaults(resolvePaths(normalizeSizes(merged), baseDir));
}

/**
 * Build the effective configuration from every layer.
 */
export async function loadConfig(options: LoadOptions = {}): Promise<SaveguardConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? findConfigFile(cwd);
  // Paths given on the command line or in the environment are relative to cwd
  const envLayer = resolvePaths(readEnvConfig(options.env ?? process.env), cwd);
  const inlineLayer = resolvePaths(buildInlineConfig(options.inline ?? {}), cwd);

  let fileLayer: Record<string, unknown>;
  let baseDir: string;

  if (configPath) {
    fileLayer = await readConfigFile(configPath);
    baseDir = path.dirname(path.resolve(configPath));
  } else {
    const overrides = mergeLayers(envLayer, inlineLayer);
    if (!canRunWithoutConfigFile(overrides)) {
      throw new ConfigError(
        "No config file found. Create saveguard.config.yaml, pass --config, or give --save-root and --backup-root",
      );
    }
    fileLayer = { version: INLINE_CONFIG_VERSION };
    baseDir = cwd;
  }

  // Preferences location may itself come from any layer
  const located = finalize([fileLayer, envLayer, inlineLayer], baseDir);
  const prefsPath = located.preferencesPath;
  const prefs =
    typeof prefsPath === "string" ? preferencesLayer(await loadPreferences(prefsPath)) : {};

  const config = finalize([fileLayer, prefs, envLayer, inlineLayer], baseDir);
  validateConfig(config);
  return config;
}

export { ConfigError };
