/**
 * Option parsing and config loading shared by every command
 */

import { extractInlineOptions, hasInlineOptions, INLINE_CONFIG_OPTIONS, loadConfig } from "../../config";
import { errorMessage } from "../../core/errors";
import type { SaveguardConfig } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { ui } from "../ui";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export const INLINE_OPTIONS_HELP = `      --save-root <path>           Directory holding <gameMode>/<saveName> saves
      --backup-root <path>         Directory snapshots are written to
      --database <path>            Catalog file (default: <backup-root>/catalog.db)
      --preferences <path>         Preferences file (default: <backup-root>/preferences.json)
      --interval <seconds>         Seconds between interval backups (min 10)
      --keep <n>                   Snapshots kept per save (0 = unlimited)
      --quota <size>               Default per-save quota, e.g. 500MB (0 = unlimited)
      --compress                   Deflate archives
      --no-compress                Store archives uncompressed
      --compression <0-9>          Compression level (default: 6)
      --game-mode <name>           Game mode to watch (can be repeated)
      --restore-mode <mode>        replace or overlay (default: replace)
      --paused                     Start with interval backups paused`;

export interface CommonValues extends Record<string, unknown> {
  config?: string;
  verbose?: boolean;
}

/**
 * Apply --verbose, then load the layered configuration.
 */
export async function loadCommandConfig(values: CommonValues): Promise<SaveguardConfig> {
  if (values.verbose) {
    setLogLevel("debug");
  }

  const inline = extractInlineOptions(values);
  return loadConfig({
    configPath: values.config,
    inline: hasInlineOptions(inline) ? inline : undefined,
  });
}

export function reportFailure(action: string, error: unknown, verbose: boolean | undefined): number {
  ui.error(`${action} failed: ${errorMessage(error)}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}
