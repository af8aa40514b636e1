import { parseArgs } from "node:util";
import { PreferencesFile } from "../../config";
import { BackupEngine } from "../../core";
import { formatBytes, parseSize } from "../../utils/format";
import { color, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

export async function quotaCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      clear: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [slotId, size] = positionals;
  if (!slotId) {
    ui.error("Usage: saveguard quota <slot> [<size> | --clear]");
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const prefs = new PreferencesFile(config.preferencesPath);

    if (values.clear) {
      await prefs.clearSaveQuota(slotId);
      ui.success(`${slotId} now uses the default quota (${formatBytes(config.defaultQuotaBytes)})`);
      return 0;
    }

    if (size === undefined) {
      const quota = config.saveQuotas[slotId];
      ui.info(
        quota === undefined
          ? `${slotId}: default quota ${formatBytes(config.defaultQuotaBytes)}`
          : `${slotId}: ${quota === 0 ? "unlimited" : formatBytes(quota)}`,
      );
      return 0;
    }

    const bytes = parseSize(size);
    if (bytes === null) {
      ui.error(`Invalid size "${size}", expected something like 500MB`);
      return 1;
    }

    const engine = await BackupEngine.create(config, { quotaWriter: prefs });
    try {
      const pruned = await engine.updateSaveQuota(slotId, bytes);
      const removed = pruned.deleted.length;
      ui.success(
        `${slotId} quota set to ${bytes === 0 ? "unlimited" : formatBytes(bytes)}${removed > 0 ? `, ${removed} snapshot(s) pruned` : ""}`,
      );
      return 0;
    } finally {
      await engine.shutdown();
    }
  } catch (error) {
    return reportFailure("Quota", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard quota")} - Show or set a per-save quota

${color.dim("USAGE:")}
  saveguard quota <slot> [<size>] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
      --clear             Remove the override and fall back to the default quota
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  The quota is kept in the preferences file and applied at once. A size of 0
  means unlimited.

${color.dim("EXAMPLES:")}
  saveguard quota Navezgane/MySave           # Show the quota
  saveguard quota Navezgane/MySave 750MB     # Set it and prune to fit
  saveguard quota Navezgane/MySave --clear
`);
}
