import { parseArgs } from "node:util";
import { BackupEngine } from "../../core";
import type { RestoreMode } from "../../types";
import { formatBytes } from "../../utils/format";
import { color, formatSummary, formatTimestamp, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

function parseMode(value: string | undefined): RestoreMode | undefined {
  if (value === undefined || value === "replace" || value === "overlay") return value;
  throw new Error(`--mode must be replace or overlay, got "${value}"`);
}

async function pickOne(message: string, options: { value: string; label: string; hint?: string }[]) {
  if (options.length === 0) return null;
  const selected = await ui.select({ message, options });
  return ui.isCancel(selected) ? null : selected;
}

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      mode: { type: "string", short: "m" },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const mode = parseMode(values.mode);
    const config = await loadCommandConfig(values);
    const engine = await BackupEngine.create(config);

    try {
      ui.intro("saveguard restore");

      const slotId =
        positionals[0] ??
        (await pickOne(
          "Select a save",
          [...engine.store.listAll().keys()].map((id) => ({ value: id, label: id })),
        ));
      if (!slotId) {
        ui.cancel("Restore cancelled");
        return 1;
      }

      const snapshotId =
        positionals[1] ??
        (await pickOne(
          "Select a snapshot",
          engine.listSnapshots(slotId).map((s) => ({
            value: s.id,
            label: formatTimestamp(s.createdAt),
            hint: formatBytes(s.sizeBytes),
          })),
        ));
      if (!snapshotId) {
        ui.cancel("Restore cancelled");
        return 1;
      }

      const target = engine.resolveSlot(slotId);
      if (!values.yes) {
        const confirmed = await ui.confirm({
          message: `Overwrite ${target.path} with snapshot ${snapshotId}?`,
          initialValue: false,
        });
        if (ui.isCancel(confirmed) || !confirmed) {
          ui.cancel("Restore cancelled");
          return 1;
        }
      }

      const s = ui.spinner();
      s.start("Restoring...");
      const result = await engine.restore(slotId, snapshotId, mode);
      s.stop("Restored");

      ui.note(
        formatSummary([
          { label: "Save", value: slotId },
          { label: "Snapshot", value: result.snapshot.id },
          { label: "Taken", value: formatTimestamp(result.snapshot.createdAt) },
          { label: "Files", value: result.filesCount },
          { label: "Destination", value: result.destination },
        ]),
        "Restore Summary",
      );
      ui.outro("Restore complete!");
      return 0;
    } finally {
      await engine.shutdown();
    }
  } catch (error) {
    return reportFailure("Restore", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard restore")} - Restore a save from a snapshot

${color.dim("USAGE:")}
  saveguard restore [<slot> [<snapshot-id>]] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -m, --mode <mode>       replace (default) or overlay onto the existing save
  -y, --yes               Do not ask for confirmation
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  Missing arguments are asked for interactively.

${color.dim("EXAMPLES:")}
  saveguard restore                                      # Pick save and snapshot
  saveguard restore Navezgane/MySave                     # Pick a snapshot of one save
  saveguard restore Navezgane/MySave <snapshot-id> -y
`);
}
