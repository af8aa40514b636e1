import { parseArgs } from "node:util";
import { BackupEngine } from "../../core";
import { color, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

export async function deleteCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [slotId, snapshotId] = positionals;
  if (!slotId || !snapshotId) {
    ui.error("Usage: saveguard delete <slot> <snapshot-id>");
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const engine = await BackupEngine.create(config);

    try {
      ui.intro("saveguard delete");

      if (!values.yes) {
        const confirmed = await ui.confirm({
          message: `Delete snapshot ${snapshotId} of ${slotId}?`,
          initialValue: false,
        });
        if (ui.isCancel(confirmed) || !confirmed) {
          ui.cancel("Delete cancelled");
          return 1;
        }
      }

      const removed = await engine.deleteSnapshot(slotId, snapshotId);
      ui.success(`Deleted ${removed.archiveName}`);
      ui.outro("Done");
      return 0;
    } finally {
      await engine.shutdown();
    }
  } catch (error) {
    return reportFailure("Delete", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard delete")} - Delete one snapshot

${color.dim("USAGE:")}
  saveguard delete <slot> <snapshot-id> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -y, --yes               Do not ask for confirmation
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
