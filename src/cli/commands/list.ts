import { parseArgs } from "node:util";
import { BackupEngine } from "../../core";
import type { Snapshot } from "../../types";
import { formatBytes } from "../../utils/format";
import {
  color,
  formatSnapshotCsv,
  formatTableRow,
  formatTableSeparator,
  snapshotRow,
  snapshotTableWidths,
  ui,
} from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      slot: { type: "string", short: "s" },
      limit: { type: "string", short: "n" },
      oldest: { type: "boolean", default: false },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const engine = await BackupEngine.create(config);

    let snapshots: Snapshot[];
    try {
      const order = values.oldest ? "oldest" : "newest";
      if (values.slot) {
        snapshots = engine.listSnapshots(values.slot, order);
      } else {
        snapshots = [...engine.store.listAll().keys()].flatMap((slotId) =>
          engine.listSnapshots(slotId, order),
        );
      }
    } finally {
      await engine.shutdown();
    }

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      snapshots = snapshots.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(snapshots, null, 2));
        return 0;
      case "csv":
        console.log(formatSnapshotCsv(snapshots));
        return 0;
      default:
        ui.intro("saveguard list");

        if (snapshots.length === 0) {
          ui.info("No snapshots found");
          ui.outro("Done");
          return 0;
        }

        printTable(snapshots, values.verbose);

        ui.outro(
          `${snapshots.length} snapshot(s), ${formatBytes(snapshots.reduce((sum, s) => sum + s.sizeBytes, 0))} total`,
        );
        return 0;
    }
  } catch (error) {
    return reportFailure("List", error, values.verbose);
  }
}

function printTable(snapshots: Snapshot[], verbose: boolean): void {
  const widths = snapshotTableWidths(verbose);
  const headers = verbose
    ? ["ID", "Save", "Created (UTC)", "Size", "Files"]
    : ["Archive", "Save", "Created (UTC)", "Size"];

  ui.step("Snapshots:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const snapshot of snapshots) {
    console.log(formatTableRow(snapshotRow(snapshot, verbose), widths));
  }

  console.log(formatTableSeparator(widths));
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard list")} - List snapshots

${color.dim("USAGE:")}
  saveguard list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -s, --slot <id>         Only snapshots of this save (<gameMode>/<saveName>)
  -n, --limit <number>    Limit number of results
      --oldest            Oldest first (default: newest first)
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Show snapshot IDs and file counts
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  saveguard list                           # Every snapshot, newest first per save
  saveguard list -s Navezgane/MySave       # One save only
  saveguard list -n 5 --format json        # JSON for scripting
`);
}
