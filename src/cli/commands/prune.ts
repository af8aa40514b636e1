import { parseArgs } from "node:util";
import { BackupEngine, type PruneResult } from "../../core";
import { color, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

export async function pruneCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      slot: { type: "string", short: "s" },
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

    const results: PruneResult[] = [];
    try {
      ui.intro("saveguard prune");
      const slotIds = values.slot ? [values.slot] : [...engine.store.listAll().keys()];
      for (const slotId of slotIds) {
        results.push(await engine.prune(slotId));
      }
    } finally {
      await engine.shutdown();
    }

    let deleted = 0;
    let failed = 0;
    for (const result of results) {
      for (const entry of result.deleted) {
        deleted++;
        ui.message(`${color.dim(result.slotId)} ${entry.snapshot.archiveName} ${color.dim(`(${entry.reason})`)}`);
      }
      for (const entry of result.failed) {
        failed++;
        ui.warn(`${result.slotId} ${entry.snapshot.archiveName}: ${entry.error}`);
      }
    }

    ui.outro(`${deleted} snapshot(s) deleted${failed > 0 ? `, ${failed} failed` : ""}`);
    return failed > 0 ? 1 : 0;
  } catch (error) {
    return reportFailure("Prune", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard prune")} - Apply retention now

${color.dim("USAGE:")}
  saveguard prune [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -s, --slot <id>         Only prune this save
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Deletes the oldest snapshots of each save until it keeps at most --keep
  snapshots and fits its quota. The newest snapshot is never deleted.
`);
}
