import { parseArgs } from "node:util";
import { BackupEngine } from "../../core";
import { formatBytes } from "../../utils/format";
import { color, formatTableRow, formatTableSeparator, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

const WIDTHS = [32, 12, 12, 12];

function show(bytes: number | null): string {
  return bytes === null ? color.dim("n/a") : formatBytes(bytes);
}

export async function usageCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: COMMON_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const engine = await BackupEngine.create(config);

    try {
      ui.intro("saveguard usage");

      const s = ui.spinner();
      s.start("Measuring...");
      const rows = await Promise.all(
        engine.listSlots().map(async (slot) => {
          const [save, backups] = await Promise.all([
            engine.estimateSize(slot.path).result,
            engine.estimateSize(engine.store.slotDir(slot.id)).result,
          ]);
          const quota = config.saveQuotas[slot.id] ?? config.defaultQuotaBytes;
          return [slot.id, show(save), show(backups), quota > 0 ? formatBytes(quota) : "unlimited"];
        }),
      );
      const total = await engine.estimateSize(config.backupRootPath).result;
      s.stop("Measured");

      console.log(formatTableRow(["Save", "Live", "Snapshots", "Quota"], WIDTHS));
      console.log(formatTableSeparator(WIDTHS));
      for (const row of rows) {
        console.log(formatTableRow(row, WIDTHS));
      }
      console.log(formatTableSeparator(WIDTHS));

      ui.outro(`Backup root uses ${show(total)}`);
      return 0;
    } finally {
      await engine.shutdown();
    }
  } catch (error) {
    return reportFailure("Usage", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard usage")} - Show disk usage of saves and snapshots

${color.dim("USAGE:")}
  saveguard usage [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
