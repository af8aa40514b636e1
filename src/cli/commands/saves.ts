import { parseArgs } from "node:util";
import { discoverSaveSlots, readSaveStats } from "../../core";
import { color, formatTableRow, formatTableSeparator, formatTimestamp, ui } from "../ui";
import { COMMON_OPTIONS, loadCommandConfig, reportFailure } from "./shared";

const WIDTHS = [32, 19, 16, 14, 8, 8, 24];

export async function savesCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
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
    const slots = await discoverSaveSlots(config.saveRootPath, config.gameModes);
    const rows = slots.map((slot) => ({ slot, stats: readSaveStats(slot) }));

    if (values.format === "json") {
      console.log(JSON.stringify(rows.map(({ slot, stats }) => ({ ...slot, ...stats })), null, 2));
      return 0;
    }

    ui.intro("saveguard saves");
    if (rows.length === 0) {
      ui.info(`No saves found under ${config.saveRootPath}`);
      ui.outro("Done");
      return 0;
    }

    console.log(
      formatTableRow(
        ["Save", "Last played (UTC)", "Character", "Profession", "Hours", "Kills", "Traits"],
        WIDTHS,
      ),
    );
    console.log(formatTableSeparator(WIDTHS));
    for (const { slot, stats } of rows) {
      console.log(
        formatTableRow(
          [
            slot.id,
            formatTimestamp(slot.lastModified),
            stats.characterName,
            stats.profession ?? "-",
            stats.hoursSurvived.toFixed(1),
            String(stats.zombiesKilled),
            stats.traits.length > 0 ? stats.traits.join(", ") : "-",
          ],
          WIDTHS,
        ),
      );
    }
    ui.outro(`${rows.length} save(s)`);
    return 0;
  } catch (error) {
    return reportFailure("Listing saves", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard saves")} - List discovered saves with their stats

${color.dim("USAGE:")}
  saveguard saves [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
      --format <format>   table or json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
