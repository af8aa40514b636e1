import { parseArgs } from "node:util";
import { BackupEngine, runBackupPass, type SlotPassResult } from "../../core";
import type { BackupJob, SaveguardConfig } from "../../types";
import { formatDuration } from "../../utils/format";
import { color, formatSummary, ui } from "../ui";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig, reportFailure } from "./shared";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      slot: { type: "string", short: "s" },
      pick: { type: "boolean", short: "p", default: false },
      force: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    if (!values.slot && !values.pick) {
      return await backupAll(config, values.force);
    }

    return await backupOne(config, values.slot, values.force);
  } catch (error) {
    return reportFailure("Backup", error, values.verbose);
  }
}

function describe(result: SlotPassResult): string {
  switch (result.status) {
    case "created":
      return `${color.green("created")}   ${result.snapshotId}`;
    case "unchanged":
      return color.dim("unchanged");
    case "failed":
      return `${color.red("failed")}    ${result.error?.kind}: ${result.error?.message}`;
  }
}

async function backupAll(config: SaveguardConfig, force: boolean): Promise<number> {
  ui.intro("saveguard backup");

  const s = ui.spinner();
  s.start("Backing up every save...");
  const pass = await runBackupPass(config, { force });
  s.stop(`Pass finished in ${formatDuration(pass.durationMs)}`);

  if (pass.results.length === 0) {
    ui.info(`No saves found under ${config.saveRootPath}`);
  }
  for (const result of pass.results) {
    ui.message(`${result.slotId.padEnd(32)} ${describe(result)}`);
  }

  const failed = pass.results.filter((r) => r.status === "failed").length;
  if (failed > 0) {
    ui.error(`${failed} save(s) failed`);
    return pass.exitCode;
  }

  ui.outro("Backup complete!");
  return pass.exitCode;
}

async function backupOne(
  config: SaveguardConfig,
  slotId: string | undefined,
  force: boolean,
): Promise<number> {
  const engine = await BackupEngine.create(config);

  try {
    let target = slotId;
    if (!target) {
      ui.intro("saveguard backup");
      const selected = await ui.select({
        message: "Select a save",
        options: engine.listSlots().map((slot) => ({ value: slot.id, label: slot.id })),
      });
      if (ui.isCancel(selected)) {
        ui.cancel("Backup cancelled");
        return 1;
      }
      target = selected;
    } else {
      ui.intro("saveguard backup");
    }

    const s = ui.spinner();
    s.start(`Snapshotting ${target}...`);
    const job: BackupJob = await engine.triggerBackup(target, { trigger: "manual", force });
    s.stop(job.status === "succeeded" ? "Done" : "Failed");

    if (job.status !== "succeeded") {
      ui.error(`${job.error?.kind}: ${job.error?.message}`);
      return 1;
    }

    const duration =
      job.startedAt !== null && job.finishedAt !== null ? formatDuration(job.finishedAt - job.startedAt) : null;
    ui.note(
      formatSummary([
        { label: "Save", value: job.slotId },
        { label: "Outcome", value: job.outcome },
        { label: "Snapshot", value: job.snapshotId },
        { label: "Duration", value: duration },
      ]),
      "Backup Summary",
    );
    ui.outro(job.outcome === "created" ? "Backup complete!" : "Save unchanged, nothing written");
    return 0;
  } finally {
    await engine.shutdown();
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard backup")} - Snapshot saves once and exit

${color.dim("USAGE:")}
  saveguard backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -s, --slot <id>         Back up one save, given as <gameMode>/<saveName>
  -p, --pick              Choose the save interactively
  -f, --force             Snapshot even when the save has not changed
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("EXIT STATUS:")}
  0 when every save was backed up or unchanged, 1 when any save failed.

${color.dim("EXAMPLES:")}
  saveguard backup                               # Back up every save once
  saveguard backup -s Navezgane/MySave           # Back up one save
  saveguard backup -p --force                    # Pick a save, snapshot it regardless
`);
}
