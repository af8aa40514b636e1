import { parseArgs } from "node:util";
import { PreferencesFile } from "../../config";
import { BackupEngine } from "../../core";
import type { EngineEvent } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { color, ui } from "../ui";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig, reportFailure } from "./shared";

const log = createLogger("daemon");

function logEvent(event: EngineEvent): void {
  if (event.type === "usage") {
    log.debug(`${event.path} uses ${formatBytes(event.bytes)}`);
    return;
  }

  const took = formatDuration(event.finishedAt - event.startedAt);
  if (event.status === "failed") {
    log.error(`${event.jobKind} of ${event.slotId} failed after ${took}: [${event.errorKind}] ${event.message}`);
  } else if (event.jobKind === "backup") {
    log.info(
      event.outcome === "created"
        ? `Backed up ${event.slotId} as ${event.snapshotId} in ${took}`
        : `${event.slotId} unchanged, nothing to back up`,
    );
  } else {
    log.info(`Restored ${event.slotId} from ${event.snapshotId} in ${took}`);
  }
}

export async function startCommand(args: string[]): Promise<number> {
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
    const engine = await BackupEngine.create(config, {
      quotaWriter: new PreferencesFile(config.preferencesPath),
    });

    ui.intro("saveguard scheduler");

    const slots = engine.listSlots();
    if (slots.length === 0) {
      ui.warn(`No saves found under ${config.saveRootPath} yet; new ones are picked up on the next rescan or reload`);
    } else {
      ui.step("Watching saves:");
      for (const slot of slots) {
        ui.message(`  ${color.cyan(slot.id)}`);
      }
    }
    ui.info(
      `Every ${config.saveIntervalSeconds}s, keeping ${config.keepLastNSaves || "all"} snapshot(s) per save${config.scheduler.paused ? color.yellow(" (paused)") : ""}`,
    );

    engine.events.subscribe(logEvent);

    let stopping = false;
    const finished = new Promise<void>((resolve) => {
      const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        ui.cancel(`${signal} received, shutting down...`);
        engine.shutdown().then(resolve, (error: unknown) => {
          reportFailure("Shutdown", error, values.verbose);
          resolve();
        });
      };

      process.on("SIGINT", () => shutdown("SIGINT"));
      process.on("SIGTERM", () => shutdown("SIGTERM"));
    });

    process.on("SIGHUP", () => {
      loadCommandConfig(values)
        .then((next) => engine.applyConfig(next))
        .catch((error: unknown) => reportFailure("Reload", error, values.verbose));
    });

    engine.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop, send SIGHUP to reload configuration");

    await finished;
    return 0;
  } catch (error) {
    return reportFailure("Start", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("saveguard start")} - Start the backup daemon

${color.dim("USAGE:")}
  saveguard start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./saveguard.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Runs saveguard as a long-lived process that snapshots every save on a fixed
  interval, skipping saves that have not changed since their last snapshot.
  Retention runs after each snapshot. SIGHUP re-reads the configuration.

${color.dim("EXAMPLES:")}
  saveguard start                                       # Start with ./saveguard.config.yaml
  saveguard start -c ~/.config/saveguard.yaml           # Start with a specific config
  saveguard start --save-root ~/saves --backup-root ~/backups --interval 300
`);
}
