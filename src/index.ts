#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { deleteCommand } from "./cli/commands/delete";
import { listCommand } from "./cli/commands/list";
import { pruneCommand } from "./cli/commands/prune";
import { quotaCommand } from "./cli/commands/quota";
import { restoreCommand } from "./cli/commands/restore";
import { savesCommand } from "./cli/commands/saves";
import { startCommand } from "./cli/commands/start";
import { usageCommand } from "./cli/commands/usage";
import { VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan("saveguard")} ${color.dim(`v${VERSION}`)} - Game save snapshots`);

  p.note(
    `${color.cyan("start")}       Start the backup daemon
${color.cyan("backup")}      Snapshot saves once and exit
${color.cyan("list")}        List snapshots
${color.cyan("restore")}     Restore a save from a snapshot
${color.cyan("delete")}      Delete one snapshot
${color.cyan("prune")}       Apply retention now
${color.cyan("quota")}       Show or set a per-save quota
${color.cyan("usage")}       Show disk usage
${color.cyan("saves")}       List discovered saves`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `saveguard start                           ${color.dim("# Start the daemon")}
saveguard backup                          ${color.dim("# Back up every save once")}
saveguard list -s Navezgane/MySave        ${color.dim("# Snapshots of one save")}
saveguard restore                         ${color.dim("# Interactive restore")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("saveguard <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "delete":
      return deleteCommand(commandArgs);

    case "prune":
      return pruneCommand(commandArgs);

    case "quota":
      return quotaCommand(commandArgs);

    case "usage":
      return usageCommand(commandArgs);

    case "saves":
      return savesCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("saveguard --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
