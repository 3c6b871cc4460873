#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { bundleCommand } from "./cli/commands/bundle";
import { inspectCommand } from "./cli/commands/inspect";
import { listCommand } from "./cli/commands/list";
import { patchCommand } from "./cli/commands/patch";
import { restoreCommand } from "./cli/commands/restore";
import { rotateCommand } from "./cli/commands/rotate";
import { startCommand } from "./cli/commands/start";
import { VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan("homestash")} ${color.dim(`v${VERSION}`)} - Homelab backup, restore and bundling`);

  p.note(
    `${color.cyan("backup")}      Back up volumes, bind mounts, compose files and images
${color.cyan("restore")}     Restore a backup directory onto this host
${color.cyan("bundle")}      Take a backup and package it as a portable image
${color.cyan("list")}        List backups under the backup root
${color.cyan("inspect")}     Report what a backup or bundle image captured
${color.cyan("patch")}       Add missing bind-mount archives to a backup
${color.cyan("rotate")}      Apply the retention window
${color.cyan("start")}       Start the scheduler daemon`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `sudo homestash backup                         ${color.dim("# Backup into ~/homelab-backups")}
sudo homestash restore ~/homelab-backups/<TS>   ${color.dim("# Restore a backup")}
sudo homestash bundle --target-user alice       ${color.dim("# Build homelab-backup:<TS>")}
homestash inspect --auto                      ${color.dim("# Check the newest bundle image")}
homestash list                                ${color.dim("# List backups")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("homestash <command> --help")} for command details`);
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
    case "backup":
      return backupCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "bundle":
      return bundleCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "inspect":
      return inspectCommand(commandArgs);

    case "patch":
      return patchCommand(commandArgs);

    case "rotate":
      return rotateCommand(commandArgs);

    case "start":
      return startCommand(commandArgs);

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
      console.error(`Run ${color.cyan("homestash --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
