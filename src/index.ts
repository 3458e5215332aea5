#!/usr/bin/env node

import * as p from "@clack/prompts";
import { backupCommand } from "./cli/commands/backup";
import { color, LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("hotbackup")} ${color.dim(`v${VERSION}`)} - Live backups of a running database`);

  p.note(`${color.cyan("backup")}      Take a hot backup into a destination directory`, "Commands");

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `hotbackup backup /backups/today             ${color.dim("# Back up using ./hotbackup.config.yaml")}
hotbackup backup /backups/today --dry-run   ${color.dim("# Show the directory layout only")}
hotbackup backup /backups/today -c db.yaml  ${color.dim("# Use a specific config file")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("hotbackup <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("hotbackup")} ${color.dim(`v${VERSION}`)}`);
  p.outro(`Run ${color.cyan("hotbackup --help")} for usage`);
}

export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("hotbackup --help")} for usage information.`);
      return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(`${color.red("Fatal error:")}`, error);
      process.exit(1);
    });
}
