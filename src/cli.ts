#!/usr/bin/env node
/**
 * cairn CLI entry point.
 *
 * Projects, tasks and notes as markdown files in a vault.
 */

import { Command } from "commander";
import { CairnError } from "./lib/errors.js";
import { ExitCodes } from "./lib/models.js";
import { addCommand } from "./commands/add.js";
import { archiveCommand } from "./commands/archive.js";
import { checkCommand } from "./commands/check.js";
import { completeCommand } from "./commands/complete.js";
import { configCommand } from "./commands/config.js";
import { groupCommand } from "./commands/group.js";
import { initCommand } from "./commands/init.js";
import { markCommand } from "./commands/mark.js";
import { newCommand } from "./commands/new.js";
import { processCommand } from "./commands/process.js";
import { refsCommand } from "./commands/refs.js";
import { renameCommand } from "./commands/rename.js";
import { treeCommand } from "./commands/tree.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("cairn")
  .description("Projects, tasks and notes as plain markdown files")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--vault <path>", "vault directory (overrides CAIRN_VAULT and the config file)")
  .option("-q, --quiet", "only print errors")
  .option("-v, --verbose", "show debug logging")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
  });

// Register commands
program.addCommand(initCommand);
program.addCommand(newCommand);
program.addCommand(markCommand);
program.addCommand(addCommand);
program.addCommand(processCommand);
program.addCommand(renameCommand);
program.addCommand(groupCommand);
program.addCommand(archiveCommand);
program.addCommand(treeCommand);
program.addCommand(checkCommand);
program.addCommand(refsCommand);
program.addCommand(configCommand);
program.addCommand(completeCommand, { hidden: true });

// Handle unknown commands
program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "cairn --help" for available commands.');
  process.exit(ExitCodes.USAGE_ERROR);
});

// Parse and execute
program.parseAsync(process.argv).catch((err: unknown) => {
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(err instanceof CairnError ? err.exitCode : ExitCodes.FAILURE);
});
