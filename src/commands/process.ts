/**
 * cairn process - File backlog items into projects, one at a time.
 */

import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import {
  suggestTaskName,
  triageBacklog,
  type Decision,
  type InboxItem,
  type TriageContext,
  type TriageReport,
} from "../lib/backlog.js";
import type { Logger } from "../lib/logger.js";
import { ExitCodes } from "../lib/models.js";
import { dim, error, heading, success, warning } from "../lib/ui.js";
import { isValidIdentifier } from "../lib/vault.js";
import { openContext } from "./shared.js";

/**
 * Run a prompt with the logger silenced so log lines do not break the
 * prompt's redraws.
 */
async function quietly<T>(logger: Logger, prompt: () => Promise<T>): Promise<T> {
  const level = logger.level;
  logger.level = "silent";
  try {
    return await prompt();
  } finally {
    logger.level = level;
  }
}

function askForDecision(logger: Logger) {
  return async (item: InboxItem, context: TriageContext): Promise<Decision> => {
    console.log(chalk.cyan(`\n  → ${item.text}`) + dim(`  (${context.position}/${context.total})`));

    const { action } = await quietly(logger, () =>
      inquirer.prompt<{ action: Decision["action"] }>([
        {
          type: "select",
          name: "action",
          message: "Action",
          default: "keep",
          choices: [
            {
              name: "Move to a project as a task",
              value: "convert",
              disabled: context.projects.length === 0 ? "no projects" : false,
            },
            { name: "Keep in backlog", value: "keep" },
            { name: "Delete", value: "delete" },
            { name: "Quit", value: "quit" },
          ],
        },
      ]),
    );

    if (action !== "convert") return { action };

    const { project, taskName } = await quietly(logger, () =>
      inquirer.prompt<{ project: string; taskName: string }>([
        {
          type: "select",
          name: "project",
          message: "Project",
          choices: context.projects.map((name) => ({ name, value: name })),
        },
        {
          type: "input",
          name: "taskName",
          message: "Task name",
          default: suggestTaskName(item.text),
          validate: (value: string) =>
            (isValidIdentifier(value) && !value.includes(".")) ||
            "letters, digits, '-' or '_' only",
        },
      ]),
    );
    return { action: "convert", project, taskName };
  };
}

function printReport(report: TriageReport): void {
  const converted = report.processed.filter((entry) => entry.action === "convert").length;
  const deleted = report.processed.filter((entry) => entry.action === "delete").length;
  const kept = report.processed.length - converted - deleted;

  console.log(
    `\n${heading("Backlog")}: ${converted} converted, ${deleted} deleted, ${kept} kept` +
      (report.remaining.length > 0 ? `, ${report.remaining.length} left unprocessed` : ""),
  );
  if (report.stopped && report.remaining.length > 0) {
    console.log(dim("Remaining items stay in the backlog."));
  }
}

export const processCommand = new Command("process")
  .description("Interactively file backlog items into projects, keep or delete them")
  .action(async (_options: unknown, command: Command) => {
    const { vault, logger } = openContext(command);

    const report = await triageBacklog(vault, askForDecision(logger), {
      onConverted: (_item, created) => {
        console.log(success(`Created ${created.note.id}`));
      },
      onConvertError: (_item, err) => {
        console.log(error(err.message));
      },
    });

    if (report.processed.length === 0 && report.remaining.length === 0 && !report.stopped) {
      console.log(success("Backlog is empty. Nothing to process!"));
      return;
    }

    printReport(report);

    if (report.error !== undefined) {
      // inquirer rejects with ExitPromptError on Ctrl-C.
      if (report.error instanceof Error && report.error.name === "ExitPromptError") {
        console.log(warning("Interrupted."));
        process.exitCode = ExitCodes.FAILURE;
        return;
      }
      throw report.error;
    }
  });
