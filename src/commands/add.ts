/**
 * cairn add - Capture an item in the backlog inbox.
 */

import { Command } from "commander";
import { addToInbox } from "../lib/backlog.js";
import { ExitCodes } from "../lib/models.js";
import { success } from "../lib/ui.js";
import { openContext } from "./shared.js";

export const addCommand = new Command("add")
  .description("Add an item to the backlog inbox")
  .argument("<text...>", "item text")
  .action((words: string[], _options: unknown, command: Command) => {
    const text = words.join(" ").trim();
    if (!text) {
      command.error("Error: item text is empty", { exitCode: ExitCodes.USAGE_ERROR });
    }

    const { vault, quiet } = openContext(command);
    const line = addToInbox(vault, text);
    if (!quiet) console.log(success(`Inbox: ${line}`));
  });
