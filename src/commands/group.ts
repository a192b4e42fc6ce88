/**
 * cairn group - Gather tasks of a project under a new task group.
 */

import { Command } from "commander";
import { groupTasks } from "../lib/refactor.js";
import { dim, success } from "../lib/ui.js";
import { openContext } from "./shared.js";

export const groupCommand = new Command("group")
  .description("Create <project>.<group> and move the named tasks under it")
  .argument("<group>", "new group identifier, <project>.<group>")
  .argument("<tasks...>", "tasks of the project, by their last segment")
  .action((group: string, tasks: string[], _options: unknown, command: Command) => {
    const { vault, quiet } = openContext(command);
    const result = groupTasks(vault, group, tasks);

    if (quiet) return;
    console.log(success(`Created ${result.group.id}`));
    for (const move of result.moved) {
      console.log(success(`${move.from} → ${move.to}`));
    }
    if (result.updated.length > 0) {
      console.log(dim(`Updated links in ${result.updated.join(", ")}`));
    }
  });
