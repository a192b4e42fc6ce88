/**
 * cairn mark - Set a task's status and sync its parent's checklist.
 */

import { Command } from "commander";
import { resolveNote } from "../lib/fuzzy.js";
import { parseStatus, setStatus, type SyncResult } from "../lib/tasks.js";
import { checkbox, dim, success, warning } from "../lib/ui.js";
import { openContext } from "./shared.js";

function describeSync(sync: SyncResult): string | null {
  switch (sync.outcome) {
    case "updated":
      return dim(`  checklist updated in ${sync.parent}`);
    case "no-entry":
      return warning(`${sync.parent} has no checklist entry for this task`);
    case "parent-missing":
      return warning(`parent ${sync.parent} not found`);
    case "unchanged":
    case "no-parent":
      return null;
  }
}

export const markCommand = new Command("mark")
  .description("Set task status (todo, doing, done, blocked, dropped)")
  .argument("<name>", "task name; partial names are matched")
  .argument("<status>", "new status")
  .option("-a, --archived", "include archived notes")
  .action((name: string, status: string, options: { archived?: boolean }, command: Command) => {
    const { vault, quiet } = openContext(command);

    // Reject a bad status before resolving the name.
    parseStatus(status);
    const match = resolveNote(vault, name, { includeArchived: options.archived });
    const change = setStatus(vault, match.id, status);

    if (quiet) return;
    console.log(
      success(`${checkbox(change.status)} ${match.id}: ${change.previous ?? "none"} → ${change.status}`),
    );
    const line = describeSync(change.sync);
    if (line) console.log(line);
  });
