/**
 * cairn archive - Move a note and its descendants to archive/.
 */

import { Command } from "commander";
import { resolveNote } from "../lib/fuzzy.js";
import { archiveNote } from "../lib/refactor.js";
import { dim, success } from "../lib/ui.js";
import { openContext } from "./shared.js";

export const archiveCommand = new Command("archive")
  .description("Move a note (and its children) to archive/")
  .argument("<name>", "note name; partial names are matched")
  .action((name: string, _options: unknown, command: Command) => {
    const { vault, quiet } = openContext(command);
    const match = resolveNote(vault, name);
    const result = archiveNote(vault, match.id);

    if (quiet) return;
    for (const move of result.moved) {
      console.log(success(`Archived ${move.from}`));
    }
    if (result.updated.length > 0) {
      console.log(dim(`Updated links in ${result.updated.join(", ")}`));
    }
  });
