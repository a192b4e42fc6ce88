/**
 * cairn rename - Rename a note and its descendants, or move it under a
 * new parent.
 */

import { Command } from "commander";
import { resolveNote } from "../lib/fuzzy.js";
import { renameNote } from "../lib/refactor.js";
import { dim, success } from "../lib/ui.js";
import { openContext } from "./shared.js";

export const renameCommand = new Command("rename")
  .description("Rename a note (and its children), updating links and the parent's checklist")
  .argument("<old>", "current name; partial names are matched")
  .argument("<new>", "new dotted identifier")
  .action((oldName: string, newName: string, _options: unknown, command: Command) => {
    const { vault, quiet } = openContext(command);
    const match = resolveNote(vault, oldName);
    const result = renameNote(vault, match.id, newName);

    if (quiet) return;
    for (const move of result.moved) {
      console.log(success(`${move.from} → ${move.to}`));
    }
    if (result.updated.length > 0) {
      console.log(dim(`Updated links in ${result.updated.join(", ")}`));
    }
  });
