/**
 * cairn new - Create a project, task or note from its template.
 */

import { Argument, Command } from "commander";
import { NOTE_TYPES, type NoteType } from "../lib/models.js";
import { info, success } from "../lib/ui.js";
import { createNote } from "../lib/vault.js";
import { openContext } from "./shared.js";

function isNoteType(value: string): value is NoteType {
  return NOTE_TYPES.some((type) => type === value);
}

export const newCommand = new Command("new")
  .description("Create a note; tasks are named <project>.<task> or <project>.<group>.<task>")
  .addArgument(new Argument("<type>", "note type").choices(NOTE_TYPES))
  .argument("<name>", "dotted identifier")
  .option("-d, --description <text>", "text for the description")
  .action((type: string, name: string, options: { description?: string }, command: Command) => {
    // Choices are enforced by commander; this narrows the string.
    if (!isNoteType(type)) return;
    const { vault, quiet } = openContext(command);

    const { note, linkedFrom } = createNote(vault, {
      type,
      id: name,
      description: options.description,
    });

    if (quiet) return;
    console.log(success(`Created ${note.path}`));
    if (linkedFrom) {
      console.log(info(`Added to tasks of ${linkedFrom}`));
    }
  });
