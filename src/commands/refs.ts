/**
 * cairn refs - List bibliography notes under ref/.
 */

import { Command } from "commander";
import type { ReferenceMetadata } from "../lib/models.js";
import { dim } from "../lib/ui.js";
import { listReferences } from "../lib/vault.js";
import { openContext } from "./shared.js";

export function formatReference(ref: ReferenceMetadata): string {
  const authors =
    ref.authors.length > 2 ? `${ref.authors[0]} et al.` : ref.authors.join(" & ");
  const meta = [authors, ref.year].filter((part) => part !== undefined && part !== "").join(", ");
  return `${ref.citekey}\t${ref.title ?? ""}${meta ? ` (${meta})` : ""}`;
}

export const refsCommand = new Command("refs")
  .description("List references in ref/")
  .option("-t, --tag <tag>", "only references with this tag")
  .action((options: { tag?: string }, command: Command) => {
    const { vault } = openContext(command);
    const refs = listReferences(vault).filter((ref) => !options.tag || ref.tags.includes(options.tag));

    if (refs.length === 0) {
      console.log(dim("No references."));
      return;
    }
    for (const ref of refs) console.log(formatReference(ref));
  });
