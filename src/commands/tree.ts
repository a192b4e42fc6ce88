/**
 * cairn tree - Show the note hierarchy with kinds and task status.
 */

import { Command } from "commander";
import { resolveNote } from "../lib/fuzzy.js";
import { NoteIndex, statusOf } from "../lib/hierarchy.js";
import type { NoteKind, TaskStatus } from "../lib/models.js";
import { checkbox, dim, heading, kindLabel } from "../lib/ui.js";
import { noteTitle } from "../lib/vault.js";
import { openContext } from "./shared.js";

export interface TreeLine {
  depth: number;
  id: string;
  title: string;
  kind: NoteKind;
  /** Set for tasks and groups */
  status?: TaskStatus;
}

/**
 * Depth-first listing below the given roots (all top-level notes when
 * none are given). Each note is listed once, even in a parent cycle.
 */
export function treeLines(index: NoteIndex, roots: string[] = index.roots()): TreeLine[] {
  const lines: TreeLine[] = [];
  const seen = new Set<string>();

  const visit = (id: string, depth: number) => {
    const note = index.get(id);
    if (!note || seen.has(id)) return;
    seen.add(id);
    const kind = index.classify(note);
    lines.push({
      depth,
      id,
      title: noteTitle(note),
      kind,
      status: kind === "task" || kind === "group" ? statusOf(note) : undefined,
    });
    for (const child of index.childrenOf(id)) visit(child.id, depth + 1);
  };

  for (const root of roots) visit(root, 0);
  return lines;
}

function formatLine(line: TreeLine): string {
  const indent = "  ".repeat(line.depth);
  if (line.kind === "task" || line.kind === "group") {
    const label = line.kind === "group" ? ` ${kindLabel(line.kind)}` : "";
    return `${indent}${checkbox(line.status)} ${line.title} ${dim(line.id)}${label}`;
  }
  const title = line.kind === "project" ? heading(line.title) : line.title;
  return `${indent}${title} ${dim(line.id)} ${kindLabel(line.kind)}`;
}

export const treeCommand = new Command("tree")
  .description("Show projects, groups and tasks as a tree")
  .argument("[name]", "start at this note; partial names are matched")
  .action((name: string | undefined, _options: unknown, command: Command) => {
    const { vault } = openContext(command);
    const index = NoteIndex.build(vault);
    const roots = name ? [resolveNote(vault, name).id] : undefined;

    const lines = treeLines(index, roots);
    if (lines.length === 0) {
      console.log(dim("No notes."));
      return;
    }
    for (const line of lines) console.log(formatLine(line));
  });
