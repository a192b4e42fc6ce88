/**
 * Shell completion candidates.
 *
 * Each function returns plain strings, one candidate per line for the
 * hidden `complete` command. Name lookups try prefixes first and fall
 * back to fuzzy matches when no prefix fits.
 */

import { candidatesFor, displayName, rankMatches, splitArchiveQuery } from "./fuzzy.js";
import type { NoteIndex } from "./hierarchy.js";
import { TASK_STATUSES, type NoteType } from "./models.js";
import type { Vault } from "./vault.js";

function byPrefix(items: readonly string[], partial: string): string[] {
  return items.filter((item) => !partial || item.startsWith(partial));
}

/**
 * Prefix matches, else fuzzy matches in rank order.
 */
export function prefixThenFuzzy(items: readonly string[], partial: string): string[] {
  const prefixed = byPrefix(items, partial);
  if (prefixed.length > 0) return prefixed;
  return rankMatches(
    partial,
    items.map((id) => ({ id, archived: false })),
  ).map((match) => match.id);
}

export interface ExistingNameOptions {
  includeArchived?: boolean;
}

/**
 * Existing notes. Archived notes are offered as `archive/<id>` when asked
 * for, or when the partial name starts with `archive/`.
 */
export function completeExistingName(
  vault: Vault,
  partial: string,
  options: ExistingNameOptions = {},
): string[] {
  const { query, archivedOnly } = splitArchiveQuery(partial);
  const candidates = candidatesFor(vault, {
    includeArchived: archivedOnly || options.includeArchived,
  }).filter((candidate) => !archivedOnly || candidate.archived);

  const prefixed = candidates.filter((candidate) => candidate.id.startsWith(query));
  const matches = prefixed.length > 0 ? prefixed : rankMatches(query, candidates);
  return matches.map(displayName);
}

export function completeProject(index: NoteIndex, partial: string): string[] {
  return byPrefix(index.projects(), partial);
}

/**
 * Parent prefixes for a new note name: `project.` (or any note, for
 * notes) before the first dot, then `project.group.` for task groups.
 */
export function completeNewName(index: NoteIndex, type: NoteType, partial: string): string[] {
  if (type === "project") return [];
  const parts = partial.split(".");

  if (parts.length === 1) {
    const parents = type === "task" ? index.projects() : index.ids();
    return byPrefix(parents, partial).map((parent) => `${parent}.`);
  }
  if (parts.length === 2) {
    const [project, group] = parts;
    return byPrefix(index.taskGroups(project), group).map((name) => `${project}.${name}.`);
  }
  return [];
}

export function completeTaskName(index: NoteIndex, partial: string): string[] {
  return prefixThenFuzzy(index.tasks(), partial);
}

export function completeStatus(partial: string): string[] {
  return byPrefix([...TASK_STATUSES].sort(), partial);
}

/**
 * Destination parents for a rename: projects, then `project.group`.
 */
export function completeNewParent(index: NoteIndex, partial: string): string[] {
  const parts = partial.split(".");
  const projects = index.projects();
  if (parts.length === 1) return byPrefix(projects, partial);

  const [project, group] = parts;
  if (!projects.includes(project)) return [];
  return byPrefix(index.taskGroups(project), group).map((name) => `${project}.${name}`);
}

/**
 * Names for a new task group: `project.` before the dot, nothing after.
 */
export function completeGroupName(index: NoteIndex, partial: string): string[] {
  if (partial.includes(".")) return [];
  return byPrefix(index.projects(), partial).map((project) => `${project}.`);
}

/**
 * Tasks of the project named by `group` (`project.group`), as their last
 * segment.
 */
export function completeProjectTasks(index: NoteIndex, group: string, partial: string): string[] {
  const [project] = group.split(".");
  if (!project) return [];
  return byPrefix(index.projectTasks(project), partial);
}

/** Kinds accepted by `cairn complete` */
export const COMPLETION_KINDS = [
  "name",
  "archived-name",
  "project",
  "new-task",
  "new-note",
  "task",
  "status",
  "parent",
  "group",
  "project-task",
] as const;

export type CompletionKind = (typeof COMPLETION_KINDS)[number];

export function isCompletionKind(value: string): value is CompletionKind {
  return COMPLETION_KINDS.some((kind) => kind === value);
}

/**
 * Dispatch a completion request by kind. `context` carries an earlier
 * argument some kinds depend on, such as the group for `project-task`.
 */
export function complete(
  vault: Vault,
  index: NoteIndex,
  kind: CompletionKind,
  partial: string,
  context = "",
): string[] {
  switch (kind) {
    case "name":
      return completeExistingName(vault, partial);
    case "archived-name":
      return completeExistingName(vault, partial, { includeArchived: true });
    case "project":
      return completeProject(index, partial);
    case "new-task":
      return completeNewName(index, "task", partial);
    case "new-note":
      return completeNewName(index, "note", partial);
    case "task":
      return completeTaskName(index, partial);
    case "status":
      return completeStatus(partial);
    case "parent":
      return completeNewParent(index, partial);
    case "group":
      return completeGroupName(index, partial);
    case "project-task":
      return completeProjectTasks(index, context, partial);
  }
}
