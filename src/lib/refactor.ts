/**
 * Renaming, grouping and archiving notes together with their descendants.
 *
 * Both operations keep references intact: `parent` fields follow the
 * new identifiers, markdown links across the vault are rewritten, and
 * the parent's checklist entry moves or gains the archive/ prefix.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  appendTaskEntry,
  findSection,
  removeEntries,
  rewriteLinks,
  TASKS_HEADING,
} from "./checklist.js";
import { AlreadyExistsError, InvalidIdentifierError, NotFoundError } from "./errors.js";
import { getParent } from "./frontmatter.js";
import { effectiveParent } from "./hierarchy.js";
import type { Note } from "./models.js";
import {
  ARCHIVE_DIR,
  createNote,
  identifierToPath,
  isValidIdentifier,
  listIdentifiers,
  noteExists,
  noteTitle,
  parentOf,
  parseNote,
  readNote,
  serializeNote,
  type Vault,
} from "./vault.js";

export interface Move {
  from: string;
  to: string;
}

export interface RefactorResult {
  moved: Move[];
  /** Other notes whose text was rewritten */
  updated: string[];
}

/** A note and every active note whose identifier extends it */
function subtree(vault: Vault, id: string): string[] {
  return listIdentifiers(vault).filter((other) => other === id || other.startsWith(`${id}.`));
}

/**
 * Rewrite links in every note outside `skip`, writing only changed files.
 */
function rewriteVaultLinks(
  vault: Vault,
  mapping: ReadonlyMap<string, string>,
  options: { archive?: boolean; includeArchived?: boolean; skip: ReadonlySet<string> },
): string[] {
  const updated: string[] = [];
  const sets = options.includeArchived ? [false, true] : [false];

  for (const archived of sets) {
    for (const id of listIdentifiers(vault, { archived })) {
      if (!archived && options.skip.has(id)) continue;
      const file = identifierToPath(id, vault.root, { archived });
      const raw = fs.readFileSync(file, "utf-8");
      const next = rewriteLinks(raw, mapping, { archive: options.archive });
      if (next === raw) continue;
      fs.writeFileSync(file, next);
      updated.push(archived ? `${ARCHIVE_DIR}/${id}` : id);
    }
  }
  return updated;
}

/**
 * Move the parent checklist entry of `from` to the `## Tasks` section of
 * the new parent, keeping its glyph and title.
 */
function moveChecklistEntry(vault: Vault, from: string, to: string, oldParent: string, newParent: string | null): void {
  if (!noteExists(vault, oldParent)) return;
  const oldFile = identifierToPath(oldParent, vault.root);
  const { text, removed } = removeEntries(fs.readFileSync(oldFile, "utf-8"), from);
  if (removed.length === 0) return;
  fs.writeFileSync(oldFile, text);

  if (!newParent) return;
  const newFile = identifierToPath(newParent, vault.root);
  const raw = fs.readFileSync(newFile, "utf-8");
  if (!findSection(raw, TASKS_HEADING)) {
    vault.logger.warn({ id: to, parent: newParent }, "new parent has no tasks section, entry dropped");
    return;
  }
  const [entry] = removed;
  fs.writeFileSync(newFile, appendTaskEntry(raw, newParent, entry.title, to, entry.status));
}

/**
 * Rename a note and its descendants.
 */
export function renameNote(vault: Vault, from: string, to: string): RefactorResult {
  const root = readNote(vault, from);
  if (!isValidIdentifier(to)) {
    throw new InvalidIdentifierError(to, "use dot-separated letters, digits, '-' or '_'");
  }
  if (to === from || to.startsWith(`${from}.`)) {
    throw new InvalidIdentifierError(to, `cannot move ${from} under itself`);
  }

  const newParent = parentOf(to);
  if (newParent && !noteExists(vault, newParent)) {
    throw new NotFoundError(newParent, "Parent");
  }

  const ids = subtree(vault, from);
  const moves: Move[] = ids.map((id) => ({ from: id, to: to + id.slice(from.length) }));
  for (const move of moves) {
    const target = identifierToPath(move.to, vault.root);
    if (fs.existsSync(target)) throw new AlreadyExistsError(move.to, target);
  }
  const mapping = new Map(moves.map((move) => [move.from, move.to]));

  const oldParent = effectiveParent(root);
  if (oldParent && oldParent !== newParent) {
    moveChecklistEntry(vault, from, to, oldParent, newParent);
  }

  for (const move of moves) {
    const source = identifierToPath(move.from, vault.root);
    const target = identifierToPath(move.to, vault.root);
    let text = rewriteLinks(fs.readFileSync(source, "utf-8"), mapping);

    const note = parseNote(move.to, text, target);
    const desired = parentOf(move.to);
    const declared = getParent(note.frontmatter);
    if ((declared ?? null) !== desired) {
      const frontmatter = { ...note.frontmatter };
      if (desired) frontmatter.parent = desired;
      else delete frontmatter.parent;

      let body = note.body;
      if (move.from === from && oldParent && desired) {
        const title = noteTitle(readNote(vault, desired));
        body = body.replace(
          new RegExp(`^\\[< [^\\]]*\\]\\(${escapeRegExp(oldParent)}\\)$`, "m"),
          () => `[< ${title}](${desired})`,
        );
      }
      text = serializeNote({ frontmatter, body });
    }

    fs.writeFileSync(target, text);
    fs.unlinkSync(source);
    vault.logger.info(move, "renamed note");
  }

  const updated = rewriteVaultLinks(vault, mapping, {
    includeArchived: true,
    skip: new Set(mapping.values()),
  });
  return { moved: moves, updated };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Move a note and its descendants into archive/. Links to them from
 * active notes gain the archive/ prefix.
 */
export function archiveNote(vault: Vault, id: string): RefactorResult {
  readNote(vault, id);

  const ids = subtree(vault, id);
  const moves: Move[] = ids.map((moved) => ({ from: moved, to: `${ARCHIVE_DIR}/${moved}` }));
  for (const moved of ids) {
    const target = identifierToPath(moved, vault.root, { archived: true });
    if (fs.existsSync(target)) throw new AlreadyExistsError(`${ARCHIVE_DIR}/${moved}`, target);
  }

  fs.mkdirSync(path.join(vault.root, ARCHIVE_DIR), { recursive: true });
  for (const moved of ids) {
    fs.renameSync(
      identifierToPath(moved, vault.root),
      identifierToPath(moved, vault.root, { archived: true }),
    );
    vault.logger.info({ id: moved }, "archived note");
  }

  const mapping = new Map(ids.map((moved) => [moved, moved]));
  const updated = rewriteVaultLinks(vault, mapping, { archive: true, skip: new Set(ids) });
  return { moved: moves, updated };
}

export interface GroupResult extends RefactorResult {
  /** The new group task */
  group: Note;
}

/**
 * Create the task group `<project>.<group>` and move the named tasks of
 * the project under it. Tasks are given by their last segment or full
 * identifier. Every task is checked before anything is written.
 */
export function groupTasks(
  vault: Vault,
  group: string,
  tasks: readonly string[],
  options: { today?: string } = {},
): GroupResult {
  const project = parentOf(group);
  if (!isValidIdentifier(group) || !project || parentOf(project) !== null) {
    throw new InvalidIdentifierError(group, "groups are named <project>.<group>");
  }
  readNote(vault, project);
  const groupPath = identifierToPath(group, vault.root);
  if (fs.existsSync(groupPath)) throw new AlreadyExistsError(group, groupPath);

  const names = [
    ...new Set(tasks.map((task) => (task.startsWith(`${project}.`) ? task.slice(project.length + 1) : task))),
  ];
  for (const name of names) {
    const id = `${project}.${name}`;
    if (id === group) throw new InvalidIdentifierError(group, `cannot move ${id} under itself`);
    readNote(vault, id);
    const target = identifierToPath(`${group}.${name}`, vault.root);
    if (fs.existsSync(target)) throw new AlreadyExistsError(`${group}.${name}`, target);
  }

  const { note } = createNote(vault, { type: "task", id: group, today: options.today });
  const raw = fs.readFileSync(note.path, "utf-8");
  if (!findSection(raw, TASKS_HEADING)) {
    fs.writeFileSync(note.path, `${raw.endsWith("\n") ? raw : `${raw}\n`}\n${TASKS_HEADING}\n`);
  }
  vault.logger.info({ group, tasks: names.length }, "created task group");

  const moved: Move[] = [];
  const updated = new Set<string>();
  for (const name of names) {
    const result = renameNote(vault, `${project}.${name}`, `${group}.${name}`);
    moved.push(...result.moved);
    for (const id of result.updated) updated.add(id);
  }
  return { group: note, moved, updated: [...updated] };
}
