/**
 * Hierarchy index for a vault.
 *
 * Built from disk once per command and never persisted: the vault files
 * are the only source of truth. Children are found by each note's parent
 * (its `parent` field, else its identifier prefix), so group-ness and
 * other derived roles are computed here rather than stored.
 */

import * as fs from "node:fs";
import { parseChecklist } from "./checklist.js";
import { MalformedFrontMatterError } from "./errors.js";
import { getNoteType, getParent, getStatusField } from "./frontmatter.js";
import {
  STATUS_ALIASES,
  TASK_STATUSES,
  type Note,
  type NoteKind,
  type TaskStatus,
} from "./models.js";
import {
  identifierToPath,
  listIdentifiers,
  parentOf,
  parseNote,
  type Vault,
} from "./vault.js";

/**
 * Canonical status for a raw value, or undefined if unrecognized.
 */
export function normalizeStatus(value: string | undefined): TaskStatus | undefined {
  if (value === undefined) return undefined;
  const lowered = value.trim().toLowerCase();
  return STATUS_ALIASES[lowered] ?? TASK_STATUSES.find((status) => status === lowered);
}

export function statusOf(note: Note): TaskStatus | undefined {
  return normalizeStatus(getStatusField(note.frontmatter));
}

/**
 * Effective parent: the front-matter field, else the identifier prefix.
 */
export function effectiveParent(note: Pick<Note, "id" | "frontmatter">): string | null {
  return getParent(note.frontmatter) ?? parentOf(note.id);
}

export interface IndexError {
  id: string;
  archived: boolean;
  message: string;
}

export interface BuildOptions {
  /** Also load archive/ */
  archived?: boolean;
}

export class NoteIndex {
  private readonly notes = new Map<string, Note>();
  private readonly archivedNotes = new Map<string, Note>();
  private readonly children = new Map<string, string[]>();
  /** Files whose front-matter could not be parsed */
  readonly errors: IndexError[] = [];

  private constructor() {}

  /**
   * Load every note. A file with malformed front-matter is recorded in
   * `errors` and left out; it never aborts the build.
   */
  static build(vault: Vault, options: BuildOptions = {}): NoteIndex {
    const index = new NoteIndex();
    const sets = options.archived ? [false, true] : [false];

    for (const archived of sets) {
      for (const id of listIdentifiers(vault, { archived })) {
        const filePath = identifierToPath(id, vault.root, { archived });
        try {
          const note = parseNote(id, fs.readFileSync(filePath, "utf-8"), filePath, archived);
          (archived ? index.archivedNotes : index.notes).set(id, note);
        } catch (err) {
          if (!(err instanceof MalformedFrontMatterError)) throw err;
          vault.logger.warn({ id, archived, reason: err.reason }, "skipping note");
          index.errors.push({ id, archived, message: err.message });
        }
      }
    }

    for (const note of index.notes.values()) {
      const parent = effectiveParent(note);
      if (!parent) continue;
      const siblings = index.children.get(parent) ?? [];
      siblings.push(note.id);
      index.children.set(parent, siblings);
    }
    for (const siblings of index.children.values()) siblings.sort();

    vault.logger.debug(
      { notes: index.notes.size, archived: index.archivedNotes.size },
      "built note index",
    );
    return index;
  }

  /**
   * Index over notes already in memory.
   */
  static fromNotes(notes: Note[]): NoteIndex {
    const index = new NoteIndex();
    for (const note of notes) {
      (note.archived ? index.archivedNotes : index.notes).set(note.id, note);
    }
    for (const note of index.notes.values()) {
      const parent = effectiveParent(note);
      if (!parent) continue;
      index.children.set(parent, [...(index.children.get(parent) ?? []), note.id].sort());
    }
    return index;
  }

  /** Active identifiers, sorted */
  ids(): string[] {
    return [...this.notes.keys()].sort();
  }

  archivedIds(): string[] {
    return [...this.archivedNotes.keys()].sort();
  }

  has(id: string): boolean {
    return this.notes.has(id);
  }

  get(id: string): Note | undefined {
    return this.notes.get(id);
  }

  getArchived(id: string): Note | undefined {
    return this.archivedNotes.get(id);
  }

  /** Active children of a note, sorted */
  childrenOf(id: string): Note[] {
    return (this.children.get(id) ?? []).flatMap((child) => {
      const note = this.notes.get(child);
      return note ? [note] : [];
    });
  }

  /** Every active note below id, depth first, each once */
  descendantsOf(id: string): Note[] {
    const found: Note[] = [];
    const seen = new Set([id]);
    const walk = (parent: string) => {
      for (const child of this.childrenOf(parent)) {
        if (seen.has(child.id)) continue;
        seen.add(child.id);
        found.push(child);
        walk(child.id);
      }
    };
    walk(id);
    return found;
  }

  /**
   * The parent chain from id when it leads back to id, as
   * `[id, parent, ..., id]`; null when it ends.
   */
  parentCycle(id: string): string[] | null {
    const chain = [id];
    const seen = new Set<string>();
    let current = this.notes.get(id);
    while (current) {
      const parent = effectiveParent(current);
      if (!parent) return null;
      chain.push(parent);
      if (parent === id) return chain;
      if (seen.has(parent)) return null;
      seen.add(parent);
      current = this.notes.get(parent);
    }
    return null;
  }

  /**
   * A group is a task with at least one child task.
   */
  isGroup(id: string): boolean {
    const note = this.notes.get(id);
    if (!note || getNoteType(note.frontmatter) !== "task") return false;
    return this.childrenOf(id).some((child) => getNoteType(child.frontmatter) === "task");
  }

  classify(note: Note): NoteKind {
    const type = getNoteType(note.frontmatter);
    if (type === "task") return this.isGroup(note.id) ? "group" : "task";
    if (type === "project" && !effectiveParent(note)) return "project";
    return "note";
  }

  /** Top-level projects, sorted */
  projects(): string[] {
    return this.ids().filter((id) => {
      const note = this.notes.get(id);
      return note !== undefined && this.classify(note) === "project";
    });
  }

  /**
   * Task groups directly under a project, as their last segment.
   */
  taskGroups(project: string): string[] {
    return this.childrenOf(project)
      .filter((child) => this.isGroup(child.id))
      .map((child) => child.id.slice(project.length + 1));
  }

  /**
   * Tasks directly under a project, as their last segment.
   */
  projectTasks(project: string): string[] {
    return this.childrenOf(project)
      .filter((child) => getNoteType(child.frontmatter) === "task")
      .map((child) => child.id.slice(project.length + 1));
  }

  /** Active task identifiers (plain tasks and groups) */
  tasks(): string[] {
    return this.ids().filter((id) => {
      const note = this.notes.get(id);
      return note !== undefined && getNoteType(note.frontmatter) === "task";
    });
  }

  /** Active top-level identifiers */
  roots(): string[] {
    return this.ids().filter((id) => {
      const note = this.notes.get(id);
      return note !== undefined && effectiveParent(note) === null;
    });
  }
}

/*
 * Vault check
 */

export type IssueKind =
  | "malformed-frontmatter"
  | "parent-mismatch"
  | "missing-parent"
  | "parent-cycle"
  | "invalid-status"
  | "checkbox-mismatch";

export interface VaultIssue {
  kind: IssueKind;
  id: string;
  message: string;
}

/**
 * Report notes that break the vault's invariants. Nothing is modified.
 */
export function checkVault(index: NoteIndex): VaultIssue[] {
  const issues: VaultIssue[] = index.errors.map((error) => ({
    kind: "malformed-frontmatter" as const,
    id: error.id,
    message: error.message,
  }));

  for (const id of index.ids()) {
    const note = index.get(id);
    if (!note) continue;

    const declared = getParent(note.frontmatter);
    const implied = parentOf(id);
    if (declared && implied && declared !== implied) {
      issues.push({
        kind: "parent-mismatch",
        id,
        message: `parent field '${declared}' does not match identifier prefix '${implied}'`,
      });
    }

    const parent = declared ?? implied;
    if (parent && !index.has(parent) && !index.getArchived(parent)) {
      issues.push({ kind: "missing-parent", id, message: `parent '${parent}' does not exist` });
    }

    const cycle = index.parentCycle(id);
    if (cycle) {
      issues.push({ kind: "parent-cycle", id, message: `parent chain loops back: ${cycle.join(" -> ")}` });
    }

    const rawStatus = getStatusField(note.frontmatter);
    if (getNoteType(note.frontmatter) === "task" && !normalizeStatus(rawStatus)) {
      issues.push({
        kind: "invalid-status",
        id,
        message: `status '${rawStatus ?? ""}' is not one of ${TASK_STATUSES.join(", ")}`,
      });
    }

    for (const entry of parseChecklist(note.body)) {
      const child = index.get(entry.target) ?? index.getArchived(entry.target);
      const childStatus = child ? statusOf(child) : undefined;
      if (childStatus && entry.status !== childStatus) {
        issues.push({
          kind: "checkbox-mismatch",
          id,
          message: `[${entry.glyph}] for ${entry.target} but its status is ${childStatus}`,
        });
      }
    }
  }

  return issues;
}
