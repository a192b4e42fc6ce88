/**
 * Core data models for cairn vaults.
 *
 * A vault is a directory of markdown notes keyed by dotted identifiers
 * (`project.task.subtask`). Hierarchy is implied by the identifier; the
 * `parent` front-matter field mirrors it.
 */

/**
 * Stored note types (the `type` front-matter field):
 * - project: top-level container with a `## Tasks` checklist
 * - task: actionable item under a project or group
 * - note: free-form note, optionally under another note
 */
export type NoteType = "project" | "task" | "note";

export const NOTE_TYPES: readonly NoteType[] = ["project", "task", "note"];

/**
 * Derived role of a note. `group` is a task that has child tasks and is
 * never stored.
 */
export type NoteKind = "project" | "task" | "group" | "note";

/**
 * Recognized task status vocabulary.
 */
export const TASK_STATUSES = [
  "todo",
  "doing",
  "done",
  "blocked",
  "dropped",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Accepted spellings that normalize to a canonical status. */
export const STATUS_ALIASES: Readonly<Record<string, TaskStatus>> = {
  "in-progress": "doing",
};

/**
 * Checkbox glyph for each status, as written in `- [<glyph>] ...` lines.
 * This table is the only place the mapping is defined.
 */
export const STATUS_GLYPHS: Readonly<Record<TaskStatus, string>> = {
  todo: " ",
  doing: ".",
  done: "x",
  blocked: "~",
  dropped: "o",
};

/**
 * A scalar or nested value as found in YAML front-matter.
 */
export type FrontmatterValue =
  | string
  | number
  | boolean
  | null
  | FrontmatterValue[]
  | { [key: string]: FrontmatterValue };

/**
 * Front-matter mapping. Key order is significant and preserved.
 */
export type Frontmatter = Record<string, FrontmatterValue>;

/**
 * A note loaded from the vault.
 */
export interface Note {
  /** Dotted identifier (file stem) */
  id: string;
  /** Absolute file path */
  path: string;
  /** True when the note lives under archive/ */
  archived: boolean;
  /** Parsed front-matter */
  frontmatter: Frontmatter;
  /** Markdown body after the front-matter block */
  body: string;
}

/**
 * Bibliographic metadata kept in the front-matter of notes under ref/.
 */
export interface ReferenceMetadata {
  citekey: string;
  title?: string;
  authors: string[];
  year?: number;
  journal?: string;
  doi?: string;
  tags: string[];
}

/** Verbosity levels: 0 silent, 1 normal, 2 verbose, 3 debug. */
export type Verbosity = 0 | 1 | 2 | 3;

/**
 * Exit codes used by the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
