/**
 * Vault storage: identifiers, paths, templates and note files.
 *
 * A note's identifier is its file stem. Segments are separated by dots
 * and the identifier minus its last segment names the parent, so the
 * hierarchy can be recovered from file names alone.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  AlreadyExistsError,
  InvalidIdentifierError,
  MalformedFrontMatterError,
  MissingSectionError,
  NotFoundError,
  VaultNotInitializedError,
} from "./errors.js";
import {
  getParent,
  getString,
  getTags,
  parseFrontmatter,
  renderFrontmatter,
} from "./frontmatter.js";
import type { Logger } from "./logger.js";
import type { Note, NoteType, ReferenceMetadata } from "./models.js";
import { appendTaskEntry, findSection, TASKS_HEADING } from "./checklist.js";

export const ROOT_NOTE = "root";
export const BACKLOG_NOTE = "backlog";
export const ARCHIVE_DIR = "archive";
export const TEMPLATES_DIR = "templates";
export const REF_DIR = "ref";
export const BIB_FILE = "references.bib";
export const NOTE_EXT = ".md";

/** Stems that are vault fixtures, not addressable notes */
const RESERVED_STEMS = new Set([ROOT_NOTE, BACKLOG_NOTE]);

const SEGMENT = /^[A-Za-z0-9_-]+$/;

/** Templates shipped with the package, copied by initVault */
const BUNDLED_TEMPLATES = fileURLToPath(new URL("../../templates/", import.meta.url));

export const TEMPLATE_NAMES = ["project", "task", "note"] as const;

/**
 * An opened vault: its root and the logger operations report to.
 */
export interface Vault {
  root: string;
  logger: Logger;
}

export interface LocateOptions {
  archived?: boolean;
}

/**
 * Open the vault at root. A vault is initialized when root.md exists.
 */
export function openVault(root: string, logger: Logger): Vault {
  const resolved = path.resolve(root);
  if (!fs.existsSync(path.join(resolved, ROOT_NOTE + NOTE_EXT))) {
    throw new VaultNotInitializedError(resolved);
  }
  return { root: resolved, logger };
}

/**
 * Create the vault skeleton. Existing files are left untouched.
 */
export function initVault(root: string, today: string = todayIso()): string[] {
  const created: string[] = [];
  const write = (target: string, content: string) => {
    if (fs.existsSync(target)) return;
    fs.writeFileSync(target, content);
    created.push(target);
  };

  fs.mkdirSync(root, { recursive: true });
  for (const dir of [TEMPLATES_DIR, ARCHIVE_DIR, REF_DIR]) {
    fs.mkdirSync(path.join(root, dir), { recursive: true });
  }

  for (const name of TEMPLATE_NAMES) {
    write(
      path.join(root, TEMPLATES_DIR, name + NOTE_EXT),
      readBundledTemplate(name),
    );
  }

  const vars = { name: "", parent: "", parentTitle: "", date: today };
  write(
    path.join(root, ROOT_NOTE + NOTE_EXT),
    renderTemplate(readBundledTemplate(ROOT_NOTE), vars),
  );
  write(
    path.join(root, BACKLOG_NOTE + NOTE_EXT),
    renderTemplate(readBundledTemplate(BACKLOG_NOTE), vars),
  );
  write(path.join(root, BIB_FILE), "");

  return created;
}

/**
 * Today's date as YYYY-MM-DD in local time.
 */
export function todayIso(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

/*
 * Identifiers
 */

export function isValidIdentifier(id: string): boolean {
  return id.length > 0 && id.split(".").every((segment) => SEGMENT.test(segment));
}

/**
 * Parent identifier: everything before the last dot, or null at the top.
 */
export function parentOf(id: string): string | null {
  const dot = id.lastIndexOf(".");
  return dot === -1 ? null : id.slice(0, dot);
}

export function lastSegment(id: string): string {
  return id.slice(id.lastIndexOf(".") + 1);
}

/**
 * Sanitize free text into an identifier segment.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 50);
}

/**
 * Human title for an identifier: last segment, words capitalized.
 */
export function formatTitle(id: string): string {
  return lastSegment(id)
    .split(/[-_]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Title of a note: its first `# ` heading, else derived from the id.
 */
export function noteTitle(note: Pick<Note, "id" | "body">): string {
  const match = note.body.match(/^# +(.+?)\s*$/m);
  return match ? match[1] : formatTitle(note.id);
}

/*
 * Paths
 */

export function identifierToPath(
  id: string,
  root: string,
  options: LocateOptions = {},
): string {
  const dir = options.archived ? path.join(root, ARCHIVE_DIR) : root;
  return path.join(dir, id + NOTE_EXT);
}

export function noteExists(vault: Vault, id: string, options: LocateOptions = {}): boolean {
  return fs.existsSync(identifierToPath(id, vault.root, options));
}

/**
 * Identifiers of all notes in the active set, or in archive/.
 */
export function listIdentifiers(vault: Vault, options: LocateOptions = {}): string[] {
  const dir = options.archived ? path.join(vault.root, ARCHIVE_DIR) : vault.root;
  if (!fs.existsSync(dir)) return [];

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(NOTE_EXT))
    .map((entry) => entry.name.slice(0, -NOTE_EXT.length))
    .filter((stem) => !stem.startsWith(".") && !RESERVED_STEMS.has(stem))
    .sort();
}

/*
 * Note files
 */

/**
 * Parse note text. Malformed front-matter is attributed to the id.
 */
export function parseNote(
  id: string,
  content: string,
  filePath: string,
  archived = false,
): Note {
  try {
    const { data, body } = parseFrontmatter(content);
    return { id, path: filePath, archived, frontmatter: data, body };
  } catch (err) {
    if (err instanceof MalformedFrontMatterError) throw err.withSource(id);
    throw err;
  }
}

export function serializeNote(note: Pick<Note, "frontmatter" | "body">): string {
  return renderFrontmatter(note.frontmatter, note.body);
}

/**
 * Read a note by identifier.
 */
export function readNote(vault: Vault, id: string, options: LocateOptions = {}): Note {
  const filePath = identifierToPath(id, vault.root, options);
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(options.archived ? `${ARCHIVE_DIR}/${id}` : id);
  }
  vault.logger.debug({ id, archived: options.archived ?? false }, "reading note");
  return parseNote(id, fs.readFileSync(filePath, "utf-8"), filePath, options.archived);
}

/**
 * Read a note from the active set, falling back to archive/.
 */
export function readAnyNote(vault: Vault, id: string): Note {
  if (noteExists(vault, id)) return readNote(vault, id);
  if (noteExists(vault, id, { archived: true })) {
    return readNote(vault, id, { archived: true });
  }
  throw new NotFoundError(id);
}

export function writeNote(vault: Vault, note: Note): void {
  vault.logger.debug({ id: note.id, path: note.path }, "writing note");
  fs.writeFileSync(note.path, serializeNote(note));
}

/*
 * Templates
 */

export interface TemplateVars {
  name: string;
  parent: string;
  parentTitle: string;
  date: string;
}

function readBundledTemplate(name: string): string {
  return fs.readFileSync(path.join(BUNDLED_TEMPLATES, name + NOTE_EXT), "utf-8");
}

/**
 * Template for a note type: the vault's templates/ copy, else the
 * bundled default.
 */
export function getTemplate(vault: Vault, type: NoteType): string {
  const local = path.join(vault.root, TEMPLATES_DIR, type + NOTE_EXT);
  if (fs.existsSync(local)) return fs.readFileSync(local, "utf-8");
  vault.logger.debug({ type }, "vault template missing, using bundled default");
  return readBundledTemplate(type);
}

export function renderTemplate(template: string, vars: TemplateVars): string {
  const values: Record<string, string> = {
    name: vars.name,
    parent_title: vars.parentTitle,
    parent: vars.parent,
    date: vars.date,
  };
  return template.replace(/\{(name|parent_title|parent|date)\}/g, (_match, key: string) => values[key]);
}

/*
 * Creation
 */

export interface CreateNoteOptions {
  type: NoteType;
  id: string;
  /** Heading; defaults to the last identifier segment */
  name?: string;
  /** Text placed under `## Description` (tasks) or appended */
  description?: string;
  today?: string;
}

export interface CreatedNote {
  note: Note;
  /** Parent whose `## Tasks` section received an entry */
  linkedFrom?: string;
}

function insertDescription(content: string, description: string): string {
  const marker = "## Description\n";
  if (content.includes(marker)) {
    return content.replace(marker, () => `${marker}${description}\n`);
  }
  const trimmed = content.endsWith("\n") ? content : `${content}\n`;
  return `${trimmed}\n${description}\n`;
}

/**
 * Create a note from its type's template.
 *
 * Tasks must sit under an existing parent that has a `## Tasks` section;
 * the section receives a `- [ ]` entry. Both conditions are checked
 * before anything is written.
 */
export function createNote(vault: Vault, options: CreateNoteOptions): CreatedNote {
  const { id, type } = options;
  if (!isValidIdentifier(id)) {
    throw new InvalidIdentifierError(id, "use dot-separated letters, digits, '-' or '_'");
  }

  const filePath = identifierToPath(id, vault.root);
  if (fs.existsSync(filePath)) {
    throw new AlreadyExistsError(id, filePath);
  }

  const parent = parentOf(id);
  if (type === "project" && parent) {
    throw new InvalidIdentifierError(id, "projects are top-level");
  }
  if (type === "task" && !parent) {
    throw new InvalidIdentifierError(id, "tasks are named <project>.<task>");
  }

  const parentNote = parent ? readNote(vault, parent) : undefined;
  if (type === "task" && parentNote && !findSection(parentNote.body, TASKS_HEADING)) {
    throw new MissingSectionError(parentNote.id, TASKS_HEADING);
  }
  const parentTitle = parentNote ? noteTitle(parentNote) : "";

  const name = options.name ?? lastSegment(id);
  let content = renderTemplate(getTemplate(vault, type), {
    name,
    parent: parent ?? "",
    parentTitle,
    date: options.today ?? todayIso(),
  });
  if (options.description) {
    content = insertDescription(content, options.description);
  }

  let note = parseNote(id, content, filePath);
  if (parent && getParent(note.frontmatter) !== parent) {
    note = {
      ...note,
      frontmatter: { ...note.frontmatter, parent },
      body: note.body.replace(/^(# .*\n)/m, (heading: string) => `${heading}\n[< ${parentTitle}](${parent})\n`),
    };
  }

  fs.writeFileSync(filePath, serializeNote(note));
  vault.logger.info({ id, type }, "created note");

  if (type === "task" && parentNote) {
    // Edit the parent's raw text so its front-matter formatting is kept.
    const raw = fs.readFileSync(parentNote.path, "utf-8");
    fs.writeFileSync(parentNote.path, appendTaskEntry(raw, parentNote.id, name, id));
    return { note, linkedFrom: parentNote.id };
  }
  return { note };
}

/*
 * References
 */

/**
 * Bibliography notes under ref/, keyed by citekey (file stem).
 */
export function listReferences(vault: Vault): ReferenceMetadata[] {
  const dir = path.join(vault.root, REF_DIR);
  if (!fs.existsSync(dir)) return [];

  const refs: ReferenceMetadata[] = [];
  for (const file of fs.readdirSync(dir).filter((f) => f.endsWith(NOTE_EXT)).sort()) {
    const citekey = file.slice(0, -NOTE_EXT.length);
    const filePath = path.join(dir, file);
    let note: Note;
    try {
      note = parseNote(citekey, fs.readFileSync(filePath, "utf-8"), filePath);
    } catch (err) {
      if (!(err instanceof MalformedFrontMatterError)) throw err;
      vault.logger.warn({ citekey, reason: err.reason }, "skipping reference");
      continue;
    }

    const data = note.frontmatter;
    const year = Number(getString(data, "year"));
    const authors = data.authors;
    refs.push({
      citekey,
      title: getString(data, "title") ?? noteTitle(note),
      authors: Array.isArray(authors)
        ? authors.filter((a): a is string => typeof a === "string")
        : typeof authors === "string"
          ? [authors]
          : [],
      year: Number.isInteger(year) ? year : undefined,
      journal: getString(data, "journal"),
      doi: getString(data, "doi"),
      tags: getTags(data),
    });
  }
  return refs;
}
