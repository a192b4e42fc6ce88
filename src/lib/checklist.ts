/**
 * Markdown checklists and sections.
 *
 * Parents list their children in a `## Tasks` section:
 *
 *   ## Tasks
 *   - [x] [Write draft](paper.draft)
 *   - [ ] [Submit](archive/paper.submit)
 *
 * The glyph inside the brackets mirrors the child's status. Link targets
 * are identifiers, optionally prefixed with `archive/`.
 */

import { MissingSectionError } from "./errors.js";
import { STATUS_GLYPHS, TASK_STATUSES, type TaskStatus } from "./models.js";

export const TASKS_HEADING = "## Tasks";
export const ARCHIVE_PREFIX = "archive/";

// The tail keeps a trailing \r so CRLF lines are rewritten intact.
const CHECKLIST_LINE = /^(\s*- \[)(.)(\]\s+\[([^\]]*)\]\(([^)\s]+)\)[^\n]*)$/;
const LINK_TARGET = /\]\((archive\/)?([^)\s]+)\)/g;

export interface ChecklistEntry {
  /** Zero-based line index in the text */
  lineIndex: number;
  glyph: string;
  /** Status for the glyph, undefined when the glyph is not recognized */
  status?: TaskStatus;
  title: string;
  /** Link target without any archive/ prefix */
  target: string;
  archived: boolean;
}

export interface Section {
  /** Line index of the heading */
  start: number;
  /** Line index of the next `## ` heading, or the line count */
  end: number;
}

/** The line break a text uses, CRLF when it has any */
export function lineBreak(text: string): "\r\n" | "\n" {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

export function glyphFor(status: TaskStatus): string {
  return STATUS_GLYPHS[status];
}

export function statusForGlyph(glyph: string): TaskStatus | undefined {
  return TASK_STATUSES.find((status) => STATUS_GLYPHS[status] === glyph);
}

/**
 * Locate a `## ` section by its exact heading line.
 */
export function findSection(text: string, heading: string): Section | null {
  const lines = text.split("\n");
  const start = lines.findIndex((line) => line.trim() === heading);
  if (start === -1) return null;

  let end = lines.length;
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].startsWith("## ")) {
      end = i;
      break;
    }
  }
  return { start, end };
}

function splitTarget(link: string): { target: string; archived: boolean } {
  return link.startsWith(ARCHIVE_PREFIX)
    ? { target: link.slice(ARCHIVE_PREFIX.length), archived: true }
    : { target: link, archived: false };
}

/**
 * Every checklist line linking to a note, anywhere in the text.
 */
export function parseChecklist(text: string): ChecklistEntry[] {
  const entries: ChecklistEntry[] = [];
  text.split("\n").forEach((line, lineIndex) => {
    const match = CHECKLIST_LINE.exec(line);
    if (!match) return;
    entries.push({
      lineIndex,
      glyph: match[2],
      status: statusForGlyph(match[2]),
      title: match[4],
      ...splitTarget(match[5]),
    });
  });
  return entries;
}

export interface GlyphUpdate {
  text: string;
  /** A line linking to the target exists */
  found: boolean;
  /** At least one glyph differed and was rewritten */
  changed: boolean;
}

/**
 * Rewrite the glyph of the checklist line(s) linking to target, leaving
 * every other character of the text as it was.
 */
export function setEntryGlyph(text: string, target: string, status: TaskStatus): GlyphUpdate {
  const glyph = glyphFor(status);
  const lines = text.split("\n");
  let found = false;
  let changed = false;

  for (let i = 0; i < lines.length; i++) {
    const match = CHECKLIST_LINE.exec(lines[i]);
    if (!match || splitTarget(match[5]).target !== target) continue;
    found = true;
    if (match[2] !== glyph) {
      lines[i] = `${match[1]}${glyph}${match[3]}`;
      changed = true;
    }
  }

  return { text: changed ? lines.join("\n") : text, found, changed };
}

export function formatEntry(title: string, target: string, status: TaskStatus = "todo"): string {
  return `- [${glyphFor(status)}] [${title}](${target})`;
}

/**
 * Insert a line after the last non-blank line of a section, or return
 * null when the section does not exist. The line takes the text's line
 * break.
 */
export function appendToSection(text: string, heading: string, line: string): string | null {
  const section = findSection(text, heading);
  if (!section) return null;

  const lines = text.split("\n");
  let insertAt = section.start + 1;
  for (let i = section.start + 1; i < section.end; i++) {
    if (lines[i].trim() !== "") insertAt = i + 1;
  }
  lines.splice(insertAt, 0, lineBreak(text) === "\r\n" ? `${line}\r` : line);
  return lines.join("\n");
}

/**
 * Append an entry at the end of owner's `## Tasks` section.
 */
export function appendTaskEntry(
  text: string,
  owner: string,
  title: string,
  target: string,
  status: TaskStatus = "todo",
): string {
  const updated = appendToSection(text, TASKS_HEADING, formatEntry(title, target, status));
  if (updated === null) throw new MissingSectionError(owner, TASKS_HEADING);
  return updated;
}

/**
 * Remove checklist lines linking to target. Returns the removed lines.
 */
export function removeEntries(text: string, target: string): { text: string; removed: ChecklistEntry[] } {
  const removed = parseChecklist(text).filter((entry) => entry.target === target);
  if (removed.length === 0) return { text, removed };

  const drop = new Set(removed.map((entry) => entry.lineIndex));
  const lines = text.split("\n").filter((_, i) => !drop.has(i));
  return { text: lines.join("\n"), removed };
}

/**
 * Rewrite markdown link targets through a mapping of identifiers,
 * keeping any archive/ prefix. `archive` forces the prefix on for the
 * mapped targets.
 */
export function rewriteLinks(
  text: string,
  mapping: ReadonlyMap<string, string>,
  options: { archive?: boolean } = {},
): string {
  return text.replace(LINK_TARGET, (whole, prefix: string | undefined, target: string) => {
    const next = mapping.get(target);
    if (next === undefined) return whole;
    const archived = options.archive || prefix !== undefined;
    return `](${archived ? ARCHIVE_PREFIX : ""}${next})`;
  });
}
