/**
 * Backlog inbox: capture and triage.
 *
 * backlog.md holds unsorted items as `- <text>` lines under `## Inbox`.
 * Triage decides, per item, to keep it, delete it, or convert it into a
 * task under a project. The file is rewritten once at the end.
 */

import * as fs from "node:fs";
import { appendToSection, lineBreak } from "./checklist.js";
import { CairnError, NotFoundError, errorMessage } from "./errors.js";
import { NoteIndex } from "./hierarchy.js";
import { BACKLOG_NOTE, createNote, identifierToPath, slugify, type CreatedNote, type Vault } from "./vault.js";

export const INBOX_HEADING = "## Inbox";

export interface InboxItem {
  /** Zero-based line index in backlog.md */
  lineIndex: number;
  text: string;
}

export type Disposition =
  | { action: "keep" }
  | { action: "delete" }
  | { action: "convert"; project: string; taskName: string };

export type Decision = Disposition | { action: "quit" };

/**
 * Items listed under `## Inbox`, up to the next `## ` heading.
 */
export function parseInbox(text: string): InboxItem[] {
  const items: InboxItem[] = [];
  const lines = text.split("\n");
  const start = lines.findIndex((line) => line.trim() === INBOX_HEADING);
  if (start === -1) return items;

  for (let i = start + 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith("## ")) break;
    const trimmed = line.trim();
    if (!trimmed.startsWith("- ")) continue;
    const itemText = trimmed.slice(2).trim();
    if (itemText) items.push({ lineIndex: i, text: itemText });
  }
  return items;
}

/**
 * Rebuild backlog text after triage.
 *
 * Deleted and converted items disappear. Kept items, and items without a
 * disposition, are listed directly under the heading in their original
 * order. A missing heading is appended first. Line breaks follow the
 * text's own.
 */
export function applyDispositions(
  text: string,
  dispositions: ReadonlyMap<number, Disposition>,
): string {
  const items = parseInbox(text);
  const kept = items.filter((item) => {
    const disposition = dispositions.get(item.lineIndex);
    return disposition === undefined || disposition.action === "keep";
  });

  const eol = lineBreak(text);
  const cr = eol === "\r\n" ? "\r" : "";
  const drop = new Set(items.map((item) => item.lineIndex));
  const lines = text.split("\n").filter((_, i) => !drop.has(i));

  if (kept.length > 0) {
    let heading = lines.findIndex((line) => line.trim() === INBOX_HEADING);
    if (heading === -1) {
      if (lines[lines.length - 1] === "") lines.pop();
      lines.push(`${INBOX_HEADING}${cr}`);
      heading = lines.length - 1;
    }
    lines.splice(heading + 1, 0, ...kept.map((item) => `- ${item.text}${cr}`));
  }

  const result = lines.join("\n");
  return result.endsWith("\n") ? result : `${result}${eol}`;
}

export interface ConvertOptions {
  project: string;
  taskName: string;
  text: string;
  today?: string;
}

/**
 * Create `<project>.<taskName>` with the item text as its description
 * and list it in the project's `## Tasks`.
 */
export function createTaskFromItem(vault: Vault, options: ConvertOptions): CreatedNote {
  return createNote(vault, {
    type: "task",
    id: `${options.project}.${options.taskName}`,
    name: options.taskName,
    description: options.text,
    today: options.today,
  });
}

/** Default task name for an inbox item */
export function suggestTaskName(text: string): string {
  return slugify(text);
}

function backlogPath(vault: Vault): string {
  const file = identifierToPath(BACKLOG_NOTE, vault.root);
  if (!fs.existsSync(file)) throw new NotFoundError(BACKLOG_NOTE, "Backlog");
  return file;
}

/**
 * Append an item to the end of the inbox. Whitespace runs, line breaks
 * included, become single spaces so the item stays on one line. Returns
 * the line written.
 */
export function addToInbox(vault: Vault, text: string): string {
  const item = text.replace(/\s+/g, " ").trim();

  const file = backlogPath(vault);
  const raw = fs.readFileSync(file, "utf-8");
  const line = `- ${item}`;

  let next = appendToSection(raw, INBOX_HEADING, line);
  if (next === null) {
    const eol = lineBreak(raw);
    const base = raw === "" || raw.endsWith("\n") ? raw : `${raw}${eol}`;
    next = `${base}${eol}${INBOX_HEADING}${eol}${line}${eol}`;
  }
  fs.writeFileSync(file, next);
  vault.logger.info({ text: item }, "added to inbox");
  return line;
}

/*
 * Interactive session
 */

export interface TriageContext {
  /** Position of the item, from 1 */
  position: number;
  total: number;
  /** Top-level projects available for conversion */
  projects: string[];
}

export type Decide = (item: InboxItem, context: TriageContext) => Promise<Decision>;

export interface TriageHooks {
  onConverted?: (item: InboxItem, created: CreatedNote) => void;
  /** A conversion failed; the same item is asked again */
  onConvertError?: (item: InboxItem, error: CairnError) => void;
}

export interface ProcessedItem {
  item: InboxItem;
  action: Disposition["action"];
  /** Identifier of the created task, for conversions */
  created?: string;
}

export interface TriageReport {
  processed: ProcessedItem[];
  /** Items left in the inbox without a decision */
  remaining: InboxItem[];
  /** The user quit or the session was interrupted */
  stopped: boolean;
  /** What interrupted the session, if anything */
  error?: unknown;
  /** backlog.md was rewritten */
  written: boolean;
}

/**
 * Walk the inbox, asking `decide` about each item.
 *
 * Quitting, or an unexpected error from `decide` or from a conversion,
 * stops the session and leaves the rest of the inbox untouched. Whatever
 * was decided so far is written back, so converted items never linger in
 * the inbox.
 */
export async function triageBacklog(
  vault: Vault,
  decide: Decide,
  hooks: TriageHooks = {},
  options: { today?: string } = {},
): Promise<TriageReport> {
  const file = backlogPath(vault);
  const raw = fs.readFileSync(file, "utf-8");
  const items = parseInbox(raw);
  const projects = NoteIndex.build(vault).projects();

  const dispositions = new Map<number, Disposition>();
  const processed: ProcessedItem[] = [];
  let stopped = false;
  let error: unknown;

  session: for (const [index, item] of items.entries()) {
    const context = { position: index + 1, total: items.length, projects };

    for (;;) {
      let decision: Decision;
      try {
        decision = await decide(item, context);
      } catch (err) {
        vault.logger.warn({ item: item.text, error: errorMessage(err) }, "triage interrupted");
        error = err;
        stopped = true;
        break session;
      }

      if (decision.action === "quit") {
        stopped = true;
        break session;
      }

      if (decision.action === "convert") {
        let created: CreatedNote;
        try {
          created = createTaskFromItem(vault, {
            project: decision.project,
            taskName: decision.taskName,
            text: item.text,
            today: options.today,
          });
        } catch (err) {
          if (!(err instanceof CairnError)) {
            vault.logger.error({ item: item.text, error: errorMessage(err) }, "conversion failed, stopping");
            error = err;
            stopped = true;
            break session;
          }
          vault.logger.debug({ item: item.text, code: err.code }, "conversion failed");
          hooks.onConvertError?.(item, err);
          continue;
        }
        processed.push({ item, action: "convert", created: created.note.id });
        hooks.onConverted?.(item, created);
      } else {
        processed.push({ item, action: decision.action });
      }

      dispositions.set(item.lineIndex, decision);
      break;
    }
  }

  const written = dispositions.size > 0;
  if (written) {
    fs.writeFileSync(file, applyDispositions(raw, dispositions));
    vault.logger.info({ processed: processed.length }, "backlog updated");
  }

  return {
    processed,
    remaining: items.filter((item) => !dispositions.has(item.lineIndex)),
    stopped,
    error,
    written,
  };
}
