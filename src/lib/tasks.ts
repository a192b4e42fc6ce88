/**
 * Task status changes and their propagation to the parent checklist.
 */

import * as fs from "node:fs";
import { setEntryGlyph } from "./checklist.js";
import { InvalidStatusError } from "./errors.js";
import { effectiveParent, normalizeStatus } from "./hierarchy.js";
import { getStatusField } from "./frontmatter.js";
import { STATUS_ALIASES, TASK_STATUSES, type Note, type TaskStatus } from "./models.js";
import { identifierToPath, readAnyNote, todayIso, writeNote, type Vault } from "./vault.js";

/** Every value `mark` accepts, aliases included */
export const ACCEPTED_STATUSES: readonly string[] = [
  ...TASK_STATUSES,
  ...Object.keys(STATUS_ALIASES),
];

/**
 * Canonical status for user input, or InvalidStatusError.
 */
export function parseStatus(value: string, id?: string): TaskStatus {
  const status = normalizeStatus(value);
  if (!status) throw new InvalidStatusError(value, ACCEPTED_STATUSES, id);
  return status;
}

export type SyncResult =
  | { outcome: "no-parent" }
  | { outcome: "parent-missing"; parent: string }
  | { outcome: "no-entry"; parent: string }
  | { outcome: "unchanged"; parent: string }
  | { outcome: "updated"; parent: string; path: string };

/**
 * Mirror a note's status in its parent's checklist.
 *
 * Only the glyph character of the matching line changes. A missing
 * parent or a parent without a matching line is tolerated and reported
 * in the result. Grandparents are never touched.
 */
export function syncParentCheckbox(vault: Vault, id: string, status?: TaskStatus): SyncResult {
  const note = readAnyNote(vault, id);
  const parent = effectiveParent(note);
  if (!parent) return { outcome: "no-parent" };

  const current = status ?? parseStatus(getStatusField(note.frontmatter) ?? "", id);

  const parentPath = [false, true]
    .map((archived) => identifierToPath(parent, vault.root, { archived }))
    .find((candidate) => fs.existsSync(candidate));
  if (!parentPath) {
    vault.logger.warn({ id, parent }, "parent note not found, checklist not updated");
    return { outcome: "parent-missing", parent };
  }

  const raw = fs.readFileSync(parentPath, "utf-8");
  const update = setEntryGlyph(raw, id, current);
  if (!update.found) {
    vault.logger.warn({ id, parent }, "no checklist entry in parent");
    return { outcome: "no-entry", parent };
  }
  if (!update.changed) return { outcome: "unchanged", parent };

  fs.writeFileSync(parentPath, update.text);
  vault.logger.info({ id, parent, status: current }, "updated parent checklist");
  return { outcome: "updated", parent, path: parentPath };
}

export interface SetStatusOptions {
  /** Date written to `modified`, YYYY-MM-DD */
  today?: string;
}

export interface StatusChange {
  note: Note;
  previous?: string;
  status: TaskStatus;
  sync: SyncResult;
}

/**
 * Set a note's status and modified date, then sync the parent checklist.
 * The note is looked up in the active set, then in archive/.
 */
export function setStatus(
  vault: Vault,
  id: string,
  value: string,
  options: SetStatusOptions = {},
): StatusChange {
  const status = parseStatus(value, id);
  const note = readAnyNote(vault, id);
  const previous = getStatusField(note.frontmatter);

  const updated: Note = {
    ...note,
    frontmatter: {
      ...note.frontmatter,
      status,
      modified: options.today ?? todayIso(),
    },
  };
  writeNote(vault, updated);
  vault.logger.info({ id, from: previous, to: status }, "status changed");

  return { note: updated, previous, status, sync: syncParentCheckbox(vault, id, status) };
}
