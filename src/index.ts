/**
 * cairn - projects, tasks and notes as markdown files in a vault.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models and errors
export * from "./lib/models.js";
export * from "./lib/errors.js";

// Re-export the front-matter codec
export {
  parseFrontmatter,
  renderFrontmatter,
  getString,
  getNoteType,
  getParent,
  getStatusField,
  getTags,
} from "./lib/frontmatter.js";

// Re-export vault storage
export {
  openVault,
  initVault,
  identifierToPath,
  isValidIdentifier,
  parentOf,
  slugify,
  formatTitle,
  noteTitle,
  listIdentifiers,
  readNote,
  readAnyNote,
  writeNote,
  createNote,
  renderTemplate,
  listReferences,
  ROOT_NOTE,
  BACKLOG_NOTE,
  ARCHIVE_DIR,
} from "./lib/vault.js";
export type { Vault, CreateNoteOptions, CreatedNote } from "./lib/vault.js";

// Re-export hierarchy, matching and task state
export { NoteIndex, checkVault, effectiveParent, normalizeStatus } from "./lib/hierarchy.js";
export type { VaultIssue, IssueKind } from "./lib/hierarchy.js";
export { score, resolve, rankMatches, resolveNote } from "./lib/fuzzy.js";
export type { Candidate, Match, Resolution } from "./lib/fuzzy.js";
export { glyphFor, statusForGlyph, parseChecklist, setEntryGlyph } from "./lib/checklist.js";
export { setStatus, syncParentCheckbox, parseStatus } from "./lib/tasks.js";
export type { SyncResult, StatusChange } from "./lib/tasks.js";

// Re-export backlog triage and refactoring
export {
  parseInbox,
  applyDispositions,
  createTaskFromItem,
  triageBacklog,
  addToInbox,
} from "./lib/backlog.js";
export type { Disposition, Decision, InboxItem, TriageReport } from "./lib/backlog.js";
export { renameNote, archiveNote, groupTasks } from "./lib/refactor.js";
export type { GroupResult, Move, RefactorResult } from "./lib/refactor.js";

// Re-export configuration and logging
export { loadConfig, saveConfig, setConfigValue, configFilePath } from "./lib/config.js";
export type { AppConfig } from "./lib/config.js";
export { createLogger, silentLogger } from "./lib/logger.js";
