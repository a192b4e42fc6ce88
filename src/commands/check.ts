/**
 * cairn check - Validate the vault.
 *
 * Exits with DATA_ERROR when any issue is found, so it can run as a
 * pre-commit hook.
 */

import { Command } from "commander";
import { checkVault, NoteIndex, type VaultIssue } from "../lib/hierarchy.js";
import { ExitCodes } from "../lib/models.js";
import { dim, success, warning } from "../lib/ui.js";
import { openContext } from "./shared.js";

function formatIssue(issue: VaultIssue): string {
  return warning(`${issue.id}: ${issue.message} ${dim(`[${issue.kind}]`)}`);
}

export const checkCommand = new Command("check")
  .description("Check parent fields, statuses and checklists for consistency")
  .option("-a, --archived", "also load archived notes")
  .action((options: { archived?: boolean }, command: Command) => {
    const { vault, quiet } = openContext(command);
    const issues = checkVault(NoteIndex.build(vault, { archived: options.archived }));

    if (issues.length === 0) {
      if (!quiet) console.log(success("Vault is consistent"));
      return;
    }

    for (const issue of issues) console.log(formatIssue(issue));
    if (!quiet) console.log(`\n${issues.length} issue${issues.length === 1 ? "" : "s"} found`);
    process.exitCode = ExitCodes.DATA_ERROR;
  });
