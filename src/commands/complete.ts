/**
 * cairn complete - Completion candidates for shell integration.
 *
 * Hidden from help. Prints one candidate per line; an unknown kind or an
 * uninitialized vault prints nothing.
 */

import { Argument, Command } from "commander";
import { complete, COMPLETION_KINDS, isCompletionKind } from "../lib/completion.js";
import { VaultNotInitializedError } from "../lib/errors.js";
import { NoteIndex } from "../lib/hierarchy.js";
import { openContext } from "./shared.js";

function openIfInitialized(command: Command): ReturnType<typeof openContext> | null {
  try {
    return openContext(command);
  } catch (err) {
    if (err instanceof VaultNotInitializedError) return null;
    throw err;
  }
}

export const completeCommand = new Command("complete")
  .description("Print completion candidates")
  .addArgument(new Argument("<kind>", "what to complete").choices(COMPLETION_KINDS))
  .argument("[partial]", "text typed so far", "")
  .argument("[context]", "earlier argument the candidates depend on", "")
  .action((kind: string, partial: string, context: string, _options: unknown, command: Command) => {
    if (!isCompletionKind(kind)) return;
    const opened = openIfInitialized(command);
    if (!opened) return;

    const { vault } = opened;
    for (const candidate of complete(vault, NoteIndex.build(vault), kind, partial, context)) {
      console.log(candidate);
    }
  });
