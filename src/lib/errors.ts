/**
 * Error taxonomy for vault operations.
 *
 * Every error names the identifier (or file) it concerns so the CLI can
 * print a one-line diagnostic.
 */

import { ExitCodes, type ExitCode } from "./models.js";

export type ErrorCode =
  | "NOT_FOUND"
  | "AMBIGUOUS"
  | "MALFORMED_FRONTMATTER"
  | "INVALID_STATUS"
  | "INVALID_IDENTIFIER"
  | "ALREADY_EXISTS"
  | "MISSING_SECTION"
  | "CONFIG"
  | "NOT_INITIALIZED";

export abstract class CairnError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: ExitCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Identifier has no corresponding file. */
export class NotFoundError extends CairnError {
  readonly code = "NOT_FOUND";
  readonly exitCode = ExitCodes.DATA_ERROR;

  constructor(
    readonly identifier: string,
    what = "Note",
  ) {
    super(`${what} not found: ${identifier}`);
  }
}

/** A fuzzy query matched several notes equally well. */
export class AmbiguousError extends CairnError {
  readonly code = "AMBIGUOUS";
  readonly exitCode = ExitCodes.USAGE_ERROR;

  constructor(
    readonly query: string,
    readonly matches: string[],
  ) {
    super(`'${query}' is ambiguous: ${matches.join(", ")}`);
  }
}

export class MalformedFrontMatterError extends CairnError {
  readonly code = "MALFORMED_FRONTMATTER";
  readonly exitCode = ExitCodes.DATA_ERROR;

  constructor(
    readonly reason: string,
    readonly source?: string,
  ) {
    super(
      source
        ? `Malformed front-matter in ${source}: ${reason}`
        : `Malformed front-matter: ${reason}`,
    );
  }

  /** Same error, attributed to a file or identifier. */
  withSource(source: string): MalformedFrontMatterError {
    return new MalformedFrontMatterError(this.reason, source);
  }
}

export class InvalidStatusError extends CairnError {
  readonly code = "INVALID_STATUS";
  readonly exitCode = ExitCodes.USAGE_ERROR;

  constructor(
    readonly status: string,
    readonly allowed: readonly string[],
    readonly identifier?: string,
  ) {
    super(
      `Invalid status '${status}'${identifier ? ` for ${identifier}` : ""} (expected one of: ${allowed.join(", ")})`,
    );
  }
}

export class InvalidIdentifierError extends CairnError {
  readonly code = "INVALID_IDENTIFIER";
  readonly exitCode = ExitCodes.USAGE_ERROR;

  constructor(
    readonly identifier: string,
    readonly reason: string,
  ) {
    super(`Invalid name '${identifier}': ${reason}`);
  }
}

export class AlreadyExistsError extends CairnError {
  readonly code = "ALREADY_EXISTS";
  readonly exitCode = ExitCodes.FAILURE;

  constructor(
    readonly identifier: string,
    readonly path: string,
  ) {
    super(`Already exists: ${identifier} (${path})`);
  }
}

/** An expected `## ` heading is absent from a note. */
export class MissingSectionError extends CairnError {
  readonly code = "MISSING_SECTION";
  readonly exitCode = ExitCodes.DATA_ERROR;

  constructor(
    readonly identifier: string,
    readonly section: string,
  ) {
    super(`${identifier} has no '${section}' section`);
  }
}

export class ConfigError extends CairnError {
  readonly code = "CONFIG";
  readonly exitCode = ExitCodes.USAGE_ERROR;

  constructor(
    message: string,
    readonly file?: string,
  ) {
    super(file ? `${file}: ${message}` : message);
  }
}

export class VaultNotInitializedError extends CairnError {
  readonly code = "NOT_INITIALIZED";
  readonly exitCode = ExitCodes.DATA_ERROR;

  constructor(readonly vaultPath: string) {
    super(`No vault at ${vaultPath}. Run "cairn init" first.`);
  }
}

/**
 * Message for any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
