/**
 * Per-invocation state shared by the commands: configuration, logger and
 * the opened vault, built from the global options.
 */

import type { Command } from "commander";
import { loadConfig, type AppConfig } from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { Verbosity } from "../lib/models.js";
import { openVault, type Vault } from "../lib/vault.js";

export type GlobalOptions = {
  vault?: string;
  quiet?: boolean;
  verbose?: boolean;
};

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  quiet: boolean;
}

function effectiveVerbosity(configured: Verbosity, options: GlobalOptions): Verbosity {
  if (options.quiet) return 0;
  if (options.verbose) return 3;
  return configured;
}

export function createContext(command: Command): CommandContext {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig({ vault: options.vault });
  const logger = createLogger({
    verbosity: effectiveVerbosity(config.verbosity, options),
    level: process.env.LOG_LEVEL,
  });
  logger.debug({ vault: config.vaultPath, configFile: config.configFile }, "loaded config");
  return { config, logger, quiet: options.quiet === true };
}

/**
 * Context plus the vault it points at; fails if the vault is not
 * initialized.
 */
export function openContext(command: Command): CommandContext & { vault: Vault } {
  const context = createContext(command);
  return { ...context, vault: openVault(context.config.vaultPath, context.logger) };
}
