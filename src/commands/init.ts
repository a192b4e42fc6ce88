/**
 * cairn init - Create the vault skeleton.
 */

import { Command } from "commander";
import * as path from "node:path";
import { setConfigValue } from "../lib/config.js";
import { dim, success } from "../lib/ui.js";
import { initVault } from "../lib/vault.js";
import { createContext } from "./shared.js";

export const initCommand = new Command("init")
  .description("Create a vault with templates, archive/, ref/, root.md and backlog.md")
  .argument("[path]", "vault directory (defaults to the configured vault)")
  .option("--no-save", "do not record the vault in the config file")
  .action((target: string | undefined, options: { save: boolean }, command: Command) => {
    const { config, logger, quiet } = createContext(command);
    const root = path.resolve(target ?? config.vaultPath);

    const created = initVault(root);
    logger.info({ root, created: created.length }, "initialized vault");

    if (options.save) {
      setConfigValue(config.configFile, "vault", root);
    }

    if (quiet) return;
    console.log(
      success(
        created.length > 0
          ? `Initialized vault at ${root}`
          : `Vault already initialized at ${root}`,
      ),
    );
    for (const file of created) {
      console.log(dim(`  ${path.relative(root, file)}`));
    }
    if (options.save) {
      console.log(dim(`Recorded in ${config.configFile}`));
    }
  });
