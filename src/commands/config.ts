/**
 * cairn config - Show or change the configuration file.
 */

import { Command } from "commander";
import { CONFIG_KEYS, setConfigValue } from "../lib/config.js";
import { dim, success } from "../lib/ui.js";
import { createContext } from "./shared.js";

const showCommand = new Command("show")
  .description("Show the effective configuration")
  .action((_options: unknown, command: Command) => {
    const { config } = createContext(command);
    console.log(`vault = ${config.vaultPath}`);
    console.log(`verbosity = ${config.verbosity}`);
    console.log(dim(`# ${config.configFile}`));
  });

const setCommand = new Command("set")
  .description(`Set a value (${CONFIG_KEYS.join(", ")})`)
  .argument("<key>", "configuration key")
  .argument("<value>", "new value")
  .action((key: string, value: string, _options: unknown, command: Command) => {
    const { config, quiet } = createContext(command);
    const saved = setConfigValue(config.configFile, key, value);
    if (!quiet) {
      console.log(success(`${key} = ${String(saved[key])}`));
    }
  });

export const configCommand = new Command("config")
  .description("Show or change configuration")
  .addCommand(showCommand)
  .addCommand(setCommand);
