/**
 * Process-wide configuration.
 *
 * Built once at startup from the environment and the user's config file
 * and passed down explicitly. Resolution order for the vault:
 * 1. --vault flag
 * 2. CAIRN_VAULT environment variable
 * 3. `vault` in $XDG_CONFIG_HOME/cairn/config.toml (or ~/.config/cairn)
 * 4. current directory
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as toml from "toml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import type { Verbosity } from "./models.js";

export const CONFIG_FILE = "config.toml";
export const APP_DIR = "cairn";
export const DEFAULT_VERBOSITY: Verbosity = 1;

const verbositySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
]);

const fileSchema = z
  .object({
    vault: z.string().min(1).optional(),
    verbosity: verbositySchema.optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof fileSchema>;

/** Keys accepted by `cairn config set`. */
export const CONFIG_KEYS = ["vault", "verbosity"] as const;

export interface AppConfig {
  /** Absolute vault root */
  readonly vaultPath: string;
  readonly verbosity: Verbosity;
  /** Absolute path of the config file, whether or not it exists */
  readonly configFile: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Explicit vault from the command line */
  vault?: string;
}

/**
 * Location of the config file for the given environment.
 */
export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), ".config");
  return path.join(base, APP_DIR, CONFIG_FILE);
}

/**
 * Read and validate the config file. A missing file is an empty config.
 */
export function readConfigFile(file: string): ConfigFile {
  if (!fs.existsSync(file)) return {};

  let raw: unknown;
  try {
    raw = toml.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigError(`invalid TOML: ${errorMessage(err)}`, file);
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join(".") || "config"}: ${issue.message}`, file);
  }
  return parsed.data;
}

function parseVerbosity(value: string, source: string): Verbosity {
  const parsed = verbositySchema.safeParse(Number(value));
  if (!parsed.success) {
    throw new ConfigError(`verbosity must be 0-3, got '${value}'`, source);
  }
  return parsed.data;
}

/**
 * Build the configuration for this process.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configFile = configFilePath(env);
  const file = readConfigFile(configFile);

  const vault = options.vault || env.CAIRN_VAULT || file.vault || cwd;
  const verbosity = env.CAIRN_VERBOSITY
    ? parseVerbosity(env.CAIRN_VERBOSITY, "CAIRN_VERBOSITY")
    : (file.verbosity ?? DEFAULT_VERBOSITY);

  return Object.freeze({
    vaultPath: path.resolve(cwd, vault),
    verbosity,
    configFile,
  });
}

/**
 * Write the config file, keeping keys this version does not know about
 * only if they are simple scalars.
 */
export function saveConfig(file: string, config: ConfigFile): void {
  const lines = ["# cairn configuration"];
  for (const [key, value] of Object.entries(config)) {
    if (typeof value === "string") {
      // JSON string escapes are valid TOML basic-string escapes.
      lines.push(`${key} = ${JSON.stringify(value)}`);
    } else if (typeof value === "number" || typeof value === "boolean") {
      lines.push(`${key} = ${value}`);
    }
  }
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `${lines.join("\n")}\n`);
}

/**
 * Set one key in the config file, validating the value.
 */
export function setConfigValue(file: string, key: string, value: string): ConfigFile {
  const current = readConfigFile(file);
  let next: ConfigFile;

  switch (key) {
    case "vault":
      next = { ...current, vault: path.resolve(value) };
      break;
    case "verbosity":
      next = { ...current, verbosity: parseVerbosity(value, file) };
      break;
    default:
      throw new ConfigError(
        `unknown key '${key}' (expected one of: ${CONFIG_KEYS.join(", ")})`,
      );
  }

  saveConfig(file, next);
  return next;
}
