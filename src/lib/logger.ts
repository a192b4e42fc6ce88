import { pino, type DestinationStream, type Level, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";
import type { Verbosity } from "./models.js";

export type { Logger } from "pino";

const LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

const VERBOSITY_LEVELS: Record<Verbosity, Level> = {
  0: "error",
  1: "warn",
  2: "info",
  3: "debug",
};

export interface LoggerOptions {
  verbosity: Verbosity;
  /** LOG_LEVEL-style override; ignored unless it names a pino level */
  level?: string;
  /** Defaults to a pretty, synchronous stream on stderr */
  destination?: DestinationStream;
  colorize?: boolean;
}

/**
 * Resolve the log level, in order of preference:
 * 1. Explicit level (LOG_LEVEL)
 * 2. Verbosity from config and flags
 */
export function levelFor(verbosity: Verbosity, override?: string): Level {
  const explicit = LEVELS.find((level) => level === override);
  return explicit ?? VERBOSITY_LEVELS[verbosity];
}

/**
 * Create the process logger. Writes are synchronous so nothing is lost
 * when a command exits right after logging.
 */
export function createLogger(options: LoggerOptions): Logger {
  const destination =
    options.destination ??
    PinoPretty({
      destination: 2,
      sync: true,
      colorize: options.colorize ?? process.stderr.isTTY === true,
      ignore: "pid,hostname",
      translateTime: "SYS:HH:MM:ss",
    });

  return pino({ level: levelFor(options.verbosity, options.level) }, destination);
}

/**
 * Logger that drops everything; used where no output is wanted.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
