import chalk from "chalk";
import { STATUS_GLYPHS, type NoteKind, type TaskStatus } from "./models.js";

export function success(message: string): string {
  return `${chalk.green("✓")} ${message}`;
}

export function error(message: string): string {
  return `${chalk.red("✗")} ${message}`;
}

export function warning(message: string): string {
  return `${chalk.yellow("⚠")} ${message}`;
}

export function info(message: string): string {
  return `${chalk.blue("ℹ")} ${message}`;
}

export function heading(message: string): string {
  return chalk.bold.cyan(message);
}

export function dim(message: string): string {
  return chalk.dim(message);
}

/**
 * Checkbox for a status, colored by how settled the task is.
 */
export function checkbox(status: TaskStatus | undefined): string {
  if (!status) return chalk.dim("[?]");
  const box = `[${STATUS_GLYPHS[status]}]`;
  switch (status) {
    case "done":
      return chalk.green(box);
    case "doing":
      return chalk.yellow(box);
    case "blocked":
      return chalk.red(box);
    case "dropped":
      return chalk.dim(box);
    case "todo":
      return box;
  }
}

export function kindLabel(kind: NoteKind): string {
  switch (kind) {
    case "project":
      return chalk.magenta(kind);
    case "group":
      return chalk.cyan(kind);
    default:
      return chalk.dim(kind);
  }
}
