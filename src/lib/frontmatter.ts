/**
 * Front-matter codec.
 *
 * Splits a note into its YAML metadata block and markdown body, and
 * renders them back. YAML is read and written with the core schema, so
 * dates such as `2024-05-01` stay strings instead of becoming Date
 * objects, and key order is kept as inserted.
 */

import matter from "gray-matter";
import * as yaml from "js-yaml";
import { MalformedFrontMatterError } from "./errors.js";
import {
  NOTE_TYPES,
  type Frontmatter,
  type FrontmatterValue,
  type NoteType,
} from "./models.js";

const DELIMITER = "---";
const OPENING = /^---\r?\n/;

export interface FrontmatterParseResult {
  data: Frontmatter;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFrontmatterValue(value: unknown): value is FrontmatterValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) return value.every(isFrontmatterValue);
      return Object.values(value).every(isFrontmatterValue);
    default:
      return false;
  }
}

function toFrontmatter(value: unknown): Frontmatter {
  if (value === null || value === undefined) return {};
  if (!isRecord(value)) {
    throw new MalformedFrontMatterError("expected key-value pairs");
  }
  const data: Frontmatter = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isFrontmatterValue(entry)) {
      throw new MalformedFrontMatterError(`unsupported value for '${key}'`);
    }
    data[key] = entry;
  }
  return data;
}

function loadYaml(input: string): Frontmatter {
  try {
    return toFrontmatter(yaml.load(input, { schema: yaml.CORE_SCHEMA }));
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new MalformedFrontMatterError(err.reason || err.message);
    }
    throw err;
  }
}

function dumpYaml(data: Frontmatter): string {
  return yaml.dump(data, {
    schema: yaml.CORE_SCHEMA,
    noRefs: true,
    lineWidth: -1,
    sortKeys: false,
  });
}

const MATTER_OPTIONS = {
  engines: {
    yaml: {
      parse: (input: string): object => loadYaml(input),
      stringify: (data: object): string => dumpYaml(toFrontmatter(data)),
    },
  },
};

/**
 * Parse a note into metadata and body.
 *
 * Text without an opening `---` line has no metadata: the whole text is
 * the body. An unterminated block or one that is not a YAML mapping
 * throws MalformedFrontMatterError.
 */
export function parseFrontmatter(text: string): FrontmatterParseResult {
  if (!OPENING.test(text)) {
    return { data: {}, body: text };
  }
  if (text.indexOf(`\n${DELIMITER}`, DELIMITER.length) === -1) {
    throw new MalformedFrontMatterError("missing closing '---'");
  }

  // Passing options also bypasses gray-matter's shared parse cache.
  const file = matter(text, MATTER_OPTIONS);
  return { data: toFrontmatter(file.data), body: file.content };
}

/**
 * Render metadata and body back into note text. The body is appended
 * verbatim after the closing delimiter.
 */
export function renderFrontmatter(data: Frontmatter, body: string): string {
  const block = Object.keys(data).length > 0 ? dumpYaml(data) : "";
  return `${DELIMITER}\n${block}${DELIMITER}\n${body}`;
}

/*
 * Typed accessors for recognized keys. Absent or ill-typed values read
 * as undefined; unrecognized keys are left alone.
 */

export function getString(data: Frontmatter, key: string): string | undefined {
  const value = data[key];
  if (typeof value === "string") return value.trim() === "" ? undefined : value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export function getNoteType(data: Frontmatter): NoteType | undefined {
  const value = getString(data, "type");
  return NOTE_TYPES.find((type) => type === value);
}

export function getParent(data: Frontmatter): string | undefined {
  return getString(data, "parent");
}

export function getStatusField(data: Frontmatter): string | undefined {
  return getString(data, "status");
}

export function getTags(data: Frontmatter): string[] {
  const value = data.tags;
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((tag): tag is string => typeof tag === "string");
}
