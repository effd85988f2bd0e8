/**
 * Property and tag extraction.
 *
 * Properties are written one per line as `key:: value`. Keys are page
 * identities, so they go through the same normalization as page names.
 */

import matter from "gray-matter";

/** Values read as true for boolean-ish properties */
export const TRUE_VALUES: readonly string[] = ["true", "1", "yes", "on", "enabled"];

const PROPERTY_REGEX = /^([^\s:][^:]*?)::(?:\s+(.*))?$/;

/**
 * A `key:: value` pair as it appeared in the note.
 */
export interface Property {
  /** Key as written */
  field: string;
  /** Key in page-identifier form */
  key: string;
  value: string;
  /** One-based source line, when known */
  line?: number;
}

/**
 * Normalize a property key to page-identifier form.
 */
export function normalizeKey(field: string): string {
  return field.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Parse a single line as a property. Returns null for anything else.
 */
export function parsePropertyLine(text: string): Property | null {
  const match = PROPERTY_REGEX.exec(text.trim());
  if (!match) {
    return null;
  }

  const field = match[1].trim();
  if (field === "") {
    return null;
  }

  return {
    field,
    key: normalizeKey(field),
    value: (match[2] ?? "").trim(),
  };
}

export function isTruthy(value: string): boolean {
  return TRUE_VALUES.includes(value.trim().toLowerCase());
}

/**
 * Split a tag list value (`a, [[b c]], #d`) into tag names as written.
 */
export function splitTagList(value: string): string[] {
  const tags: string[] = [];
  // Commas inside [[...]] belong to the page name
  const entries = value.match(/(?:\[\[[^\]]*\]\]|[^,])+/g) ?? [];

  for (const entry of entries) {
    let tag = entry.trim();
    if (tag.startsWith("#")) {
      tag = tag.slice(1);
    }
    const bracketed = /^\[\[(.*)\]\]$/.exec(tag);
    if (bracketed) {
      tag = bracketed[1];
    }
    tag = tag.trim();
    if (tag !== "") {
      tags.push(tag);
    }
  }

  return tags;
}

/**
 * Collect the tag names declared by `tags::` properties.
 */
export function collectTags(properties: Property[], tagsKey: string): string[] {
  return properties
    .filter((prop) => prop.key === tagsKey)
    .flatMap((prop) => splitTagList(prop.value));
}

/**
 * Whether any property with this key has a true value.
 */
export function hasTrueProperty(properties: Property[], key: string): boolean {
  return properties.some((prop) => prop.key === key && isTruthy(prop.value));
}

function stringifyValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (Array.isArray(value)) {
    return value.map(stringifyValue).join(", ");
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Result of separating YAML front matter from a note.
 */
export interface FrontMatter {
  properties: Property[];
  body: string;
  /** Number of source lines the front matter occupied */
  lineOffset: number;
}

const FRONT_MATTER_DELIMITER = "---";

/**
 * Whether the note opens with a `---` line that a later `---` line closes.
 * A lone `---` is a horizontal rule.
 */
function hasFrontMatter(source: string): boolean {
  const lines = source.split(/\r?\n/);
  return (
    lines[0].trimEnd() === FRONT_MATTER_DELIMITER &&
    lines.slice(1).some((line) => line.trimEnd() === FRONT_MATTER_DELIMITER)
  );
}

/**
 * Split optional YAML front matter from a note and read it as page
 * properties. Throws if the front matter is not a valid YAML mapping.
 */
export function readFrontMatter(source: string): FrontMatter {
  if (!hasFrontMatter(source)) {
    return { properties: [], body: source, lineOffset: 0 };
  }

  const parsed = matter(source);
  const data: unknown = parsed.data;
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("front matter is not a key/value mapping");
  }
  const properties: Property[] = [];

  for (const [field, value] of Object.entries(data)) {
    if (value === null || value === undefined) {
      continue;
    }
    properties.push({
      field,
      key: normalizeKey(field),
      value: stringifyValue(value),
    });
  }

  const lineOffset =
    source.split("\n").length - parsed.content.split("\n").length;

  return { properties, body: parsed.content, lineOffset };
}
