/**
 * Per-note extraction.
 *
 * A fragment is everything that can be learned from one note in isolation:
 * the page it authors, its blocks, their properties, tags and references.
 * Fragments hold names as written; identity is resolved later, across the
 * whole collection.
 */

import { GraphConfig, DEFAULT_CONFIG } from "./config.js";
import { Diagnostic } from "./models.js";
import { parseBlocks } from "./blocks.js";
import {
  Property,
  collectTags,
  hasTrueProperty,
  readFrontMatter,
} from "./properties.js";
import { Reference, extractReferences } from "./links.js";
import { pageNameFromPath } from "./identity.js";

export interface FragmentBlock {
  index: number;
  parent: number | null;
  path: number[];
  depth: number;
  position: number;
  line: number;
  content: string;
  directive: string;
  isHeading: boolean;
  /** Value of the `id::` property, if any */
  declaredId: string | null;
  /** Properties owned by the block (empty for the page-properties block) */
  properties: Property[];
  /** Tags from the block's `tags::` property */
  tags: string[];
  references: Reference[];
}

export interface NoteFragment {
  /** Relative path of the note file */
  file: string;
  /** Page name as derived from the path, before normalization */
  pageTitle: string;
  pageProperties: Property[];
  pageTags: string[];
  isPublic: boolean;
  blocks: FragmentBlock[];
  diagnostics: Diagnostic[];
}

export type FragmentOptions = Pick<
  GraphConfig,
  | "namespaceSeparator"
  | "directives"
  | "markers"
  | "reservedKeys"
  | "indentWidth"
  | "pageDirs"
>;

/**
 * Build the fragment for one note.
 *
 * Never throws for content problems; those become diagnostics.
 */
export function buildFragment(
  file: string,
  source: string,
  options: FragmentOptions = DEFAULT_CONFIG,
): NoteFragment {
  const diagnostics: Diagnostic[] = [];
  const keys = options.reservedKeys;

  let body = source;
  let lineOffset = 0;
  let pageProperties: Property[] = [];
  try {
    const front = readFrontMatter(source);
    body = front.body;
    lineOffset = front.lineOffset;
    pageProperties = front.properties;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    diagnostics.push({
      code: "front-matter",
      file,
      line: 1,
      message: `Front matter ignored: ${message}`,
    });
  }

  const sequence = parseBlocks(body, {
    directives: options.directives,
    markers: options.markers,
    indentWidth: options.indentWidth,
    headingKey: keys.heading,
  });

  const blocks: FragmentBlock[] = [];

  for (const parsed of sequence) {
    for (const problem of parsed.problems) {
      diagnostics.push({
        code: problem.code,
        file,
        line: problem.line + lineOffset,
        message: problem.message,
      });
    }

    const holdsPageProperties =
      parsed.index === 0 &&
      parsed.parent === null &&
      parsed.properties.length > 0 &&
      (parsed.isPreBlock || parsed.isPropertiesOnly);

    if (holdsPageProperties) {
      pageProperties = [...pageProperties, ...parsed.properties];
    }

    const idProperty = parsed.properties.find((prop) => prop.key === keys.id);
    const owned = holdsPageProperties ? [] : parsed.properties;
    const extracted = extractReferences(parsed.scanText);

    for (const span of extracted.unclassified) {
      diagnostics.push({
        code: "unclassified-reference",
        file,
        line: parsed.line + lineOffset,
        message: `Could not classify reference "${span.text}"; kept as text`,
      });
    }

    blocks.push({
      index: parsed.index,
      parent: parsed.parent,
      path: parsed.path,
      depth: parsed.depth,
      position: parsed.position,
      line: parsed.line + lineOffset,
      content: parsed.content,
      directive: parsed.directive,
      isHeading: parsed.isHeading,
      declaredId: idProperty ? idProperty.value : null,
      properties: owned,
      tags: collectTags(owned, keys.tags),
      references: extracted.references,
    });
  }

  return {
    file,
    pageTitle: pageNameFromPath(file, {
      separator: options.namespaceSeparator,
      pageDirs: options.pageDirs,
    }),
    pageProperties,
    pageTags: collectTags(pageProperties, keys.tags),
    isPublic: hasTrueProperty(pageProperties, keys.public),
    blocks,
    diagnostics,
  };
}
