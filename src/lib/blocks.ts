/**
 * Block parsing for outline notes.
 *
 * A note is a list of `- ` bullets nested by indentation. Lines that do not
 * open a bullet continue the current block; lines before the first bullet
 * form the pre-block, which holds the page's properties section.
 *
 * Parsing never fails on content: anything it cannot interpret stays in the
 * block as plain text and is reported as a problem on that block.
 */

import { DEFAULT_DIRECTIVES, DEFAULT_MARKERS } from "./config.js";
import { Property, hasTrueProperty, parsePropertyLine } from "./properties.js";

const BULLET_REGEX = /^-(?:[ \t]|$)/;
const CODE_FENCE = "```";
const DIRECTIVE_OPEN_REGEX = /^#\+BEGIN_([A-Za-z0-9_-]+)/;
const DIRECTIVE_CLOSE_REGEX = /^#\+END_([A-Za-z0-9_-]+)/;
const ATX_HEADING_REGEX = /^#{1,6}\s/;
const MARKER_REGEX = /^([A-Z][A-Z-]*)(?:\s+|$)/;

/** Wrappers whose body is literal text, never scanned for references */
const VERBATIM_DIRECTIVES: ReadonlySet<string> = new Set([
  "SRC",
  "EXAMPLE",
  "EXPORT",
]);

export interface ParseOptions {
  /** `#+BEGIN_X` wrapper names */
  directives?: Iterable<string>;
  /** Task markers read from the start of a block */
  markers?: Iterable<string>;
  /** Spaces counted as one indentation level */
  indentWidth?: number;
  /** Normalized key of the heading property */
  headingKey?: string;
}

export type BlockProblemCode =
  | "unclosed-code-fence"
  | "unclosed-directive"
  | "unknown-directive";

export interface BlockProblem {
  code: BlockProblemCode;
  line: number;
  message: string;
}

export interface ParsedBlock {
  /** Index in the note's block sequence */
  index: number;
  /** Index of the parent block, or null for roots */
  parent: number | null;
  /** Positions from the root down to this block */
  path: number[];
  depth: number;
  position: number;
  /** One-based line the block starts on */
  line: number;
  content: string;
  /** Content with fenced code blanked out, for reference scanning */
  scanText: string;
  directive: string;
  isHeading: boolean;
  properties: Property[];
  /** Lines before the first bullet */
  isPreBlock: boolean;
  /** Every non-blank line is a property */
  isPropertiesOnly: boolean;
  problems: BlockProblem[];
}

interface SourceLine {
  text: string;
  line: number;
}

interface RawBlock {
  index: number;
  parent: number | null;
  path: number[];
  depth: number;
  position: number;
  isPreBlock: boolean;
  lines: SourceLine[];
}

interface OpenBlock {
  level: number;
  index: number;
  depth: number;
  path: number[];
  children: number;
}

/**
 * Count indentation levels: one per tab, one per `indentWidth` spaces.
 */
export function indentLevel(line: string, indentWidth = 2): number {
  let tabs = 0;
  let spaces = 0;
  for (const ch of line) {
    if (ch === "\t") {
      tabs++;
    } else if (ch === " ") {
      spaces++;
    } else {
      break;
    }
  }
  return tabs + Math.floor(spaces / Math.max(1, indentWidth));
}

function leadingWhitespace(line: string): string {
  const match = /^[\t ]*/.exec(line);
  return match ? match[0] : "";
}

/**
 * Strip a continuation line down to its text relative to the block.
 */
function continuationText(line: string, blockIndent: string): string {
  let text = line;
  if (text.startsWith(blockIndent)) {
    text = text.slice(blockIndent.length);
    if (text.startsWith("  ")) {
      text = text.slice(2);
    } else if (text.startsWith(" ")) {
      text = text.slice(1);
    }
    return text;
  }
  return text.replace(/^[\t ]+/, "");
}

/**
 * Turn a raw block's lines into a parsed block.
 */
function interpretBlock(
  raw: RawBlock,
  directives: ReadonlySet<string>,
  markers: ReadonlySet<string>,
  headingKey: string,
): ParsedBlock {
  const problems: BlockProblem[] = [];
  const properties: Property[] = [];
  const kept: Array<{ text: string; scan: string } | null> = [];

  let inCode = false;
  let codeStart = 0;
  let inPropertyZone = true;
  let open: { name: string; at: number; line: number } | null = null;
  let directive = "";
  const verbatim: number[] = [];

  for (const [i, { text, line }] of raw.lines.entries()) {
    const trimmed = text.trim();

    if (open !== null && VERBATIM_DIRECTIVES.has(open.name)) {
      const closer = DIRECTIVE_CLOSE_REGEX.exec(trimmed);
      if (!closer || closer[1].toUpperCase() !== open.name) {
        verbatim.push(kept.length);
        kept.push({ text, scan: "" });
        continue;
      }
    }

    if (trimmed.startsWith(CODE_FENCE)) {
      if (!inCode) {
        codeStart = line;
      }
      inCode = !inCode;
      inPropertyZone = false;
      kept.push({ text, scan: "" });
      continue;
    }

    if (inCode) {
      kept.push({ text, scan: "" });
      continue;
    }

    if (trimmed === "" && raw.isPreBlock) {
      kept.push(null);
      continue;
    }

    const prop = inPropertyZone ? parsePropertyLine(text) : null;
    if (prop) {
      properties.push({ ...prop, line });
      kept.push(null);
      continue;
    }
    if (i > 0) {
      inPropertyZone = false;
    }

    const opener = DIRECTIVE_OPEN_REGEX.exec(trimmed);
    if (opener) {
      const name = opener[1].toUpperCase();
      if (!directives.has(name)) {
        problems.push({
          code: "unknown-directive",
          line,
          message: `Unrecognized directive "${opener[1]}" kept as text`,
        });
      } else if (open === null) {
        open = { name, at: kept.length, line };
        kept.push(null);
        continue;
      }
      kept.push({ text, scan: text });
      continue;
    }

    const closer = DIRECTIVE_CLOSE_REGEX.exec(trimmed);
    if (closer && open !== null && closer[1].toUpperCase() === open.name) {
      if (directive === "") {
        directive = open.name;
      }
      open = null;
      kept.push(null);
      continue;
    }

    kept.push({ text, scan: text });
  }

  if (inCode) {
    problems.push({
      code: "unclosed-code-fence",
      line: codeStart,
      message: "Code fence is never closed; closed at end of block",
    });
  }

  if (open !== null) {
    const source = raw.lines[open.at];
    kept[open.at] = { text: source.text, scan: source.text };
    for (const at of verbatim) {
      const entry = kept[at];
      if (entry !== null) {
        kept[at] = { text: entry.text, scan: entry.text };
      }
    }
    problems.push({
      code: "unclosed-directive",
      line: open.line,
      message: `Directive "${open.name}" is never closed; kept as text`,
    });
  }

  const lines = kept.filter(
    (entry): entry is { text: string; scan: string } => entry !== null,
  );

  if (
    directive === "" &&
    !raw.isPreBlock &&
    lines.length > 0 &&
    lines[0].scan !== ""
  ) {
    const marker = MARKER_REGEX.exec(lines[0].text);
    if (marker && markers.has(marker[1])) {
      directive = marker[1];
      const rest = lines[0].text.slice(marker[0].length);
      lines[0] = { text: rest, scan: rest };
    }
  }

  const content = joinLines(lines.map((entry) => entry.text));
  const scanText = joinLines(lines.map((entry) => entry.scan));
  const isPropertiesOnly =
    properties.length > 0 && lines.every((entry) => entry.text.trim() === "");

  return {
    index: raw.index,
    parent: raw.parent,
    path: raw.path,
    depth: raw.depth,
    position: raw.position,
    line: raw.lines.length > 0 ? raw.lines[0].line : 0,
    content,
    scanText,
    directive,
    isHeading:
      ATX_HEADING_REGEX.test(content) ||
      hasTrueProperty(properties, headingKey),
    properties,
    isPreBlock: raw.isPreBlock,
    isPropertiesOnly,
    problems,
  };
}

function joinLines(lines: string[]): string {
  return lines
    .join("\n")
    .replace(/^(?:[\t ]*\n)+/, "")
    .replace(/\s+$/, "");
}

/**
 * Split note text into raw blocks with depth and position assigned.
 */
function* rawBlocks(text: string, indentWidth: number): Generator<RawBlock> {
  const lines = text === "" ? [] : text.split(/\r?\n/);
  const stack: OpenBlock[] = [];
  const preLines: SourceLine[] = [];
  let rootCount = 0;
  let index = 0;
  let current: (RawBlock & { indent: string; level: number }) | null = null;
  // Level of the block holding an open code fence
  let fenceLevel: number | null = null;

  const flushPreBlock = function* (): Generator<RawBlock> {
    if (preLines.some((l) => l.text.trim() !== "")) {
      yield {
        index: index++,
        parent: null,
        path: [rootCount],
        depth: 0,
        position: rootCount++,
        isPreBlock: true,
        lines: preLines.splice(0),
      };
    }
    preLines.length = 0;
  };

  for (let i = 0; i < lines.length; i++) {
    const source = lines[i];
    const indent = leadingWhitespace(source);
    const body = source.slice(indent.length);
    const lineNo = i + 1;
    const level = indentLevel(source, indentWidth);
    const isBullet = BULLET_REGEX.test(body);

    if (fenceLevel !== null && isBullet && level <= fenceLevel) {
      // A bullet at or above the fence's block ends the unclosed fence
      fenceLevel = null;
    }

    if (!isBullet || fenceLevel !== null) {
      if (current === null) {
        preLines.push({ text: source, line: lineNo });
      } else {
        current.lines.push({
          text: continuationText(source, current.indent),
          line: lineNo,
        });
        if (body.startsWith(CODE_FENCE)) {
          fenceLevel = fenceLevel === null ? current.level : null;
        }
      }
      continue;
    }

    if (current === null) {
      yield* flushPreBlock();
    } else {
      yield current;
    }

    while (stack.length > 0 && stack[stack.length - 1].level >= level) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1] : null;
    const position = parent ? parent.children++ : rootCount++;
    const path = parent ? [...parent.path, position] : [position];
    const depth = parent ? parent.depth + 1 : 0;

    current = {
      index: index++,
      parent: parent ? parent.index : null,
      path,
      depth,
      position,
      isPreBlock: false,
      indent,
      level,
      lines: [{ text: body.replace(/^-[ \t]?/, ""), line: lineNo }],
    };
    if (current.lines[0].text.trim().startsWith(CODE_FENCE)) {
      fenceLevel = level;
    }
    stack.push({ level, index: current.index, depth, path, children: 0 });
  }

  if (current === null) {
    yield* flushPreBlock();
  } else {
    yield current;
  }
}

/**
 * A lazy, restartable sequence of the blocks in one note.
 *
 * Each iteration re-parses the source, so iterating twice yields equal
 * blocks.
 */
export class BlockSequence implements Iterable<ParsedBlock> {
  private readonly directives: ReadonlySet<string>;
  private readonly markers: ReadonlySet<string>;
  private readonly indentWidth: number;
  private readonly headingKey: string;

  constructor(
    readonly source: string,
    options: ParseOptions = {},
  ) {
    this.directives = new Set(
      [...(options.directives ?? DEFAULT_DIRECTIVES)].map((d) =>
        d.toUpperCase(),
      ),
    );
    this.markers = new Set(
      [...(options.markers ?? DEFAULT_MARKERS)].map((m) => m.toUpperCase()),
    );
    this.indentWidth = options.indentWidth ?? 2;
    this.headingKey = options.headingKey ?? "heading";
  }

  *[Symbol.iterator](): Iterator<ParsedBlock> {
    for (const raw of rawBlocks(this.source, this.indentWidth)) {
      yield interpretBlock(raw, this.directives, this.markers, this.headingKey);
    }
  }

  toArray(): ParsedBlock[] {
    return [...this];
  }
}

/**
 * Parse one note body into its block sequence.
 */
export function parseBlocks(
  source: string,
  options: ParseOptions = {},
): BlockSequence {
  return new BlockSequence(source, options);
}
