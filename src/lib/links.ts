/**
 * Reference extraction from block content.
 *
 * Handles page links, tag links, block references and resource references.
 * Each match claims a span of the text; when candidates overlap, the one
 * starting first wins, then the longer one, then the more specific kind.
 */

/**
 * `[[Page]]` or `[label]([[Page]])`.
 */
export interface PageReference {
  kind: "page";
  target: string;
  offset: number;
  length: number;
}

/**
 * `#tag` or `#[[Tag Page]]`.
 */
export interface TagReference {
  kind: "tag";
  target: string;
  offset: number;
  length: number;
}

/**
 * `((uuid))`.
 */
export interface BlockReference {
  kind: "block";
  uuid: string;
  offset: number;
  length: number;
}

/**
 * `[label](path)`, `![label](path)`, `[[./path]]` or a bare `./path`.
 */
export interface ResourceReference {
  kind: "resource";
  target: string;
  label: string | null;
  /** Written with a leading `!` */
  embed: boolean;
  offset: number;
  length: number;
}

export type Reference =
  | PageReference
  | TagReference
  | BlockReference
  | ResourceReference;

export type ReferenceKind = Reference["kind"];

/**
 * A reference-looking span that could not be classified.
 */
export interface UnclassifiedSpan {
  text: string;
  offset: number;
}

export interface ExtractedReferences {
  references: Reference[];
  unclassified: UnclassifiedSpan[];
}

/** Extensions that make a bare name path-like */
export const FILE_EXTENSIONS = new Set([
  "png", "jpg", "jpeg", "gif", "svg", "webp", "bmp", "ico", "tif", "tiff",
  "heic", "pdf", "mp3", "wav", "ogg", "m4a", "flac", "mp4", "mov", "webm",
  "mkv", "avi", "zip", "gz", "tar", "7z", "epub", "docx", "xlsx", "pptx",
  "md", "markdown", "org", "txt", "csv", "json", "html", "htm", "excalidraw",
]);

/** Extensions of binary/media files */
export const ASSET_EXTENSIONS = new Set([
  "png", "jpg", "jpeg", "gif", "svg", "webp", "bmp", "ico", "tif", "tiff",
  "heic", "pdf", "mp3", "wav", "ogg", "m4a", "flac", "mp4", "mov", "webm",
  "mkv", "avi", "zip", "gz", "tar", "7z", "epub", "docx", "xlsx", "pptx",
  "excalidraw",
]);

const URL_SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;
const OPAQUE_SCHEME_REGEX = /^(?:file|mailto|data):/i;
const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const LABELLED_PAGE_REGEX = /\[([^\]\n]*)\]\(\[\[([^[\]\n]+)\]\]\)/g;
const MD_LINK_REGEX = /(!?)\[([^\]\n]*)\]\(([^()\s]*(?:\([^()\s]*\)[^()\s]*)*)\)/g;
const TAG_PAGE_REGEX = /#\[\[([^[\]\n]+)\]\]/g;
const PAGE_LINK_REGEX = /\[\[([^[\]\n]+)\]\]/g;
const BLOCK_REF_REGEX = /\(\(([^()\s]+)\)\)/g;
const HASHTAG_REGEX = /(^|[\s(,])#([^\s#,;!?"'()[\]{}]+)/g;
const BARE_PATH_REGEX = /(^|[\s(])(\.{1,2}\/[^\s()[\]]+)/g;

/** Lower sorts first when spans tie */
const KIND_PRIORITY: Record<ReferenceKind, number> = {
  block: 0,
  resource: 1,
  tag: 2,
  page: 3,
};

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}

export function isUrl(value: string): boolean {
  return URL_SCHEME_REGEX.test(value) || OPAQUE_SCHEME_REGEX.test(value);
}

function extensionOf(target: string): string | null {
  const clean = target.split(/[?#]/)[0];
  const base = clean.slice(clean.lastIndexOf("/") + 1);
  const dot = base.lastIndexOf(".");
  if (dot <= 0 || dot === base.length - 1) {
    return null;
  }
  return base.slice(dot + 1).toLowerCase();
}

/**
 * Whether a link target names a file or URL rather than a page.
 */
export function isPathLike(target: string): boolean {
  const value = target.trim();
  if (
    value.startsWith("./") ||
    value.startsWith("../") ||
    value.startsWith("/") ||
    value.startsWith("~/") ||
    isUrl(value)
  ) {
    return true;
  }
  const ext = extensionOf(value);
  return ext !== null && FILE_EXTENSIONS.has(ext);
}

/**
 * Whether a resource target is a binary/media asset.
 */
export function isAssetPath(target: string, embed = false): boolean {
  if (embed) {
    return true;
  }
  const ext = extensionOf(target);
  if (ext !== null && ASSET_EXTENSIONS.has(ext)) {
    return true;
  }
  return !isUrl(target) && /(^|\/)assets\//.test(target);
}

/**
 * Replace inline code spans with spaces, keeping offsets intact.
 */
export function maskInlineCode(text: string): string {
  return text.replace(/(`+)[^`]*?\1/g, (span) => " ".repeat(span.length));
}

type Candidate = Reference | (UnclassifiedSpan & { kind: "unclassified"; length: number });

function collect(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  let match: RegExpExecArray | null;

  LABELLED_PAGE_REGEX.lastIndex = 0;
  while ((match = LABELLED_PAGE_REGEX.exec(text)) !== null) {
    candidates.push({
      kind: "page",
      target: match[2].trim(),
      offset: match.index,
      length: match[0].length,
    });
  }

  MD_LINK_REGEX.lastIndex = 0;
  while ((match = MD_LINK_REGEX.exec(text)) !== null) {
    const target = match[3].trim();
    if (target.startsWith("[[") || target.startsWith("((")) {
      continue;
    }
    if (target === "" || target.startsWith("#")) {
      candidates.push({
        kind: "unclassified",
        text: match[0],
        offset: match.index,
        length: match[0].length,
      });
      continue;
    }
    candidates.push({
      kind: "resource",
      target,
      label: match[2].trim() === "" ? null : match[2].trim(),
      embed: match[1] === "!",
      offset: match.index,
      length: match[0].length,
    });
  }

  TAG_PAGE_REGEX.lastIndex = 0;
  while ((match = TAG_PAGE_REGEX.exec(text)) !== null) {
    candidates.push({
      kind: "tag",
      target: match[1].trim(),
      offset: match.index,
      length: match[0].length,
    });
  }

  PAGE_LINK_REGEX.lastIndex = 0;
  while ((match = PAGE_LINK_REGEX.exec(text)) !== null) {
    const target = match[1].trim();
    if (target === "") {
      continue;
    }
    if (isPathLike(target)) {
      candidates.push({
        kind: "resource",
        target,
        label: null,
        embed: false,
        offset: match.index,
        length: match[0].length,
      });
    } else {
      candidates.push({
        kind: "page",
        target,
        offset: match.index,
        length: match[0].length,
      });
    }
  }

  BLOCK_REF_REGEX.lastIndex = 0;
  while ((match = BLOCK_REF_REGEX.exec(text)) !== null) {
    if (isUuid(match[1])) {
      candidates.push({
        kind: "block",
        uuid: match[1].toLowerCase(),
        offset: match.index,
        length: match[0].length,
      });
    } else {
      candidates.push({
        kind: "unclassified",
        text: match[0],
        offset: match.index,
        length: match[0].length,
      });
    }
  }

  HASHTAG_REGEX.lastIndex = 0;
  while ((match = HASHTAG_REGEX.exec(text)) !== null) {
    const tag = match[2].replace(/[.:]+$/, "");
    if (tag === "") {
      continue;
    }
    candidates.push({
      kind: "tag",
      target: tag,
      offset: match.index + match[1].length,
      length: tag.length + 1,
    });
  }

  BARE_PATH_REGEX.lastIndex = 0;
  while ((match = BARE_PATH_REGEX.exec(text)) !== null) {
    const target = match[2].replace(/[.,;:!?]+$/, "");
    candidates.push({
      kind: "resource",
      target,
      label: null,
      embed: false,
      offset: match.index + match[1].length,
      length: target.length,
    });
  }

  return candidates;
}

function priority(candidate: Candidate): number {
  return candidate.kind === "unclassified" ? 4 : KIND_PRIORITY[candidate.kind];
}

/**
 * Extract references from block content.
 *
 * Code spans are ignored. The result is ordered by offset and no two
 * results share any character of the text.
 */
export function extractReferences(content: string): ExtractedReferences {
  const text = maskInlineCode(content);
  const candidates = collect(text).sort(
    (a, b) =>
      a.offset - b.offset || b.length - a.length || priority(a) - priority(b),
  );

  const references: Reference[] = [];
  const unclassified: UnclassifiedSpan[] = [];
  let claimedUntil = 0;

  for (const candidate of candidates) {
    if (candidate.offset < claimedUntil) {
      continue;
    }
    claimedUntil = candidate.offset + candidate.length;

    if (candidate.kind === "unclassified") {
      unclassified.push({ text: candidate.text, offset: candidate.offset });
    } else {
      references.push(candidate);
    }
  }

  return { references, unclassified };
}
