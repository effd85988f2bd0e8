/**
 * Identity resolution for pages, resources and blocks.
 *
 * One IdentityTable lives for exactly one extraction run. Entities are stored
 * flat, keyed by their normalized identifier, so promoting a placeholder page
 * is an update of the existing entry and every relationship already pointing
 * at that key stays valid.
 */

import * as crypto from "node:crypto";
import * as path from "node:path";
import { PageNode, ResourceNode } from "./models.js";
import { isUrl, isUuid } from "./links.js";

/**
 * Normalize a page name: case-folded, whitespace collapsed, namespace
 * segments trimmed and empty segments dropped.
 */
export function normalizePageName(name: string, separator = "/"): string {
  return name
    .toLowerCase()
    .replace(/\s+/g, " ")
    .split(separator)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "")
    .join(separator);
}

/**
 * Tidy a page title as written, without case-folding.
 */
export function displayTitle(name: string, separator = "/"): string {
  return name
    .replace(/\s+/g, " ")
    .split(separator)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "")
    .join(separator);
}

/**
 * Normalize a resource path. URLs are kept as written; file paths use
 * forward slashes and are POSIX-normalized. Case is preserved.
 */
export function normalizeResourcePath(target: string): string {
  const value = target.trim();
  if (isUrl(value)) {
    return value;
  }
  const normalized = path.posix.normalize(value.replace(/\\/g, "/"));
  return normalized === "." ? "" : normalized;
}

/**
 * Every proper namespace prefix of a page name, nearest first.
 * `a/b/c` gives `["a/b", "a"]`.
 */
export function namespaceAncestors(name: string, separator = "/"): string[] {
  const segments = name.split(separator);
  const ancestors: string[] = [];
  for (let i = segments.length - 1; i > 0; i--) {
    ancestors.push(segments.slice(0, i).join(separator));
  }
  return ancestors;
}

function decodeSegment(segment: string): string {
  if (!/%[0-9a-fA-F]{2}/.test(segment)) {
    return segment;
  }
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) {
      return segment;
    }
    throw err;
  }
}

/**
 * Derive the page title a note file authors from its relative path.
 *
 * `pages/projects___alpha.md` and `projects/alpha.md` both give
 * `projects/alpha`.
 */
export function pageNameFromPath(
  relativePath: string,
  options: { separator?: string; pageDirs?: readonly string[] } = {},
): string {
  const separator = options.separator ?? "/";
  const pageDirs = options.pageDirs ?? [];
  const parts = relativePath.replace(/\\/g, "/").split("/");

  const file = parts.pop() ?? "";
  const dot = file.lastIndexOf(".");
  const stem = dot > 0 ? file.slice(0, dot) : file;

  if (parts.length > 0 && pageDirs.includes(parts[0])) {
    parts.shift();
  }

  const segments = [...parts, ...stem.split("___")].map(decodeSegment);
  return displayTitle(segments.join(separator), separator);
}

/**
 * Deterministic UUID for a block without an `id::` property.
 *
 * Derived from the page, the note file and the block's position path, so
 * re-running over the same collection yields the same identifiers.
 */
export function generateBlockUuid(
  page: string,
  file: string,
  positions: readonly number[],
  salt = 0,
): string {
  const input = `${page}\0${file}\0${positions.join(".")}`;
  const hash = crypto
    .createHash("sha1")
    .update(salt === 0 ? input : `${input}\0${salt}`)
    .digest("hex");
  const variant = ((parseInt(hash[16], 16) & 0x3) | 0x8).toString(16);
  return [
    hash.slice(0, 8),
    hash.slice(8, 12),
    `5${hash.slice(13, 16)}`,
    `${variant}${hash.slice(17, 20)}`,
    hash.slice(20, 32),
  ].join("-");
}

export interface AuthorResult {
  page: PageNode;
  /** The name was already authored by an earlier note file */
  merged: boolean;
  /** The entry existed as a placeholder and was promoted */
  promoted: boolean;
}

/**
 * Canonical identity tables for one run.
 */
export class IdentityTable {
  private readonly pages = new Map<string, PageNode>();
  private readonly resources = new Map<string, ResourceNode>();
  private readonly blockIds = new Map<string, string>();

  constructor(readonly separator = "/") {}

  normalize(name: string): string {
    return normalizePageName(name, this.separator);
  }

  /**
   * Return the canonical page for a name, creating a placeholder (and any
   * missing namespace ancestors) on first sight. Returns null for names
   * that normalize to nothing.
   */
  reference(name: string): PageNode | null {
    const key = this.normalize(name);
    if (key === "") {
      return null;
    }

    const existing = this.pages.get(key);
    if (existing) {
      return existing;
    }

    const page: PageNode = {
      name: key,
      title: displayTitle(name, this.separator),
      isPlaceholder: true,
      isPublic: false,
      file: null,
    };
    this.pages.set(key, page);

    const segments = page.title.split(this.separator);
    for (const ancestor of namespaceAncestors(key, this.separator)) {
      const depth = ancestor.split(this.separator).length;
      this.reference(segments.slice(0, depth).join(this.separator));
    }

    return page;
  }

  /**
   * Record that a note file authors this page. A placeholder is promoted in
   * place; a page already authored by another file is merged into.
   */
  author(name: string, file: string): AuthorResult | null {
    const existed = this.pages.has(this.normalize(name));
    const page = this.reference(name);
    if (page === null) {
      return null;
    }

    if (!page.isPlaceholder) {
      return { page, merged: true, promoted: false };
    }

    page.isPlaceholder = false;
    page.title = displayTitle(name, this.separator);
    page.file = file;
    return { page, merged: false, promoted: existed };
  }

  markPublic(name: string): void {
    const page = this.pages.get(this.normalize(name));
    if (page) {
      page.isPublic = true;
    }
  }

  getPage(name: string): PageNode | undefined {
    return this.pages.get(this.normalize(name));
  }

  /**
   * Return the canonical resource for a path. `isAsset` only ever turns on.
   */
  resource(target: string, isAsset: boolean): ResourceNode | null {
    const key = normalizeResourcePath(target);
    if (key === "") {
      return null;
    }

    const existing = this.resources.get(key);
    if (existing) {
      existing.isAsset = existing.isAsset || isAsset;
      return existing;
    }

    const resource: ResourceNode = { path: key, isAsset };
    this.resources.set(key, resource);
    return resource;
  }

  /**
   * Claim a block uuid for a page. Returns false when the uuid is invalid or
   * already claimed.
   */
  claimBlock(uuid: string, page: string): boolean {
    const key = uuid.toLowerCase();
    if (!isUuid(key) || this.blockIds.has(key)) {
      return false;
    }
    this.blockIds.set(key, page);
    return true;
  }

  hasBlock(uuid: string): boolean {
    return this.blockIds.has(uuid.toLowerCase());
  }

  pageList(): PageNode[] {
    return [...this.pages.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }

  resourceList(): ResourceNode[] {
    return [...this.resources.values()].sort((a, b) =>
      a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
    );
  }

  /**
   * Child/ancestor pairs for every namespaced page.
   */
  namespacePairs(): Array<{ child: string; ancestor: string }> {
    const pairs: Array<{ child: string; ancestor: string }> = [];
    for (const page of this.pageList()) {
      for (const ancestor of namespaceAncestors(page.name, this.separator)) {
        pairs.push({ child: page.name, ancestor });
      }
    }
    return pairs;
  }
}
