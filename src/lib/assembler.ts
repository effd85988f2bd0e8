/**
 * Graph assembly.
 *
 * Consolidates every note fragment through one IdentityTable into the final
 * node and relationship collections, deduplicates relationships, validates
 * the result and freezes it.
 *
 * Fragments are processed in path order so the output does not depend on the
 * order in which notes finished loading.
 */

import {
  BlockNode,
  ConsistencyError,
  Diagnostic,
  GraphSnapshot,
  NodeRef,
  NodeTable,
  Relationship,
  RelationshipType,
  blockRef,
  pageRef,
  refKey,
  resourceRef,
} from "./models.js";
import { NoteFragment } from "./fragments.js";
import { IdentityTable, generateBlockUuid } from "./identity.js";
import { isAssetPath } from "./links.js";

/**
 * Endpoint tables each relationship type may connect.
 */
const ENDPOINTS: Record<
  RelationshipType,
  { from: readonly NodeTable[]; to: readonly NodeTable[] }
> = {
  InNamespace: { from: ["Page"], to: ["Page"] },
  Holds: { from: ["Page", "Block"], to: ["Block"] },
  Links: { from: ["Block"], to: ["Page"] },
  LinksAsTag: { from: ["Block"], to: ["Page"] },
  LinksToBlock: { from: ["Block"], to: ["Block"] },
  LinksToResource: { from: ["Block"], to: ["Resource"] },
  HasProperty: { from: ["Page", "Block"], to: ["Page"] },
  IsTagged: { from: ["Page", "Block"], to: ["Page"] },
};

export interface AssembleResult {
  graph: GraphSnapshot;
  diagnostics: Diagnostic[];
}

interface PendingBlockLink {
  from: string;
  target: string;
  file: string;
  line: number;
}

function payloadOf(rel: Relationship): string {
  switch (rel.type) {
    case "Holds":
      return `${rel.position}:${rel.depth}`;
    case "LinksToResource":
      return rel.label === null ? "\0" : rel.label;
    case "HasProperty":
      return rel.value;
    default:
      return "";
  }
}

function relationshipKey(rel: Relationship): string {
  return [rel.type, refKey(rel.from), refKey(rel.to), payloadOf(rel)].join(
    "\u0001",
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function comparePaths(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Check referential and tree invariants. Returns the list of problems,
 * empty when the graph is consistent.
 */
export function validateGraph(graph: GraphSnapshot): string[] {
  const problems: string[] = [];
  const keys: Record<NodeTable, Set<string>> = {
    Page: new Set(),
    Block: new Set(),
    Resource: new Set(),
  };

  const register = (table: NodeTable, key: string) => {
    if (keys[table].has(key)) {
      problems.push(`duplicate ${table} node "${key}"`);
    }
    keys[table].add(key);
  };
  graph.pages.forEach((page) => register("Page", page.name));
  graph.blocks.forEach((block) => register("Block", block.uuid));
  graph.resources.forEach((resource) => register("Resource", resource.path));

  const exists = (ref: NodeRef) => keys[ref.table].has(ref.key);
  const blocks = new Map(graph.blocks.map((block) => [block.uuid, block]));
  const parents = new Map<string, NodeRef>();
  const siblingPositions = new Set<string>();

  for (const rel of graph.relationships) {
    const allowed = ENDPOINTS[rel.type];
    if (!allowed.from.includes(rel.from.table)) {
      problems.push(`${rel.type} cannot start at a ${rel.from.table}`);
    }
    if (!allowed.to.includes(rel.to.table)) {
      problems.push(`${rel.type} cannot end at a ${rel.to.table}`);
    }
    if (!exists(rel.from)) {
      problems.push(`${rel.type} from missing ${refKey(rel.from)}`);
    }
    if (!exists(rel.to)) {
      problems.push(`${rel.type} to missing ${refKey(rel.to)}`);
    }

    if (rel.type !== "Holds") {
      continue;
    }

    const child = blocks.get(rel.to.key);
    if (parents.has(rel.to.key)) {
      problems.push(`block ${rel.to.key} has more than one parent`);
    }
    parents.set(rel.to.key, rel.from);

    const sibling = `${refKey(rel.from)}#${rel.position}`;
    if (siblingPositions.has(sibling)) {
      problems.push(`position ${rel.position} repeated under ${refKey(rel.from)}`);
    }
    siblingPositions.add(sibling);

    if (!child) {
      continue;
    }
    if (child.position !== rel.position || child.depth !== rel.depth) {
      problems.push(`Holds payload disagrees with block ${child.uuid}`);
    }
    if (rel.from.table === "Page") {
      if (child.depth !== 0) {
        problems.push(`root block ${child.uuid} has depth ${child.depth}`);
      }
      if (child.page !== rel.from.key) {
        problems.push(`root block ${child.uuid} held by another page`);
      }
    } else {
      const parent = blocks.get(rel.from.key);
      if (parent && child.depth !== parent.depth + 1) {
        problems.push(
          `block ${child.uuid} depth ${child.depth} under parent depth ${parent.depth}`,
        );
      }
      if (parent && parent.page !== child.page) {
        problems.push(`block ${child.uuid} held across pages`);
      }
    }
  }

  for (const block of graph.blocks) {
    if (!parents.has(block.uuid)) {
      problems.push(`block ${block.uuid} has no parent`);
    }
  }

  return problems;
}

/**
 * Assemble all fragments into one validated, immutable snapshot.
 *
 * Throws ConsistencyError if the result breaks an invariant.
 */
export function assembleGraph(
  fragments: readonly NoteFragment[],
  identity: IdentityTable = new IdentityTable(),
): AssembleResult {
  const diagnostics: Diagnostic[] = [];
  const relationships = new Map<string, Relationship>();
  const blocks = new Map<string, BlockNode>();
  const blockOrder = new Map<string, number[]>();
  const rootCounts = new Map<string, number>();
  const pendingBlockLinks: PendingBlockLink[] = [];

  const emit = (rel: Relationship) => {
    const key = relationshipKey(rel);
    if (!relationships.has(key)) {
      relationships.set(key, rel);
    }
  };

  const referencePage = (
    name: string,
    file: string,
    line?: number,
  ): NodeRef | null => {
    const page = identity.reference(name);
    if (page === null) {
      diagnostics.push({
        code: "unclassified-reference",
        file,
        line,
        message: `Reference to empty page name "${name}" ignored`,
      });
      return null;
    }
    return pageRef(page.name);
  };

  const ordered = [...fragments].sort((a, b) => compareStrings(a.file, b.file));

  for (const fragment of ordered) {
    diagnostics.push(...fragment.diagnostics);

    const authored = identity.author(fragment.pageTitle, fragment.file);
    if (authored === null) {
      diagnostics.push({
        code: "unnamed-note",
        file: fragment.file,
        message: "Note path yields an empty page name; note skipped",
      });
      continue;
    }

    const page = authored.page;
    const owner = pageRef(page.name);
    if (authored.merged) {
      diagnostics.push({
        code: "duplicate-page",
        file: fragment.file,
        message: `Page "${page.name}" is also authored by ${page.file}; blocks merged`,
      });
    }
    if (fragment.isPublic) {
      identity.markPublic(page.name);
    }

    for (const prop of fragment.pageProperties) {
      const key = referencePage(prop.field, fragment.file, prop.line);
      if (key) {
        emit({ type: "HasProperty", from: owner, to: key, value: prop.value });
      }
    }
    for (const tag of fragment.pageTags) {
      const target = referencePage(tag, fragment.file);
      if (target) {
        emit({ type: "IsTagged", from: owner, to: target });
      }
    }

    const rootOffset = rootCounts.get(page.name) ?? 0;
    const uuids: string[] = [];

    for (const block of fragment.blocks) {
      let uuid: string | null = null;
      if (block.declaredId !== null) {
        if (identity.claimBlock(block.declaredId, page.name)) {
          uuid = block.declaredId.toLowerCase();
        } else {
          diagnostics.push({
            code: identity.hasBlock(block.declaredId)
              ? "duplicate-block-id"
              : "invalid-block-id",
            file: fragment.file,
            line: block.line,
            message: `Block id "${block.declaredId}" not usable; generated a new one`,
          });
        }
      }
      if (uuid === null) {
        let salt = 0;
        let candidate = generateBlockUuid(page.name, fragment.file, block.path);
        while (!identity.claimBlock(candidate, page.name)) {
          candidate = generateBlockUuid(
            page.name,
            fragment.file,
            block.path,
            ++salt,
          );
        }
        uuid = candidate;
      }
      uuids[block.index] = uuid;

      const isRoot = block.parent === null;
      const position = isRoot ? block.position + rootOffset : block.position;
      const order = [block.path[0] + rootOffset, ...block.path.slice(1)];

      blocks.set(uuid, {
        uuid,
        page: page.name,
        content: block.content,
        isHeading: block.isHeading,
        directive: block.directive,
        position,
        depth: block.depth,
      });
      blockOrder.set(uuid, order);

      const holder =
        block.parent === null ? owner : blockRef(uuids[block.parent]);
      emit({
        type: "Holds",
        from: holder,
        to: blockRef(uuid),
        position,
        depth: block.depth,
      });

      const self = blockRef(uuid);

      for (const prop of block.properties) {
        const key = referencePage(prop.field, fragment.file, prop.line);
        if (key) {
          emit({ type: "HasProperty", from: self, to: key, value: prop.value });
        }
      }
      for (const tag of block.tags) {
        const target = referencePage(tag, fragment.file, block.line);
        if (target) {
          emit({ type: "IsTagged", from: self, to: target });
        }
      }

      for (const ref of block.references) {
        switch (ref.kind) {
          case "page": {
            const target = referencePage(ref.target, fragment.file, block.line);
            if (target) {
              emit({ type: "Links", from: self, to: target });
            }
            break;
          }
          case "tag": {
            const target = referencePage(ref.target, fragment.file, block.line);
            if (target) {
              emit({ type: "LinksAsTag", from: self, to: target });
            }
            break;
          }
          case "resource": {
            const resource = identity.resource(
              ref.target,
              isAssetPath(ref.target, ref.embed),
            );
            if (resource) {
              emit({
                type: "LinksToResource",
                from: self,
                to: resourceRef(resource.path),
                label: ref.label,
              });
            }
            break;
          }
          case "block":
            pendingBlockLinks.push({
              from: uuid,
              target: ref.uuid,
              file: fragment.file,
              line: block.line,
            });
            break;
        }
      }
    }

    const roots = fragment.blocks.filter((block) => block.parent === null);
    rootCounts.set(page.name, rootOffset + roots.length);
  }

  // Block references need every block of the run to be known
  for (const link of pendingBlockLinks) {
    if (identity.hasBlock(link.target)) {
      emit({
        type: "LinksToBlock",
        from: blockRef(link.from),
        to: blockRef(link.target),
      });
    } else {
      diagnostics.push({
        code: "dangling-block-ref",
        file: link.file,
        line: link.line,
        message: `Block reference ((${link.target})) matches no block; dropped`,
      });
    }
  }

  for (const { child, ancestor } of identity.namespacePairs()) {
    emit({ type: "InNamespace", from: pageRef(child), to: pageRef(ancestor) });
  }

  const sortedBlocks = [...blocks.values()].sort(
    (a, b) =>
      compareStrings(a.page, b.page) ||
      comparePaths(blockOrder.get(a.uuid) ?? [], blockOrder.get(b.uuid) ?? []),
  );

  const sortedRelationships = [...relationships.values()].sort(
    (a, b) =>
      compareStrings(a.type, b.type) ||
      compareStrings(refKey(a.from), refKey(b.from)) ||
      compareStrings(refKey(a.to), refKey(b.to)) ||
      compareStrings(payloadOf(a), payloadOf(b)),
  );

  const graph: GraphSnapshot = {
    pages: identity.pageList().map((page) => ({ ...page })),
    blocks: sortedBlocks,
    resources: identity.resourceList().map((resource) => ({ ...resource })),
    relationships: sortedRelationships,
  };

  const problems = validateGraph(graph);
  if (problems.length > 0) {
    throw new ConsistencyError(problems);
  }

  return { graph: deepFreeze(graph), diagnostics };
}
