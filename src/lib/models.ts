/**
 * Core data models for blockgraph.
 *
 * A note collection becomes three node types (pages, blocks, resources) and a
 * fixed set of typed relationships between them. Everything here is plain data
 * so a snapshot can be serialized as tables without further mapping.
 */

/**
 * A uniquely named note, authored or only referenced.
 */
export interface PageNode {
  /** Normalized identifier (lower-cased, namespace-segmented) */
  name: string;
  /** Spelling first authored, else first referenced */
  title: string;
  /** True while the page has only been referenced, never authored */
  isPlaceholder: boolean;
  /** Set by the reserved `public` page property */
  isPublic: boolean;
  /** Relative path of the first note file authoring this page */
  file: string | null;
}

/**
 * One outline node within a page.
 */
export interface BlockNode {
  uuid: string;
  /** Name of the owning page */
  page: string;
  content: string;
  isHeading: boolean;
  /** Leading control token, or "" */
  directive: string;
  /** Zero-based order among siblings */
  position: number;
  /** Zero-based nesting level; roots are 0 */
  depth: number;
}

/**
 * A referenced local file, asset or external document.
 */
export interface ResourceNode {
  path: string;
  /** True for binary/media references, false for textual includes */
  isAsset: boolean;
}

export type NodeTable = "Page" | "Block" | "Resource";

/**
 * Typed pointer to a node: page name, block uuid or resource path.
 */
export interface NodeRef {
  table: NodeTable;
  key: string;
}

/**
 * Relationship types emitted by the assembler.
 */
export type RelationshipType =
  | "InNamespace"
  | "Holds"
  | "Links"
  | "LinksAsTag"
  | "LinksToBlock"
  | "LinksToResource"
  | "HasProperty"
  | "IsTagged";

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  "HasProperty",
  "Holds",
  "InNamespace",
  "IsTagged",
  "Links",
  "LinksAsTag",
  "LinksToBlock",
  "LinksToResource",
];

interface RelationshipBase<T extends RelationshipType> {
  type: T;
  from: NodeRef;
  to: NodeRef;
}

export type InNamespaceRel = RelationshipBase<"InNamespace">;

export interface HoldsRel extends RelationshipBase<"Holds"> {
  position: number;
  depth: number;
}

export type LinksRel = RelationshipBase<"Links">;

export type LinksAsTagRel = RelationshipBase<"LinksAsTag">;

export type LinksToBlockRel = RelationshipBase<"LinksToBlock">;

export interface LinksToResourceRel
  extends RelationshipBase<"LinksToResource"> {
  label: string | null;
}

export interface HasPropertyRel extends RelationshipBase<"HasProperty"> {
  value: string;
}

export type IsTaggedRel = RelationshipBase<"IsTagged">;

export type Relationship =
  | InNamespaceRel
  | HoldsRel
  | LinksRel
  | LinksAsTagRel
  | LinksToBlockRel
  | LinksToResourceRel
  | HasPropertyRel
  | IsTaggedRel;

/**
 * The finished, immutable output of one extraction run.
 */
export interface GraphSnapshot {
  readonly pages: readonly Readonly<PageNode>[];
  readonly blocks: readonly Readonly<BlockNode>[];
  readonly resources: readonly Readonly<ResourceNode>[];
  readonly relationships: readonly Readonly<Relationship>[];
}

export type DiagnosticCode =
  | "unclosed-code-fence"
  | "unclosed-directive"
  | "unknown-directive"
  | "invalid-block-id"
  | "duplicate-block-id"
  | "duplicate-page"
  | "dangling-block-ref"
  | "unclassified-reference"
  | "front-matter"
  | "unnamed-note";

/**
 * A recoverable problem noticed while reading one note.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  /** Relative path of the note file */
  file: string;
  /** One-based source line, when known */
  line?: number;
  message: string;
}

/**
 * A note that could not be read at all.
 */
export interface SkippedNote {
  file: string;
  reason: string;
}

/**
 * Summary of one run, always produced whether or not the graph validated.
 */
export interface RunReport {
  notesSucceeded: number;
  skipped: SkippedNote[];
  diagnostics: Diagnostic[];
  /** Whether the final graph passed consistency validation */
  consistent: boolean;
}

/**
 * Exit codes for the command line.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Raised when the assembled graph breaks a referential or tree invariant.
 * This points at a resolver or assembler defect, not at note content.
 */
export class ConsistencyError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Graph failed consistency validation (${problems.length} problem${
        problems.length === 1 ? "" : "s"
      }): ${problems.slice(0, 5).join("; ")}`,
    );
    this.name = "ConsistencyError";
    this.problems = problems;
  }
}

/**
 * Raised when the note collection itself cannot be read.
 */
export class CollectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CollectionError";
  }
}

/**
 * Raised for an unreadable or ill-typed configuration file.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Stable string key for a node reference.
 */
export function refKey(ref: NodeRef): string {
  return `${ref.table}:${ref.key}`;
}

export function pageRef(name: string): NodeRef {
  return { table: "Page", key: name };
}

export function blockRef(uuid: string): NodeRef {
  return { table: "Block", key: uuid };
}

export function resourceRef(path: string): NodeRef {
  return { table: "Resource", key: path };
}
