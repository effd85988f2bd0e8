/**
 * blockgraph - property graph extraction from outline-structured notes.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

// Re-export configuration
export {
  CONFIG_FILE,
  ROOT_ENV,
  DEFAULT_CONFIG,
  DEFAULT_DIRECTIVES,
  DEFAULT_MARKERS,
  configFromToml,
  loadConfigFile,
  mergeConfig,
  resolveConfig,
} from "./lib/config.js";
export type {
  GraphConfig,
  ReservedKeys,
  ConfigOverrides,
} from "./lib/config.js";

// Re-export parsing
export { parseBlocks, BlockSequence, indentLevel } from "./lib/blocks.js";
export type { ParsedBlock, ParseOptions, BlockProblem } from "./lib/blocks.js";
export {
  parsePropertyLine,
  normalizeKey,
  splitTagList,
  readFrontMatter,
} from "./lib/properties.js";
export type { Property, FrontMatter } from "./lib/properties.js";
export { extractReferences } from "./lib/links.js";
export type {
  Reference,
  PageReference,
  TagReference,
  BlockReference,
  ResourceReference,
  ExtractedReferences,
} from "./lib/links.js";

// Re-export identity and assembly
export {
  IdentityTable,
  normalizePageName,
  normalizeResourcePath,
  pageNameFromPath,
  generateBlockUuid,
} from "./lib/identity.js";
export { buildFragment } from "./lib/fragments.js";
export type { NoteFragment, FragmentBlock } from "./lib/fragments.js";
export { assembleGraph, validateGraph } from "./lib/assembler.js";
export type { AssembleResult } from "./lib/assembler.js";

// Re-export collection and output
export {
  extractGraph,
  discoverNotes,
  loadFragments,
} from "./lib/collection.js";
export type { ExtractionResult, LoadedFragments } from "./lib/collection.js";
export {
  toTables,
  toCsv,
  writeTables,
  schemaStatements,
  TABLES,
} from "./lib/export.js";
export type { ExportFormat, Row, CellValue } from "./lib/export.js";
export { formatRunReport, runReportJson, countGraph } from "./lib/report.js";
