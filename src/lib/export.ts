/**
 * Table export for bulk loading.
 *
 * A snapshot maps onto one node table per entity type and one relationship
 * table per relationship type and endpoint pair. Rows are plain objects whose
 * first two columns of a relationship table are its FROM and TO keys.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { GraphSnapshot, NodeTable, Relationship } from "./models.js";

export type CellValue = string | number | boolean | null;
export type Row = Record<string, CellValue>;

export type ColumnType = "STRING" | "BOOLEAN" | "INT64";

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

export interface NodeTableSpec {
  kind: "node";
  name: NodeTable;
  columns: ColumnSpec[];
  primaryKey: string;
}

export interface RelTableSpec {
  kind: "rel";
  name: string;
  from: NodeTable;
  to: NodeTable;
  /** FROM key, TO key, then payload columns */
  columns: ColumnSpec[];
}

export type TableSpec = NodeTableSpec | RelTableSpec;

const str = (name: string): ColumnSpec => ({ name, type: "STRING" });
const bool = (name: string): ColumnSpec => ({ name, type: "BOOLEAN" });
const int = (name: string): ColumnSpec => ({ name, type: "INT64" });

export const TABLES: readonly TableSpec[] = [
  {
    kind: "node",
    name: "Page",
    columns: [
      str("name"),
      str("title"),
      bool("is_placeholder"),
      bool("is_public"),
      str("file"),
    ],
    primaryKey: "name",
  },
  {
    kind: "node",
    name: "Block",
    columns: [
      str("uuid"),
      str("page"),
      str("content"),
      bool("is_heading"),
      str("directive"),
      int("position"),
      int("depth"),
    ],
    primaryKey: "uuid",
  },
  {
    kind: "node",
    name: "Resource",
    columns: [str("path"), bool("is_asset")],
    primaryKey: "path",
  },
  {
    kind: "rel",
    name: "InNamespace",
    from: "Page",
    to: "Page",
    columns: [str("page"), str("namespace")],
  },
  {
    kind: "rel",
    name: "PageHolds",
    from: "Page",
    to: "Block",
    columns: [str("page"), str("block"), int("position"), int("depth")],
  },
  {
    kind: "rel",
    name: "BlockHolds",
    from: "Block",
    to: "Block",
    columns: [str("parent"), str("block"), int("position"), int("depth")],
  },
  {
    kind: "rel",
    name: "Links",
    from: "Block",
    to: "Page",
    columns: [str("block"), str("page")],
  },
  {
    kind: "rel",
    name: "LinksAsTag",
    from: "Block",
    to: "Page",
    columns: [str("block"), str("page")],
  },
  {
    kind: "rel",
    name: "LinksToBlock",
    from: "Block",
    to: "Block",
    columns: [str("source"), str("target")],
  },
  {
    kind: "rel",
    name: "LinksToResource",
    from: "Block",
    to: "Resource",
    columns: [str("block"), str("resource"), str("label")],
  },
  {
    kind: "rel",
    name: "PageHasProperty",
    from: "Page",
    to: "Page",
    columns: [str("page"), str("property"), str("value")],
  },
  {
    kind: "rel",
    name: "BlockHasProperty",
    from: "Block",
    to: "Page",
    columns: [str("block"), str("property"), str("value")],
  },
  {
    kind: "rel",
    name: "PageIsTagged",
    from: "Page",
    to: "Page",
    columns: [str("page"), str("tag")],
  },
  {
    kind: "rel",
    name: "BlockIsTagged",
    from: "Block",
    to: "Page",
    columns: [str("block"), str("tag")],
  },
];

/**
 * Name of the relationship table a relationship belongs in.
 */
export function relTableName(rel: Relationship): string {
  switch (rel.type) {
    case "Holds":
    case "HasProperty":
    case "IsTagged":
      return `${rel.from.table}${rel.type}`;
    default:
      return rel.type;
  }
}

function payloadCells(rel: Relationship): CellValue[] {
  switch (rel.type) {
    case "Holds":
      return [rel.position, rel.depth];
    case "LinksToResource":
      return [rel.label];
    case "HasProperty":
      return [rel.value];
    default:
      return [];
  }
}

/**
 * Convert a snapshot into rows per table. Every table in TABLES is present,
 * possibly empty.
 */
export function toTables(graph: GraphSnapshot): Record<string, Row[]> {
  const tables: Record<string, Row[]> = {};
  const specs = new Map<string, TableSpec>();
  for (const spec of TABLES) {
    tables[spec.name] = [];
    specs.set(spec.name, spec);
  }

  for (const page of graph.pages) {
    tables.Page.push({
      name: page.name,
      title: page.title,
      is_placeholder: page.isPlaceholder,
      is_public: page.isPublic,
      file: page.file,
    });
  }

  for (const block of graph.blocks) {
    tables.Block.push({
      uuid: block.uuid,
      page: block.page,
      content: block.content,
      is_heading: block.isHeading,
      directive: block.directive,
      position: block.position,
      depth: block.depth,
    });
  }

  for (const resource of graph.resources) {
    tables.Resource.push({ path: resource.path, is_asset: resource.isAsset });
  }

  for (const rel of graph.relationships) {
    const name = relTableName(rel);
    const spec = specs.get(name);
    if (!spec) {
      throw new Error(`No table for relationship ${name}`);
    }
    const cells = [rel.from.key, rel.to.key, ...payloadCells(rel)];
    const row: Row = {};
    spec.columns.forEach((column, i) => {
      row[column.name] = cells[i] ?? null;
    });
    tables[name].push(row);
  }

  return tables;
}

function csvCell(value: CellValue): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/\r?\n/g, "\\n")
    .replace(/"/g, '""');
  return `"${escaped}"`;
}

/**
 * Render rows as header-less CSV in the given column order.
 */
export function toCsv(rows: readonly Row[], columns: readonly ColumnSpec[]): string {
  return rows
    .map((row) =>
      columns.map((column) => csvCell(row[column.name] ?? null)).join(","),
    )
    .map((line) => `${line}\n`)
    .join("");
}

export type ExportFormat = "json" | "csv";

/**
 * Write one file per table into `dir`. Returns the written file paths.
 */
export function writeTables(
  graph: GraphSnapshot,
  dir: string,
  format: ExportFormat = "json",
): string[] {
  fs.mkdirSync(dir, { recursive: true });
  const tables = toTables(graph);
  const written: string[] = [];

  for (const spec of TABLES) {
    const rows = tables[spec.name];
    const filePath = path.join(dir, `${spec.name}.${format}`);
    const content =
      format === "csv"
        ? toCsv(rows, spec.columns)
        : `${JSON.stringify(rows, null, 2)}\n`;
    fs.writeFileSync(filePath, content);
    written.push(filePath);
  }

  return written;
}

/**
 * DDL creating every table, nodes first.
 */
export function schemaStatements(): string[] {
  return TABLES.map((spec) => {
    if (spec.kind === "node") {
      const columns = spec.columns.map((c) => `${c.name} ${c.type}`);
      return `CREATE NODE TABLE ${spec.name}(${columns.join(", ")}, PRIMARY KEY (${spec.primaryKey}));`;
    }
    const payload = spec.columns.slice(2).map((c) => `${c.name} ${c.type}`);
    const parts = [`FROM ${spec.from} TO ${spec.to}`, ...payload];
    return `CREATE REL TABLE ${spec.name}(${parts.join(", ")});`;
  });
}
