/**
 * Tests for table export.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  TABLES,
  schemaStatements,
  toCsv,
  toTables,
  writeTables,
} from "./export.js";
import { assembleGraph } from "./assembler.js";
import { buildFragment } from "./fragments.js";

function scenarioGraph() {
  return assembleGraph([
    buildFragment(
      "projects/alpha.md",
      "- Status:: active\n  - See [[projects/beta]] ![c](./c.png)",
    ),
  ]).graph;
}

describe("toCsv", () => {
  it("should quote strings and escape quotes, newlines and backslashes", () => {
    const csv = toCsv(
      [{ a: 'say "hi"\nnow', b: null, c: 3, d: true, e: "C:\\x" }],
      [
        { name: "a", type: "STRING" },
        { name: "b", type: "STRING" },
        { name: "c", type: "INT64" },
        { name: "d", type: "BOOLEAN" },
        { name: "e", type: "STRING" },
      ],
    );
    expect(csv).toBe('"say ""hi""\\nnow",,3,true,"C:\\\\x"\n');
  });

  it("should write nothing for no rows", () => {
    expect(toCsv([], [{ name: "a", type: "STRING" }])).toBe("");
  });
});

describe("toTables", () => {
  it("should route relationships to tables by endpoint", () => {
    const graph = scenarioGraph();
    const tables = toTables(graph);
    const [root, child] = graph.blocks;

    expect(Object.keys(tables)).toEqual(TABLES.map((spec) => spec.name));
    expect(tables.PageHasProperty).toEqual([
      { page: "projects/alpha", property: "status", value: "active" },
    ]);
    expect(tables.PageHolds).toEqual([
      { page: "projects/alpha", block: root.uuid, position: 0, depth: 0 },
    ]);
    expect(tables.BlockHolds).toEqual([
      { parent: root.uuid, block: child.uuid, position: 0, depth: 1 },
    ]);
    expect(tables.Links).toEqual([{ block: child.uuid, page: "projects/beta" }]);
    expect(tables.LinksToResource).toEqual([
      { block: child.uuid, resource: "c.png", label: "c" },
    ]);
    expect(tables.Resource).toEqual([{ path: "c.png", is_asset: true }]);
    expect(tables.BlockHasProperty).toEqual([]);
  });
});

describe("schemaStatements", () => {
  it("should create node tables with keys and rel tables with payloads", () => {
    const statements = schemaStatements();

    expect(statements).toHaveLength(14);
    expect(statements[0]).toBe(
      "CREATE NODE TABLE Page(name STRING, title STRING, is_placeholder BOOLEAN, is_public BOOLEAN, file STRING, PRIMARY KEY (name));",
    );
    expect(statements).toContain(
      "CREATE REL TABLE PageHolds(FROM Page TO Block, position INT64, depth INT64);",
    );
    expect(statements).toContain("CREATE REL TABLE Links(FROM Block TO Page);");
  });
});

describe("writeTables", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "blockgraph-export-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write one JSON file per table", () => {
    const graph = scenarioGraph();
    const written = writeTables(graph, path.join(tempDir, "out"));

    expect(written).toHaveLength(TABLES.length);
    const pages: unknown = JSON.parse(
      fs.readFileSync(path.join(tempDir, "out", "Page.json"), "utf-8"),
    );
    expect(pages).toEqual(toTables(graph).Page);
  });

  it("should write header-less CSV", () => {
    writeTables(scenarioGraph(), tempDir, "csv");

    expect(fs.readFileSync(path.join(tempDir, "InNamespace.csv"), "utf-8")).toBe(
      '"projects/alpha","projects"\n"projects/beta","projects"\n',
    );
  });
});
