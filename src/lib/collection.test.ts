/**
 * Tests for note discovery and the extraction run.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { discoverNotes, extractGraph, loadFragments } from "./collection.js";
import { mergeConfig } from "./config.js";
import { CollectionError } from "./models.js";

describe("collection", () => {
  let tempDir: string;

  function write(relative: string, content: string): void {
    const filePath = path.join(tempDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "blockgraph-test-"));
    write("pages/projects___alpha.md", "- Status:: active\n  - See [[projects/beta]]");
    write("journals/2024_01_05.md", "- met [[Alice]] #todo");
    write("logseq/custom.md", "- ignored");
    write("notes.txt", "- not a note");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("discoverNotes", () => {
    it("should find notes in sorted order and skip ignored directories", async () => {
      const config = mergeConfig(tempDir);
      expect(await discoverNotes(config)).toEqual([
        "journals/2024_01_05.md",
        "pages/projects___alpha.md",
      ]);
    });

    it("should apply extra ignore patterns", async () => {
      const config = mergeConfig(tempDir, { ignore: ["journals/**"] });
      expect(await discoverNotes(config)).toEqual(["pages/projects___alpha.md"]);
    });
  });

  describe("loadFragments", () => {
    it("should skip notes that cannot be read", async () => {
      const config = mergeConfig(tempDir, { concurrency: 2 });
      const { fragments, skipped } = await loadFragments(
        ["missing.md", "pages/projects___alpha.md"],
        config,
      );

      expect(fragments.map((f) => f.pageTitle)).toEqual(["projects/alpha"]);
      expect(skipped).toHaveLength(1);
      expect(skipped[0].file).toBe("missing.md");
      expect(skipped[0].reason).toContain("ENOENT");
    });
  });

  describe("extractGraph", () => {
    it("should extract a graph from the collection", async () => {
      const result = await extractGraph(mergeConfig(tempDir, { concurrency: 1 }));

      expect(result.ok).toBe(true);
      expect(result.report.notesSucceeded).toBe(2);
      expect(result.report.skipped).toEqual([]);
      expect(result.report.consistent).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.graph.pages.map((p) => p.name)).toEqual([
        "2024_01_05",
        "alice",
        "projects",
        "projects/alpha",
        "projects/beta",
        "status",
        "todo",
      ]);
    });

    it("should honor the namespace separator", async () => {
      const result = await extractGraph(
        mergeConfig(tempDir, { namespaceSeparator: "." }),
      );
      if (!result.ok) {
        throw result.error;
      }
      expect(result.graph.pages.map((p) => p.name)).toContain("projects.alpha");
    });

    it("should report a missing root without throwing", async () => {
      const root = path.join(tempDir, "nope");
      const result = await extractGraph(mergeConfig(root));

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error).toBeInstanceOf(CollectionError);
      expect(result.report.skipped).toEqual([
        { file: root, reason: `Note collection not found: ${root}` },
      ]);
      expect(result.report.consistent).toBe(false);
    });
  });
});
