/**
 * Tests for run report formatting.
 */

import { describe, it, expect } from "vitest";
import { formatDiagnostic, formatRunReport, runReportJson } from "./report.js";
import { assembleGraph } from "./assembler.js";
import { buildFragment } from "./fragments.js";
import { CollectionError } from "./models.js";
import { ExtractionResult } from "./collection.js";

function successResult(): ExtractionResult {
  const { graph } = assembleGraph([
    buildFragment(
      "projects/alpha.md",
      "- Status:: active\n  - See [[projects/beta]]",
    ),
  ]);
  return {
    ok: true,
    graph,
    report: { notesSucceeded: 1, skipped: [], diagnostics: [], consistent: true },
  };
}

function failedResult(): ExtractionResult {
  const reason = "Note collection not found: /x";
  return {
    ok: false,
    error: new CollectionError(reason),
    report: {
      notesSucceeded: 0,
      skipped: [{ file: "/x", reason }],
      diagnostics: [],
      consistent: false,
    },
  };
}

describe("formatDiagnostic", () => {
  it("should include the line when known", () => {
    expect(
      formatDiagnostic({ code: "duplicate-page", file: "a.md", message: "m" }),
    ).toBe("a.md: [duplicate-page] m");
    expect(
      formatDiagnostic({
        code: "unknown-directive",
        file: "a.md",
        line: 3,
        message: "m",
      }),
    ).toBe("a.md:3: [unknown-directive] m");
  });
});

describe("formatRunReport", () => {
  it("should summarize a successful run", () => {
    expect(formatRunReport(successResult())).toBe(
      [
        "Notes read: 1",
        "Notes skipped: 0",
        "Pages: 4 (3 placeholders)",
        "Blocks: 2",
        "Resources: 0",
        "Relationships: 6",
        "  HasProperty: 1",
        "  Holds: 2",
        "  InNamespace: 2",
        "  Links: 1",
        "Diagnostics: 0",
        "Consistency: passed",
      ].join("\n"),
    );
  });

  it("should summarize a failed run", () => {
    expect(formatRunReport(failedResult())).toBe(
      [
        "Notes read: 0",
        "Notes skipped: 1",
        "  /x: Note collection not found: /x",
        "Diagnostics: 0",
        "Consistency: failed",
      ].join("\n"),
    );
  });
});

describe("runReportJson", () => {
  it("should report counts for a successful run", () => {
    expect(runReportJson(successResult())).toEqual({
      status: "success",
      notes_succeeded: 1,
      notes_skipped: [],
      pages: 4,
      placeholders: 3,
      blocks: 2,
      resources: 0,
      relationships: { HasProperty: 1, Holds: 2, InNamespace: 2, Links: 1 },
      diagnostics: 0,
      consistent: true,
    });
  });

  it("should include the error for a failed run", () => {
    expect(runReportJson(failedResult())).toEqual({
      status: "error",
      error: "Note collection not found: /x",
      notes_succeeded: 0,
      notes_skipped: [{ file: "/x", reason: "Note collection not found: /x" }],
      pages: 0,
      placeholders: 0,
      blocks: 0,
      resources: 0,
      relationships: {},
      diagnostics: 0,
      consistent: false,
    });
  });
});
