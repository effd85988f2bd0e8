/**
 * Run report formatting for human and JSON output.
 */

import {
  Diagnostic,
  RELATIONSHIP_TYPES,
  RelationshipType,
} from "./models.js";
import { ExtractionResult } from "./collection.js";

export interface GraphCounts {
  pages: number;
  placeholders: number;
  blocks: number;
  resources: number;
  relationships: Partial<Record<RelationshipType, number>>;
}

export function countGraph(result: ExtractionResult): GraphCounts | null {
  if (!result.ok) {
    return null;
  }
  const { graph } = result;
  const relationships: Partial<Record<RelationshipType, number>> = {};
  for (const rel of graph.relationships) {
    relationships[rel.type] = (relationships[rel.type] ?? 0) + 1;
  }
  return {
    pages: graph.pages.length,
    placeholders: graph.pages.filter((page) => page.isPlaceholder).length,
    blocks: graph.blocks.length,
    resources: graph.resources.length,
    relationships,
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where =
    diagnostic.line === undefined
      ? diagnostic.file
      : `${diagnostic.file}:${diagnostic.line}`;
  return `${where}: [${diagnostic.code}] ${diagnostic.message}`;
}

/**
 * Human-readable summary of a run.
 */
export function formatRunReport(result: ExtractionResult): string {
  const { report } = result;
  const lines = [
    `Notes read: ${report.notesSucceeded}`,
    `Notes skipped: ${report.skipped.length}`,
  ];

  for (const skipped of report.skipped) {
    lines.push(`  ${skipped.file}: ${skipped.reason}`);
  }

  const counts = countGraph(result);
  if (counts) {
    lines.push(`Pages: ${counts.pages} (${counts.placeholders} placeholders)`);
    lines.push(`Blocks: ${counts.blocks}`);
    lines.push(`Resources: ${counts.resources}`);
    const total = Object.values(counts.relationships).reduce(
      (sum, n) => sum + (n ?? 0),
      0,
    );
    lines.push(`Relationships: ${total}`);
    for (const type of RELATIONSHIP_TYPES) {
      const count = counts.relationships[type];
      if (count !== undefined) {
        lines.push(`  ${type}: ${count}`);
      }
    }
  }

  lines.push(`Diagnostics: ${report.diagnostics.length}`);
  lines.push(`Consistency: ${report.consistent ? "passed" : "failed"}`);

  return lines.join("\n");
}

/**
 * JSON-ready summary of a run.
 */
export function runReportJson(result: ExtractionResult): object {
  const { report } = result;
  const counts = countGraph(result);

  return {
    status: result.ok ? "success" : "error",
    ...(result.ok ? {} : { error: result.error.message }),
    notes_succeeded: report.notesSucceeded,
    notes_skipped: report.skipped,
    pages: counts?.pages ?? 0,
    placeholders: counts?.placeholders ?? 0,
    blocks: counts?.blocks ?? 0,
    resources: counts?.resources ?? 0,
    relationships: counts?.relationships ?? {},
    diagnostics: report.diagnostics.length,
    consistent: report.consistent,
  };
}
