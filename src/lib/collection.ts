/**
 * Note collection loading and the extraction run.
 *
 * Notes are read and turned into fragments concurrently, bounded by
 * `config.concurrency`; fragments share no state. Assembly then runs once
 * over all of them.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import pLimit from "p-limit";
import { GraphConfig } from "./config.js";
import {
  CollectionError,
  ConsistencyError,
  GraphSnapshot,
  RunReport,
  SkippedNote,
} from "./models.js";
import { NoteFragment, buildFragment } from "./fragments.js";
import { assembleGraph } from "./assembler.js";
import { IdentityTable } from "./identity.js";

/** Always skipped, relative to the collection root */
export const DEFAULT_IGNORE = [
  "logseq/**",
  ".git/**",
  "**/node_modules/**",
  "**/.recycle/**",
  "**/bak/**",
] as const;

export type ExtractionResult =
  | { ok: true; graph: GraphSnapshot; report: RunReport }
  | { ok: false; error: Error; report: RunReport };

export interface LoadedFragments {
  fragments: NoteFragment[];
  skipped: SkippedNote[];
}

/**
 * Find note files under the root. Returns sorted relative paths with
 * forward slashes.
 */
export async function discoverNotes(
  config: Pick<GraphConfig, "root" | "extensions" | "ignore">,
): Promise<string[]> {
  const patterns = config.extensions.map((ext) => `**/*${ext}`);
  const files = await fg(patterns, {
    cwd: config.root,
    ignore: [...DEFAULT_IGNORE, ...config.ignore],
    onlyFiles: true,
    dot: false,
  });
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Read and parse notes concurrently. A note that cannot be read is reported
 * as skipped and does not affect the others.
 */
export async function loadFragments(
  files: readonly string[],
  config: GraphConfig,
): Promise<LoadedFragments> {
  const limit = pLimit(config.concurrency);
  const skipped: SkippedNote[] = [];

  const results = await Promise.all(
    files.map((file) =>
      limit(async (): Promise<NoteFragment | null> => {
        try {
          const source = await fs.readFile(path.join(config.root, file), "utf-8");
          return buildFragment(file, source, config);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          skipped.push({ file, reason });
          return null;
        }
      }),
    ),
  );

  return {
    fragments: results.filter(
      (fragment): fragment is NoteFragment => fragment !== null,
    ),
    skipped: skipped.sort((a, b) => (a.file < b.file ? -1 : 1)),
  };
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * Run a full extraction over the configured collection.
 *
 * Never throws for collection or consistency problems; the result says
 * whether a graph was produced and the report always describes the run.
 */
export async function extractGraph(
  config: GraphConfig,
): Promise<ExtractionResult> {
  const report: RunReport = {
    notesSucceeded: 0,
    skipped: [],
    diagnostics: [],
    consistent: false,
  };

  if (!(await isDirectory(config.root))) {
    const reason = `Note collection not found: ${config.root}`;
    report.skipped.push({ file: config.root, reason });
    return { ok: false, error: new CollectionError(reason), report };
  }

  const files = await discoverNotes(config);
  const { fragments, skipped } = await loadFragments(files, config);
  report.notesSucceeded = fragments.length;
  report.skipped = skipped;

  const identity = new IdentityTable(config.namespaceSeparator);
  try {
    const { graph, diagnostics } = assembleGraph(fragments, identity);
    report.diagnostics = diagnostics;
    report.consistent = true;
    return { ok: true, graph, report };
  } catch (err) {
    if (err instanceof ConsistencyError) {
      report.diagnostics = fragments.flatMap((f) => f.diagnostics);
      return { ok: false, error: err, report };
    }
    throw err;
  }
}
