/**
 * Shared plumbing for commands that run an extraction.
 */

import { Command, InvalidArgumentError, OptionValues } from "commander";
import { ConfigError, ExitCodes } from "../lib/models.js";
import { ConfigOverrides, GraphConfig, resolveConfig } from "../lib/config.js";
import { ExtractionResult, extractGraph } from "../lib/collection.js";
import { formatDiagnostic } from "../lib/report.js";

export interface GlobalOptions {
  root?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  const opts: OptionValues = command.parent?.opts() ?? {};
  return {
    root: typeof opts.root === "string" ? opts.root : undefined,
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
  };
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

/**
 * Print an error the way every command does and exit.
 */
export function fail(
  globalOpts: GlobalOptions,
  message: string,
  code: number,
): never {
  if (globalOpts.json) {
    console.log(JSON.stringify({ status: "error", error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(code);
}

/**
 * Resolve config from the global options, exiting on a bad config file.
 */
export function loadRunConfig(
  globalOpts: GlobalOptions,
  overrides: ConfigOverrides = {},
): GraphConfig {
  try {
    return resolveConfig({ ...overrides, root: globalOpts.root });
  } catch (err) {
    if (err instanceof ConfigError) {
      fail(globalOpts, err.message, ExitCodes.DATA_ERROR);
    }
    throw err;
  }
}

/**
 * Run an extraction, printing progress and diagnostics to stderr.
 */
export async function runExtraction(
  globalOpts: GlobalOptions,
  config: GraphConfig,
): Promise<ExtractionResult> {
  if (!globalOpts.quiet) {
    console.error(`Extracting ${config.root}...`);
  }

  const result = await extractGraph(config);

  if (globalOpts.verbose) {
    for (const diagnostic of result.report.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
  }
  if (!globalOpts.quiet) {
    for (const skipped of result.report.skipped) {
      console.error(`Skipped ${skipped.file}: ${skipped.reason}`);
    }
  }

  return result;
}
