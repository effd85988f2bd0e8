/**
 * blockgraph export - Write the node and relationship tables to files.
 *
 * One file per table, as JSON arrays of rows or as header-less CSV ready for
 * a bulk COPY.
 */

import { Command, InvalidArgumentError } from "commander";
import * as path from "node:path";
import { CollectionError, ExitCodes } from "../lib/models.js";
import { ExportFormat, writeTables } from "../lib/export.js";
import { fail, globalOptions, loadRunConfig, runExtraction } from "./run.js";

function parseFormat(value: string): ExportFormat {
  if (value === "json" || value === "csv") {
    return value;
  }
  throw new InvalidArgumentError('must be "json" or "csv"');
}

export const exportCommand = new Command("export")
  .description("Write node and relationship tables for bulk loading")
  .requiredOption("--out <dir>", "directory to write table files into")
  .option("--format <format>", "json or csv", parseFormat, "json")
  .action(
    async (options: { out: string; format: ExportFormat }, command: Command) => {
      const globalOpts = globalOptions(command);
      const config = loadRunConfig(globalOpts);
      const result = await runExtraction(globalOpts, config);

      if (!result.ok) {
        fail(
          globalOpts,
          result.error.message,
          result.error instanceof CollectionError
            ? ExitCodes.DATA_ERROR
            : ExitCodes.FAILURE,
        );
      }

      const outDir = path.resolve(options.out);
      const written = writeTables(result.graph, outDir, options.format);

      if (globalOpts.json) {
        console.log(
          JSON.stringify({
            status: "success",
            format: options.format,
            files: written,
          }),
        );
      } else if (!globalOpts.quiet) {
        console.log(`Wrote ${written.length} tables to ${outDir}`);
      }

      process.exit(ExitCodes.SUCCESS);
    },
  );
