/**
 * blockgraph extract - Run an extraction and report what was found.
 */

import { Command } from "commander";
import { CollectionError, ExitCodes } from "../lib/models.js";
import { formatRunReport, runReportJson } from "../lib/report.js";
import {
  globalOptions,
  loadRunConfig,
  parsePositiveInt,
  runExtraction,
} from "./run.js";

export const extractCommand = new Command("extract")
  .description("Extract the note graph and report counts and problems")
  .option("--concurrency <n>", "notes read at once", parsePositiveInt)
  .action(async (options: { concurrency?: number }, command: Command) => {
    const globalOpts = globalOptions(command);
    const config = loadRunConfig(globalOpts, {
      concurrency: options.concurrency,
    });

    const result = await runExtraction(globalOpts, config);

    if (globalOpts.json) {
      console.log(JSON.stringify(runReportJson(result)));
    } else {
      console.log(formatRunReport(result));
    }

    if (result.ok) {
      process.exit(ExitCodes.SUCCESS);
    }
    if (!globalOpts.json) {
      console.error(`Error: ${result.error.message}`);
    }
    process.exit(
      result.error instanceof CollectionError
        ? ExitCodes.DATA_ERROR
        : ExitCodes.FAILURE,
    );
  });
