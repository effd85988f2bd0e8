#!/usr/bin/env node
/**
 * blockgraph CLI entry point.
 *
 * Extracts a property graph from a directory of outline-structured notes.
 */

import { Command, CommanderError } from "commander";
import { ExitCodes } from "./lib/models.js";
import { extractCommand } from "./commands/extract.js";
import { exportCommand } from "./commands/export.js";
import { schemaCommand } from "./commands/schema.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("blockgraph")
  .description("Extract a property graph from a directory of outline notes")
  .version(VERSION, "-V, --version", "output the version number")
  .option("--root <path>", "notes directory (default: $BLOCKGRAPH_ROOT or cwd)")
  .option("--json", "output in JSON format")
  .option("-q, --quiet", "suppress non-essential output")
  .option("-v, --verbose", "show detailed output")
  .exitOverride()
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet && opts.verbose) {
      console.error("Error: --quiet and --verbose are mutually exclusive");
      process.exit(ExitCodes.USAGE_ERROR);
    }
  });

// Register commands
for (const command of [extractCommand, exportCommand, schemaCommand]) {
  program.addCommand(command.exitOverride());
}

// Handle unknown commands
program.on("command:*", () => {
  console.error(`Error: Unknown command '${program.args[0]}'`);
  console.error('Run "blockgraph --help" for available commands.');
  process.exit(ExitCodes.USAGE_ERROR);
});

// Parse and execute
program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // commander has already printed help, version or the usage problem
    process.exit(err.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.USAGE_ERROR);
  }
  if (process.env.DEBUG) {
    console.error(err);
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(ExitCodes.FAILURE);
});
