/**
 * blockgraph schema - Print the DDL for the exported tables.
 */

import { Command } from "commander";
import { ExitCodes } from "../lib/models.js";
import { schemaStatements } from "../lib/export.js";
import { globalOptions } from "./run.js";

export const schemaCommand = new Command("schema")
  .description("Print CREATE TABLE statements matching the exported tables")
  .action((_options: Record<string, unknown>, command: Command) => {
    const globalOpts = globalOptions(command);
    const statements = schemaStatements();

    if (globalOpts.json) {
      console.log(JSON.stringify({ status: "success", statements }));
    } else {
      console.log(statements.join("\n"));
    }

    process.exit(ExitCodes.SUCCESS);
  });
