#!/usr/bin/env tsx
/**
 * schemodel CLI — entry point for the command-line interface.
 *
 * Commands:
 *   schemodel compile <schema.json>               Print the compiled model definition
 *   schemodel validate <schema.json> <data.json>  Validate data against a schema
 *   schemodel json-schema <schema.json>           Print the model's JSON Schema
 *   schemodel serve [<project-path>]              Start the MCP server
 *   schemodel version                             Print version
 */

import { loadConfig } from "./config/loader.ts";
import {
  compileCommand,
  jsonSchemaCommand,
  validateCommand,
} from "./commands.ts";
import { runServerMain } from "./index.ts";
import { VERSION } from "./version.ts";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    process.exit(0);
  }

  if (command === "version" || command === "--version" || command === "-v") {
    console.log(`schemodel v${VERSION}`);
    process.exit(0);
  }

  if (command === "serve") {
    runServerMain(args.slice(1));
    return;
  }

  const config = await loadConfig(process.cwd());
  const [first, second] = args.slice(1);

  switch (command) {
    case "compile":
      process.exit(await compileCommand(requireArg(first, "schema"), config));
      break;
    case "validate":
      process.exit(
        await validateCommand(
          requireArg(first, "schema"),
          requireArg(second, "data"),
          config,
        ),
      );
      break;
    case "json-schema":
      process.exit(await jsonSchemaCommand(requireArg(first, "schema"), config));
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    console.error(`Error: missing <${name}.json> argument`);
    process.exit(1);
  }
  return value;
}

function printUsage(): void {
  console.log(`
schemodel v${VERSION} — JSON Schema to validating model compiler

Usage:
  schemodel compile <schema.json>               Print the compiled model definition
  schemodel validate <schema.json> <data.json>  Validate data against a schema
  schemodel json-schema <schema.json>           Print the model's JSON Schema
  schemodel serve [<project-path>]              Start the MCP server on stdio
  schemodel version                             Print version

Model settings are read from config/schemodel.md in the current directory.
  `.trim());
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
