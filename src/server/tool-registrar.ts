/**
 * Tool registrar — exposes the schema compiler as MCP tools.
 */

import { z } from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { STRING_FORMATS, type SchemaNode } from "../types/schema.ts";
import type { SchemodelConfig } from "../types/config.ts";
import { compileSchema } from "../compiler/schema-compiler.ts";
import { FORMAT_TYPE_MAP } from "../compiler/formats.ts";
import { UnsupportedSchemaError, SchemaReferenceError } from "../compiler/errors.ts";
import { createModelFromSchema } from "../runtime/model.ts";

const schemaInput = z
  .record(z.string(), z.unknown())
  .describe("A JSON Schema object with type \"object\"");

/** Register all schemodel tools on the MCP server */
export function registerSchemaTools(
  server: McpServer,
  config: SchemodelConfig,
): void {
  server.registerTool("compile_schema", {
    title: "Compile Schema",
    description:
      "Compile a JSON Schema object into a model definition: fields, resolved types, defaults and constraints.",
    inputSchema: z.object({ schema: schemaInput }),
  }, async ({ schema }: { schema: SchemaNode }): Promise<CallToolResult> =>
    compileSchemaTool(schema, config),
  );

  server.registerTool("validate_data", {
    title: "Validate Data",
    description:
      "Build a model from a JSON Schema and validate data against it. Returns the parsed data or the validation issues.",
    inputSchema: z.object({
      schema: schemaInput,
      data: z.unknown().describe("The value to validate"),
    }),
  }, async ({ schema, data }: { schema: SchemaNode; data?: unknown }): Promise<CallToolResult> =>
    validateDataTool(schema, data, config),
  );

  server.registerTool("describe_formats", {
    title: "Describe Formats",
    description: "List the string `format` keywords the compiler narrows into semantic types.",
  }, async (): Promise<CallToolResult> => describeFormatsTool());
}

export function compileSchemaTool(
  schema: SchemaNode,
  config: SchemodelConfig,
): CallToolResult {
  try {
    const definition = compileSchema(schema, {
      config: config.model,
      module: config.module,
    });
    return ok(definition);
  } catch (err) {
    return error(err);
  }
}

export function validateDataTool(
  schema: SchemaNode,
  data: unknown,
  config: SchemodelConfig,
): CallToolResult {
  try {
    const model = createModelFromSchema(schema, {
      config: config.model,
      module: config.module,
    });
    const result = model.safeParse(data);
    if (!result.success) {
      return {
        content: [{
          type: "text",
          text: JSON.stringify({
            error: {
              code: "validation_error",
              model: model.name,
              issues: result.error.issues.map((issue) => ({
                path: issue.path.map(String).join("."),
                message: issue.message,
              })),
            },
          }),
        }],
        isError: true,
      };
    }
    return ok({ model: model.name, data: result.data });
  } catch (err) {
    return error(err);
  }
}

export function describeFormatsTool(): CallToolResult {
  return ok(
    STRING_FORMATS.map((format) => ({ format, type: FORMAT_TYPE_MAP[format] })),
  );
}

// --- Helpers ---

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function error(err: unknown): CallToolResult {
  const message = err instanceof Error ? err.message : String(err);
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code: errorCode(err), message } }) }],
    isError: true,
  };
}

function errorCode(err: unknown): string {
  if (err instanceof UnsupportedSchemaError) return "unsupported_schema";
  if (err instanceof SchemaReferenceError) return "unresolved_reference";
  return "error";
}
