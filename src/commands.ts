/**
 * CLI commands — compile, validate and round-trip JSON Schema files.
 * Each command prints its result to stdout and returns an exit code.
 */

import { readFile } from "node:fs/promises";
import { isSchemaNode, type SchemaNode } from "./types/schema.ts";
import type { SchemodelConfig } from "./types/config.ts";
import { compileSchema } from "./compiler/schema-compiler.ts";
import {
  createModelFromSchema,
  formatValidationError,
  type CompiledModel,
} from "./runtime/model.ts";

/** Print the compiled model definition as JSON */
export async function compileCommand(
  schemaPath: string,
  config: SchemodelConfig,
): Promise<number> {
  const schema = await readSchema(schemaPath);
  const definition = compileSchema(schema, {
    config: config.model,
    module: config.module,
  });
  console.log(JSON.stringify(definition, null, 2));
  return 0;
}

/** Validate a JSON data file against a schema file */
export async function validateCommand(
  schemaPath: string,
  dataPath: string,
  config: SchemodelConfig,
): Promise<number> {
  const model = await loadModel(schemaPath, config);
  const data = await readJson(dataPath);

  const result = model.safeParse(data);
  if (!result.success) {
    console.error(formatValidationError(model, result.error));
    return 1;
  }

  console.log(JSON.stringify(result.data, null, 2));
  return 0;
}

/** Print the JSON Schema a built model accepts */
export async function jsonSchemaCommand(
  schemaPath: string,
  config: SchemodelConfig,
): Promise<number> {
  const model = await loadModel(schemaPath, config);
  console.log(JSON.stringify(model.toJsonSchema(), null, 2));
  return 0;
}

async function loadModel(
  schemaPath: string,
  config: SchemodelConfig,
): Promise<CompiledModel> {
  const schema = await readSchema(schemaPath);
  return createModelFromSchema(schema, {
    config: config.model,
    module: config.module,
  });
}

async function readSchema(path: string): Promise<SchemaNode> {
  const schema = await readJson(path);
  if (!isSchemaNode(schema)) {
    throw new Error(`${path} does not contain a JSON Schema object`);
  }
  return schema;
}

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${path} is not valid JSON: ${reason}`);
  }
}
