/**
 * Model builder — turns a compiled definition into a validating model backed
 * by Zod, and offers the one-call compile-and-build entry point.
 */

import { z } from "zod/v4";
import type { SchemaNode } from "../types/schema.ts";
import type { CompositeTypeDefinition } from "../types/descriptor.ts";
import {
  compileSchema,
  type CompileOptions,
} from "../compiler/schema-compiler.ts";
import { buildObjectSchema } from "./schema-to-zod.ts";

export type ModelData = Record<string, unknown>;

export type ParseResult =
  | { success: true; data: ModelData }
  | { success: false; error: z.ZodError };

export interface CompiledModel {
  name: string;
  module: string | undefined;
  classArgs: Record<string, unknown>;
  definition: CompositeTypeDefinition;
  schema: z.ZodType<ModelData>;
  /** Validate and coerce data, throwing a ZodError on failure */
  parse(data: unknown): ModelData;
  safeParse(data: unknown): ParseResult;
  /** Serialize the model's input side back to JSON Schema */
  toJsonSchema(): Record<string, unknown>;
}

/** Build a validating model from a compiled definition */
export function buildZodModel(
  definition: CompositeTypeDefinition,
): CompiledModel {
  const { config, module, classArgs } = definition.overrides;
  const object = buildObjectSchema(definition);
  const schema: z.ZodType<ModelData> = config?.frozen ? object.readonly() : object;

  return {
    name: definition.name,
    module,
    classArgs: classArgs ?? {},
    definition,
    schema,
    parse: (data) => schema.parse(data),
    safeParse: (data) => schema.safeParse(data),
    toJsonSchema: () => ({
      ...z.toJSONSchema(schema, { io: "input", unrepresentable: "any" }),
    }),
  };
}

/** Compile a JSON Schema and build its model in one call */
export function createModelFromSchema(
  schema: SchemaNode,
  options: CompileOptions = {},
): CompiledModel {
  return buildZodModel(compileSchema(schema, options));
}

/** Render a validation error the way the CLI and tools report it */
export function formatValidationError(model: CompiledModel, error: z.ZodError): string {
  const count = error.issues.length;
  const noun = count === 1 ? "error" : "errors";
  return `${count} validation ${noun} for ${model.name}\n${z.prettifyError(error)}`;
}
