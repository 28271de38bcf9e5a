/**
 * Schema compiler — the public entry point that compiles a JSON Schema
 * document into a CompositeTypeDefinition. Pure and synchronous.
 *
 * Self-referencing `$defs` recurse without bound; callers that accept
 * untrusted schemas should bound their depth before compiling.
 */

import type { RootDocument, SchemaNode } from "../types/schema.ts";
import type {
  CompositeTypeDefinition,
  ModelOverrides,
} from "../types/descriptor.ts";
import { buildModelDefinition } from "./model-factory.ts";

export interface CompileOptions extends ModelOverrides {
  /** Document `$ref` pointers resolve against. Defaults to the schema itself. */
  rootSchema?: RootDocument;
}

/** Compile a JSON Schema object into a model definition */
export function compileSchema(
  schema: SchemaNode,
  options: CompileOptions = {},
): CompositeTypeDefinition {
  const { rootSchema, ...overrides } = options;
  return buildModelDefinition(schema, rootSchema ?? schema, overrides);
}
