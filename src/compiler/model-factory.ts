/**
 * Model factory — assembles a named CompositeTypeDefinition from an object
 * schema. Also invoked by the type resolver for nested object schemas.
 */

import {
  isSchemaNode,
  type RootDocument,
  type SchemaNode,
} from "../types/schema.ts";
import type {
  CompositeTypeDefinition,
  ModelOverrides,
} from "../types/descriptor.ts";
import { compileField } from "./field-compiler.ts";
import { UnsupportedSchemaError } from "./errors.ts";

export const FALLBACK_MODEL_NAME = "DynamicModel";

/** Compile every property of an object schema into a model definition */
export function buildModelDefinition(
  schema: SchemaNode,
  root: RootDocument,
  overrides: ModelOverrides = {},
): CompositeTypeDefinition {
  const title = schema["title"];
  const name = typeof title === "string" && title ? title : FALLBACK_MODEL_NAME;
  const requiredNames = readRequired(schema["required"]);

  const properties = schema["properties"];
  const fields = isSchemaNode(properties)
    ? Object.entries(properties).map(([fieldName, property]) => {
        if (!isSchemaNode(property)) {
          throw new UnsupportedSchemaError(property, schema);
        }
        return compileField(fieldName, property, requiredNames, root);
      })
    : [];

  return { name, fields, overrides };
}

function readRequired(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((n): n is string => typeof n === "string");
}
