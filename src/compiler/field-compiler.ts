/**
 * Field compiler — turns one named property schema into a FieldDescriptor:
 * base type from the resolver, then default/optionality, metadata,
 * numeric and string constraints, and format substitution.
 */

import {
  isStringFormat,
  type RootDocument,
  type SchemaNode,
} from "../types/schema.ts";
import type {
  FieldConstraints,
  FieldDescriptor,
  TypeDescriptor,
} from "../types/descriptor.ts";
import { resolveType } from "./type-resolver.ts";
import { isPrimitive, nullable } from "./descriptors.ts";
import { substituteFormat } from "./formats.ts";

/** Constraints that carry a single number */
type BoundName =
  | "ge"
  | "gt"
  | "le"
  | "lt"
  | "multipleOf"
  | "minLength"
  | "maxLength";

const NUMERIC_KEYWORDS = {
  minimum: "ge",
  exclusiveMinimum: "gt",
  maximum: "le",
  exclusiveMaximum: "lt",
  multipleOf: "multipleOf",
} as const satisfies Record<string, BoundName>;

const LENGTH_KEYWORDS = {
  minLength: "minLength",
  maxLength: "maxLength",
} as const satisfies Record<string, BoundName>;

/** Compile a single property of an object schema */
export function compileField(
  name: string,
  schema: SchemaNode,
  requiredNames: readonly string[],
  root: RootDocument,
): FieldDescriptor {
  const required = requiredNames.includes(name);
  const baseType = resolveType(schema, root, titleCase(name));
  const constraints: FieldConstraints = {};

  // Numeric bounds only apply to the resolved type, before any format swap
  if (isPrimitive(baseType, "integer", "number")) {
    copyNumbers(schema, NUMERIC_KEYWORDS, constraints);
  }

  let type: TypeDescriptor = baseType;
  const format = schema["format"];
  if (isPrimitive(baseType, "string") && isStringFormat(format)) {
    const substituted = substituteFormat(format, schema);
    type = substituted.type;
    Object.assign(constraints, substituted.constraints);
  }

  if (isPrimitive(type, "string")) {
    copyNumbers(schema, LENGTH_KEYWORDS, constraints);
  }

  const field: FieldDescriptor = {
    name,
    type: required ? type : nullable(type),
    required,
    constraints,
  };

  if (!required) field.default = null;

  const description = schema["description"];
  if (typeof description === "string" && description) {
    field.description = description;
  }

  const examples = schema["examples"];
  if (Array.isArray(examples) && examples.length > 0) {
    field.examples = [...examples];
  }

  return field;
}

/**
 * Capitalize each run of letters, lower-casing the rest of the run
 * ("home_address" -> "Home_Address"). Used to name nested models.
 */
export function titleCase(name: string): string {
  return name.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

/** Copy numeric keyword values into their constraint names */
function copyNumbers(
  schema: SchemaNode,
  mapping: Readonly<Record<string, BoundName>>,
  constraints: FieldConstraints,
): void {
  for (const [keyword, constraint] of Object.entries(mapping)) {
    const value = schema[keyword];
    if (typeof value === "number") constraints[constraint] = value;
  }
}
