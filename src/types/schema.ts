/** JSON Schema input types consumed by the compiler */

/** One JSON Schema object or sub-schema. Read-only from the compiler's side. */
export type SchemaNode = Readonly<Record<string, unknown>>;

/**
 * The top-level schema node. `$ref` pointers resolve against it, and its
 * `$defs` mapping is the registry of referenceable definitions.
 */
export type RootDocument = SchemaNode;

/** `type` values the resolver dispatches on */
export const JSON_SCHEMA_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "object",
  "null",
] as const;

export type JsonSchemaType = (typeof JSON_SCHEMA_TYPES)[number];

/** `format` keywords that refine a string into a semantic type */
export const STRING_FORMATS = [
  "base64",
  "binary",
  "date",
  "time",
  "date-time",
  "duration",
  "directory-path",
  "file-path",
  "path",
  "email",
  "ipv4",
  "ipv6",
  "ipvanyaddress",
  "ipvanyinterface",
  "ipvanynetwork",
  "json-string",
  "multi-host-uri",
  "password",
  "uri",
  "uuid",
  "uuid1",
  "uuid3",
  "uuid4",
  "uuid5",
] as const;

export type StringFormat = (typeof STRING_FORMATS)[number];

export function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringFormat(value: unknown): value is StringFormat {
  return STRING_FORMATS.some((format) => format === value);
}
