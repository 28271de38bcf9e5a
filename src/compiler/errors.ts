/**
 * Errors raised while compiling a schema. Either one aborts the whole
 * compilation; no partial model is returned.
 */

import type { SchemaNode } from "../types/schema.ts";

/** A `type` value outside the supported set was encountered */
export class UnsupportedSchemaError extends Error {
  readonly schemaType: unknown;
  readonly schema: SchemaNode;

  constructor(schemaType: unknown, schema: SchemaNode) {
    super(
      `Unsupported JSON schema type: ${JSON.stringify(schemaType)} from ${JSON.stringify(schema)}`,
    );
    this.name = "UnsupportedSchemaError";
    this.schemaType = schemaType;
    this.schema = schema;
  }
}

/** A `$ref` pointer could not be walked to completion */
export class SchemaReferenceError extends Error {
  readonly ref: string;
  /** The first path segment that was missing */
  readonly segment: string;

  constructor(ref: string, segment: string) {
    super(`Cannot resolve $ref "${ref}": segment "${segment}" not found`);
    this.name = "SchemaReferenceError";
    this.ref = ref;
    this.segment = segment;
  }
}
