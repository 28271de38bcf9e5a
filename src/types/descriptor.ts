/**
 * Compiler output types. Every descriptor is plain data: built fresh per call,
 * never mutated after construction, and safe to serialize for inspection.
 */

import type { z } from "zod/v4";
import type { ModelConfig } from "./config.ts";

export const PRIMITIVE_KINDS = [
  "string",
  "integer",
  "number",
  "boolean",
  "null",
  "any",
] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

/** Format-refined types a string can be narrowed into */
export const SEMANTIC_KINDS = [
  "base64-bytes",
  "strict-bytes",
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
  "ip-any-address",
  "ip-any-interface",
  "ip-any-network",
  "json-string",
  "postgres-dsn",
  "mongo-dsn",
  "secret-string",
  "secret-bytes",
  "uri",
  "http-uri",
  "file-uri",
  "uuid",
  "uuid1",
  "uuid3",
  "uuid4",
  "uuid5",
] as const;

export type SemanticKind = (typeof SEMANTIC_KINDS)[number];

export interface PrimitiveType {
  kind: "primitive";
  primitive: PrimitiveKind;
}

export interface SemanticType {
  kind: "semantic";
  semantic: SemanticKind;
}

/** An object schema without declared properties */
export interface MappingType {
  kind: "mapping";
}

export interface CollectionType {
  kind: "collection";
  /** Absent for an untyped list */
  items?: TypeDescriptor;
}

export interface UnionType {
  kind: "union";
  variants: TypeDescriptor[];
}

/** `allOf` with more than one member. Members are kept side by side, not merged. */
export interface IntersectionType {
  kind: "intersection";
  members: TypeDescriptor[];
}

export interface CompositeType {
  kind: "composite";
  model: CompositeTypeDefinition;
}

export type TypeDescriptor =
  | PrimitiveType
  | SemanticType
  | MappingType
  | CollectionType
  | UnionType
  | IntersectionType
  | CompositeType;

/** Constraint metadata attached to a field */
export interface FieldConstraints {
  ge?: number;
  gt?: number;
  le?: number;
  lt?: number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  allowedSchemes?: string[];
  strict?: boolean;
}

export interface FieldDescriptor {
  name: string;
  type: TypeDescriptor;
  required: boolean;
  /** `null` for optional fields, absent for required ones */
  default?: null;
  description?: string;
  examples?: unknown[];
  constraints: FieldConstraints;
}

/**
 * Object-level check run after field validation. Returns an error message,
 * or undefined when the data passes.
 */
export type ModelValidator = (
  data: Record<string, unknown>,
) => string | undefined;

/** Caller-supplied values the compiler carries to the model builder untouched */
export interface ModelOverrides {
  /** Object schema whose shape the built model extends */
  base?: z.ZodObject;
  config?: ModelConfig;
  /** Namespace recorded on the built model */
  module?: string;
  validators?: Record<string, ModelValidator>;
  /** Extra construction arguments recorded on the built model */
  classArgs?: Record<string, unknown>;
}

export interface CompositeTypeDefinition {
  name: string;
  /** Declared property order is preserved */
  fields: FieldDescriptor[];
  overrides: ModelOverrides;
}
