/**
 * schemodel — compile JSON Schema documents into validating models.
 *
 *   const Person = createModelFromSchema({
 *     title: "Person",
 *     type: "object",
 *     properties: { name: { type: "string" }, age: { type: "integer" } },
 *     required: ["name"],
 *   });
 *   Person.parse({ name: "Ada" }); // { name: "Ada", age: null }
 */

export { compileSchema, type CompileOptions } from "./compiler/schema-compiler.ts";
export { buildModelDefinition, FALLBACK_MODEL_NAME } from "./compiler/model-factory.ts";
export { compileField, titleCase } from "./compiler/field-compiler.ts";
export { resolveType } from "./compiler/type-resolver.ts";
export { resolveRef } from "./compiler/ref-resolver.ts";
export { FORMAT_TYPE_MAP } from "./compiler/formats.ts";
export { UnsupportedSchemaError, SchemaReferenceError } from "./compiler/errors.ts";
export {
  buildZodModel,
  createModelFromSchema,
  formatValidationError,
  type CompiledModel,
  type ModelData,
  type ParseResult,
} from "./runtime/model.ts";
export { buildObjectSchema, typeToZod } from "./runtime/schema-to-zod.ts";
export { SecretBytes, SecretString } from "./runtime/secret.ts";
export {
  PRIMITIVE_KINDS,
  SEMANTIC_KINDS,
  type CollectionType,
  type CompositeType,
  type CompositeTypeDefinition,
  type FieldConstraints,
  type FieldDescriptor,
  type IntersectionType,
  type MappingType,
  type ModelOverrides,
  type ModelValidator,
  type PrimitiveKind,
  type PrimitiveType,
  type SemanticKind,
  type SemanticType,
  type TypeDescriptor,
  type UnionType,
} from "./types/descriptor.ts";
export {
  JSON_SCHEMA_TYPES,
  STRING_FORMATS,
  type JsonSchemaType,
  type RootDocument,
  type SchemaNode,
  type StringFormat,
} from "./types/schema.ts";
export type { ExtraMode, ModelConfig, SchemodelConfig } from "./types/config.ts";
