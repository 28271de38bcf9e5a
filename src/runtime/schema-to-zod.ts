/**
 * Converts compiled model definitions into Zod schemas for runtime validation.
 */

import { statSync, type Stats } from "node:fs";
import { z } from "zod/v4";
import type {
  CompositeTypeDefinition,
  FieldConstraints,
  FieldDescriptor,
  ModelValidator,
  PrimitiveKind,
  SemanticKind,
  TypeDescriptor,
} from "../types/descriptor.ts";
import { SecretBytes, SecretString } from "./secret.ts";

const POSTGRES_DSN = /^postgres(?:ql)?(?:\+[a-z0-9]+)?:\/\/\S+$/i;
const MONGO_DSN = /^mongodb(?:\+srv)?:\/\/\S+$/i;

/** Build a Zod object schema for a model definition */
export function buildObjectSchema(model: CompositeTypeDefinition): z.ZodObject {
  const { base, config, validators } = model.overrides;
  const shape: Record<string, z.ZodType> = {};

  for (const field of model.fields) {
    shape[field.name] = fieldToZod(field);
  }

  let schema: z.ZodObject = base ? base.extend(shape) : z.object(shape);

  switch (config?.extra) {
    case "forbid":
      schema = schema.strict();
      break;
    case "allow":
      schema = schema.loose();
      break;
    case "ignore":
      schema = schema.strip();
      break;
  }

  if (validators) {
    schema = schema.superRefine((data, ctx) => {
      for (const [name, validator] of Object.entries(validators)) {
        const message = runValidator(validator, data);
        if (message !== undefined) {
          ctx.addIssue({
            code: "custom",
            message,
            input: data,
            params: { validator: name },
          });
        }
      }
    });
  }

  return schema;
}

/** Convert a single field to a Zod type with its default and metadata */
function fieldToZod(field: FieldDescriptor): z.ZodType {
  let schema = typeToZod(field.type, field.constraints);
  if (field.description) schema = schema.describe(field.description);
  if (field.default === null) return schema.default(null);
  return schema;
}

/**
 * Convert a type descriptor to Zod. Constraints apply to the matching leaf
 * types, including each variant of a nullable union; they never reach
 * collection items or nested models.
 */
export function typeToZod(
  type: TypeDescriptor,
  constraints: FieldConstraints = {},
): z.ZodType {
  switch (type.kind) {
    case "primitive":
      return primitiveToZod(type.primitive, constraints);

    case "semantic":
      return semanticToZod(type.semantic, constraints);

    case "mapping":
      return z.record(z.string(), z.unknown());

    case "collection":
      return z.array(type.items ? typeToZod(type.items) : z.unknown());

    case "union":
      return z.union(type.variants.map((v) => typeToZod(v, constraints)));

    case "intersection": {
      const [first, ...rest] = type.members.map((m) => typeToZod(m));
      if (!first) return z.unknown();
      return rest.reduce<z.ZodType>((acc, m) => z.intersection(acc, m), first);
    }

    case "composite":
      return buildObjectSchema(type.model);
  }
}

function primitiveToZod(
  kind: PrimitiveKind,
  constraints: FieldConstraints,
): z.ZodType {
  switch (kind) {
    case "string":
      return applyLength(z.string(), constraints);
    case "integer":
      return applyBounds(z.int(), constraints);
    case "number":
      return applyBounds(z.number(), constraints);
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "any":
      return z.unknown();
  }
}

function semanticToZod(
  kind: SemanticKind,
  constraints: FieldConstraints,
): z.ZodType {
  switch (kind) {
    case "base64-bytes":
      return z.base64().transform((s) => Buffer.from(s, "base64"));
    case "strict-bytes":
      return z.instanceof(Uint8Array);
    case "date":
      return z.iso.date();
    case "time":
      return z.iso.time();
    case "date-time":
      return z.iso.datetime({ offset: true, local: true });
    case "duration":
      return z.iso.duration();
    case "directory-path":
      return z.string().refine(isDirectory, "Path does not point to a directory");
    case "file-path":
      return z.string().refine(isFile, "Path does not point to a file");
    case "path":
      return z.string().min(1);
    case "email":
      return z.email();
    case "ipv4":
      return z.ipv4();
    case "ipv6":
      return z.ipv6();
    case "ip-any-address":
      return z.union([z.ipv4(), z.ipv6()]);
    case "ip-any-interface":
    case "ip-any-network":
      return z.union([z.ipv4(), z.ipv6(), z.cidrv4(), z.cidrv6()]);
    case "json-string":
      return z.string().transform((value, ctx) => {
        try {
          const parsed: unknown = JSON.parse(value);
          return parsed;
        } catch {
          ctx.issues.push({ code: "custom", message: "Invalid JSON", input: value });
          return z.NEVER;
        }
      });
    case "postgres-dsn":
      return z.string().regex(POSTGRES_DSN, "Invalid Postgres connection string");
    case "mongo-dsn":
      return z.string().regex(MONGO_DSN, "Invalid MongoDB connection string");
    case "secret-string":
      return z.string().transform((value) => new SecretString(value));
    case "secret-bytes":
      return z.string().transform((value) => new SecretBytes(Buffer.from(value)));
    case "uri": {
      const schemes = constraints.allowedSchemes;
      if (!schemes) return z.url();
      return z.url().refine(
        (value) => hasScheme(value, schemes),
        `URL scheme should be one of: ${schemes.join(", ")}`,
      );
    }
    case "http-uri":
      return z.url().refine(
        (value) => hasScheme(value, ["http", "https"]),
        "URL scheme should be 'http' or 'https'",
      );
    case "file-uri":
      return z.url().refine(
        (value) => hasScheme(value, ["file"]),
        "URL scheme should be 'file'",
      );
    case "uuid":
      return z.uuid();
    case "uuid1":
    case "uuid3":
    case "uuid4":
    case "uuid5": {
      const version = kind.slice(-1);
      return z.uuid().refine(
        (value) => value.charAt(14) === version,
        `UUID version ${version} expected`,
      );
    }
  }
}

function applyBounds(schema: z.ZodNumber, c: FieldConstraints): z.ZodNumber {
  let s = schema;
  if (c.ge !== undefined) s = s.gte(c.ge);
  if (c.gt !== undefined) s = s.gt(c.gt);
  if (c.le !== undefined) s = s.lte(c.le);
  if (c.lt !== undefined) s = s.lt(c.lt);
  if (c.multipleOf !== undefined) s = s.multipleOf(c.multipleOf);
  return s;
}

function applyLength(schema: z.ZodString, c: FieldConstraints): z.ZodString {
  let s = schema;
  if (c.minLength !== undefined) s = s.min(c.minLength);
  if (c.maxLength !== undefined) s = s.max(c.maxLength);
  return s;
}

function runValidator(
  validator: ModelValidator,
  data: Record<string, unknown>,
): string | undefined {
  try {
    return validator(data);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

function hasScheme(value: string, schemes: readonly string[]): boolean {
  if (!URL.canParse(value)) return false;
  const protocol = new URL(value).protocol.replace(/:$/, "");
  return schemes.includes(protocol);
}

function isDirectory(path: string): boolean {
  return statPath(path)?.isDirectory() ?? false;
}

function isFile(path: string): boolean {
  return statPath(path)?.isFile() ?? false;
}

/** Stat a path, treating any filesystem error as "does not exist" */
function statPath(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch {
    return undefined;
  }
}
