/** Small constructors and predicates over TypeDescriptor values */

import type {
  PrimitiveKind,
  PrimitiveType,
  SemanticKind,
  SemanticType,
  TypeDescriptor,
} from "../types/descriptor.ts";

export function primitive(kind: PrimitiveKind): PrimitiveType {
  return { kind: "primitive", primitive: kind };
}

export function semantic(kind: SemanticKind): SemanticType {
  return { kind: "semantic", semantic: kind };
}

export function isPrimitive(
  type: TypeDescriptor,
  ...kinds: PrimitiveKind[]
): type is PrimitiveType {
  return type.kind === "primitive" && kinds.includes(type.primitive);
}

/**
 * Wrap a type so it also accepts null. Unions are flattened rather than
 * nested, and a type that already admits null is returned as-is.
 */
export function nullable(type: TypeDescriptor): TypeDescriptor {
  if (isPrimitive(type, "null")) return type;

  if (type.kind === "union") {
    if (type.variants.some((v) => isPrimitive(v, "null"))) return type;
    return { kind: "union", variants: [...type.variants, primitive("null")] };
  }

  return { kind: "union", variants: [type, primitive("null")] };
}
