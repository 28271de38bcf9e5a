/**
 * Type resolver — turns one schema node into a TypeDescriptor.
 *
 * Keywords are checked in a fixed precedence: `$ref`, then `anyOf`/`oneOf`,
 * then `allOf`, then dispatch on `type`. Nothing is cached, so a definition
 * referenced twice compiles into two structurally equal descriptors.
 */

import {
  isSchemaNode,
  type RootDocument,
  type SchemaNode,
} from "../types/schema.ts";
import type { TypeDescriptor } from "../types/descriptor.ts";
import { UnsupportedSchemaError } from "./errors.ts";
import { resolveRef } from "./ref-resolver.ts";
import { buildModelDefinition } from "./model-factory.ts";
import { primitive } from "./descriptors.ts";

/** Resolve a schema node into its type descriptor */
export function resolveType(
  node: SchemaNode,
  root: RootDocument,
  nameHint?: string,
): TypeDescriptor {
  const ref = node["$ref"];
  if (typeof ref === "string" && ref) {
    const target = resolveRef(ref, root);
    if (!isSchemaNode(target)) {
      throw new UnsupportedSchemaError(target, node);
    }
    return resolveType(target, root, nameHint);
  }

  // anyOf and oneOf collapse into one flat union; oneOf exclusivity is not enforced
  const unionSchemas = [
    ...subSchemas(node, "anyOf"),
    ...subSchemas(node, "oneOf"),
  ];
  if (unionSchemas.length > 0) {
    return {
      kind: "union",
      variants: unionSchemas.map((s) => resolveType(s, root)),
    };
  }

  const allOfSchemas = subSchemas(node, "allOf");
  if (allOfSchemas.length > 0) {
    const members = allOfSchemas.map((s) => resolveType(s, root));
    const [only] = members;
    if (members.length === 1 && only) return only;
    return { kind: "intersection", members };
  }

  return resolveByType(node, root, nameHint);
}

/** Dispatch on the node's `type` keyword */
function resolveByType(
  node: SchemaNode,
  root: RootDocument,
  nameHint: string | undefined,
): TypeDescriptor {
  const type = node["type"];

  switch (type) {
    case "string":
    case "integer":
    case "number":
    case "boolean":
    case "null":
      return primitive(type);

    case "array": {
      const items = node["items"];
      if (isSchemaNode(items) && Object.keys(items).length > 0) {
        return { kind: "collection", items: resolveType(items, root, nameHint) };
      }
      return { kind: "collection" };
    }

    case "object": {
      const properties = node["properties"];
      if (isSchemaNode(properties) && Object.keys(properties).length > 0) {
        const named =
          node["title"] == null && nameHint !== undefined
            ? { ...node, title: nameHint }
            : node;
        return { kind: "composite", model: buildModelDefinition(named, root) };
      }
      return { kind: "mapping" };
    }

    case undefined:
      return primitive("any");

    default:
      throw new UnsupportedSchemaError(type, node);
  }
}

/** Read a list of sub-schemas under a combinator keyword */
function subSchemas(node: SchemaNode, key: "anyOf" | "oneOf" | "allOf"): SchemaNode[] {
  const value = node[key];
  if (!Array.isArray(value)) return [];

  return value.map((entry: unknown) => {
    if (!isSchemaNode(entry)) throw new UnsupportedSchemaError(entry, node);
    return entry;
  });
}
