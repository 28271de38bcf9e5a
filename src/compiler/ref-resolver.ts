/**
 * `$ref` pointer resolution against the root document.
 * Only local pointers are supported: `#/$defs/<name>/...` and `#/<path>`.
 */

import { isSchemaNode, type RootDocument } from "../types/schema.ts";
import { SchemaReferenceError } from "./errors.ts";

const DEFS_PREFIX = "#/$defs/";

/** Walk a `$ref` pointer to the value it names */
export function resolveRef(ref: string, root: RootDocument): unknown {
  const segments = ref.split("/");

  let current: unknown;
  let startIdx: number;
  if (ref.startsWith(DEFS_PREFIX)) {
    current = root["$defs"];
    startIdx = 2;
    if (current === undefined) throw new SchemaReferenceError(ref, "$defs");
  } else {
    current = root;
    startIdx = 1;
  }

  for (const segment of segments.slice(startIdx)) {
    current = step(current, segment);
    if (current === undefined) throw new SchemaReferenceError(ref, segment);
  }

  return current;
}

/** Index one level into an object or array */
function step(container: unknown, segment: string): unknown {
  if (Array.isArray(container)) {
    const index = Number(segment);
    return Number.isInteger(index) ? container[index] : undefined;
  }
  if (isSchemaNode(container) && Object.hasOwn(container, segment)) {
    return container[segment];
  }
  return undefined;
}
