/**
 * String `format` keywords and the semantic types they narrow into.
 * A few formats also depend on sibling keywords (`writeOnly`, `scheme`).
 */

import type { SchemaNode, StringFormat } from "../types/schema.ts";
import type { FieldConstraints, TypeDescriptor } from "../types/descriptor.ts";
import { semantic } from "./descriptors.ts";

export const FORMAT_TYPE_MAP: Readonly<Record<StringFormat, TypeDescriptor>> = {
  base64: semantic("base64-bytes"),
  binary: semantic("strict-bytes"),
  date: semantic("date"),
  time: semantic("time"),
  "date-time": semantic("date-time"),
  duration: semantic("duration"),
  "directory-path": semantic("directory-path"),
  "file-path": semantic("file-path"),
  path: semantic("path"),
  email: semantic("email"),
  ipv4: semantic("ipv4"),
  ipv6: semantic("ipv6"),
  ipvanyaddress: semantic("ip-any-address"),
  ipvanyinterface: semantic("ip-any-interface"),
  ipvanynetwork: semantic("ip-any-network"),
  "json-string": semantic("json-string"),
  "multi-host-uri": {
    kind: "union",
    variants: [semantic("postgres-dsn"), semantic("mongo-dsn")],
  },
  password: semantic("secret-string"),
  uri: semantic("uri"),
  uuid: semantic("uuid"),
  uuid1: semantic("uuid1"),
  uuid3: semantic("uuid3"),
  uuid4: semantic("uuid4"),
  uuid5: semantic("uuid5"),
};

export interface FormatSubstitution {
  type: TypeDescriptor;
  constraints: FieldConstraints;
}

/** Pick the semantic type for a known format, honouring sibling keywords */
export function substituteFormat(
  format: StringFormat,
  schema: SchemaNode,
): FormatSubstitution {
  const constraints: FieldConstraints = {};
  let type = structuredClone(FORMAT_TYPE_MAP[format]);

  switch (format) {
    case "binary":
      constraints.strict = true;
      break;

    case "password":
      if (schema["writeOnly"] === true) type = semantic("secret-bytes");
      break;

    case "uri": {
      const schemes = readSchemes(schema["scheme"]);
      if (schemes.length === 1 && schemes[0] === "http") {
        type = semantic("http-uri");
      } else if (schemes.length === 1 && schemes[0] === "file") {
        type = semantic("file-uri");
      } else if (schemes.length > 0) {
        constraints.allowedSchemes = schemes;
      }
      break;
    }
  }

  return { type, constraints };
}

function readSchemes(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((s): s is string => typeof s === "string");
}
