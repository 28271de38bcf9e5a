import { describe, expect, test } from "vitest";
import { compileField, titleCase } from "../field-compiler.ts";

const STRING = { kind: "primitive", primitive: "string" } as const;
const INTEGER = { kind: "primitive", primitive: "integer" } as const;
const NULL = { kind: "primitive", primitive: "null" } as const;

describe("compileField required/optional", () => {
  test("required field has no default and keeps its type", () => {
    const field = compileField("age", { type: "integer" }, ["age"], {});
    expect(field).toEqual({
      name: "age",
      type: INTEGER,
      required: true,
      constraints: {},
    });
    expect("default" in field).toBe(false);
  });

  test("optional field is nullable with a null default", () => {
    const field = compileField("age", { type: "integer" }, ["name"], {});
    expect(field.required).toBe(false);
    expect(field.default).toBeNull();
    expect(field.type).toEqual({ kind: "union", variants: [INTEGER, NULL] });
  });

  test("optional union is flattened rather than nested", () => {
    const field = compileField(
      "value",
      { anyOf: [{ type: "string" }, { type: "integer" }] },
      [],
      {},
    );
    expect(field.type).toEqual({ kind: "union", variants: [STRING, INTEGER, NULL] });
  });

  test("optional union already admitting null is unchanged", () => {
    const field = compileField(
      "note",
      { anyOf: [{ type: "string" }, { type: "null" }] },
      [],
      {},
    );
    expect(field.type).toEqual({ kind: "union", variants: [STRING, NULL] });
  });
});

describe("compileField metadata", () => {
  test("copies description and examples", () => {
    const field = compileField(
      "name",
      { type: "string", description: "Full name", examples: ["Ada", "Grace"] },
      ["name"],
      {},
    );
    expect(field.description).toBe("Full name");
    expect(field.examples).toEqual(["Ada", "Grace"]);
  });

  test("skips empty description and examples", () => {
    const field = compileField("name", { type: "string", description: "", examples: [] }, [], {});
    expect(field.description).toBeUndefined();
    expect(field.examples).toBeUndefined();
  });
});

describe("compileField numeric constraints", () => {
  test("maps every numeric keyword", () => {
    const field = compileField(
      "score",
      {
        type: "number",
        minimum: 0,
        exclusiveMinimum: -1,
        maximum: 100,
        exclusiveMaximum: 101,
        multipleOf: 0.5,
      },
      ["score"],
      {},
    );
    expect(field.constraints).toEqual({ ge: 0, gt: -1, le: 100, lt: 101, multipleOf: 0.5 });
  });

  test("ignores numeric keywords on non-numeric types", () => {
    expect(compileField("a", { type: "string", minimum: 3 }, [], {}).constraints).toEqual({});
    expect(compileField("b", { type: "boolean", maximum: 1 }, [], {}).constraints).toEqual({});
  });

  test("ignores numeric keywords on unions", () => {
    const field = compileField(
      "days",
      { anyOf: [{ type: "integer" }, { type: "null" }], exclusiveMaximum: 0 },
      [],
      {},
    );
    expect(field.constraints).toEqual({});
  });

  test("applies to a referenced numeric definition", () => {
    const root = { $defs: { Count: { type: "integer" } } };
    const field = compileField("count", { $ref: "#/$defs/Count", minimum: 1 }, [], root);
    expect(field.constraints).toEqual({ ge: 1 });
  });
});

describe("compileField string constraints and formats", () => {
  test("plain string keeps length constraints", () => {
    const field = compileField("title", { type: "string", minLength: 3, maxLength: 200 }, [], {});
    expect(field.constraints).toEqual({ minLength: 3, maxLength: 200 });
  });

  test("format substitution replaces the string type", () => {
    const field = compileField("id", { type: "string", format: "uuid" }, ["id"], {});
    expect(field.type).toEqual({ kind: "semantic", semantic: "uuid" });
  });

  test("substituted formats drop length constraints", () => {
    const field = compileField(
      "email",
      { type: "string", format: "email", minLength: 5 },
      ["email"],
      {},
    );
    expect(field.type).toEqual({ kind: "semantic", semantic: "email" });
    expect(field.constraints).toEqual({});
  });

  test("unknown format is ignored", () => {
    const field = compileField("color", { type: "string", format: "hex-color", maxLength: 7 }, ["color"], {});
    expect(field.type).toEqual(STRING);
    expect(field.constraints).toEqual({ maxLength: 7 });
  });

  test("format on a non-string type is ignored", () => {
    const field = compileField("n", { type: "integer", format: "uuid" }, ["n"], {});
    expect(field.type).toEqual(INTEGER);
  });

  test("maps the remaining format keywords", () => {
    const cases: Array<[string, string]> = [
      ["base64", "base64-bytes"],
      ["date", "date"],
      ["time", "time"],
      ["date-time", "date-time"],
      ["duration", "duration"],
      ["directory-path", "directory-path"],
      ["file-path", "file-path"],
      ["path", "path"],
      ["ipv4", "ipv4"],
      ["ipv6", "ipv6"],
      ["ipvanyaddress", "ip-any-address"],
      ["ipvanyinterface", "ip-any-interface"],
      ["ipvanynetwork", "ip-any-network"],
      ["json-string", "json-string"],
      ["password", "secret-string"],
      ["uri", "uri"],
      ["uuid1", "uuid1"],
      ["uuid3", "uuid3"],
      ["uuid4", "uuid4"],
      ["uuid5", "uuid5"],
    ];
    for (const [format, semantic] of cases) {
      const field = compileField("f", { type: "string", format }, ["f"], {});
      expect(field.type).toEqual({ kind: "semantic", semantic });
    }
  });

  test("binary marks the field strict", () => {
    const field = compileField("blob", { type: "string", format: "binary" }, ["blob"], {});
    expect(field.type).toEqual({ kind: "semantic", semantic: "strict-bytes" });
    expect(field.constraints).toEqual({ strict: true });
  });

  test("write-only password becomes secret bytes", () => {
    const field = compileField(
      "password",
      { type: "string", format: "password", writeOnly: true },
      ["password"],
      {},
    );
    expect(field.type).toEqual({ kind: "semantic", semantic: "secret-bytes" });
  });

  test("multi-host-uri is a union of connection strings", () => {
    const field = compileField("dsn", { type: "string", format: "multi-host-uri" }, [], {});
    expect(field.type).toEqual({
      kind: "union",
      variants: [
        { kind: "semantic", semantic: "postgres-dsn" },
        { kind: "semantic", semantic: "mongo-dsn" },
        NULL,
      ],
    });
  });

  test("uri scheme narrows the type or adds allowed schemes", () => {
    const http = compileField("a", { type: "string", format: "uri", scheme: ["http"] }, ["a"], {});
    expect(http.type).toEqual({ kind: "semantic", semantic: "http-uri" });

    const file = compileField("b", { type: "string", format: "uri", scheme: ["file"] }, ["b"], {});
    expect(file.type).toEqual({ kind: "semantic", semantic: "file-uri" });

    const ftp = compileField(
      "c",
      { type: "string", format: "uri", scheme: ["ftp", "sftp"] },
      ["c"],
      {},
    );
    expect(ftp.type).toEqual({ kind: "semantic", semantic: "uri" });
    expect(ftp.constraints).toEqual({ allowedSchemes: ["ftp", "sftp"] });
  });

  test("format descriptors are not shared between fields", () => {
    const a = compileField("a", { type: "string", format: "email" }, ["a"], {});
    const b = compileField("b", { type: "string", format: "email" }, ["b"], {});
    expect(a.type).toEqual(b.type);
    expect(a.type).not.toBe(b.type);
  });
});

describe("compileField nested models", () => {
  test("names a nested object after the title-cased field name", () => {
    const field = compileField(
      "home_address",
      { type: "object", properties: { city: { type: "string" } } },
      ["home_address"],
      {},
    );
    expect(field.type.kind === "composite" && field.type.model.name).toBe("Home_Address");
  });
});

describe("titleCase", () => {
  test("capitalizes each run of letters", () => {
    expect(titleCase("addr")).toBe("Addr");
    expect(titleCase("home_address")).toBe("Home_Address");
    expect(titleCase("userID2x")).toBe("Userid2X");
    expect(titleCase("ALREADY")).toBe("Already");
  });
});
