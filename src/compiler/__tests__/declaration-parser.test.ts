import { describe, expect, test } from "vitest";
import { parseDeclarations, parseType } from "../declaration-parser.ts";
import {
  arrayOf,
  embedsMany,
  embedsOne,
  field,
  optional,
  required,
} from "../declarations.ts";
import { MalformedDeclarationError, UnsupportedSubtypeError } from "../errors.ts";
import type { CompiledSchema } from "../../types/schema.ts";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

describe("parseDeclarations", () => {
  test("parses field and embed tuples in declaration order", () => {
    const nodes = parseDeclarations([
      required("id", "uuid"),
      optional("nickname", "string", { maxLength: 20 }),
      field("score", "integer"),
      embedsOne("address", "Address"),
      embedsMany("phones", "Phone"),
    ]);

    expect(nodes).toEqual([
      { kind: "required", name: "id", type: "uuid", options: {} },
      { kind: "optional", name: "nickname", type: "string", options: { maxLength: 20 } },
      { kind: "field", name: "score", type: "integer", options: {} },
      { kind: "embeds_one", name: "address", schema: "Address" },
      { kind: "embeds_many", name: "phones", schema: "Phone" },
    ]);
  });

  test("takes the name of a compiled schema reference", () => {
    const user: CompiledSchema = {
      name: "User",
      validationDescriptor: [],
      documentationSchema: { type: "object", required: false },
    };

    expect(parseDeclarations([embedsOne("owner", user)])).toEqual([
      { kind: "embeds_one", name: "owner", schema: "User" },
    ]);
  });

  test("moves an inline block out of the options", () => {
    const [node] = parseDeclarations([
      required("meta", "object", {
        description: "free-form metadata",
        fields: [required("source", "string")],
      }),
    ]);

    expect(node).toEqual({
      kind: "required",
      name: "meta",
      type: "object",
      options: { description: "free-form metadata" },
      fields: [{ kind: "required", name: "source", type: "string", options: {} }],
    });
  });

  test("accepts declarations read from JSON", () => {
    const raw: unknown = JSON.parse(
      '[["required", "tags", ["array", "string"]], ["optional", "at", "utc_datetime"]]',
    );

    expect(parseDeclarations(raw)).toEqual([
      { kind: "required", name: "tags", type: { array: "string" }, options: {} },
      { kind: "optional", name: "at", type: "datetime", options: {} },
    ]);
  });

  test("rejects a value that is not a list", () => {
    expect(() => parseDeclarations({ name: "string" })).toThrow(
      "Declarations must be a list of declaration tuples",
    );
  });

  test("rejects duplicate names within one block", () => {
    const err = thrown(() =>
      parseDeclarations([required("email", "string"), optional("email", "string")]),
    );
    expect(err).toBeInstanceOf(MalformedDeclarationError);
    expect(err).toMatchObject({
      code: "malformed_declaration",
      path: "email",
      message: 'Duplicate field name "email" (at "email")',
    });
  });

  test("reports the dotted path of a duplicate inside a nested block", () => {
    expect(() =>
      parseDeclarations([
        required("address", "object", {
          fields: [required("city", "string"), optional("city", "string")],
        }),
      ]),
    ).toThrow('Duplicate field name "city" (at "address.city")');
  });

  test("allows the same name in different blocks", () => {
    const nodes = parseDeclarations([
      required("name", "string"),
      required("owner", "object", { fields: [required("name", "string")] }),
    ]);
    expect(nodes.map((n) => n.name)).toEqual(["name", "owner"]);
  });

  test("rejects an unknown declaration kind", () => {
    expect(() => parseDeclarations([["maybe", "nickname", "string"]])).toThrow(
      'Unrecognized declaration kind "maybe" (at "nickname")',
    );
  });

  test("rejects a missing or empty name", () => {
    expect(() => parseDeclarations([["required", "", "string"]])).toThrow(
      "Missing field name in declaration #1",
    );
    expect(() => parseDeclarations([required("a", "string"), ["optional"]])).toThrow(
      "Missing field name in declaration #2",
    );
  });

  test("rejects a field without a type", () => {
    expect(() => parseDeclarations([["required", "title"]])).toThrow(
      'Missing type for required field (at "title")',
    );
  });

  test("rejects options that are not a plain object", () => {
    expect(() => parseDeclarations([["optional", "title", "string", ["max"]]])).toThrow(
      'Options must be a plain object (at "title")',
    );
  });

  test("rejects a non-tuple entry", () => {
    expect(() => parseDeclarations(["title"])).toThrow(
      "Expected declaration #1 to be a tuple, got string",
    );
  });

  test("requires an inline block on arrays of objects", () => {
    expect(() => parseDeclarations([required("items", arrayOf("object"))])).toThrow(
      'An array of objects needs an inline field block (at "items")',
    );
  });

  test("rejects an inline block on a scalar field", () => {
    expect(() =>
      parseDeclarations([
        required("title", "string", { fields: [required("x", "string")] }),
      ]),
    ).toThrow(MalformedDeclarationError);
  });

  test("requires values on an enum", () => {
    expect(() => parseDeclarations([required("role", "enum")])).toThrow(
      'An enum field needs `values` (at "role")',
    );
  });

  test("rejects an embed without a usable reference", () => {
    expect(() => parseDeclarations([["embeds_one", "owner", 42]])).toThrow(
      'embeds_one needs a schema name or a compiled schema (at "owner")',
    );
  });

  test("rejects an unsupported array subtype", () => {
    const err = thrown(() => parseDeclarations([["required", "flags", ["array", "boolean"]]]));
    expect(err).toBeInstanceOf(UnsupportedSubtypeError);
    expect(err).toMatchObject({
      code: "unsupported_subtype",
      subtype: "boolean",
      path: "flags",
    });
  });
});

describe("parseType", () => {
  test("keeps scalar names", () => {
    expect(parseType("decimal")).toBe("decimal");
    expect(parseType("uuid")).toBe("uuid");
  });

  test("resolves aliases", () => {
    expect(parseType("map")).toBe("object");
    expect(parseType("utc_datetime")).toBe("datetime");
    expect(parseType("naive_datetime")).toBe("datetime");
    expect(parseType(["array", "map"])).toEqual({ array: "object" });
  });

  test("rejects a bare array tag", () => {
    expect(() => parseType("array", "tags")).toThrow(
      'Array types need a subtype, e.g. ["array", "string"] (at "tags")',
    );
  });

  test("rejects an unknown type name", () => {
    expect(() => parseType("text", "body")).toThrow('Unrecognized type "text" (at "body")');
  });

  test("rejects nested arrays as a subtype", () => {
    expect(() => parseType(["array", "array"])).toThrow(UnsupportedSubtypeError);
  });
});
