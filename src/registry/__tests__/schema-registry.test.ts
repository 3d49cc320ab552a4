import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SchemaRegistry } from "../schema-registry.ts";
import { embedsMany, embedsOne, optional, required } from "../../compiler/declarations.ts";
import {
  MalformedDeclarationError,
  RegistryFrozenError,
  SchemaNotFoundError,
  UnknownSchemaReferenceError,
} from "../../compiler/errors.ts";

let registry: SchemaRegistry;

beforeEach(() => {
  registry = new SchemaRegistry();
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SchemaRegistry", () => {
  test("compiles and looks up schemas", () => {
    const address = registry.compile("Address", [required("city", "string")]);

    expect(registry.lookup("Address")).toBe(address);
    expect(registry.get("Address")).toBe(address);
    expect(registry.has("Address")).toBe(true);
    expect(registry.stateOf("Address")).toBe("compiled");
  });

  test("lists names in compilation order", () => {
    registry.compile("B", [required("b", "string")]);
    registry.compile("A", [required("a", "string")]);
    expect(registry.names()).toEqual(["B", "A"]);
  });

  test("throws for an unknown name", () => {
    expect(() => registry.lookup("Missing")).toThrow(SchemaNotFoundError);
    expect(() => registry.lookup("Missing")).toThrow('No compiled schema named "Missing"');
    expect(registry.get("Missing")).toBeUndefined();
    expect(registry.stateOf("Missing")).toBeUndefined();
  });

  test("embeds schemas compiled earlier", () => {
    const address = registry.compile("Address", [required("city", "string")]);
    const user = registry.compile("User", [
      required("name", "string"),
      embedsOne("address", "Address"),
      embedsMany("previous_addresses", "Address"),
    ]);

    expect(user.documentationSchema.properties?.address).toBe(address.documentationSchema);
    expect(user.documentationSchema.properties?.previous_addresses?.items).toBe(
      address.documentationSchema,
    );
  });

  test("rejects a schema that embeds one not compiled yet", () => {
    registry.declare("Address");
    expect(() => registry.compile("User", [embedsOne("address", "Address")])).toThrow(
      UnknownSchemaReferenceError,
    );
  });

  test("a schema cannot embed itself", () => {
    registry.compile("Node", [required("label", "string")]);
    expect(() =>
      registry.compile("Node", [required("label", "string"), embedsMany("children", "Node")]),
    ).toThrow(UnknownSchemaReferenceError);
  });

  test("recompiling a name replaces the previous schema", () => {
    registry.compile("Address", [required("city", "string")]);
    const replaced = registry.compile("Address", [optional("zip", "string")]);

    expect(registry.lookup("Address")).toBe(replaced);
    expect(Object.keys(replaced.documentationSchema.properties ?? {})).toEqual(["zip"]);
    expect(registry.names()).toEqual(["Address"]);
    expect(console.error).toHaveBeenCalledWith("[registry] Replacing compiled schema: Address");
  });

  test("a failed compilation of a new name leaves no trace", () => {
    expect(() => registry.compile("Broken", [["required", "x"]])).toThrow(
      MalformedDeclarationError,
    );
    expect(registry.has("Broken")).toBe(false);
    expect(registry.stateOf("Broken")).toBeUndefined();
  });

  test("a failed recompilation keeps the previous schema", () => {
    const original = registry.compile("Address", [required("city", "string")]);
    expect(() => registry.compile("Address", [["required", "city"]])).toThrow(
      MalformedDeclarationError,
    );
    expect(registry.lookup("Address")).toBe(original);
    expect(registry.stateOf("Address")).toBe("compiled");
  });

  test("tracks declared names", () => {
    registry.declare("Address");
    expect(registry.stateOf("Address")).toBe("declared");
    expect(registry.has("Address")).toBe(false);

    expect(() => registry.compile("Address", "not a list")).toThrow(MalformedDeclarationError);
    expect(registry.stateOf("Address")).toBe("declared");

    registry.compile("Address", [required("city", "string")]);
    registry.declare("Address");
    expect(registry.stateOf("Address")).toBe("compiled");
  });

  test("reads artifacts by name or by compiled schema", () => {
    const address = registry.compile("Address", [required("city", "string")]);

    expect(registry.documentationOf("Address")).toBe(address.documentationSchema);
    expect(registry.documentationOf(address)).toBe(address.documentationSchema);
    expect(registry.validationDescriptorOf("Address")).toEqual([
      { name: "city", type: "string", required: true, constraints: {} },
    ]);
    expect(() => registry.validationDescriptorOf("Nope")).toThrow(SchemaNotFoundError);
  });

  test("applies its type defaults to every compilation", () => {
    const dated = new SchemaRegistry({ typeDefaults: { date: { example: "1999-12-31" } } });
    const schema = dated.compile("Event", [required("on", "date")]);
    expect(schema.documentationSchema.properties?.on?.example).toBe("1999-12-31");
  });

  test("keeps the canonical date examples when its type defaults cover other types", () => {
    const described = new SchemaRegistry({ typeDefaults: { string: { description: "text" } } });
    const schema = described.compile("Event", [
      required("title", "string"),
      required("on", "date"),
      required("at", "datetime"),
    ]);

    expect(schema.documentationSchema.properties).toEqual({
      title: { type: "string", description: "text", required: true },
      on: { type: "string", format: "date", example: "2024-08-12", required: true },
      at: { type: "string", format: "date-time", example: "2024-08-12T21:00:39", required: true },
    });
  });

  test("passes overrides through to the compiler", () => {
    const schema = registry.compile("User", [required("name", "string")], {
      overrides: { name: { description: "full name" } },
    });
    expect(schema.documentationSchema.properties?.name?.description).toBe("full name");
  });
});

describe("frozen registry", () => {
  test("rejects compile and declare after freeze", () => {
    registry.compile("Address", [required("city", "string")]);
    expect(registry.freeze()).toBe(registry);
    expect(registry.isFrozen).toBe(true);

    expect(() => registry.compile("User", [required("name", "string")])).toThrow(
      'Cannot compile "User": the registry is frozen',
    );
    expect(() => registry.declare("User")).toThrow(RegistryFrozenError);
  });

  test("still serves lookups after freeze", () => {
    const address = registry.compile("Address", [required("city", "string")]);
    registry.freeze();
    expect(registry.lookup("Address")).toBe(address);
  });
});
