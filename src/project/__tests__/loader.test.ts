import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { loadProject, parseSchemaFile } from "../loader.ts";
import {
  MalformedDeclarationError,
  UnknownSchemaReferenceError,
} from "../../compiler/errors.ts";
import { validateParams } from "../../server/descriptor-to-zod.ts";

const EXAMPLE_API = fileURLToPath(new URL("../../../example-api", import.meta.url));

let testDir: string;

async function writeProjectFile(relativePath: string, content: string): Promise<void> {
  const path = join(testDir, relativePath);
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, content);
}

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), "duoschema-project-"));
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(testDir, { recursive: true, force: true });
});

describe("loadProject", () => {
  test("compiles schema files in file-name order and freezes the registry", async () => {
    await writeProjectFile(
      "project.md",
      "# Shop API\n\nSells things\nto people.\n\n## Notes\n\nNot part of the description.\n",
    );
    await writeProjectFile("config/compiler.md", "**Date example:** 1990-01-01\n");
    await writeProjectFile(
      "schemas/01-address.json",
      JSON.stringify({ name: "Address", fields: [["required", "city", "string"]] }),
    );
    await writeProjectFile(
      "schemas/02-customer.json",
      JSON.stringify({
        name: "Customer",
        fields: [
          ["required", "id", "uuid"],
          ["optional", "born_on", "date"],
          ["embeds_one", "address", "Address"],
        ],
      }),
    );
    await writeProjectFile("schemas/_draft.json", "{ not json");
    await writeProjectFile("schemas/README.txt", "ignored");

    const project = await loadProject(testDir);

    expect(project.name).toBe("Shop API");
    expect(project.description).toBe("Sells things to people.");
    expect(project.registry.names()).toEqual(["Address", "Customer"]);
    expect(project.registry.isFrozen).toBe(true);
    expect(Array.from(project.sources)).toEqual([
      ["Address", "schemas/01-address.json"],
      ["Customer", "schemas/02-customer.json"],
    ]);

    const customer = project.registry.documentationOf("Customer");
    expect(customer.properties?.born_on?.example).toBe("1990-01-01");
    expect(customer.properties?.address).toBe(project.registry.documentationOf("Address"));
  });

  test("names a schema after its file when the file gives no name", async () => {
    await writeProjectFile("schemas/Tag.json", JSON.stringify({ fields: [["required", "label", "string"]] }));

    const project = await loadProject(testDir);
    expect(project.registry.names()).toEqual(["Tag"]);
  });

  test("applies overrides from the schema file", async () => {
    await writeProjectFile(
      "schemas/User.json",
      JSON.stringify({
        fields: [["optional", "nickname", "string"]],
        overrides: { nickname: { description: "shown publicly" } },
      }),
    );

    const project = await loadProject(testDir);
    expect(project.registry.documentationOf("User").properties?.nickname).toEqual({
      type: "string",
      description: "shown publicly",
      required: false,
    });
  });

  test("fails on a schema that embeds one sorting after it", async () => {
    await writeProjectFile(
      "schemas/01-user.json",
      JSON.stringify({ name: "User", fields: [["embeds_one", "address", "Address"]] }),
    );
    await writeProjectFile(
      "schemas/02-address.json",
      JSON.stringify({ name: "Address", fields: [["required", "city", "string"]] }),
    );

    await expect(loadProject(testDir)).rejects.toThrow(UnknownSchemaReferenceError);
    expect(console.error).toHaveBeenCalledWith(
      "[project] Failed to compile schema schemas/01-user.json",
    );
  });

  test("uses defaults for an empty folder", async () => {
    const project = await loadProject(testDir);

    expect(project.name).toBe("Untitled API");
    expect(project.description).toBe("");
    expect(project.registry.names()).toEqual([]);
    expect(project.config.document.apiVersion).toBe("1.0.0");
  });
});

describe("parseSchemaFile", () => {
  test("reads name, fields and overrides", () => {
    const content = JSON.stringify({
      name: "User",
      fields: [["required", "id", "uuid"]],
      overrides: { id: { description: "primary key" } },
    });
    expect(parseSchemaFile(content, "02-user", "schemas/02-user.json")).toEqual({
      name: "User",
      fields: [["required", "id", "uuid"]],
      overrides: { id: { description: "primary key" } },
    });
  });

  test("rejects invalid JSON", () => {
    expect(() => parseSchemaFile("{", "x", "schemas/x.json")).toThrow(MalformedDeclarationError);
    expect(() => parseSchemaFile("{", "x", "schemas/x.json")).toThrow(
      "Invalid JSON in schemas/x.json",
    );
  });

  test("rejects a file that is not an object", () => {
    expect(() => parseSchemaFile("[]", "x", "schemas/x.json")).toThrow(
      "schemas/x.json must contain a JSON object",
    );
  });

  test("rejects a file without fields", () => {
    expect(() => parseSchemaFile('{"name": "X"}', "x", "schemas/x.json")).toThrow(
      'schemas/x.json has no "fields" list',
    );
  });

  test("rejects an empty name", () => {
    expect(() => parseSchemaFile('{"name": "", "fields": []}', "x", "schemas/x.json")).toThrow(
      '"name" in schemas/x.json must be a non-empty string',
    );
  });

  test("rejects overrides that are not option objects", () => {
    expect(() =>
      parseSchemaFile('{"fields": [], "overrides": {"id": "uuid"}}', "x", "schemas/x.json"),
    ).toThrow('"overrides" in schemas/x.json must map field paths to option objects');
  });
});

describe("example project", () => {
  test("compiles every schema", async () => {
    const project = await loadProject(EXAMPLE_API);

    expect(project.name).toBe("Users API");
    expect(project.config.document.apiVersion).toBe("1.2.0");
    expect(project.registry.names()).toEqual(["Address", "User", "Order"]);

    const user = project.registry.documentationOf("User");
    expect(user.properties?.born_on?.example).toBe("1990-04-21");
    expect(user.properties?.last_name?.description).toBe("family name");
    expect(project.registry.documentationOf("Order").properties?.status?.enum).toEqual([
      "open",
      "paid",
      "shipped",
    ]);
  });

  test("validates the sample input", async () => {
    const project = await loadProject(EXAMPLE_API);
    const input: unknown = JSON.parse(await readFile(join(EXAMPLE_API, "user.json"), "utf-8"));

    const result = validateParams(project.registry.validationDescriptorOf("User"), input);
    expect(result).toEqual({
      ok: true,
      value: {
        id: "5b3f0f0e-8f4a-4c1e-9d55-0c2f6a0f9b11",
        first_name: "Greg",
        role: "normal",
        inserted_at: "2024-08-12T21:00:39Z",
        address: { street: "221B Baker Street", city: "London" },
      },
    });
  });
});
