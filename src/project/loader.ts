/**
 * Reads a schema project folder and compiles every schema
 * file into a frozen registry. Files are compiled in file-name order, so a
 * schema must sort after every schema it embeds (e.g. "01-address.json"
 * before "02-user.json").
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Project } from "../types/project.ts";
import { loadServerConfig } from "../config/loader.ts";
import { MalformedDeclarationError } from "../compiler/errors.ts";
import { isPlainObject } from "../compiler/option-resolver.ts";
import type { FieldOverrides } from "../compiler/schema-compiler.ts";
import { SchemaRegistry } from "../registry/schema-registry.ts";

/** Parsed content of one schemas/*.json file */
export interface SchemaFile {
  name: string;
  fields: unknown;
  overrides?: FieldOverrides;
}

/** Load a project from a folder path */
export async function loadProject(rootPath: string): Promise<Project> {
  const { name, description } = await loadProjectMeta(rootPath);
  const config = await loadServerConfig(rootPath);
  const registry = new SchemaRegistry({ typeDefaults: config.compiler.typeDefaults });
  const sources = new Map<string, string>();

  const schemaDir = join(rootPath, "schemas");
  const files = await listJsonFiles(schemaDir);

  const parsed: { file: SchemaFile; relativePath: string }[] = [];
  for (const file of files) {
    const relativePath = `schemas/${file}`;
    const content = await readFile(join(schemaDir, file), "utf-8");
    const schemaFile = parseSchemaFile(content, basename(file, ".json"), relativePath);
    registry.declare(schemaFile.name);
    parsed.push({ file: schemaFile, relativePath });
  }

  for (const { file, relativePath } of parsed) {
    try {
      registry.compile(file.name, file.fields, { overrides: file.overrides });
    } catch (err) {
      console.error(`[project] Failed to compile schema ${relativePath}`);
      throw err;
    }
    sources.set(file.name, relativePath);
  }

  registry.freeze();
  return { rootPath, name, description, config, registry, sources };
}

/** Parse a schema file: `{ "name"?, "fields": [...], "overrides"? }` */
export function parseSchemaFile(
  content: string,
  defaultName: string,
  relativePath: string,
): SchemaFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedDeclarationError(`Invalid JSON in ${relativePath}: ${reason}`);
  }

  if (!isPlainObject(data)) {
    throw new MalformedDeclarationError(`${relativePath} must contain a JSON object`);
  }

  const name = data.name ?? defaultName;
  if (typeof name !== "string" || name === "") {
    throw new MalformedDeclarationError(`"name" in ${relativePath} must be a non-empty string`);
  }
  if (data.fields === undefined) {
    throw new MalformedDeclarationError(`${relativePath} has no "fields" list`);
  }

  const overrides = data.overrides;
  if (overrides === undefined) return { name, fields: data.fields };

  if (!isOverrideMap(overrides)) {
    throw new MalformedDeclarationError(
      `"overrides" in ${relativePath} must map field paths to option objects`,
    );
  }
  return { name, fields: data.fields, overrides };
}

/** Read project.md for name and description */
async function loadProjectMeta(
  rootPath: string,
): Promise<{ name: string; description: string }> {
  let content: string;
  try {
    content = await readFile(join(rootPath, "project.md"), "utf-8");
  } catch {
    return { name: "Untitled API", description: "" };
  }

  let name = "Untitled API";
  const descLines: string[] = [];
  let pastHeading = false;

  for (const line of content.split("\n")) {
    const h1Match = line.match(/^#\s+(.+)$/);
    if (h1Match?.[1] && !pastHeading) {
      name = h1Match[1].trim();
      pastHeading = true;
      continue;
    }
    if (pastHeading && line.match(/^##/)) break; // Stop at next heading
    if (pastHeading && line.trim()) descLines.push(line.trim());
  }

  return { name, description: descLines.join(" ") };
}

/** List .json files in a directory, sorted by name */
async function listJsonFiles(dirPath: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dirPath);
  } catch {
    return []; // No schemas directory
  }
  return entries.filter((f) => f.endsWith(".json") && !f.startsWith("_")).sort();
}

function isOverrideMap(value: unknown): value is Record<string, Record<string, unknown>> {
  return isPlainObject(value) && Object.values(value).every(isPlainObject);
}
