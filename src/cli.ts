#!/usr/bin/env -S node --import tsx
/**
 * duoschema command-line interface.
 *
 * Commands:
 *   duoschema compile <project-path> [--out <file>]          Print the OpenAPI document
 *   duoschema schemas <project-path>                         List compiled schemas
 *   duoschema validate <project-path> <schema> <input.json>  Validate a JSON file
 *   duoschema version                                        Print version
 */

import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { loadProject } from "./project/loader.ts";
import { renderOpenApiDocument } from "./server/openapi-renderer.ts";
import { validateParams } from "./server/descriptor-to-zod.ts";
import { SchemaCompileError } from "./compiler/errors.ts";
import type { Project } from "./types/project.ts";
import type { ValidationDescriptor } from "./types/schema.ts";

const VERSION = "0.1.0";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return 0;
  }

  if (command === "version" || command === "--version" || command === "-v") {
    console.log(`duoschema v${VERSION}`);
    return 0;
  }

  const projectArg = args[1];
  if (!projectArg) {
    printUsage();
    return 1;
  }

  switch (command) {
    case "compile":
      return compileCommand(projectArg, optionValue(args, "--out"));
    case "schemas":
      return schemasCommand(projectArg);
    case "validate":
      return validateCommand(projectArg, args[2], args[3]);
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      return 1;
  }
}

async function openProject(projectArg: string): Promise<Project> {
  const projectPath = resolve(projectArg);
  console.error(`[duoschema] Loading project from: ${projectPath}`);
  const project = await loadProject(projectPath);
  console.error(
    `[duoschema] Compiled ${project.registry.names().length} schema(s) for "${project.name}"`,
  );
  return project;
}

async function compileCommand(projectArg: string, out: string | undefined): Promise<number> {
  const project = await openProject(projectArg);
  const document = renderOpenApiDocument({
    title: project.name,
    description: project.description,
    document: project.config.document,
    schemas: project.registry.names().map((name) => project.registry.lookup(name)),
  });

  const json = JSON.stringify(document, null, 2);
  if (out) {
    await writeFile(resolve(out), `${json}\n`);
    console.error(`[duoschema] Wrote ${resolve(out)}`);
  } else {
    console.log(json);
  }
  return 0;
}

async function schemasCommand(projectArg: string): Promise<number> {
  const project = await openProject(projectArg);
  for (const name of project.registry.names()) {
    const descriptor = project.registry.validationDescriptorOf(name);
    console.log(`${name}  (${project.sources.get(name) ?? "?"})`);
    for (const line of describeRules(descriptor, "  ")) console.log(line);
  }
  return 0;
}

async function validateCommand(
  projectArg: string,
  schemaName: string | undefined,
  inputPath: string | undefined,
): Promise<number> {
  if (!schemaName || !inputPath) {
    console.error("Usage: duoschema validate <project-path> <schema> <input.json>");
    return 1;
  }

  const project = await openProject(projectArg);
  const input: unknown = JSON.parse(await readFile(resolve(inputPath), "utf-8"));
  const result = validateParams(project.registry.validationDescriptorOf(schemaName), input);

  if (result.ok) {
    console.log(JSON.stringify(result.value, null, 2));
    return 0;
  }
  console.log(JSON.stringify({ errors: result.errors }, null, 2));
  return 1;
}

function describeRules(descriptor: ValidationDescriptor, indent: string): string[] {
  const lines: string[] = [];
  for (const rule of descriptor) {
    const itemType = rule.items ? `<${rule.items.type}>` : "";
    lines.push(`${indent}${rule.name}: ${rule.type}${itemType}${rule.required ? ", required" : ""}`);
    const nested = rule.fields ?? rule.items?.fields;
    if (nested) lines.push(...describeRules(nested, `${indent}  `));
  }
  return lines;
}

function optionValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

function printUsage(): void {
  console.log(`
duoschema v${VERSION}: compile field declarations into validators and OpenAPI schemas

Usage:
  duoschema compile <project-path> [--out <file>]          Print or write the OpenAPI document
  duoschema schemas <project-path>                         List compiled schemas and their fields
  duoschema validate <project-path> <schema> <input.json>  Validate a JSON file against a schema
  duoschema version                                        Print version

A project folder holds project.md, config/compiler.md and schemas/*.json.
Schema files are compiled in file-name order; embed only schemas that sort earlier.
  `.trim());
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof SchemaCompileError) {
      console.error(`[duoschema] ${err.name}: ${err.message}`);
    } else {
      console.error("[duoschema] Fatal error:", err);
    }
    process.exit(1);
  });
