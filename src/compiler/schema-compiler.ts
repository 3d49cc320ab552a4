/**
 * Compiles one ordered declaration list into a
 * CompiledSchema: a validation descriptor and a documentation tree built in
 * the same recursive pass.
 */

import { DEFAULT_COMPILER_CONFIG, type TypeDefaults } from "../types/config.ts";
import type {
  CompiledSchema,
  FieldNode,
  ValidationRule,
} from "../types/schema.ts";
import { joinPath, parseDeclarations } from "./declaration-parser.ts";
import { resolveEmbed, type SchemaLookup } from "./nested-resolver.ts";
import {
  assembleSchema,
  fieldFragment,
  foldFragments,
  type Fragment,
} from "./schema-assembler.ts";
import { mapField, type CompiledBlock, type MappedField } from "./type-mapper.ts";

/** Option patches keyed by dotted field path (e.g. "address.city") */
export type FieldOverrides = Readonly<Record<string, Readonly<Record<string, unknown>>>>;

export interface CompileOptions {
  /** Source of schemas that may be embedded */
  lookup: SchemaLookup;
  typeDefaults?: TypeDefaults;
  overrides?: FieldOverrides;
}

interface CompileEnv {
  lookup: SchemaLookup;
  typeDefaults: TypeDefaults;
  overrides: FieldOverrides;
  usedOverrides: Set<string>;
}

interface CompiledFields {
  fragments: Fragment[];
  descriptor: ValidationRule[];
}

/** Compile a declaration list into an immutable CompiledSchema */
export function compileSchema(
  name: string,
  declarations: unknown,
  options: CompileOptions,
): CompiledSchema {
  const env: CompileEnv = {
    lookup: options.lookup,
    typeDefaults: options.typeDefaults ?? DEFAULT_COMPILER_CONFIG.typeDefaults,
    overrides: options.overrides ?? {},
    usedOverrides: new Set(),
  };

  const nodes = parseDeclarations(declarations);
  const { fragments, descriptor } = compileFields(nodes, "", env);

  for (const path of Object.keys(env.overrides)) {
    if (!env.usedOverrides.has(path)) {
      console.error(`[compiler] ${name}: override for unknown field "${path}" ignored`);
    }
  }

  return deepFreeze({
    name,
    validationDescriptor: descriptor,
    documentationSchema: assembleSchema(fragments, { title: name, required: false }),
  });
}

function compileFields(
  nodes: readonly FieldNode[],
  parentPath: string,
  env: CompileEnv,
): CompiledFields {
  const fragments: Fragment[] = [];
  const descriptor: ValidationRule[] = [];

  for (const node of nodes) {
    const mapped = compileNode(node, joinPath(parentPath, node.name), env);
    fragments.push(fieldFragment(node.name, mapped.node));
    descriptor.push(mapped.rule);
  }

  return { fragments, descriptor };
}

function compileNode(node: FieldNode, path: string, env: CompileEnv): MappedField {
  switch (node.kind) {
    case "embeds_one":
    case "embeds_many":
      return resolveEmbed(node, env.lookup, path);
    case "required":
    case "optional":
    case "field":
      return mapField(node, {
        path,
        typeDefaults: env.typeDefaults,
        override: overrideFor(path, env),
        compileBlock: (fields, blockPath) => compileBlock(fields, blockPath, env),
      });
  }
}

function compileBlock(
  nodes: readonly FieldNode[],
  path: string,
  env: CompileEnv,
): CompiledBlock {
  const { fragments, descriptor } = compileFields(nodes, path, env);
  return { properties: foldFragments(fragments), descriptor };
}

function overrideFor(
  path: string,
  env: CompileEnv,
): Readonly<Record<string, unknown>> | undefined {
  if (!Object.hasOwn(env.overrides, path)) return undefined;
  env.usedOverrides.add(path);
  return env.overrides[path];
}

/** Recursively freeze a compiled value; already frozen subtrees are skipped */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}
