/**
 * Normalizes raw declaration tuples (from the builders in
 * declarations.ts or from JSON) into a tagged FieldNode tree.
 */

import {
  ARRAY_SUBTYPES,
  EMBED_KINDS,
  FIELD_KINDS,
  SCALAR_TYPES,
  TYPE_ALIASES,
  type ArraySubtype,
  type EmbedKind,
  type FieldKind,
  type FieldNode,
  type ScalarType,
  type SemanticType,
} from "../types/schema.ts";
import { MalformedDeclarationError, UnsupportedSubtypeError } from "./errors.ts";
import { isPlainObject } from "./option-resolver.ts";

/** Parse an ordered declaration list; names must be unique within it */
export function parseDeclarations(raw: unknown, parentPath = ""): FieldNode[] {
  if (!Array.isArray(raw)) {
    throw new MalformedDeclarationError(
      "Declarations must be a list of declaration tuples",
      parentPath || undefined,
    );
  }

  const entries: readonly unknown[] = raw;
  const seen = new Set<string>();

  return entries.map((entry, index) => {
    const node = parseDeclaration(entry, index, parentPath);
    if (seen.has(node.name)) {
      throw new MalformedDeclarationError(
        `Duplicate field name "${node.name}"`,
        joinPath(parentPath, node.name),
      );
    }
    seen.add(node.name);
    return node;
  });
}

/** Parse a single declaration tuple */
export function parseDeclaration(
  entry: unknown,
  index: number,
  parentPath = "",
): FieldNode {
  const position = `declaration #${index + 1}`;
  if (!Array.isArray(entry)) {
    throw new MalformedDeclarationError(
      `Expected ${position} to be a tuple, got ${typeof entry}`,
      parentPath || undefined,
    );
  }

  const tuple: readonly unknown[] = entry;
  const [kind, name] = tuple;

  if (typeof name !== "string" || name.trim() === "") {
    throw new MalformedDeclarationError(
      `Missing field name in ${position}`,
      parentPath || undefined,
    );
  }
  const path = joinPath(parentPath, name);

  if (isFieldKind(kind)) return parseFieldTuple(kind, name, tuple, path);
  if (isEmbedKind(kind)) return parseEmbedTuple(kind, name, tuple, path);

  throw new MalformedDeclarationError(
    `Unrecognized declaration kind "${String(kind)}"`,
    path,
  );
}

function parseFieldTuple(
  kind: FieldKind,
  name: string,
  tuple: readonly unknown[],
  path: string,
): FieldNode {
  if (tuple.length < 3) {
    throw new MalformedDeclarationError(`Missing type for ${kind} field`, path);
  }
  if (tuple.length > 4) {
    throw new MalformedDeclarationError(
      `Too many parts in ${kind} declaration (expected name, type, options)`,
      path,
    );
  }

  const type = parseType(tuple[2], path);
  const rawOptions = tuple[3];

  if (rawOptions !== undefined && !isPlainObject(rawOptions)) {
    throw new MalformedDeclarationError("Options must be a plain object", path);
  }

  const source: Record<string, unknown> = rawOptions ?? {};
  const { fields: rawFields, ...options } = source;
  const fields =
    rawFields === undefined ? undefined : parseDeclarations(rawFields, path);

  const objectArray = typeof type === "object" && type.array === "object";

  if (fields && type !== "object" && !objectArray) {
    throw new MalformedDeclarationError(
      `An inline field block is only allowed on object fields and arrays of objects`,
      path,
    );
  }
  if (objectArray && !fields) {
    throw new MalformedDeclarationError(
      "An array of objects needs an inline field block",
      path,
    );
  }
  if (type === "enum" && options.values === undefined) {
    throw new MalformedDeclarationError("An enum field needs `values`", path);
  }

  return fields ? { kind, name, type, options, fields } : { kind, name, type, options };
}

function parseEmbedTuple(
  kind: EmbedKind,
  name: string,
  tuple: readonly unknown[],
  path: string,
): FieldNode {
  if (tuple.length !== 3) {
    throw new MalformedDeclarationError(
      `Expected ${kind} to take a name and a schema reference`,
      path,
    );
  }

  const reference = tuple[2];
  if (typeof reference === "string" && reference.trim() !== "") {
    return { kind, name, schema: reference };
  }
  if (typeof reference === "object" && reference !== null) {
    const refName: unknown = Reflect.get(reference, "name");
    if (typeof refName === "string" && refName !== "") {
      return { kind, name, schema: refName };
    }
  }

  throw new MalformedDeclarationError(
    `${kind} needs a schema name or a compiled schema`,
    path,
  );
}

/** Normalize a raw type tag into a SemanticType */
export function parseType(tag: unknown, path?: string): SemanticType {
  if (typeof tag === "string") {
    if (isScalarType(tag)) return tag;
    const alias = Object.hasOwn(TYPE_ALIASES, tag) ? TYPE_ALIASES[tag] : undefined;
    if (alias) return alias;
    if (tag === "array") {
      throw new MalformedDeclarationError(
        'Array types need a subtype, e.g. ["array", "string"]',
        path,
      );
    }
    throw new MalformedDeclarationError(`Unrecognized type "${tag}"`, path);
  }

  if (Array.isArray(tag) && tag.length === 2 && tag[0] === "array") {
    const subtype: unknown = tag[1];
    if (typeof subtype !== "string") {
      throw new MalformedDeclarationError("Array subtype must be a type name", path);
    }
    const normalized = subtype === "map" ? "object" : subtype;
    if (isArraySubtype(normalized)) return { array: normalized };
    throw new UnsupportedSubtypeError(subtype, path);
  }

  throw new MalformedDeclarationError(`Unrecognized type ${JSON.stringify(tag)}`, path);
}

function isFieldKind(value: unknown): value is FieldKind {
  return FIELD_KINDS.some((k) => k === value);
}

function isEmbedKind(value: unknown): value is EmbedKind {
  return EMBED_KINDS.some((k) => k === value);
}

function isScalarType(value: string): value is ScalarType {
  return SCALAR_TYPES.some((t) => t === value);
}

function isArraySubtype(value: string): value is ArraySubtype {
  return ARRAY_SUBTYPES.some((t) => t === value);
}

export function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}
