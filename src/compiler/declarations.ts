/**
 * Small builders for the raw declaration tuples the
 * parser consumes. The same tuples may also be read from JSON files.
 *
 *   registry.compile("User", [
 *     required("first_name", "string", { example: "Greg" }),
 *     optional("role", "enum", { values: ["admin", "normal"] }),
 *     required("tags", arrayOf("string")),
 *     embedsOne("address", "Address"),
 *   ]);
 */

import type {
  ArraySubtype,
  CompiledSchema,
  EmbedKind,
  FieldKind,
  ScalarType,
} from "../types/schema.ts";

export type ArrayTypeTag = readonly ["array", ArraySubtype | "map"];

export type TypeTag =
  | ScalarType
  | "map"
  | "utc_datetime"
  | "naive_datetime"
  | ArrayTypeTag;

export interface DeclarationOptions {
  [key: string]: unknown;
  /** Inline nested block for object and array-of-object fields */
  fields?: readonly RawDeclaration[];
}

export type RawFieldDeclaration =
  | readonly [FieldKind, string, TypeTag]
  | readonly [FieldKind, string, TypeTag, DeclarationOptions];

export type SchemaReference = string | CompiledSchema;

export type RawEmbedDeclaration = readonly [EmbedKind, string, SchemaReference];

export type RawDeclaration = RawFieldDeclaration | RawEmbedDeclaration;

function declare(
  kind: FieldKind,
  name: string,
  type: TypeTag,
  options?: DeclarationOptions,
): RawFieldDeclaration {
  return options ? [kind, name, type, options] : [kind, name, type];
}

/** A field that must be present in validated input */
export function required(
  name: string,
  type: TypeTag,
  options?: DeclarationOptions,
): RawFieldDeclaration {
  return declare("required", name, type, options);
}

/** A field that may be absent from validated input */
export function optional(
  name: string,
  type: TypeTag,
  options?: DeclarationOptions,
): RawFieldDeclaration {
  return declare("optional", name, type, options);
}

/** A plain schema field; never marked required */
export function field(
  name: string,
  type: TypeTag,
  options?: DeclarationOptions,
): RawFieldDeclaration {
  return declare("field", name, type, options);
}

export function embedsOne(name: string, schema: SchemaReference): RawEmbedDeclaration {
  return ["embeds_one", name, schema];
}

export function embedsMany(name: string, schema: SchemaReference): RawEmbedDeclaration {
  return ["embeds_many", name, schema];
}

export function arrayOf(subtype: ArraySubtype | "map"): ArrayTypeTag {
  return ["array", subtype];
}
