/** Splices an already compiled schema into an embeds_one / embeds_many position */

import type { CompiledSchema, EmbedSpec } from "../types/schema.ts";
import { UnknownSchemaReferenceError } from "./errors.ts";
import type { MappedField } from "./type-mapper.ts";

/** Read-only view of compiled schemas available for embedding */
export type SchemaLookup = (name: string) => CompiledSchema | undefined;

export function resolveEmbed(
  spec: EmbedSpec,
  lookup: SchemaLookup,
  path: string,
): MappedField {
  const target = lookup(spec.schema);
  if (!target) {
    throw new UnknownSchemaReferenceError(spec.schema, path);
  }

  const fields = target.validationDescriptor;

  switch (spec.kind) {
    case "embeds_one":
      return {
        node: target.documentationSchema,
        rule: { name: spec.name, type: "map", required: false, constraints: {}, fields },
      };
    case "embeds_many":
      return {
        node: { type: "array", items: target.documentationSchema, required: false },
        rule: {
          name: spec.name,
          type: "array",
          required: false,
          constraints: {},
          items: { type: "map", fields },
        },
      };
  }
}
