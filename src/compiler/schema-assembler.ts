/**
 * Folds per-field fragments into one object node.
 *
 * A lone fragment and a list of fragments normalize to the same
 * `{ type: "object", properties }` shape. Nested blocks are folded by the
 * compiler into their parent's node. Requiredness stays on each field
 * node; no schema-level required list is produced.
 */

import type { SchemaNode } from "../types/schema.ts";

export interface Fragment {
  name: string;
  node: SchemaNode;
}

export interface AssembleOptions {
  title?: string;
  required?: boolean;
}

export function fieldFragment(name: string, node: SchemaNode): Fragment {
  return { name, node };
}

/** The properties a fragment contributes */
export function toProperties(fragment: Fragment): Record<string, SchemaNode> {
  const properties: Record<string, SchemaNode> = {};
  setProperty(properties, fragment.name, fragment.node);
  return properties;
}

/** Ordered merge of several fragments into one properties map */
export function foldFragments(fragments: readonly Fragment[]): Record<string, SchemaNode> {
  const properties: Record<string, SchemaNode> = {};
  for (const fragment of fragments) {
    setProperty(properties, fragment.name, fragment.node);
  }
  return properties;
}

/** Build the object node for one fragment or a list of them */
export function assembleSchema(
  input: Fragment | readonly Fragment[],
  options: AssembleOptions = {},
): SchemaNode {
  const properties = isFragmentList(input) ? foldFragments(input) : toProperties(input);
  const node: SchemaNode = { type: "object", properties, required: options.required ?? false };
  if (options.title !== undefined) node.title = options.title;
  return node;
}

function isFragmentList(input: Fragment | readonly Fragment[]): input is readonly Fragment[] {
  return Array.isArray(input);
}

// defineProperty keeps names such as "__proto__" as ordinary keys
function setProperty(target: Record<string, SchemaNode>, name: string, node: SchemaNode): void {
  Object.defineProperty(target, name, {
    value: node,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
