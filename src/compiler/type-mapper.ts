/**
 * Turns one parsed field into its documentation node and its
 * validation rule, both from the same merged option set.
 */

import {
  DEFAULT_DATE_EXAMPLE,
  DEFAULT_DATETIME_EXAMPLE,
  type TypeDefaults,
} from "../types/config.ts";
import type {
  ArraySubtype,
  FieldNode,
  FieldOptions,
  FieldSpec,
  JsonLiteral,
  SchemaNode,
  SchemaNodeType,
  ValidationConstraints,
  ValidationRule,
  ValidationType,
} from "../types/schema.ts";
import { MalformedDeclarationError } from "./errors.ts";
import {
  assertPlainDecimalValues,
  pickKnownOptions,
  resolveOptions,
  type KnownOptions,
} from "./option-resolver.ts";

export interface MappedField {
  node: SchemaNode;
  rule: ValidationRule;
}

/** Properties and rules of a compiled inline block */
export interface CompiledBlock {
  properties: Record<string, SchemaNode>;
  descriptor: ValidationRule[];
}

export type BlockCompiler = (fields: FieldNode[], path: string) => CompiledBlock;

export interface MapperContext {
  /** Dotted path of the field, for error messages */
  path: string;
  typeDefaults: TypeDefaults;
  /** Caller-supplied option patch for this field */
  override?: Readonly<Record<string, unknown>>;
  /** Compiles inline nested blocks (object and array-of-object fields) */
  compileBlock: BlockCompiler;
}

type Documentation = Omit<SchemaNode, "type" | "required">;

const NUMERIC_KEYS = ["minimum", "maximum", "minLength", "maxLength"] as const;
const TEXT_KEYS = ["format", "pattern", "description", "title"] as const;
const FLAG_KEYS = ["nullable", "deprecated", "readOnly", "writeOnly"] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];
type TextKey = (typeof TEXT_KEYS)[number];
type FlagKey = (typeof FLAG_KEYS)[number];

/** Map a parsed field to its documentation node and validation rule */
export function mapField(spec: FieldSpec, ctx: MapperContext): MappedField {
  const required = spec.kind === "required";
  const options = mergeOptions(spec, ctx);
  const { type } = spec;

  if (typeof type === "object") {
    return mapArray(spec, type.array, options, required, ctx);
  }

  switch (type) {
    case "enum":
      return mapEnum(spec.name, options, "values", required, ctx.path);
    case "string":
      // A string restricted to a value set is an enum; the enum shape wins
      // over any declared format.
      if (options.included !== undefined) {
        return mapEnum(spec.name, options, "included", required, ctx.path);
      }
      return passthrough(spec.name, "string", "string", options, required, ctx.path);
    case "integer":
    case "number":
    case "boolean":
      return passthrough(spec.name, type, type, options, required, ctx.path);
    case "uuid":
      return withFormat(spec.name, "string", "uuid", "string", options, required, ctx.path);
    case "date":
      return mapTemporal(spec.name, "date", "date", options, required, ctx.path);
    case "datetime":
      return mapTemporal(spec.name, "date-time", "datetime", options, required, ctx.path);
    case "decimal":
      return withFormat(spec.name, "number", "double", "decimal", options, required, ctx.path);
    case "object":
      return mapObject(spec, options, required, ctx);
  }
}

/**
 * Merge options with precedence: type defaults < declared options <
 * caller overrides. Type-forced keys are applied later by each mapper.
 */
export function mergeOptions(spec: FieldSpec, ctx: MapperContext): FieldOptions {
  const declared = pickKnownOptions(spec.options);
  const override = pickKnownOptions(ctx.override ?? {});

  if (spec.type === "decimal") {
    assertPlainDecimalValues(declared, ctx.path);
    assertPlainDecimalValues(override, ctx.path);
  }
  if (spec.type === "date") {
    toDateOnlyValues(declared);
    toDateOnlyValues(override);
  }

  const defaults = typeof spec.type === "string" ? ctx.typeDefaults[spec.type] : undefined;

  return {
    ...defaults,
    ...resolveOptions(declared, ctx.path),
    ...resolveOptions(override, ctx.path),
  };
}

function passthrough(
  name: string,
  nodeType: SchemaNodeType,
  ruleType: ValidationType,
  options: FieldOptions,
  required: boolean,
  path: string,
): MappedField {
  return {
    node: { ...documentation(options, path), type: nodeType, required },
    rule: rule(name, ruleType, required, constraints(options, path)),
  };
}

function withFormat(
  name: string,
  nodeType: SchemaNodeType,
  format: string,
  ruleType: ValidationType,
  options: FieldOptions,
  required: boolean,
  path: string,
): MappedField {
  return {
    node: { ...documentation(options, path), type: nodeType, format, required },
    rule: rule(name, ruleType, required, constraints(options, path)),
  };
}

function mapTemporal(
  name: string,
  format: "date" | "date-time",
  ruleType: "date" | "datetime",
  options: FieldOptions,
  required: boolean,
  path: string,
): MappedField {
  const mapped = withFormat(name, "string", format, ruleType, options, required, path);
  const canonical = ruleType === "date" ? DEFAULT_DATE_EXAMPLE : DEFAULT_DATETIME_EXAMPLE;
  mapped.node.example = stringify(options.example ?? canonical);
  return mapped;
}

function mapEnum(
  name: string,
  options: FieldOptions,
  source: "values" | "included",
  required: boolean,
  path: string,
): MappedField {
  const values = enumValues(options[source], source, path);
  const doc = documentation(options, path);
  delete doc.format;
  if (doc.default !== undefined) doc.default = stringify(doc.default);

  const ruleConstraints = constraints(options, path);
  if (ruleConstraints.default !== undefined) {
    ruleConstraints.default = stringify(ruleConstraints.default);
  }

  return {
    node: { ...doc, type: "string", enum: values, required },
    rule: rule(name, "string", required, { ...ruleConstraints, included: values }),
  };
}

function mapArray(
  spec: FieldSpec,
  subtype: ArraySubtype,
  options: FieldOptions,
  required: boolean,
  ctx: MapperContext,
): MappedField {
  const doc = documentation(options, ctx.path);
  const arrayConstraints = constraints(options, ctx.path);

  if (subtype === "object") {
    const block = ctx.compileBlock(spec.fields ?? [], ctx.path);
    return {
      node: {
        ...doc,
        type: "array",
        items: { type: "object", properties: block.properties, required },
        required,
      },
      rule: {
        ...rule(spec.name, "array", required, arrayConstraints),
        items: { type: "map", fields: block.descriptor },
      },
    };
  }

  return {
    node: { ...doc, type: "array", items: { type: subtype, required }, required },
    rule: { ...rule(spec.name, "array", required, arrayConstraints), items: { type: subtype } },
  };
}

function mapObject(
  spec: FieldSpec,
  options: FieldOptions,
  required: boolean,
  ctx: MapperContext,
): MappedField {
  const doc = documentation(options, ctx.path);
  const mapConstraints = constraints(options, ctx.path);

  if (!spec.fields) {
    return {
      node: { ...doc, type: "object", required },
      rule: rule(spec.name, "map", required, mapConstraints),
    };
  }

  const block = ctx.compileBlock(spec.fields, ctx.path);
  return {
    node: { ...doc, type: "object", properties: block.properties, required },
    rule: { ...rule(spec.name, "map", required, mapConstraints), fields: block.descriptor },
  };
}

function rule(
  name: string,
  type: ValidationType,
  required: boolean,
  ruleConstraints: ValidationConstraints,
): ValidationRule {
  return { name, type, required, constraints: ruleConstraints };
}

/** Documentation keys of the options, type-checked */
function documentation(options: FieldOptions, path: string): Documentation {
  const doc: Documentation = {};

  for (const key of NUMERIC_KEYS) {
    const value = numberOption(options, key, path);
    if (value !== undefined) doc[key] = value;
  }
  for (const key of TEXT_KEYS) {
    const value = textOption(options, key, path);
    if (value !== undefined) doc[key] = value;
  }
  for (const key of FLAG_KEYS) {
    const value = flagOption(options, key, path);
    if (value !== undefined) doc[key] = value;
  }
  if (options.example !== undefined) doc.example = options.example;
  if (options.default !== undefined) doc.default = options.default;

  return doc;
}

/** Validation keys of the options; never documentation-only ones */
function constraints(options: FieldOptions, path: string): ValidationConstraints {
  const out: ValidationConstraints = {};

  for (const key of NUMERIC_KEYS) {
    const value = numberOption(options, key, path);
    if (value !== undefined) out[key] = value;
  }
  const pattern = textOption(options, "pattern", path);
  if (pattern !== undefined) out.pattern = pattern;
  const nullable = flagOption(options, "nullable", path);
  if (nullable !== undefined) out.nullable = nullable;
  if (options.default !== undefined) out.default = options.default;

  return out;
}

function numberOption(options: FieldOptions, key: NumericKey, path: string): number | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new MalformedDeclarationError(`Option "${key}" must be a number`, path);
  }
  return value;
}

function textOption(options: FieldOptions, key: TextKey, path: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new MalformedDeclarationError(`Option "${key}" must be a string`, path);
  }
  return value;
}

function flagOption(options: FieldOptions, key: FlagKey, path: string): boolean | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new MalformedDeclarationError(`Option "${key}" must be a boolean`, path);
  }
  return value;
}

function enumValues(raw: JsonLiteral | undefined, key: string, path: string): string[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new MalformedDeclarationError(`Option "${key}" must be a non-empty list`, path);
  }
  return raw.map((value) => {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    throw new MalformedDeclarationError(
      `Option "${key}" may only list strings, numbers or booleans`,
      path,
    );
  });
}

function stringify(value: JsonLiteral): string {
  if (typeof value === "string") return value;
  if (value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Date values given to a date field keep only their calendar day */
function toDateOnlyValues(options: KnownOptions): void {
  for (const key of ["example", "default"] as const) {
    const value = options[key];
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      options[key] = value.toISOString().slice(0, 10);
    }
  }
}
