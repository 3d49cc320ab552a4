/** Scalar types recognized by the schema compiler */
export const SCALAR_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "uuid",
  "date",
  "datetime",
  "decimal",
  "enum",
  "object",
] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];

/** Element types an array field may hold */
export const ARRAY_SUBTYPES = ["string", "integer", "object"] as const;
export type ArraySubtype = (typeof ARRAY_SUBTYPES)[number];

export type SemanticType = ScalarType | { array: ArraySubtype };

/** Alternate spellings accepted in raw declarations */
export const TYPE_ALIASES: Readonly<Record<string, ScalarType>> = {
  map: "object",
  utc_datetime: "datetime",
  naive_datetime: "datetime",
};

/** Requiredness flags of a field declaration */
export const FIELD_KINDS = ["required", "optional", "field"] as const;
export type FieldKind = (typeof FIELD_KINDS)[number];

export const EMBED_KINDS = ["embeds_one", "embeds_many"] as const;
export type EmbedKind = (typeof EMBED_KINDS)[number];

export type DeclarationKind = FieldKind | EmbedKind;

/** A value that can be written into a schema at definition time */
export type Literal =
  | string
  | number
  | boolean
  | null
  | Date
  | readonly Literal[]
  | { readonly [key: string]: Literal };

/** Literal after normalization (dates become ISO strings) */
export type JsonLiteral =
  | string
  | number
  | boolean
  | null
  | JsonLiteral[]
  | { [key: string]: JsonLiteral };

/** Option keys the compiler understands; anything else is dropped */
export const OPTION_KEYS = [
  "example",
  "format",
  "minimum",
  "maximum",
  "minLength",
  "maxLength",
  "pattern",
  "values",
  "included",
  "description",
  "title",
  "nullable",
  "default",
  "deprecated",
  "readOnly",
  "writeOnly",
] as const;

export type OptionKey = (typeof OPTION_KEYS)[number];

/** Resolved, literal-only field options */
export type FieldOptions = Partial<Record<OptionKey, JsonLiteral>>;

/** A parsed field declaration (required / optional / field) */
export interface FieldSpec {
  kind: FieldKind;
  name: string;
  type: SemanticType;
  /** Raw option values, still unresolved */
  options: Readonly<Record<string, unknown>>;
  /** Inline nested block for object and array-of-object fields */
  fields?: FieldNode[];
}

/** A parsed embedding of a previously compiled schema */
export interface EmbedSpec {
  kind: EmbedKind;
  name: string;
  schema: string;
}

export type FieldNode = FieldSpec | EmbedSpec;

export type SchemaNodeType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "array"
  | "object";

/** One node of the documentation tree */
export interface SchemaNode {
  type: SchemaNodeType;
  required: boolean;
  title?: string;
  format?: string;
  enum?: string[];
  items?: SchemaNode;
  properties?: Record<string, SchemaNode>;
  example?: JsonLiteral;
  description?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  nullable?: boolean;
  default?: JsonLiteral;
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
}

/** Types the validation engine distinguishes */
export type ValidationType =
  | "string"
  | "integer"
  | "number"
  | "decimal"
  | "boolean"
  | "date"
  | "datetime"
  | "array"
  | "map";

export interface ValidationConstraints {
  included?: string[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  nullable?: boolean;
  default?: JsonLiteral;
}

/** Element description of an array rule */
export interface ValidationItems {
  type: "string" | "integer" | "map";
  fields?: ValidationDescriptor;
}

/** One entry of a validation descriptor */
export interface ValidationRule {
  name: string;
  type: ValidationType;
  required: boolean;
  constraints: ValidationConstraints;
  items?: ValidationItems;
  /** Known keys of a map value; absent means any keys are accepted */
  fields?: ValidationDescriptor;
}

export type ValidationDescriptor = readonly ValidationRule[];

/** The immutable output of compiling one named declaration block */
export interface CompiledSchema {
  readonly name: string;
  readonly validationDescriptor: ValidationDescriptor;
  readonly documentationSchema: SchemaNode;
}
