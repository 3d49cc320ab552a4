/**
 * Compile-time errors. Every one of these is a configuration defect found
 * while building schemas at startup; none is raised while serving requests.
 */

export type SchemaErrorCode =
  | "malformed_declaration"
  | "unresolved_option_value"
  | "unsupported_subtype"
  | "decimal_value_not_allowed"
  | "unknown_schema_reference"
  | "schema_not_found"
  | "registry_frozen";

/** Base class for everything the compiler and registry throw */
export class SchemaCompileError extends Error {
  readonly code: SchemaErrorCode;
  /** Dotted path of the field concerned, when there is one */
  readonly path?: string;

  constructor(code: SchemaErrorCode, message: string, path?: string) {
    super(path ? `${message} (at "${path}")` : message);
    this.name = "SchemaCompileError";
    this.code = code;
    this.path = path;
  }
}

export class MalformedDeclarationError extends SchemaCompileError {
  constructor(message: string, path?: string) {
    super("malformed_declaration", message, path);
    this.name = "MalformedDeclarationError";
  }
}

export class UnresolvedOptionValueError extends SchemaCompileError {
  readonly option: string;

  constructor(option: string, value: unknown, path?: string) {
    super(
      "unresolved_option_value",
      `Option "${option}" must be a literal value known at definition time, got ${describeValue(value)}`,
      path,
    );
    this.name = "UnresolvedOptionValueError";
    this.option = option;
  }
}

export class UnsupportedSubtypeError extends SchemaCompileError {
  readonly subtype: string;

  constructor(subtype: string, path?: string) {
    super(
      "unsupported_subtype",
      `Unsupported array subtype "${subtype}"; expected string, integer or object`,
      path,
    );
    this.name = "UnsupportedSubtypeError";
    this.subtype = subtype;
  }
}

export class DecimalValueNotAllowedError extends SchemaCompileError {
  readonly option: string;

  constructor(option: string, value: unknown, path?: string) {
    super(
      "decimal_value_not_allowed",
      `Option "${option}" of a decimal field must be a plain number, got arbitrary-precision value ${describeValue(value)}`,
      path,
    );
    this.name = "DecimalValueNotAllowedError";
    this.option = option;
  }
}

export class UnknownSchemaReferenceError extends SchemaCompileError {
  readonly reference: string;

  constructor(reference: string, path?: string) {
    super(
      "unknown_schema_reference",
      `Schema "${reference}" is not compiled yet; compile embedded schemas before the schemas that embed them`,
      path,
    );
    this.name = "UnknownSchemaReferenceError";
    this.reference = reference;
  }
}

export class SchemaNotFoundError extends SchemaCompileError {
  readonly schemaName: string;

  constructor(schemaName: string) {
    super("schema_not_found", `No compiled schema named "${schemaName}"`);
    this.name = "SchemaNotFoundError";
    this.schemaName = schemaName;
  }
}

export class RegistryFrozenError extends SchemaCompileError {
  readonly schemaName: string;

  constructor(schemaName: string) {
    super(
      "registry_frozen",
      `Cannot compile "${schemaName}": the registry is frozen`,
    );
    this.name = "RegistryFrozenError";
    this.schemaName = schemaName;
  }
}

/** Short human description of an offending value for error messages */
export function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "function") return "a function";
  if (typeof value === "symbol") return value.toString();
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || typeof proto !== "object") return "a prototype-less object";
    const ctor: unknown = Reflect.get(proto, "constructor");
    const name = typeof ctor === "function" && ctor.name ? ctor.name : "Object";
    return `an instance of ${name} (${String(value)})`;
  }
  return String(value);
}
