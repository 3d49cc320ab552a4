/**
 * duoschema compiles one list of field declarations into a validation
 * descriptor and an OpenAPI-compatible documentation schema.
 *
 *   const registry = new SchemaRegistry();
 *   registry.compile("Address", [required("city", "string")]);
 *   registry.compile("User", [
 *     required("id", "uuid"),
 *     required("role", "enum", { values: ["admin", "normal"] }),
 *     embedsOne("address", "Address"),
 *   ]);
 *   registry.freeze();
 */

export {
  required,
  optional,
  field,
  embedsOne,
  embedsMany,
  arrayOf,
  type DeclarationOptions,
  type RawDeclaration,
  type SchemaReference,
  type TypeTag,
} from "./compiler/declarations.ts";
export { parseDeclarations } from "./compiler/declaration-parser.ts";
export { compileSchema, type CompileOptions, type FieldOverrides } from "./compiler/schema-compiler.ts";
export {
  SchemaCompileError,
  MalformedDeclarationError,
  UnresolvedOptionValueError,
  UnsupportedSubtypeError,
  DecimalValueNotAllowedError,
  UnknownSchemaReferenceError,
  SchemaNotFoundError,
  RegistryFrozenError,
  type SchemaErrorCode,
} from "./compiler/errors.ts";
export { SchemaRegistry, type SchemaState } from "./registry/schema-registry.ts";
export {
  buildValidator,
  validateParams,
  validateWith,
  type FieldErrorMap,
  type ValidationResult,
} from "./server/descriptor-to-zod.ts";
export { EndpointBinder, type ControllerOptions, type EndpointOptions } from "./server/endpoint-binder.ts";
export { renderOpenApiDocument, toSchemaObject, type RenderInput } from "./server/openapi-renderer.ts";
export { loadProject, parseSchemaFile, type SchemaFile } from "./project/loader.ts";
export { loadServerConfig, parseServerConfig } from "./config/loader.ts";
export {
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_DOCUMENT_CONFIG,
  DEFAULT_DATE_EXAMPLE,
  DEFAULT_DATETIME_EXAMPLE,
} from "./types/config.ts";
export type * from "./types/schema.ts";
export type * from "./types/endpoint.ts";
export type * from "./types/config.ts";
export type * from "./types/project.ts";
