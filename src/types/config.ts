/** Configuration types parsed from config/compiler.md */

import type { FieldOptions, ScalarType } from "./schema.ts";

/** Options applied to every field of a type unless the field overrides them */
export type TypeDefaults = Partial<Record<ScalarType, FieldOptions>>;

export interface CompilerConfig {
  /** Type-level option defaults (lowest precedence) */
  typeDefaults: TypeDefaults;
}

export interface DocumentConfig {
  /** Value of the document's `openapi` field */
  openApiVersion: string;
  /** Version of the described API (info.version) */
  apiVersion: string;
}

export interface ServerConfig {
  compiler: CompilerConfig;
  document: DocumentConfig;
}

/** Canonical examples injected into date fields without one */
export const DEFAULT_DATE_EXAMPLE = "2024-08-12";
export const DEFAULT_DATETIME_EXAMPLE = "2024-08-12T21:00:39";

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  typeDefaults: {
    date: { example: DEFAULT_DATE_EXAMPLE },
    datetime: { example: DEFAULT_DATETIME_EXAMPLE },
  },
};

export const DEFAULT_DOCUMENT_CONFIG: DocumentConfig = {
  openApiVersion: "3.0.3",
  apiVersion: "1.0.0",
};
