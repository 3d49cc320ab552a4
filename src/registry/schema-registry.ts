/**
 * Holds name → CompiledSchema for the lifetime of the process. Schemas are
 * compiled at startup in dependency order (embedded schemas first), then the
 * registry is frozen and only read.
 */

import type { TypeDefaults } from "../types/config.ts";
import type {
  CompiledSchema,
  SchemaNode,
  ValidationDescriptor,
} from "../types/schema.ts";
import {
  RegistryFrozenError,
  SchemaNotFoundError,
} from "../compiler/errors.ts";
import { compileSchema, type FieldOverrides } from "../compiler/schema-compiler.ts";

export type SchemaState = "declared" | "compiling" | "compiled";

export interface RegistryOptions {
  /** Type-level option defaults applied to every compilation */
  typeDefaults?: TypeDefaults;
}

export interface RegistryCompileOptions {
  /** Per-field option patches, highest precedence after type-forced keys */
  overrides?: FieldOverrides;
}

export class SchemaRegistry {
  private schemas = new Map<string, CompiledSchema>();
  private states = new Map<string, SchemaState>();
  private frozen = false;
  private readonly typeDefaults?: TypeDefaults;

  constructor(options: RegistryOptions = {}) {
    this.typeDefaults = options.typeDefaults;
  }

  /**
   * Compile a declaration list under `name`. Recompiling an existing name
   * replaces the previous entry. Embedded schemas are read from this registry
   * and must already be compiled.
   */
  compile(
    name: string,
    declarations: unknown,
    options: RegistryCompileOptions = {},
  ): CompiledSchema {
    if (this.frozen) throw new RegistryFrozenError(name);

    const previous = this.states.get(name);
    this.states.set(name, "compiling");

    let compiled: CompiledSchema;
    try {
      compiled = compileSchema(name, declarations, {
        lookup: (ref) => (ref === name ? undefined : this.schemas.get(ref)),
        typeDefaults: this.typeDefaults,
        overrides: options.overrides,
      });
    } catch (err) {
      if (previous) {
        this.states.set(name, previous);
      } else {
        this.states.delete(name);
      }
      throw err;
    }

    if (this.schemas.has(name)) {
      console.error(`[registry] Replacing compiled schema: ${name}`);
    }
    this.schemas.set(name, compiled);
    this.states.set(name, "compiled");
    return compiled;
  }

  /** Announce a name that will be compiled later */
  declare(name: string): void {
    if (this.frozen) throw new RegistryFrozenError(name);
    if (!this.states.has(name)) this.states.set(name, "declared");
  }

  /** Get a compiled schema, or throw SchemaNotFoundError */
  lookup(name: string): CompiledSchema {
    const schema = this.schemas.get(name);
    if (!schema) throw new SchemaNotFoundError(name);
    return schema;
  }

  /** Get a compiled schema if present */
  get(name: string): CompiledSchema | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  /** Names of compiled schemas, in compilation order */
  names(): string[] {
    return Array.from(this.schemas.keys());
  }

  stateOf(name: string): SchemaState | undefined {
    return this.states.get(name);
  }

  documentationOf(schema: CompiledSchema | string): SchemaNode {
    return this.resolve(schema).documentationSchema;
  }

  /** The descriptor handed to the validation engine */
  validationDescriptorOf(schema: CompiledSchema | string): ValidationDescriptor {
    return this.resolve(schema).validationDescriptor;
  }

  /** End the startup phase; further compile calls fail */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  private resolve(schema: CompiledSchema | string): CompiledSchema {
    return typeof schema === "string" ? this.lookup(schema) : schema;
  }
}
