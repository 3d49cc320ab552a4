/**
 * Associates controller actions with compiled schemas and
 * produces the endpoint descriptors the OpenAPI renderer consumes.
 *
 *   const users = new EndpointBinder(registry, {
 *     name: "Users",
 *     basePath: "/users",
 *     tags: ["Users"],
 *     defaultResponseSchema: "UserResponse",
 *   });
 *
 *   users.create("create_user", { summary: "Creates a user" }, [
 *     required("first_name", "string", { description: "first name of the user" }),
 *     required("age", "integer", { minimum: 20 }),
 *     optional("last_name", "string"),
 *   ]);
 *
 *   const result = users.validate("create_user", body);
 */

import type { CompiledSchema, SchemaNode } from "../types/schema.ts";
import type {
  EndpointDescriptor,
  EndpointParameter,
  HttpMethod,
  StandardAction,
} from "../types/endpoint.ts";
import type { RawDeclaration, SchemaReference } from "../compiler/declarations.ts";
import type { FieldOverrides } from "../compiler/schema-compiler.ts";
import { SchemaNotFoundError } from "../compiler/errors.ts";
import type { SchemaRegistry } from "../registry/schema-registry.ts";
import type { z } from "zod/v4";
import { buildValidator, validateWith, type ValidationResult } from "./descriptor-to-zod.ts";

export interface ControllerOptions {
  /** Controller name, used in operation ids and request schema names */
  name: string;
  basePath: string;
  tags?: string[];
  /** Response schema for actions that declare none */
  defaultResponseSchema?: SchemaReference;
  /** Callback schemas for actions that declare none */
  defaultCallbackSchema?: SchemaReference | SchemaReference[];
}

export interface EndpointOptions {
  summary?: string;
  responseSchema?: SchemaReference;
  /** HTTP status the response schema is published under (default 201) */
  responseStatus?: number;
  callbackSchemas?: SchemaReference | SchemaReference[];
  parameters?: EndpointParameter[];
}

export interface CustomEndpointOptions extends EndpointOptions {
  method?: HttpMethod;
  path?: string;
}

export interface RequestEndpointOptions extends EndpointOptions {
  /** Per-field option patches for the request schema */
  overrides?: FieldOverrides;
}

const DEFAULT_RESPONSE_STATUS = 201;

/** Response and callback schemas of one endpoint, resolved before binding */
interface ResolvedSchemas {
  responseSchemas: Record<string, SchemaNode>;
  callbackSchemas: Record<string, SchemaNode>;
}

const ROUTES: Record<StandardAction, { method: HttpMethod; member: boolean }> = {
  create: { method: "post", member: false },
  update: { method: "patch", member: true },
  index: { method: "get", member: false },
  show: { method: "get", member: true },
  delete: { method: "delete", member: true },
};

export class EndpointBinder {
  private readonly registry: SchemaRegistry;
  private readonly controller: ControllerOptions;
  private bound: EndpointDescriptor[] = [];
  /** validation name → validator built from its request schema */
  private validators = new Map<string, z.ZodObject>();

  constructor(registry: SchemaRegistry, controller: ControllerOptions) {
    this.registry = registry;
    this.controller = controller;
  }

  /** Bind a create action with a request body compiled from `declarations` */
  create(
    name: string,
    options: RequestEndpointOptions,
    declarations: readonly RawDeclaration[],
  ): EndpointDescriptor {
    return this.custom(name, "create", options, declarations);
  }

  update(
    name: string,
    options: RequestEndpointOptions,
    declarations: readonly RawDeclaration[],
  ): EndpointDescriptor {
    return this.custom(name, "update", options, declarations);
  }

  index(options: EndpointOptions = {}): EndpointDescriptor {
    return this.bind("index", options, this.resolveSchemas(options, false));
  }

  show(options: EndpointOptions = {}): EndpointDescriptor {
    return this.bind("show", options, this.resolveSchemas(options, false));
  }

  delete(options: EndpointOptions = {}): EndpointDescriptor {
    return this.customAction("delete", options);
  }

  /** Bind an action with a request body compiled from `declarations` */
  custom(
    name: string,
    action: string,
    options: RequestEndpointOptions & CustomEndpointOptions,
    declarations: readonly RawDeclaration[],
  ): EndpointDescriptor {
    const resolved = this.resolveSchemas(options, true);

    const schemaName = this.requestSchemaName(name);
    const request = this.registry.compile(schemaName, declarations, {
      overrides: options.overrides,
    });
    this.validators.set(name, buildValidator(request.validationDescriptor));

    return this.bind(action, options, resolved, request);
  }

  /** Bind an action without a request body */
  customAction(action: string, options: CustomEndpointOptions = {}): EndpointDescriptor {
    return this.bind(action, options, this.resolveSchemas(options, true));
  }

  /** Validate raw input against the request schema bound under `name` */
  validate(name: string, params: unknown): ValidationResult {
    return validateWith(this.validatorFor(name), params);
  }

  /** The validator built when the request schema under `name` was bound */
  validatorFor(name: string): z.ZodObject {
    const validator = this.validators.get(name);
    if (!validator) throw new SchemaNotFoundError(this.requestSchemaName(name));
    return validator;
  }

  endpoints(): readonly EndpointDescriptor[] {
    return this.bound;
  }

  /** "<Controller>.Schemas.<PascalName>" */
  requestSchemaName(name: string): string {
    return `${this.controller.name}.Schemas.${pascalCase(name)}`;
  }

  private bind(
    action: string,
    options: CustomEndpointOptions,
    resolved: ResolvedSchemas,
    request?: CompiledSchema,
  ): EndpointDescriptor {
    const route = routeFor(action, options, this.controller.basePath);

    const descriptor: EndpointDescriptor = {
      operationId: `${this.controller.name}.${action}`,
      action,
      method: route.method,
      path: route.path,
      summary: options.summary ?? "",
      tags: [...(this.controller.tags ?? [])],
      responseSchemas: resolved.responseSchemas,
      callbackSchemas: resolved.callbackSchemas,
      parameters: [...(options.parameters ?? [])],
    };

    if (request) {
      descriptor.requestSchemaName = request.name;
      descriptor.requestBodySchema = request.documentationSchema;
    }

    this.bound = this.bound.filter((e) => e.operationId !== descriptor.operationId);
    this.bound.push(descriptor);
    return descriptor;
  }

  private resolveSchemas(options: EndpointOptions, callbacks: boolean): ResolvedSchemas {
    return {
      responseSchemas: this.responseSchemas(options),
      callbackSchemas: callbacks ? this.callbackSchemas(options) : {},
    };
  }

  private responseSchemas(options: EndpointOptions): Record<string, SchemaNode> {
    const reference = options.responseSchema ?? this.controller.defaultResponseSchema;
    if (reference === undefined) return {};

    const status = String(options.responseStatus ?? DEFAULT_RESPONSE_STATUS);
    return { [status]: this.resolve(reference).documentationSchema };
  }

  private callbackSchemas(options: EndpointOptions): Record<string, SchemaNode> {
    const references = options.callbackSchemas ?? this.controller.defaultCallbackSchema;
    if (references === undefined) return {};

    const callbacks: Record<string, SchemaNode> = {};
    for (const reference of toList(references)) {
      const schema = this.resolve(reference);
      callbacks[schema.documentationSchema.title ?? schema.name] = schema.documentationSchema;
    }
    return callbacks;
  }

  private resolve(reference: SchemaReference): CompiledSchema {
    return typeof reference === "string" ? this.registry.lookup(reference) : reference;
  }
}

function routeFor(
  action: string,
  options: CustomEndpointOptions,
  basePath: string,
): { method: HttpMethod; path: string } {
  const standard = isStandardAction(action) ? ROUTES[action] : undefined;
  const method = options.method ?? standard?.method ?? "post";
  const path = options.path ?? (standard?.member ? `${basePath}/{id}` : basePath);
  return { method, path };
}

function isStandardAction(action: string): action is StandardAction {
  return Object.hasOwn(ROUTES, action);
}

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

/** "create_user" → "CreateUser" */
export function pascalCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}
