/** Endpoint descriptors produced by the endpoint binder */

import type { SchemaNode, SchemaNodeType } from "./schema.ts";

export type HttpMethod = "get" | "post" | "put" | "patch" | "delete";

/** Standard controller actions; any other string is a custom action */
export type StandardAction = "create" | "update" | "index" | "show" | "delete";

export interface EndpointParameter {
  name: string;
  in: "path" | "query" | "header";
  type: SchemaNodeType;
  description?: string;
  required?: boolean;
  example?: string | number | boolean;
}

export interface EndpointDescriptor {
  /** "<Controller>.<action>", unique per controller */
  operationId: string;
  action: string;
  method: HttpMethod;
  path: string;
  summary: string;
  tags: string[];
  /** Name of the request schema in the registry, when the action has a body */
  requestSchemaName?: string;
  requestBodySchema?: SchemaNode;
  /** Response schemas keyed by HTTP status */
  responseSchemas: Record<string, SchemaNode>;
  /** Callback request schemas keyed by callback name */
  callbackSchemas: Record<string, SchemaNode>;
  parameters: EndpointParameter[];
}
