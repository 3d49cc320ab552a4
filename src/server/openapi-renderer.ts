/**
 * Serializes compiled schemas and endpoint descriptors
 * into an OpenAPI 3 document.
 */

import type { OpenAPIV3 } from "openapi-types";
import { DEFAULT_DOCUMENT_CONFIG, type DocumentConfig } from "../types/config.ts";
import type { EndpointDescriptor, EndpointParameter } from "../types/endpoint.ts";
import type { CompiledSchema, SchemaNode } from "../types/schema.ts";

const JSON_MEDIA_TYPE = "application/json";
const CALLBACK_ACCEPTED = "Your server returns this code if it accepts the callback";

export interface RenderInput {
  title: string;
  description?: string;
  document?: Partial<DocumentConfig>;
  /** Schemas published under components.schemas */
  schemas?: readonly CompiledSchema[];
  endpoints?: readonly EndpointDescriptor[];
}

export function renderOpenApiDocument(input: RenderInput): OpenAPIV3.Document {
  const config = { ...DEFAULT_DOCUMENT_CONFIG, ...input.document };
  const endpoints = input.endpoints ?? [];

  const info: OpenAPIV3.InfoObject = { title: input.title, version: config.apiVersion };
  if (input.description) info.description = input.description;

  const doc: OpenAPIV3.Document = {
    openapi: config.openApiVersion,
    info,
    paths: renderPaths(endpoints),
  };

  const tags = Array.from(new Set(endpoints.flatMap((e) => e.tags)));
  if (tags.length > 0) doc.tags = tags.map((name) => ({ name }));

  if (input.schemas && input.schemas.length > 0) {
    const schemas: Record<string, OpenAPIV3.SchemaObject> = {};
    for (const schema of input.schemas) {
      schemas[schema.name] = toSchemaObject(schema.documentationSchema);
    }
    doc.components = { schemas };
  }

  return doc;
}

/**
 * Convert a documentation node to an OpenAPI schema object. Per-field
 * `required` flags become the parent's `required` name list.
 */
export function toSchemaObject(node: SchemaNode): OpenAPIV3.SchemaObject {
  const { type, required: _required, items, properties, enum: values, ...rest } = node;

  if (type === "array") {
    return { ...rest, type, items: items ? toSchemaObject(items) : {} };
  }

  const out: OpenAPIV3.NonArraySchemaObject = { ...rest, type };
  if (values) out.enum = [...values];

  if (properties) {
    const entries = Object.entries(properties);
    out.properties = Object.fromEntries(
      entries.map(([name, child]) => [name, toSchemaObject(child)]),
    );
    const requiredNames = entries.filter(([, child]) => child.required).map(([name]) => name);
    if (requiredNames.length > 0) out.required = requiredNames;
  }

  return out;
}

function renderPaths(endpoints: readonly EndpointDescriptor[]): OpenAPIV3.PathsObject {
  const paths: OpenAPIV3.PathsObject = {};
  for (const endpoint of endpoints) {
    const item: OpenAPIV3.PathItemObject = paths[endpoint.path] ?? {};
    item[endpoint.method] = renderOperation(endpoint);
    paths[endpoint.path] = item;
  }
  return paths;
}

function renderOperation(endpoint: EndpointDescriptor): OpenAPIV3.OperationObject {
  const operation: OpenAPIV3.OperationObject = {
    operationId: endpoint.operationId,
    summary: endpoint.summary,
    responses: renderResponses(endpoint.responseSchemas),
  };

  if (endpoint.tags.length > 0) operation.tags = [...endpoint.tags];

  const parameters = withPathParameters(endpoint.path, endpoint.parameters);
  if (parameters.length > 0) operation.parameters = parameters.map(renderParameter);

  if (endpoint.requestBodySchema) {
    operation.requestBody = {
      description: "",
      content: { [JSON_MEDIA_TYPE]: { schema: toSchemaObject(endpoint.requestBodySchema) } },
    };
  }

  const callbackNames = Object.keys(endpoint.callbackSchemas);
  if (callbackNames.length > 0) {
    const callbacks: Record<string, OpenAPIV3.CallbackObject> = {};
    for (const [name, schema] of Object.entries(endpoint.callbackSchemas)) {
      callbacks[name] = { "": { post: renderCallbackOperation(schema) } };
    }
    operation.callbacks = callbacks;
  }

  return operation;
}

function renderResponses(schemas: Record<string, SchemaNode>): OpenAPIV3.ResponsesObject {
  const responses: OpenAPIV3.ResponsesObject = {};
  for (const [status, schema] of Object.entries(schemas)) {
    responses[status] = {
      description: "",
      content: { [JSON_MEDIA_TYPE]: { schema: toSchemaObject(schema) } },
    };
  }
  if (Object.keys(responses).length === 0) {
    responses["200"] = { description: "OK" };
  }
  return responses;
}

function renderCallbackOperation(schema: SchemaNode): OpenAPIV3.OperationObject {
  return {
    requestBody: {
      content: { [JSON_MEDIA_TYPE]: { schema: toSchemaObject(schema) } },
    },
    responses: { "200": { description: CALLBACK_ACCEPTED } },
  };
}

/** Add a string path parameter for every `{name}` segment not declared */
function withPathParameters(
  path: string,
  declared: readonly EndpointParameter[],
): EndpointParameter[] {
  const parameters = [...declared];
  for (const match of path.matchAll(/\{([^}]+)\}/g)) {
    const name = match[1];
    if (name && !parameters.some((p) => p.in === "path" && p.name === name)) {
      parameters.push({ name, in: "path", type: "string", required: true });
    }
  }
  return parameters;
}

function renderParameter(parameter: EndpointParameter): OpenAPIV3.ParameterObject {
  const schema: OpenAPIV3.SchemaObject =
    parameter.type === "array" ? { type: "array", items: {} } : { type: parameter.type };

  const rendered: OpenAPIV3.ParameterObject = {
    name: parameter.name,
    in: parameter.in,
    required: parameter.in === "path" ? true : parameter.required ?? false,
    schema,
  };
  if (parameter.description) rendered.description = parameter.description;
  if (parameter.example !== undefined) rendered.example = parameter.example;
  return rendered;
}
