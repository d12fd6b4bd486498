import SwaggerParser from "@apidevtools/swagger-parser";
import { dump } from "js-yaml";
import type { OpenAPIV3 } from "openapi-types";
import type {
  CanonicalType,
  ObjectShape,
  SchemaDocument,
  SchemaErrorEntry,
  SchemaProperty,
  SchemaResponse,
} from "@docsynth/core";

export const OPENAPI_VERSION = "3.0.3";
export const JSONRPC_VERSION = "2.0";

type ExtendedSchema = OpenAPIV3.SchemaObject & {
  "x-filtering"?: string;
  "x-sorting"?: string;
};

// Placeholder examples for properties the documentation gives none for
const DEFAULT_EXAMPLES: Partial<Record<CanonicalType, string | number | boolean>> = {
  string: "example_string",
  number: 123,
  boolean: true,
};

export type ErrorReference = NonNullable<SchemaDocument["errorReferences"]>[number];

export type RenderedDocument = OpenAPIV3.Document & {
  "x-access-level"?: string;
  "x-errors"?: SchemaErrorEntry[];
  "x-error-references"?: ErrorReference[];
};

/**
 * `get.user` -> `user`; names without a dot are their own resource.
 */
export function resourceSegment(method: string): string {
  const dot = method.indexOf(".");
  return dot === -1 ? method : method.slice(dot + 1);
}

/**
 * Render one method as an OpenAPI 3 document. Request and response bodies
 * are wrapped in the JSON-RPC 2.0 envelope the documented API speaks.
 */
export function renderOpenApi(schema: SchemaDocument): RenderedDocument {
  const operation: OpenAPIV3.OperationObject = {
    operationId: schema.method,
    summary: schema.title,
    description: operationDescription(schema),
    tags: [resourceSegment(schema.method)],
    responses: renderResponses(schema.responses),
  };

  if (schema.requestBody) {
    operation.requestBody = {
      required: true,
      content: {
        "application/json": {
          schema: requestEnvelope(
            schema.method,
            schema.requestBody.properties,
            schema.requestBody.requiredFields,
          ),
        },
      },
    };
  }

  const pathItem: OpenAPIV3.PathItemObject = {};
  pathItem[schema.httpVerb] = operation;

  const document: RenderedDocument = {
    openapi: OPENAPI_VERSION,
    info: {
      title: schema.title,
      version: "1.0.0",
      description: schema.description,
    },
    paths: { [schema.path]: pathItem },
  };

  if (schema.accessLevel) document["x-access-level"] = schema.accessLevel;
  if (schema.errors?.length) {
    document["x-errors"] = schema.errors.map(entry => ({ ...entry }));
  }
  if (schema.errorReferences?.length) {
    document["x-error-references"] = schema.errorReferences.map(reference => ({
      ...reference,
    }));
  }

  return document;
}

/**
 * The method description followed by a list of its request and response
 * parameters, one paragraph each.
 */
export function operationDescription(schema: SchemaDocument): string {
  const parts: string[] = [];
  if (schema.description) parts.push(schema.description);

  const request = Object.entries(schema.requestBody?.properties ?? {});
  if (request.length > 0) {
    parts.push(`**Request Parameters:** ${request.length}`);
    for (const [name, property] of request) {
      const presence = property.required ? "required" : "optional";
      parts.push(
        `- \`${name}\` (${property.type}, ${presence}): ${property.description}`,
      );
    }
  }

  const response = Object.entries(
    schema.responses["200"]?.dataShape?.["data"]?.properties ?? {},
  );
  if (response.length > 0) {
    parts.push(`**Response Parameters:** ${response.length}`);
    for (const [name, property] of response) {
      parts.push(`- \`${name}\` (${property.type}): ${property.description}`);
    }
  }

  return parts.join("\n\n");
}

function propertySchema(property: SchemaProperty): ExtendedSchema {
  const { type, description, constraints } = property;
  const schema: ExtendedSchema =
    type === "array"
      ? {
          type,
          description,
          items: { type: "string", example: DEFAULT_EXAMPLES.string },
        }
      : { type, description };

  if (constraints) applyConstraints(schema, constraints);

  if (schema.example === undefined) {
    const example = type === "array" ? [] : DEFAULT_EXAMPLES[type];
    if (example !== undefined) schema.example = example;
  }
  return schema;
}

function applyConstraints(
  schema: ExtendedSchema,
  constraints: NonNullable<SchemaProperty["constraints"]>,
): void {
  if (constraints.format !== undefined) schema.format = constraints.format;
  if (constraints.example !== undefined) schema.example = constraints.example;
  if (constraints.enum) schema.enum = [...constraints.enum];
  if (constraints.minimum !== undefined) schema.minimum = constraints.minimum;
  if (constraints.maxLength !== undefined) {
    schema.maxLength = constraints.maxLength;
  }
  if (constraints.maxItems !== undefined) schema.maxItems = constraints.maxItems;
  if (constraints.filtering) schema["x-filtering"] = constraints.filtering;
  if (constraints.sorting) schema["x-sorting"] = constraints.sorting;
}

function objectSchema(
  properties: Record<string, SchemaProperty>,
  required: readonly string[] = [],
  description?: string,
): OpenAPIV3.SchemaObject {
  const schema: OpenAPIV3.SchemaObject = { type: "object" };
  if (description) schema.description = description;

  const entries = Object.entries(properties);
  if (entries.length > 0) {
    schema.properties = Object.fromEntries(
      entries.map(([name, property]) => [name, propertySchema(property)]),
    );
  }
  if (required.length > 0) schema.required = [...required];

  return schema;
}

function shapeSchema(shape: ObjectShape): OpenAPIV3.SchemaObject {
  return objectSchema(shape.properties ?? {}, shape.required, shape.description);
}

function requestEnvelope(
  method: string,
  params: Record<string, SchemaProperty>,
  requiredFields: readonly string[],
): OpenAPIV3.SchemaObject {
  return {
    type: "object",
    properties: {
      jsonrpc: {
        type: "string",
        description: "JSON-RPC version",
        example: JSONRPC_VERSION,
      },
      id: { type: "number", description: "Request identifier" },
      method: { type: "string", description: "Method name", example: method },
      params: objectSchema(params, requiredFields),
    },
    required: ["jsonrpc", "id", "method", "params"],
  };
}

function responseEnvelope(
  status: string,
  response: SchemaResponse,
): OpenAPIV3.SchemaObject {
  const shapes = Object.entries(response.dataShape ?? {}).map(
    ([name, shape]): [string, OpenAPIV3.SchemaObject] => [
      name,
      shapeSchema(shape),
    ],
  );

  if (status === "200") {
    return {
      type: "object",
      properties: {
        jsonrpc: {
          type: "string",
          description: "JSON-RPC version",
          example: JSONRPC_VERSION,
        },
        id: { type: "number", description: "Request identifier" },
        result: {
          type: "object",
          properties: Object.fromEntries(shapes),
          required: shapes.map(([name]) => name),
        },
      },
      required: ["jsonrpc", "id", "result"],
    };
  }

  return {
    type: "object",
    properties: {
      jsonrpc: { type: "string" },
      id: { type: "number" },
      ...Object.fromEntries(shapes),
    },
  };
}

function renderResponses(
  responses: Record<string, SchemaResponse>,
): OpenAPIV3.ResponsesObject {
  const rendered: OpenAPIV3.ResponsesObject = {};

  for (const [status, response] of Object.entries(responses)) {
    rendered[status] = {
      description: response.description,
      content: {
        "application/json": { schema: responseEnvelope(status, response) },
      },
    };
  }

  return rendered;
}

export function toYaml(document: RenderedDocument): string {
  return dump(document, { noRefs: true, lineWidth: -1 });
}

export function toJson(document: RenderedDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Check a rendered document against the OpenAPI 3 schema. The parser
 * dereferences in place, so it works on a copy.
 */
export async function verifyOpenApi(document: RenderedDocument): Promise<void> {
  try {
    await SwaggerParser.validate(structuredClone(document));
  } catch (error) {
    throw new Error(
      `OpenAPI validation failed for "${document.info.title}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
