import type {
  ObjectShape,
  SchemaDocument,
  SchemaProperty,
  SchemaResponse,
} from "@docsynth/core";
import type {
  Diagnostic,
  ErrorEntry,
  Parameter,
  ParsedDocument,
} from "./parsed-document";

export const SUCCESS_STATUS = "200";
export const CLIENT_ERROR_STATUS = "400";

const ERROR_SHAPE: Record<string, ObjectShape> = {
  error: {
    type: "object",
    properties: {
      code: { type: "number", description: "Error code" },
      message: { type: "string", description: "Error message" },
      data: { type: "object", description: "Error details" },
    },
  },
};

export type StatusCode = {
  status: number;
  numeric: boolean; // the code string was digits only, without a sign
};

/**
 * Parse an error code as an HTTP status in [100, 599]. Only decimal digit
 * runs count; hex, exponent and fractional forms are references.
 */
export function parseStatusCode(code: string | undefined): StatusCode | undefined {
  const trimmed = code?.trim() ?? "";
  if (!/^\+?\d+$/.test(trimmed)) return undefined;

  const status = Number.parseInt(trimmed, 10);
  if (status < 100 || status > 599) {
    return undefined;
  }
  return { status, numeric: /^\d+$/.test(trimmed) };
}

export type SynthesisResult = {
  schema: SchemaDocument;
  diagnostics: Diagnostic[];
};

export class SchemaSynthesizer {
  synthesize(document: ParsedDocument): SynthesisResult {
    const diagnostics: Diagnostic[] = [];
    const { method } = document;

    const schema: SchemaDocument = {
      method: method.name,
      httpVerb: method.httpVerb,
      path: `/${method.name}`,
      title: method.title ?? `API method ${method.name}`,
      description: method.description ?? `API endpoint for ${method.name}`,
      responses: this.responses(document, diagnostics),
    };

    if (document.requestParameters.size > 0) {
      const parameters = [...document.requestParameters.values()];
      schema.requestBody = {
        required: true,
        properties: this.properties(parameters),
        requiredFields: parameters
          .filter(parameter => parameter.required)
          .map(parameter => parameter.name),
      };
    }

    const references = this.errorReferences(document.errors);
    if (references.length > 0) schema.errorReferences = references;

    if (method.accessLevel) schema.accessLevel = method.accessLevel;
    if (document.errors.length > 0) {
      schema.errors = document.errors.map(entry => ({ ...entry }));
    }

    if (
      document.requestExample !== undefined ||
      document.responseExample !== undefined
    ) {
      schema.examples = {};
      if (document.requestExample !== undefined) {
        schema.examples.request = structuredClone(document.requestExample);
      }
      if (document.responseExample !== undefined) {
        schema.examples.response = structuredClone(document.responseExample);
      }
    }

    return { schema: deepFreeze(schema), diagnostics };
  }

  private properties(parameters: Parameter[]): Record<string, SchemaProperty> {
    const properties: Record<string, SchemaProperty> = {};

    for (const parameter of parameters) {
      const property: SchemaProperty = {
        type: parameter.type,
        description: parameter.description,
      };
      if (parameter.required) property.required = true;
      if (parameter.constraints) {
        const { enum: values, ...rest } = parameter.constraints;
        property.constraints = values ? { ...rest, enum: [...values] } : rest;
      }
      properties[parameter.name] = property;
    }

    return properties;
  }

  private responses(
    document: ParsedDocument,
    diagnostics: Diagnostic[],
  ): Record<string, SchemaResponse> {
    const responseParameters = [...document.responseParameters.values()];
    const data: ObjectShape = { type: "object" };
    if (responseParameters.length > 0) {
      data.properties = this.properties(responseParameters);
      const required = responseParameters
        .filter(parameter => parameter.required)
        .map(parameter => parameter.name);
      if (required.length > 0) data.required = required;
    }

    const responses: Record<string, SchemaResponse> = {
      [SUCCESS_STATUS]: {
        description: "Successful response",
        dataShape: {
          data,
          metadata: { type: "object", description: "Response metadata" },
        },
      },
      [CLIENT_ERROR_STATUS]: {
        description: "Error response",
        dataShape: ERROR_SHAPE,
      },
    };

    for (const entry of document.errors) {
      const parsed = parseStatusCode(entry.code);
      if (!parsed) {
        diagnostics.push({
          kind: "OutOfRangeStatusCode",
          message: `Error code "${entry.code ?? ""}" is not an HTTP status, kept as a reference`,
        });
        continue;
      }

      const key = String(parsed.status);
      if (key === SUCCESS_STATUS) continue;

      const response: SchemaResponse = {
        description: entry.description,
        dataShape: ERROR_SHAPE,
      };
      if (parsed.numeric) response.example = parsed.status;
      responses[key] = response;
    }

    return responses;
  }

  private errorReferences(
    errors: ErrorEntry[],
  ): NonNullable<SchemaDocument["errorReferences"]> {
    return errors
      .filter(entry => !parseStatusCode(entry.code))
      .map(entry => {
        const parts = [entry.code, entry.mnemonic, entry.description]
          .filter(part => !!part)
          .join(": ");
        const text = entry.message ? `${parts} (${entry.message})` : parts;
        return entry.href ? { text, href: entry.href } : { text };
      });
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}
