export type CanonicalType = "string" | "number" | "boolean" | "object" | "array";

export type HttpVerb = "get" | "post" | "put" | "delete";

export type ParameterConstraints = {
  format?: string;
  example?: string | number;
  enum?: string[];
  minimum?: number;
  maxLength?: number;
  maxItems?: number;
  filtering?: string;
  sorting?: string;
};

export type SchemaProperty = {
  type: CanonicalType;
  required?: boolean;
  description: string;
  constraints?: ParameterConstraints;
};

export type ObjectShape = {
  type: "object";
  description?: string;
  properties?: Record<string, SchemaProperty>;
  required?: string[];
};

export type SchemaResponse = {
  description: string;
  example?: number;
  dataShape?: Record<string, ObjectShape>;
};

export type SchemaErrorEntry = {
  code?: string;
  mnemonic?: string;
  message?: string;
  description: string;
  href?: string;
};

export type SchemaDocument = {
  method: string;
  httpVerb: HttpVerb;
  path: string;
  title: string;
  description: string;
  accessLevel?: string;
  requestBody?: {
    required: true;
    properties: Record<string, SchemaProperty>;
    requiredFields: string[];
  };
  responses: Record<string, SchemaResponse>;
  errorReferences?: {
    text: string;
    href?: string;
  }[];
  errors?: SchemaErrorEntry[];
  examples?: {
    request?: unknown;
    response?: unknown;
  };
};
