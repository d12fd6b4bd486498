import type {
  CanonicalType,
  HttpVerb,
  ParameterConstraints,
} from "@docsynth/core";

export type SectionKind = "request" | "response";

export type Parameter = {
  name: string;
  type: CanonicalType;
  required: boolean;
  description: string;
  constraints?: ParameterConstraints;
};

export type MethodInfo = {
  name: string;
  title?: string;
  description?: string;
  accessLevel?: string;
  httpVerb: HttpVerb;
};

export type ErrorEntry = {
  code?: string;
  mnemonic?: string;
  message?: string; // error text returned by the API
  description: string;
  href?: string; // first link found in the row
};

export type ParsedDocument = {
  method: MethodInfo;
  requestParameters: Map<string, Parameter>; // keyed by name, row order
  responseParameters: Map<string, Parameter>;
  errors: ErrorEntry[];
  requestExample?: unknown;
  responseExample?: unknown;
};

export type DiagnosticKind =
  | "NotAnEndpoint"
  | "MalformedRow"
  | "UnresolvedType"
  | "UnappliedConstraint"
  | "OutOfRangeStatusCode"
  | "ValidationFailure"
  | "InvalidExample"
  | "DuplicateParameter"
  | "MissingDescription";

export type Diagnostic = {
  kind: DiagnosticKind;
  message: string;
};

export const CANONICAL_TYPES: readonly CanonicalType[] = [
  "string",
  "number",
  "boolean",
  "object",
  "array",
];

export const HTTP_VERBS: readonly HttpVerb[] = ["get", "post", "put", "delete"];
