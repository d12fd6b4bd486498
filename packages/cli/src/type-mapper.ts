import type { CanonicalType } from "@docsynth/core";

const TYPE_VOCABULARY: Record<string, CanonicalType> = {
  string: "string",
  number: "number",
  boolean: "boolean",
  object: "object",
  array: "array",
  enum: "string",
  iso8601: "string",
  date: "string",
  datetime: "string",
};

export type MappedType = {
  type: CanonicalType;
  recognized: boolean;
};

/**
 * Map a documentation type label to a canonical primitive. Unknown labels
 * fall back to `string`.
 */
export function mapType(label: string): MappedType {
  const key = label.trim().toLowerCase();
  if (Object.hasOwn(TYPE_VOCABULARY, key)) {
    return { type: TYPE_VOCABULARY[key], recognized: true };
  }
  return { type: "string", recognized: false };
}
