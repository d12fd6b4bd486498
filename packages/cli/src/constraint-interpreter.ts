import type { ParameterConstraints } from "@docsynth/core";
import type { Diagnostic } from "./parsed-document";

const FORMAT_KEYWORDS = ["формат", "format"];
const MAXIMUM_KEYWORDS = ["максимум", "максимальн", "maximum"];
const MINIMUM_KEYWORDS = ["минимум", "минимальн", "minimum"];
const CHARACTER_KEYWORDS = ["символ", "character"];
const COUNT_KEYWORDS = ["количеств", "элемент", "count", "quantity", "items"];

// Checked top to bottom: datetime before date and time, timezone before time.
const FORMAT_EXAMPLES: { pattern: RegExp; example: string }[] = [
  {
    pattern: /iana|zoneinfo|timezone|time zone|часов(?:ой|ого) пояс/,
    example: "Europe/Moscow",
  },
  { pattern: /e-?mail|почт/, example: "user@example.com" },
  { pattern: /e\.164|phone|телефон/, example: "+7 (999) 123-45-67" },
  { pattern: /\burl\b|\buri\b|ссылк/, example: "https://example.com" },
  {
    pattern: /date-?time|iso ?8601|дат[аы] и врем(?:я|ени)/,
    example: "2024-01-01T12:00:00Z",
  },
  { pattern: /\bdate\b|дат[аыу]|yyyy-mm-dd|гггг-мм-дд/, example: "2024-01-01" },
  { pattern: /\btime\b|врем[яе]|hh:mm/, example: "12:00:00" },
];

const GENERIC_EXAMPLE = "example";

export type InterpretedConstraint = {
  constraints: ParameterConstraints;
  diagnostics: Diagnostic[];
};

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some(keyword => text.includes(keyword));
}

function firstInteger(text: string): number | undefined {
  const match = text.match(/-?\d+/);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

export function formatExample(lowered: string): string {
  const hit = FORMAT_EXAMPLES.find(({ pattern }) => pattern.test(lowered));
  return hit ? hit.example : GENERIC_EXAMPLE;
}

/**
 * Classify a free-text "allowed values" cell. Exactly one branch applies:
 * format hint, maximum, minimum, then enumeration.
 */
export function interpretAllowedValues(raw: string): InterpretedConstraint {
  const text = raw.trim();
  const diagnostics: Diagnostic[] = [];
  if (!text) return { constraints: {}, diagnostics };

  const lowered = text.toLowerCase();

  if (containsAny(lowered, FORMAT_KEYWORDS)) {
    return {
      constraints: { format: text, example: formatExample(lowered) },
      diagnostics,
    };
  }

  if (containsAny(lowered, MAXIMUM_KEYWORDS)) {
    const bound = firstInteger(lowered);
    if (bound === undefined) {
      diagnostics.push({
        kind: "UnappliedConstraint",
        message: `No number found in maximum constraint "${text}"`,
      });
      return { constraints: {}, diagnostics };
    }
    if (containsAny(lowered, CHARACTER_KEYWORDS)) {
      return { constraints: { maxLength: bound }, diagnostics };
    }
    if (containsAny(lowered, COUNT_KEYWORDS)) {
      return { constraints: { maxItems: bound }, diagnostics };
    }
    diagnostics.push({
      kind: "UnappliedConstraint",
      message: `Maximum constraint "${text}" names neither characters nor a count`,
    });
    return { constraints: {}, diagnostics };
  }

  if (containsAny(lowered, MINIMUM_KEYWORDS)) {
    const bound = firstInteger(lowered);
    if (bound === undefined) {
      diagnostics.push({
        kind: "UnappliedConstraint",
        message: `No number found in minimum constraint "${text}"`,
      });
      return { constraints: {}, diagnostics };
    }
    return { constraints: { minimum: bound }, diagnostics };
  }

  const values = text
    .split(",")
    .map(value => value.trim())
    .filter(value => value.length > 0);

  if (values.length === 0) return { constraints: {}, diagnostics };

  return { constraints: { enum: values, example: values[0] }, diagnostics };
}
