export type NoiseRule = {
  pattern: RegExp;
  replacement: string;
};

export const DEFAULT_NOISE_RULES: NoiseRule[] = [
  // Cross-references to another method
  {
    pattern: /(?:Подробнее|Подробности).*?метод[а-яё]*\s+`?[a-z_]+\.[a-z_]+`?\.?/giu,
    replacement: "",
  },
  {
    pattern: /(?:For details,?\s+)?\bsee\s+(?:the\s+)?`?[a-z_]+\.[a-z_]+`?\s+method\.?/gi,
    replacement: "",
  },
  // Agent-only disclaimers
  {
    pattern: /Параметр доступен только (?:для )?агент[а-яё]*\.?/giu,
    replacement: "",
  },
  {
    pattern: /(?:This parameter is )?only available (?:to|for) agents\.?/gi,
    replacement: "",
  },
];

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Collapse whitespace, strip boilerplate phrases, collapse again.
 */
export function cleanDescription(
  text: string,
  rules: readonly NoiseRule[] = DEFAULT_NOISE_RULES,
): string {
  let cleaned = collapseWhitespace(text);
  for (const rule of rules) {
    cleaned = cleaned.replace(rule.pattern, rule.replacement);
  }
  return collapseWhitespace(cleaned);
}
