import {
  CANONICAL_TYPES,
  HTTP_VERBS,
  type Diagnostic,
  type Parameter,
  type ParsedDocument,
  type SectionKind,
} from "./parsed-document";

export type DocumentValidation =
  | { valid: true; warnings: Diagnostic[] }
  | { valid: false; reason: string; warnings: Diagnostic[] };

/**
 * Structural completeness check run between extraction and synthesis.
 * Never throws; a rejected document carries the first reason found.
 */
export class DocumentValidator {
  validate(document: ParsedDocument): DocumentValidation {
    const warnings: Diagnostic[] = [];
    const { method } = document;

    if (!method.name.trim()) {
      return { valid: false, reason: "Method name not found", warnings };
    }

    if (!HTTP_VERBS.includes(method.httpVerb)) {
      return {
        valid: false,
        reason: `Unknown HTTP verb "${method.httpVerb}" for ${method.name}`,
        warnings,
      };
    }

    const sections: [SectionKind, Map<string, Parameter>][] = [
      ["request", document.requestParameters],
      ["response", document.responseParameters],
    ];

    for (const [section, parameters] of sections) {
      for (const parameter of parameters.values()) {
        const problem = this.checkParameter(parameter);
        if (problem) {
          return {
            valid: false,
            reason: `Malformed ${section} parameter: ${problem}`,
            warnings,
          };
        }

        if (!parameter.description) {
          warnings.push({
            kind: "MissingDescription",
            message: `${section} parameter "${parameter.name}" has no description`,
          });
        }
      }
    }

    return { valid: true, warnings };
  }

  private checkParameter(parameter: Parameter): string | undefined {
    if (!parameter.name.trim()) return "empty name";
    if (!CANONICAL_TYPES.includes(parameter.type)) {
      return `"${parameter.name}" has unresolved type "${parameter.type}"`;
    }
    return undefined;
  }
}
