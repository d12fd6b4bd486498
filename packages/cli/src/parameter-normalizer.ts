import type { ParameterConstraints } from "@docsynth/core";
import { interpretAllowedValues } from "./constraint-interpreter";
import type { Diagnostic, Parameter, SectionKind } from "./parsed-document";
import { cleanDescription, type NoiseRule } from "./text-cleanup";
import { mapType } from "./type-mapper";

/**
 * One table row after column interpretation, still as cell text.
 */
export type RawRow = {
  name: string;
  type: string;
  required?: string;
  allowedValues?: string;
  filtering?: string;
  sorting?: string;
  description: string;
};

export type NormalizerOptions = {
  requiredTokens: readonly string[];
  noiseRules: readonly NoiseRule[];
};

export type NormalizedParameter = {
  parameter: Parameter;
  diagnostics: Diagnostic[];
};

export class ParameterNormalizer {
  private readonly requiredTokens: Set<string>;

  constructor(private readonly options: NormalizerOptions) {
    this.requiredTokens = new Set(
      options.requiredTokens.map(token => token.trim().toLowerCase()),
    );
  }

  isRequired(cell: string | undefined): boolean {
    if (cell === undefined) return false;
    return this.requiredTokens.has(cell.trim().toLowerCase());
  }

  normalize(row: RawRow, section: SectionKind): NormalizedParameter {
    const diagnostics: Diagnostic[] = [];

    const mapped = mapType(row.type);
    if (!mapped.recognized) {
      diagnostics.push({
        kind: "UnresolvedType",
        message: `Unknown type "${row.type}" for ${section} parameter "${row.name}", using string`,
      });
    }

    let constraints: ParameterConstraints = {};
    if (row.allowedValues) {
      const interpreted = interpretAllowedValues(row.allowedValues);
      constraints = interpreted.constraints;
      diagnostics.push(...interpreted.diagnostics);
    }

    const filtering = row.filtering?.trim();
    if (filtering) constraints.filtering = filtering;

    const sorting = row.sorting?.trim();
    if (sorting) constraints.sorting = sorting;

    const parameter: Parameter = {
      name: row.name,
      type: mapped.type,
      required: this.isRequired(row.required),
      description: cleanDescription(row.description, this.options.noiseRules),
    };

    if (Object.keys(constraints).length > 0) {
      parameter.constraints = constraints;
    }

    return { parameter, diagnostics };
  }
}
