import type { HttpVerb } from "@docsynth/core";
import type { ExtractionConfig } from "./config";
import type { MarkupElement } from "./markup";
import { ParameterNormalizer } from "./parameter-normalizer";
import type {
  Diagnostic,
  ErrorEntry,
  MethodInfo,
  Parameter,
  ParsedDocument,
  SectionKind,
} from "./parsed-document";
import {
  findAccessLevel,
  findDescription,
  findMethodName,
  findTitle,
  locateCodeBlock,
  locateSection,
} from "./structure-locator";
import { extractErrors, extractParameters } from "./table-row-extractor";

const VERB_PREFIXES: [prefix: string, verb: HttpVerb][] = [
  ["get.", "get"],
  ["create.", "post"],
  ["update.", "put"],
  ["delete.", "delete"],
];

export function deriveHttpVerb(methodName: string): HttpVerb {
  const hit = VERB_PREFIXES.find(([prefix]) => methodName.startsWith(prefix));
  return hit ? hit[1] : "post";
}

export type ExtractionResult =
  | { status: "skipped"; reason: string }
  | {
      status: "extracted";
      document: ParsedDocument;
      diagnostics: Diagnostic[];
    };

export class DocumentExtractor {
  private readonly normalizer: ParameterNormalizer;

  constructor(private readonly config: ExtractionConfig) {
    this.normalizer = new ParameterNormalizer({
      requiredTokens: config.requiredTokens,
      noiseRules: config.noiseRules,
    });
  }

  extract(root: MarkupElement): ExtractionResult {
    const { labels, headingTags } = this.config;

    const requestSection = locateSection(
      root,
      labels.requestParameters,
      headingTags,
    );
    if (!requestSection) {
      return {
        status: "skipped",
        reason: `No "${labels.requestParameters[0]}" heading, not an endpoint page`,
      };
    }

    const diagnostics: Diagnostic[] = [];

    const requestParameters = this.parameters(
      requestSection.table,
      "request",
      diagnostics,
    );
    const responseParameters = this.parameters(
      locateSection(root, labels.responseParameters, headingTags)?.table,
      "response",
      diagnostics,
    );

    const document: ParsedDocument = {
      method: this.methodInfo(root),
      requestParameters,
      responseParameters,
      errors: this.errors(root, diagnostics),
    };

    const requestExample = this.example(root, labels.requestExample, diagnostics);
    if (requestExample !== undefined) document.requestExample = requestExample;

    const responseExample = this.example(
      root,
      labels.responseExample,
      diagnostics,
    );
    if (responseExample !== undefined) {
      document.responseExample = responseExample;
    }

    return { status: "extracted", document, diagnostics };
  }

  private methodInfo(root: MarkupElement): MethodInfo {
    const name = findMethodName(root, this.config.labels.method) ?? "";
    const method: MethodInfo = { name, httpVerb: deriveHttpVerb(name) };

    const title = findTitle(root);
    if (title) method.title = title;

    const description = findDescription(root, this.config);
    if (description) method.description = description;

    const accessLevel = findAccessLevel(root, this.config.labels.accessLevel);
    if (accessLevel) method.accessLevel = accessLevel;

    return method;
  }

  private parameters(
    table: MarkupElement | undefined,
    section: SectionKind,
    diagnostics: Diagnostic[],
  ): Map<string, Parameter> {
    if (!table) return new Map();

    const extracted = extractParameters(table, section, this.normalizer);
    diagnostics.push(...extracted.diagnostics);
    return extracted.parameters;
  }

  private errors(root: MarkupElement, diagnostics: Diagnostic[]): ErrorEntry[] {
    const section = locateSection(
      root,
      this.config.labels.errors,
      this.config.headingTags,
    );
    if (!section?.table) return [];

    const extracted = extractErrors(section.table);
    diagnostics.push(...extracted.diagnostics);
    return extracted.rows;
  }

  private example(
    root: MarkupElement,
    labels: readonly string[],
    diagnostics: Diagnostic[],
  ): unknown {
    const code = locateCodeBlock(root, labels, this.config.headingTags);
    if (!code) return undefined;

    try {
      return JSON.parse(code);
    } catch (error) {
      diagnostics.push({
        kind: "InvalidExample",
        message: `Example under "${labels[0]}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      });
      return undefined;
    }
  }
}
