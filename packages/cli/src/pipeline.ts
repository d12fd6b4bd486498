import fs from "fs/promises";
import type { SchemaDocument } from "@docsynth/core";
import { DEFAULT_CONFIG, type ExtractionConfig } from "./config";
import { DocumentExtractor } from "./document-extractor";
import { DocumentValidator } from "./document-validator";
import { logger } from "./logger";
import { loadMarkup } from "./markup";
import type { Diagnostic, ParsedDocument } from "./parsed-document";
import { SchemaSynthesizer } from "./schema-synthesizer";
import type { SchemaValidator } from "./schema-validator";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_REPORTED_ERRORS = 50;

export type ProcessOptions = {
  config?: ExtractionConfig;
  schemaValidator?: SchemaValidator;
};

export type DocumentOutcome =
  | { status: "skipped"; reason: string; diagnostics: Diagnostic[] }
  | { status: "failed"; reason: string; diagnostics: Diagnostic[] }
  | {
      status: "succeeded";
      schema: SchemaDocument;
      parsed: ParsedDocument;
      diagnostics: Diagnostic[];
    };

/**
 * Run one page through extraction, validation and synthesis. Never throws.
 */
export function processDocument(
  html: string,
  options: ProcessOptions = {},
): DocumentOutcome {
  const diagnostics: Diagnostic[] = [];

  try {
    const extraction = new DocumentExtractor(
      options.config ?? DEFAULT_CONFIG,
    ).extract(loadMarkup(html));

    if (extraction.status === "skipped") {
      diagnostics.push({ kind: "NotAnEndpoint", message: extraction.reason });
      return { status: "skipped", reason: extraction.reason, diagnostics };
    }
    diagnostics.push(...extraction.diagnostics);

    const validation = new DocumentValidator().validate(extraction.document);
    diagnostics.push(...validation.warnings);
    if (!validation.valid) {
      diagnostics.push({ kind: "ValidationFailure", message: validation.reason });
      return { status: "failed", reason: validation.reason, diagnostics };
    }

    const { schema, diagnostics: synthesisDiagnostics } =
      new SchemaSynthesizer().synthesize(extraction.document);
    diagnostics.push(...synthesisDiagnostics);

    if (options.schemaValidator) {
      const check = options.schemaValidator.validate(schema);
      if (!check.valid) {
        const details = (check.errors ?? [])
          .map(error => `${error.dataPath ?? ""} ${error.message ?? ""}`.trim())
          .join("; ");
        const reason = `Schema check failed for ${schema.method}: ${details}`;
        diagnostics.push({ kind: "ValidationFailure", message: reason });
        return { status: "failed", reason, diagnostics };
      }
    }

    return {
      status: "succeeded",
      schema,
      parsed: extraction.document,
      diagnostics,
    };
  } catch (error) {
    return {
      status: "failed",
      reason: `Failed to process document: ${error instanceof Error ? error.message : String(error)}`,
      diagnostics,
    };
  }
}

export type FileResult = {
  file: string;
  outcome: DocumentOutcome;
  processTimeMs: number; // reading included
};

export type BatchSummary = {
  apiMethods: string[];
  totalParameters: number; // request and response, succeeded files only
  totalErrors: number; // documented error rows, succeeded files only
  averageTimeMs: number;
  fastestFile?: string;
  slowestFile?: string;
};

export type BatchReport = {
  startTime: string; // ISO 8601
  endTime: string;
  totalTimeMs: number;
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  errors: string[]; // at most MAX_REPORTED_ERRORS
  results: FileResult[]; // input order
  summary: BatchSummary;
};

export type BatchOptions = ProcessOptions & {
  concurrency?: number;
  readFile?: (file: string) => Promise<string>;
  onProgress?: (completed: number, total: number, file: string) => void;
  now?: () => number; // epoch milliseconds
};

type PartialReport = {
  succeeded: number;
  skipped: number;
  failed: number;
  results: { index: number; result: FileResult }[];
};

const readUtf8 = (file: string) => fs.readFile(file, "utf-8");

/**
 * Process files with `concurrency` workers pulling from a shared queue.
 * A failing file never stops the batch.
 */
export async function processBatch(
  files: readonly string[],
  options: BatchOptions = {},
): Promise<BatchReport> {
  const readFile = options.readFile ?? readUtf8;
  const now = options.now ?? Date.now;
  const startedAt = now();
  const concurrency = Math.max(
    1,
    Math.min(options.concurrency ?? DEFAULT_CONCURRENCY, files.length || 1),
  );

  const queue = files.map((file, index) => ({ file, index }));
  let completed = 0;

  const processFile = async (file: string): Promise<DocumentOutcome> => {
    let html: string;
    try {
      html = await readFile(file);
    } catch (error) {
      return {
        status: "failed",
        reason: `Failed to read ${file}: ${error instanceof Error ? error.message : String(error)}`,
        diagnostics: [],
      };
    }
    return processDocument(html, options);
  };

  const processQueue = async (): Promise<PartialReport> => {
    const partial: PartialReport = {
      succeeded: 0,
      skipped: 0,
      failed: 0,
      results: [],
    };

    while (queue.length > 0) {
      const item = queue.shift();
      if (!item) continue;

      const fileStartedAt = now();
      const outcome = await processFile(item.file);
      const processTimeMs = now() - fileStartedAt;
      partial[outcome.status]++;
      partial.results.push({
        index: item.index,
        result: { file: item.file, outcome, processTimeMs },
      });

      logger.diagnostics(item.file, outcome.diagnostics);
      if (outcome.status === "failed") {
        logger.debug(`${item.file}: ${outcome.reason}`);
      }

      completed++;
      options.onProgress?.(completed, files.length, item.file);
    }

    return partial;
  };

  const processingPromises: Promise<PartialReport>[] = [];
  for (let i = 0; i < concurrency; i++) {
    processingPromises.push(processQueue());
  }

  const partials = await Promise.all(processingPromises);
  return mergeReports(files.length, partials, startedAt, now());
}

function mergeReports(
  total: number,
  partials: PartialReport[],
  startedAt: number,
  endedAt: number,
): BatchReport {
  const results = partials
    .flatMap(partial => partial.results)
    .sort((a, b) => a.index - b.index)
    .map(({ result }) => result);

  const errors: string[] = [];
  for (const { file, outcome } of results) {
    if (outcome.status !== "failed") continue;
    if (errors.length >= MAX_REPORTED_ERRORS) break;
    errors.push(`${file}: ${outcome.reason}`);
  }

  return {
    startTime: new Date(startedAt).toISOString(),
    endTime: new Date(endedAt).toISOString(),
    totalTimeMs: endedAt - startedAt,
    total,
    succeeded: partials.reduce((sum, partial) => sum + partial.succeeded, 0),
    skipped: partials.reduce((sum, partial) => sum + partial.skipped, 0),
    failed: partials.reduce((sum, partial) => sum + partial.failed, 0),
    errors,
    results,
    summary: summarize(results),
  };
}

function summarize(results: FileResult[]): BatchSummary {
  const summary: BatchSummary = {
    apiMethods: [],
    totalParameters: 0,
    totalErrors: 0,
    averageTimeMs: 0,
  };

  let fastest: FileResult | undefined;
  let slowest: FileResult | undefined;
  let totalTimeMs = 0;

  for (const result of results) {
    const { outcome } = result;
    if (outcome.status === "succeeded") {
      const { parsed } = outcome;
      summary.apiMethods.push(parsed.method.name);
      summary.totalParameters +=
        parsed.requestParameters.size + parsed.responseParameters.size;
      summary.totalErrors += parsed.errors.length;
    }

    totalTimeMs += result.processTimeMs;
    if (!fastest || result.processTimeMs < fastest.processTimeMs) {
      fastest = result;
    }
    if (!slowest || result.processTimeMs > slowest.processTimeMs) {
      slowest = result;
    }
  }

  if (results.length > 0) summary.averageTimeMs = totalTimeMs / results.length;
  if (fastest) summary.fastestFile = fastest.file;
  if (slowest) summary.slowestFile = slowest.file;

  return summary;
}

/**
 * JSON-friendly view of a report, without the synthesized documents.
 */
export function summarizeReport(report: BatchReport) {
  return {
    startTime: report.startTime,
    endTime: report.endTime,
    totalTimeMs: report.totalTimeMs,
    total: report.total,
    succeeded: report.succeeded,
    skipped: report.skipped,
    failed: report.failed,
    errors: report.errors,
    summary: report.summary,
    files: report.results.map(({ file, outcome, processTimeMs }) => ({
      file,
      status: outcome.status,
      processTimeMs,
      ...(outcome.status === "succeeded"
        ? { method: outcome.schema.method }
        : { reason: outcome.reason }),
      warnings: outcome.diagnostics
        .filter(diagnostic => diagnostic.kind !== "NotAnEndpoint")
        .map(diagnostic => `${diagnostic.kind}: ${diagnostic.message}`),
    })),
  };
}
