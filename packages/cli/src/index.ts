import { cancel, intro, isCancel, outro, text } from "@clack/prompts";
import { Command } from "commander";
import { existsSync, realpathSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { bundleByDomain, type BundleEntry } from "./bundler";
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  parseProgramOptions,
  type ExtractionConfig,
  type ProgramOptions,
} from "./config";
import { logger } from "./logger";
import { renderMarkdown } from "./markdown-renderer";
import {
  renderOpenApi,
  toJson,
  toYaml,
  verifyOpenApi,
  type RenderedDocument,
} from "./openapi-renderer";
import {
  DEFAULT_CONCURRENCY,
  processBatch,
  summarizeReport,
  type BatchReport,
} from "./pipeline";
import { scanHtmlFiles } from "./scanner";
import { SchemaValidator } from "./schema-validator";
import {
  createDebugDirectory,
  outputFileName,
  resolvePath,
  saveDebugOutput,
} from "./utils";

function serialize(document: RenderedDocument, format: "yaml" | "json") {
  return format === "json" ? toJson(document) : toYaml(document);
}

async function promptInputDir(): Promise<string> {
  const inputDir = await text({
    message: "Enter the path to the directory with HTML documentation",
    placeholder: "./docs",
    validate(value) {
      if (value.length === 0) return "Input directory is required";
    },
  });

  if (isCancel(inputDir)) {
    cancel("Cancelled");
    process.exit(0);
  }

  return inputDir.toString();
}

async function writeOutputs(
  report: BatchReport,
  inputDir: string,
  opts: ProgramOptions,
  config: ExtractionConfig,
): Promise<void> {
  const outputDir = resolvePath(opts.output);
  await fs.mkdir(outputDir, { recursive: true });

  const bundleEntries: BundleEntry[] = [];
  let verificationFailures = 0;

  for (const { file, outcome } of report.results) {
    if (outcome.status !== "succeeded") continue;
    const { schema } = outcome;

    if (opts.format === "markdown") {
      await fs.writeFile(
        path.join(outputDir, outputFileName(schema.method, "md")),
        renderMarkdown(schema),
      );
    }

    const document = renderOpenApi(schema);
    if (opts.format !== "markdown") {
      if (opts.verify) {
        try {
          await verifyOpenApi(document);
        } catch (error) {
          verificationFailures++;
          logger.warn(error instanceof Error ? error.message : String(error));
        }
      }
      await fs.writeFile(
        path.join(outputDir, outputFileName(schema.method, opts.format)),
        serialize(document, opts.format),
      );
    }

    bundleEntries.push({
      sourcePath: path.relative(inputDir, file),
      method: schema.method,
      document,
    });
  }

  logger.info(`Wrote ${bundleEntries.length} files to ${outputDir}`);
  if (verificationFailures > 0) {
    logger.warn(`${verificationFailures} documents failed OpenAPI validation`);
  }

  if (opts.bundle) {
    const bundleDir = resolvePath(opts.bundle);
    await fs.mkdir(bundleDir, { recursive: true });
    const bundleFormat = opts.format === "json" ? "json" : "yaml";

    for (const bundle of bundleByDomain(bundleEntries, config.domainMappings)) {
      bundle.warnings.forEach(warning => logger.warn(warning));
      await fs.writeFile(
        path.join(bundleDir, `${bundle.name}.${bundleFormat}`),
        serialize(bundle.document, bundleFormat),
      );
      logger.debug(
        `Bundled ${bundle.methods.length} methods into ${bundle.name}.${bundleFormat}`,
      );
    }
    logger.info(`Bundles saved to ${bundleDir}`);
  }

  if (opts.report) {
    const reportPath = path.join(outputDir, "batch_report.json");
    await fs.writeFile(
      reportPath,
      JSON.stringify(summarizeReport(report), null, 2),
    );
    logger.info(`Report saved to ${reportPath}`);
  }
}

async function main() {
  const program = new Command();

  program
    .name("docsynth")
    .description(
      "Extract API method schemas from HTML documentation into OpenAPI",
    )
    .version("1.0.0")
    .argument("[input-dir]", "directory with HTML documentation pages");

  program
    .option("-o, --output <dir>", "output directory", "openapi")
    .option("-f, --format <format>", "yaml, json or markdown", "yaml")
    .option("-b, --bundle <dir>", "also write one bundled OpenAPI document per domain")
    .option(
      "-c, --concurrency <number>",
      `number of pages to process in parallel (default: ${DEFAULT_CONCURRENCY})`,
      value => Number.parseInt(value, 10),
      DEFAULT_CONCURRENCY,
    )
    .option("--config <file>", "JSON file overriding extraction settings")
    .option("--report", "write batch_report.json next to the output")
    .option("--verify", "validate every rendered OpenAPI document")
    .option("-d, --debug", "enable debug mode with detailed output")
    .option("-v, --verbose", "enable verbose logging");

  program.parse();

  let opts: ProgramOptions;
  try {
    opts = parseProgramOptions(program.opts());
  } catch (error) {
    return program.error(error instanceof Error ? error.message : String(error));
  }

  intro("docsynth - HTML API documentation to OpenAPI");

  if (opts.verbose) {
    logger.setVerboseMode(true);
    logger.info("📝 Verbose mode enabled");
  }

  const inputDir = resolvePath(program.args[0] ?? (await promptInputDir()));
  if (!existsSync(inputDir)) {
    cancel(`Directory not found: ${inputDir}`);
    process.exit(1);
  }

  const config = opts.config
    ? await loadConfigFile(resolvePath(opts.config))
    : DEFAULT_CONFIG;
  const schemaValidator = await SchemaValidator.load();
  const debugDir = await createDebugDirectory(opts.debug);

  logger.step("Scanning");
  const files = await scanHtmlFiles(inputDir);
  if (files.length === 0) {
    cancel(`No HTML files found in ${inputDir}`);
    process.exit(1);
  }
  logger.info(`Found ${files.length} HTML files`);

  logger.step("Extracting");
  logger.startSpinner("Processing pages...");
  const report = await processBatch(files, {
    config,
    schemaValidator,
    concurrency: opts.concurrency,
    onProgress: (completed, total, file) =>
      logger.updateSpinner(
        `Processing ${path.relative(inputDir, file)} (${completed}/${total})`,
      ),
  });
  logger.stopSpinner(
    `Processed ${report.total} pages: ${report.succeeded} succeeded, ${report.skipped} skipped, ${report.failed} failed`,
  );
  logger.debug(
    `Finished in ${report.totalTimeMs} ms, ${report.summary.averageTimeMs.toFixed(1)} ms per page on average`,
  );

  if (debugDir) {
    for (const { file, outcome } of report.results) {
      if (outcome.status !== "succeeded") continue;
      const stage = path.relative(inputDir, file);
      await saveDebugOutput(outcome.parsed, `${stage}-01-parsed`, debugDir);
      await saveDebugOutput(outcome.schema, `${stage}-02-schema`, debugDir);
    }
    await saveDebugOutput(summarizeReport(report), "batch-report", debugDir);
  }

  for (const error of report.errors) {
    logger.error(error);
  }

  logger.step("📝 Writing output");
  await writeOutputs(report, inputDir, opts, config);

  if (report.succeeded === 0) {
    cancel("No documents were converted");
    process.exit(1);
  }

  outro(`Converted ${report.succeeded} of ${report.total} pages`);
}

const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : "";
if (fileURLToPath(import.meta.url) === entryPath) {
  main().catch(error => {
    cancel(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
