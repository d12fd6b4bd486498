import { describe, expect, it, vi } from "vitest";
import {
  MAX_REPORTED_ERRORS,
  processBatch,
  processDocument,
  summarizeReport,
} from "../src/pipeline";
import { SchemaValidator } from "../src/schema-validator";
import { methodPage } from "./helpers";

const getUserPage = methodPage({
  title: "Получение пользователя",
  method: "get.user",
  requestRows: [["user_id", "number", "Да", "", "ID пользователя"]],
});

describe("processDocument", () => {
  it("skips pages that are not endpoints", () => {
    const outcome = processDocument(methodPage({ title: "Введение" }));

    expect(outcome.status).toBe("skipped");
    expect(outcome.diagnostics.map(d => d.kind)).toEqual(["NotAnEndpoint"]);
  });

  it("turns a method page into a schema document", () => {
    const outcome = processDocument(getUserPage);

    if (outcome.status !== "succeeded") throw new Error(outcome.reason);
    const { schema } = outcome;
    expect(schema.httpVerb).toBe("get");
    expect(schema.path).toBe("/get.user");
    expect(schema.requestBody?.required).toBe(true);
    expect(schema.requestBody?.properties["user_id"]).toEqual({
      type: "number",
      required: true,
      description: "ID пользователя",
    });
    expect(schema.requestBody?.requiredFields).toEqual(["user_id"]);
  });

  it("promotes numeric error rows only", () => {
    const outcome = processDocument(
      methodPage({
        method: "get.user",
        requestRows: [["user_id", "number", "Да", "ID"]],
        errorRows: [
          ["404", "Пользователь не найден"],
          ["XYZ", "bad"],
        ],
      }),
    );

    if (outcome.status !== "succeeded") throw new Error(outcome.reason);
    expect(outcome.schema.responses["404"]?.description).toBe(
      "Пользователь не найден",
    );
    expect(Object.keys(outcome.schema.responses)).toEqual(["200", "400", "404"]);
    expect(outcome.schema.errorReferences).toEqual([{ text: "XYZ: bad" }]);
  });

  it("gives the same result for the same input", () => {
    const page = methodPage({
      method: "update.user",
      requestRows: [
        ["b", "string", "нет", "B"],
        ["a", "number", "да", "A"],
      ],
      responseRows: [["ok", "boolean", "Успех"]],
      errorRows: [["500", "Ошибка"]],
    });

    const first = processDocument(page);
    const second = processDocument(page);

    expect(second).toEqual(first);
    if (first.status !== "succeeded") throw new Error(first.reason);
    expect(Object.keys(first.schema.requestBody?.properties ?? {})).toEqual([
      "b",
      "a",
    ]);
  });

  it("fails pages without a method name", () => {
    const outcome = processDocument(
      methodPage({ requestRows: [["id", "number", "да", "ID"]] }),
    );

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.reason).toBe("Method name not found");
    expect(outcome.diagnostics.at(-1)).toEqual({
      kind: "ValidationFailure",
      message: "Method name not found",
    });
  });

  it("checks the schema document when a validator is given", async () => {
    const schemaValidator = await SchemaValidator.load();

    const outcome = processDocument(getUserPage, { schemaValidator });

    expect(outcome.status).toBe("succeeded");
  });

  it("reports a schema mismatch as a failure", async () => {
    const schemaValidator = await SchemaValidator.load();
    vi.spyOn(schemaValidator, "validate").mockReturnValue({
      valid: false,
      errors: [{ dataPath: "instance.path", message: "does not match pattern" }],
    });

    const outcome = processDocument(getUserPage, { schemaValidator });

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Schema check failed for get.user: instance.path does not match pattern",
    });
  });
});

describe("processBatch", () => {
  const pages: Record<string, string> = {
    "users/get.html": getUserPage,
    "intro.html": methodPage({ title: "Введение" }),
    "broken.html": methodPage({ requestRows: [["id", "number", "да", "ID"]] }),
  };

  const readFile = async (file: string): Promise<string> => {
    const html = pages[file];
    if (html === undefined) throw new Error("ENOENT");
    return html;
  };

  it("counts outcomes and keeps input order", async () => {
    const files = ["users/get.html", "intro.html", "broken.html", "missing.html"];

    const report = await processBatch(files, { readFile, concurrency: 3 });

    expect(report.total).toBe(4);
    expect(report.succeeded).toBe(1);
    expect(report.skipped).toBe(1);
    expect(report.failed).toBe(2);
    expect(report.results.map(result => result.file)).toEqual(files);
    expect(report.errors).toEqual([
      "broken.html: Method name not found",
      "missing.html: Failed to read missing.html: ENOENT",
    ]);
  });

  it("reports progress for every file", async () => {
    const onProgress = vi.fn();

    await processBatch(["users/get.html", "intro.html"], {
      readFile,
      concurrency: 1,
      onProgress,
    });

    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(2, 2, "intro.html");
  });

  it("caps the error list", async () => {
    const files = Array.from({ length: 60 }, (_, i) => `missing-${i}.html`);

    const report = await processBatch(files, { readFile });

    expect(report.failed).toBe(60);
    expect(report.errors).toHaveLength(MAX_REPORTED_ERRORS);
    expect(report.errors[0]).toBe(
      "missing-0.html: Failed to read missing-0.html: ENOENT",
    );
  });

  it("handles an empty batch", async () => {
    expect(await processBatch([], { readFile, now: () => 0 })).toEqual({
      startTime: "1970-01-01T00:00:00.000Z",
      endTime: "1970-01-01T00:00:00.000Z",
      totalTimeMs: 0,
      total: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      errors: [],
      results: [],
      summary: {
        apiMethods: [],
        totalParameters: 0,
        totalErrors: 0,
        averageTimeMs: 0,
      },
    });
  });
});

describe("batch timing and summary", () => {
  const durations: Record<string, number> = {
    "users/get.html": 30,
    "intro.html": 10,
    "broken.html": 20,
  };
  const timedPages: Record<string, string> = {
    "intro.html": methodPage({ title: "Введение" }),
    "broken.html": methodPage({ requestRows: [["id", "number", "да", "ID"]] }),
    "users/get.html": methodPage({
      title: "Получение пользователя",
      method: "get.user",
      requestRows: [["user_id", "number", "Да", "", "ID пользователя"]],
      responseRows: [["name", "string", "Имя"]],
      errorRows: [
        ["404", "Не найден"],
        ["XYZ", "bad"],
      ],
    }),
  };

  async function timedBatch() {
    let clock = 1000;
    return processBatch(Object.keys(durations), {
      concurrency: 1,
      now: () => clock,
      readFile: async file => {
        clock += durations[file] ?? 0;
        return timedPages[file] ?? "";
      },
    });
  }

  it("records start, end and per-file times", async () => {
    const report = await timedBatch();

    expect(report.startTime).toBe("1970-01-01T00:00:01.000Z");
    expect(report.endTime).toBe("1970-01-01T00:00:01.060Z");
    expect(report.totalTimeMs).toBe(60);
    expect(report.results.map(result => result.processTimeMs)).toEqual([
      30, 10, 20,
    ]);
  });

  it("summarizes methods, counts and timings", async () => {
    const report = await timedBatch();

    expect(report.summary).toEqual({
      apiMethods: ["get.user"],
      totalParameters: 2,
      totalErrors: 2,
      averageTimeMs: 20,
      fastestFile: "intro.html",
      slowestFile: "users/get.html",
    });
  });

  it("keeps timings in the written report", async () => {
    const summary = summarizeReport(await timedBatch());

    expect(summary.totalTimeMs).toBe(60);
    expect(summary.summary.fastestFile).toBe("intro.html");
    expect(summary.files[1]).toMatchObject({
      file: "intro.html",
      status: "skipped",
      processTimeMs: 10,
    });
  });
});
