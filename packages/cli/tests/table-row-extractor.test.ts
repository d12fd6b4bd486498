import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import { ParameterNormalizer } from "../src/parameter-normalizer";
import {
  extractErrors,
  extractParameters,
  selectRule,
  REQUEST_RULES,
  RESPONSE_RULES,
} from "../src/table-row-extractor";
import { firstTable, tableHtml } from "./helpers";

const normalizer = new ParameterNormalizer({
  requiredTokens: DEFAULT_CONFIG.requiredTokens,
  noiseRules: DEFAULT_CONFIG.noiseRules,
});

describe("column rules", () => {
  it("picks request rules by cell count", () => {
    expect(selectRule(REQUEST_RULES, 3)).toBeUndefined();
    expect(selectRule(REQUEST_RULES, 4)?.shape).toBe(
      "name | type | required | description",
    );
    expect(selectRule(REQUEST_RULES, 7)?.shape).toBe(
      "name | type | required | allowed values | description",
    );
  });

  it("picks response rules by cell count", () => {
    expect(selectRule(RESPONSE_RULES, 2)).toBeUndefined();
    expect(selectRule(RESPONSE_RULES, 5)?.shape).toBe(
      "name | type | ... | description",
    );
    expect(selectRule(RESPONSE_RULES, 6)?.shape).toBe(
      "name | type | allowed values | filtering | sorting | description",
    );
  });
});

describe("extractParameters", () => {
  it("reads a 4-cell request row without constraints", () => {
    const table = firstTable(
      tableHtml([["<code>user_id</code>", "number", "да", "ID пользователя"]]),
    );
    const { parameters, diagnostics } = extractParameters(
      table,
      "request",
      normalizer,
    );

    expect([...parameters.values()]).toEqual([
      {
        name: "user_id",
        type: "number",
        required: true,
        description: "ID пользователя",
      },
    ]);
    expect(diagnostics).toEqual([]);
  });

  it("reads the 4th of 5 cells as allowed values", () => {
    const table = firstTable(
      tableHtml([
        [
          "direction",
          "string",
          "нет",
          "<ul><li>in</li><li>out</li></ul>",
          "Направление звонка",
        ],
        ["comment", "string", "нет", "Максимум 255 символов", "Комментарий"],
      ]),
    );
    const { parameters } = extractParameters(table, "request", normalizer);

    expect(parameters.get("direction")).toEqual({
      name: "direction",
      type: "string",
      required: false,
      description: "Направление звонка",
      constraints: { enum: ["in", "out"], example: "in" },
    });
    expect(parameters.get("comment")?.constraints).toEqual({ maxLength: 255 });
  });

  it("keeps row order", () => {
    const table = firstTable(
      tableHtml([
        ["b", "string", "нет", "B"],
        ["a", "string", "нет", "A"],
        ["c", "string", "нет", "C"],
      ]),
    );
    const { parameters } = extractParameters(table, "request", normalizer);

    expect([...parameters.keys()]).toEqual(["b", "a", "c"]);
  });

  it("drops rows that are too short", () => {
    const table = firstTable(
      tableHtml([
        ["limit", "number", "нет", "Лимит"],
        ["offset", "number", "нет"],
      ]),
    );
    const { parameters, diagnostics } = extractParameters(
      table,
      "request",
      normalizer,
    );

    expect([...parameters.keys()]).toEqual(["limit"]);
    expect(diagnostics).toEqual([
      {
        kind: "MalformedRow",
        message: "Row 2 has 3 cells, no column rule applies",
      },
    ]);
  });

  it("keeps the first of duplicate rows", () => {
    const table = firstTable(
      tableHtml([
        ["id", "number", "да", "First"],
        ["id", "string", "нет", "Second"],
      ]),
    );
    const { parameters, diagnostics } = extractParameters(
      table,
      "request",
      normalizer,
    );

    expect(parameters.get("id")?.description).toBe("First");
    expect(diagnostics).toEqual([
      {
        kind: "DuplicateParameter",
        message: 'Duplicate request parameter "id", keeping the first row',
      },
    ]);
  });

  it("skips rows without a name", () => {
    const table = firstTable(tableHtml([["", "string", "нет", "Nothing"]]));
    const { parameters, diagnostics } = extractParameters(
      table,
      "request",
      normalizer,
    );

    expect(parameters.size).toBe(0);
    expect(diagnostics).toEqual([
      {
        kind: "MalformedRow",
        message: "Skipped request row without a parameter name",
      },
    ]);
  });

  it("reads response rows of 3, 4 and 6 cells", () => {
    const three = extractParameters(
      firstTable(tableHtml([["name", "string", "Имя"]])),
      "response",
      normalizer,
    );
    const four = extractParameters(
      firstTable(tableHtml([["name", "string", "да", "Имя"]])),
      "response",
      normalizer,
    );
    const six = extractParameters(
      firstTable(
        tableHtml([["id", "number", "", "eq, in", "asc", "Идентификатор"]]),
      ),
      "response",
      normalizer,
    );

    const expected = {
      name: "name",
      type: "string",
      required: false,
      description: "Имя",
    };
    expect(three.parameters.get("name")).toEqual(expected);
    expect(four.parameters.get("name")).toEqual(expected);
    expect(six.parameters.get("id")).toEqual({
      name: "id",
      type: "number",
      required: false,
      description: "Идентификатор",
      constraints: { filtering: "eq, in", sorting: "asc" },
    });
  });
});

describe("extractErrors", () => {
  it("reads 2, 3 and 4 cell layouts", () => {
    expect(
      extractErrors(firstTable(tableHtml([["404", "Пользователь не найден"]])))
        .rows,
    ).toEqual([{ code: "404", description: "Пользователь не найден" }]);

    expect(
      extractErrors(
        firstTable(tableHtml([["-32602", "invalid_params", "Bad params"]])),
      ).rows,
    ).toEqual([
      { code: "-32602", mnemonic: "invalid_params", description: "Bad params" },
    ]);

    expect(
      extractErrors(
        firstTable(
          tableHtml([
            [
              "Access denied",
              "403",
              "access_denied",
              '<a href="/errors#403">Доступ запрещен</a>',
            ],
          ]),
        ),
      ).rows,
    ).toEqual([
      {
        message: "Access denied",
        code: "403",
        mnemonic: "access_denied",
        description: "Доступ запрещен",
        href: "/errors#403",
      },
    ]);
  });

  it("reports single-cell rows", () => {
    const { rows, diagnostics } = extractErrors(
      firstTable(tableHtml([["404", "Not found"], ["oops"]])),
    );

    expect(rows).toHaveLength(1);
    expect(diagnostics).toEqual([
      {
        kind: "MalformedRow",
        message: "Row 2 has 1 cells, no column rule applies",
      },
    ]);
  });
});
