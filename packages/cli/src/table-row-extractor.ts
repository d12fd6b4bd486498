import type { MarkupElement } from "./markup";
import type { ParameterNormalizer, RawRow } from "./parameter-normalizer";
import type {
  Diagnostic,
  ErrorEntry,
  Parameter,
  SectionKind,
} from "./parsed-document";
import { collapseWhitespace } from "./text-cleanup";

/**
 * A column interpretation chosen by the number of cells in a row.
 */
export type ColumnRule<T> = {
  shape: string;
  matches: (cellCount: number) => boolean;
  map: (cells: MarkupElement[]) => T;
};

export function cellName(cell: MarkupElement): string {
  const code = cell.findFirst("code");
  return (code ?? cell).text();
}

/**
 * Cell text, with bulleted list items joined by ", ".
 */
export function cellListText(cell: MarkupElement): string {
  const items = cell
    .findAll("li")
    .map(item => collapseWhitespace(item.text()))
    .filter(item => item.length > 0);

  return items.length > 0 ? items.join(", ") : cell.text();
}

function firstHref(cells: MarkupElement[]): string | undefined {
  for (const cell of cells) {
    const href = cell.findFirst("a", link => !!link.attr("href"))?.attr("href");
    if (href) return href;
  }
  return undefined;
}

export const REQUEST_RULES: ColumnRule<RawRow>[] = [
  {
    shape: "name | type | required | description",
    matches: count => count === 4,
    map: cells => ({
      name: cellName(cells[0]),
      type: cells[1].text(),
      required: cells[2].text(),
      description: cells[3].text(),
    }),
  },
  {
    shape: "name | type | required | allowed values | description",
    matches: count => count >= 5,
    map: cells => ({
      name: cellName(cells[0]),
      type: cells[1].text(),
      required: cells[2].text(),
      allowedValues: cellListText(cells[3]),
      description: cells[4].text(),
    }),
  },
];

export const RESPONSE_RULES: ColumnRule<RawRow>[] = [
  {
    shape: "name | type | description",
    matches: count => count === 3,
    map: cells => ({
      name: cellName(cells[0]),
      type: cells[1].text(),
      description: cells[2].text(),
    }),
  },
  {
    shape: "name | type | ... | description",
    matches: count => count === 4 || count === 5,
    map: cells => ({
      name: cellName(cells[0]),
      type: cells[1].text(),
      description: cells[cells.length - 1].text(),
    }),
  },
  {
    shape: "name | type | allowed values | filtering | sorting | description",
    matches: count => count >= 6,
    map: cells => ({
      name: cellName(cells[0]),
      type: cells[1].text(),
      allowedValues: cellListText(cells[2]),
      filtering: cells[3].text(),
      sorting: cells[4].text(),
      description: cells[5].text(),
    }),
  },
];

export const ERROR_RULES: ColumnRule<ErrorEntry>[] = [
  {
    shape: "code | description",
    matches: count => count === 2,
    map: cells => ({
      code: cells[0].text(),
      description: cells[1].text(),
      href: firstHref(cells),
    }),
  },
  {
    shape: "code | mnemonic | description",
    matches: count => count === 3,
    map: cells => ({
      code: cells[0].text(),
      mnemonic: cells[1].text(),
      description: cells[2].text(),
      href: firstHref(cells),
    }),
  },
  {
    shape: "message | code | mnemonic | description",
    matches: count => count >= 4,
    map: cells => ({
      message: cells[0].text(),
      code: cells[1].text(),
      mnemonic: cells[2].text(),
      description: cells[3].text(),
      href: firstHref(cells),
    }),
  },
];

export function selectRule<T>(
  rules: readonly ColumnRule<T>[],
  cellCount: number,
): ColumnRule<T> | undefined {
  return rules.find(rule => rule.matches(cellCount));
}

export type ExtractedRows<T> = {
  rows: T[];
  diagnostics: Diagnostic[];
};

/**
 * Map every body row of `table` through the first matching rule. The header
 * row is skipped; rows no rule accepts are reported as malformed.
 */
export function extractRows<T>(
  table: MarkupElement,
  rules: readonly ColumnRule<T>[],
): ExtractedRows<T> {
  const rows: T[] = [];
  const diagnostics: Diagnostic[] = [];

  table
    .findAll("tr")
    .slice(1)
    .forEach((row, index) => {
      const cells = row
        .children()
        .filter(cell => cell.tag === "td" || cell.tag === "th");
      const rule = selectRule(rules, cells.length);
      if (!rule) {
        diagnostics.push({
          kind: "MalformedRow",
          message: `Row ${index + 1} has ${cells.length} cells, no column rule applies`,
        });
        return;
      }
      rows.push(rule.map(cells));
    });

  return { rows, diagnostics };
}

export function stripEmpty(entry: ErrorEntry): ErrorEntry {
  const cleaned: ErrorEntry = {
    description: collapseWhitespace(entry.description),
  };
  const code = entry.code?.trim();
  if (code) cleaned.code = code;
  const mnemonic = entry.mnemonic?.trim();
  if (mnemonic) cleaned.mnemonic = mnemonic;
  const message = entry.message ? collapseWhitespace(entry.message) : "";
  if (message) cleaned.message = message;
  if (entry.href) cleaned.href = entry.href;
  return cleaned;
}

export type ExtractedParameters = {
  parameters: Map<string, Parameter>;
  diagnostics: Diagnostic[];
};

export function extractParameters(
  table: MarkupElement,
  section: SectionKind,
  normalizer: ParameterNormalizer,
): ExtractedParameters {
  const rules = section === "request" ? REQUEST_RULES : RESPONSE_RULES;
  const { rows, diagnostics } = extractRows(table, rules);
  const parameters = new Map<string, Parameter>();

  for (const row of rows) {
    if (!row.name) {
      diagnostics.push({
        kind: "MalformedRow",
        message: `Skipped ${section} row without a parameter name`,
      });
      continue;
    }

    if (parameters.has(row.name)) {
      diagnostics.push({
        kind: "DuplicateParameter",
        message: `Duplicate ${section} parameter "${row.name}", keeping the first row`,
      });
      continue;
    }

    const normalized = normalizer.normalize(row, section);
    parameters.set(row.name, normalized.parameter);
    diagnostics.push(...normalized.diagnostics);
  }

  return { parameters, diagnostics };
}

export function extractErrors(table: MarkupElement): ExtractedRows<ErrorEntry> {
  const { rows, diagnostics } = extractRows(table, ERROR_RULES);
  return {
    rows: rows.map(stripEmpty).filter(entry => entry.code || entry.description),
    diagnostics,
  };
}
