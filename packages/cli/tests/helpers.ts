import { loadMarkup, type MarkupElement } from "../src/markup";

export function tableHtml(rows: string[][], header?: string[]): string {
  const headerCells = header ?? (rows[0] ?? []).map((_, i) => `Column ${i + 1}`);
  const head = `<tr>${headerCells.map(cell => `<th>${cell}</th>`).join("")}</tr>`;
  const body = rows
    .map(row => `<tr>${row.map(cell => `<td>${cell}</td>`).join("")}</tr>`)
    .join("");
  return `<table>${head}${body}</table>`;
}

export function firstTable(html: string): MarkupElement {
  const table = loadMarkup(html).findFirst("table");
  if (!table) throw new Error("fixture has no table");
  return table;
}

export type PageOptions = {
  title?: string;
  method?: string;
  access?: string;
  description?: string;
  breadcrumb?: string[];
  headingTag?: string;
  requestRows?: string[][];
  responseRows?: string[][];
  errorRows?: string[][];
  requestExample?: string;
  responseExample?: string;
};

/**
 * A method page laid out the way the documentation site renders one.
 */
export function methodPage(options: PageOptions = {}): string {
  const h = options.headingTag ?? "h3";
  const parts: string[] = [];

  if (options.breadcrumb) {
    parts.push(
      `<nav aria-label="breadcrumb"><ol>${options.breadcrumb
        .map(item => `<li>${item}</li>`)
        .join("")}</ol></nav>`,
    );
  }
  if (options.title) parts.push(`<h1>${options.title}</h1>`);

  const info: string[][] = [];
  if (options.method) info.push(["Метод", `<code>${options.method}</code>`]);
  if (options.access) info.push(["Кому доступен", options.access]);
  if (options.description) info.push(["Описание", options.description]);
  if (info.length > 0) {
    parts.push(
      `<table>${info
        .map(([label, value]) => `<tr><td>${label}</td><td>${value}</td></tr>`)
        .join("")}</table>`,
    );
  }

  if (options.requestRows) {
    parts.push(`<${h}>Параметры запроса</${h}>`, tableHtml(options.requestRows));
  }
  if (options.responseRows) {
    parts.push(`<${h}>Параметры ответа</${h}>`, tableHtml(options.responseRows));
  }
  if (options.errorRows) {
    parts.push(
      `<${h}>Список возвращаемых ошибок</${h}>`,
      tableHtml(options.errorRows),
    );
  }
  if (options.requestExample !== undefined) {
    parts.push(
      `<${h}>Пример запроса</${h}>`,
      `<pre><code>${options.requestExample}</code></pre>`,
    );
  }
  if (options.responseExample !== undefined) {
    parts.push(
      `<${h}>Пример ответа</${h}>`,
      `<pre><code>${options.responseExample}</code></pre>`,
    );
  }

  return `<!DOCTYPE html><html><body><main>${parts.join("\n")}</main></body></html>`;
}
