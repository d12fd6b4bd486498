import type { ExtractionConfig } from "./config";
import type { MarkupElement } from "./markup";
import { collapseWhitespace } from "./text-cleanup";

const ALL_HEADINGS = ["h1", "h2", "h3", "h4", "h5", "h6"];

const METHOD_NAME_PATTERN = /^[A-Za-z_][\w-]*\.[A-Za-z_][\w-]*$/;

const BREADCRUMB_SEPARATOR = /\s*[/›»>|]\s*/;

export type LocatedSection = {
  heading: MarkupElement;
  table?: MarkupElement;
};

function stripQuotes(text: string): string {
  return text.trim().replace(/^["'`]+|["'`]+$/g, "");
}

function rowCells(row: MarkupElement): MarkupElement[] {
  return row.children().filter(cell => cell.tag === "td" || cell.tag === "th");
}

function labelText(element: MarkupElement): string {
  return collapseWhitespace(element.text()).replace(/:$/, "");
}

/**
 * First heading (at one of `headingTags`) whose text equals one of `labels`,
 * together with the nearest table that follows it before the next heading.
 */
export function locateSection(
  root: MarkupElement,
  labels: readonly string[],
  headingTags: readonly string[],
): LocatedSection | undefined {
  const heading = root.findFirst(headingTags, element =>
    labels.includes(collapseWhitespace(element.text())),
  );
  if (!heading) return undefined;

  return { heading, table: heading.nextOfTag("table", ALL_HEADINGS) };
}

/**
 * Code block that follows a labelled heading, e.g. a JSON example.
 */
export function locateCodeBlock(
  root: MarkupElement,
  labels: readonly string[],
  headingTags: readonly string[],
): string | undefined {
  const heading = root.findFirst(headingTags, element =>
    labels.includes(collapseWhitespace(element.text())),
  );
  const block = heading?.nextOfTag("pre", ALL_HEADINGS);
  if (!block) return undefined;

  return (block.findFirst("code") ?? block).text();
}

/**
 * The cell right after a table cell whose text is one of `labels`.
 */
export function labelledCell(
  root: MarkupElement,
  labels: readonly string[],
): MarkupElement | undefined {
  const row = root.findFirst("tr", candidate => {
    const first = rowCells(candidate)[0];
    return first !== undefined && labels.includes(labelText(first));
  });
  return row ? rowCells(row)[0].nextSibling() : undefined;
}

export function findMethodName(
  root: MarkupElement,
  labels: readonly string[],
): string | undefined {
  const cell = labelledCell(root, labels);
  if (cell) {
    const name = stripQuotes((cell.findFirst("code") ?? cell).text());
    if (name) return name;
  }

  for (const table of root.findAll("table")) {
    const code = table.findFirst(
      "code",
      element =>
        (element.closest("td") ?? element.closest("th")) !== undefined &&
        METHOD_NAME_PATTERN.test(stripQuotes(element.text())),
    );
    if (code) return stripQuotes(code.text());
  }

  return undefined;
}

export function findAccessLevel(
  root: MarkupElement,
  labels: readonly string[],
): string | undefined {
  const cell = labelledCell(root, labels);
  const text = cell ? collapseWhitespace(cell.text()) : "";
  return text || undefined;
}

export function findTitle(root: MarkupElement): string | undefined {
  const heading = root.findFirst("h1");
  const text = heading ? collapseWhitespace(heading.text()) : "";
  return text || undefined;
}

function isBreadcrumb(element: MarkupElement): boolean {
  const label = element.attr("aria-label") ?? "";
  const className = element.attr("class") ?? "";
  return /breadcrumb/i.test(label) || /breadcrumb|md-path/i.test(className);
}

/**
 * Last segment of a breadcrumb trail, if the trail is short and the segment
 * is not a generic one.
 */
export function breadcrumbTail(
  root: MarkupElement,
  breadcrumb: ExtractionConfig["breadcrumb"],
): string | undefined {
  const trail = root.findFirst(["nav", "ol", "ul", "div"], isBreadcrumb);
  if (!trail) return undefined;

  const items = trail
    .findAll("li")
    .map(item => collapseWhitespace(item.text()))
    .filter(item => item.length > 0);
  const segments =
    items.length > 0
      ? items
      : collapseWhitespace(trail.text())
          .split(BREADCRUMB_SEPARATOR)
          .filter(segment => segment.length > 0);

  if (segments.length === 0) return undefined;
  if (segments.join(" / ").length >= breadcrumb.maxLength) return undefined;

  const tail = segments[segments.length - 1];
  const boilerplate = breadcrumb.boilerplate.map(value => value.toLowerCase());
  return boilerplate.includes(tail.toLowerCase()) ? undefined : tail;
}

export function findDescription(
  root: MarkupElement,
  config: ExtractionConfig,
): string | undefined {
  const cell = labelledCell(root, config.labels.description);
  const labelled = cell ? collapseWhitespace(cell.text()) : "";
  if (labelled) return labelled;

  return breadcrumbTail(root, config.breadcrumb) ?? findTitle(root);
}
