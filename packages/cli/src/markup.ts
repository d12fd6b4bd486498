import * as cheerio from "cheerio";
import { isTag, type AnyNode } from "domhandler";

/**
 * The slice of a DOM the extractor relies on. Everything in the engine is
 * written against this interface; `loadMarkup` provides the cheerio-backed
 * implementation.
 */
export interface MarkupElement {
  /** Lower-cased tag name, empty for the document root. */
  readonly tag: string;
  /** Text content with surrounding whitespace removed. */
  text(): string;
  attr(name: string): string | undefined;
  /** Descendants matching any of `tags`, in document order. */
  findAll(
    tags: string | readonly string[],
    predicate?: (element: MarkupElement) => boolean,
  ): MarkupElement[];
  findFirst(
    tags: string | readonly string[],
    predicate?: (element: MarkupElement) => boolean,
  ): MarkupElement | undefined;
  /** Direct element children. */
  children(): MarkupElement[];
  nextSibling(): MarkupElement | undefined;
  /**
   * Nearest element of `tag` among the following siblings (or nested inside
   * one). Scanning stops at the first sibling whose tag is in `boundaryTags`.
   */
  nextOfTag(
    tag: string,
    boundaryTags?: readonly string[],
  ): MarkupElement | undefined;
  /** Closest ancestor-or-self with the given tag. */
  closest(tag: string): MarkupElement | undefined;
}

class CheerioElement implements MarkupElement {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly node: AnyNode,
  ) {}

  get tag(): string {
    return isTag(this.node) ? this.node.tagName.toLowerCase() : "";
  }

  text(): string {
    return this.$(this.node).text().trim();
  }

  attr(name: string): string | undefined {
    return isTag(this.node) ? this.node.attribs[name] : undefined;
  }

  findAll(
    tags: string | readonly string[],
    predicate?: (element: MarkupElement) => boolean,
  ): MarkupElement[] {
    const selector = typeof tags === "string" ? tags : tags.join(", ");
    const found = this.$(this.node)
      .find(selector)
      .toArray()
      .map(node => this.wrap(node));

    return predicate ? found.filter(predicate) : found;
  }

  findFirst(
    tags: string | readonly string[],
    predicate?: (element: MarkupElement) => boolean,
  ): MarkupElement | undefined {
    return this.findAll(tags, predicate)[0];
  }

  children(): MarkupElement[] {
    return this.$(this.node)
      .children()
      .toArray()
      .map(node => this.wrap(node));
  }

  nextSibling(): MarkupElement | undefined {
    const next = this.$(this.node).next().get(0);
    return next ? this.wrap(next) : undefined;
  }

  nextOfTag(
    tag: string,
    boundaryTags: readonly string[] = [],
  ): MarkupElement | undefined {
    for (const sibling of this.$(this.node).nextAll().toArray()) {
      const siblingTag = sibling.tagName.toLowerCase();
      if (siblingTag === tag) return this.wrap(sibling);
      if (boundaryTags.includes(siblingTag)) return undefined;

      const nested = this.$(sibling).find(tag).get(0);
      if (nested) return this.wrap(nested);
    }

    return undefined;
  }

  closest(tag: string): MarkupElement | undefined {
    const match = this.$(this.node).closest(tag).get(0);
    return match ? this.wrap(match) : undefined;
  }

  private wrap(node: AnyNode): MarkupElement {
    return new CheerioElement(this.$, node);
  }
}

/**
 * Parse an HTML string and return the document root.
 */
export function loadMarkup(html: string): MarkupElement {
  const $ = cheerio.load(html);
  const root = $.root().get(0);
  if (!root) {
    throw new Error("Failed to parse markup: empty document");
  }
  return new CheerioElement($, root);
}
