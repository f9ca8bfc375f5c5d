/**
 * Typed document-query layer over cheerio.
 *
 * The protocol code only ever needs a handful of lookups (by selector, by id,
 * by attribute, by class pattern, first-match text), so it talks to this
 * wrapper rather than to a raw cheerio selection.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

export interface InputField {
  name: string | undefined;
  value: string | undefined;
}

export class PageElement {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly node: cheerio.Cheerio<Element>,
  ) {}

  attr(name: string): string | undefined {
    return this.node.attr(name);
  }

  /** Text content with surrounding whitespace stripped. */
  text(): string {
    return this.node.text().trim();
  }

  /** The element's own markup, tags included. */
  outerHtml(): string {
    return this.$.html(this.node);
  }

  find(selector: string): PageElement[] {
    return this.node
      .find(selector)
      .toArray()
      .map((el) => new PageElement(this.$, this.$(el)));
  }

  /** Every `<input>` below this element, in document order. */
  inputs(): InputField[] {
    return this.node
      .find('input')
      .toArray()
      .map((el) => {
        const input = this.$(el);
        return { name: input.attr('name'), value: input.attr('value') };
      });
  }
}

export class PageDocument {
  private constructor(
    private readonly $: cheerio.CheerioAPI,
    /** Final URL the document was served from, after redirects. */
    readonly url: string,
  ) {}

  static parse(html: string, url: string): PageDocument {
    return new PageDocument(cheerio.load(html), url);
  }

  selectOne(selector: string): PageElement | null {
    const match = this.$<Element, string>(selector).first();
    return match.length > 0 ? new PageElement(this.$, match) : null;
  }

  findById(id: string): PageElement | null {
    const match = this.$(`[id="${escapeAttribute(id)}"]`).first();
    return match.length > 0 ? new PageElement(this.$, match) : null;
  }

  findByAttribute(tag: string, attribute: string, value: string): PageElement | null {
    return this.selectOne(`${tag}[${attribute}="${escapeAttribute(value)}"]`);
  }

  /** Elements of `tag` whose whole `class` attribute matches `pattern`. */
  findByClassPattern(tag: string, pattern: RegExp): PageElement[] {
    return this.$<Element, string>(tag)
      .toArray()
      .filter((el) => pattern.test(this.$(el).attr('class') ?? ''))
      .map((el) => new PageElement(this.$, this.$(el)));
  }

  /** Trimmed text of the first match, or null when nothing matches. */
  firstText(selector: string): string | null {
    return this.selectOne(selector)?.text() ?? null;
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
