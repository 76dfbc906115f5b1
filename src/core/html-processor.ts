import * as cheerio from 'cheerio';
import { AnyNode, Element, isTag, isText } from 'domhandler';
import { TranslateFn } from '../types';
import { escapeRegExp } from '../utils/text';
import { splitFrontMatter } from './front-matter';
import { SpanMasker } from './protected-spans';
import { translateAroundPlaceholders } from './segment-translator';

export const TRANSLATABLE_ATTRIBUTES = [
  'title',
  'alt',
  'placeholder',
  'aria-label',
  'aria-placeholder',
  'aria-description',
  'aria-valuetext',
  'content',
];

const SKIPPED_PARENTS = new Set(['script', 'style', 'code', 'pre']);

// <meta> values read by browsers and crawlers rather than people.
const MACHINE_META_NAMES = new Set([
  'viewport',
  'robots',
  'googlebot',
  'theme-color',
  'color-scheme',
  'generator',
  'referrer',
  'format-detection',
]);

// Open Graph, Twitter card and similar namespaced keys (`og:type`,
// `twitter:card`, ...) are machine-read unless they carry a title or a
// description.
const NAMESPACED_META_KEY = /^[a-z]+:/;
const READABLE_NAMESPACED_META_KEY = /:(?:title|description|image:alt)$/;

interface Edit {
  start: number;
  end: number;
  replacement: string;
}

export class HtmlProcessor {
  private translate: TranslateFn;

  constructor(translate: TranslateFn) {
    this.translate = translate;
  }

  /**
   * Front matter (if any) is kept byte-for-byte; the body goes through
   * {@link translateMarkup}.
   */
  async translateDocument(html: string): Promise<string> {
    const { block, body } = splitFrontMatter(html);
    return block + (await this.translateMarkup(body));
  }

  /**
   * Template tags are masked before parsing, so the parser never sees them.
   * Translated text nodes and attribute values are written back at their
   * source offsets; nothing is re-serialized by the parser.
   */
  async translateMarkup(markup: string): Promise<string> {
    const masker = new SpanMasker(markup);
    const masked = masker.maskTemplateTags(markup);

    const $ = cheerio.load(
      masked,
      {
        xml: {
          xmlMode: false,
          decodeEntities: false,
          withStartIndices: true,
          withEndIndices: true,
        },
      },
      false
    );

    const edits: Edit[] = [];
    const placeholders = masker.tokenPattern;

    const textNodes = $.root().find('*').addBack().contents().toArray();
    for (const node of textNodes) {
      if (!isText(node) || node.startIndex === null) continue;
      if (!node.data.trim() || this.isSkippedParent(node)) continue;

      const start = node.startIndex;
      const end = start + node.data.length;
      if (masked.slice(start, end) !== node.data) continue;

      const translated = await translateAroundPlaceholders(this.translate, node.data, placeholders);
      if (translated !== node.data) {
        edits.push({ start, end, replacement: translated });
      }
    }

    for (const element of $('*').toArray().filter(isTag)) {
      for (const attribute of TRANSLATABLE_ATTRIBUTES) {
        const value = element.attribs[attribute];
        if (value === undefined || !value.trim()) continue;
        if (attribute === 'content' && !this.hasReadableContent(element)) continue;

        const translated = await translateAroundPlaceholders(this.translate, value, placeholders);
        if (translated === value) continue;

        const edit = this.locateAttribute(masked, element, attribute, value, translated);
        if (edit) {
          edits.push(edit);
        }
      }
    }

    let result = masked;
    for (const edit of edits.sort((a, b) => b.start - a.start)) {
      result = result.slice(0, edit.start) + edit.replacement + result.slice(edit.end);
    }

    return masker.restore(result);
  }

  private isSkippedParent(node: AnyNode): boolean {
    const parent = node.parent;
    return parent !== null && isTag(parent) && SKIPPED_PARENTS.has(parent.name.toLowerCase());
  }

  private hasReadableContent(element: Element): boolean {
    const { attribs } = element;
    if (attribs.charset !== undefined || attribs['http-equiv'] !== undefined) {
      return false;
    }
    const name = (attribs.name ?? attribs.property ?? '').toLowerCase();
    if (NAMESPACED_META_KEY.test(name)) {
      return READABLE_NAMESPACED_META_KEY.test(name);
    }
    return !MACHINE_META_NAMES.has(name);
  }

  /**
   * Finds the attribute's value inside this element's own start tag and
   * returns the edit that swaps it for the translation, quoted and escaped
   * the way the source quoted it.
   */
  private locateAttribute(
    source: string,
    element: Element,
    attribute: string,
    value: string,
    translated: string
  ): Edit | null {
    if (element.startIndex === null) {
      return null;
    }

    const firstChild = element.children[0];
    const tagEnd =
      firstChild?.startIndex ?? (element.endIndex === null ? source.length : element.endIndex + 1);
    const startTag = source.slice(element.startIndex, tagEnd);

    const name = escapeRegExp(attribute);
    const quoted = escapeRegExp(value);
    const pattern = new RegExp(
      `(?<=[\\s"'\\]])(${name}\\s*=\\s*)(?:(["'])${quoted}\\2|${quoted}(?=[\\s/>]|$))`,
      'i'
    );
    const match = pattern.exec(startTag);
    if (!match) {
      return null;
    }

    const quote = match[2] ?? '';
    const valueStart = element.startIndex + match.index + match[1].length;
    const valueEnd = valueStart + quote.length * 2 + value.length;

    let replacement: string;
    if (quote === "'") {
      replacement = `'${translated.replace(/'/g, '&#39;')}'`;
    } else {
      replacement = `"${translated.replace(/"/g, '&quot;')}"`;
    }

    return { start: valueStart, end: valueEnd, replacement };
  }
}
