import { TranslateFn } from '../types';
import { replaceAsync } from '../utils/text';
import { INTERPOLATION_PATTERN, MARKUP_TAG_PATTERN, SpanMasker } from './protected-spans';
import { looksLikeUrl, translateAroundPlaceholders } from './segment-translator';

/**
 * A string or template literal in a position that usually renders text:
 * `innerHTML|outerHTML|textContent = `, `document.write(`, the markup argument
 * of `insertAdjacentHTML(`, or any plain assignment.
 */
export const RENDERED_LITERAL_PATTERN = new RegExp(
  '(?<prefix>\\b(?:innerHTML|outerHTML|textContent)\\s*=\\s*' +
    '|document\\.write\\s*\\(\\s*' +
    '|insertAdjacentHTML\\s*\\(\\s*[\'"][^\'"]+[\'"]\\s*,\\s*' +
    '|(?<![=!<>])=(?![=>])\\s*)' +
    '(?<quote>[\'"`])(?<text>(?:\\\\[\\s\\S]|(?!\\k<quote>)[^\\\\])*)\\k<quote>',
  'g'
);

const MIN_LITERAL_LENGTH = 4;
const MIN_PROSE_WORDS = 4;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

/**
 * Resolves JS escape sequences in a literal body. Line continuations
 * disappear; unknown escapes resolve to the escaped character.
 */
export function decodeLiteral(body: string): string {
  return body.replace(
    /\\(?:u\{([0-9a-fA-F]+)\}|u([0-9a-fA-F]{4})|x([0-9a-fA-F]{2})|(\r\n|[\s\S]))/g,
    (_match, codePoint?: string, unicode?: string, hex?: string, char?: string) => {
      const code = codePoint ?? unicode ?? hex;
      if (code !== undefined) {
        return String.fromCodePoint(parseInt(code, 16));
      }
      if (char === undefined || char === '\n' || char === '\r\n' || char === '\r') {
        return '';
      }
      return SIMPLE_ESCAPES[char] ?? char;
    }
  );
}

/**
 * Escapes text for a literal delimited by `quote`: backslashes first, then the
 * quote itself, then whatever would end or alter the literal.
 */
export function encodeLiteral(text: string, quote: string): string {
  let escaped = text.replace(/\\/g, '\\\\').split(quote).join(`\\${quote}`);
  if (quote === '`') {
    escaped = escaped.replace(/\$\{/g, '\\${');
  } else {
    escaped = escaped.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
  }
  return escaped;
}

export function isRenderedProse(body: string): boolean {
  if (looksLikeUrl(body) || body.trim().length < MIN_LITERAL_LENGTH) {
    return false;
  }
  const looksLikeMarkup = body.includes('<') && body.includes('>');
  const words = body.split(/\s+/).filter(Boolean);
  return looksLikeMarkup || words.length >= MIN_PROSE_WORDS;
}

export class ScriptProcessor {
  private translate: TranslateFn;

  constructor(translate: TranslateFn) {
    this.translate = translate;
  }

  async translateDocument(source: string): Promise<string> {
    return replaceAsync(source, RENDERED_LITERAL_PATTERN, async match => {
      const prefix = match.groups?.prefix ?? '';
      const quote = match.groups?.quote ?? '';
      const body = match.groups?.text ?? '';

      if (!isRenderedProse(body)) {
        return match[0];
      }

      const translated = await this.translateLiteral(body, quote);
      return translated === null ? match[0] : `${prefix}${quote}${translated}${quote}`;
    });
  }

  /**
   * Returns the re-escaped literal body, or null when translation changed
   * nothing.
   */
  private async translateLiteral(body: string, quote: string): Promise<string | null> {
    // Interpolations stay raw, markup tags are decoded text like the prose.
    const interpolations = new SpanMasker(body);
    const masked = quote === '`' ? interpolations.mask(body, INTERPOLATION_PATTERN, 'interpolation') : body;

    const text = decodeLiteral(masked);
    const markup = new SpanMasker(text);
    const protectedText =
      text.includes('<') && text.includes('>') ? markup.mask(text, MARKUP_TAG_PATTERN, 'markup-tag') : text;

    const placeholders = new RegExp(
      `${interpolations.tokenPattern.source}|${markup.tokenPattern.source}`,
      'g'
    );
    const translated = await translateAroundPlaceholders(this.translate, protectedText, placeholders);
    if (translated === protectedText) {
      return null;
    }

    return interpolations.restore(encodeLiteral(markup.restore(translated), quote));
  }
}
