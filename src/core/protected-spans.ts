import { ProtectedSpan, ProtectedSpanKind } from '../types';

// Template tags (`{% ... %}`, `{%- ... -%}`, `{{ ... }}`), spanning lines.
export const TEMPLATE_TAG_PATTERN = /\{%-?[\s\S]*?-?%\}|\{\{[\s\S]*?\}\}/g;
const TEMPLATE_TAG_WITH_SPACE_PATTERN = /(\s*)(\{%-?[\s\S]*?-?%\}|\{\{[\s\S]*?\}\})(\s*)/g;

// Markdown protection, in precedence order. One pass, so a masked segment is
// never scanned again.
export const FENCED_CODE_PATTERN = /^```[\s\S]*?^```/gm;
export const INLINE_CODE_PATTERN = /`[^`]+`/g;
export const LINE_TEMPLATE_TAG_PATTERN = /\{%.*?%\}|\{\{.*?\}\}/g;

export const HTML_ENTITY_PATTERN = /&[a-zA-Z]+;|&#\d+;/g;
// A backslash run right before `${` travels with the span, so an escaped
// `\${` stays literal text after the literal is re-escaped.
export const INTERPOLATION_PATTERN = /\\*\$\{[\s\S]*?\}/g;
export const MARKUP_TAG_PATTERN = /<[^<>]+>/g;

const MARKER_BASE = 'PROTECTED';

export function containsTemplateTag(text: string): boolean {
  return new RegExp(TEMPLATE_TAG_PATTERN.source).test(text);
}

/**
 * Replaces protected substrings with `[[[MARKER_n]]]` tokens and puts them
 * back afterwards. The marker is picked so that no token can already occur in
 * the text being masked; `n` indexes an append-only list of originals.
 */
export class SpanMasker {
  readonly marker: string;
  private spans: ProtectedSpan[] = [];

  constructor(text: string) {
    let marker = MARKER_BASE;
    for (let attempt = 1; text.includes(`[[[${marker}_`); attempt++) {
      marker = `${MARKER_BASE}${attempt}`;
    }
    this.marker = marker;
  }

  /** Matches any token issued by this masker. Has no capture groups. */
  get tokenPattern(): RegExp {
    return new RegExp(`\\[\\[\\[${this.marker}_\\d+\\]\\]\\]`, 'g');
  }

  /**
   * Matches a Markdown link `[label](target)` in masked text. Label and target
   * may hold this masker's tokens, whose brackets would otherwise end the
   * label early.
   */
  get linkPattern(): RegExp {
    const token = `\\[\\[\\[${this.marker}_\\d+\\]\\]\\]`;
    return new RegExp(`\\[((?:${token}|[^\\]])+)\\]\\(((?:${token}|[^)])+)\\)`, 'g');
  }

  get size(): number {
    return this.spans.length;
  }

  get protectedSpans(): readonly ProtectedSpan[] {
    return this.spans;
  }

  protect(kind: ProtectedSpanKind, original: string, leading = '', trailing = ''): string {
    this.spans.push({ kind, original, leading, trailing });
    return `[[[${this.marker}_${this.spans.length - 1}]]]`;
  }

  mask(text: string, pattern: RegExp, kind: ProtectedSpanKind): string {
    return text.replace(pattern, match => this.protect(kind, match));
  }

  /**
   * Masks template tags together with the whitespace around them, so the
   * markup parser sees neither the tag nor its spacing.
   */
  maskTemplateTags(text: string): string {
    return text.replace(
      TEMPLATE_TAG_WITH_SPACE_PATTERN,
      (_match, leading: string, tag: string, trailing: string) =>
        this.protect('template-tag', tag, leading, trailing)
    );
  }

  /**
   * Markdown masking: fenced code first, then inline code, then template
   * tags.
   */
  maskMarkdown(text: string): string {
    const pattern = new RegExp(
      [FENCED_CODE_PATTERN.source, INLINE_CODE_PATTERN.source, LINE_TEMPLATE_TAG_PATTERN.source]
        .map(source => `(${source})`)
        .join('|'),
      'gm'
    );

    return text.replace(pattern, (match, fence?: string, inline?: string) => {
      if (fence !== undefined) return this.protect('fenced-code-block', match);
      if (inline !== undefined) return this.protect('inline-code', match);
      return this.protect('template-tag', match);
    });
  }

  restore(text: string): string {
    const prefix = `[[[${this.marker}_`;
    return text.replace(this.tokenPattern, token => {
      const index = Number(token.slice(prefix.length, -3));
      const span = this.spans[index];
      if (!span) {
        return token;
      }
      return span.leading + this.restore(span.original) + span.trailing;
    });
  }
}
