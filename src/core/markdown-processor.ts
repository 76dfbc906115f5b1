import { TranslateFn } from '../types';
import { leadingWhitespace, replaceAsync, trailingWhitespace } from '../utils/text';
import { FRONT_MATTER_MARKER, splitFrontMatter, translateFrontMatter } from './front-matter';
import { SpanMasker } from './protected-spans';
import { translateAroundPlaceholders } from './segment-translator';

const LINE_PATTERN = /[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g;
const HEADING_PATTERN = /^([ \t]*)(#+) ([\s\S]*)$/;

export class MarkdownProcessor {
  private translate: TranslateFn;

  constructor(translate: TranslateFn) {
    this.translate = translate;
  }

  async translateDocument(markdown: string): Promise<string> {
    const { raw, body } = splitFrontMatter(markdown);
    const translatedBody = await this.translateBody(body);

    if (raw === null) {
      return translatedBody;
    }

    const frontMatter = await translateFrontMatter(this.translate, raw);
    const separator = translatedBody.startsWith('\n') ? '' : '\n';
    return `${FRONT_MATTER_MARKER}\n${frontMatter}\n${FRONT_MATTER_MARKER}${separator}${translatedBody}`;
  }

  async translateBody(body: string): Promise<string> {
    const masker = new SpanMasker(body);
    const placeholders = masker.tokenPattern;

    let masked = masker.maskMarkdown(body);

    // The label is translated here, once; the rewritten link is then masked
    // so the line pass leaves both label and target alone.
    masked = await replaceAsync(masked, masker.linkPattern, async match => {
      const [, label, url] = match;
      const translatedLabel = await translateAroundPlaceholders(this.translate, label, placeholders);
      return masker.protect('link-target', `[${translatedLabel}](${url})`);
    });

    const lines = masked.match(LINE_PATTERN) ?? [];
    const translatedLines: string[] = [];
    for (const line of lines) {
      translatedLines.push(await this.translateLine(line, placeholders));
    }

    return masker.restore(translatedLines.join(''));
  }

  private async translateLine(line: string, placeholders: RegExp): Promise<string> {
    if (!line.trim()) {
      return line;
    }

    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      const [, indent, hashes, text] = heading;
      const translated = await translateAroundPlaceholders(this.translate, text, placeholders);
      return `${indent}${hashes} ${translated}`;
    }

    const content = line.trim();
    const translated = await translateAroundPlaceholders(this.translate, content, placeholders);
    return leadingWhitespace(line) + translated.replace(/\] \(/g, '](') + trailingWhitespace(line);
  }
}
