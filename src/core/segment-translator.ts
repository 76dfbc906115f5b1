import { TranslateFn } from '../types';
import { leadingWhitespace, trailingWhitespace } from '../utils/text';
import { HTML_ENTITY_PATTERN } from './protected-spans';

export const URL_LIKE_PATTERN = /https?:\/\/|[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+/;

const SPECIAL_CHARACTERS = new Set(['#', '$', '@', '!', '%', '^', '&', '*']);

export function looksLikeUrl(text: string): boolean {
  return URL_LIKE_PATTERN.test(text);
}

// With one capture group, split() alternates piece, token, piece, ...
function splitKeepingTokens(text: string, tokens: RegExp): string[] {
  return text.split(new RegExp(`(${tokens.source})`, 'g'));
}

/**
 * Translate one chunk of prose. HTML entities stay in place; every piece
 * between them is translated on its own and keeps its exact surrounding
 * whitespace. A failing translation leaves that piece as it was.
 */
export async function translateSegment(translate: TranslateFn, text: string): Promise<string> {
  if (!text.trim()) {
    return text;
  }
  if (looksLikeUrl(text)) {
    return text;
  }

  const parts = splitKeepingTokens(text, HTML_ENTITY_PATTERN);

  const out: string[] = [];
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    const stripped = part.trim();
    if (i % 2 === 1 || !stripped || SPECIAL_CHARACTERS.has(stripped)) {
      out.push(part);
      continue;
    }

    try {
      const translated = await translate(stripped);
      out.push(leadingWhitespace(part) + translated + trailingWhitespace(part));
    } catch {
      // left untranslated; the backend reports its own failures
      out.push(part);
    }
  }

  return out.join('');
}

/**
 * Split on placeholder tokens first, then translate each remaining piece as
 * its own segment.
 */
export async function translateAroundPlaceholders(
  translate: TranslateFn,
  text: string,
  placeholders: RegExp
): Promise<string> {
  const parts = splitKeepingTokens(text, placeholders);

  const out: string[] = [];
  for (let i = 0; i < parts.length; i++) {
    out.push(i % 2 === 1 ? parts[i] : await translateSegment(translate, parts[i]));
  }
  return out.join('');
}
