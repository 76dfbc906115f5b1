import { isMap, isScalar, parseDocument } from 'yaml';
import { TranslateFn } from '../types';
import { containsTemplateTag } from './protected-spans';
import { translateSegment } from './segment-translator';

export const FRONT_MATTER_MARKER = '---';

const TRANSLATABLE_KEYS = ['title', 'description', 'summary'] as const;

export interface FrontMatterSplit {
  /** YAML between the markers, or null when the document has none. */
  raw: string | null;
  /** The whole block, markers included. Empty when there is none. */
  block: string;
  body: string;
}

/**
 * A document has front matter when it starts with `---\n`; the block ends at
 * the next `\n---`.
 */
export function splitFrontMatter(text: string): FrontMatterSplit {
  const opening = `${FRONT_MATTER_MARKER}\n`;
  if (text.startsWith(opening)) {
    const end = text.indexOf(`\n${FRONT_MATTER_MARKER}`, opening.length);
    if (end !== -1) {
      const blockEnd = end + 1 + FRONT_MATTER_MARKER.length;
      return {
        raw: text.slice(opening.length, end),
        block: text.slice(0, blockEnd),
        body: text.slice(blockEnd),
      };
    }
  }
  return { raw: null, block: '', body: text };
}

/**
 * Translates the human-facing keys of a YAML front matter block and returns
 * the re-serialized YAML (markers excluded). Everything else in the block is
 * kept as written; a block that does not parse to a mapping comes back
 * unchanged.
 */
export async function translateFrontMatter(translate: TranslateFn, raw: string): Promise<string> {
  const doc = parseDocument(raw);
  if (doc.errors.length > 0 || !isMap(doc.contents)) {
    return raw;
  }

  let changed = false;
  for (const key of TRANSLATABLE_KEYS) {
    const node = doc.get(key, true);
    if (!isScalar(node) || typeof node.value !== 'string') continue;
    if (containsTemplateTag(node.value)) continue;

    const translated = await translateSegment(translate, node.value);
    if (translated !== node.value) {
      node.value = translated;
      changed = true;
    }
  }

  return changed ? doc.toString().trimEnd() : raw;
}
