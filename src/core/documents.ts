import * as path from 'path';
import { DocumentKind, DocumentOptions, TranslateFn } from '../types';
import { HtmlProcessor } from './html-processor';
import { MarkdownProcessor } from './markdown-processor';
import { ScriptProcessor } from './script-processor';

export const HTML_EXTENSIONS = new Set(['.html', '.htm']);
// .mdx is treated as plain Markdown; JSX inside it is not understood.
export const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown', '.mdx']);
export const SCRIPT_EXTENSIONS = new Set(['.js', '.mjs', '.ts']);
export const ASSET_EXTENSIONS = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.webp', '.svg', '.ico',
  '.pdf', '.zip', '.gz', '.tgz', '.bz2', '.xz',
  '.woff', '.woff2', '.ttf', '.eot',
]);

export function classifyFile(filePath: string): DocumentKind {
  const ext = path.extname(filePath).toLowerCase();
  if (ASSET_EXTENSIONS.has(ext)) return 'asset';
  if (HTML_EXTENSIONS.has(ext)) return 'html';
  if (MARKDOWN_EXTENSIONS.has(ext)) return 'markdown';
  if (SCRIPT_EXTENSIONS.has(ext)) return 'script';
  return 'other';
}

/**
 * Whether files of this kind get transformed with the given options; every
 * other file is copied byte for byte.
 */
export function isTranslatable(kind: DocumentKind, options: DocumentOptions): boolean {
  switch (kind) {
    case 'html':
      return true;
    case 'markdown':
      return options.includeMarkdown;
    case 'script':
      return options.translateJs;
    default:
      return false;
  }
}

export async function transformDocument(
  kind: DocumentKind,
  text: string,
  translate: TranslateFn
): Promise<string> {
  switch (kind) {
    case 'html':
      return new HtmlProcessor(translate).translateDocument(text);
    case 'markdown':
      return new MarkdownProcessor(translate).translateDocument(text);
    case 'script':
      return new ScriptProcessor(translate).translateDocument(text);
    default:
      return text;
  }
}
