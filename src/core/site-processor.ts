import * as fs from 'fs-extra';
import * as path from 'path';
import { glob } from 'glob';
import { DocumentOptions, FileTranslationResult, SiteSummary, TranslateFn } from '../types';
import { describeError } from '../utils/errors';
import { decodeText } from '../utils/text';
import { classifyFile, isTranslatable, transformDocument } from './documents';

export const SUMMARY_FILE = 'README_TRANSLATED.md';

export interface SiteProcessorOptions extends DocumentOptions {
  ignorePaths?: string[];
  onFileProcessed?: (result: FileTranslationResult, processed: number, total: number) => void;
}

export async function listSourceFiles(sourceDir: string, ignorePaths: string[] = []): Promise<string[]> {
  const files = await glob('**/*', {
    cwd: sourceDir,
    nodir: true,
    dot: true,
    ignore: ['.git/**', ...ignorePaths],
  });
  return files.sort();
}

/**
 * Mirrors `sourceDir` into `destDir` one file at a time. A file that fails is
 * reported in its result and not written; the rest of the tree still gets
 * processed.
 */
export async function processSite(
  sourceDir: string,
  destDir: string,
  translate: TranslateFn,
  options: SiteProcessorOptions
): Promise<FileTranslationResult[]> {
  const files = await listSourceFiles(sourceDir, options.ignorePaths);
  const results: FileTranslationResult[] = [];

  for (const file of files) {
    const result = await processFile(file, sourceDir, destDir, translate, options);
    results.push(result);
    options.onFileProcessed?.(result, results.length, files.length);
  }

  return results;
}

async function processFile(
  file: string,
  sourceDir: string,
  destDir: string,
  translate: TranslateFn,
  options: DocumentOptions
): Promise<FileTranslationResult> {
  const sourcePath = path.join(sourceDir, file);
  const targetPath = path.join(destDir, file);
  const kind = classifyFile(file);
  const translated = isTranslatable(kind, options);

  try {
    await fs.ensureDir(path.dirname(targetPath));

    if (!translated) {
      await fs.copy(sourcePath, targetPath, { preserveTimestamps: true });
    } else {
      const text = decodeText(await fs.readFile(sourcePath));
      const output = await transformDocument(kind, text, translate);
      await fs.writeFile(targetPath, output, 'utf-8');
    }

    return { source: sourcePath, target: targetPath, kind, translated, success: true };
  } catch (error) {
    return {
      source: sourcePath,
      target: targetPath,
      kind,
      translated,
      success: false,
      error: describeError(error),
    };
  }
}

export async function writeSummary(destDir: string, summary: SiteSummary): Promise<string> {
  const summaryPath = path.join(destDir, SUMMARY_FILE);
  const content = [
    '# Translated site',
    `Source: ${summary.source}`,
    `Language: ${summary.fromLang} → ${summary.toLang}`,
    '',
    'Generated by sitelingo. Content files translated; assets copied.',
    '',
  ].join('\n');

  await fs.ensureDir(destDir);
  await fs.writeFile(summaryPath, content, 'utf-8');
  return summaryPath;
}
