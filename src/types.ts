export type TranslateFn = (text: string) => Promise<string>;

export type DocumentKind = 'html' | 'markdown' | 'script' | 'asset' | 'other';

export type ProtectedSpanKind =
  | 'template-tag'
  | 'fenced-code-block'
  | 'inline-code'
  | 'link-target'
  | 'html-entity'
  | 'interpolation'
  | 'markup-tag';

export interface ProtectedSpan {
  kind: ProtectedSpanKind;
  original: string;
  leading: string;
  trailing: string;
}

export interface TranslatorConfig {
  src?: string;
  repoUrl?: string;
  dest: string;
  fromLang: string;
  toLang: string;
  includeMarkdown: boolean;
  translateJs: boolean;
  openaiApiKey?: string;
  openaiModel: string;
  ignorePaths: string[];
}

export interface DocumentOptions {
  includeMarkdown: boolean;
  translateJs: boolean;
}

export interface FileTranslationResult {
  source: string;
  target: string;
  kind: DocumentKind;
  translated: boolean;
  success: boolean;
  error?: string;
}

export interface TranslationStats {
  totalFiles: number;
  translatedFiles: number;
  copiedFiles: number;
  failedFiles: number;
  failedChunks: number;
  totalTokens: number;
  estimatedCost: number;
  duration: number;
}

export interface SiteSummary {
  source: string;
  fromLang: string;
  toLang: string;
}
