import OpenAI from 'openai';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { TranslateFn } from '../types';
import { ConfigurationError, describeError } from '../utils/errors';

const LanguageListSchema = z.array(z.object({ code: z.string(), name: z.string() }));

export interface Language {
  code: string;
  name: string;
}

export interface TranslatorOptions {
  apiKey?: string;
  model: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

let supportedLanguages: Map<string, Language> | null = null;

export function getSupportedLanguages(): Map<string, Language> {
  if (!supportedLanguages) {
    const raw: unknown = JSON.parse(
      readFileSync(join(__dirname, '../../data/languages.json'), 'utf-8')
    );
    supportedLanguages = new Map(LanguageListSchema.parse(raw).map(lang => [lang.code, lang]));
  }
  return supportedLanguages;
}

function isRateLimited(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 429;
}

/**
 * Sends one chunk of prose per request to the chat completions API.
 */
export class OpenAITranslator {
  readonly from: Language;
  readonly to: Language;
  private openai: OpenAI;
  private model: string;
  private maxRetries: number;
  private retryDelayMs: number;
  private tokensUsed: number = 0;

  constructor(from: Language, to: Language, options: TranslatorOptions & { apiKey: string }) {
    this.from = from;
    this.to = to;
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.openai = new OpenAI({ apiKey: options.apiKey });
  }

  readonly translate: TranslateFn = async text => {
    let retries = 0;

    while (true) {
      try {
        const response = await this.openai.chat.completions.create({
          model: this.model,
          messages: [
            { role: 'system', content: this.buildSystemPrompt() },
            { role: 'user', content: text },
          ],
          temperature: 0.3,
        });

        if (response.usage) {
          this.tokensUsed += response.usage.total_tokens;
        }

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new Error('Empty response from OpenAI API');
        }
        return content.trim();
      } catch (error) {
        retries++;

        if (isRateLimited(error) && retries < this.maxRetries) {
          const waitTime = Math.min(this.retryDelayMs * Math.pow(2, retries), 10000);
          await new Promise(resolve => setTimeout(resolve, waitTime));
          continue;
        }

        throw new Error(`Failed to translate: ${describeError(error)}`);
      }
    }
  };

  private buildSystemPrompt(): string {
    return `You are a professional translator localizing a website from ${this.from.name} to ${this.to.name}.
Rules:
1. Return only the translation of the user's text, with no quotes, notes or explanations
2. Maintain the original tone and style
3. Keep brand names, code identifiers and product names unchanged
4. Preserve punctuation, symbols and HTML entities exactly as they appear
5. If the text is not translatable prose, return it unchanged`;
  }

  getTokensUsed(): number {
    return this.tokensUsed;
  }

  estimateCost(): number {
    // gpt-4o-mini input pricing, $0.15 per 1M tokens
    const costPer1kTokens = 0.00015;
    return (this.tokensUsed / 1000) * costPer1kTokens;
  }
}

/**
 * Fails before any file is touched when the pair cannot be served.
 */
export function buildTranslator(
  fromLang: string,
  toLang: string,
  options: TranslatorOptions
): OpenAITranslator {
  const languages = getSupportedLanguages();
  const from = languages.get(fromLang);
  const to = languages.get(toLang);

  if (!from || !to) {
    const missing = [fromLang, toLang].filter(code => !languages.has(code));
    throw new ConfigurationError(
      `Language pair not available: ${fromLang}→${toLang} (unsupported: ${missing.join(', ')})`
    );
  }
  if (from.code === to.code) {
    throw new ConfigurationError(`Source and target language are both ${fromLang}`);
  }
  if (!options.apiKey) {
    throw new ConfigurationError(
      'OpenAI API key is required. Set it in config or OPENAI_API_KEY environment variable.'
    );
  }

  return new OpenAITranslator(from, to, { ...options, apiKey: options.apiKey });
}
