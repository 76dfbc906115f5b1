import { z } from 'zod';
import * as fs from 'fs-extra';
import * as path from 'path';
import { TranslatorConfig } from '../types';
import { ConfigurationError } from './errors';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const CONFIG_FILE = 'sitelingo.config.json';
export const MIN_NODE_MAJOR = 20;

const BaseConfigSchema = z.object({
  src: z.string().min(1).optional(),
  repoUrl: z.string().min(1).optional(),
  dest: z.string().min(1),
  fromLang: z.string().min(1),
  toLang: z.string().min(1),
  includeMarkdown: z.boolean().optional().default(false),
  translateJs: z.boolean().optional().default(false),
  openaiApiKey: z.string().optional(),
  openaiModel: z.string().optional().default('gpt-4o-mini'),
  ignorePaths: z.array(z.string()).optional().default([]),
});

const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (Boolean(config.src) === Boolean(config.repoUrl)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['src'],
      message: 'exactly one of --src or --repo-url is required',
    });
  }
});

export const FileConfigSchema = BaseConfigSchema.partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface CliOptions {
  src?: string;
  repoUrl?: string;
  dest?: string;
  fromLang?: string;
  toLang?: string;
  includeMarkdown?: boolean;
  translateJs?: boolean;
  model?: string;
  config?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue =>
    `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`
  ).join('\n');
}

async function readConfigFile(configPath?: string): Promise<FileConfig> {
  const configFile = configPath || path.join(process.cwd(), CONFIG_FILE);

  if (!await fs.pathExists(configFile)) {
    if (configPath) {
      throw new ConfigurationError(`Configuration file not found: ${configFile}`);
    }
    return {};
  }

  const parsed = FileConfigSchema.safeParse(await fs.readJson(configFile));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${configFile}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merges, lowest precedence first: config file, CLI flags, then
 * OPENAI_API_KEY for a key neither of them set.
 */
export async function loadConfig(options: CliOptions): Promise<TranslatorConfig> {
  const fileConfig = await readConfigFile(options.config);

  const cliConfig: FileConfig = {
    src: options.src,
    repoUrl: options.repoUrl,
    dest: options.dest,
    fromLang: options.fromLang,
    toLang: options.toLang,
    includeMarkdown: options.includeMarkdown,
    translateJs: options.translateJs,
    openaiModel: options.model,
  };

  const rawConfig: FileConfig = { ...fileConfig };
  for (const [key, value] of Object.entries(cliConfig)) {
    if (value !== undefined) {
      Object.assign(rawConfig, { [key]: value });
    }
  }

  // Override API key from environment if not in config
  if (!rawConfig.openaiApiKey && process.env.OPENAI_API_KEY) {
    rawConfig.openaiApiKey = process.env.OPENAI_API_KEY;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function saveConfig(config: FileConfig, configPath?: string): Promise<void> {
  const configFile = configPath || path.join(process.cwd(), CONFIG_FILE);
  await fs.writeJson(configFile, config, { spaces: 2 });
}

export function assertNodeVersion(version: string = process.versions.node): void {
  const major = Number.parseInt(version.split('.')[0], 10);
  if (!(major >= MIN_NODE_MAJOR)) {
    throw new ConfigurationError(`Node.js ${MIN_NODE_MAJOR} or newer is required (running ${version})`);
  }
}

export async function assertDestinationAvailable(dest: string): Promise<void> {
  if (!await fs.pathExists(dest)) {
    return;
  }
  const stats = await fs.stat(dest);
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Destination ${dest} exists and is not a directory.`);
  }
  if ((await fs.readdir(dest)).length > 0) {
    throw new ConfigurationError(`Destination ${dest} already exists and is not empty.`);
  }
}

export async function assertSourceExists(src: string): Promise<void> {
  if (!await fs.pathExists(src)) {
    throw new ConfigurationError(`Source path not found: ${src}`);
  }
}

export function validateLanguageCode(code: string): boolean {
  // ISO 639-1, optionally with a region
  const languageCodeRegex = /^[a-z]{2}(-[A-Z]{2})?$/;
  return languageCodeRegex.test(code);
}
