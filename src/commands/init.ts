import inquirer from 'inquirer';
import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import { CONFIG_FILE, FileConfig, saveConfig, validateLanguageCode } from '../utils/config';
import { getSupportedLanguages } from '../core/translator';
import { CLONE_SUFFIX } from '../utils/repository';

interface InitAnswers {
  fromLang: string;
  toLang: string;
  includeMarkdown: boolean;
  translateJs: boolean;
  openaiModel: string;
  openaiApiKey: string;
  ignorePaths: string[];
}

function validateLanguage(input: string): boolean | string {
  if (!validateLanguageCode(input)) {
    return `Invalid language code: ${input}. Use ISO 639-1 format (e.g., 'es' or 'pt-BR')`;
  }
  if (!getSupportedLanguages().has(input)) {
    return `Unsupported language: ${input}. See data/languages.json for the supported codes`;
  }
  return true;
}

export async function initCommand(): Promise<void> {
  console.log(boxen(
    chalk.bold.cyan('🌍 sitelingo Setup Wizard'),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));

  const answers = await inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'fromLang',
      message: 'Source language of the site (e.g., en):',
      default: 'en',
      validate: validateLanguage,
    },
    {
      type: 'input',
      name: 'toLang',
      message: 'Target language (e.g., pt):',
      validate: validateLanguage,
    },
    {
      type: 'confirm',
      name: 'includeMarkdown',
      message: 'Translate Markdown content (recommended for Jekyll sites)?',
      default: true,
    },
    {
      type: 'confirm',
      name: 'translateJs',
      message: 'Try translating JavaScript string literals that render text?',
      default: false,
    },
    {
      type: 'list',
      name: 'openaiModel',
      message: 'Select OpenAI model:',
      choices: [
        { name: 'GPT-4o mini (Recommended - Fast & Affordable)', value: 'gpt-4o-mini' },
        { name: 'GPT-4o (Higher quality)', value: 'gpt-4o' },
        { name: 'GPT-4 Turbo', value: 'gpt-4-turbo' },
      ],
      default: 'gpt-4o-mini',
    },
    {
      type: 'password',
      name: 'openaiApiKey',
      message: 'OpenAI API Key (will be saved to .env file):',
      validate: (input: string) => {
        if (!input) {
          return 'API key is required';
        }
        if (!input.startsWith('sk-')) {
          return 'Invalid API key format (should start with sk-)';
        }
        return true;
      },
    },
    {
      type: 'input',
      name: 'ignorePaths',
      message: 'Glob patterns to skip (comma-separated, optional):',
      default: 'node_modules/**,_site/**',
      filter: (input: string) => input.split(',').map(p => p.trim()).filter(Boolean),
    },
  ]);

  const config: FileConfig = {
    fromLang: answers.fromLang,
    toLang: answers.toLang,
    includeMarkdown: answers.includeMarkdown,
    translateJs: answers.translateJs,
    openaiModel: answers.openaiModel,
    ignorePaths: answers.ignorePaths,
  };

  await saveConfig(config);
  console.log(chalk.green(`✅ Configuration saved to ${CONFIG_FILE}`));

  // Save API key to .env
  const envPath = path.join(process.cwd(), '.env');
  const envContent = `OPENAI_API_KEY=${answers.openaiApiKey}\n`;

  if (await fs.pathExists(envPath)) {
    const existingEnv = await fs.readFile(envPath, 'utf-8');
    if (!existingEnv.includes('OPENAI_API_KEY')) {
      await fs.appendFile(envPath, envContent);
    } else {
      console.log(chalk.yellow('⚠️  OPENAI_API_KEY already exists in .env file'));
    }
  } else {
    await fs.writeFile(envPath, envContent);
  }

  console.log(chalk.green('✅ API key saved to .env file'));

  const gitignorePath = path.join(process.cwd(), '.gitignore');
  const cloneEntry = `*${CLONE_SUFFIX}/`;
  if (await fs.pathExists(gitignorePath)) {
    const gitignore = await fs.readFile(gitignorePath, 'utf-8');
    if (!gitignore.includes('.env')) {
      await fs.appendFile(gitignorePath, '\n.env\n');
    }
    if (!gitignore.includes(cloneEntry)) {
      await fs.appendFile(gitignorePath, `${cloneEntry}\n`);
    }
  } else {
    await fs.writeFile(gitignorePath, `.env\n${cloneEntry}\n`);
  }

  console.log(boxen(
    chalk.green.bold('🎉 Setup Complete!\n\n') +
    chalk.white('Run ') +
    chalk.cyan('npx sitelingo translate --src <site> --dest <output>') +
    chalk.white(' to translate your site.'),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));
}
