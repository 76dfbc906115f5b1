#!/usr/bin/env node

import { program } from 'commander';
import chalk from 'chalk';
import boxen from 'boxen';
import { readFileSync } from 'fs';
import { join } from 'path';
import { initCommand } from './commands/init';
import { translateCommand, TranslateCommandOptions } from './commands/translate';

// Get package version (CommonJS compatible)
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

// Display banner
const banner = boxen(
  chalk.bold.cyan('🌍 sitelingo\n') +
  chalk.gray('Translate static sites, keep templates and code intact'),
  { padding: 1, margin: 0, borderStyle: 'round' }
);

program
  .name('sitelingo')
  .description('Translate the HTML, Markdown and JavaScript text of a static site into another language')
  .version(packageJson.version)
  .addHelpText('before', banner + '\n');

// Init command
program
  .command('init')
  .description('Create a configuration file with an interactive wizard')
  .action(async () => {
    try {
      await initCommand();
    } catch (error) {
      console.error(chalk.red('Error:'), error);
      process.exit(1);
    }
  });

// Translate command (default)
program
  .command('translate', { isDefault: true })
  .description('Translate a site tree into a new directory')
  .option('--src <path>', 'path to a local source site')
  .option('--repo-url <url>', 'git URL to shallow-clone the source site from')
  .option('--dest <path>', 'destination directory (must be empty or missing)')
  .option('--from-lang <code>', 'source language code (e.g. en)')
  .option('--to-lang <code>', 'target language code (e.g. pt)')
  .option('--include-markdown', 'translate Markdown files (recommended for Jekyll sites)')
  .option('--translate-js', 'try translating JS string literals that render HTML/text')
  .option('-c, --config <path>', 'path to configuration file')
  .option('--model <name>', 'OpenAI model to use')
  .option('-d, --dry-run', 'show what would be translated without making API calls')
  .option('-v, --verbose', 'show detailed output')
  .action(async (options: TranslateCommandOptions) => {
    try {
      await translateCommand(options);
    } catch (error) {
      console.error(chalk.red('Error:'), error);
      process.exit(1);
    }
  });

// Parse arguments
program.parse(process.argv);
