import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import { FileTranslationResult, TranslateFn, TranslationStats, TranslatorConfig } from '../types';
import {
  CliOptions,
  assertDestinationAvailable,
  assertNodeVersion,
  assertSourceExists,
  loadConfig,
} from '../utils/config';
import { describeError } from '../utils/errors';
import { cloneDirectoryFor, cloneRepository, removeClone } from '../utils/repository';
import { buildTranslator } from '../core/translator';
import { classifyFile, isTranslatable } from '../core/documents';
import { listSourceFiles, processSite, writeSummary } from '../core/site-processor';

export interface TranslateCommandOptions extends CliOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

export async function translateCommand(options: TranslateCommandOptions): Promise<void> {
  const startTime = Date.now();
  let spinner = ora('Loading configuration...').start();
  let cloneDir: string | null = null;

  const onInterrupt = () => {
    spinner.stop();
    console.log(chalk.yellow('\nAborted by user.'));
    if (cloneDir) {
      fs.removeSync(cloneDir);
    }
    process.exit(130);
  };
  process.once('SIGINT', onInterrupt);

  try {
    assertNodeVersion();
    const config = await loadConfig(options);
    await assertDestinationAvailable(config.dest);
    if (config.src) {
      await assertSourceExists(config.src);
    }

    const translator = options.dryRun
      ? null
      : buildTranslator(config.fromLang, config.toLang, {
          apiKey: config.openaiApiKey,
          model: config.openaiModel,
        });
    spinner.succeed('Configuration loaded');

    let sourceDir: string;
    if (config.repoUrl) {
      spinner = ora(`Cloning ${config.repoUrl}...`).start();
      cloneDir = cloneDirectoryFor(config.dest);
      sourceDir = await cloneRepository(config.repoUrl, cloneDir);
      spinner.succeed(`Cloned into ${sourceDir}`);
    } else {
      sourceDir = path.resolve(config.src ?? '.');
    }

    if (!translator) {
      await performDryRun(sourceDir, config);
      return;
    }

    let failedChunks = 0;
    const translate: TranslateFn = async text => {
      try {
        return await translator.translate(text);
      } catch (error) {
        failedChunks++;
        if (options.verbose) {
          spinner.clear();
          console.warn(chalk.yellow(`  [SKIP] ${describeError(error)}`));
        }
        throw error;
      }
    };

    console.log(chalk.cyan(`\n📝 Translating ${translator.from.name} → ${translator.to.name}...\n`));
    spinner = ora('Scanning directory structure...').start();

    const results = await processSite(sourceDir, config.dest, translate, {
      includeMarkdown: config.includeMarkdown,
      translateJs: config.translateJs,
      ignorePaths: config.ignorePaths,
      onFileProcessed: (result, processed, total) => {
        reportFile(result, sourceDir, options.verbose ?? false, () => spinner.clear());
        const elapsed = (Date.now() - startTime) / 1000;
        const filesPerSecond = elapsed > 0 ? processed / elapsed : 0;
        const name = path.basename(result.source);
        spinner.text =
          `Translating... ${Math.round((processed / total) * 100)}% (${processed}/${total}) ` +
          chalk.gray(`[${elapsed.toFixed(1)}s, ${filesPerSecond.toFixed(1)} files/s] `) +
          (name.length > 20 ? `${name.slice(0, 20)}...` : name);
      },
    });
    spinner.succeed(`Processed ${results.length} files`);

    const summaryPath = await writeSummary(config.dest, {
      source: config.src ?? config.repoUrl ?? sourceDir,
      fromLang: config.fromLang,
      toLang: config.toLang,
    });

    const stats: TranslationStats = {
      totalFiles: results.length,
      translatedFiles: results.filter(r => r.success && r.translated).length,
      copiedFiles: results.filter(r => r.success && !r.translated).length,
      failedFiles: results.filter(r => !r.success).length,
      failedChunks,
      totalTokens: translator.getTokensUsed(),
      estimatedCost: translator.estimateCost(),
      duration: (Date.now() - startTime) / 1000,
    };

    displayResults(stats);
    console.log(chalk.gray(`Summary written to: ${summaryPath}`));
    console.log(chalk.green(`Done. New site at: ${path.resolve(config.dest)}`));
  } catch (error) {
    spinner.fail(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
    if (cloneDir) {
      await removeClone(cloneDir);
    }
  }
}

function reportFile(
  result: FileTranslationResult,
  sourceDir: string,
  verbose: boolean,
  clearSpinner: () => void
): void {
  const relative = path.relative(sourceDir, result.source);

  if (!result.success) {
    clearSpinner();
    console.error(chalk.red('✗') + ` Error processing ${chalk.gray(relative)}: ${chalk.red(result.error ?? 'Unknown error')}`);
    return;
  }

  if (verbose) {
    clearSpinner();
    const label = result.translated ? chalk.green(`[${result.kind.toUpperCase()}]`) : chalk.blue('[COPY]');
    console.log(`  ${label} ${relative}`);
  }
}

async function performDryRun(sourceDir: string, config: TranslatorConfig): Promise<void> {
  const files = await listSourceFiles(sourceDir, config.ignorePaths);
  const translatable = files.filter(file => isTranslatable(classifyFile(file), config));

  console.log(boxen(
    chalk.yellow.bold('🔍 DRY RUN MODE\n\n') +
    chalk.white('Files found: ') + chalk.cyan(files.length) + '\n' +
    chalk.white('Files to translate: ') + chalk.cyan(translatable.length) + '\n' +
    chalk.white('Files to copy: ') + chalk.cyan(files.length - translatable.length) + '\n' +
    chalk.white('Language pair: ') + chalk.cyan(`${config.fromLang} → ${config.toLang}`),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));

  console.log(chalk.cyan('\nFiles to be translated:'));
  translatable.forEach(file => {
    console.log(chalk.gray(`  - [${classifyFile(file)}] ${file}`));
  });
}

function displayResults(stats: TranslationStats): void {
  const processed = stats.translatedFiles + stats.copiedFiles;
  const successRate = stats.totalFiles === 0 ? 100 : Math.round((processed / stats.totalFiles) * 100);

  console.log(boxen(
    chalk.green.bold('✨ Translation Complete!\n\n') +
    chalk.white('Total files: ') + chalk.cyan(stats.totalFiles) + '\n' +
    chalk.white('Translated: ') + chalk.green(stats.translatedFiles) + '\n' +
    chalk.white('Copied: ') + chalk.blue(stats.copiedFiles) + '\n' +
    chalk.white('Failed: ') + chalk.red(stats.failedFiles) + '\n' +
    chalk.white('Untranslated chunks: ') + chalk.yellow(stats.failedChunks) + '\n' +
    chalk.white('Success rate: ') + (successRate >= 80 ? chalk.green : chalk.yellow)(`${successRate}%`) + '\n\n' +
    chalk.white('Tokens used: ') + chalk.cyan(stats.totalTokens.toLocaleString()) + '\n' +
    chalk.white('Estimated cost: ') + chalk.yellow(`$${stats.estimatedCost.toFixed(4)}`) + '\n' +
    chalk.white('Duration: ') + chalk.cyan(`${stats.duration.toFixed(1)}s`),
    { padding: 1, margin: 1, borderStyle: 'round' }
  ));
}
