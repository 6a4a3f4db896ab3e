/**
 * @file src/commands/extract.ts
 * @description Prints the description extracted for the dump pages matching a title.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { resolveRunConfig } from '../shared/config';
import { createLogger } from '../shared/logger';
import { type ExtractedPage, runExtractWorkflow } from '../workflows/extract-workflow';

interface ExtractCliOptions {
  dump?: string;
  infinitives?: string;
  verbose?: boolean;
}

const printPage = (page: ExtractedPage): void => {
  console.log(chalk.bold(`# ${page.title}`));
  if (!page.isVerb) {
    console.log(chalk.yellow('  (no {{ca-verb}} template: skipped by the definitions build)'));
  }
  console.log(page.description ? page.description : chalk.gray('  (no description)'));
};

const extractCommand = new Command('extract')
  .description('Show the description extracted for one page of the dump')
  .argument('<title>', 'Page title or infinitive, reflexive pronoun optional')
  .option('-d, --dump <file>', 'Wiktionary XML dump (default: config or data/)')
  .option('-i, --infinitives <file>', 'Infinitive list used to validate alternative forms')
  .option('--verbose', 'Log discarded lines')
  .action(async (title: string, options: ExtractCliOptions) => {
    const config = resolveRunConfig({ dumpPath: options.dump, infinitivesPath: options.infinitives });
    const logger = createLogger('extract', { verbose: options.verbose });
    try {
      const pages = await runExtractWorkflow(title, { ...config, logger });
      if (!pages.length) {
        console.log(chalk.yellow(`[extract] no page matches '${title}'`));
        process.exitCode = 1;
        return;
      }
      pages.forEach(printPage);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`[error] ${message}`));
      process.exitCode = 1;
    }
  });

export default extractCommand;
