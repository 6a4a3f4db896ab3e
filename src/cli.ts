#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the catverb CLI, which turns a Catalan Wiktionary dump into the verb
 *              definitions shown by the conjugation dictionary.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture the dump, infinitive list and output defaults in `.catverbrc.json`.
 *   - `definitions`: extract every definition and write `definitions.txt` + `definitions.json`.
 *   - `extract`: print the description extracted for a single page.
 *
 * @example
 *   catverb init --dump data/cawiktionary-latest-pages-meta-current.xml
 *   catverb definitions --diff
 *   catverb extract abaltir
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import definitionsCommand from './commands/definitions';
import extractCommand from './commands/extract';
import initCommand from './commands/init';

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf8')));

const program = new Command();
program
  .name('catverb')
  .description('CLI extracting Catalan verb definitions from a Wiktionary dump')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(definitionsCommand);
program.addCommand(extractCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('catverb', { font: 'Standard' });
  console.log(chalk.hex('#f2c14e')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`[error] ${message}`));
    process.exitCode = 1;
  });
}
