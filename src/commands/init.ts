/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the dump location, the
 *              infinitive list, the output directory and the verb link prefix in `.catverbrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import { DEFAULT_VERB_LINK_BASE } from '../parsers/wiki';
import { CONFIG_PATH, readConfig, writeConfig } from '../shared/config';
import { paths } from '../shared/paths';

type InitOptions = {
  dump?: string;
  infinitives?: string;
  output?: string;
  linkBase?: string;
};

const normalize = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length ? value.trim() : undefined;

const required = (label: string) => (value: string) =>
  value && value.trim().length ? true : `${label} is required.`;

const initCommand = new Command('init')
  .description('Configure default dump, infinitive list and output locations')
  .option('--dump <file>', 'Wiktionary XML dump (pages-meta-current)')
  .option('--infinitives <file>', 'Infinitive list, one verb per line')
  .option('--output <dir>', 'Directory receiving definitions.txt and definitions.json')
  .option('--link-base <path>', 'URL prefix of alternative-form links')
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };

    const responses = await prompts(
      [
        {
          type: options.dump ? null : 'text',
          name: 'dumpPath',
          message: 'Wiktionary XML dump',
          initial: existing.dumpPath ?? paths.DUMP,
          validate: required('Dump path'),
        },
        {
          type: options.infinitives ? null : 'text',
          name: 'infinitivesPath',
          message: 'Infinitive list',
          initial: existing.infinitivesPath ?? paths.INFINITIVES,
          validate: required('Infinitive list'),
        },
        {
          type: options.output ? null : 'text',
          name: 'outputDir',
          message: 'Output directory',
          initial: existing.outputDir ?? paths.OUTPUT_DIR,
          validate: required('Output directory'),
        },
        {
          type: options.linkBase ? null : 'text',
          name: 'linkBase',
          message: 'Alternative-form link prefix',
          initial: existing.linkBase ?? DEFAULT_VERB_LINK_BASE,
        },
      ],
      { onCancel },
    );

    const updated = writeConfig({
      dumpPath: normalize(options.dump) ?? normalize(responses.dumpPath) ?? paths.DUMP,
      infinitivesPath:
        normalize(options.infinitives) ?? normalize(responses.infinitivesPath) ?? paths.INFINITIVES,
      outputDir: normalize(options.output) ?? normalize(responses.outputDir) ?? paths.OUTPUT_DIR,
      linkBase:
        normalize(options.linkBase) ?? normalize(responses.linkBase) ?? DEFAULT_VERB_LINK_BASE,
    });

    console.log(chalk.green('catverb configured successfully.'));
    console.log(chalk.gray(`   Saved to ${CONFIG_PATH}`));
    console.log(
      [
        '',
        'Current defaults:',
        `  • Dump: ${updated.dumpPath}`,
        `  • Infinitives: ${updated.infinitivesPath}`,
        `  • Output: ${updated.outputDir}`,
        `  • Link prefix: ${updated.linkBase}`,
        '',
      ].join('\n'),
    );
  });

export default initCommand;
