/**
 * @file src/commands/definitions.ts
 * @description CLI wiring for the definitions workflow. Business logic lives in
 *              `src/workflows/definitions-workflow.ts`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { resolveRunConfig } from '../shared/config';
import { createLogger } from '../shared/logger';
import {
  type DefinitionsWorkflowResult,
  runDefinitionsWorkflow,
} from '../workflows/definitions-workflow';

interface DefinitionsCliOptions {
  dump?: string;
  infinitives?: string;
  output?: string;
  diff?: boolean;
  verbose?: boolean;
}

const printSummary = (result: DefinitionsWorkflowResult): void => {
  console.log(`Definitions: ${chalk.green(result.definitions.size)}`);
  console.log(`Without definitions: ${chalk.yellow(result.report.withoutDefinition.length)}`);
  if (result.changes) {
    const { added, removed } = result.changes;
    console.log(
      `Total definitions changes: ${added + removed} ` +
        chalk.gray(`(${chalk.green(`+${added}`)} / ${chalk.red(`-${removed}`)})`),
    );
  }
};

const definitionsCommand = new Command('definitions')
  .description('Extract verb definitions from a Wiktionary dump into definitions.txt/.json')
  .option('-d, --dump <file>', 'Wiktionary XML dump (default: config or data/)')
  .option('-i, --infinitives <file>', 'Infinitive list, one verb per line')
  .option('-o, --output <dir>', 'Directory receiving definitions.txt and definitions.json')
  .option('--diff', 'Count changed lines against the previous definitions.txt')
  .option('--verbose', 'Log every discarded page and line')
  .action(async (options: DefinitionsCliOptions) => {
    const config = resolveRunConfig({
      dumpPath: options.dump,
      infinitivesPath: options.infinitives,
      outputDir: options.output,
    });
    const spinner = ora({
      text: `[definitions] extracting from ${config.dumpPath}`,
      isEnabled: !options.verbose,
    }).start();
    try {
      const result = await runDefinitionsWorkflow({
        ...config,
        compare: options.diff,
        logger: createLogger('definitions', { verbose: options.verbose }),
      });
      spinner.succeed(`[definitions] wrote ${result.textPath} and ${result.jsonPath}`);
      printSummary(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      spinner.fail(`[definitions] ${message}`);
      process.exitCode = 1;
    }
  });

export default definitionsCommand;
