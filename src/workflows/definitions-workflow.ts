/**
 * @file src/workflows/definitions-workflow.ts
 * @description Reads the infinitive list and the Wiktionary dump, builds the verb definitions and
 *              stores them as `definitions.txt` + `definitions.json` in the output directory.
 *              These files feed the conjugation dictionary.
 */

import {
  type ChangeSummary,
  readPreviousDefinitions,
  summarizeChanges,
  writeDefinitions,
} from '../lib/definitions-file';
import { buildDefinitions, type DefinitionsReport } from '../lib/definitions';
import { readDump } from '../parsers/dump';
import type { RunConfig } from '../shared/config';
import { loadInfinitives } from '../shared/infinitives';
import { type Logger, silentLogger } from '../shared/logger';

export interface DefinitionsWorkflowOptions extends RunConfig {
  /** Compare the new `definitions.txt` with the one it replaces. */
  compare?: boolean;
  logger?: Logger;
}

export interface DefinitionsWorkflowResult {
  definitions: Map<string, string>;
  report: DefinitionsReport;
  textPath: string;
  jsonPath: string;
  changes: ChangeSummary | null;
}

export const runDefinitionsWorkflow = async (
  options: DefinitionsWorkflowOptions,
): Promise<DefinitionsWorkflowResult> => {
  const logger = options.logger ?? silentLogger;
  const infinitives = loadInfinitives(options.infinitivesPath);
  logger.debug(`Read ${infinitives.length} infinitives from ${options.infinitivesPath}`);

  const { definitions, report, pageCount } = await buildDefinitions(
    readDump(options.dumpPath),
    infinitives,
    { linkBase: options.linkBase, logger },
  );
  logger.debug(`Read ${pageCount} pages from ${options.dumpPath}`);
  report.withoutDefinition.forEach((verb) => logger.debug(`No def for: ${verb}`));

  const previous = options.compare ? readPreviousDefinitions(options.outputDir) : null;
  const written = writeDefinitions(options.outputDir, definitions, infinitives);
  const changes = previous === null ? null : summarizeChanges(previous, written.text);

  return {
    definitions,
    report,
    textPath: written.textPath,
    jsonPath: written.jsonPath,
    changes,
  };
};
