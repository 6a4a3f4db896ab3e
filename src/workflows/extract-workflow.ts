/**
 * @file src/workflows/extract-workflow.ts
 * @description Runs the description extraction for the dump pages matching one title, without
 *              writing anything. Useful to check how a single entry renders.
 */

import fs from 'node:fs';
import { canonicalKey, isVerbPage } from '../lib/definitions';
import { readDump } from '../parsers/dump';
import { extractDescription } from '../parsers/wiki';
import type { RunConfig } from '../shared/config';
import { loadInfinitives } from '../shared/infinitives';
import { type Logger, silentLogger } from '../shared/logger';

export type ExtractWorkflowOptions = Pick<RunConfig, 'dumpPath' | 'infinitivesPath' | 'linkBase'> & {
  logger?: Logger;
};

export interface ExtractedPage {
  title: string;
  isVerb: boolean;
  description: string;
}

export const runExtractWorkflow = async (
  title: string,
  options: ExtractWorkflowOptions,
): Promise<ExtractedPage[]> => {
  const logger = options.logger ?? silentLogger;
  let infinitives: string[] = [];
  if (fs.existsSync(options.infinitivesPath)) {
    infinitives = loadInfinitives(options.infinitivesPath);
  } else {
    logger.warn(
      `${options.infinitivesPath} not found; alternative forms will not be linked.`,
    );
  }
  const known = new Set(infinitives);
  const key = canonicalKey(title);

  const matches: ExtractedPage[] = [];
  for await (const page of readDump(options.dumpPath)) {
    if (canonicalKey(page.title) !== key) continue;
    matches.push({
      title: page.title,
      isVerb: isVerbPage(page),
      description: extractDescription(page.text, known, { linkBase: options.linkBase, logger }),
    });
  }
  return matches;
};
