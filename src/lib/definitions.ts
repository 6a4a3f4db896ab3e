/**
 * @file src/lib/definitions.ts
 * @description Collects verb definitions from dump pages. Pages are matched to infinitives by
 *              their title without the reflexive pronoun, must carry the `{{ca-verb` template,
 *              and are kept only when their `Verb` section yields a description.
 */

import type { DumpPage } from '../parsers/shared/types';
import { type ExtractOptions, extractDescription } from '../parsers/wiki';
import { silentLogger } from '../shared/logger';

export const VERB_MARKER = '{{ca-verb';

// Wiktionary titles pronominal verbs with the pronoun attached: apoltronar-se, batre's.
const REFLEXIVE_SUFFIXES = ["'s", '-se'];

export type BuildDefinitionsOptions = ExtractOptions;

export interface DefinitionsReport {
  /** Infinitives that received a definition, in input order. */
  withDefinition: string[];
  /** Infinitives left without one, in input order. */
  withoutDefinition: string[];
}

export interface DefinitionsResult {
  definitions: Map<string, string>;
  report: DefinitionsReport;
  /** Pages read from the dump. */
  pageCount: number;
}

/**
 * @example
 *   stripReflexivePronoun('apoltronar-se'); // 'apoltronar'
 */
export const stripReflexivePronoun = (infinitive: string): string => {
  const suffix = REFLEXIVE_SUFFIXES.find((candidate) => infinitive.endsWith(candidate));
  return suffix ? infinitive.slice(0, -suffix.length) : infinitive;
};

export const canonicalKey = (title: string): string =>
  stripReflexivePronoun(title.toLowerCase().trim());

/** Reads the verb marker from the page's last revision. */
export const isVerbPage = (page: DumpPage): boolean => page.text.includes(VERB_MARKER);

export const reportCoverage = (
  definitions: ReadonlyMap<string, string>,
  infinitives: readonly string[],
): DefinitionsReport => ({
  withDefinition: infinitives.filter((verb) => definitions.has(verb)),
  withoutDefinition: infinitives.filter((verb) => !definitions.has(verb)),
});

/**
 * Maps each infinitive to its description. Pages may come from an array or from the streaming
 * dump reader; when several share a key the last one in dump order wins.
 */
export const buildDefinitions = async (
  pages: Iterable<DumpPage> | AsyncIterable<DumpPage>,
  infinitives: readonly string[],
  options: BuildDefinitionsOptions = {},
): Promise<DefinitionsResult> => {
  const logger = options.logger ?? silentLogger;
  const known = new Set(infinitives);
  const definitions = new Map<string, string>();
  let pageCount = 0;

  for await (const page of pages) {
    pageCount += 1;
    const verb = canonicalKey(page.title);
    if (!known.has(verb)) {
      logger.debug(`Discard not in word list: ${page.title}`);
      continue;
    }
    if (!isVerbPage(page)) {
      logger.debug(`Discard is not a verb: ${page.title}`);
      continue;
    }
    const description = extractDescription(page.text, known, options);
    if (!description) {
      logger.debug(`Discard no description: ${page.title}`);
      continue;
    }
    logger.debug(`Store ${verb}`);
    definitions.set(verb, description);
  }

  return { definitions, report: reportCoverage(definitions, infinitives), pageCount };
};
