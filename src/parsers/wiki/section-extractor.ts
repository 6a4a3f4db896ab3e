/**
 * @file src/parsers/wiki/section-extractor.ts
 * @description Builds the HTML description of a verb from the `===Verb===` section of a
 *              Wiktionary page. Each line is stripped of markup, converted to list HTML and kept
 *              only if letters survive; a `forma-a` reference to a known infinitive adds a link
 *              paragraph at the end.
 */

import { type Logger, silentLogger } from '../../shared/logger';
import { extractAlternativeForm } from './alternative-form';
import { convertListLine, createListState } from './list-converter';
import { removeTemplates } from './template-handler';
import {
  removeGallerySections,
  removeInternalLinks,
  removeWikiEmphasis,
  removeXmlTags,
} from './text-cleaner';

const VERB_HEADING = /=== *Verb *===/;
const HEADING_MARKER = '==';
// {{-sin-}}, {{-trad-}}, ... open the synonym/translation blocks that follow the definitions.
const STOP_MARKER = '{{-';
const LATIN_LETTER = /[a-zA-Z]/;

export const DEFAULT_VERB_LINK_BASE = '/conjugador-de-verbs/verb/';

export interface ExtractOptions {
  /** Path prefix of the alternative-form link; the infinitive is appended to it. */
  linkBase?: string;
  logger?: Logger;
}

/**
 * Returns the text between the `===Verb===` heading and the next `==`, or `null` when either is
 * missing.
 */
export const findVerbSection = (text: string): string | null => {
  const heading = VERB_HEADING.exec(text);
  if (!heading) return null;
  const start = heading.index + heading[0].length;
  const end = text.indexOf(HEADING_MARKER, start);
  if (end < 0) return null;
  return text.slice(start, end);
};

/** Splits on `\n`, keeping each terminator on its line. */
export const splitLines = (text: string): string[] => text.match(/[^\n]*\n|[^\n]+$/g) ?? [];

export const hasText = (line: string): boolean => LATIN_LETTER.test(line);

export const cleanLine = (line: string): string =>
  removeXmlTags(removeWikiEmphasis(removeInternalLinks(removeTemplates(line))));

export const formatAlternativeFormNotice = (
  infinitive: string,
  linkBase: string = DEFAULT_VERB_LINK_BASE,
): string =>
  `<p style='font-weight: 300'>Forma alternativa a <a href='${linkBase}${infinitive}'>${infinitive}</a></p>`;

/**
 * Extracts the description of a verb page. Returns `''` when the page has no usable `Verb`
 * section.
 *
 * Lists still open when the section ends are left unterminated.
 */
export const extractDescription = (
  text: string,
  infinitives: ReadonlySet<string>,
  options: ExtractOptions = {},
): string => {
  const logger = options.logger ?? silentLogger;
  const section = findVerbSection(text);
  if (section === null) return '';

  let description = '';
  let state = createListState();
  let alternative: string | null = null;

  for (const rawLine of splitLines(removeGallerySections(section))) {
    if (rawLine.toLowerCase().includes(STOP_MARKER)) break;

    alternative = alternative ?? extractAlternativeForm(rawLine);

    const converted = convertListLine(cleanLine(rawLine), state);
    state = converted.state;
    if (!hasText(converted.html)) {
      logger.debug(`Discard: ${JSON.stringify(converted.html)}`);
      continue;
    }
    description += converted.html;
  }

  if (alternative) {
    if (infinitives.has(alternative)) {
      description += formatAlternativeFormNotice(alternative, options.linkBase);
    } else {
      logger.debug(`Alternative '${alternative}' not in infinitives`);
    }
  }

  return description;
};
