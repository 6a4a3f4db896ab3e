/**
 * @file src/parsers/wiki/index.ts
 * @description Wiktionary wikitext parser entry point
 */

export {
  DEFAULT_VERB_LINK_BASE,
  cleanLine,
  extractDescription,
  findVerbSection,
  formatAlternativeFormNotice,
  hasText,
  splitLines,
} from './section-extractor';

export type { ExtractOptions } from './section-extractor';

export { extractAlternativeForm } from './alternative-form';

export {
  convertDescriptionList,
  convertListLine,
  convertOrderedList,
  createListState,
} from './list-converter';

export type { ConvertedLine, ListState } from './list-converter';

export { findTemplateSpan, removeTemplates } from './template-handler';

export type { TemplateSpan } from './template-handler';

export {
  removeGallerySections,
  removeInternalLinks,
  removeWikiEmphasis,
  removeXmlTags,
} from './text-cleaner';
