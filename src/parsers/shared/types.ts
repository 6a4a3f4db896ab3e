/**
 * @file src/parsers/shared/types.ts
 * @description Shared types for the dump reader and the definition builders
 */

/** One `<page>` of a MediaWiki XML export. */
export interface DumpPage {
  title: string;
  /** Wikitext of the page's last revision. */
  text: string;
}
