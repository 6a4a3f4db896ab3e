/**
 * @file src/parsers/dump/index.ts
 * @description MediaWiki XML dump reader entry point
 */

export { PageSplitter, parseDump, parsePage, readDump } from './reader';

export type { ReadDumpOptions } from './reader';
