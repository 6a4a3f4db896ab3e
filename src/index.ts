/**
 * @file src/index.ts
 * @description Library entry point: the wikitext-to-description pipeline and the batch helpers
 *              behind the CLI.
 */

export * from './lib/definitions';
export * from './lib/definitions-file';

export * from './shared/config';
export * from './shared/infinitives';
export * from './shared/logger';
export * from './shared/paths';

export * from './parsers/dump';
export * from './parsers/wiki';
export type * from './parsers/shared/types';

export * from './workflows/definitions-workflow';
export * from './workflows/extract-workflow';
