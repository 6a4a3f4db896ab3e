/**
 * @file src/shared/infinitives.ts
 * @description Loads the list of infinitives whose definitions are wanted.
 */

import { readInputFile } from './files';

/** One infinitive per line, lower-cased and trimmed. Blank lines are dropped, order is kept. */
export const parseInfinitives = (raw: string): string[] =>
  raw
    .split(/\r?\n/)
    .map((line) => line.toLowerCase().trim())
    .filter(Boolean);

export const loadInfinitives = (filePath: string): string[] =>
  parseInfinitives(readInputFile('Infinitives', filePath));
