/**
 * @file src/shared/files.ts
 * @description Reads the batch input files, turning a missing or unreadable file into an error
 *              that names it.
 */

import fs from 'node:fs';

export const assertInputFile = (label: string, filePath: string): void => {
  if (!fs.existsSync(filePath)) {
    throw new Error(`${label} file not found: ${filePath}`);
  }
};

export const readError = (label: string, filePath: string, error: unknown): Error => {
  const message = error instanceof Error ? error.message : String(error);
  return new Error(`Unable to read ${label.toLowerCase()} file ${filePath}: ${message}`);
};

export const readInputFile = (label: string, filePath: string): string => {
  assertInputFile(label, filePath);
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw readError(label, filePath, error);
  }
};
