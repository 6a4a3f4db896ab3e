/**
 * @file src/lib/definitions-file.ts
 * @description Serializes the definitions mapping: `definitions.txt` alternates an infinitive
 *              line with its description line, `definitions.json` holds the mapping as an object.
 *              Also measures how much a regenerated `definitions.txt` differs from the last one.
 */

import { createTwoFilesPatch } from 'diff';
import fs from 'node:fs';
import path from 'node:path';
import { paths } from '../shared/paths';

export const DEFINITIONS_TEXT_FILE = 'definitions.txt';
export const DEFINITIONS_JSON_FILE = 'definitions.json';

export interface WrittenDefinitions {
  textPath: string;
  jsonPath: string;
  text: string;
}

export interface ChangeSummary {
  added: number;
  removed: number;
}

export const formatDefinitionsText = (
  definitions: ReadonlyMap<string, string>,
  infinitives: readonly string[],
): string => {
  let output = '';
  for (const verb of infinitives) {
    const definition = definitions.get(verb);
    if (definition === undefined) continue;
    output += `${verb}\n${definition}\n`;
  }
  return output;
};

export const formatDefinitionsJson = (definitions: ReadonlyMap<string, string>): string =>
  JSON.stringify(Object.fromEntries(definitions), null, 2);

export const readPreviousDefinitions = (outputDir: string): string | null => {
  const target = path.join(outputDir, DEFINITIONS_TEXT_FILE);
  return fs.existsSync(target) ? fs.readFileSync(target, 'utf8') : null;
};

export const writeDefinitions = (
  outputDir: string,
  definitions: ReadonlyMap<string, string>,
  infinitives: readonly string[],
): WrittenDefinitions => {
  paths.ensureDir(outputDir);
  const textPath = path.join(outputDir, DEFINITIONS_TEXT_FILE);
  const jsonPath = path.join(outputDir, DEFINITIONS_JSON_FILE);
  const text = formatDefinitionsText(definitions, infinitives);
  fs.writeFileSync(textPath, text, 'utf8');
  fs.writeFileSync(jsonPath, formatDefinitionsJson(definitions), 'utf8');
  return { textPath, jsonPath, text };
};

/** Counts added and removed lines of a zero-context patch between two versions. */
export const summarizeChanges = (previous: string, current: string): ChangeSummary => {
  const patch = createTwoFilesPatch(
    DEFINITIONS_TEXT_FILE,
    DEFINITIONS_TEXT_FILE,
    previous,
    current,
    'previous',
    'current',
    { context: 0 },
  );
  const lines = patch.split('\n');
  return {
    added: lines.filter((line) => line.startsWith('+') && !line.startsWith('+++')).length,
    removed: lines.filter((line) => line.startsWith('-') && !line.startsWith('---')).length,
  };
};
