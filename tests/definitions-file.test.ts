/**
 * @file tests/definitions-file.test.ts
 * @description Tests for the definitions.txt/definitions.json writers and the change summary.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  formatDefinitionsJson,
  formatDefinitionsText,
  readPreviousDefinitions,
  summarizeChanges,
  writeDefinitions,
} from '../src/lib/definitions-file';

const definitions = new Map([
  ['cantar', '<ol><li>Fer música.</li>'],
  ['abaltir', '<ol><li>Endormiscar.</li>'],
]);
const infinitives = ['abaltir', 'ballar', 'cantar'];

describe('formatDefinitionsText', () => {
  it('writes verb and definition line pairs in infinitive order', () => {
    expect(formatDefinitionsText(definitions, infinitives)).toBe(
      'abaltir\n<ol><li>Endormiscar.</li>\ncantar\n<ol><li>Fer música.</li>\n',
    );
  });
});

describe('formatDefinitionsJson', () => {
  it('serializes the mapping as an object', () => {
    expect(JSON.parse(formatDefinitionsJson(definitions))).toEqual({
      cantar: '<ol><li>Fer música.</li>',
      abaltir: '<ol><li>Endormiscar.</li>',
    });
  });
});

describe('summarizeChanges', () => {
  it('counts added and removed lines', () => {
    expect(summarizeChanges('a\nb\n', 'a\nc\nd\n')).toEqual({ added: 2, removed: 1 });
  });

  it('reports nothing for identical files', () => {
    expect(summarizeChanges('a\nb\n', 'a\nb\n')).toEqual({ added: 0, removed: 0 });
  });
});

describe('writeDefinitions', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catverb-out-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes both files into a new output directory', () => {
    const outputDir = path.join(dir, 'out');
    expect(readPreviousDefinitions(outputDir)).toBeNull();

    const written = writeDefinitions(outputDir, definitions, infinitives);

    expect(written.textPath).toBe(path.join(outputDir, 'definitions.txt'));
    expect(fs.readFileSync(written.textPath, 'utf8')).toBe(written.text);
    expect(JSON.parse(fs.readFileSync(written.jsonPath, 'utf8'))).toEqual(
      Object.fromEntries(definitions),
    );
    expect(readPreviousDefinitions(outputDir)).toBe(written.text);
  });
});
