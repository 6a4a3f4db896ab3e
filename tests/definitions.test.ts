/**
 * @file tests/definitions.test.ts
 * @description Unit tests for page filtering, key normalization and the coverage report.
 */

import { describe, expect, it, vi } from 'vitest';
import {
  buildDefinitions,
  canonicalKey,
  isVerbPage,
  stripReflexivePronoun,
} from '../src/lib/definitions';
import { parseDump } from '../src/parsers/dump';
import type { DumpPage } from '../src/parsers/shared/types';

const verbPage = (title: string, body: string): DumpPage => ({
  title,
  text: `==Català==\n===Verb===\n{{ca-verb}}\n${body}\n==Vegeu també==`,
});

describe('canonicalKey', () => {
  it('lower-cases, trims and drops the reflexive pronoun', () => {
    expect(canonicalKey('  Apoltronar-se ')).toBe('apoltronar');
    expect(canonicalKey("batre's")).toBe('batre');
    expect(canonicalKey('Cantar')).toBe('cantar');
  });
});

describe('stripReflexivePronoun', () => {
  it('only strips a trailing pronoun', () => {
    expect(stripReflexivePronoun('se-cantar')).toBe('se-cantar');
    expect(stripReflexivePronoun('abaltir-se')).toBe('abaltir');
  });
});

describe('isVerbPage', () => {
  it('requires the verb template', () => {
    expect(isVerbPage(verbPage('cantar', '#Fer música.'))).toBe(true);
    expect(isVerbPage({ title: 'cantar', text: '===Verb===\n#Fer música.\n==' })).toBe(false);
  });
});

describe('buildDefinitions', () => {
  const infinitives = ['abaltir', 'cantar', 'dormir', 'apoltronar'];

  it('keeps verb pages of known infinitives', async () => {
    const { definitions, report } = await buildDefinitions(
      [
        verbPage('abaltir', '#Endormiscar.'),
        verbPage('ballar', '#Dansar.'),
        verbPage('apoltronar-se', '#Seure còmodament.'),
      ],
      infinitives,
    );
    expect(Object.fromEntries(definitions)).toEqual({
      abaltir: '<ol><li>Endormiscar.</li>',
      apoltronar: '<ol><li>Seure còmodament.</li>',
    });
    expect(report).toEqual({
      withDefinition: ['abaltir', 'apoltronar'],
      withoutDefinition: ['cantar', 'dormir'],
    });
  });

  it('reads pages from an async source in order', async () => {
    async function* pages() {
      yield verbPage('abaltir', '#Primera.');
      yield verbPage('Abaltir-se', '#Segona.');
    }
    const { definitions, pageCount } = await buildDefinitions(pages(), infinitives);
    expect(pageCount).toBe(2);
    expect(definitions.get('abaltir')).toBe('<ol><li>Segona.</li>');
  });

  it('skips pages without the verb template', async () => {
    const logger = { debug: vi.fn(), log: vi.fn(), warn: vi.fn() };
    const { definitions } = await buildDefinitions(
      [{ title: 'cantar', text: '===Verb===\n#Fer música.\n==Vegeu==' }],
      infinitives,
      { logger },
    );
    expect(definitions.size).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith('Discard is not a verb: cantar');
  });

  it('reads the verb marker from the last revision only', async () => {
    const pages = parseDump(
      '<mediawiki><page><title>cantar</title>' +
        '<revision><text>{{ca-verb}}</text></revision>' +
        '<revision><text>===Verb===\n#Fer música.\n==Vegeu==</text></revision>' +
        '</page></mediawiki>',
    );
    const { definitions } = await buildDefinitions(pages, infinitives);
    expect(definitions.has('cantar')).toBe(false);
  });

  it('skips pages whose description is empty', async () => {
    const { definitions } = await buildDefinitions(
      [{ title: 'dormir', text: '{{ca-verb}}\n===Nom===\n#Son.\n==Vegeu==' }],
      infinitives,
    );
    expect(definitions.has('dormir')).toBe(false);
  });

  it('keeps the last page sharing a key', async () => {
    const { definitions } = await buildDefinitions(
      [verbPage('abaltir', '#Primera.'), verbPage('Abaltir', '#Segona.')],
      infinitives,
    );
    expect(definitions.get('abaltir')).toBe('<ol><li>Segona.</li>');
  });

  it('links alternative forms with the configured base', async () => {
    const { definitions } = await buildDefinitions(
      [verbPage('cantar', '# {{forma-a|ca|dormir}}')],
      infinitives,
      { linkBase: '/verb/' },
    );
    expect(definitions.get('cantar')).toBe(
      "<p style='font-weight: 300'>Forma alternativa a <a href='/verb/dormir'>dormir</a></p>",
    );
  });
});
