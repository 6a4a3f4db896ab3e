import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PageSplitter, parseDump, readDump } from '../src/parsers/dump';
import type { DumpPage } from '../src/parsers/shared/types';

const dump = `<mediawiki xmlns="http://www.mediawiki.org/xml/export-0.10/" xml:lang="ca">
  <siteinfo><sitename>Viccionari</sitename></siteinfo>
  <page>
    <title>abaltir</title>
    <ns>0</ns>
    <revision><id>1</id><text xml:space="preserve">vell</text></revision>
    <revision><id>2</id><text xml:space="preserve">===Verb===
#Endormiscar.&lt;ref&gt;DIEC&lt;/ref&gt;</text></revision>
  </page>
  <page>
    <title>abraçar</title>
    <revision><text xml:space="preserve">{{ca-verb}} Estrènyer entre els braços.</text></revision>
  </page>
</mediawiki>`;

const expectedPages: DumpPage[] = [
  { title: 'abaltir', text: '===Verb===\n#Endormiscar.<ref>DIEC</ref>' },
  { title: 'abraçar', text: '{{ca-verb}} Estrènyer entre els braços.' },
];

const collect = async (pages: AsyncIterable<DumpPage>): Promise<DumpPage[]> => {
  const collected: DumpPage[] = [];
  for await (const page of pages) collected.push(page);
  return collected;
};

describe('parseDump', () => {
  it('reads titles and the text of the last revision with entities decoded', () => {
    expect(parseDump(dump)).toEqual(expectedPages);
  });

  it('returns an empty text for a page without revisions', () => {
    expect(parseDump('<mediawiki><page><title>buit</title></page></mediawiki>')).toEqual([
      { title: 'buit', text: '' },
    ]);
  });
});

describe('PageSplitter', () => {
  it('cuts pages whose tags are split across chunks', () => {
    const splitter = new PageSplitter();
    expect(splitter.push('<mediawiki><pa')).toEqual([]);
    expect(splitter.push('ge><title>a</title></pa')).toEqual([]);
    expect(splitter.push('ge><page><title>b</title></page></mediawiki>')).toEqual([
      '<page><title>a</title></page>',
      '<page><title>b</title></page>',
    ]);
  });
});

describe('readDump', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catverb-dump-'));
    file = path.join(dir, 'dump.xml');
    fs.writeFileSync(file, dump, 'utf8');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails with the missing path', async () => {
    const missing = path.join(dir, 'missing.xml');
    await expect(collect(readDump(missing))).rejects.toThrow(`Dump file not found: ${missing}`);
  });

  it('streams the pages of a dump in order', async () => {
    expect(await collect(readDump(file))).toEqual(expectedPages);
  });

  it('reads a dump split across many small chunks', async () => {
    expect(await collect(readDump(file, { chunkSize: 7 }))).toEqual(expectedPages);
  });
});
