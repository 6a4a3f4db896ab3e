/**
 * @file src/parsers/dump/reader.ts
 * @description Reads a MediaWiki XML export (`pages-meta-current`) into title/wikitext pairs.
 *              The file is streamed and cut into `<page>` spans, each parsed on its own, so a
 *              full-language dump never sits in memory as one string. Entities are decoded, so
 *              `&lt;ref&gt;` reaches the wiki parser as `<ref>`.
 */

import { load } from 'cheerio';
import fs from 'node:fs';
import { assertInputFile, readError } from '../../shared/files';
import type { DumpPage } from '../shared/types';

const PAGE_OPEN = '<page>';
const PAGE_CLOSE = '</page>';
const CHUNK_SIZE = 1 << 20;

export interface ReadDumpOptions {
  /** Bytes read per chunk. */
  chunkSize?: number;
}

/**
 * Accumulates dump text and hands back every complete `<page>...</page>` span. Text between
 * pages (`<siteinfo>`, the root element) is dropped.
 */
export class PageSplitter {
  private buffer = '';
  private inPage = false;

  push(chunk: string): string[] {
    this.buffer += chunk;
    const spans: string[] = [];

    for (;;) {
      if (!this.inPage) {
        const start = this.buffer.indexOf(PAGE_OPEN);
        if (start < 0) {
          // keep a tail long enough to hold an opening tag split across chunks
          this.buffer = this.buffer.slice(-(PAGE_OPEN.length - 1));
          break;
        }
        this.buffer = this.buffer.slice(start);
        this.inPage = true;
      }

      const end = this.buffer.indexOf(PAGE_CLOSE);
      if (end < 0) break;
      spans.push(this.buffer.slice(0, end + PAGE_CLOSE.length));
      this.buffer = this.buffer.slice(end + PAGE_CLOSE.length);
      this.inPage = false;
    }

    return spans;
  }
}

/**
 * Only the last revision is read: `pages-meta-current` exports carry a single revision per page,
 * so the verb marker and the description come from the same text.
 */
export const parsePage = (span: string): DumpPage => {
  const $ = load(span, { xml: true });
  const page = $('page').first();
  return {
    title: page.children('title').first().text(),
    text: page.children('revision').last().children('text').first().text(),
  };
};

export const parseDump = (xml: string): DumpPage[] => new PageSplitter().push(xml).map(parsePage);

async function* readChunks(filePath: string, chunkSize: number): AsyncGenerator<string> {
  const stream = fs.createReadStream(filePath, { encoding: 'utf8', highWaterMark: chunkSize });
  try {
    for await (const chunk of stream) {
      yield String(chunk);
    }
  } catch (error) {
    throw readError('Dump', filePath, error);
  }
}

/**
 * Yields the pages of a dump file in dump order.
 *
 * @example
 *   for await (const page of readDump('data/cawiktionary-latest-pages-meta-current.xml')) {
 *     console.log(page.title);
 *   }
 */
export async function* readDump(
  filePath: string,
  options: ReadDumpOptions = {},
): AsyncGenerator<DumpPage> {
  assertInputFile('Dump', filePath);
  const splitter = new PageSplitter();
  for await (const chunk of readChunks(filePath, options.chunkSize ?? CHUNK_SIZE)) {
    for (const span of splitter.push(chunk)) {
      yield parsePage(span);
    }
  }
}
