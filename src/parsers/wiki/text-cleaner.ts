/**
 * @file src/parsers/wiki/text-cleaner.ts
 * @description Line-level markup stripping for Wiktionary definitions: galleries, internal links,
 *              bold/italic quotes and XML tags. Every function returns its input untouched when
 *              the markup it looks for is missing or unterminated.
 */

const GALLERY_OPEN = '<gallery>';
const GALLERY_CLOSE = '</gallery>';
const LINK_OPEN = '[[';
const LINK_CLOSE = ']]';
const LINK_SEPARATOR = '|';
const ITALIC_OPEN = '{I}';
const ITALIC_CLOSE = '{/I}';

/**
 * Drops the first `<gallery>...</gallery>` block. Later blocks are kept.
 */
export const removeGallerySections = (text: string): string => {
  const start = text.indexOf(GALLERY_OPEN);
  if (start < 0) return text;
  const end = text.indexOf(GALLERY_CLOSE, start);
  if (end < 0) return text;
  return text.slice(0, start) + text.slice(end + GALLERY_CLOSE.length);
};

/**
 * Replaces `[[target|label]]` with `label` and `[[target]]` with `target`.
 */
export const removeInternalLinks = (line: string): string => {
  let result = line;
  let start = result.indexOf(LINK_OPEN);
  while (start >= 0) {
    const end = result.indexOf(LINK_CLOSE, start);
    if (end < 0) break;
    const inner = result.slice(start + LINK_OPEN.length, end);
    const label = inner.slice(inner.lastIndexOf(LINK_SEPARATOR) + 1);
    result = result.slice(0, start) + label + result.slice(end + LINK_CLOSE.length);
    start = result.indexOf(LINK_OPEN);
  }
  return result;
};

export const removeWikiEmphasis = (line: string): string =>
  line.replace(/'''/g, '').replace(/''/g, '');

/**
 * Strips XML/HTML tags. A `<ref>` citation is kept as italic text after a space.
 */
export const removeXmlTags = (line: string): string =>
  line
    .replace(/<ref>(.*)<\/ref>/g, ` ${ITALIC_OPEN}$1${ITALIC_CLOSE}`)
    .replace(/<[^>]*>/g, '')
    .replace(/\{I\}/g, '<i>')
    .replace(/\{\/I\}/g, '</i>');
