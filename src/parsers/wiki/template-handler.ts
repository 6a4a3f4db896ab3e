/**
 * @file src/parsers/wiki/template-handler.ts
 * @description Template stripping for Wiktionary wikitext. Templates (`{{...}}`) may nest, so
 *              spans are located with a depth counter rather than a regular expression.
 */

const TEMPLATE_OPEN = '{{';
const TEMPLATE_CLOSE = '}}';

export interface TemplateSpan {
  start: number;
  end: number;
}

/**
 * Finds the first template span of a line, nested templates included.
 *
 * Returns `null` when the line holds no template or when a `}}` shows up before any `{{`.
 * An opening that never balances extends up to the last `}}` seen.
 */
export const findTemplateSpan = (line: string): TemplateSpan | null => {
  let start = -1;
  let end = -1;
  let depth = 0;
  let position = 0;
  let open = line.indexOf(TEMPLATE_OPEN);
  let close = line.indexOf(TEMPLATE_CLOSE);

  while ((open >= 0 || close >= 0) && !(start >= 0 && depth === 0)) {
    if (open >= 0 && (close < 0 || open < close)) {
      if (start < 0) start = open;
      depth += 1;
      position = open + TEMPLATE_OPEN.length;
    } else {
      if (start < 0) return null;
      depth -= 1;
      position = close + TEMPLATE_CLOSE.length;
      end = position;
    }
    open = line.indexOf(TEMPLATE_OPEN, position);
    close = line.indexOf(TEMPLATE_CLOSE, position);
  }

  if (start < 0 || end < 0) return null;
  return { start, end };
};

/**
 * Removes every template from a line, one span at a time, until none is left.
 *
 * @example
 *   removeTemplates('Això és un {{ca.v.conj.para1|dom}} text'); // 'Això és un  text'
 */
export const removeTemplates = (line: string): string => {
  let result = line;
  let span = findTemplateSpan(result);
  while (span) {
    result = result.slice(0, span.start) + result.slice(span.end);
    span = findTemplateSpan(result);
  }
  return result;
};
