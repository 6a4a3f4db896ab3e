/**
 * @file src/parsers/wiki/alternative-form.ts
 * @description Reads the Catalan `{{forma-a|ca|...}}` template, which points a page at the
 *              infinitive it is an alternative spelling of.
 */

// Greedy prefix: with several templates on a line the last one wins.
const ALTERNATIVE_FORM = /.*\{\{forma-a\|ca\|([a-zàéèíóòú·ç]*)\}\}/;

/**
 * Returns the referenced infinitive, or `null` when the line has no Catalan `forma-a` template.
 * Must run on the raw line: template stripping removes the marker.
 *
 * @example
 *   extractAlternativeForm('{{es-verb|t|present=acenso}} {{forma-a|ca|complànyer}}'); // 'complànyer'
 */
export const extractAlternativeForm = (line: string): string | null => {
  const match = ALTERNATIVE_FORM.exec(line);
  return match?.[1] || null;
};
