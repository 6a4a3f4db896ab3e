/**
 * @file tests/template-handler.test.ts
 * @description Unit tests for nested template stripping.
 */

import { describe, expect, it } from 'vitest';
import { findTemplateSpan, removeTemplates } from '../src/parsers/wiki';

describe('findTemplateSpan', () => {
  it('spans a nested template from the first opening to its balancing close', () => {
    expect(findTemplateSpan('a {{x|{{y}}|z}} b')).toEqual({ start: 2, end: 15 });
  });

  it('returns null when a close comes before any opening', () => {
    expect(findTemplateSpan('a }} b {{c}}')).toBeNull();
  });

  it('returns null when the template never closes', () => {
    expect(findTemplateSpan('a {{b')).toBeNull();
  });
});

describe('removeTemplates', () => {
  it('removes a single template and keeps both surrounding spaces', () => {
    expect(removeTemplates('Això és un {{ca.v.conj.para1|dom}} text')).toBe('Això és un  text');
  });

  it('removes nested templates together with the outer one', () => {
    const line = 'Això és un {{ex-us|ca|Segle {{romanes|XV}} i {{romanes|XVI}}.}} text';
    expect(removeTemplates(line)).toBe('Això és un  text');
  });

  it('removes sibling templates on the same line', () => {
    expect(removeTemplates('{{lb|ca|transitiu}} Fer {{q|antic}} caure.')).toBe(' Fer  caure.');
  });

  it('leaves a line untouched when a close appears first', () => {
    expect(removeTemplates('a }} b {{c}}')).toBe('a }} b {{c}}');
  });

  it('cuts an unbalanced template up to the last close seen', () => {
    expect(removeTemplates('a {{b {{c}} d')).toBe('a  d');
  });

  it('is idempotent', () => {
    const lines = [
      '#{{lb|ca|intransitiu}} Dormir {{q|poc}}.',
      'Text {{a|{{b|{{c}}}}}} final',
      'sense plantilles',
      'a }} b {{c}}',
    ];
    for (const line of lines) {
      const once = removeTemplates(line);
      expect(removeTemplates(once)).toBe(once);
    }
  });
});
