/**
 * @file src/parsers/wiki/list-converter.ts
 * @description Turns wikitext list markers into HTML one line at a time. `#` lines become
 *              `<ol><li>` items and `#:` lines become `<dl><dd>` descriptions; which lists are
 *              open is carried from line to line in a {@link ListState}.
 */

const ORDERED_MARKER = '#';
const DESCRIPTION_MARKER = '#:';

export interface ListState {
  listOpen: boolean;
  descriptionListOpen: boolean;
}

export interface ConvertedLine {
  html: string;
  state: ListState;
}

interface ListStep {
  html: string;
  open: boolean;
}

export const createListState = (): ListState => ({ listOpen: false, descriptionListOpen: false });

const isOrderedItem = (trimmed: string): boolean =>
  trimmed.startsWith(ORDERED_MARKER) && !trimmed.startsWith(DESCRIPTION_MARKER);

/**
 * A bare `#` cancels the list instead of opening an empty item. No `</ol>` is emitted for it, so
 * an item after it opens a second `<ol>`. Description lines (`#:`) keep an ordered list open so
 * quotes can sit between its items.
 */
export const convertOrderedList = (line: string, listOpen: boolean): ListStep => {
  const trimmed = line.trim();
  if (isOrderedItem(trimmed)) {
    const text = trimmed.slice(ORDERED_MARKER.length).trim();
    if (!text.length) {
      return { html: '', open: false };
    }
    return { html: `${listOpen ? '' : '<ol>'}<li>${text}</li>`, open: true };
  }
  if (listOpen && !trimmed.startsWith(DESCRIPTION_MARKER)) {
    return { html: `</ol>${line}`, open: false };
  }
  return { html: line, open: listOpen };
};

/**
 * Any line that is not a `#:` description closes an open description list, ordered items
 * included.
 */
export const convertDescriptionList = (line: string, descriptionListOpen: boolean): ListStep => {
  const trimmed = line.trim();
  if (trimmed.startsWith(DESCRIPTION_MARKER)) {
    const text = trimmed.slice(DESCRIPTION_MARKER.length).trim();
    if (!text.length) {
      return { html: '', open: false };
    }
    return { html: `${descriptionListOpen ? '' : '<dl>'}<dd>${text}</dd>`, open: true };
  }
  if (descriptionListOpen) {
    return { html: `</dl>${line}`, open: false };
  }
  return { html: line, open: false };
};

export const convertListLine = (line: string, state: ListState): ConvertedLine => {
  const ordered = convertOrderedList(line, state.listOpen);
  const description = convertDescriptionList(ordered.html, state.descriptionListOpen);
  return {
    html: description.html,
    state: { listOpen: ordered.open, descriptionListOpen: description.open },
  };
};
