import { describe, expect, it } from 'vitest';
import { EditorState } from '@codemirror/state';
import { EditorView } from '@codemirror/view';
import { history, undo } from '@codemirror/commands';
import { search } from '@codemirror/search';

import {
  DEFAULT_SEARCH_OPTIONS,
  SearchOptions,
  countMatches,
  findMatch,
  isSearchValid,
  replaceAllInEditor,
  replaceAllInText,
  toSearchQuery
} from './search';

const options = (overrides: Partial<SearchOptions>): SearchOptions => ({ ...DEFAULT_SEARCH_OPTIONS, ...overrides });

const SAMPLE = 'foo bar Foo foobar\nfoo';

describe('search', () => {
  it('builds CodeMirror queries from the dialog options', () => {
    const plain = toSearchQuery(options({ query: 'a.b', caseSensitive: true }));
    expect(plain.search).toBe('a.b');
    expect(plain.caseSensitive).toBe(true);
    expect(plain.literal).toBe(true);
    expect(plain.regexp).toBe(false);

    const pattern = toSearchQuery(options({ query: '\\d+', regexp: true, replacement: '#' }));
    expect(pattern.regexp).toBe(true);
    expect(pattern.literal).toBe(false);
    expect(pattern.replace).toBe('#');
  });

  it('treats empty queries and broken patterns as invalid', () => {
    expect(isSearchValid(options({ query: '' }))).toBe(false);
    expect(isSearchValid(options({ query: '(', regexp: true }))).toBe(false);
    expect(isSearchValid(options({ query: '(' }))).toBe(true);
    expect(countMatches(SAMPLE, options({ query: '(', regexp: true }))).toBe(0);
  });

  it('counts matches with case and whole word options', () => {
    expect(countMatches(SAMPLE, options({ query: 'foo' }))).toBe(4);
    expect(countMatches(SAMPLE, options({ query: 'foo', caseSensitive: true }))).toBe(3);
    expect(countMatches(SAMPLE, options({ query: 'foo', wholeWord: true }))).toBe(3);
  });

  it('finds the next match and wraps at the end', () => {
    const forward = options({ query: 'foo' });
    expect(findMatch(SAMPLE, forward, 1)).toEqual({ from: 8, to: 11 });
    expect(findMatch(SAMPLE, forward, 20)).toEqual({ from: 0, to: 3 });
  });

  it('finds the previous match and wraps at the start', () => {
    const backward = options({ query: 'foo', direction: 'backward' });
    expect(findMatch(SAMPLE, backward, 8)).toEqual({ from: 0, to: 3 });
    expect(findMatch(SAMPLE, backward, 2)).toEqual({ from: 19, to: 22 });
    expect(findMatch(SAMPLE, options({ query: 'zzz' }), 0)).toBeNull();
  });

  it('replaces plain text literally', () => {
    expect(replaceAllInText('a.b axb a.b', options({ query: 'a.b', replacement: 'x' }))).toEqual({
      text: 'x axb x',
      count: 2
    });
  });

  it('expands groups in regular expression replacements', () => {
    const swapped = replaceAllInText(
      'John Smith, Jane Doe',
      options({ query: '(\\w+) (\\w+)', replacement: '$2 $1', regexp: true })
    );
    expect(swapped).toEqual({ text: 'Smith John, Doe Jane', count: 2 });

    expect(replaceAllInText('foo', options({ query: 'o', replacement: '$&!', regexp: true }))).toEqual({
      text: 'fo!o!',
      count: 2
    });
  });

  it('replaces every match in the editor as one undoable change', () => {
    const view = new EditorView({
      state: EditorState.create({ doc: 'let a = 1;\nlet b = a;', extensions: [history(), search()] })
    });

    const count = replaceAllInEditor(view, options({ query: 'a', replacement: 'value', wholeWord: true }));

    expect(count).toBe(2);
    expect(view.state.doc.toString()).toBe('let value = 1;\nlet b = value;');

    undo(view);
    expect(view.state.doc.toString()).toBe('let a = 1;\nlet b = a;');

    expect(replaceAllInEditor(view, options({ query: '' }))).toBe(0);
    view.destroy();
  });
});
