import { Text } from '@codemirror/state';
import { EditorView } from '@codemirror/view';
import {
  SearchQuery,
  findNext,
  findPrevious,
  replaceAll,
  replaceNext,
  setSearchQuery
} from '@codemirror/search';

export type SearchDirection = 'forward' | 'backward';

export interface SearchOptions {
  query: string;
  replacement: string;
  caseSensitive: boolean;
  wholeWord: boolean;
  regexp: boolean;
  direction: SearchDirection;
}

export interface SearchMatch {
  from: number;
  to: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  query: '',
  replacement: '',
  caseSensitive: false,
  wholeWord: false,
  regexp: false,
  direction: 'forward'
};

export const toSearchQuery = (options: SearchOptions): SearchQuery =>
  new SearchQuery({
    search: options.query,
    replace: options.replacement,
    caseSensitive: options.caseSensitive,
    wholeWord: options.wholeWord,
    regexp: options.regexp,
    literal: !options.regexp
  });

export const isSearchValid = (options: SearchOptions): boolean =>
  options.query.length > 0 && toSearchQuery(options).valid;

const toDoc = (text: string): Text => Text.of(text.split('\n'));

export const findAllMatches = (text: string, options: SearchOptions): SearchMatch[] => {
  if (!isSearchValid(options)) return [];
  const cursor = toSearchQuery(options).getCursor(toDoc(text));
  const matches: SearchMatch[] = [];
  for (let step = cursor.next(); !step.done; step = cursor.next()) {
    matches.push({ from: step.value.from, to: step.value.to });
  }
  return matches;
};

export const countMatches = (text: string, options: SearchOptions): number => findAllMatches(text, options).length;

/**
 * Next match at or after `from` (forward) or the last one ending at or before
 * `from` (backward). Wraps around the document.
 */
export const findMatch = (text: string, options: SearchOptions, from: number): SearchMatch | null => {
  const matches = findAllMatches(text, options);
  if (matches.length === 0) return null;

  if (options.direction === 'backward') {
    const before = matches.filter(match => match.to <= from);
    return before.length > 0 ? before[before.length - 1] : matches[matches.length - 1];
  }
  return matches.find(match => match.from >= from) ?? matches[0];
};

const expandReplacement = (replacement: string, match: RegExpExecArray): string =>
  replacement.replace(/\$(\$|&|\d{1,2}|<([^>]+)>)/g, (token: string, ref: string, name: string | undefined) => {
    if (ref === '$') return '$';
    if (ref === '&') return match[0];
    if (name !== undefined) return match.groups?.[name] ?? '';
    const group = Number(ref);
    return group > 0 && group < match.length ? match[group] ?? '' : token;
  });

export const replaceAllInText = (text: string, options: SearchOptions): { text: string; count: number } => {
  const matches = findAllMatches(text, options);
  if (matches.length === 0) return { text, count: 0 };

  const pattern = options.regexp
    ? new RegExp(options.query, `ymu${options.caseSensitive ? '' : 'i'}`)
    : null;

  let result = '';
  let last = 0;
  for (const match of matches) {
    let insert = options.replacement;
    if (pattern) {
      pattern.lastIndex = match.from;
      const exec = pattern.exec(text);
      if (exec) insert = expandReplacement(options.replacement, exec);
    }
    result += text.slice(last, match.from) + insert;
    last = match.to;
  }
  return { text: result + text.slice(last), count: matches.length };
};

// Editor commands. The query is checked first: CodeMirror opens its own
// panel when asked to search with an invalid query.

const applyQuery = (view: EditorView, options: SearchOptions): boolean => {
  if (!isSearchValid(options)) return false;
  view.dispatch({ effects: setSearchQuery.of(toSearchQuery(options)) });
  return true;
};

export const findInEditor = (view: EditorView, options: SearchOptions): boolean => {
  if (!applyQuery(view, options)) return false;
  if (countMatches(view.state.doc.toString(), options) === 0) return false;
  return options.direction === 'backward' ? findPrevious(view) : findNext(view);
};

export const replaceInEditor = (view: EditorView, options: SearchOptions): boolean => {
  if (!applyQuery(view, options)) return false;
  if (countMatches(view.state.doc.toString(), options) === 0) return false;
  return replaceNext(view);
};

/** Replaces every match in one undoable transaction and returns the count. */
export const replaceAllInEditor = (view: EditorView, options: SearchOptions): number => {
  if (!applyQuery(view, options)) return 0;
  const count = countMatches(view.state.doc.toString(), options);
  if (count > 0) replaceAll(view);
  return count;
};
