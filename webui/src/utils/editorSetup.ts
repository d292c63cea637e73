import { autocompletion, closeBrackets, closeBracketsKeymap, completionKeymap } from '@codemirror/autocomplete';
import { defaultKeymap, history, historyKeymap, indentWithTab, redo, selectAll, undo } from '@codemirror/commands';
import { bracketMatching, indentOnInput, indentUnit } from '@codemirror/language';
import { highlightSelectionMatches, search } from '@codemirror/search';
import { Compartment, EditorState, Extension, StateEffect } from '@codemirror/state';
import {
  EditorView,
  drawSelection,
  highlightActiveLine,
  highlightActiveLineGutter,
  keymap,
  lineNumbers
} from '@codemirror/view';

import { CursorPosition } from '../types/editor';
import { getLanguageSupport } from './languages';
import { ThemeName, editorThemeExtension } from './themes';

export interface EditorConfig {
  theme: ThemeName;
  fileName: string;
  showLineNumbers: boolean;
  wordWrap: boolean;
  tabSize: number;
  useSpaces: boolean;
  fontFamily: string;
  fontSize: number;
}

// Shared by every editor state so a config change is a reconfigure, not a rebuild.
const themeCompartment = new Compartment();
const languageCompartment = new Compartment();
const lineNumbersCompartment = new Compartment();
const wrapCompartment = new Compartment();
const indentCompartment = new Compartment();
const fontCompartment = new Compartment();
// Per buffer, so it stays out of `configurable`.
const lineSeparatorCompartment = new Compartment();

export type LineSeparator = '\r\n' | '\r' | '\n';

/** The separator of the first line break in `text`; `\n` when there is none. */
export const detectLineSeparator = (text: string): LineSeparator => {
  const match = /\r\n?|\n/.exec(text);
  if (!match) return '\n';
  return match[0] === '\r\n' ? '\r\n' : match[0] === '\r' ? '\r' : '\n';
};

const lineSeparator = (text: string): Extension => EditorState.lineSeparator.of(detectLineSeparator(text));

/** Reconfigures the line separator to the one `text` uses. Dispatch before replacing the document with `text`. */
export const lineSeparatorEffect = (text: string): StateEffect<unknown> =>
  lineSeparatorCompartment.reconfigure(lineSeparator(text));

/** The document with its own line separators, as it would be written to disk. */
export const documentText = (state: EditorState): string => state.sliceDoc();

const fontTheme = (fontFamily: string, fontSize: number): Extension =>
  EditorView.theme({
    '&': {
      height: '100%',
      fontSize: `${fontSize}px`
    },
    '.cm-scroller': {
      fontFamily: `'${fontFamily}', 'Menlo', 'Fira Code', monospace`
    },
    '&.cm-focused': {
      outline: 'none'
    }
  });

const indentation = (tabSize: number, useSpaces: boolean): Extension => [
  EditorState.tabSize.of(tabSize),
  indentUnit.of(useSpaces ? ' '.repeat(tabSize) : '\t')
];

const configurable = (config: EditorConfig): Array<[Compartment, Extension]> => [
  [themeCompartment, editorThemeExtension(config.theme)],
  [languageCompartment, getLanguageSupport(config.fileName)],
  [lineNumbersCompartment, config.showLineNumbers ? [lineNumbers(), highlightActiveLineGutter()] : []],
  [wrapCompartment, config.wordWrap ? EditorView.lineWrapping : []],
  [indentCompartment, indentation(config.tabSize, config.useSpaces)],
  [fontCompartment, fontTheme(config.fontFamily, config.fontSize)]
];

export const buildEditorState = (doc: string, config: EditorConfig): EditorState =>
  EditorState.create({
    doc,
    extensions: [
      history(),
      drawSelection(),
      highlightActiveLine(),
      indentOnInput(),
      bracketMatching(),
      closeBrackets(),
      autocompletion(),
      highlightSelectionMatches(),
      search(),
      keymap.of([...closeBracketsKeymap, ...defaultKeymap, ...historyKeymap, ...completionKeymap, indentWithTab]),
      lineSeparatorCompartment.of(lineSeparator(doc)),
      ...configurable(config).map(([compartment, extension]) => compartment.of(extension))
    ]
  });

/** Effects that bring any editor state in line with `config`. */
export const reconfigureEffects = (config: EditorConfig): StateEffect<unknown>[] =>
  configurable(config).map(([compartment, extension]) => compartment.reconfigure(extension));

export const cursorPosition = (state: EditorState): CursorPosition => {
  const head = state.selection.main.head;
  const line = state.doc.lineAt(head);
  return { line: line.number, column: head - line.from + 1 };
};

/** Moves the cursor to the start of a 1-based line, clamped to the document. */
export const goToLine = (view: EditorView, lineNumber: number): void => {
  const doc = view.state.doc;
  const line = doc.line(Math.min(Math.max(Math.floor(lineNumber), 1), doc.lines));
  view.dispatch({
    selection: { anchor: line.from },
    scrollIntoView: true
  });
  view.focus();
};

export type EditCommand = 'undo' | 'redo' | 'cut' | 'copy' | 'paste' | 'selectAll';

const selectedText = (view: EditorView): string =>
  view.state.selection.ranges.map(range => view.state.sliceDoc(range.from, range.to)).join(view.state.lineBreak);

export const runEditCommand = async (view: EditorView, command: EditCommand): Promise<boolean> => {
  switch (command) {
    case 'undo':
      return undo(view);
    case 'redo':
      return redo(view);
    case 'selectAll':
      return selectAll(view);
    case 'copy':
    case 'cut': {
      const text = selectedText(view);
      if (!text) return false;
      await navigator.clipboard.writeText(text);
      if (command === 'cut') {
        view.dispatch(view.state.replaceSelection(''), { userEvent: 'delete.cut' });
      }
      return true;
    }
    case 'paste': {
      const text = await navigator.clipboard.readText();
      view.dispatch(view.state.replaceSelection(text), { userEvent: 'input.paste' });
      return true;
    }
  }
};
