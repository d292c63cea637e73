import { EditorState } from '@codemirror/state';
import { EditorView } from '@codemirror/view';
import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  EditorConfig,
  buildEditorState,
  cursorPosition,
  detectLineSeparator,
  documentText,
  goToLine,
  reconfigureEffects,
  runEditCommand
} from './editorSetup';

const config: EditorConfig = {
  theme: 'dark',
  fileName: 'main.py',
  showLineNumbers: true,
  wordWrap: false,
  tabSize: 4,
  useSpaces: true,
  fontFamily: 'Consolas',
  fontSize: 12
};

const views: EditorView[] = [];

const createView = (doc: string) => {
  const view = new EditorView({ state: buildEditorState(doc, config), parent: document.body });
  views.push(view);
  return view;
};

describe('editor setup', () => {
  afterEach(() => {
    views.splice(0).forEach(view => view.destroy());
  });

  it('reports the cursor as 1-based line and column', () => {
    const state = EditorState.create({ doc: 'ab\ncdef', selection: { anchor: 5 } });

    expect(cursorPosition(state)).toEqual({ line: 2, column: 3 });
  });

  it('jumps to a line and clamps out-of-range numbers', () => {
    const view = createView('one\ntwo\nthree');

    goToLine(view, 2);
    expect(view.state.selection.main.head).toBe(4);

    goToLine(view, 99);
    expect(view.state.selection.main.head).toBe(8);

    goToLine(view, 0);
    expect(view.state.selection.main.head).toBe(0);
  });

  it('applies indentation changes through reconfiguration', () => {
    const view = createView('x');

    view.dispatch({ effects: reconfigureEffects({ ...config, tabSize: 2, useSpaces: false }) });

    expect(view.state.tabSize).toBe(2);
  });

  it('undoes and redoes an edit', async () => {
    const view = createView('hello');
    view.dispatch({ changes: { from: 5, insert: ' world' } });

    await runEditCommand(view, 'undo');
    expect(view.state.doc.toString()).toBe('hello');

    await runEditCommand(view, 'redo');
    expect(view.state.doc.toString()).toBe('hello world');
  });

  it('cuts the selection to the clipboard', async () => {
    const writeText = vi.fn(async () => undefined);
    Object.defineProperty(navigator, 'clipboard', { value: { writeText, readText: vi.fn() }, configurable: true });
    const view = createView('keep cut');
    view.dispatch({ selection: { anchor: 4, head: 8 } });

    const done = await runEditCommand(view, 'cut');

    expect(done).toBe(true);
    expect(writeText).toHaveBeenCalledWith(' cut');
    expect(view.state.doc.toString()).toBe('keep');
  });
});

describe('line separators', () => {
  it('uses the first line break of the text', () => {
    expect(detectLineSeparator('a\r\nb\nc')).toBe('\r\n');
    expect(detectLineSeparator('a\rb')).toBe('\r');
    expect(detectLineSeparator('a\nb\r\n')).toBe('\n');
    expect(detectLineSeparator('single line')).toBe('\n');
  });

  it('gives back the document with its own line breaks', () => {
    const state = buildEditorState('one\r\ntwo', config);

    expect(state.doc.lines).toBe(2);
    expect(documentText(state)).toBe('one\r\ntwo');
  });
});
