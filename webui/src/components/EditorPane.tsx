import React, { useEffect, useMemo, useRef } from 'react';
import { Transaction } from '@codemirror/state';
import { EditorView } from '@codemirror/view';

import { useEditorManager } from '../contexts/EditorManagerContext';
import { useSettings } from '../contexts/SettingsContext';
import { useTheme } from '../contexts/ThemeContext';
import { editorRegistry } from '../services/editorRegistry';
import { EditorBuffer } from '../types/editor';
import {
  EditorConfig,
  buildEditorState,
  cursorPosition,
  documentText,
  goToLine,
  lineSeparatorEffect,
  reconfigureEffects
} from '../utils/editorSetup';
import EditorToolbar from './EditorToolbar';
import './EditorPane.css';

interface EditorPaneProps {
  groupId: string;
  buffer: EditorBuffer;
}

/**
 * One CodeMirror view per group. Switching tabs swaps the view's state for
 * the buffer's cached state, so each buffer keeps its own undo history.
 */
const EditorPane: React.FC<EditorPaneProps> = ({ groupId, buffer }) => {
  const editorRef = useRef<HTMLDivElement>(null);
  const viewRef = useRef<EditorView | null>(null);
  const bufferIdRef = useRef(buffer.id);

  const { buffers, updateContent, updateCursor, focusGroup } = useEditorManager();
  const { settings } = useSettings();
  const { theme } = useTheme();

  const config = useMemo<EditorConfig>(() => ({
    theme,
    fileName: buffer.title,
    showLineNumbers: settings.showLineNumbers,
    wordWrap: settings.wordWrap,
    tabSize: settings.tabSize,
    useSpaces: settings.useSpaces,
    fontFamily: settings.fontFamily,
    fontSize: settings.fontSize
  }), [
    theme,
    buffer.title,
    settings.showLineNumbers,
    settings.wordWrap,
    settings.tabSize,
    settings.useSpaces,
    settings.fontFamily,
    settings.fontSize
  ]);

  // The view outlives renders; it reads these through refs.
  const configRef = useRef(config);
  configRef.current = config;
  const buffersRef = useRef(buffers);
  buffersRef.current = buffers;
  const callbacksRef = useRef({ updateContent, updateCursor });
  callbacksRef.current = { updateContent, updateCursor };

  // Create the view
  useEffect(() => {
    if (!editorRef.current) return;

    const view = new EditorView({
      parent: editorRef.current,
      state: editorRegistry.takeState(bufferIdRef.current) ?? buildEditorState(buffer.content, configRef.current),
      dispatchTransactions: (transactions, target) => {
        target.update(transactions);
        const id = bufferIdRef.current;
        const { updateContent: onContent, updateCursor: onCursor } = callbacksRef.current;
        if (transactions.some(tr => tr.docChanged)) {
          onContent(id, documentText(target.state));
        }
        if (transactions.some(tr => tr.docChanged || tr.selection)) {
          onCursor(id, cursorPosition(target.state));
        }
      }
    });
    view.dispatch({ effects: reconfigureEffects(configRef.current) });
    viewRef.current = view;
    editorRegistry.registerView(groupId, view);

    return () => {
      if (buffersRef.current.has(bufferIdRef.current)) {
        editorRegistry.saveState(bufferIdRef.current, view.state);
      }
      editorRegistry.unregisterView(groupId, view);
      view.destroy();
      viewRef.current = null;
    };
    // buffer.content only seeds a brand-new view
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [groupId]);

  // Swap in the state of the newly active buffer
  useEffect(() => {
    const view = viewRef.current;
    if (!view || bufferIdRef.current === buffer.id) return;

    const previous = bufferIdRef.current;
    if (buffersRef.current.has(previous)) {
      editorRegistry.saveState(previous, view.state);
    }
    bufferIdRef.current = buffer.id;
    view.setState(editorRegistry.takeState(buffer.id) ?? buildEditorState(buffer.content, configRef.current));
    // Cached states may predate a settings change
    view.dispatch({ effects: reconfigureEffects(configRef.current) });
    callbacksRef.current.updateCursor(buffer.id, cursorPosition(view.state));
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [buffer.id]);

  // Content that arrives from the server replaces the document outside the undo history
  useEffect(() => {
    const view = viewRef.current;
    if (!view || buffer.isLoading || bufferIdRef.current !== buffer.id) return;
    if (documentText(view.state) === buffer.content) return;
    // The separator must be in place before the text is split into lines
    view.dispatch({ effects: lineSeparatorEffect(buffer.content) });
    view.dispatch({
      changes: { from: 0, to: view.state.doc.length, insert: buffer.content },
      annotations: Transaction.addToHistory.of(false)
    });
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [buffer.id, buffer.isLoading]);

  useEffect(() => {
    viewRef.current?.dispatch({ effects: reconfigureEffects(config) });
  }, [config]);

  const handleGoToLine = (line: number) => {
    if (viewRef.current) {
      goToLine(viewRef.current, line);
    }
  };

  return (
    <div className="editor-pane" data-theme={theme} onFocusCapture={() => focusGroup(groupId)}>
      <EditorToolbar groupId={groupId} onGoToLine={handleGoToLine} />

      {buffer.isLoading && (
        <div className="loading-indicator">
          <div className="spinner">⚡</div>
          <span>Loading file...</span>
        </div>
      )}

      {buffer.error && (
        <div className="error-message">
          <span className="error-icon">⚠️</span>
          <span className="error-text">{buffer.error}</span>
        </div>
      )}

      <div className="pane-content">
        <div ref={editorRef} className="editor" />
      </div>
    </div>
  );
};

export default EditorPane;
