import React, { useState } from 'react';
import { EditorView } from '@codemirror/view';
import {
  DEFAULT_SEARCH_OPTIONS,
  SearchOptions,
  countMatches,
  findInEditor,
  isSearchValid,
  replaceAllInEditor,
  replaceInEditor
} from '../utils/search';
import Dialog from './Dialog';
import './FindReplaceDialog.css';

interface FindReplaceDialogProps {
  mode: 'find' | 'replace';
  getView: () => EditorView | undefined;
  onClose: () => void;
}

const plural = (count: number, word: string) => `${count} ${word}${count === 1 ? '' : 'es'}`;

// Seeds the query from a one-line selection
const selectedQuery = (view: EditorView | undefined): string => {
  if (!view) return '';
  const { from, to } = view.state.selection.main;
  const text = view.state.sliceDoc(from, to);
  return text.includes('\n') ? '' : text;
};

const FindReplaceDialog: React.FC<FindReplaceDialogProps> = ({ mode, getView, onClose }) => {
  const [options, setOptions] = useState<SearchOptions>(() => ({
    ...DEFAULT_SEARCH_OPTIONS,
    query: selectedQuery(getView())
  }));
  const [showReplace, setShowReplace] = useState(mode === 'replace');
  const [status, setStatus] = useState('');

  const update = <K extends keyof SearchOptions>(key: K, value: SearchOptions[K]) => {
    setOptions(prev => ({ ...prev, [key]: value }));
    setStatus('');
  };

  // Resolves the target editor, or reports why there is none
  const withEditor = (action: (view: EditorView) => void) => {
    const view = getView();
    if (!view) {
      setStatus('No active editor');
      return;
    }
    if (!isSearchValid(options)) {
      setStatus(options.query ? 'Invalid regular expression' : '');
      return;
    }
    action(view);
  };

  const handleFind = () => withEditor(view => {
    if (!findInEditor(view, options)) {
      setStatus('No matches');
      return;
    }
    setStatus(plural(countMatches(view.state.doc.toString(), options), 'match'));
  });

  const handleReplace = () => withEditor(view => {
    if (!replaceInEditor(view, options)) {
      setStatus('No matches');
      return;
    }
    const remaining = countMatches(view.state.doc.toString(), options);
    setStatus(remaining === 0 ? 'No more matches' : plural(remaining, 'match'));
  });

  const handleReplaceAll = () => withEditor(view => {
    const count = replaceAllInEditor(view, options);
    setStatus(count === 0 ? 'No matches' : `Replaced ${count} occurrence${count === 1 ? '' : 's'}`);
  });

  const handleQueryKeyDown = (e: React.KeyboardEvent) => {
    if (e.key === 'Enter') {
      e.preventDefault();
      handleFind();
    }
  };

  return (
    <Dialog title={showReplace ? 'Find and Replace' : 'Find'} onClose={onClose} modal={false} className="find-replace">
      <div className="dialog-body">
        <input
          type="text"
          aria-label="Search for"
          placeholder="Find"
          value={options.query}
          onChange={(e) => update('query', e.target.value)}
          onKeyDown={handleQueryKeyDown}
          autoFocus
        />
        {showReplace && (
          <input
            type="text"
            aria-label="Replace with"
            placeholder="Replace"
            value={options.replacement}
            onChange={(e) => update('replacement', e.target.value)}
          />
        )}

        <div className="find-options">
          <label>
            <input
              type="checkbox"
              checked={options.caseSensitive}
              onChange={(e) => update('caseSensitive', e.target.checked)}
            />
            Match case
          </label>
          <label>
            <input
              type="checkbox"
              checked={options.wholeWord}
              onChange={(e) => update('wholeWord', e.target.checked)}
            />
            Whole word
          </label>
          <label>
            <input
              type="checkbox"
              checked={options.regexp}
              onChange={(e) => update('regexp', e.target.checked)}
            />
            Regular expression
          </label>
          <label>
            <input
              type="checkbox"
              checked={options.direction === 'backward'}
              onChange={(e) => update('direction', e.target.checked ? 'backward' : 'forward')}
            />
            Search backward
          </label>
        </div>

        <div className="dialog-status" role="status">{status}</div>

        <div className="dialog-actions">
          {!showReplace && (
            <button className="dialog-button" onClick={() => setShowReplace(true)}>
              Replace...
            </button>
          )}
          {showReplace && (
            <>
              <button className="dialog-button" onClick={handleReplace}>Replace</button>
              <button className="dialog-button" onClick={handleReplaceAll}>Replace All</button>
            </>
          )}
          <button className="dialog-button primary" onClick={handleFind}>Find</button>
        </div>
      </div>
    </Dialog>
  );
};

export default FindReplaceDialog;
