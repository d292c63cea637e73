import React, { useEffect, useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useSettings } from '../contexts/SettingsContext';
import { useTheme } from '../contexts/ThemeContext';
import { getGroups } from '../utils/editorLayout';
import './EditorToolbar.css';

export const GOTO_LINE_EVENT = 'editor-goto-line';

/** Opens the go-to-line box of a group's toolbar. */
export const requestGoToLine = (groupId: string) => {
  document.dispatchEvent(new CustomEvent(GOTO_LINE_EVENT, { detail: { groupId } }));
};

interface EditorToolbarProps {
  groupId: string;
  onGoToLine: (line: number) => void;
}

const EditorToolbar: React.FC<EditorToolbarProps> = ({ groupId, onGoToLine }) => {
  const { layout, focusGroup, splitActiveGroup, closeGroup } = useEditorManager();
  const { settings, toggleSetting } = useSettings();
  const { theme, toggleTheme } = useTheme();
  const [showGoToLine, setShowGoToLine] = useState(false);
  const [lineInput, setLineInput] = useState('');

  // Ctrl+G and the Edit menu reach the toolbar through a document event
  useEffect(() => {
    const handler = (e: Event) => {
      if (e instanceof CustomEvent && e.detail?.groupId === groupId) {
        setShowGoToLine(true);
      }
    };
    document.addEventListener(GOTO_LINE_EVENT, handler);
    return () => document.removeEventListener(GOTO_LINE_EVENT, handler);
  }, [groupId]);

  const handleSplit = (direction: 'horizontal' | 'vertical') => {
    focusGroup(groupId);
    splitActiveGroup(direction);
  };

  const closeGoToLine = () => {
    setShowGoToLine(false);
    setLineInput('');
  };

  const handleGoToLineSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    const lineNum = parseInt(lineInput, 10);
    if (!isNaN(lineNum) && lineNum > 0) {
      onGoToLine(lineNum);
      closeGoToLine();
    }
  };

  const canCloseSplit = getGroups(layout).length > 1;

  return (
    <div className="editor-toolbar">
      <div className="toolbar-group">
        <button
          className={`toolbar-button ${settings.showLineNumbers ? 'active' : ''}`}
          onClick={() => toggleSetting('showLineNumbers')}
          title="Toggle line numbers"
        >
          <span className="toolbar-icon">🔢</span>
        </button>

        {showGoToLine ? (
          <form className="go-to-line-form" onSubmit={handleGoToLineSubmit}>
            <input
              type="number"
              className="go-to-line-input"
              placeholder="Line #"
              aria-label="Line number"
              value={lineInput}
              onChange={(e) => setLineInput(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === 'Escape') closeGoToLine();
              }}
              autoFocus
              min="1"
            />
            <button type="button" className="go-to-line-cancel" onClick={closeGoToLine} title="Cancel">
              ✕
            </button>
          </form>
        ) : (
          <button
            className="toolbar-button"
            onClick={() => setShowGoToLine(true)}
            title="Go to line (Ctrl+G)"
          >
            <span className="toolbar-icon">↣</span>
          </button>
        )}
      </div>

      <div className="toolbar-group">
        <button
          className="toolbar-button"
          onClick={() => handleSplit('vertical')}
          title="Split vertically"
        >
          <span className="toolbar-icon">⬌</span>
        </button>
        <button
          className="toolbar-button"
          onClick={() => handleSplit('horizontal')}
          title="Split horizontally"
        >
          <span className="toolbar-icon">⬍</span>
        </button>

        {canCloseSplit && (
          <button
            className="toolbar-button"
            onClick={() => closeGroup(groupId)}
            title="Close split"
          >
            <span className="toolbar-icon">✕</span>
          </button>
        )}

        <button
          className="toolbar-button"
          onClick={toggleTheme}
          title={`Switch to ${theme === 'dark' ? 'light' : 'dark'} theme`}
        >
          <span className="toolbar-icon">{theme === 'dark' ? '☀️' : '🌙'}</span>
        </button>
      </div>
    </div>
  );
};

export default EditorToolbar;
