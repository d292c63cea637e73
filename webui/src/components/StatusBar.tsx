import React from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useSettings } from '../contexts/SettingsContext';
import { getLanguageName } from '../utils/languages';
import './StatusBar.css';

const StatusBar: React.FC = () => {
  const { statusMessage, getActiveBuffer } = useEditorManager();
  const { settings } = useSettings();
  const buffer = getActiveBuffer();

  const indentation = settings.useSpaces ? `Spaces: ${settings.tabSize}` : `Tab Size: ${settings.tabSize}`;

  return (
    <div className="status-bar" role="status">
      <div className="status-message" title={statusMessage}>{statusMessage}</div>
      {buffer && (
        <div className="status-info">
          <span>Ln {buffer.cursor.line}, Col {buffer.cursor.column}</span>
          <span>{getLanguageName(buffer.languageId)}</span>
          <span>{indentation}</span>
          <span>UTF-8</span>
        </div>
      )}
    </div>
  );
};

export default StatusBar;
