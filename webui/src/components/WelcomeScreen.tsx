import React, { useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useSettings } from '../contexts/SettingsContext';
import { useWorkbench } from '../contexts/WorkbenchContext';
import './WelcomeScreen.css';

const WelcomeScreen: React.FC = () => {
  const { newFile } = useEditorManager();
  const { settings, setSetting } = useSettings();
  const { openDialog, switchWorkspace } = useWorkbench();
  const [error, setError] = useState<string | null>(null);

  const handleOpenRecent = async (path: string) => {
    setError(null);
    try {
      await switchWorkspace(path);
    } catch (err) {
      console.error('Failed to open recent workspace:', path, err);
      setError(err instanceof Error ? err.message : 'Unknown error');
    }
  };

  return (
    <div className="welcome-screen">
      <div className="welcome-content">
        <h1 className="welcome-title">Codepane</h1>
        <p className="welcome-subtitle">A lightweight editor for your workspace</p>

        <div className="welcome-columns">
          <section className="welcome-section">
            <h2>Start</h2>
            <button className="welcome-action" onClick={() => newFile()}>
              <span className="welcome-action-icon">📄</span> New File
            </button>
            <button className="welcome-action" onClick={() => openDialog('quick-open')}>
              <span className="welcome-action-icon">🔍</span> Open File...
            </button>
            <button className="welcome-action" onClick={() => openDialog('open-folder')}>
              <span className="welcome-action-icon">📂</span> Open Folder...
            </button>
          </section>

          <section className="welcome-section">
            <h2>Recent</h2>
            {settings.recentWorkspaces.length === 0 ? (
              <div className="welcome-empty">No recent workspaces</div>
            ) : (
              <ul className="recent-list">
                {settings.recentWorkspaces.map(path => (
                  <li key={path}>
                    <button className="recent-item" title={path} onClick={() => handleOpenRecent(path)}>
                      {path}
                    </button>
                  </li>
                ))}
              </ul>
            )}
            {error && (
              <div className="error-message">
                <span className="error-icon">⚠️</span>
                <span className="error-text">{error}</span>
              </div>
            )}
          </section>
        </div>

        <label className="welcome-startup">
          <input
            type="checkbox"
            checked={settings.showWelcomeScreen}
            onChange={(e) => setSetting('showWelcomeScreen', e.target.checked)}
          />
          Show welcome page on startup
        </label>
      </div>
    </div>
  );
};

export default WelcomeScreen;
