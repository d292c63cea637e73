import React, { useState, useEffect, useRef } from 'react';
import AboutDialog from './components/AboutDialog';
import FileTree from './components/FileTree';
import FindReplaceDialog from './components/FindReplaceDialog';
import MenuBar from './components/MenuBar';
import OpenFolderDialog from './components/OpenFolderDialog';
import QuickOpen from './components/QuickOpen';
import ResizeHandle from './components/ResizeHandle';
import SplitView from './components/SplitView';
import StatusBar from './components/StatusBar';
import UnsavedChangesPrompt from './components/UnsavedChangesPrompt';
import { EditorManagerProvider, useEditorManager } from './contexts/EditorManagerContext';
import { SettingsProvider, useSettings } from './contexts/SettingsContext';
import { ThemeProvider } from './contexts/ThemeContext';
import { WorkbenchProvider, useWorkbench } from './contexts/WorkbenchContext';
import { WorkspaceProvider, useWorkspace } from './contexts/WorkspaceContext';
import { useCommands } from './hooks/useCommands';
import { editorRegistry } from './services/editorRegistry';
import { commandForKey } from './utils/shortcuts';
import './App.css';

const MIN_SIDEBAR_WIDTH = 160;
const MAX_SIDEBAR_WIDTH = 600;

/** The main window: menus, explorer, editor groups, status bar and dialogs. */
export const Workbench: React.FC = () => {
  const { settings, store } = useSettings();
  const { workspace, loadWorkspace, openFolder } = useWorkspace();
  const { layout, activeGroupId, pendingClose, restoreOpenFiles, setStatusMessage } = useEditorManager();
  const { dialog, closeDialog } = useWorkbench();
  const { runCommand } = useCommands();
  const [sidebarWidth, setSidebarWidth] = useState(260);
  const startedRef = useRef(false);

  // Start-up: reopen the last workspace if it is still there, then the files that were open in it
  useEffect(() => {
    if (startedRef.current) return;
    startedRef.current = true;

    const start = async () => {
      const last = store.get('lastWorkspace');
      if (last) {
        try {
          await openFolder(last, { remember: false });
        } catch (error) {
          console.warn('Last workspace is no longer available:', last, error);
          // Its open files are relative to a root we are no longer in
          store.set('openFiles', []);
          await loadWorkspace();
        }
      } else {
        await loadWorkspace();
      }
      await restoreOpenFiles();
    };

    start().catch(error => {
      console.error('Failed to load workspace:', error);
      setStatusMessage(error instanceof Error ? error.message : 'Failed to load workspace');
    });
  }, [loadWorkspace, openFolder, restoreOpenFiles, setStatusMessage, store]);

  useEffect(() => {
    document.title = workspace ? `Codepane - ${workspace.root}` : 'Codepane';
  }, [workspace]);

  // Window shortcuts run before the focused editor sees the key
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (pendingClose) return;
      const command = commandForKey(e);
      if (!command) return;
      e.preventDefault();
      e.stopPropagation();
      runCommand(command);
    };
    window.addEventListener('keydown', handleKeyDown, true);
    return () => window.removeEventListener('keydown', handleKeyDown, true);
  }, [pendingClose, runCommand]);

  const handleSidebarResize = (delta: number) => {
    setSidebarWidth(prev => Math.min(MAX_SIDEBAR_WIDTH, Math.max(MIN_SIDEBAR_WIDTH, prev + delta)));
  };

  return (
    <div className="app">
      <MenuBar />

      <div className="app-body">
        {settings.showExplorer && (
          <>
            <aside className="sidebar" style={{ width: sidebarWidth }}>
              <FileTree />
            </aside>
            <ResizeHandle orientation="horizontal" onResize={handleSidebarResize} />
          </>
        )}
        <main className="editor-area">
          <SplitView node={layout} />
        </main>
      </div>

      {settings.showStatusBar && <StatusBar />}

      {dialog === 'quick-open' && <QuickOpen onClose={closeDialog} />}
      {dialog === 'open-folder' && <OpenFolderDialog onClose={closeDialog} />}
      {(dialog === 'find' || dialog === 'replace') && (
        <FindReplaceDialog
          key={dialog}
          mode={dialog}
          getView={() => editorRegistry.getView(activeGroupId)}
          onClose={closeDialog}
        />
      )}
      {dialog === 'about' && <AboutDialog onClose={closeDialog} />}
      <UnsavedChangesPrompt />
    </div>
  );
};

const App: React.FC = () => (
  <SettingsProvider>
    <ThemeProvider>
      <WorkspaceProvider>
        <EditorManagerProvider>
          <WorkbenchProvider>
            <Workbench />
          </WorkbenchProvider>
        </EditorManagerProvider>
      </WorkspaceProvider>
    </ThemeProvider>
  </SettingsProvider>
);

export default App;
