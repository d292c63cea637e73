import React, { createContext, useContext, useState, useCallback, ReactNode } from 'react';
import { useEditorManager } from './EditorManagerContext';
import { useWorkspace } from './WorkspaceContext';

export type WorkbenchDialog = 'quick-open' | 'open-folder' | 'find' | 'replace' | 'about';

export type ConfirmPrompt = (message: string) => boolean;

interface WorkbenchContextValue {
  dialog: WorkbenchDialog | null;
  openDialog: (dialog: WorkbenchDialog) => void;
  closeDialog: () => void;
  // Resolves to false when the user kept their unsaved edits instead.
  switchWorkspace: (path: string) => Promise<boolean>;
}

const WorkbenchContext = createContext<WorkbenchContextValue | null>(null);

export const useWorkbench = () => {
  const context = useContext(WorkbenchContext);
  if (!context) {
    throw new Error('useWorkbench must be used within WorkbenchProvider');
  }
  return context;
};

interface WorkbenchProviderProps {
  children: ReactNode;
  confirm?: ConfirmPrompt;
}

const defaultConfirm: ConfirmPrompt = message => window.confirm(message);

export const WorkbenchProvider: React.FC<WorkbenchProviderProps> = ({ children, confirm = defaultConfirm }) => {
  const { openFolder } = useWorkspace();
  const { getModifiedBuffers, resetEditors, setStatusMessage } = useEditorManager();
  const [dialog, setDialog] = useState<WorkbenchDialog | null>(null);

  const openDialog = useCallback((next: WorkbenchDialog) => {
    setDialog(next);
  }, []);

  const closeDialog = useCallback(() => {
    setDialog(null);
  }, []);

  // Errors from the server propagate to the caller, which shows them.
  const switchWorkspace = useCallback(async (path: string) => {
    const modified = getModifiedBuffers();
    if (modified.length > 0) {
      const names = modified.map(buffer => buffer.title).join(', ');
      if (!confirm(`Discard unsaved changes in ${names}?`)) {
        return false;
      }
    }
    const info = await openFolder(path);
    resetEditors();
    setStatusMessage(`Opened folder ${info.root}`);
    return true;
  }, [confirm, getModifiedBuffers, openFolder, resetEditors, setStatusMessage]);

  const value: WorkbenchContextValue = {
    dialog,
    openDialog,
    closeDialog,
    switchWorkspace
  };

  return (
    <WorkbenchContext.Provider value={value}>
      {children}
    </WorkbenchContext.Provider>
  );
};
