import React, { createContext, useContext, useState, useCallback, ReactNode } from 'react';
import { FileApi, FileApiClient, WorkspaceInfo } from '../services/fileApi';
import { useSettings } from './SettingsContext';

interface OpenFolderOptions {
  remember?: boolean;
}

interface WorkspaceContextValue {
  fileApi: FileApi;
  workspace: WorkspaceInfo | null;
  // Bumped whenever the explorer should re-read the tree.
  revision: number;
  loadWorkspace: () => Promise<WorkspaceInfo>;
  openFolder: (path: string, options?: OpenFolderOptions) => Promise<WorkspaceInfo>;
  refresh: () => void;
}

const WorkspaceContext = createContext<WorkspaceContextValue | null>(null);

export const useWorkspace = () => {
  const context = useContext(WorkspaceContext);
  if (!context) {
    throw new Error('useWorkspace must be used within WorkspaceProvider');
  }
  return context;
};

interface WorkspaceProviderProps {
  children: ReactNode;
  fileApi?: FileApi;
}

export const WorkspaceProvider: React.FC<WorkspaceProviderProps> = ({ children, fileApi = FileApiClient.getInstance() }) => {
  const { store } = useSettings();
  const [workspace, setWorkspace] = useState<WorkspaceInfo | null>(null);
  const [revision, setRevision] = useState(0);

  const refresh = useCallback(() => {
    setRevision(prev => prev + 1);
  }, []);

  const loadWorkspace = useCallback(async () => {
    const info = await fileApi.getWorkspace();
    setWorkspace(info);
    return info;
  }, [fileApi]);

  const openFolder = useCallback(async (path: string, { remember = true }: OpenFolderOptions = {}) => {
    const trimmed = path.trim();
    const info = await fileApi.openWorkspace(trimmed);
    console.log('Opened workspace:', info.root);
    setWorkspace(info);
    setRevision(prev => prev + 1);
    if (remember) {
      store.addRecentWorkspace(info.root);
    }
    return info;
  }, [fileApi, store]);

  const value: WorkspaceContextValue = {
    fileApi,
    workspace,
    revision,
    loadWorkspace,
    openFolder,
    refresh
  };

  return (
    <WorkspaceContext.Provider value={value}>
      {children}
    </WorkspaceContext.Provider>
  );
};
