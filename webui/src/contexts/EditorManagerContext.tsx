import React, { createContext, useContext, useState, useCallback, useEffect, useRef, ReactNode } from 'react';
import { FileApiError, FileContent } from '../services/fileApi';
import { editorRegistry } from '../services/editorRegistry';
import {
  CursorPosition,
  EditorBuffer,
  FileInfo,
  SplitDirection,
  SplitNode,
  WELCOME_TAB_ID
} from '../types/editor';
import { findGroup, findGroupContaining, firstGroupId } from '../utils/editorLayout';
import {
  EditorManagerState,
  addBuffer,
  addUntitledBuffer,
  createEditorState,
  createFileBuffer,
  findBufferByPath,
  focusGroup as focusGroupState,
  getActiveBuffer as getActiveBufferState,
  getModifiedBuffers as getModifiedBuffersState,
  getOpenFilePaths,
  markLoaded,
  markLoadFailed,
  markSaved,
  mergeGroup,
  relocateTab,
  removeTab,
  resizeGroups,
  selectTab,
  setBufferContent,
  setBufferCursor,
  showTab,
  splitActive
} from '../utils/editorState';
import { fileExtension } from '../utils/languages';
import { baseName } from '../utils/paths';
import { useSettings } from './SettingsContext';
import { useWorkspace } from './WorkspaceContext';

export type CloseChoice = 'save' | 'discard' | 'cancel';

export interface PendingClose {
  groupId: string;
  bufferId: string;
  title: string;
}

export type PathPrompt = (message: string, defaultValue: string) => string | null;

// Files the editor cannot show at all; their tab is closed instead of showing the error.
const REFUSED_CODES = new Set(['binary_file', 'file_too_large', 'is_directory']);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const fileInfoFromContent = (data: FileContent): FileInfo => ({
  name: baseName(data.path),
  path: data.path,
  isDir: false,
  size: data.size,
  modified: data.modified,
  ext: data.ext || fileExtension(data.path)
});

interface EditorManagerContextValue {
  buffers: Map<string, EditorBuffer>;
  layout: SplitNode;
  activeGroupId: string;
  statusMessage: string;
  pendingClose: PendingClose | null;

  // Actions
  setStatusMessage: (message: string) => void;
  openFile: (file: FileInfo, groupId?: string) => Promise<void>;
  newFile: (groupId?: string) => void;
  requestCloseTab: (groupId: string, tabId: string) => void;
  closeActiveTab: () => void;
  resolvePendingClose: (choice: CloseChoice) => Promise<void>;
  closeTab: (groupId: string, tabId: string) => void;
  activateTab: (groupId: string, tabId: string) => void;
  focusGroup: (groupId: string) => void;
  splitActiveGroup: (direction: SplitDirection) => void;
  closeGroup: (groupId?: string) => void;
  moveTab: (fromGroupId: string, toGroupId: string, tabId: string, index?: number) => void;
  resizeSplit: (splitId: string, sizes: number[]) => void;
  updateContent: (bufferId: string, content: string) => void;
  updateCursor: (bufferId: string, cursor: CursorPosition) => void;
  saveBuffer: (bufferId: string) => Promise<boolean>;
  saveBufferAs: (bufferId: string, path: string) => Promise<boolean>;
  saveActiveBuffer: (saveAs?: boolean) => Promise<boolean>;
  saveAllModified: () => Promise<void>;
  getActiveBuffer: () => EditorBuffer | null;
  getModifiedBuffers: () => EditorBuffer[];
  restoreOpenFiles: () => Promise<void>;
  resetEditors: () => void;
  showWelcome: () => void;
}

const EditorManagerContext = createContext<EditorManagerContextValue | null>(null);

export const useEditorManager = () => {
  const context = useContext(EditorManagerContext);
  if (!context) {
    throw new Error('useEditorManager must be used within EditorManagerProvider');
  }
  return context;
};

interface EditorManagerProviderProps {
  children: ReactNode;
  promptForPath?: PathPrompt;
}

const defaultPrompt: PathPrompt = (message, defaultValue) => window.prompt(message, defaultValue);

export const EditorManagerProvider: React.FC<EditorManagerProviderProps> = ({ children, promptForPath = defaultPrompt }) => {
  const { settings, store } = useSettings();
  const { fileApi } = useWorkspace();

  const initialState = useCallback((): EditorManagerState => {
    const state = createEditorState(store.get('editorLayout'));
    if (store.get('showWelcomeScreen') && !store.get('welcomeTabClosed')) {
      return showTab(state, WELCOME_TAB_ID, firstGroupId(state.layout) ?? undefined);
    }
    return state;
  }, [store]);

  const [state, setState] = useState<EditorManagerState>(initialState);
  const [statusMessage, setStatusMessage] = useState('Ready');
  // Modified tabs waiting for an answer; the first one is being prompted
  const [closeQueue, setCloseQueue] = useState<PendingClose[]>([]);
  const pendingClose = closeQueue[0] ?? null;
  const [restored, setRestored] = useState(false);

  // Async actions read buffers through the ref so they see the latest edits.
  const stateRef = useRef(state);
  stateRef.current = state;

  // Forget cached editor states of closed buffers
  useEffect(() => {
    editorRegistry.retainStates(state.buffers);
  }, [state.buffers]);

  // Persist the open files once the previous session has been restored
  useEffect(() => {
    if (!restored) return;
    const paths = getOpenFilePaths(state);
    if (paths.join('\n') !== store.get('openFiles').join('\n')) {
      store.set('openFiles', paths);
    }
  }, [restored, state, store]);

  const openFile = useCallback(async (file: FileInfo, groupId?: string) => {
    const existing = findBufferByPath(stateRef.current, file.path);
    if (existing) {
      setState(prev => showTab(prev, existing.id, groupId));
      return;
    }

    const buffer = createFileBuffer(file);
    setState(prev => addBuffer(prev, buffer, groupId));

    try {
      const data = await fileApi.readFile(file.path);
      setState(prev => markLoaded(prev, buffer.id, data.content));
      setStatusMessage(`Opened ${file.path}`);
    } catch (error) {
      console.error('Failed to open file:', file.path, error);
      const message = errorMessage(error);
      if (error instanceof FileApiError && REFUSED_CODES.has(error.code)) {
        setState(prev => {
          const holder = findGroupContaining(prev.layout, buffer.id);
          return holder ? removeTab(prev, holder.id, buffer.id) : prev;
        });
      } else {
        setState(prev => markLoadFailed(prev, buffer.id, message));
      }
      setStatusMessage(message);
    }
  }, [fileApi]);

  const newFile = useCallback((groupId?: string) => {
    setState(prev => addUntitledBuffer(prev, groupId).state);
  }, []);

  const closeTab = useCallback((groupId: string, tabId: string) => {
    if (tabId === WELCOME_TAB_ID) {
      store.set('welcomeTabClosed', true);
    }
    setState(prev => {
      // The tab may have been dragged elsewhere while a prompt was open.
      const holder = findGroupContaining(prev.layout, tabId);
      return removeTab(prev, holder?.id ?? groupId, tabId);
    });
  }, [store]);

  const requestCloseTab = useCallback((groupId: string, tabId: string) => {
    const buffer = stateRef.current.buffers.get(tabId);
    if (buffer?.isModified) {
      const request = { groupId, bufferId: tabId, title: buffer.title };
      setCloseQueue(prev => (prev.some(item => item.bufferId === tabId) ? prev : [...prev, request]));
      return;
    }
    closeTab(groupId, tabId);
  }, [closeTab]);

  const closeActiveTab = useCallback(() => {
    const current = stateRef.current;
    const group = findGroup(current.layout, current.activeGroupId);
    if (group?.activeTab) {
      requestCloseTab(group.id, group.activeTab);
    }
  }, [requestCloseTab]);

  const activateTab = useCallback((groupId: string, tabId: string) => {
    setState(prev => selectTab(prev, groupId, tabId));
  }, []);

  const focusGroup = useCallback((groupId: string) => {
    setState(prev => focusGroupState(prev, groupId));
  }, []);

  const splitActiveGroup = useCallback((direction: SplitDirection) => {
    setState(prev => splitActive(prev, direction));
  }, []);

  const closeGroup = useCallback((groupId?: string) => {
    setState(prev => mergeGroup(prev, groupId ?? prev.activeGroupId));
  }, []);

  const moveTab = useCallback((fromGroupId: string, toGroupId: string, tabId: string, index?: number) => {
    setState(prev => relocateTab(prev, fromGroupId, toGroupId, tabId, index));
  }, []);

  const resizeSplit = useCallback((splitId: string, sizes: number[]) => {
    setState(prev => resizeGroups(prev, splitId, sizes));
  }, []);

  const updateContent = useCallback((bufferId: string, content: string) => {
    setState(prev => setBufferContent(prev, bufferId, content));
  }, []);

  const updateCursor = useCallback((bufferId: string, cursor: CursorPosition) => {
    setState(prev => setBufferCursor(prev, bufferId, cursor));
  }, []);

  const saveBufferAs = useCallback(async (bufferId: string, path: string) => {
    const buffer = stateRef.current.buffers.get(bufferId);
    const target = path.trim();
    if (!buffer || !target) return false;

    const content = buffer.content;
    try {
      const file = await fileApi.writeFile(target, content);
      setState(prev => {
        let next = prev;
        // Only one buffer may point at a file.
        const other = findBufferByPath(next, file.path);
        if (other && other.id !== bufferId) {
          const holder = findGroupContaining(next.layout, other.id);
          if (holder) next = removeTab(next, holder.id, other.id);
        }
        return markSaved(next, bufferId, content, file);
      });
      setStatusMessage(`Saved ${file.path}`);
      return true;
    } catch (error) {
      console.error('Failed to save buffer as:', target, error);
      setStatusMessage(`Save failed: ${errorMessage(error)}`);
      return false;
    }
  }, [fileApi]);

  const saveBuffer = useCallback(async (bufferId: string) => {
    const buffer = stateRef.current.buffers.get(bufferId);
    if (!buffer) return false;
    if (!buffer.file) {
      const path = promptForPath('Save As', buffer.title);
      return path ? saveBufferAs(bufferId, path) : false;
    }

    const path = buffer.file.path;
    const content = buffer.content;
    try {
      await fileApi.writeFile(path, content);
      setState(prev => markSaved(prev, bufferId, content));
      setStatusMessage(`Saved ${path}`);
      return true;
    } catch (error) {
      console.error('Failed to save buffer:', path, error);
      setStatusMessage(`Save failed: ${errorMessage(error)}`);
      return false;
    }
  }, [fileApi, promptForPath, saveBufferAs]);

  const saveActiveBuffer = useCallback(async (saveAs = false) => {
    const buffer = getActiveBufferState(stateRef.current);
    if (!buffer) return false;
    if (!saveAs) return saveBuffer(buffer.id);
    const path = promptForPath('Save As', buffer.file?.path ?? buffer.title);
    return path ? saveBufferAs(buffer.id, path) : false;
  }, [promptForPath, saveBuffer, saveBufferAs]);

  const saveAllModified = useCallback(async () => {
    const modified = getModifiedBuffersState(stateRef.current).filter(buffer => buffer.file !== null);
    for (const buffer of modified) {
      await saveBuffer(buffer.id);
    }
  }, [saveBuffer]);

  const resolvePendingClose = useCallback(async (choice: CloseChoice) => {
    const pending = pendingClose;
    // Cancel drops the rest of a batch close as well
    setCloseQueue(prev => (choice === 'cancel' ? [] : prev.slice(1)));
    if (!pending || choice === 'cancel') return;
    if (choice === 'save' && !(await saveBuffer(pending.bufferId))) {
      setCloseQueue([]);
      return;
    }
    closeTab(pending.groupId, pending.bufferId);
  }, [pendingClose, saveBuffer, closeTab]);

  const getActiveBuffer = useCallback(() => getActiveBufferState(stateRef.current), []);

  const getModifiedBuffers = useCallback(() => getModifiedBuffersState(stateRef.current), []);

  const restoreOpenFiles = useCallback(async () => {
    for (const path of store.get('openFiles')) {
      try {
        const data = await fileApi.readFile(path);
        const buffer = createFileBuffer(fileInfoFromContent(data));
        setState(prev => markLoaded(addBuffer(prev, buffer), buffer.id, data.content));
      } catch (error) {
        console.warn('Skipping file that could not be reopened:', path, error);
      }
    }
    setRestored(true);
  }, [fileApi, store]);

  const resetEditors = useCallback(() => {
    setCloseQueue([]);
    setState(initialState());
  }, [initialState]);

  const showWelcome = useCallback(() => {
    store.set('welcomeTabClosed', false);
    setState(prev => showTab(prev, WELCOME_TAB_ID, firstGroupId(prev.layout) ?? undefined));
  }, [store]);

  // Auto-save
  useEffect(() => {
    if (!settings.autoSave) return;
    const timer = setInterval(() => {
      saveAllModified().catch(error => console.error('Auto-save failed:', error));
    }, settings.autoSaveInterval);
    return () => clearInterval(timer);
  }, [settings.autoSave, settings.autoSaveInterval, saveAllModified]);

  // Ask before leaving with unsaved buffers
  useEffect(() => {
    const handleBeforeUnload = (event: BeforeUnloadEvent) => {
      if (getModifiedBuffersState(stateRef.current).length === 0) return;
      event.preventDefault();
      event.returnValue = '';
    };
    window.addEventListener('beforeunload', handleBeforeUnload);
    return () => window.removeEventListener('beforeunload', handleBeforeUnload);
  }, []);

  const value: EditorManagerContextValue = {
    buffers: state.buffers,
    layout: state.layout,
    activeGroupId: state.activeGroupId,
    statusMessage,
    pendingClose,
    setStatusMessage,
    openFile,
    newFile,
    requestCloseTab,
    closeActiveTab,
    resolvePendingClose,
    closeTab,
    activateTab,
    focusGroup,
    splitActiveGroup,
    closeGroup,
    moveTab,
    resizeSplit,
    updateContent,
    updateCursor,
    saveBuffer,
    saveBufferAs,
    saveActiveBuffer,
    saveAllModified,
    getActiveBuffer,
    getModifiedBuffers,
    restoreOpenFiles,
    resetEditors,
    showWelcome
  };

  return (
    <EditorManagerContext.Provider value={value}>
      {children}
    </EditorManagerContext.Provider>
  );
};
