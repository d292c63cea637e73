/**
 * Editor manager state
 *
 * Buffers plus the layout tree. The functions below are the pure half of the
 * editor manager; EditorManagerContext wires them to React state and to the
 * file server.
 */

import { CursorPosition, EditorBuffer, FileInfo, LayoutPreset, SplitDirection, SplitNode } from '../types/editor';
import {
  activateTab,
  closeGroup,
  closeTab,
  findGroup,
  findGroupContaining,
  getAllTabs,
  getGroups,
  layoutFromPreset,
  moveTab,
  openTab,
  resizeSplit,
  splitGroup
} from './editorLayout';
import { createId } from './ids';
import { detectLanguage } from './languages';

export interface EditorManagerState {
  buffers: Map<string, EditorBuffer>;
  layout: SplitNode;
  activeGroupId: string;
  untitledCount: number;
}

export const createEditorState = (preset: LayoutPreset = 'single'): EditorManagerState => {
  const layout = layoutFromPreset(preset);
  return {
    buffers: new Map(),
    layout,
    activeGroupId: getGroups(layout)[0].id,
    untitledCount: 0
  };
};

// Keeps activeGroupId pointing at a group that still exists.
const withValidActiveGroup = (state: EditorManagerState): EditorManagerState => {
  if (findGroup(state.layout, state.activeGroupId)) return state;
  return { ...state, activeGroupId: getGroups(state.layout)[0].id };
};

const updateBuffer = (
  state: EditorManagerState,
  bufferId: string,
  update: (buffer: EditorBuffer) => EditorBuffer
): EditorManagerState => {
  const buffer = state.buffers.get(bufferId);
  if (!buffer) return state;
  const buffers = new Map(state.buffers);
  buffers.set(bufferId, update(buffer));
  return { ...state, buffers };
};

const targetGroup = (state: EditorManagerState, groupId?: string): string =>
  groupId && findGroup(state.layout, groupId) ? groupId : state.activeGroupId;

export const findBufferByPath = (state: EditorManagerState, path: string): EditorBuffer | null => {
  for (const buffer of state.buffers.values()) {
    if (buffer.file?.path === path) return buffer;
  }
  return null;
};

export const createFileBuffer = (file: FileInfo): EditorBuffer => ({
  id: createId('buffer'),
  file,
  title: file.name,
  content: '',
  savedContent: '',
  cursor: { line: 1, column: 1 },
  languageId: detectLanguage(file.name).id,
  isModified: false,
  isLoading: true,
  error: null
});

/** Shows a tab in a group, focusing that group. Works for buffers and the welcome tab. */
export const showTab = (state: EditorManagerState, tabId: string, groupId?: string): EditorManagerState => {
  const holder = findGroupContaining(state.layout, tabId);
  if (holder) {
    return { ...state, layout: activateTab(state.layout, holder.id, tabId), activeGroupId: holder.id };
  }
  const target = targetGroup(state, groupId);
  return { ...state, layout: openTab(state.layout, target, tabId), activeGroupId: target };
};

/**
 * Adds a buffer and its tab. When a buffer for the same file is already open,
 * that one is activated instead and the new buffer is dropped.
 */
export const addBuffer = (state: EditorManagerState, buffer: EditorBuffer, groupId?: string): EditorManagerState => {
  const existing = buffer.file ? findBufferByPath(state, buffer.file.path) : null;
  if (existing) return showTab(state, existing.id, groupId);

  const buffers = new Map(state.buffers);
  buffers.set(buffer.id, buffer);
  return showTab({ ...state, buffers }, buffer.id, groupId);
};

export const addUntitledBuffer = (
  state: EditorManagerState,
  groupId?: string
): { state: EditorManagerState; bufferId: string } => {
  const untitledCount = state.untitledCount + 1;
  const buffer: EditorBuffer = {
    id: createId('buffer'),
    file: null,
    title: `Untitled-${untitledCount}`,
    content: '',
    savedContent: '',
    cursor: { line: 1, column: 1 },
    languageId: 'text',
    isModified: false,
    isLoading: false,
    error: null
  };
  return { state: addBuffer({ ...state, untitledCount }, buffer, groupId), bufferId: buffer.id };
};

export const removeTab = (state: EditorManagerState, groupId: string, tabId: string): EditorManagerState => {
  const layout = closeTab(state.layout, groupId, tabId);
  let buffers = state.buffers;
  if (buffers.has(tabId) && !findGroupContaining(layout, tabId)) {
    buffers = new Map(buffers);
    buffers.delete(tabId);
  }
  const activeGroupId = findGroup(layout, groupId) ? groupId : state.activeGroupId;
  return withValidActiveGroup({ ...state, layout, buffers, activeGroupId });
};

export const selectTab = (state: EditorManagerState, groupId: string, tabId: string): EditorManagerState =>
  findGroup(state.layout, groupId)
    ? { ...state, layout: activateTab(state.layout, groupId, tabId), activeGroupId: groupId }
    : state;

export const focusGroup = (state: EditorManagerState, groupId: string): EditorManagerState =>
  findGroup(state.layout, groupId) && state.activeGroupId !== groupId ? { ...state, activeGroupId: groupId } : state;

export const splitActive = (state: EditorManagerState, direction: SplitDirection): EditorManagerState => {
  const result = splitGroup(state.layout, state.activeGroupId, direction);
  if (!result.groupId) return state;
  return { ...state, layout: result.layout, activeGroupId: result.groupId };
};

export const mergeGroup = (state: EditorManagerState, groupId: string): EditorManagerState => {
  const source = findGroup(state.layout, groupId);
  const layout = closeGroup(state.layout, groupId);
  if (!source || layout === state.layout) return state;
  // Focus follows the tabs into the group that received them.
  const receiver = source.activeTab ? findGroupContaining(layout, source.activeTab) : null;
  return withValidActiveGroup({ ...state, layout, activeGroupId: receiver?.id ?? state.activeGroupId });
};

export const relocateTab = (
  state: EditorManagerState,
  fromGroupId: string,
  toGroupId: string,
  tabId: string,
  index?: number
): EditorManagerState => {
  const layout = moveTab(state.layout, fromGroupId, toGroupId, tabId, index);
  if (layout === state.layout) return state;
  return withValidActiveGroup({ ...state, layout, activeGroupId: toGroupId });
};

export const resizeGroups = (state: EditorManagerState, splitId: string, sizes: number[]): EditorManagerState => {
  const layout = resizeSplit(state.layout, splitId, sizes);
  return layout === state.layout ? state : { ...state, layout };
};

export const setBufferContent = (state: EditorManagerState, bufferId: string, content: string): EditorManagerState => {
  const buffer = state.buffers.get(bufferId);
  if (!buffer || buffer.content === content) return state;
  return updateBuffer(state, bufferId, current => ({
    ...current,
    content,
    isModified: content !== current.savedContent
  }));
};

export const setBufferCursor = (state: EditorManagerState, bufferId: string, cursor: CursorPosition): EditorManagerState => {
  const buffer = state.buffers.get(bufferId);
  if (!buffer || (buffer.cursor.line === cursor.line && buffer.cursor.column === cursor.column)) return state;
  return updateBuffer(state, bufferId, current => ({ ...current, cursor }));
};

export const markLoaded = (state: EditorManagerState, bufferId: string, content: string): EditorManagerState =>
  updateBuffer(state, bufferId, buffer => ({
    ...buffer,
    content,
    savedContent: content,
    isModified: false,
    isLoading: false,
    error: null
  }));

export const markLoadFailed = (state: EditorManagerState, bufferId: string, message: string): EditorManagerState =>
  updateBuffer(state, bufferId, buffer => ({ ...buffer, isLoading: false, error: message }));

/**
 * Records a successful save of `content`. Edits made while the save was in
 * flight stay marked as modified. Passing `file` re-points the buffer.
 */
export const markSaved = (
  state: EditorManagerState,
  bufferId: string,
  content: string,
  file?: FileInfo
): EditorManagerState =>
  updateBuffer(state, bufferId, buffer => {
    const target = file ?? buffer.file;
    return {
      ...buffer,
      file: target,
      title: target ? target.name : buffer.title,
      languageId: file ? detectLanguage(file.name).id : buffer.languageId,
      savedContent: content,
      isModified: buffer.content !== content,
      error: null
    };
  });

export const getActiveBuffer = (state: EditorManagerState): EditorBuffer | null => {
  const group = findGroup(state.layout, state.activeGroupId);
  if (!group || !group.activeTab) return null;
  return state.buffers.get(group.activeTab) ?? null;
};

export const getModifiedBuffers = (state: EditorManagerState): EditorBuffer[] =>
  Array.from(state.buffers.values()).filter(buffer => buffer.isModified);

/** Paths of file-backed tabs in tree order, for restoring the session. */
export const getOpenFilePaths = (state: EditorManagerState): string[] => {
  const paths: string[] = [];
  for (const tabId of getAllTabs(state.layout)) {
    const path = state.buffers.get(tabId)?.file?.path;
    if (path && !paths.includes(path)) paths.push(path);
  }
  return paths;
};
