import React, { ReactNode } from 'react';
import { act, renderHook, waitFor } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';

import SplitView from '../components/SplitView';
import { editorRegistry } from '../services/editorRegistry';
import { fileInfo, MemoryFileApi } from '../test/memoryFileApi';
import { createProviders, createTestStore } from '../test/renderWithProviders';
import { WELCOME_TAB_ID } from '../types/editor';
import { findGroup } from '../utils/editorLayout';
import { useEditorManager } from './EditorManagerContext';

const setup = (files: Record<string, string> = {}, promptForPath?: (message: string, value: string) => string | null) => {
  const { Wrapper, fileApi, store } = createProviders({ fileApi: new MemoryFileApi(files), promptForPath });
  const hook = renderHook(() => useEditorManager(), { wrapper: Wrapper });
  return { ...hook, fileApi, store };
};

describe('EditorManagerProvider', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts with the welcome tab in the first group', () => {
    const { result } = setup();

    const group = findGroup(result.current.layout, result.current.activeGroupId);
    expect(group?.tabs).toEqual([WELCOME_TAB_ID]);
    expect(result.current.statusMessage).toBe('Ready');
  });

  it('loads an opened file into a new buffer', async () => {
    const { result } = setup({ 'src/app.ts': 'const a = 1;\n' });

    await act(async () => {
      await result.current.openFile(fileInfo('src/app.ts'));
    });

    expect(result.current.getActiveBuffer()).toMatchObject({
      title: 'app.ts',
      content: 'const a = 1;\n',
      languageId: 'typescript',
      isLoading: false,
      isModified: false
    });
    expect(result.current.statusMessage).toBe('Opened src/app.ts');
  });

  it('refuses files that are not text', async () => {
    const { result } = setup({ 'logo.png': 'PNG\u0000' });

    await act(async () => {
      await result.current.openFile(fileInfo('logo.png'));
    });

    expect(result.current.buffers.size).toBe(0);
    expect(result.current.statusMessage).toBe('Not a UTF-8 text file: logo.png');
  });

  it('keeps the tab of a file that failed to load and shows the error', async () => {
    const { result } = setup();

    await act(async () => {
      await result.current.openFile(fileInfo('gone.txt'));
    });

    expect(result.current.getActiveBuffer()).toMatchObject({
      isLoading: false,
      error: 'No such file or directory: gone.txt'
    });
  });

  it('saves a modified buffer', async () => {
    const { result, fileApi } = setup({ 'notes.txt': 'one' });
    await act(async () => {
      await result.current.openFile(fileInfo('notes.txt'));
    });
    const bufferId = result.current.getActiveBuffer()?.id ?? '';

    act(() => {
      result.current.updateContent(bufferId, 'one two');
    });
    expect(result.current.getModifiedBuffers()).toHaveLength(1);

    await act(async () => {
      await result.current.saveBuffer(bufferId);
    });

    expect(fileApi.writes).toEqual([{ path: 'notes.txt', content: 'one two' }]);
    expect(result.current.getActiveBuffer()?.isModified).toBe(false);
    expect(result.current.statusMessage).toBe('Saved notes.txt');
  });

  it('asks for a path when saving an untitled buffer', async () => {
    const prompt = vi.fn(() => 'notes/todo.md');
    const { result, fileApi } = setup({}, prompt);

    act(() => {
      result.current.newFile();
    });
    const bufferId = result.current.getActiveBuffer()?.id ?? '';
    act(() => {
      result.current.updateContent(bufferId, '# todo\n');
    });

    await act(async () => {
      await result.current.saveBuffer(bufferId);
    });

    expect(prompt).toHaveBeenCalledWith('Save As', 'Untitled-1');
    expect(fileApi.files.get('notes/todo.md')).toBe('# todo\n');
    expect(result.current.getActiveBuffer()).toMatchObject({
      title: 'todo.md',
      languageId: 'markdown',
      isModified: false,
      file: { path: 'notes/todo.md' }
    });
  });

  it('holds a modified buffer open until the close prompt is answered', async () => {
    const { result } = setup({ 'draft.txt': 'a' });
    await act(async () => {
      await result.current.openFile(fileInfo('draft.txt'));
    });
    const bufferId = result.current.getActiveBuffer()?.id ?? '';
    const groupId = result.current.activeGroupId;
    act(() => {
      result.current.updateContent(bufferId, 'ab');
    });

    act(() => {
      result.current.requestCloseTab(groupId, bufferId);
    });
    expect(result.current.pendingClose).toEqual({ groupId, bufferId, title: 'draft.txt' });

    await act(async () => {
      await result.current.resolvePendingClose('cancel');
    });
    expect(result.current.buffers.has(bufferId)).toBe(true);

    act(() => {
      result.current.requestCloseTab(groupId, bufferId);
    });
    await act(async () => {
      await result.current.resolvePendingClose('discard');
    });
    expect(result.current.buffers.has(bufferId)).toBe(false);
    expect(result.current.pendingClose).toBeNull();
  });

  it('remembers that the welcome tab was closed', () => {
    const { result, store } = setup();

    act(() => {
      result.current.closeTab(result.current.activeGroupId, WELCOME_TAB_ID);
    });

    expect(store.get('welcomeTabClosed')).toBe(true);
    expect(findGroup(result.current.layout, result.current.activeGroupId)?.tabs).toEqual([]);
  });

  it('reopens the previous session and skips missing files', async () => {
    const store = createTestStore();
    store.set('openFiles', ['a.ts', 'missing.ts', 'lib/b.py']);
    const { Wrapper } = createProviders({ fileApi: new MemoryFileApi({ 'a.ts': 'a', 'lib/b.py': 'b' }), store });
    const { result } = renderHook(() => useEditorManager(), { wrapper: Wrapper });

    await act(async () => {
      await result.current.restoreOpenFiles();
    });

    const titles = Array.from(result.current.buffers.values()).map(buffer => buffer.title);
    expect(titles).toEqual(['a.ts', 'b.py']);
    await waitFor(() => expect(store.get('openFiles')).toEqual(['a.ts', 'lib/b.py']));
  });

  it('auto-saves modified files on the configured interval', async () => {
    vi.useFakeTimers();
    const store = createTestStore();
    store.set('autoSave', true);
    store.set('autoSaveInterval', 1000);
    const fileApi = new MemoryFileApi({ 'a.txt': 'a' });
    const { Wrapper } = createProviders({ fileApi, store });
    const { result } = renderHook(() => useEditorManager(), { wrapper: Wrapper });

    await act(async () => {
      await result.current.openFile(fileInfo('a.txt'));
    });
    const bufferId = result.current.getActiveBuffer()?.id ?? '';
    act(() => {
      result.current.newFile();
    });
    const untitledId = result.current.getActiveBuffer()?.id ?? '';
    act(() => {
      result.current.updateContent(bufferId, 'a!');
      result.current.updateContent(untitledId, 'scratch');
    });

    await act(async () => {
      await vi.advanceTimersByTimeAsync(1000);
    });

    expect(fileApi.writes).toEqual([{ path: 'a.txt', content: 'a!' }]);
    expect(result.current.buffers.get(untitledId)?.isModified).toBe(true);
  });
});

describe('EditorManagerProvider with mounted editors', () => {
  const Editors: React.FC = () => {
    const { layout } = useEditorManager();
    return <SplitView node={layout} />;
  };

  const setupWithEditors = (files: Record<string, string>) => {
    const { Wrapper } = createProviders({ fileApi: new MemoryFileApi(files) });
    const wrapper = ({ children }: { children: ReactNode }) => (
      <Wrapper>
        <Editors />
        {children}
      </Wrapper>
    );
    return renderHook(() => useEditorManager(), { wrapper });
  };

  it('keeps CRLF line endings of a loaded file', async () => {
    const { result } = setupWithEditors({ 'win.txt': 'one\r\ntwo\r\n' });

    await act(async () => {
      await result.current.openFile(fileInfo('win.txt'));
    });

    expect(result.current.getActiveBuffer()).toMatchObject({ content: 'one\r\ntwo\r\n', isModified: false });

    const view = editorRegistry.getView(result.current.activeGroupId);
    expect(view?.state.doc.lines).toBe(3);
    act(() => {
      view?.dispatch({ changes: { from: view.state.doc.length, insert: 'three' } });
    });

    expect(result.current.getActiveBuffer()).toMatchObject({ content: 'one\r\ntwo\r\nthree', isModified: true });
  });

  it('keeps LF line endings of a loaded file', async () => {
    const { result } = setupWithEditors({ 'unix.txt': 'a\nb' });

    await act(async () => {
      await result.current.openFile(fileInfo('unix.txt'));
    });

    expect(result.current.getActiveBuffer()).toMatchObject({ content: 'a\nb', isModified: false });
  });
});
