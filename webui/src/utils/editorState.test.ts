import { describe, expect, it } from 'vitest';

import { fileInfo } from '../test/memoryFileApi';
import { WELCOME_TAB_ID } from '../types/editor';
import { findGroup, getGroups } from './editorLayout';
import {
  addBuffer,
  addUntitledBuffer,
  createEditorState,
  createFileBuffer,
  getActiveBuffer,
  getModifiedBuffers,
  getOpenFilePaths,
  markLoaded,
  markSaved,
  mergeGroup,
  relocateTab,
  removeTab,
  setBufferContent,
  showTab,
  splitActive
} from './editorState';

describe('editor state', () => {
  it('starts with one empty group and no buffers', () => {
    const state = createEditorState();

    expect(getGroups(state.layout)).toHaveLength(1);
    expect(state.activeGroupId).toBe(getGroups(state.layout)[0].id);
    expect(state.buffers.size).toBe(0);
    expect(getActiveBuffer(state)).toBeNull();
  });

  it('opens each file once and re-activates it on the second open', () => {
    const first = createFileBuffer(fileInfo('src/main.py'));
    const second = createFileBuffer(fileInfo('README.md'));
    let state = addBuffer(createEditorState(), first);
    state = addBuffer(state, second);

    state = addBuffer(state, createFileBuffer(fileInfo('src/main.py')));

    expect(state.buffers.size).toBe(2);
    expect(getActiveBuffer(state)?.id).toBe(first.id);
    expect(first).toMatchObject({ title: 'main.py', languageId: 'python', isLoading: true });
  });

  it('numbers untitled buffers', () => {
    const one = addUntitledBuffer(createEditorState());
    const two = addUntitledBuffer(one.state);

    expect(two.state.buffers.get(one.bufferId)?.title).toBe('Untitled-1');
    expect(two.state.buffers.get(two.bufferId)).toMatchObject({ title: 'Untitled-2', file: null, languageId: 'text' });
  });

  it('tracks modification against the saved content', () => {
    const buffer = createFileBuffer(fileInfo('notes.txt'));
    let state = markLoaded(addBuffer(createEditorState(), buffer), buffer.id, 'hello');

    state = setBufferContent(state, buffer.id, 'hello!');
    expect(state.buffers.get(buffer.id)?.isModified).toBe(true);
    expect(getModifiedBuffers(state).map(item => item.id)).toEqual([buffer.id]);

    state = setBufferContent(state, buffer.id, 'hello');
    expect(state.buffers.get(buffer.id)?.isModified).toBe(false);
  });

  it('keeps edits made during a save marked as modified', () => {
    const buffer = createFileBuffer(fileInfo('notes.txt'));
    let state = markLoaded(addBuffer(createEditorState(), buffer), buffer.id, 'a');
    state = setBufferContent(state, buffer.id, 'ab');
    state = setBufferContent(state, buffer.id, 'abc');

    state = markSaved(state, buffer.id, 'ab');

    expect(state.buffers.get(buffer.id)).toMatchObject({ savedContent: 'ab', content: 'abc', isModified: true });
  });

  it('re-points a buffer saved under a new name', () => {
    const { state: start, bufferId } = addUntitledBuffer(createEditorState());
    const edited = setBufferContent(start, bufferId, 'package main\n');

    const state = markSaved(edited, bufferId, 'package main\n', fileInfo('cmd/main.go', 13));

    expect(state.buffers.get(bufferId)).toMatchObject({
      title: 'main.go',
      languageId: 'go',
      isModified: false,
      file: { path: 'cmd/main.go' }
    });
  });

  it('drops the buffer with its last tab', () => {
    const buffer = createFileBuffer(fileInfo('a.ts'));
    const state = addBuffer(createEditorState(), buffer);

    const closed = removeTab(state, state.activeGroupId, buffer.id);

    expect(closed.buffers.has(buffer.id)).toBe(false);
    expect(findGroup(closed.layout, state.activeGroupId)?.tabs).toEqual([]);
  });

  it('opens into the freshly split group and lists files in tree order', () => {
    const left = createFileBuffer(fileInfo('left.ts'));
    let state = addBuffer(createEditorState(), left);
    const firstGroup = state.activeGroupId;

    state = splitActive(state, 'vertical');
    expect(state.activeGroupId).not.toBe(firstGroup);

    const right = createFileBuffer(fileInfo('right.ts'));
    state = addBuffer(state, right);
    const secondGroup = state.activeGroupId;
    state = showTab(state, WELCOME_TAB_ID, firstGroup);

    expect(findGroup(state.layout, secondGroup)?.tabs).toEqual([right.id]);
    expect(findGroup(state.layout, firstGroup)?.tabs).toEqual([left.id, WELCOME_TAB_ID]);
    expect(state.activeGroupId).toBe(firstGroup);
    expect(getOpenFilePaths(state)).toEqual(['left.ts', 'right.ts']);
  });

  it('follows tabs into the receiving group when a split closes', () => {
    const left = createFileBuffer(fileInfo('left.ts'));
    let state = addBuffer(createEditorState(), left);
    const firstGroup = state.activeGroupId;
    state = splitActive(state, 'horizontal');
    const right = createFileBuffer(fileInfo('right.ts'));
    state = addBuffer(state, right);

    state = mergeGroup(state, state.activeGroupId);

    expect(getGroups(state.layout)).toHaveLength(1);
    expect(state.activeGroupId).toBe(firstGroup);
    expect(getActiveBuffer(state)?.id).toBe(right.id);
  });

  it('moves a tab and focuses the destination group', () => {
    const a = createFileBuffer(fileInfo('a.ts'));
    const b = createFileBuffer(fileInfo('b.ts'));
    let state = addBuffer(addBuffer(createEditorState(), a), b);
    const source = state.activeGroupId;
    state = splitActive(state, 'vertical');
    const destination = state.activeGroupId;
    state = { ...state, activeGroupId: source };

    state = relocateTab(state, source, destination, a.id);

    expect(state.activeGroupId).toBe(destination);
    expect(findGroup(state.layout, destination)?.tabs).toEqual([a.id]);
    expect(findGroup(state.layout, source)?.tabs).toEqual([b.id]);
  });
});
