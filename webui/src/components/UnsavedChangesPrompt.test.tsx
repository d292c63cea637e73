import React, { ReactNode } from 'react';
import { act, fireEvent, renderHook, screen, waitFor } from '@testing-library/react';
import { describe, expect, it } from 'vitest';

import { useEditorManager } from '../contexts/EditorManagerContext';
import { fileInfo, MemoryFileApi } from '../test/memoryFileApi';
import { createProviders } from '../test/renderWithProviders';
import UnsavedChangesPrompt from './UnsavedChangesPrompt';

const setup = async () => {
  const { Wrapper, fileApi } = createProviders({ fileApi: new MemoryFileApi({ 'notes.txt': 'first' }) });
  const wrapper = ({ children }: { children: ReactNode }) => (
    <Wrapper>
      <UnsavedChangesPrompt />
      {children}
    </Wrapper>
  );
  const hook = renderHook(() => useEditorManager(), { wrapper });

  await act(async () => {
    await hook.result.current.openFile(fileInfo('notes.txt'));
  });
  const bufferId = hook.result.current.getActiveBuffer()?.id ?? '';
  const groupId = hook.result.current.activeGroupId;
  act(() => {
    hook.result.current.updateContent(bufferId, 'second');
  });
  act(() => {
    hook.result.current.requestCloseTab(groupId, bufferId);
  });
  return { ...hook, fileApi, bufferId };
};

describe('UnsavedChangesPrompt', () => {
  it('stays hidden until a modified tab is closed', () => {
    const { Wrapper } = createProviders();
    renderHook(() => useEditorManager(), {
      wrapper: ({ children }: { children: ReactNode }) => (
        <Wrapper>
          <UnsavedChangesPrompt />
          {children}
        </Wrapper>
      )
    });

    expect(screen.queryByRole('alertdialog')).toBeNull();
  });

  it('names the buffer being closed', async () => {
    await setup();

    expect(screen.getByRole('alertdialog').querySelector('.quickprompt-prompt')?.textContent).toBe(
      'Do you want to save the changes you made to notes.txt?'
    );
  });

  it('saves and closes', async () => {
    const { result, fileApi, bufferId } = await setup();

    fireEvent.click(screen.getByRole('button', { name: /^Save/ }));

    await waitFor(() => expect(result.current.buffers.has(bufferId)).toBe(false));
    expect(fileApi.files.get('notes.txt')).toBe('second');
    expect(screen.queryByRole('alertdialog')).toBeNull();
  });

  it('discards with the D hotkey', async () => {
    const { result, fileApi, bufferId } = await setup();

    fireEvent.keyDown(document, { key: 'd' });

    await waitFor(() => expect(result.current.buffers.has(bufferId)).toBe(false));
    expect(fileApi.writes).toEqual([]);
  });

  it('keeps the buffer on Escape', async () => {
    const { result, bufferId } = await setup();

    fireEvent.keyDown(document, { key: 'Escape' });

    await waitFor(() => expect(result.current.pendingClose).toBeNull());
    expect(result.current.buffers.get(bufferId)?.content).toBe('second');
  });
});
