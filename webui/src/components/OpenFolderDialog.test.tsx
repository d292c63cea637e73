import React from 'react';
import { fireEvent, screen, waitFor } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';

import { renderWithProviders } from '../test/renderWithProviders';
import OpenFolderDialog from './OpenFolderDialog';

describe('OpenFolderDialog', () => {
  it('switches the workspace and remembers it', async () => {
    const onClose = vi.fn();
    const { fileApi, store } = renderWithProviders(<OpenFolderDialog onClose={onClose} />);

    fireEvent.change(screen.getByLabelText('Folder path'), { target: { value: ' /work/other ' } });
    fireEvent.click(screen.getByRole('button', { name: 'Open' }));

    await waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(fileApi.workspace).toEqual({ root: '/work/other', name: 'other' });
    expect(store.get('recentWorkspaces')).toEqual(['/work/other']);
  });

  it('shows why a folder could not be opened', async () => {
    const onClose = vi.fn();
    renderWithProviders(<OpenFolderDialog onClose={onClose} />);

    fireEvent.change(screen.getByLabelText('Folder path'), { target: { value: 'relative/dir' } });
    fireEvent.click(screen.getByRole('button', { name: 'Open' }));

    expect(await screen.findByText('Workspace path must be absolute')).toBeTruthy();
    expect(onClose).not.toHaveBeenCalled();
  });

  it('needs a path before opening', () => {
    renderWithProviders(<OpenFolderDialog onClose={() => {}} />);

    expect(screen.getByRole<HTMLButtonElement>('button', { name: 'Open' }).disabled).toBe(true);
  });
});
