import React from 'react';
import { fireEvent, screen } from '@testing-library/react';
import { describe, expect, it } from 'vitest';

import { renderWithProviders } from '../test/renderWithProviders';
import MenuBar from './MenuBar';

const menuItem = (name: string) => screen.getByRole<HTMLButtonElement>('menuitem', { name });

describe('MenuBar', () => {
  it('lists the File menu with shortcuts', () => {
    renderWithProviders(<MenuBar />);

    fireEvent.click(screen.getByRole('button', { name: 'File' }));

    const labels = screen.getAllByRole('menuitem').map(item => item.querySelector('.menu-label')?.textContent);
    expect(labels).toEqual(['New File', 'Open File...', 'Open Folder...', 'Save', 'Save As...', 'Close Editor']);
    expect(menuItem('Save As...').querySelector('.menu-shortcut')?.textContent).toBe('Ctrl+Shift+S');
  });

  it('disables editor commands while no file is open', () => {
    renderWithProviders(<MenuBar />);

    fireEvent.click(screen.getByRole('button', { name: 'File' }));

    expect(menuItem('Save').disabled).toBe(true);
    expect(menuItem('New File').disabled).toBe(false);
    // The welcome tab can still be closed
    expect(menuItem('Close Editor').disabled).toBe(false);
  });

  it('toggles settings from the View menu', () => {
    const { store } = renderWithProviders(<MenuBar />);

    fireEvent.click(screen.getByRole('button', { name: 'View' }));
    const wordWrap = screen.getByRole('menuitemcheckbox', { name: 'Word Wrap' });
    expect(wordWrap.getAttribute('aria-checked')).toBe('false');
    fireEvent.click(wordWrap);

    expect(store.get('wordWrap')).toBe(true);
    expect(screen.queryByRole('menu')).toBeNull();
  });

  it('closes an open menu on Escape', () => {
    renderWithProviders(<MenuBar />);

    fireEvent.click(screen.getByRole('button', { name: 'Edit' }));
    fireEvent.keyDown(document, { key: 'Escape' });

    expect(screen.queryByRole('menu')).toBeNull();
  });
});
