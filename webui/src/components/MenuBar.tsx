import React, { useEffect, useRef, useState } from 'react';
import { useSettings } from '../contexts/SettingsContext';
import { useWorkspace } from '../contexts/WorkspaceContext';
import { useCommands } from '../hooks/useCommands';
import { AppSettings } from '../services/settings';
import { CommandId, shortcutLabel } from '../utils/shortcuts';
import './MenuBar.css';

interface MenuEntry {
  command: CommandId;
  label: string;
  checked?: keyof AppSettings;
  separatorBefore?: boolean;
}

interface Menu {
  id: string;
  label: string;
  entries: MenuEntry[];
}

const MENUS: Menu[] = [
  {
    id: 'file',
    label: 'File',
    entries: [
      { command: 'file.new', label: 'New File' },
      { command: 'file.open', label: 'Open File...' },
      { command: 'file.openFolder', label: 'Open Folder...' },
      { command: 'file.save', label: 'Save', separatorBefore: true },
      { command: 'file.saveAs', label: 'Save As...' },
      { command: 'file.close', label: 'Close Editor', separatorBefore: true }
    ]
  },
  {
    id: 'edit',
    label: 'Edit',
    entries: [
      { command: 'edit.undo', label: 'Undo' },
      { command: 'edit.redo', label: 'Redo' },
      { command: 'edit.cut', label: 'Cut', separatorBefore: true },
      { command: 'edit.copy', label: 'Copy' },
      { command: 'edit.paste', label: 'Paste' },
      { command: 'edit.find', label: 'Find', separatorBefore: true },
      { command: 'edit.replace', label: 'Replace' },
      { command: 'edit.goToLine', label: 'Go to Line...' }
    ]
  },
  {
    id: 'view',
    label: 'View',
    entries: [
      { command: 'view.explorer', label: 'Explorer', checked: 'showExplorer' },
      { command: 'view.statusBar', label: 'Status Bar', checked: 'showStatusBar' },
      { command: 'view.splitHorizontal', label: 'Split Horizontally', separatorBefore: true },
      { command: 'view.splitVertical', label: 'Split Vertically' },
      { command: 'view.closeSplit', label: 'Close Split' },
      { command: 'view.theme', label: 'Toggle Theme', separatorBefore: true },
      { command: 'view.lineNumbers', label: 'Line Numbers', checked: 'showLineNumbers' },
      { command: 'view.wordWrap', label: 'Word Wrap', checked: 'wordWrap' }
    ]
  },
  {
    id: 'help',
    label: 'Help',
    entries: [
      { command: 'help.welcome', label: 'Welcome' },
      { command: 'help.about', label: 'About Codepane' }
    ]
  }
];

const MenuBar: React.FC = () => {
  const { settings } = useSettings();
  const { workspace } = useWorkspace();
  const { runCommand, isEnabled } = useCommands();
  const [openMenu, setOpenMenu] = useState<string | null>(null);
  const barRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    if (!openMenu) return;
    const handleMouseDown = (e: MouseEvent) => {
      if (barRef.current && e.target instanceof Node && barRef.current.contains(e.target)) return;
      setOpenMenu(null);
    };
    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') setOpenMenu(null);
    };
    document.addEventListener('mousedown', handleMouseDown);
    document.addEventListener('keydown', handleKeyDown);
    return () => {
      document.removeEventListener('mousedown', handleMouseDown);
      document.removeEventListener('keydown', handleKeyDown);
    };
  }, [openMenu]);

  const select = (command: CommandId) => {
    setOpenMenu(null);
    runCommand(command);
  };

  return (
    <div className="menu-bar" ref={barRef} role="menubar">
      <div className="app-logo">📝 Codepane</div>
      {MENUS.map(menu => (
        <div key={menu.id} className="menu">
          <button
            className={`menu-title ${openMenu === menu.id ? 'open' : ''}`}
            aria-haspopup="menu"
            aria-expanded={openMenu === menu.id}
            onClick={() => setOpenMenu(prev => (prev === menu.id ? null : menu.id))}
            onMouseEnter={() => setOpenMenu(prev => (prev ? menu.id : prev))}
          >
            {menu.label}
          </button>
          {openMenu === menu.id && (
            <div className="menu-dropdown" role="menu" aria-label={menu.label}>
              {menu.entries.map(entry => {
                const shortcut = shortcutLabel(entry.command);
                return (
                  <React.Fragment key={entry.command}>
                    {entry.separatorBefore && <div className="menu-separator" role="separator" />}
                    <button
                      className="menu-item"
                      role={entry.checked ? 'menuitemcheckbox' : 'menuitem'}
                      aria-label={entry.label}
                      aria-checked={entry.checked ? settings[entry.checked] === true : undefined}
                      disabled={!isEnabled(entry.command)}
                      onClick={() => select(entry.command)}
                    >
                      <span className="menu-check">{entry.checked && settings[entry.checked] === true ? '✓' : ''}</span>
                      <span className="menu-label">{entry.label}</span>
                      {shortcut && <span className="menu-shortcut">{shortcut}</span>}
                    </button>
                  </React.Fragment>
                );
              })}
            </div>
          )}
        </div>
      ))}
      {workspace && <div className="menu-workspace" title={workspace.root}>{workspace.name}</div>}
    </div>
  );
};

export default MenuBar;
