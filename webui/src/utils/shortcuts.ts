export type CommandId =
  | 'file.new'
  | 'file.open'
  | 'file.openFolder'
  | 'file.save'
  | 'file.saveAs'
  | 'file.close'
  | 'edit.undo'
  | 'edit.redo'
  | 'edit.cut'
  | 'edit.copy'
  | 'edit.paste'
  | 'edit.find'
  | 'edit.replace'
  | 'edit.goToLine'
  | 'view.explorer'
  | 'view.statusBar'
  | 'view.splitHorizontal'
  | 'view.splitVertical'
  | 'view.closeSplit'
  | 'view.theme'
  | 'view.lineNumbers'
  | 'view.wordWrap'
  | 'help.welcome'
  | 'help.about';

export interface Shortcut {
  key: string; // lower case, as in KeyboardEvent.key
  code: string; // KeyboardEvent.code, used when Shift changes the key
  mod: boolean;
  shift: boolean;
}

export interface KeyLike {
  key: string;
  code: string;
  ctrlKey: boolean;
  metaKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
}

const CODES: Record<string, string> = {
  '\\': 'Backslash'
};

/** Parses "Ctrl+Shift+S" style labels. Ctrl stands for Cmd on macOS. */
export const parseShortcut = (label: string): Shortcut => {
  const parts = label.split('+');
  const key = (parts[parts.length - 1] ?? '').toLowerCase();
  const modifiers = parts.slice(0, -1).map(part => part.toLowerCase());
  return {
    key,
    code: CODES[key] ?? (/^[a-z]$/.test(key) ? `Key${key.toUpperCase()}` : key),
    mod: modifiers.includes('ctrl'),
    shift: modifiers.includes('shift')
  };
};

export const matchesShortcut = (event: KeyLike, shortcut: Shortcut): boolean => {
  if (event.altKey) return false;
  if ((event.ctrlKey || event.metaKey) !== shortcut.mod) return false;
  if (event.shiftKey !== shortcut.shift) return false;
  return event.key.toLowerCase() === shortcut.key || event.code === shortcut.code;
};

/**
 * Shortcuts the window handles. Undo, redo and the clipboard keys stay with
 * the focused editor, so they are listed for the menu only.
 */
export const SHORTCUTS: ReadonlyArray<{ command: CommandId; label: string; global: boolean }> = [
  { command: 'file.new', label: 'Ctrl+N', global: true },
  { command: 'file.open', label: 'Ctrl+O', global: true },
  { command: 'file.openFolder', label: 'Ctrl+Shift+O', global: true },
  { command: 'file.save', label: 'Ctrl+S', global: true },
  { command: 'file.saveAs', label: 'Ctrl+Shift+S', global: true },
  { command: 'file.close', label: 'Ctrl+W', global: true },
  { command: 'edit.undo', label: 'Ctrl+Z', global: false },
  { command: 'edit.redo', label: 'Ctrl+Y', global: false },
  { command: 'edit.cut', label: 'Ctrl+X', global: false },
  { command: 'edit.copy', label: 'Ctrl+C', global: false },
  { command: 'edit.paste', label: 'Ctrl+V', global: false },
  { command: 'edit.find', label: 'Ctrl+F', global: true },
  { command: 'edit.replace', label: 'Ctrl+H', global: true },
  { command: 'edit.goToLine', label: 'Ctrl+G', global: true },
  { command: 'view.splitHorizontal', label: 'Ctrl+\\', global: true },
  { command: 'view.splitVertical', label: 'Ctrl+Shift+\\', global: true }
];

export const shortcutLabel = (command: CommandId): string | undefined =>
  SHORTCUTS.find(entry => entry.command === command)?.label;

const GLOBAL_BINDINGS = SHORTCUTS
  .filter(entry => entry.global)
  .map(entry => ({ command: entry.command, shortcut: parseShortcut(entry.label) }));

export const commandForKey = (event: KeyLike): CommandId | null =>
  GLOBAL_BINDINGS.find(binding => matchesShortcut(event, binding.shortcut))?.command ?? null;
