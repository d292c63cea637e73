import { Extension } from '@codemirror/state';
import { EditorView } from '@codemirror/view';
import { HighlightStyle, syntaxHighlighting } from '@codemirror/language';
import { tags } from '@lezer/highlight';
import { oneDark } from '@codemirror/theme-one-dark';

export type ThemeName = 'dark' | 'light';

export type ColorRole =
  | 'background'
  | 'foreground'
  | 'selection'
  | 'accent'
  | 'border'
  | 'activeTab'
  | 'inactiveTab'
  | 'sidebar'
  | 'lineNumber'
  | 'currentLine'
  | 'error'
  | 'warning'
  | 'info'
  | 'success';

export type Palette = Record<ColorRole, string>;

export const PALETTES: Record<ThemeName, Palette> = {
  dark: {
    background: '#1e1e1e',
    foreground: '#d4d4d4',
    selection: '#2a82da',
    accent: '#007acc',
    border: '#3c3c3c',
    activeTab: '#252526',
    inactiveTab: '#2d2d2d',
    sidebar: '#252526',
    lineNumber: '#787878',
    currentLine: '#282828',
    error: '#e06c75',
    warning: '#e5c07b',
    info: '#61afef',
    success: '#98c379'
  },
  light: {
    background: '#ffffff',
    foreground: '#000000',
    selection: '#add6ff',
    accent: '#0078d7',
    border: '#d5d5d5',
    activeTab: '#ffffff',
    inactiveTab: '#f0f0f0',
    sidebar: '#f3f3f3',
    lineNumber: '#787878',
    currentLine: '#f5f5f5',
    error: '#cd3131',
    warning: '#cb912f',
    info: '#0078d7',
    success: '#00853e'
  }
};

export const isThemeName = (value: unknown): value is ThemeName => value === 'dark' || value === 'light';

export const getColor = (role: ColorRole, theme: ThemeName): string => PALETTES[theme][role];

const toKebab = (role: string): string => role.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);

export const toCssVariables = (theme: ThemeName): Record<string, string> =>
  Object.fromEntries(Object.entries(PALETTES[theme]).map(([role, color]) => [`--color-${toKebab(role)}`, color]));

// Stylesheets read the palette through CSS variables keyed off data-theme.
export const applyTheme = (theme: ThemeName, root: HTMLElement = document.documentElement): void => {
  root.setAttribute('data-theme', theme);
  Object.entries(toCssVariables(theme)).forEach(([name, value]) => {
    root.style.setProperty(name, value);
  });
};

const lightHighlightStyle = HighlightStyle.define([
  { tag: tags.keyword, color: '#0000ff' },
  { tag: [tags.controlKeyword, tags.moduleKeyword], color: '#af00db' },
  { tag: [tags.string, tags.special(tags.string)], color: '#a31515' },
  { tag: tags.comment, color: '#008000', fontStyle: 'italic' },
  { tag: [tags.number, tags.bool, tags.null], color: '#098658' },
  { tag: [tags.typeName, tags.className], color: '#267f99' },
  { tag: tags.function(tags.variableName), color: '#795e26' },
  { tag: tags.propertyName, color: '#001080' },
  { tag: [tags.tagName, tags.heading], color: '#800000', fontWeight: 'bold' },
  { tag: tags.attributeName, color: '#e50000' },
  { tag: tags.invalid, color: '#cd3131' }
]);

const chromeTheme = (theme: ThemeName): Extension => {
  const palette = PALETTES[theme];
  return EditorView.theme(
    {
      '&': {
        backgroundColor: palette.background,
        color: palette.foreground
      },
      '.cm-gutters': {
        backgroundColor: palette.background,
        color: palette.lineNumber,
        border: 'none'
      },
      '.cm-activeLine': { backgroundColor: palette.currentLine },
      '.cm-activeLineGutter': { backgroundColor: palette.currentLine },
      '&.cm-focused .cm-selectionBackground, .cm-selectionBackground, .cm-content ::selection': {
        backgroundColor: `${palette.selection}66`
      },
      '.cm-cursor, .cm-dropCursor': { borderLeftColor: palette.foreground },
      '.cm-searchMatch': { outline: `1px solid ${palette.accent}` }
    },
    { dark: theme === 'dark' }
  );
};

export const editorThemeExtension = (theme: ThemeName): Extension =>
  theme === 'dark'
    ? [oneDark, chromeTheme('dark')]
    : [chromeTheme('light'), syntaxHighlighting(lightHighlightStyle)];
