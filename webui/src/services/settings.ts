/**
 * Settings store
 *
 * Typed application settings persisted one JSON value per key. Values that
 * fail to parse, or come back with the wrong shape, read as their default.
 */

import { LayoutPreset } from '../types/editor';
import { ThemeName, isThemeName } from '../utils/themes';

export interface AppSettings {
  theme: ThemeName;
  recentWorkspaces: string[];
  lastWorkspace: string;
  showWelcomeScreen: boolean;
  welcomeTabClosed: boolean;
  fontFamily: string;
  fontSize: number;
  tabSize: number;
  useSpaces: boolean;
  showLineNumbers: boolean;
  wordWrap: boolean;
  autoSave: boolean;
  autoSaveInterval: number;
  showStatusBar: boolean;
  showExplorer: boolean;
  editorLayout: LayoutPreset;
  openFiles: string[];
}

export type SettingKey = keyof AppSettings;

export type SettingsListener = <K extends SettingKey>(key: K, value: AppSettings[K]) => void;

export const MAX_RECENT_WORKSPACES = 10;

const STORAGE_PREFIX = 'codepane.settings.';

export const DEFAULT_SETTINGS: Readonly<AppSettings> = {
  theme: 'dark',
  recentWorkspaces: [],
  lastWorkspace: '',
  showWelcomeScreen: true,
  welcomeTabClosed: false,
  fontFamily: 'Consolas',
  fontSize: 12,
  tabSize: 4,
  useSpaces: true,
  showLineNumbers: true,
  wordWrap: false,
  autoSave: false,
  autoSaveInterval: 30000,
  showStatusBar: true,
  showExplorer: true,
  editorLayout: 'single',
  openFiles: []
};

export const SETTING_KEYS: readonly SettingKey[] = [
  'theme',
  'recentWorkspaces',
  'lastWorkspace',
  'showWelcomeScreen',
  'welcomeTabClosed',
  'fontFamily',
  'fontSize',
  'tabSize',
  'useSpaces',
  'showLineNumbers',
  'wordWrap',
  'autoSave',
  'autoSaveInterval',
  'showStatusBar',
  'showExplorer',
  'editorLayout',
  'openFiles'
];

export const isLayoutPreset = (value: unknown): value is LayoutPreset =>
  value === 'single' || value === 'split-horizontal' || value === 'split-vertical';

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

const isPositiveNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

type Validators = { [K in SettingKey]: (value: unknown) => value is AppSettings[K] };

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

const VALIDATORS: Validators = {
  theme: isThemeName,
  recentWorkspaces: isStringArray,
  lastWorkspace: isString,
  showWelcomeScreen: isBoolean,
  welcomeTabClosed: isBoolean,
  fontFamily: (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0,
  fontSize: isPositiveNumber,
  tabSize: isPositiveNumber,
  useSpaces: isBoolean,
  showLineNumbers: isBoolean,
  wordWrap: isBoolean,
  autoSave: isBoolean,
  autoSaveInterval: isPositiveNumber,
  showStatusBar: isBoolean,
  showExplorer: isBoolean,
  editorLayout: isLayoutPreset,
  openFiles: isStringArray
};

/** The subset of the Web Storage API the store needs. */
export interface SettingsStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const createMemoryStorage = (): SettingsStorage => {
  const values = new Map<string, string>();
  return {
    getItem: key => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    },
    removeItem: key => {
      values.delete(key);
    }
  };
};

const copyDefault = <K extends SettingKey>(key: K): AppSettings[K] => {
  const value = DEFAULT_SETTINGS[key];
  // Array defaults are shared; hand out copies so callers cannot mutate them.
  return Array.isArray(value) ? structuredClone(value) : value;
};

export class SettingsStore {
  private listeners = new Set<SettingsListener>();

  constructor(private readonly storage: SettingsStorage) {}

  get<K extends SettingKey>(key: K): AppSettings[K] {
    let raw: string | null;
    try {
      raw = this.storage.getItem(STORAGE_PREFIX + key);
    } catch (error) {
      console.warn(`Failed to read setting "${key}":`, error);
      return copyDefault(key);
    }
    if (raw === null) return copyDefault(key);

    try {
      const parsed: unknown = JSON.parse(raw);
      return VALIDATORS[key](parsed) ? parsed : copyDefault(key);
    } catch {
      return copyDefault(key);
    }
  }

  set<K extends SettingKey>(key: K, value: AppSettings[K]): void {
    if (!VALIDATORS[key](value)) {
      console.warn(`Ignoring invalid value for setting "${key}":`, value);
      return;
    }
    try {
      this.storage.setItem(STORAGE_PREFIX + key, JSON.stringify(value));
    } catch (error) {
      console.error(`Failed to persist setting "${key}":`, error);
    }
    this.listeners.forEach(listener => listener(key, value));
  }

  getAll(): AppSettings {
    return {
      theme: this.get('theme'),
      recentWorkspaces: this.get('recentWorkspaces'),
      lastWorkspace: this.get('lastWorkspace'),
      showWelcomeScreen: this.get('showWelcomeScreen'),
      welcomeTabClosed: this.get('welcomeTabClosed'),
      fontFamily: this.get('fontFamily'),
      fontSize: this.get('fontSize'),
      tabSize: this.get('tabSize'),
      useSpaces: this.get('useSpaces'),
      showLineNumbers: this.get('showLineNumbers'),
      wordWrap: this.get('wordWrap'),
      autoSave: this.get('autoSave'),
      autoSaveInterval: this.get('autoSaveInterval'),
      showStatusBar: this.get('showStatusBar'),
      showExplorer: this.get('showExplorer'),
      editorLayout: this.get('editorLayout'),
      openFiles: this.get('openFiles')
    };
  }

  subscribe(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setTheme(theme: string): void {
    if (isThemeName(theme)) {
      this.set('theme', theme);
    }
  }

  setEditorLayout(layout: string): void {
    if (isLayoutPreset(layout)) {
      this.set('editorLayout', layout);
    }
  }

  setEditorFont(fontFamily: string, fontSize: number): void {
    this.set('fontFamily', fontFamily);
    this.set('fontSize', fontSize);
  }

  addRecentWorkspace(path: string): void {
    const recent = this.get('recentWorkspaces').filter(entry => entry !== path);
    this.set('recentWorkspaces', [path, ...recent].slice(0, MAX_RECENT_WORKSPACES));
    this.set('lastWorkspace', path);
    this.set('showWelcomeScreen', false);
  }

  reset(): void {
    SETTING_KEYS.forEach(key => {
      this.storage.removeItem(STORAGE_PREFIX + key);
    });
    const defaults = this.getAll();
    this.listeners.forEach(listener => {
      SETTING_KEYS.forEach(key => listener(key, defaults[key]));
    });
  }
}

const browserStorage = (): SettingsStorage => {
  try {
    if (typeof window !== 'undefined' && window.localStorage) {
      return window.localStorage;
    }
  } catch (error) {
    console.warn('localStorage unavailable, settings will not persist:', error);
  }
  return createMemoryStorage();
};

let sharedStore: SettingsStore | null = null;

export const getSettingsStore = (): SettingsStore => {
  if (!sharedStore) {
    sharedStore = new SettingsStore(browserStorage());
  }
  return sharedStore;
};
