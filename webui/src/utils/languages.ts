import { Extension } from '@codemirror/state';
import { javascript } from '@codemirror/lang-javascript';
import { python } from '@codemirror/lang-python';
import { go } from '@codemirror/lang-go';
import { json } from '@codemirror/lang-json';
import { html } from '@codemirror/lang-html';
import { css } from '@codemirror/lang-css';
import { markdown } from '@codemirror/lang-markdown';

import languageTable from '../data/languages.json';

export interface LanguageInfo {
  id: string;
  name: string;
}

const NAMES = new Map<string, string>(Object.entries(languageTable.names));
const BY_EXTENSION = new Map<string, string>(Object.entries(languageTable.extensions));
const BY_FILE_NAME = new Map<string, string>(Object.entries(languageTable.fileNames));

export const PLAIN_TEXT: LanguageInfo = { id: 'text', name: 'Text' };

const baseName = (fileName: string): string => {
  const parts = fileName.split(/[\\/]/);
  return parts[parts.length - 1] ?? fileName;
};

export const fileExtension = (fileName: string): string => {
  const name = baseName(fileName);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
};

export const detectLanguage = (fileName: string): LanguageInfo => {
  const id = BY_FILE_NAME.get(baseName(fileName)) ?? BY_EXTENSION.get(fileExtension(fileName));
  if (!id) return PLAIN_TEXT;
  return { id, name: NAMES.get(id) ?? id };
};

export const getLanguageName = (languageId: string): string => NAMES.get(languageId) ?? PLAIN_TEXT.name;

// Languages without a CodeMirror package render as plain text.
export const getLanguageSupport = (fileName: string): Extension[] => {
  const ext = fileExtension(fileName);

  switch (detectLanguage(fileName).id) {
    case 'javascript':
      return [javascript({ jsx: ext === '.jsx' })];
    case 'typescript':
      return [javascript({ typescript: true, jsx: ext === '.tsx' })];
    case 'python':
      return [python()];
    case 'go':
      return [go()];
    case 'json':
      return [json()];
    case 'html':
      return [html()];
    case 'css':
      return [css()];
    case 'markdown':
      return [markdown()];
    default:
      return [];
  }
};
