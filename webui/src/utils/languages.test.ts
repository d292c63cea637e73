import { describe, expect, it } from 'vitest';

import { detectLanguage, fileExtension, getLanguageName, getLanguageSupport } from './languages';

describe('languages', () => {
  it('detects languages by extension', () => {
    expect(detectLanguage('src/App.tsx')).toEqual({ id: 'typescript', name: 'TypeScript' });
    expect(detectLanguage('tools/build.PY')).toEqual({ id: 'python', name: 'Python' });
    expect(detectLanguage('README.md')).toEqual({ id: 'markdown', name: 'Markdown' });
    expect(detectLanguage('config.yaml')).toEqual({ id: 'yaml', name: 'YAML' });
  });

  it('detects well-known file names without an extension', () => {
    expect(detectLanguage('Makefile')).toEqual({ id: 'makefile', name: 'Makefile' });
    expect(detectLanguage('docker/Dockerfile')).toEqual({ id: 'dockerfile', name: 'Dockerfile' });
  });

  it('falls back to plain text', () => {
    expect(detectLanguage('notes.unknown')).toEqual({ id: 'text', name: 'Text' });
    expect(detectLanguage('LICENSE')).toEqual({ id: 'text', name: 'Text' });
    expect(getLanguageName('nope')).toBe('Text');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(detectLanguage('constructor')).toEqual({ id: 'text', name: 'Text' });
    expect(detectLanguage('src/toString')).toEqual({ id: 'text', name: 'Text' });
    expect(getLanguageName('hasOwnProperty')).toBe('Text');
  });

  it('extracts lower-cased extensions', () => {
    expect(fileExtension('a/b/Main.GO')).toBe('.go');
    expect(fileExtension('archive.tar.gz')).toBe('.gz');
    expect(fileExtension('.gitignore')).toBe('');
    expect(fileExtension('Makefile')).toBe('');
  });

  it('provides highlighting only for bundled languages', () => {
    expect(getLanguageSupport('main.go')).toHaveLength(1);
    expect(getLanguageSupport('index.html')).toHaveLength(1);
    expect(getLanguageSupport('lib.rs')).toEqual([]);
    expect(getLanguageSupport('notes.txt')).toEqual([]);
  });
});
