import { describe, expect, it } from 'vitest';

import { DEFAULT_MAX_FILE_SIZE, DEFAULT_PORT, loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, '/work/project')).toEqual({
      port: DEFAULT_PORT,
      host: '127.0.0.1',
      workspaceRoot: '/work/project',
      maxFileSize: DEFAULT_MAX_FILE_SIZE
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        CODEPANE_PORT: '8080',
        CODEPANE_HOST: ' 0.0.0.0 ',
        CODEPANE_WORKSPACE: 'repos/app',
        CODEPANE_MAX_FILE_SIZE: '1024'
      },
      '/srv'
    );

    expect(config).toEqual({ port: 8080, host: '0.0.0.0', workspaceRoot: '/srv/repos/app', maxFileSize: 1024 });
  });

  it('ignores numbers it cannot use', () => {
    const config = loadConfig({ CODEPANE_PORT: 'abc', CODEPANE_MAX_FILE_SIZE: '-5' }, '/srv');
    expect(config.port).toBe(4317);
    expect(config.maxFileSize).toBe(5 * 1024 * 1024);
  });
});
