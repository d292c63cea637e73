import * as path from 'node:path';

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly workspaceRoot: string;
  readonly maxFileSize: number;
}

export const DEFAULT_PORT = 4317;
export const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export const loadConfig = (env: RawEnv = process.env, cwd: string = process.cwd()): ServerConfig => {
  const workspace = env.CODEPANE_WORKSPACE?.trim();

  return {
    port: toInt(env.CODEPANE_PORT, DEFAULT_PORT),
    host: env.CODEPANE_HOST?.trim() || '127.0.0.1',
    workspaceRoot: workspace ? path.resolve(cwd, workspace) : cwd,
    maxFileSize: toInt(env.CODEPANE_MAX_FILE_SIZE, DEFAULT_MAX_FILE_SIZE)
  };
};
