import { FileInfo } from '../types/editor';

export interface WorkspaceInfo {
  root: string;
  name: string;
}

export interface FileContent {
  path: string;
  content: string;
  size: number;
  modified: number;
  ext: string;
}

/** Workspace file operations, served by the local file server under /api. */
export interface FileApi {
  getWorkspace(): Promise<WorkspaceInfo>;
  openWorkspace(path: string): Promise<WorkspaceInfo>;
  listDirectory(path: string): Promise<FileInfo[]>;
  searchFiles(query: string, limit?: number): Promise<FileInfo[]>;
  readFile(path: string): Promise<FileContent>;
  writeFile(path: string, content: string): Promise<FileInfo>;
  createFile(path: string): Promise<FileInfo>;
  createDirectory(path: string): Promise<FileInfo>;
  rename(from: string, to: string): Promise<FileInfo>;
  remove(path: string): Promise<void>;
}

export class FileApiError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = 'FileApiError';
    this.code = code;
    this.status = status;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isFileInfo = (value: unknown): value is FileInfo =>
  isRecord(value) &&
  typeof value.name === 'string' &&
  typeof value.path === 'string' &&
  typeof value.isDir === 'boolean' &&
  typeof value.size === 'number' &&
  typeof value.modified === 'number' &&
  typeof value.ext === 'string';

const expectFileInfo = (value: unknown): FileInfo => {
  if (!isFileInfo(value)) {
    throw new FileApiError('Malformed file entry in response', 'invalid_response', 0);
  }
  return value;
};

const expectFileList = (value: unknown): FileInfo[] => {
  if (!Array.isArray(value)) {
    throw new FileApiError('Malformed file list in response', 'invalid_response', 0);
  }
  return value.map(expectFileInfo);
};

const expectWorkspace = (data: Record<string, unknown>): WorkspaceInfo => {
  if (typeof data.root !== 'string' || typeof data.name !== 'string') {
    throw new FileApiError('Malformed workspace response', 'invalid_response', 0);
  }
  return { root: data.root, name: data.name };
};

const query = (params: Record<string, string>): string => new URLSearchParams(params).toString();

class FileApiClient implements FileApi {
  private static instance: FileApiClient;

  private constructor() {}

  static getInstance(): FileApiClient {
    if (!FileApiClient.instance) {
      FileApiClient.instance = new FileApiClient();
    }
    return FileApiClient.instance;
  }

  private async request(url: string, init?: RequestInit): Promise<Record<string, unknown>> {
    const response = await fetch(url, init);
    let data: unknown = null;
    try {
      data = await response.json();
    } catch (error) {
      if (response.ok) {
        console.error('Invalid JSON from', url, error);
        throw new FileApiError('Invalid response from file server', 'invalid_response', response.status);
      }
    }

    if (!response.ok) {
      const message = isRecord(data) && typeof data.message === 'string'
        ? data.message
        : `HTTP error! status: ${response.status}`;
      const code = isRecord(data) && typeof data.code === 'string' ? data.code : 'http_error';
      throw new FileApiError(message, code, response.status);
    }
    if (!isRecord(data)) {
      throw new FileApiError('Invalid response from file server', 'invalid_response', response.status);
    }
    return data;
  }

  private postJson(url: string, body: unknown): Promise<Record<string, unknown>> {
    return this.request(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });
  }

  async getWorkspace(): Promise<WorkspaceInfo> {
    return expectWorkspace(await this.request('/api/workspace'));
  }

  async openWorkspace(path: string): Promise<WorkspaceInfo> {
    return expectWorkspace(await this.postJson('/api/workspace', { path }));
  }

  async listDirectory(path: string): Promise<FileInfo[]> {
    const data = await this.request(`/api/files?${query({ path })}`);
    return expectFileList(data.files);
  }

  async searchFiles(text: string, limit = 200): Promise<FileInfo[]> {
    const data = await this.request(`/api/files/search?${query({ q: text, limit: String(limit) })}`);
    return expectFileList(data.files);
  }

  async readFile(path: string): Promise<FileContent> {
    const data = await this.request(`/api/file?${query({ path })}`);
    if (
      typeof data.path !== 'string' ||
      typeof data.content !== 'string' ||
      typeof data.size !== 'number' ||
      typeof data.modified !== 'number' ||
      typeof data.ext !== 'string'
    ) {
      throw new FileApiError('Malformed file response', 'invalid_response', 200);
    }
    return { path: data.path, content: data.content, size: data.size, modified: data.modified, ext: data.ext };
  }

  async writeFile(path: string, content: string): Promise<FileInfo> {
    const data = await this.postJson(`/api/file?${query({ path })}`, { content });
    if (data.message !== 'File saved successfully') {
      throw new FileApiError(`Unexpected save response for ${path}`, 'invalid_response', 200);
    }
    return expectFileInfo(data.file);
  }

  async createFile(path: string): Promise<FileInfo> {
    const data = await this.postJson('/api/files/create', { path, type: 'file' });
    return expectFileInfo(data.file);
  }

  async createDirectory(path: string): Promise<FileInfo> {
    const data = await this.postJson('/api/files/create', { path, type: 'directory' });
    return expectFileInfo(data.file);
  }

  async rename(from: string, to: string): Promise<FileInfo> {
    const data = await this.postJson('/api/files/rename', { from, to });
    return expectFileInfo(data.file);
  }

  async remove(path: string): Promise<void> {
    await this.request(`/api/file?${query({ path })}`, { method: 'DELETE' });
  }
}

export { FileApiClient };
