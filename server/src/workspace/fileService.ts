import { lstat, mkdir, readdir, readFile, readlink, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import * as path from 'node:path';

import { WorkspaceError, hasErrnoCode, toWorkspaceError } from '../errors';

export interface FileInfo {
  name: string;
  path: string;
  isDir: boolean;
  size: number;
  modified: number;
  ext: string;
}

export interface FileContent {
  path: string;
  content: string;
  size: number;
  modified: number;
  ext: string;
}

export interface WorkspaceFileServiceOptions {
  readonly root: string;
  readonly maxFileSize: number;
}

const SEARCH_SKIP_DIRS = new Set(['.git', 'node_modules']);

const compareEntries = (a: FileInfo, b: FileInfo): number => {
  if (a.isDir !== b.isDir) {
    return a.isDir ? -1 : 1;
  }
  const byName = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
  return byName !== 0 ? byName : a.name.localeCompare(b.name);
};

const isInside = (root: string, target: string): boolean => {
  const relative = path.relative(root, target);
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
};

export class WorkspaceFileService {
  private root: string;
  private readonly maxFileSize: number;
  // ignoreBOM: a leading U+FEFF stays in the content
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

  constructor(options: WorkspaceFileServiceOptions) {
    this.root = path.resolve(options.root);
    this.maxFileSize = options.maxFileSize;
  }

  getRoot(): string {
    return this.root;
  }

  getName(): string {
    return path.basename(this.root) || this.root;
  }

  /** Switches the workspace to another directory on disk. */
  async setRoot(directory: string): Promise<string> {
    if (!directory.trim() || !path.isAbsolute(directory)) {
      throw new WorkspaceError('invalid_request', 'Workspace path must be absolute');
    }
    const resolved = path.resolve(directory);
    let info: Stats;
    try {
      info = await stat(resolved);
    } catch (error) {
      throw toWorkspaceError(error, directory);
    }
    if (!info.isDirectory()) {
      throw new WorkspaceError('not_a_directory', `Not a directory: ${directory}`);
    }
    this.root = resolved;
    return this.root;
  }

  /**
   * Resolves a client path against the workspace root. Client paths are
   * workspace-relative and use forward slashes; `.` and the empty string name
   * the root.
   */
  resolve(clientPath: string): string {
    const normalized = clientPath.replace(/\\/g, '/').trim() || '.';
    if (path.isAbsolute(normalized)) {
      throw new WorkspaceError('outside_workspace', `Path is outside the workspace: ${clientPath}`);
    }
    const absolute = path.resolve(this.root, normalized);
    if (!isInside(this.root, absolute)) {
      throw new WorkspaceError('outside_workspace', `Path is outside the workspace: ${clientPath}`);
    }
    return absolute;
  }

  /**
   * Like `resolve`, but also follows symlinks: the nearest existing ancestor
   * of the path must really live under the real workspace root.
   */
  async resolveReal(clientPath: string): Promise<string> {
    const absolute = this.resolve(clientPath);
    let realRoot: string;
    try {
      realRoot = await realpath(this.root);
    } catch (error) {
      throw toWorkspaceError(error, '.');
    }

    let existing = absolute;
    for (;;) {
      try {
        const real = await realpath(existing);
        if (!isInside(realRoot, real)) {
          throw new WorkspaceError('outside_workspace', `Path is outside the workspace: ${clientPath}`);
        }
        return absolute;
      } catch (error) {
        const parent = path.dirname(existing);
        if (!hasErrnoCode(error) || error.code !== 'ENOENT' || existing === this.root || parent === existing) {
          throw toWorkspaceError(error, clientPath);
        }
        // A dangling link counts as the path it points to
        const link = await this.linkTarget(existing);
        existing = link ?? parent;
      }
    }
  }

  toClientPath(absolute: string): string {
    const relative = path.relative(this.root, absolute);
    return relative === '' ? '.' : relative.split(path.sep).join('/');
  }

  async listDirectory(clientPath: string): Promise<FileInfo[]> {
    const absolute = await this.resolveReal(clientPath);
    try {
      const entries = await readdir(absolute, { withFileTypes: true });
      const files = await Promise.all(
        entries.map(async (entry) => {
          const entryPath = path.join(absolute, entry.name);
          try {
            return this.describe(entryPath, await stat(entryPath));
          } catch {
            // dangling symlinks and entries removed mid-listing are left out
            return null;
          }
        })
      );
      return files.filter((file): file is FileInfo => file !== null).sort(compareEntries);
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  async readFile(clientPath: string): Promise<FileContent> {
    const absolute = await this.resolveReal(clientPath);
    try {
      const info = await stat(absolute);
      if (info.isDirectory()) {
        throw new WorkspaceError('is_directory', `Is a directory: ${clientPath}`);
      }
      if (info.size > this.maxFileSize) {
        throw new WorkspaceError('file_too_large', `File is larger than ${this.maxFileSize} bytes: ${clientPath}`);
      }
      const buffer = await readFile(absolute);
      let content: string;
      try {
        content = this.decoder.decode(buffer);
      } catch {
        throw new WorkspaceError('binary_file', `Not a UTF-8 text file: ${clientPath}`);
      }
      const described = this.describe(absolute, info);
      return {
        path: described.path,
        content,
        size: described.size,
        modified: described.modified,
        ext: described.ext
      };
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  async writeFile(clientPath: string, content: string): Promise<FileInfo> {
    const absolute = await this.resolveReal(clientPath);
    if (absolute === this.root) {
      throw new WorkspaceError('is_directory', 'Cannot write to the workspace root');
    }
    try {
      await mkdir(path.dirname(absolute), { recursive: true });
      await writeFile(absolute, content, 'utf8');
      return this.describe(absolute, await stat(absolute));
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  async createFile(clientPath: string): Promise<FileInfo> {
    const absolute = await this.resolveReal(clientPath);
    try {
      await writeFile(absolute, '', { encoding: 'utf8', flag: 'wx' });
      return this.describe(absolute, await stat(absolute));
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  async createDirectory(clientPath: string): Promise<FileInfo> {
    const absolute = await this.resolveReal(clientPath);
    if (await this.exists(absolute)) {
      throw new WorkspaceError('already_exists', `Already exists: ${clientPath}`);
    }
    try {
      await mkdir(absolute, { recursive: true });
      return this.describe(absolute, await stat(absolute));
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  async rename(fromPath: string, toPath: string): Promise<FileInfo> {
    const from = await this.resolveReal(fromPath);
    const to = await this.resolveReal(toPath);
    if (from === this.root) {
      throw new WorkspaceError('invalid_request', 'Cannot rename the workspace root');
    }
    if (await this.exists(to)) {
      throw new WorkspaceError('already_exists', `Already exists: ${toPath}`);
    }
    try {
      await rename(from, to);
      return this.describe(to, await stat(to));
    } catch (error) {
      throw toWorkspaceError(error, fromPath);
    }
  }

  async remove(clientPath: string): Promise<void> {
    const absolute = await this.resolveReal(clientPath);
    if (absolute === this.root) {
      throw new WorkspaceError('invalid_request', 'Cannot delete the workspace root');
    }
    try {
      await rm(absolute, { recursive: true });
    } catch (error) {
      throw toWorkspaceError(error, clientPath);
    }
  }

  /**
   * Breadth-first search for files whose name contains `query`
   * (case-insensitive). Directories in SEARCH_SKIP_DIRS are not entered.
   */
  async searchFiles(query: string, limit: number): Promise<FileInfo[]> {
    const needle = query.trim().toLowerCase();
    if (!needle || limit <= 0) {
      return [];
    }

    const results: FileInfo[] = [];
    const queue: string[] = [this.root];

    while (queue.length > 0 && results.length < limit) {
      const directory = queue.shift();
      if (directory === undefined) {
        break;
      }
      let entries: Dirent[];
      try {
        entries = await readdir(directory, { withFileTypes: true });
      } catch (error) {
        if (directory === this.root) {
          throw toWorkspaceError(error, '.');
        }
        continue;
      }
      entries.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));

      for (const entry of entries) {
        const entryPath = path.join(directory, entry.name);
        if (entry.isDirectory()) {
          if (!SEARCH_SKIP_DIRS.has(entry.name)) {
            queue.push(entryPath);
          }
          continue;
        }
        if (!entry.name.toLowerCase().includes(needle)) {
          continue;
        }
        try {
          results.push(this.describe(entryPath, await stat(entryPath)));
        } catch {
          continue;
        }
        if (results.length >= limit) {
          break;
        }
      }
    }

    return results;
  }

  private async linkTarget(absolute: string): Promise<string | null> {
    try {
      if (!(await lstat(absolute)).isSymbolicLink()) return null;
      return path.resolve(path.dirname(absolute), await readlink(absolute));
    } catch (error) {
      if (hasErrnoCode(error) && error.code === 'ENOENT') return null;
      throw toWorkspaceError(error, this.toClientPath(absolute));
    }
  }

  private async exists(absolute: string): Promise<boolean> {
    try {
      await stat(absolute);
      return true;
    } catch {
      return false;
    }
  }

  private describe(absolute: string, info: Stats): FileInfo {
    const name = path.basename(absolute);
    const isDir = info.isDirectory();
    return {
      name,
      path: this.toClientPath(absolute),
      isDir,
      size: isDir ? 0 : info.size,
      modified: Math.floor(info.mtimeMs / 1000),
      ext: isDir ? '' : path.extname(name).toLowerCase()
    };
  }
}
