import type { IncomingMessage, ServerResponse } from 'node:http';

import { WorkspaceError, toWorkspaceError } from '../errors';
import type { Logger } from '../logger';
import type { WorkspaceFileService } from '../workspace/fileService';
import { readJsonBody, requireString, sendError, sendJson } from './utils';

interface FileRouterDependencies {
  readonly files: WorkspaceFileService;
  readonly logger: Logger;
}

const DEFAULT_SEARCH_LIMIT = 200;
const MAX_SEARCH_LIMIT = 1000;

const requireQueryPath = (url: URL): string => {
  const value = url.searchParams.get('path');
  if (value === null || value.trim() === '') {
    throw new WorkspaceError('invalid_request', 'Missing "path" query parameter');
  }
  return value;
};

const parseLimit = (value: string | null): number => {
  if (!value) {
    return DEFAULT_SEARCH_LIMIT;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_SEARCH_LIMIT;
  }
  return Math.min(parsed, MAX_SEARCH_LIMIT);
};

const workspacePayload = (files: WorkspaceFileService) => ({
  message: 'success',
  root: files.getRoot(),
  name: files.getName()
});

export const createFileRouter = (dependencies: FileRouterDependencies) => {
  const { files, logger } = dependencies;

  const dispatch = async (req: IncomingMessage, res: ServerResponse, url: URL, route: string): Promise<boolean> => {
    switch (route) {
      case 'GET /api/health':
        sendJson(res, { status: 'ok' });
        return true;
      case 'GET /api/workspace':
        sendJson(res, workspacePayload(files));
        return true;
      case 'POST /api/workspace': {
        const body = await readJsonBody(req);
        await files.setRoot(requireString(body, 'path'));
        logger.info('Workspace opened', { root: files.getRoot() });
        sendJson(res, workspacePayload(files));
        return true;
      }
      case 'GET /api/files': {
        const dir = url.searchParams.get('path') || '.';
        const listing = await files.listDirectory(dir);
        sendJson(res, { message: 'success', path: files.toClientPath(files.resolve(dir)), files: listing });
        return true;
      }
      case 'GET /api/files/search': {
        const query = url.searchParams.get('q') ?? '';
        const results = await files.searchFiles(query, parseLimit(url.searchParams.get('limit')));
        sendJson(res, { message: 'success', files: results });
        return true;
      }
      case 'POST /api/files/create': {
        const body = await readJsonBody(req);
        const target = requireString(body, 'path');
        const type = requireString(body, 'type');
        if (type !== 'file' && type !== 'directory') {
          throw new WorkspaceError('invalid_request', 'type must be "file" or "directory"');
        }
        const created = type === 'file' ? await files.createFile(target) : await files.createDirectory(target);
        sendJson(res, { message: 'success', file: created }, { status: 201 });
        return true;
      }
      case 'POST /api/files/rename': {
        const body = await readJsonBody(req);
        const renamed = await files.rename(requireString(body, 'from'), requireString(body, 'to'));
        sendJson(res, { message: 'success', file: renamed });
        return true;
      }
      case 'GET /api/file': {
        const file = await files.readFile(requireQueryPath(url));
        sendJson(res, { message: 'success', ...file });
        return true;
      }
      case 'POST /api/file': {
        const target = requireQueryPath(url);
        const body = await readJsonBody(req);
        const saved = await files.writeFile(target, requireString(body, 'content'));
        sendJson(res, { message: 'File saved successfully', path: saved.path, file: saved });
        return true;
      }
      case 'DELETE /api/file': {
        await files.remove(requireQueryPath(url));
        sendJson(res, { message: 'success' });
        return true;
      }
      default:
        return false;
    }
  };

  return async (req: IncomingMessage, res: ServerResponse): Promise<boolean> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname.replace(/\/+$/, '') || '/';
    if (!pathname.startsWith('/api')) {
      return false;
    }

    const route = `${req.method ?? 'GET'} ${pathname}`;
    const startedAt = Date.now();

    try {
      if (!(await dispatch(req, res, url, route))) {
        sendError(res, new WorkspaceError('not_found', 'Not found'));
      }
      logger.info('Request handled', { route, status: res.statusCode, durationMs: Date.now() - startedAt });
    } catch (error) {
      const failure = toWorkspaceError(error, url.searchParams.get('path') ?? pathname);
      if (failure.code === 'internal') {
        logger.error('Request failed', { route, error: failure.message });
      } else {
        logger.warn('Request rejected', { route, code: failure.code });
      }
      sendError(res, failure);
    }
    return true;
  };
};
