import type { IncomingMessage, ServerResponse } from 'node:http';

import { WorkspaceError } from '../errors';

export const MAX_BODY_SIZE = 10 * 1024 * 1024;

export const readJsonBody = async (req: IncomingMessage, maxBytes: number = MAX_BODY_SIZE): Promise<unknown> => {
  return new Promise<unknown>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) {
        return;
      }
      total += chunk.length;
      if (total > maxBytes) {
        rejected = true;
        reject(new WorkspaceError('file_too_large', 'Request body too large'));
        req.resume();
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (rejected) {
        return;
      }
      if (chunks.length === 0) {
        resolve(null);
        return;
      }
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString('utf8')));
      } catch {
        reject(new WorkspaceError('invalid_request', 'Request body is not valid JSON'));
      }
    });

    req.on('error', (error) => {
      reject(error);
    });
  });
};

export interface JsonResponseOptions {
  readonly status?: number;
  readonly headers?: Record<string, string>;
}

export const sendJson = (res: ServerResponse, data: unknown, options: JsonResponseOptions = {}): void => {
  const status = options.status ?? 200;
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Cache-Control': 'no-store',
    ...options.headers
  });
  res.end(JSON.stringify(data));
};

export const sendError = (res: ServerResponse, error: WorkspaceError): void => {
  sendJson(res, { message: error.message, code: error.code }, { status: error.status });
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/** Reads a string field from a parsed JSON body, failing the request when it is missing. */
export const requireString = (body: unknown, field: string): string => {
  if (!isRecord(body)) {
    throw new WorkspaceError('invalid_request', 'Expected a JSON object body');
  }
  const value = body[field];
  if (typeof value !== 'string') {
    throw new WorkspaceError('invalid_request', `Missing string field "${field}"`);
  }
  return value;
};
