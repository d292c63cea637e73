import http from 'node:http';

import type { ServerConfig } from './config';
import { createFileRouter } from './http/fileRoutes';
import type { Logger } from './logger';
import { WorkspaceFileService } from './workspace/fileService';

export interface AppServerOptions {
  readonly config: ServerConfig;
  readonly logger: Logger;
}

export interface AppServer {
  readonly server: http.Server;
  readonly files: WorkspaceFileService;
  /** Resolves with the port actually bound, which differs from config when it is 0. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export const createAppServer = (options: AppServerOptions): AppServer => {
  const { config, logger } = options;
  const files = new WorkspaceFileService({ root: config.workspaceRoot, maxFileSize: config.maxFileSize });
  const router = createFileRouter({ files, logger });

  const server = http.createServer((req, res) => {
    router(req, res)
      .then((handled) => {
        if (!handled) {
          res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
          res.end('Not found');
        }
      })
      .catch((error: unknown) => {
        logger.error('Unhandled error processing request', {
          error: error instanceof Error ? error.message : 'unknown'
        });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json; charset=utf-8' });
        }
        res.end(JSON.stringify({ message: 'Internal server error', code: 'internal' }));
      });
  });

  return {
    server,
    files,
    async start() {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : config.port;
      logger.info('File server listening', { host: config.host, port, workspace: files.getRoot() });
      return port;
    },
    async stop() {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    }
  };
};
