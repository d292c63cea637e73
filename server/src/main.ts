import { loadConfig } from './config';
import { createAppServer } from './index';
import { createConsoleLogger } from './logger';

const logger = createConsoleLogger();
const app = createAppServer({ config: loadConfig(), logger });

const shutdown = (signal: string) => {
  logger.info('Shutting down', { signal });
  app.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Failed to stop cleanly', { error: error instanceof Error ? error.message : 'unknown' });
      process.exit(1);
    }
  );
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

app.start().catch((error: unknown) => {
  logger.error('Failed to start file server', { error: error instanceof Error ? error.message : 'unknown' });
  process.exit(1);
});
