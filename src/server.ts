import type { Server } from 'node:http';

import { createApp } from './app';
import { config } from './config';
import { validateApiToken } from './middleware/auth';
import { FileLocalStore, FileRemoteStore, TrackerRepository } from './storage';
import { SyncEngine } from './sync/SyncEngine';
import { HealthTracker } from './tracker/HealthTracker';
import { logger } from './utils/logger';

let server: Server | undefined;

const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Nothing to drain
    process.exit(0);
  }
  server.close(() => {
    logger.info('Server closed');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, config.server.shutdownTimeoutMs).unref();
};

try {
  validateApiToken(process.env[config.auth.tokenEnvVar]);

  const localStore = new FileLocalStore();
  await localStore.init();
  const tracker = await HealthTracker.open({ repository: new TrackerRepository(localStore) });
  const sync = new SyncEngine({ remote: new FileRemoteStore(), target: tracker });

  sync.on('statusChanged', (status) => {
    if (status.state === 'failed') {
      logger.warn('Sync failed', { direction: status.lastDirection, error: status.lastError });
    }
  });

  const app = createApp({ sync, tracker });
  server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server started', {
      dataDir: config.storage.dataDir,
      host: config.server.host,
      maxReadingsPerSession: config.session.maxReadingsPerSession ?? 'unlimited',
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: config.server.port,
      remoteStoreDir: config.sync.remoteStoreDir,
    });
  });

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to initialize server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
