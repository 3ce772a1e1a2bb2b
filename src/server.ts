import { loadEnv, loadServerConfig } from './config/env';
loadEnv();

import { createApp } from './app';
import { logger } from './config/logger';
import { getAlignmentConfig } from './config/alignment.config';
import { closeQueues, watchCaptionAlignmentQueue } from './config/redis';
import createCaptionAlignmentWorker from './jobs/captionAlignment.worker';

const startServer = async () => {
  const config = loadServerConfig();
  // Fail fast on bad engine settings instead of on the first request
  const alignment = getAlignmentConfig().alignment;

  const app = createApp({ corsOrigin: config.FRONTEND_URL, jsonBodyLimit: config.JSON_BODY_LIMIT });

  const worker = config.ENABLE_ALIGNMENT_WORKER
    ? createCaptionAlignmentWorker(config.ALIGNMENT_WORKER_CONCURRENCY)
    : null;
  if (worker) {
    watchCaptionAlignmentQueue();
  }

  const server = app.listen(config.PORT, () => {
    logger.info(`Server running on port ${config.PORT}`);
    logger.info(`Environment: ${config.NODE_ENV}`);
    logger.info(`Alignment defaults: granularity=${alignment.granularity}, locale=${alignment.locale}`);
  });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close();
    await worker?.close();
    await closeQueues();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: Error) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: Error) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
};

startServer().catch((error: Error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});

// Handle unhandled rejections
process.on('unhandledRejection', (err: Error) => {
  logger.error('Unhandled Rejection:', err);
  process.exit(1);
});
