/**
 * Main API server
 * Loads the sentiment model and serves predictions over HTTP
 */

import { createLogger, createMlflowClient, getErrorMessage } from '@sentiment/shared';
import { createApp } from './app';
import { loadApiConfig } from './config/env';
import { ModelService } from './services/modelService';

const logger = createLogger('Server');

async function start(): Promise<void> {
  const config = loadApiConfig();
  const modelService = new ModelService({
    modelDir: config.modelDir,
    modelUri: config.modelUri,
    cacheDir: config.modelCacheDir,
    tracker: createMlflowClient(config.tracking),
  });

  // Without a model the server still starts and reports itself unhealthy
  try {
    await modelService.load();
  } catch (error) {
    logger.error(`Failed to load model: ${getErrorMessage(error)}`);
  }

  const app = createApp({ predictor: modelService, config });
  const server = app.listen(config.port, config.host, () => {
    logger.info(`API server running on http://${config.host}:${config.port}`);
    logger.info(`Documentation available at http://localhost:${config.port}/docs`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
      modelService.dispose();
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch(error => {
  logger.error(`Failed to start server: ${getErrorMessage(error)}`);
  process.exit(1);
});
