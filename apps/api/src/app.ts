/**
 * Express application
 * Middleware stack, documentation and routes around a sentiment predictor
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import { createLogger } from '@sentiment/shared';

import type { ApiConfig } from './config/env';
import { openApiDocument } from './docs/swagger';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import type { SentimentPredictor } from './services/modelService';
import { createHealthRouter } from './routes/health';
import { createPredictRouter } from './routes/predict';
import { createModelRouter } from './routes/model';
import type { ServiceInfo } from './types';

const logger = createLogger('HTTP');

export interface AppOptions {
  predictor: SentimentPredictor;
  config: Pick<ApiConfig, 'corsOrigin' | 'rateLimitPerMinute' | 'isDevelopment'>;
}

export function createApp({ predictor, config }: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(helmet()); // Security headers
  app.use(compression()); // Response compression
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`);
    });
    next();
  });

  // Per-IP rate limiting on the prediction routes
  const predictLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: config.rateLimitPerMinute,
    message: { error: 'Too many requests from this IP, please try again later' },
    standardHeaders: true,
    legacyHeaders: false
  });
  app.use('/predict', predictLimiter);

  // API Documentation
  app.get('/openapi.json', (req, res) => {
    res.json(openApiDocument);
  });
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Sentiment Service API Docs'
  }));

  // Root endpoint
  app.get('/', (req, res) => {
    const info: ServiceInfo = {
      message: 'Sentiment Analysis API',
      version: '1.0.0',
      docs: '/docs',
      health: '/health'
    };
    res.json(info);
  });

  app.use(createHealthRouter(predictor));
  app.use(createPredictRouter(predictor));
  app.use(createModelRouter(predictor));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(createErrorHandler({ isDevelopment: config.isDevelopment }));

  return app;
}
