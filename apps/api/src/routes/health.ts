/**
 * Health check endpoint
 */

import { Router } from 'express';
import type { SentimentPredictor } from '../services/modelService';
import type { HealthStatus } from '../types';

export function createHealthRouter(predictor: SentimentPredictor): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * @openapi
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: Service and model status
   *     responses:
   *       200:
   *         description: Model loaded
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/HealthStatus'
   *       503:
   *         description: No model loaded
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/HealthStatus'
   */
  router.get('/health', (req, res) => {
    const loaded = predictor.isLoaded();
    const health: HealthStatus = {
      status: loaded ? 'healthy' : 'unhealthy',
      model_loaded: loaded,
      model_version: predictor.getInfo()?.metadata.version ?? null,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    };

    res.status(loaded ? 200 : 503).json(health);
  });

  return router;
}
