/**
 * Model information endpoint
 */

import { Router } from 'express';
import { AppError } from '../middleware/errorHandler';
import type { SentimentPredictor } from '../services/modelService';
import type { ModelInfoResponse } from '../types';

export function createModelRouter(predictor: SentimentPredictor): Router {
  const router = Router();

  /**
   * @openapi
   * /model/info:
   *   get:
   *     tags: [Model]
   *     summary: Loaded model version, training parameters and evaluation scores
   *     responses:
   *       200:
   *         description: Model details
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ModelInfo'
   *       503:
   *         $ref: '#/components/responses/ModelNotLoaded'
   */
  router.get('/model/info', (req, res) => {
    const info = predictor.getInfo();
    if (!info) {
      throw new AppError('Model not loaded', 503);
    }

    const { metadata } = info;
    const body: ModelInfoResponse = {
      model_type: metadata.modelType,
      model_version: metadata.version,
      loaded_at: info.loadedAt,
      source: info.source,
      vocabulary_size: info.vocabularySize,
      labels: metadata.labels,
      params: metadata.params,
      metrics: metadata.metrics
        ? {
          accuracy: metadata.metrics.accuracy,
          macro_f1: metadata.metrics.macroAvg.f1Score,
          weighted_f1: metadata.metrics.weightedAvg.f1Score,
          evaluated_at: metadata.evaluatedAt,
        }
        : null,
    };
    res.json(body);
  });

  return router;
}
