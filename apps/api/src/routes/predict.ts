/**
 * Prediction endpoints
 */

import { Router } from 'express';
import type { Prediction } from '@sentiment/shared';
import { AppError } from '../middleware/errorHandler';
import { schemas } from '../middleware/validation';
import type { SentimentPredictor } from '../services/modelService';
import type { BatchPredictionResponse, PredictionResponse } from '../types';

function toResponse(text: string, prediction: Prediction, timestamp: string): PredictionResponse {
  return {
    text,
    sentiment: prediction.label,
    confidence: prediction.confidence,
    timestamp,
  };
}

export function createPredictRouter(predictor: SentimentPredictor): Router {
  const router = Router();

  function requireModel(): void {
    if (!predictor.isLoaded()) {
      throw new AppError('Model not loaded', 503);
    }
  }

  /**
   * @openapi
   * /predict:
   *   post:
   *     tags: [Prediction]
   *     summary: Sentiment of one comment
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/PredictionRequest'
   *     responses:
   *       200:
   *         description: Predicted sentiment
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/PredictionResponse'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       503:
   *         $ref: '#/components/responses/ModelNotLoaded'
   */
  router.post('/predict', (req, res) => {
    const { text } = schemas.predict.parse(req.body);
    requireModel();

    const [prediction] = predictor.predict([text]);
    res.json(toResponse(text, prediction, new Date().toISOString()));
  });

  /**
   * @openapi
   * /predict/batch:
   *   post:
   *     tags: [Prediction]
   *     summary: Sentiment of up to 100 comments, in input order
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/BatchPredictionRequest'
   *     responses:
   *       200:
   *         description: One prediction per input text
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/BatchPredictionResponse'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       503:
   *         $ref: '#/components/responses/ModelNotLoaded'
   */
  router.post('/predict/batch', (req, res) => {
    const { texts } = schemas.batchPredict.parse(req.body);
    requireModel();

    const predictions = predictor.predict(texts);
    if (predictions.length !== texts.length) {
      throw new AppError(`Model returned ${predictions.length} predictions for ${texts.length} texts`, 500, false);
    }

    const timestamp = new Date().toISOString();
    const body: BatchPredictionResponse = {
      predictions: predictions.map((prediction, i) => toResponse(texts[i], prediction, timestamp)),
      total_count: predictions.length,
    };
    res.json(body);
  });

  return router;
}
