/**
 * OpenAPI/Swagger documentation
 */

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { MAX_BATCH_SIZE } from '../config/env';

const predictionResponse = {
  type: 'object',
  properties: {
    text: { type: 'string', description: 'Text as submitted' },
    sentiment: { type: 'integer', enum: [-1, 0, 1], description: '-1 negative, 0 neutral, 1 positive' },
    confidence: { type: 'number', description: 'Probability of the predicted class' },
    timestamp: { type: 'string', format: 'date-time' }
  }
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Sentiment Service API',
      version: '1.0.0',
      description: 'Three-class sentiment prediction for short social media comments'
    },
    components: {
      schemas: {
        HealthStatus: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['healthy', 'unhealthy'] },
            model_loaded: { type: 'boolean' },
            model_version: { type: 'string', nullable: true },
            uptime: { type: 'integer', description: 'Seconds since start' },
            timestamp: { type: 'string', format: 'date-time' }
          }
        },
        PredictionRequest: {
          type: 'object',
          required: ['text'],
          properties: {
            text: { type: 'string', minLength: 1, example: 'This video was really helpful' }
          }
        },
        PredictionResponse: predictionResponse,
        BatchPredictionRequest: {
          type: 'object',
          required: ['texts'],
          properties: {
            texts: {
              type: 'array',
              minItems: 1,
              maxItems: MAX_BATCH_SIZE,
              items: { type: 'string', minLength: 1 }
            }
          }
        },
        BatchPredictionResponse: {
          type: 'object',
          properties: {
            predictions: { type: 'array', items: predictionResponse },
            total_count: { type: 'integer' }
          }
        },
        ModelInfo: {
          type: 'object',
          properties: {
            model_type: { type: 'string' },
            model_version: { type: 'string' },
            loaded_at: { type: 'string', format: 'date-time' },
            source: { type: 'string', description: 'Bundle directory or model URI' },
            vocabulary_size: { type: 'integer' },
            labels: { type: 'array', items: { type: 'integer' } },
            params: { type: 'object', additionalProperties: true },
            metrics: { type: 'object', nullable: true, additionalProperties: true }
          }
        },
        Error: {
          type: 'object',
          properties: {
            error: { type: 'string' }
          }
        }
      },
      responses: {
        ValidationError: {
          description: 'Malformed or invalid request body',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  error: { type: 'string', example: 'Validation error' },
                  details: {
                    type: 'array',
                    items: {
                      type: 'object',
                      properties: { path: { type: 'string' }, message: { type: 'string' } }
                    }
                  }
                }
              }
            }
          }
        },
        ModelNotLoaded: {
          description: 'No model is loaded',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } }
        }
      }
    },
    tags: [
      { name: 'Health', description: 'Service status' },
      { name: 'Prediction', description: 'Sentiment prediction' },
      { name: 'Model', description: 'Loaded model details' }
    ]
  },
  apis: [path.join(__dirname, '../routes/*.{ts,js}')] // Route files carry @openapi blocks
};

export const openApiDocument: Record<string, unknown> = Object.fromEntries(Object.entries(swaggerJsdoc(options)));
