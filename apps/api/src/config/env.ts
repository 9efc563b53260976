/**
 * API configuration from the environment
 */

import path from 'path';
import {
  getEnvNumber,
  getOptionalEnv,
  loadTrackingConfig,
  type TrackingConfig,
} from '@sentiment/shared';

export interface ApiConfig {
  port: number;
  host: string;
  corsOrigin: string;
  rateLimitPerMinute: number;
  /** Local bundle directory, used when no model URI is set */
  modelDir: string;
  /** runs:/ or models:/ URI to download the bundle from */
  modelUri?: string;
  modelCacheDir: string;
  tracking: TrackingConfig;
  isDevelopment: boolean;
}

export const MAX_BATCH_SIZE = 100;

export function loadApiConfig(): ApiConfig {
  return {
    port: getEnvNumber('PORT', 8000),
    host: getOptionalEnv('HOST') ?? '0.0.0.0',
    corsOrigin: getOptionalEnv('CORS_ORIGIN') ?? '*',
    rateLimitPerMinute: getEnvNumber('RATE_LIMIT_PER_MINUTE', 100),
    modelDir: path.resolve(getOptionalEnv('MODEL_DIR') ?? 'models'),
    modelUri: getOptionalEnv('MLFLOW_MODEL_URI'),
    modelCacheDir: path.resolve(getOptionalEnv('MODEL_CACHE_DIR') ?? '.model-cache'),
    tracking: loadTrackingConfig(),
    isDevelopment: process.env.NODE_ENV === 'development',
  };
}
