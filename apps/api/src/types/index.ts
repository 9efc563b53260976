/**
 * Shared types for API
 * Response bodies use the field names clients of the service already read
 */

import type { SentimentLabel } from '@sentiment/shared';

export interface ServiceInfo {
  message: string;
  version: string;
  docs: string;
  health: string;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  model_loaded: boolean;
  model_version: string | null;
  uptime: number; // seconds
  timestamp: string;
}

export interface PredictionResponse {
  text: string;
  sentiment: SentimentLabel;
  confidence: number;
  timestamp: string;
}

export interface BatchPredictionResponse {
  predictions: PredictionResponse[];
  total_count: number;
}

export interface ModelInfoResponse {
  model_type: string;
  model_version: string;
  loaded_at: string;
  source: string;
  vocabulary_size: number;
  labels: SentimentLabel[];
  params: Record<string, string | number | boolean>;
  metrics: {
    accuracy: number;
    macro_f1: number;
    weighted_f1: number;
    evaluated_at?: string;
  } | null;
}
