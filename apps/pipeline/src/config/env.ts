/**
 * Pipeline configuration
 * Directories and tracker settings from the environment, overridable per command
 */

import path from 'path';
import { getOptionalEnv, loadTrackingConfig, type TrackingConfig } from '@sentiment/shared';
import { DATA_FILES, DEFAULT_DIRS, TRACKING } from '../constants';

export interface PipelineConfig {
  paramsFile: string;
  /** Source dataset: local CSV path or http(s) URL */
  source?: string;
  rawDir: string;
  interimDir: string;
  reportsDir: string;
  modelDir: string;
  experimentName: string;
  modelName: string;
  tracking: TrackingConfig;
}

export interface DataPaths {
  rawTrain: string;
  rawTest: string;
  processedTrain: string;
  processedTest: string;
  metrics: string;
  experimentInfo: string;
}

export function loadPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const rootDir = process.cwd();

  return {
    paramsFile: path.resolve(rootDir, 'params.yaml'),
    source: getOptionalEnv('DATA_SOURCE'),
    rawDir: path.resolve(rootDir, DEFAULT_DIRS.RAW),
    interimDir: path.resolve(rootDir, DEFAULT_DIRS.INTERIM),
    reportsDir: path.resolve(rootDir, DEFAULT_DIRS.REPORTS),
    modelDir: path.resolve(rootDir, getOptionalEnv('MODEL_DIR') ?? DEFAULT_DIRS.MODEL),
    experimentName: getOptionalEnv('MLFLOW_EXPERIMENT_NAME') ?? TRACKING.DEFAULT_EXPERIMENT,
    modelName: getOptionalEnv('MODEL_NAME') ?? TRACKING.DEFAULT_MODEL_NAME,
    tracking: loadTrackingConfig(),
    ...overrides,
  };
}

export function dataPaths(config: PipelineConfig): DataPaths {
  return {
    rawTrain: path.join(config.rawDir, DATA_FILES.RAW_TRAIN),
    rawTest: path.join(config.rawDir, DATA_FILES.RAW_TEST),
    processedTrain: path.join(config.interimDir, DATA_FILES.PROCESSED_TRAIN),
    processedTest: path.join(config.interimDir, DATA_FILES.PROCESSED_TEST),
    metrics: path.join(config.reportsDir, DATA_FILES.METRICS),
    experimentInfo: path.join(config.reportsDir, DATA_FILES.EXPERIMENT_INFO),
  };
}
