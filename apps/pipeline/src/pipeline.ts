/**
 * Pipeline steps
 * Each step reads the files the previous one wrote; run executes them in order
 */

import {
  PipelineError,
  createLogger,
  createMlflowClient,
  type MlflowClient,
} from '@sentiment/shared';
import { dataPaths, type DataPaths, type PipelineConfig } from './config/env';
import { loadParams, type PipelineParams } from './config/params';
import { runIngestion } from './data/ingestion';
import { runPreprocessing } from './data/preprocessing';
import { readDataset } from './data/csv';
import { runTraining } from './model/training';
import { runEvaluation } from './model/evaluation';
import { runRegistration } from './model/registration';

const log = createLogger('Pipeline');

export const PIPELINE_STEPS = ['ingest', 'preprocess', 'train', 'evaluate', 'register'] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export interface PipelineContext {
  config: PipelineConfig;
  params: PipelineParams;
  paths: DataPaths;
  tracker: MlflowClient | null;
}

export async function createContext(
  config: PipelineConfig,
  tracker: MlflowClient | null = createMlflowClient(config.tracking)
): Promise<PipelineContext> {
  return {
    config,
    params: await loadParams(config.paramsFile),
    paths: dataPaths(config),
    tracker,
  };
}

export async function runStep(step: PipelineStep, context: PipelineContext): Promise<void> {
  const { config, params, paths, tracker } = context;
  const startTime = Date.now();
  log.info(`Running step: ${step}`);

  switch (step) {
    case 'ingest': {
      if (!config.source) {
        throw new PipelineError('No data source: pass --source or set DATA_SOURCE', 'ingest');
      }
      await runIngestion(config.source, params.data_ingestion, paths);
      break;
    }
    case 'preprocess':
      await runPreprocessing(paths);
      break;
    case 'train': {
      const rows = await readDataset(paths.processedTrain, 'train');
      await runTraining(rows, { features: params.feature_engineering, model: params.model_building }, config.modelDir);
      break;
    }
    case 'evaluate': {
      const rows = await readDataset(paths.processedTest, 'evaluate');
      await runEvaluation({
        modelDir: config.modelDir,
        rows,
        metricsFile: paths.metrics,
        experimentInfoFile: paths.experimentInfo,
        params,
        tracker,
        experimentName: config.experimentName,
      });
      break;
    }
    case 'register':
      await runRegistration({
        experimentInfoFile: paths.experimentInfo,
        modelName: config.modelName,
        tracker,
      });
      break;
  }

  log.info(`Step ${step} finished in ${Date.now() - startTime}ms`);
}

/**
 * Every step in order. Registration is skipped without a tracker.
 */
export async function runPipeline(context: PipelineContext): Promise<PipelineStep[]> {
  const completed: PipelineStep[] = [];
  for (const step of PIPELINE_STEPS) {
    if (step === 'register' && !context.tracker) {
      log.warn('No tracking URI configured, skipping register');
      continue;
    }
    await runStep(step, context);
    completed.push(step);
  }
  return completed;
}
