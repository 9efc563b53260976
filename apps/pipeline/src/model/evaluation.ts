/**
 * Model evaluation
 * Score the bundle on the held-out set, write the report and log the run to the tracker
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
  PipelineError,
  SentimentModel,
  createLogger,
  getErrorMessage,
  loadModelBundle,
  updateBundleMetadata,
  type EvaluationMetrics,
  type LabeledComment,
  type MlflowClient,
} from '@sentiment/shared';
import { flattenParams, type PipelineParams } from '../config/params';
import { DATA_FILES, TRACKING } from '../constants';
import { metricsCalculator } from './metrics';

const log = createLogger('ModelEvaluation');

// ============================================
// Types
// ============================================

export const experimentInfoSchema = z.object({
  run_id: z.string().min(1),
  model_path: z.string().min(1),
});

/** Written by evaluation for registration to pick up */
export type ExperimentInfo = z.infer<typeof experimentInfoSchema>;

export interface EvaluationOptions {
  modelDir: string;
  rows: LabeledComment[];
  metricsFile: string;
  experimentInfoFile: string;
  params: PipelineParams;
  tracker: MlflowClient | null;
  experimentName: string;
}

export interface EvaluationResult {
  modelVersion: string;
  metrics: EvaluationMetrics;
  runId?: string;
}

// ============================================
// Evaluation
// ============================================

/**
 * Predict every row with the model and compare against its label
 */
export function evaluateRows(model: SentimentModel, rows: LabeledComment[]): EvaluationMetrics {
  if (rows.length === 0) {
    throw new PipelineError('Test set is empty', 'evaluate');
  }
  const predictions = model.predict(rows.map(row => row.clean_comment));
  return metricsCalculator.evaluate(
    predictions.map(p => p.label),
    rows.map(row => row.category)
  );
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

async function logToTracker(
  tracker: MlflowClient,
  options: EvaluationOptions,
  modelVersion: string,
  metrics: EvaluationMetrics
): Promise<string> {
  const experimentId = await tracker.getOrCreateExperiment(options.experimentName);
  const run = await tracker.createRun(experimentId, {
    runName: `evaluate-${modelVersion}`,
    tags: { model_version: modelVersion, step: 'evaluation' },
  });
  log.info(`Logging evaluation to run ${run.run_id} in experiment ${options.experimentName}`);

  try {
    await tracker.logBatch(run.run_id, {
      params: flattenParams(options.params),
      metrics: metricsCalculator.toTrackerMetrics(metrics),
    });
    await tracker.uploadDirectory(run, options.modelDir, TRACKING.MODEL_ARTIFACT_PATH);
    await tracker.uploadArtifact(run, DATA_FILES.METRICS, await fs.readFile(options.metricsFile));
    await tracker.finishRun(run.run_id, 'FINISHED');
  } catch (error) {
    log.error(`Evaluation run ${run.run_id} failed: ${getErrorMessage(error)}`);
    await tracker.finishRun(run.run_id, 'FAILED').catch((finishError: unknown) => {
      log.warn(`Could not mark run ${run.run_id} as failed: ${getErrorMessage(finishError)}`);
    });
    throw error;
  }

  const info: ExperimentInfo = { run_id: run.run_id, model_path: TRACKING.MODEL_ARTIFACT_PATH };
  await writeJson(options.experimentInfoFile, info);
  return run.run_id;
}

export async function runEvaluation(options: EvaluationOptions): Promise<EvaluationResult> {
  // Only a run logged by this evaluation may be left for registration
  await fs.rm(options.experimentInfoFile, { force: true });

  const model = new SentimentModel(await loadModelBundle(options.modelDir));

  try {
    const metrics = evaluateRows(model, options.rows);
    const modelVersion = model.metadata.version;
    const evaluatedAt = new Date().toISOString();

    log.info(`Classification report for ${modelVersion}:\n${metricsCalculator.formatReport(metrics)}`);
    log.info(`Confusion matrix:\n${metricsCalculator.formatConfusionMatrix(metrics.confusionMatrix)}`);

    await writeJson(options.metricsFile, { modelVersion, evaluatedAt, ...metrics });
    await updateBundleMetadata(options.modelDir, { metrics, evaluatedAt });

    if (!options.tracker) {
      log.info('No tracking URI configured, evaluation kept local');
      return { modelVersion, metrics };
    }

    const runId = await logToTracker(options.tracker, options, modelVersion, metrics);
    return { modelVersion, metrics, runId };
  } finally {
    model.dispose();
  }
}
