/**
 * Model registration
 * Register the evaluated model in the tracker's registry and stage it
 */

import fs from 'fs/promises';
import {
  PipelineError,
  createLogger,
  getErrorMessage,
  type MlflowClient,
  type ModelVersion,
} from '@sentiment/shared';
import { TRACKING } from '../constants';
import { experimentInfoSchema, type ExperimentInfo } from './evaluation';

const log = createLogger('ModelRegistration');

export interface RegistrationOptions {
  experimentInfoFile: string;
  modelName: string;
  tracker: MlflowClient | null;
  stage?: string;
}

export async function readExperimentInfo(filePath: string): Promise<ExperimentInfo> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new PipelineError(
      `Cannot read ${filePath} (${getErrorMessage(error)}); run evaluate with a tracking URI first`,
      'register'
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PipelineError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, 'register');
  }

  const result = experimentInfoSchema.safeParse(parsed);
  if (!result.success) {
    throw new PipelineError(`${filePath} must hold run_id and model_path`, 'register');
  }
  return result.data;
}

export async function runRegistration(options: RegistrationOptions): Promise<ModelVersion> {
  const { tracker, modelName } = options;
  const stage = options.stage ?? TRACKING.REGISTRY_STAGE;

  if (!tracker) {
    throw new PipelineError('MLFLOW_TRACKING_URI is not set', 'register');
  }

  const info = await readExperimentInfo(options.experimentInfoFile);
  const run = await tracker.getRun(info.run_id);
  if (run.status && run.status !== 'FINISHED') {
    log.warn(`Run ${info.run_id} has status ${run.status}`);
  }

  await tracker.createRegisteredModel(modelName);
  const version = await tracker.createModelVersion(
    modelName,
    `runs:/${info.run_id}/${info.model_path}`,
    info.run_id
  );
  const staged = await tracker.transitionModelVersionStage(modelName, version.version, stage);

  log.info(`Model ${modelName} version ${staged.version} registered and moved to ${stage}`);
  return staged;
}
