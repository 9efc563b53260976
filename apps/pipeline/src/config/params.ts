/**
 * Pipeline hyperparameters
 * Read from params.yaml; any key left out takes its default
 */

import fs from 'fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { PipelineError, createLogger, getErrorMessage } from '@sentiment/shared';

const log = createLogger('Params');

const dataIngestionSchema = z.object({
  test_size: z.number().gt(0).lt(1).default(0.2),
  random_state: z.number().int().default(42),
});

const featureEngineeringSchema = z.object({
  max_features: z.number().int().positive().default(1000),
  ngram_range: z
    .tuple([z.number().int().positive(), z.number().int().positive()])
    .refine(([min, max]) => min <= max, { message: 'ngram_range must be [min, max] with min <= max' })
    .default([1, 3]),
  min_df: z.number().int().positive().default(1),
});

const modelBuildingSchema = z.object({
  hidden_units: z.number().int().positive().default(64),
  dropout: z.number().min(0).lt(1).default(0.3),
  learning_rate: z.number().positive().default(0.01),
  epochs: z.number().int().positive().default(10),
  batch_size: z.number().int().positive().default(64),
  validation_split: z.number().min(0).lt(1).default(0.1),
  min_samples: z.number().int().positive().default(20),
  seed: z.number().int().default(42),
});

export const paramsSchema = z.object({
  data_ingestion: dataIngestionSchema.default({}),
  feature_engineering: featureEngineeringSchema.default({}),
  model_building: modelBuildingSchema.default({}),
});

export type PipelineParams = z.infer<typeof paramsSchema>;
export type DataIngestionParams = PipelineParams['data_ingestion'];
export type FeatureEngineeringParams = PipelineParams['feature_engineering'];
export type ModelBuildingParams = PipelineParams['model_building'];

/**
 * Validate parsed YAML, filling defaults
 */
export function parseParams(raw: unknown, source: string = 'params'): PipelineParams {
  const result = paramsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new PipelineError(`Invalid ${source}: ${where}${issue?.message ?? 'unknown issue'}`, 'params');
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadParams(filePath: string): Promise<PipelineParams> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      log.warn(`${filePath} not found, using default parameters`);
      return parseParams({});
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new PipelineError(`Cannot parse ${filePath}: ${getErrorMessage(error)}`, 'params');
  }

  return parseParams(raw, filePath);
}

/**
 * Flat key/value view for logging to the tracker
 */
export function flattenParams(params: PipelineParams): Record<string, string | number | boolean> {
  const sections: Record<string, Record<string, number | [number, number]>> = params;
  const flat: Record<string, string | number | boolean> = {};
  for (const [section, values] of Object.entries(sections)) {
    for (const [key, value] of Object.entries(values)) {
      flat[`${section}.${key}`] = Array.isArray(value) ? value.join(',') : value;
    }
  }
  return flat;
}
