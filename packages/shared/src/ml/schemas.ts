/**
 * Schemas for the JSON files of a model bundle and the evaluation report
 */

import { z } from 'zod';
import { isSentimentLabel, type SentimentLabel } from '../types';

export const sentimentLabelSchema = z.custom<SentimentLabel>(isSentimentLabel, {
  message: 'Expected a sentiment label (-1, 0 or 1)',
});

const averagedScoresSchema = z.object({
  precision: z.number(),
  recall: z.number(),
  f1Score: z.number(),
});

export const classReportSchema = averagedScoresSchema.extend({
  label: sentimentLabelSchema,
  support: z.number().int().nonnegative(),
});

export const evaluationMetricsSchema = z.object({
  accuracy: z.number(),
  support: z.number().int().nonnegative(),
  macroAvg: averagedScoresSchema,
  weightedAvg: averagedScoresSchema,
  perClass: z.array(classReportSchema),
  /** Rows are actual labels, columns predicted, both in SENTIMENT_LABELS order */
  confusionMatrix: z.array(z.array(z.number().int().nonnegative())),
});

export type AveragedScores = z.infer<typeof averagedScoresSchema>;
export type ClassReport = z.infer<typeof classReportSchema>;
export type EvaluationMetrics = z.infer<typeof evaluationMetricsSchema>;

export const modelMetadataSchema = z.object({
  version: z.string(),
  modelType: z.string(),
  createdAt: z.string(),
  labels: z.array(sentimentLabelSchema),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])),
  trainingSamples: z.number().int().nonnegative(),
  vocabularySize: z.number().int().nonnegative(),
  metrics: evaluationMetricsSchema.optional(),
  evaluatedAt: z.string().optional(),
});

export type ModelMetadata = z.infer<typeof modelMetadataSchema>;

export const serializedVectorizerSchema = z.object({
  kind: z.literal('tfidf'),
  ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]),
  maxFeatures: z.number().int().positive(),
  minDf: z.number().int().positive(),
  vocabulary: z.record(z.number().int().nonnegative()),
  idf: z.array(z.number()),
});

export type SerializedVectorizer = z.infer<typeof serializedVectorizerSchema>;

const weightSpecSchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int()),
  dtype: z.enum(['float32', 'int32', 'bool', 'string', 'complex64']),
});

/** The layers-model JSON layout TensorFlow.js itself reads and writes */
export const layersModelFileSchema = z.object({
  format: z.literal('layers-model'),
  generatedBy: z.string().optional(),
  modelTopology: z.record(z.unknown()),
  weightsManifest: z.array(z.object({
    paths: z.array(z.string()),
    weights: z.array(weightSpecSchema),
  })),
});

export type LayersModelFile = z.infer<typeof layersModelFileSchema>;
