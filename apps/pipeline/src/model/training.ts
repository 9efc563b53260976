/**
 * Model building
 * Fit the TF-IDF vectorizer and the classifier, then save them as a model bundle
 */

import { EventEmitter } from 'events';
import {
  PipelineError,
  SENTIMENT_LABELS,
  SentimentClassifier,
  TfidfVectorizer,
  createLogger,
  getErrorMessage,
  saveModelBundle,
  type LabeledComment,
  type ModelMetadata,
} from '@sentiment/shared';
import type { FeatureEngineeringParams, ModelBuildingParams } from '../config/params';
import { MODEL_TYPE } from '../constants';

const log = createLogger('ModelTrainer');

// ============================================
// Types
// ============================================

export interface TrainerParams {
  features: FeatureEngineeringParams;
  model: ModelBuildingParams;
}

export interface TrainingResult {
  success: boolean;
  modelVersion?: string;
  modelDir?: string;
  samples?: number;
  vocabularySize?: number;
  finalLoss?: number;
  trainingDurationMs?: number;
  error?: string;
}

/**
 * Version string from the training time, e.g. v1_20260101120000
 */
export function generateVersionString(date: Date = new Date()): string {
  const timestamp = date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `v1_${timestamp}`;
}

// ============================================
// Trainer
// ============================================

export class ModelTrainer extends EventEmitter {
  private isTraining: boolean = false;
  private lastTrainingResult?: TrainingResult;

  constructor(private readonly params: TrainerParams) {
    super();
  }

  get training(): boolean {
    return this.isTraining;
  }

  get lastResult(): TrainingResult | undefined {
    return this.lastTrainingResult;
  }

  /**
   * Train on cleaned rows and write the bundle to modelDir.
   * Emits trainingStarted, epochEnd, trainingCompleted and trainingFailed.
   */
  async train(rows: LabeledComment[], modelDir: string): Promise<TrainingResult> {
    if (this.isTraining) {
      return { success: false, error: 'Training already in progress' };
    }

    this.isTraining = true;
    this.emit('trainingStarted');

    const startTime = Date.now();
    let classifier: SentimentClassifier | undefined;

    try {
      const { features: featureParams, model: modelParams } = this.params;

      if (rows.length < modelParams.min_samples) {
        throw new Error(`Insufficient samples: ${rows.length} < ${modelParams.min_samples}`);
      }
      const classes = new Set(rows.map(row => row.category));
      if (classes.size < 2) {
        throw new Error(`Training data holds a single class (${[...classes].join(', ')})`);
      }

      const vectorizer = new TfidfVectorizer({
        maxFeatures: featureParams.max_features,
        ngramRange: featureParams.ngram_range,
        minDf: featureParams.min_df,
      });
      const features = vectorizer.fitTransform(rows.map(row => row.clean_comment));
      log.info(`Vectorized ${rows.length} comments into ${vectorizer.size} features`);

      classifier = SentimentClassifier.create({
        inputDim: vectorizer.size,
        hiddenUnits: modelParams.hidden_units,
        dropout: modelParams.dropout,
        learningRate: modelParams.learning_rate,
        seed: modelParams.seed,
      });

      // A split that leaves no validation rows is skipped
      const validationSplit = Math.floor(rows.length * modelParams.validation_split) >= 1
        ? modelParams.validation_split
        : 0;

      log.info(
        `Starting training: ${classifier.countParams()} parameters, ` +
        `${modelParams.epochs} epochs, batch size ${modelParams.batch_size}`
      );
      const history = await classifier.fit(features, rows.map(row => row.category), {
        epochs: modelParams.epochs,
        batchSize: modelParams.batch_size,
        validationSplit,
        onEpochEnd: (epoch, loss, validationLoss) => {
          log.debug(
            `Epoch ${epoch + 1}/${modelParams.epochs}: loss=${loss.toFixed(4)}` +
            (validationLoss !== undefined ? `, val_loss=${validationLoss.toFixed(4)}` : '')
          );
          this.emit('epochEnd', { epoch, loss, validationLoss });
        },
      });

      const modelVersion = generateVersionString();
      const metadata: ModelMetadata = {
        version: modelVersion,
        modelType: MODEL_TYPE,
        createdAt: new Date().toISOString(),
        labels: [...SENTIMENT_LABELS],
        params: {
          max_features: featureParams.max_features,
          ngram_range: featureParams.ngram_range.join(','),
          min_df: featureParams.min_df,
          hidden_units: modelParams.hidden_units,
          dropout: modelParams.dropout,
          learning_rate: modelParams.learning_rate,
          epochs: modelParams.epochs,
          batch_size: modelParams.batch_size,
          validation_split: validationSplit,
        },
        trainingSamples: rows.length,
        vocabularySize: vectorizer.size,
      };

      await saveModelBundle(modelDir, { vectorizer, classifier, metadata });
      log.info(`Model bundle ${modelVersion} saved to ${modelDir}`);

      const trainingDurationMs = Date.now() - startTime;
      const result: TrainingResult = {
        success: true,
        modelVersion,
        modelDir,
        samples: rows.length,
        vocabularySize: vectorizer.size,
        finalLoss: history.loss[history.loss.length - 1],
        trainingDurationMs,
      };

      this.lastTrainingResult = result;
      this.emit('trainingCompleted', result);
      log.info(`Training completed in ${trainingDurationMs}ms`);
      return result;

    } catch (error) {
      const result: TrainingResult = {
        success: false,
        error: getErrorMessage(error),
      };

      this.lastTrainingResult = result;
      this.emit('trainingFailed', result);
      log.error(`Training failed: ${result.error}`);
      return result;

    } finally {
      classifier?.dispose();
      this.isTraining = false;
    }
  }
}

/**
 * Train from rows and fail the step when training does not succeed
 */
export async function runTraining(
  rows: LabeledComment[],
  params: TrainerParams,
  modelDir: string
): Promise<TrainingResult> {
  const result = await new ModelTrainer(params).train(rows, modelDir);
  if (!result.success) {
    throw new PipelineError(result.error ?? 'Training failed', 'train');
  }
  return result;
}
