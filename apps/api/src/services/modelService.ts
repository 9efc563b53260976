/**
 * Model service
 * Loads the model bundle once and serves predictions from memory
 */

import fs from 'fs/promises';
import {
  SentimentModel,
  createLogger,
  loadModelBundle,
  type MlflowClient,
  type ModelMetadata,
  type Prediction,
} from '@sentiment/shared';

const log = createLogger('ModelService');

export interface LoadedModelInfo {
  metadata: ModelMetadata;
  vocabularySize: number;
  loadedAt: string;
  /** Directory or model URI the bundle came from */
  source: string;
}

/**
 * What the HTTP layer needs from a model
 */
export interface SentimentPredictor {
  isLoaded(): boolean;
  getInfo(): LoadedModelInfo | null;
  predict(texts: string[]): Prediction[];
}

export interface ModelServiceOptions {
  modelDir: string;
  modelUri?: string;
  cacheDir: string;
  tracker: MlflowClient | null;
}

export class ModelService implements SentimentPredictor {
  private model: SentimentModel | null = null;
  private info: LoadedModelInfo | null = null;

  constructor(private readonly options: ModelServiceOptions) {}

  /**
   * Load from the tracker when a model URI is configured, otherwise from the local bundle
   */
  async load(): Promise<LoadedModelInfo> {
    const { modelUri, tracker, cacheDir, modelDir } = this.options;
    let dir = modelDir;
    let source = modelDir;

    if (modelUri) {
      if (!tracker) {
        throw new Error('MLFLOW_MODEL_URI is set but MLFLOW_TRACKING_URI is not');
      }
      log.info(`Downloading model ${modelUri} into ${cacheDir}`);
      await fs.rm(cacheDir, { recursive: true, force: true });
      await tracker.downloadModel(modelUri, cacheDir);
      dir = cacheDir;
      source = modelUri;
    }

    const model = new SentimentModel(await loadModelBundle(dir));
    this.model?.dispose();
    this.model = model;
    this.info = {
      metadata: model.metadata,
      vocabularySize: model.vocabularySize,
      loadedAt: new Date().toISOString(),
      source,
    };

    log.info(`Loaded model ${model.metadata.version} from ${source}`);
    return this.info;
  }

  isLoaded(): boolean {
    return this.model !== null;
  }

  getInfo(): LoadedModelInfo | null {
    return this.info;
  }

  predict(texts: string[]): Prediction[] {
    if (!this.model) {
      throw new Error('Model not loaded');
    }
    return this.model.predict(texts);
  }

  dispose(): void {
    this.model?.dispose();
    this.model = null;
    this.info = null;
  }
}
