/**
 * Sentiment classifier
 * Dense softmax network over TF-IDF rows, trained and run by TensorFlow.js
 */

import * as tf from '@tensorflow/tfjs';
import {
  SENTIMENT_LABELS,
  indexToLabel,
  labelToIndex,
  type Prediction,
  type SentimentLabel,
} from '../types';

// ============================================
// Types
// ============================================

export interface ClassifierOptions {
  inputDim: number;
  hiddenUnits: number;
  dropout: number;
  learningRate: number;
  seed?: number;
}

export interface FitOptions {
  epochs: number;
  batchSize: number;
  validationSplit: number;
  onEpochEnd?: (epoch: number, loss: number, validationLoss?: number) => void;
}

export interface FitHistory {
  epochs: number;
  loss: number[];
  validationLoss: number[];
}

/** Topology, weight manifest and weights of a trained network */
export interface ClassifierArtifacts {
  modelTopology: Record<string, unknown>;
  weightSpecs: tf.io.WeightsManifestEntry[];
  weightData: ArrayBuffer;
}

class MemorySaveHandler implements tf.io.IOHandler {
  artifacts?: tf.io.ModelArtifacts;

  async save(artifacts: tf.io.ModelArtifacts): Promise<tf.io.SaveResult> {
    this.artifacts = artifacts;
    return {
      modelArtifactsInfo: {
        dateSaved: new Date(),
        modelTopologyType: 'JSON',
      },
    };
  }
}

function joinWeightData(data: ArrayBuffer | ArrayBuffer[]): ArrayBuffer {
  const parts = Array.isArray(data) ? data : [data];
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const joined = new ArrayBuffer(total);
  const view = new Uint8Array(joined);
  let offset = 0;
  for (const part of parts) {
    view.set(new Uint8Array(part), offset);
    offset += part.byteLength;
  }
  return joined;
}

function historyValues(values: Array<number | tf.Tensor> | undefined): number[] {
  return (values ?? []).map(value => (typeof value === 'number' ? value : value.dataSync()[0]));
}

// ============================================
// Classifier
// ============================================

export class SentimentClassifier {
  private constructor(
    private readonly model: tf.LayersModel,
    readonly inputDim: number
  ) {}

  /**
   * Build and compile an untrained network
   */
  static create(options: ClassifierOptions): SentimentClassifier {
    const model = tf.sequential();

    model.add(tf.layers.dense({
      inputShape: [options.inputDim],
      units: options.hiddenUnits,
      activation: 'relu',
      kernelInitializer: tf.initializers.glorotUniform({ seed: options.seed }),
    }));
    model.add(tf.layers.dropout({ rate: options.dropout, seed: options.seed }));
    model.add(tf.layers.dense({
      units: SENTIMENT_LABELS.length,
      activation: 'softmax',
      kernelInitializer: tf.initializers.glorotUniform({ seed: options.seed }),
    }));

    model.compile({
      optimizer: tf.train.adam(options.learningRate),
      loss: 'categoricalCrossentropy',
      metrics: ['accuracy'],
    });

    return new SentimentClassifier(model, options.inputDim);
  }

  /**
   * Restore a network from its artifacts. The result predicts but is not compiled for training.
   */
  static async fromArtifacts(artifacts: ClassifierArtifacts): Promise<SentimentClassifier> {
    const model = await tf.loadLayersModel(tf.io.fromMemory({
      modelTopology: artifacts.modelTopology,
      weightSpecs: artifacts.weightSpecs,
      weightData: artifacts.weightData,
    }));

    const inputShape = model.inputs[0]?.shape ?? [];
    const inputDim = inputShape[inputShape.length - 1];
    if (typeof inputDim !== 'number') {
      model.dispose();
      throw new Error('Restored model has no fixed input width');
    }

    return new SentimentClassifier(model, inputDim);
  }

  async fit(features: number[][], labels: SentimentLabel[], options: FitOptions): Promise<FitHistory> {
    if (features.length !== labels.length) {
      throw new Error(`Features (${features.length}) and labels (${labels.length}) must have same length`);
    }
    if (features.length === 0) {
      throw new Error('Cannot fit on an empty training set');
    }

    const xs = tf.tensor2d(features, [features.length, this.inputDim]);
    const ys = tf.tidy(() =>
      tf.cast(tf.oneHot(tf.tensor1d(labels.map(labelToIndex), 'int32'), SENTIMENT_LABELS.length), 'float32')
    );

    try {
      const history = await this.model.fit(xs, ys, {
        epochs: options.epochs,
        batchSize: options.batchSize,
        validationSplit: options.validationSplit,
        shuffle: true,
        verbose: 0,
        callbacks: {
          onEpochEnd: (epoch, logs) => {
            options.onEpochEnd?.(epoch, logs?.loss ?? 0, logs?.val_loss);
          },
        },
      });

      return {
        epochs: options.epochs,
        loss: historyValues(history.history.loss),
        validationLoss: historyValues(history.history.val_loss),
      };
    } finally {
      xs.dispose();
      ys.dispose();
    }
  }

  /**
   * Class probabilities per row, in SENTIMENT_LABELS order
   */
  predictProba(features: number[][]): number[][] {
    if (features.length === 0) return [];

    const input = tf.tensor2d(features, [features.length, this.inputDim]);
    const output = this.model.predict(input);
    const probabilities = Array.isArray(output) ? output[0] : output;

    try {
      const values = Array.from(probabilities.dataSync());
      const classes = SENTIMENT_LABELS.length;
      return features.map((_, row) => values.slice(row * classes, (row + 1) * classes));
    } finally {
      input.dispose();
      tf.dispose(output);
    }
  }

  predict(features: number[][]): Prediction[] {
    return this.predictProba(features).map(probabilities => {
      let best = 0;
      for (let i = 1; i < probabilities.length; i++) {
        if (probabilities[i] > probabilities[best]) best = i;
      }
      return {
        label: indexToLabel(best),
        confidence: probabilities[best],
        probabilities,
      };
    });
  }

  async toArtifacts(): Promise<ClassifierArtifacts> {
    const handler = new MemorySaveHandler();
    await this.model.save(handler);

    const artifacts = handler.artifacts;
    if (!artifacts || !artifacts.weightSpecs || !artifacts.weightData) {
      throw new Error('Model save produced no weights');
    }
    if (artifacts.modelTopology instanceof ArrayBuffer || !artifacts.modelTopology) {
      throw new Error('Model save produced a non-JSON topology');
    }

    return {
      modelTopology: { ...artifacts.modelTopology },
      weightSpecs: artifacts.weightSpecs,
      weightData: joinWeightData(artifacts.weightData),
    };
  }

  /** Number of trainable parameters */
  countParams(): number {
    return this.model.countParams();
  }

  dispose(): void {
    this.model.dispose();
  }
}
