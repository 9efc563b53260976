import { cleanComment } from '../text/preprocess';
import type { Prediction } from '../types';
import type { ModelBundle } from './bundle';
import type { ModelMetadata } from './schemas';

/**
 * Raw text in, labels out: cleaning, vectorizing and classification in one call
 */
export class SentimentModel {
  constructor(private readonly bundle: ModelBundle) {}

  get metadata(): ModelMetadata {
    return this.bundle.metadata;
  }

  get vocabularySize(): number {
    return this.bundle.vectorizer.size;
  }

  predict(texts: string[]): Prediction[] {
    if (texts.length === 0) return [];
    const features = this.bundle.vectorizer.transform(texts.map(cleanComment));
    return this.bundle.classifier.predict(features);
  }

  dispose(): void {
    this.bundle.classifier.dispose();
  }
}
