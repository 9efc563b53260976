/**
 * Shared Types for the sentiment service
 * Used by the training pipeline and the prediction API
 */

// ============================================
// Labels
// ============================================

/** Class order used by the classifier's output layer */
export const SENTIMENT_LABELS = [-1, 0, 1] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export type SentimentName = 'negative' | 'neutral' | 'positive';

export function sentimentName(label: SentimentLabel): SentimentName {
  switch (label) {
    case -1:
      return 'negative';
    case 0:
      return 'neutral';
    case 1:
      return 'positive';
  }
}

export function isSentimentLabel(value: unknown): value is SentimentLabel {
  return value === -1 || value === 0 || value === 1;
}

export function labelToIndex(label: SentimentLabel): number {
  return SENTIMENT_LABELS.indexOf(label);
}

export function indexToLabel(index: number): SentimentLabel {
  const label = SENTIMENT_LABELS[index];
  if (label === undefined) {
    throw new RangeError(`No sentiment label at class index ${index}`);
  }
  return label;
}

// ============================================
// Data
// ============================================

/** One row of the comment dataset, named after its CSV columns */
export interface LabeledComment {
  clean_comment: string;
  category: SentimentLabel;
}

// ============================================
// Predictions
// ============================================

export interface Prediction {
  label: SentimentLabel;
  confidence: number;
  probabilities: number[];
}
