/**
 * Pipeline constants
 * File layout and tracker names shared by the pipeline steps
 */

// ============================================
// File Layout
// ============================================
export const DATA_FILES = {
  RAW_TRAIN: 'train.csv',
  RAW_TEST: 'test.csv',
  PROCESSED_TRAIN: 'train_processed.csv',
  PROCESSED_TEST: 'test_processed.csv',
  METRICS: 'metrics.json',
  EXPERIMENT_INFO: 'experiment_info.json',
} as const;

export const DEFAULT_DIRS = {
  RAW: 'data/raw',
  INTERIM: 'data/interim',
  REPORTS: 'reports',
  MODEL: 'models',
} as const;

// Columns of the comment dataset
export const DATASET_COLUMNS = ['clean_comment', 'category'] as const;

// ============================================
// Tracker Settings
// ============================================
export const TRACKING = {
  DEFAULT_EXPERIMENT: 'sentiment-analysis',
  DEFAULT_MODEL_NAME: 'sentiment-classifier',
  MODEL_ARTIFACT_PATH: 'sentiment_model', // bundle location inside the run's artifacts
  REGISTRY_STAGE: 'Staging',
} as const;

export const MODEL_TYPE = 'tfidf-dense-softmax';
