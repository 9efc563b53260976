/**
 * Shared building blocks for the sentiment pipeline and API
 */

export * from './types';
export * from './text/preprocess';
export * from './ml/schemas';
export * from './ml/vectorizer';
export * from './ml/classifier';
export * from './ml/bundle';
export * from './ml/sentimentModel';
export * from './registry/mlflowClient';
export * from './utils/errors';
export * from './utils/logger';
export * from './utils/retry';
export * from './utils/env';
