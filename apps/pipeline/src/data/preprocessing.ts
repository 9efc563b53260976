/**
 * Data preprocessing
 * Normalise comment text so the model sees what the API will see
 */

import { cleanComment, createLogger, type LabeledComment } from '@sentiment/shared';
import type { DataPaths } from '../config/env';
import { readDataset, writeDataset } from './csv';

const log = createLogger('Preprocessing');

export interface PreprocessingResult {
  trainRows: number;
  testRows: number;
  dropped: number;
}

/**
 * Clean every comment; rows whose comment is empty afterwards are dropped
 */
export function preprocessRows(rows: LabeledComment[]): LabeledComment[] {
  return rows
    .map(row => ({ clean_comment: cleanComment(row.clean_comment), category: row.category }))
    .filter(row => row.clean_comment.length > 0);
}

export async function runPreprocessing(
  paths: Pick<DataPaths, 'rawTrain' | 'rawTest' | 'processedTrain' | 'processedTest'>
): Promise<PreprocessingResult> {
  const train = await readDataset(paths.rawTrain, 'preprocess');
  const test = await readDataset(paths.rawTest, 'preprocess');

  const processedTrain = preprocessRows(train);
  const processedTest = preprocessRows(test);
  const dropped = train.length - processedTrain.length + test.length - processedTest.length;

  await writeDataset(paths.processedTrain, processedTrain);
  await writeDataset(paths.processedTest, processedTest);

  log.info(`Preprocessed ${processedTrain.length} train and ${processedTest.length} test rows (${dropped} empty after cleaning)`);
  return { trainRows: processedTrain.length, testRows: processedTest.length, dropped };
}
