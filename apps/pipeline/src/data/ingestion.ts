/**
 * Data ingestion
 * Load the labelled comment dataset, clean it and split it into train and test sets
 */

import {
  PipelineError,
  createLogger,
  isSentimentLabel,
  type LabeledComment,
} from '@sentiment/shared';
import type { DataIngestionParams } from '../config/params';
import type { DataPaths } from '../config/env';
import { readCsv, requireColumns, writeDataset, type CsvTable } from './csv';

const log = createLogger('DataIngestion');

// ============================================
// Types
// ============================================

export interface CleaningStats {
  total: number;
  missing: number;
  invalidCategory: number;
  duplicates: number;
  blank: number;
  kept: number;
}

export interface SplitResult<T> {
  train: T[];
  test: T[];
}

export interface IngestionResult {
  stats: CleaningStats;
  trainRows: number;
  testRows: number;
}

// ============================================
// Cleaning
// ============================================

/**
 * Drop rows with a missing field or an unknown category, exact duplicates,
 * and comments that are only whitespace. Order of the remaining rows is kept.
 */
export function cleanDataset(table: CsvTable): { rows: LabeledComment[]; stats: CleaningStats } {
  const stats: CleaningStats = {
    total: table.rows.length,
    missing: 0,
    invalidCategory: 0,
    duplicates: 0,
    blank: 0,
    kept: 0,
  };
  const seen = new Set<string>();
  const rows: LabeledComment[] = [];

  for (const row of table.rows) {
    const comment = row.clean_comment;
    const rawCategory = row.category?.trim();
    if (comment === undefined || comment === '' || !rawCategory) {
      stats.missing++;
      continue;
    }

    const category = Number(rawCategory);
    if (!isSentimentLabel(category)) {
      stats.invalidCategory++;
      continue;
    }

    const key = JSON.stringify([comment, category]);
    if (seen.has(key)) {
      stats.duplicates++;
      continue;
    }
    seen.add(key);

    if (comment.trim() === '') {
      stats.blank++;
      continue;
    }

    rows.push({ clean_comment: comment, category });
  }

  stats.kept = rows.length;
  return { rows, stats };
}

// ============================================
// Splitting
// ============================================

/**
 * Deterministic uniform generator in [0, 1) for a given seed
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle driven by a seeded generator; returns a new array
 */
export function shuffle<T>(items: readonly T[], seed: number): T[] {
  const random = createRng(seed);
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Shuffle, then put ceil(n * testSize) rows in the test set
 */
export function trainTestSplit<T>(rows: readonly T[], testSize: number, seed: number): SplitResult<T> {
  const testCount = Math.ceil(rows.length * testSize);
  if (testCount < 1 || testCount >= rows.length) {
    throw new PipelineError(
      `Cannot split ${rows.length} rows with test_size ${testSize}: both sets need at least one row`,
      'ingest'
    );
  }

  const shuffled = shuffle(rows, seed);
  return {
    test: shuffled.slice(0, testCount),
    train: shuffled.slice(testCount),
  };
}

// ============================================
// Step
// ============================================

export async function runIngestion(
  source: string,
  params: DataIngestionParams,
  paths: Pick<DataPaths, 'rawTrain' | 'rawTest'>
): Promise<IngestionResult> {
  log.info(`Loading dataset from ${source}`);
  const table = await readCsv(source);
  requireColumns(table, 'ingest', source);

  const { rows, stats } = cleanDataset(table);
  log.info(
    `Kept ${stats.kept}/${stats.total} rows (missing=${stats.missing}, invalid category=${stats.invalidCategory}, ` +
    `duplicates=${stats.duplicates}, blank=${stats.blank})`
  );

  const { train, test } = trainTestSplit(rows, params.test_size, params.random_state);
  await writeDataset(paths.rawTrain, train);
  await writeDataset(paths.rawTest, test);

  log.info(`Wrote ${train.length} train rows to ${paths.rawTrain} and ${test.length} test rows to ${paths.rawTest}`);
  return { stats, trainRows: train.length, testRows: test.length };
}
