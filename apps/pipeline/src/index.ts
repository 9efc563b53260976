#!/usr/bin/env tsx

/**
 * Sentiment pipeline CLI
 * Data preparation, training, evaluation and registration steps
 */

import path from 'path';
import { Command } from 'commander';
import { createLogger, getErrorMessage } from '@sentiment/shared';
import { loadPipelineConfig, type PipelineConfig } from './config/env';
import { createContext, runPipeline, runStep, type PipelineStep } from './pipeline';

const log = createLogger('cli');

interface GlobalOptions {
  params?: string;
  modelDir?: string;
  modelName?: string;
}

const program = new Command();

program
  .name('sentiment-pipeline')
  .description('Train, evaluate and register the comment sentiment model')
  .version('1.0.0')
  .option('-p, --params <file>', 'Hyperparameter file (default: params.yaml)')
  .option('-m, --model-dir <dir>', 'Model bundle directory (default: MODEL_DIR or models)')
  .option('-n, --model-name <name>', 'Registered model name (default: MODEL_NAME)');

function resolveConfig(source?: string): PipelineConfig {
  const options = program.opts<GlobalOptions>();
  const overrides: Partial<PipelineConfig> = {};

  if (options.params) overrides.paramsFile = path.resolve(options.params);
  if (options.modelDir) overrides.modelDir = path.resolve(options.modelDir);
  if (options.modelName) overrides.modelName = options.modelName;
  if (source) overrides.source = source;

  return loadPipelineConfig(overrides);
}

async function step(name: PipelineStep, source?: string): Promise<void> {
  await runStep(name, await createContext(resolveConfig(source)));
}

// =============================================================================
// Commands
// =============================================================================

program
  .command('ingest')
  .description('Load, clean and split the source dataset into data/raw')
  .option('-s, --source <csv>', 'Source CSV path or http(s) URL (default: DATA_SOURCE)')
  .action((options: { source?: string }) => step('ingest', options.source));

program
  .command('preprocess')
  .description('Normalise comment text into data/interim')
  .action(() => step('preprocess'));

program
  .command('train')
  .description('Fit the vectorizer and classifier and save the model bundle')
  .action(() => step('train'));

program
  .command('evaluate')
  .description('Score the model on the test set and log the run to the tracker')
  .action(() => step('evaluate'));

program
  .command('register')
  .description('Register the evaluated model and move it to Staging')
  .action(() => step('register'));

program
  .command('run')
  .description('Run every step in order')
  .option('-s, --source <csv>', 'Source CSV path or http(s) URL (default: DATA_SOURCE)')
  .action(async (options: { source?: string }) => {
    const completed = await runPipeline(await createContext(resolveConfig(options.source)));
    log.info(`Pipeline complete: ${completed.join(' → ')}`);
  });

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  log.error(`Pipeline failed: ${getErrorMessage(error)}`);
  if (error instanceof Error && error.stack && process.env.NODE_ENV === 'development') {
    log.debug(error.stack);
  }
  process.exitCode = 1;
}

program.parseAsync(process.argv).catch(handleError);
