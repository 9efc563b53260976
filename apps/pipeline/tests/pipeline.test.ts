import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { MlflowClient, readBundleMetadata } from '@sentiment/shared';
import { loadPipelineConfig, type PipelineConfig } from '../src/config/env';
import { createContext, runPipeline, runStep } from '../src/pipeline';
import { FakeTracker } from '../../../tests/helpers/fakeTracker';

const PHRASES: Record<string, string[]> = {
  '1': ['love this video', 'great explanation thanks', 'awesome content keep going', 'really helpful tutorial'],
  '0': ['posted this morning', 'video about trains', 'second part tomorrow', 'recorded in studio'],
  '-1': ['terrible audio quality', 'boring waste of time', 'worst video ever', 'misleading title again'],
};

async function writeSource(file: string): Promise<void> {
  const lines = ['clean_comment,category'];
  for (const [category, phrases] of Object.entries(PHRASES)) {
    phrases.forEach((phrase, i) => {
      lines.push(`"${phrase} #${i}",${category}`);
      lines.push(`"${phrase} episode ${i + 10}",${category}`);
    });
  }
  await fs.writeFile(file, lines.join('\n') + '\n');
}

describe('pipeline', () => {
  let dir: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-test-'));
    await writeSource(path.join(dir, 'comments.csv'));
    await fs.writeFile(path.join(dir, 'params.yaml'), [
      'data_ingestion:',
      '  test_size: 0.25',
      'feature_engineering:',
      '  max_features: 100',
      '  ngram_range: [1, 2]',
      'model_building:',
      '  hidden_units: 8',
      '  epochs: 2',
      '  batch_size: 8',
      '  min_samples: 5',
      '',
    ].join('\n'));

    config = loadPipelineConfig({
      paramsFile: path.join(dir, 'params.yaml'),
      source: path.join(dir, 'comments.csv'),
      rawDir: path.join(dir, 'data', 'raw'),
      interimDir: path.join(dir, 'data', 'interim'),
      reportsDir: path.join(dir, 'reports'),
      modelDir: path.join(dir, 'models'),
      experimentName: 'sentiment-test',
      modelName: 'sentiment-test-model',
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should train, evaluate and register against the tracker', async () => {
    const tracker = new FakeTracker();
    const client = new MlflowClient({ trackingUri: await tracker.start(), retry: { maxRetries: 0 } });

    try {
      const context = await createContext(config, client);
      expect(context.params.data_ingestion.test_size).toBe(0.25);

      const completed = await runPipeline(context);
      expect(completed).toEqual(['ingest', 'preprocess', 'train', 'evaluate', 'register']);

      const info: unknown = JSON.parse(await fs.readFile(context.paths.experimentInfo, 'utf-8'));
      expect(info).toEqual({ run_id: expect.any(String), model_path: 'sentiment_model' });

      const [run] = [...tracker.runs.values()];
      expect(run.status).toBe('FINISHED');
      expect(run.params['model_building.epochs']).toBe('2');
      expect(Object.keys(run.metrics)).toEqual(expect.arrayContaining([
        'test_accuracy', 'test_macro_f1', 'test_weighted_f1', 'negative_precision', 'neutral_recall', 'positive_f1',
      ]));
      expect([...tracker.artifacts.keys()]).toEqual(expect.arrayContaining([
        `${run.experimentId}/${run.runId}/artifacts/sentiment_model/model.json`,
        `${run.experimentId}/${run.runId}/artifacts/sentiment_model/weights.bin`,
        `${run.experimentId}/${run.runId}/artifacts/metrics.json`,
      ]));

      expect(tracker.versions).toEqual([{
        name: 'sentiment-test-model',
        version: '1',
        source: `runs:/${run.runId}/sentiment_model`,
        runId: run.runId,
        stage: 'Staging',
      }]);

      const metrics: unknown = JSON.parse(await fs.readFile(context.paths.metrics, 'utf-8'));
      expect(metrics).toMatchObject({ support: 6, confusionMatrix: expect.any(Array) });
      expect((await readBundleMetadata(config.modelDir)).metrics?.support).toBe(6);
    } finally {
      await tracker.stop();
    }
  });

  it('should run locally without a tracker', async () => {
    const context = await createContext(config, null);
    await fs.mkdir(config.reportsDir, { recursive: true });
    await fs.writeFile(context.paths.experimentInfo, '{"run_id":"stale","model_path":"old"}');

    const completed = await runPipeline(context);

    expect(completed).toEqual(['ingest', 'preprocess', 'train', 'evaluate']);
    await expect(fs.access(context.paths.experimentInfo)).rejects.toThrow();
    await expect(fs.access(context.paths.metrics)).resolves.toBeUndefined();
  });

  it('should leave no experiment info when tracker logging fails', async () => {
    const tracker = new FakeTracker();
    const client = new MlflowClient({ trackingUri: await tracker.start(), retry: { maxRetries: 0 } });

    try {
      const context = await createContext(config, client);
      for (const step of ['ingest', 'preprocess', 'train'] as const) {
        await runStep(step, context);
      }
      await fs.mkdir(config.reportsDir, { recursive: true });
      await fs.writeFile(context.paths.experimentInfo, '{"run_id":"OLD_RUN","model_path":"sentiment_model"}');
      tracker.failNext = 100;

      await expect(runStep('evaluate', context)).rejects.toThrow();

      await expect(fs.access(context.paths.experimentInfo)).rejects.toThrow();
      await expect(fs.access(context.paths.metrics)).resolves.toBeUndefined();
    } finally {
      await tracker.stop();
    }
  });

  it('should refuse to ingest without a source', async () => {
    const context = await createContext({ ...config, source: undefined }, null);

    await expect(runStep('ingest', context)).rejects.toThrow('[ingest] No data source');
  });

  it('should refuse to register without a tracker', async () => {
    const context = await createContext(config, null);

    await expect(runStep('register', context)).rejects.toThrow('[register] MLFLOW_TRACKING_URI is not set');
  });

  it('should refuse to register before evaluation', async () => {
    const tracker = new FakeTracker();
    const client = new MlflowClient({ trackingUri: await tracker.start(), retry: { maxRetries: 0 } });

    try {
      const context = await createContext(config, client);
      await expect(runStep('register', context)).rejects.toThrow(/run evaluate with a tracking URI first$/);
      expect(tracker.requests).toEqual([]);
    } finally {
      await tracker.stop();
    }
  });
});
