import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  MlflowClient,
  artifactBasePath,
  createMlflowClient,
  parseRunsUri,
} from '../../src/registry/mlflowClient';
import { RegistryError } from '../../src/utils/errors';
import { FakeTracker } from '../../../../tests/helpers/fakeTracker';

describe('tracker URI helpers', () => {
  it('should parse runs URIs', () => {
    expect(parseRunsUri('runs:/abc123/sentiment_model')).toEqual({ runId: 'abc123', artifactPath: 'sentiment_model' });
    expect(parseRunsUri('runs:/abc123/nested/model/')).toEqual({ runId: 'abc123', artifactPath: 'nested/model' });
    expect(parseRunsUri('models:/sentiment/Staging')).toBeNull();
  });

  it('should locate proxied artifact roots', () => {
    expect(artifactBasePath('mlflow-artifacts:/1/abc/artifacts')).toBe('1/abc/artifacts');
    expect(artifactBasePath('mlflow-artifacts://host:5000/1/abc/artifacts/')).toBe('1/abc/artifacts');
    expect(() => artifactBasePath('s3://bucket/1/abc/artifacts')).toThrow(RegistryError);
  });

  it('should build no client without a tracking URI', () => {
    expect(createMlflowClient({})).toBeNull();
    expect(createMlflowClient({ uri: 'http://127.0.0.1:5000/' })?.trackingUri).toBe('http://127.0.0.1:5000');
  });
});

describe('MlflowClient', () => {
  let tracker: FakeTracker;
  let client: MlflowClient;
  let tmpDir: string;

  beforeEach(async () => {
    tracker = new FakeTracker();
    const uri = await tracker.start();
    client = new MlflowClient({
      trackingUri: uri,
      username: 'test-user',
      password: 'test-secret',
      retry: { maxRetries: 2, initialDelayMs: 1 },
    });
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracker-test-'));
  });

  afterEach(async () => {
    await tracker.stop();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should send basic auth credentials', async () => {
    await client.getExperimentByName('anything');

    const expected = `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`;
    expect(tracker.requests[0].authorization).toBe(expected);
  });

  it('should create an experiment once and reuse it', async () => {
    expect(await client.getExperimentByName('sentiment')).toBeNull();

    const first = await client.getOrCreateExperiment('sentiment');
    const second = await client.getOrCreateExperiment('sentiment');

    expect(second).toBe(first);
    expect(tracker.experiments.size).toBe(1);
  });

  it('should log params, metrics and tags to a run and finish it', async () => {
    const experimentId = await client.getOrCreateExperiment('sentiment');
    const run = await client.createRun(experimentId, { runName: 'eval', tags: { stage: 'evaluation' } });

    await client.logBatch(run.run_id, {
      params: { max_features: 1000, model: 'dense' },
      metrics: { test_accuracy: 0.75 },
    });
    await client.finishRun(run.run_id);

    const record = tracker.runs.get(run.run_id);
    expect(record?.params).toEqual({ max_features: '1000', model: 'dense' });
    expect(record?.metrics).toEqual({ test_accuracy: 0.75 });
    expect(record?.tags).toEqual({ stage: 'evaluation' });
    expect(record?.status).toBe('FINISHED');
    expect(run.artifact_uri).toBe(`mlflow-artifacts:/${experimentId}/${run.run_id}/artifacts`);
  });

  it('should upload a directory and download it again', async () => {
    const source = path.join(tmpDir, 'source');
    await fs.mkdir(path.join(source, 'nested'), { recursive: true });
    await fs.writeFile(path.join(source, 'model.json'), '{"a":1}');
    await fs.writeFile(path.join(source, 'nested', 'weights.bin'), Buffer.from([1, 2, 3]));

    const run = await client.createRun(await client.getOrCreateExperiment('sentiment'));
    const uploaded = await client.uploadDirectory(run, source, 'sentiment_model');
    expect(uploaded.sort()).toEqual(['sentiment_model/model.json', 'sentiment_model/nested/weights.bin']);

    const dest = path.join(tmpDir, 'dest');
    await client.downloadModel(`runs:/${run.run_id}/sentiment_model`, dest);

    expect(await fs.readFile(path.join(dest, 'model.json'), 'utf-8')).toBe('{"a":1}');
    expect([...await fs.readFile(path.join(dest, 'nested', 'weights.bin'))]).toEqual([1, 2, 3]);
  });

  it('should fail to download a path with no artifacts', async () => {
    const runId = tracker.seedRun({ 'other/file.txt': 'x' });

    await expect(client.downloadArtifacts(runId, 'sentiment_model', tmpDir))
      .rejects.toThrow(`Run ${runId} has no artifacts under sentiment_model`);
  });

  it('should register versions and resolve them by stage or number', async () => {
    const runId = tracker.seedRun({ 'sentiment_model/model.json': '{}' });
    const source = `mlflow-artifacts:/0/${runId}/artifacts/sentiment_model`;

    await client.createRegisteredModel('sentiment');
    await client.createRegisteredModel('sentiment');
    const version = await client.createModelVersion('sentiment', source, runId);
    const staged = await client.transitionModelVersionStage('sentiment', version.version, 'Staging');

    expect(version.version).toBe('1');
    expect(staged.current_stage).toBe('Staging');
    expect(await client.resolveModelUri('models:/sentiment/Staging'))
      .toEqual({ runId, artifactPath: 'sentiment_model' });
    expect(await client.resolveModelUri('models:/sentiment/1'))
      .toEqual({ runId, artifactPath: 'sentiment_model' });
  });

  it('should report a stage with no versions', async () => {
    await client.createRegisteredModel('sentiment');

    await expect(client.resolveModelUri('models:/sentiment/Production'))
      .rejects.toThrow('Model sentiment has no version in stage Production');
  });

  it('should reject URIs it cannot resolve', async () => {
    await expect(client.resolveModelUri('s3://bucket/model')).rejects.toThrow(/^Unsupported model URI/);
  });

  it('should retry when the server is temporarily unavailable', async () => {
    tracker.failNext = 2;

    const experimentId = await client.createExperiment('sentiment');

    expect(tracker.experiments.get('sentiment')).toBe(experimentId);
    expect(tracker.requests).toHaveLength(3);
  });

  it('should retry internal server errors on reads', async () => {
    tracker.experiments.set('sentiment', '7');
    tracker.failNext = 1;
    tracker.failStatus = 500;

    const experiment = await client.getExperimentByName('sentiment');

    expect(experiment?.experiment_id).toBe('7');
    expect(tracker.requests).toHaveLength(2);
  });

  it('should not repeat a create the server may have carried out', async () => {
    tracker.failNext = 1;
    tracker.failStatus = 500;

    const error = await client.createRun('0', { runName: 'once' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryError);
    expect(error).toMatchObject({ status: 500, errorCode: 'INTERNAL_ERROR' });
    expect(tracker.requests).toHaveLength(1);
    expect(tracker.runs.size).toBe(0);
  });

  it('should retry a create the server turned away', async () => {
    tracker.failNext = 1;

    const run = await client.createRun('0', { runName: 'twice' });

    expect(tracker.runs.get(run.run_id)?.runName).toBe('twice');
    expect(tracker.requests).toHaveLength(2);
  });

  it('should surface the server error code without retrying', async () => {
    const error = await client.getRun('missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryError);
    expect(error).toMatchObject({ status: 404, errorCode: 'RESOURCE_DOES_NOT_EXIST' });
    expect(tracker.requests).toHaveLength(1);
  });
});
