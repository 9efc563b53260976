import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  BUNDLE_FILES,
  loadModelBundle,
  readBundleMetadata,
  saveModelBundle,
  updateBundleMetadata,
  type ModelBundle,
} from '../../src/ml/bundle';
import { SentimentModel } from '../../src/ml/sentimentModel';
import { TfidfVectorizer } from '../../src/ml/vectorizer';
import { ModelBundleError } from '../../src/utils/errors';
import { buildTinyBundle } from '../../../../tests/helpers/tinyBundle';

describe('model bundle', () => {
  let dir: string;
  let bundle: ModelBundle;

  beforeAll(async () => {
    bundle = await buildTinyBundle();
  });

  afterAll(() => {
    bundle.classifier.dispose();
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bundle-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write every bundle file', async () => {
    const written = await saveModelBundle(dir, bundle);

    expect(written).toEqual(['vectorizer.json', 'model.json', 'weights.bin', 'metadata.json']);
    expect((await fs.readdir(dir)).sort()).toEqual(['metadata.json', 'model.json', 'vectorizer.json', 'weights.bin']);
  });

  it('should point the model file at the weights file', async () => {
    await saveModelBundle(dir, bundle);
    const modelFile: unknown = JSON.parse(await fs.readFile(path.join(dir, BUNDLE_FILES.model), 'utf-8'));

    expect(modelFile).toMatchObject({
      format: 'layers-model',
      weightsManifest: [{ paths: ['weights.bin'] }],
    });
  });

  it('should predict the same after a save and load', async () => {
    await saveModelBundle(dir, bundle);
    const loaded = await loadModelBundle(dir);

    const texts = ['love this great video', 'so boring, total waste', 'uploaded today'];
    const before = new SentimentModel(bundle).predict(texts);
    const after = new SentimentModel(loaded).predict(texts);

    expect(after.map(p => p.label)).toEqual(before.map(p => p.label));
    after.forEach((prediction, i) => expect(prediction.confidence).toBeCloseTo(before[i].confidence, 6));
    expect(loaded.metadata).toEqual(bundle.metadata);
    expect(loaded.vectorizer.size).toBe(bundle.vectorizer.size);
    loaded.classifier.dispose();
  });

  it('should merge fields into the metadata', async () => {
    await saveModelBundle(dir, bundle);
    await updateBundleMetadata(dir, { evaluatedAt: '2026-02-01T00:00:00.000Z' });

    const metadata = await readBundleMetadata(dir);
    expect(metadata.evaluatedAt).toBe('2026-02-01T00:00:00.000Z');
    expect(metadata.version).toBe('v1_test');
  });

  it('should fail with a bundle error when the weights are missing', async () => {
    await saveModelBundle(dir, bundle);
    await fs.rm(path.join(dir, BUNDLE_FILES.weights));

    const load = loadModelBundle(dir);
    await expect(load).rejects.toBeInstanceOf(ModelBundleError);
    await expect(load).rejects.toThrow(/^Cannot read weights\.bin/);
  });

  it('should fail when the directory does not exist', async () => {
    await expect(loadModelBundle(path.join(dir, 'absent'))).rejects.toThrow(/^Cannot read metadata\.json/);
  });

  it('should reject a vectorizer that does not match the network', async () => {
    await saveModelBundle(dir, bundle);
    const other = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] }).fit(['only two']);
    await fs.writeFile(path.join(dir, BUNDLE_FILES.vectorizer), JSON.stringify(other.toJSON()));

    await expect(loadModelBundle(dir)).rejects.toThrow(
      `Network expects ${bundle.vectorizer.size} features but vectorizer produces 2`
    );
  });

  it('should reject malformed metadata', async () => {
    await saveModelBundle(dir, bundle);
    await fs.writeFile(path.join(dir, BUNDLE_FILES.metadata), '{"version": 3}');

    await expect(readBundleMetadata(dir)).rejects.toThrow(/^Malformed metadata\.json/);
  });
});

describe('SentimentModel', () => {
  it('should clean raw text before scoring it', async () => {
    const bundle = await buildTinyBundle();
    const model = new SentimentModel(bundle);

    const [raw] = model.predict(['LOVE this GREAT video!!! https://example.com']);
    const [clean] = bundle.classifier.predict(bundle.vectorizer.transform(['love great video !!!']));

    expect(raw.label).toBe(clean.label);
    expect(raw.confidence).toBeCloseTo(clean.confidence, 6);
    expect(model.predict([])).toEqual([]);
    expect(model.vocabularySize).toBe(bundle.vectorizer.size);
    model.dispose();
  });
});
