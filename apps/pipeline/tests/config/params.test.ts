import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { PipelineError } from '@sentiment/shared';
import { flattenParams, loadParams, parseParams } from '../../src/config/params';

describe('pipeline params', () => {
  it('should fill every section with defaults', () => {
    expect(parseParams({})).toEqual({
      data_ingestion: { test_size: 0.2, random_state: 42 },
      feature_engineering: { max_features: 1000, ngram_range: [1, 3], min_df: 1 },
      model_building: {
        hidden_units: 64,
        dropout: 0.3,
        learning_rate: 0.01,
        epochs: 10,
        batch_size: 64,
        validation_split: 0.1,
        min_samples: 20,
        seed: 42,
      },
    });
  });

  it('should keep given values next to defaults', () => {
    const params = parseParams({ feature_engineering: { max_features: 500 } });

    expect(params.feature_engineering).toEqual({ max_features: 500, ngram_range: [1, 3], min_df: 1 });
  });

  it('should name the offending key', () => {
    expect(() => parseParams({ data_ingestion: { test_size: 1.5 } })).toThrow(
      '[params] Invalid params: data_ingestion.test_size: Number must be less than 1'
    );
  });

  it('should reject a reversed n-gram range', () => {
    expect(() => parseParams({ feature_engineering: { ngram_range: [3, 1] } })).toThrow(PipelineError);
  });

  it('should flatten sections into dotted keys', () => {
    const flat = flattenParams(parseParams({}));

    expect(flat['feature_engineering.ngram_range']).toBe('1,3');
    expect(flat['model_building.learning_rate']).toBe(0.01);
    expect(flat['data_ingestion.random_state']).toBe(42);
  });

  describe('loadParams', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'params-test-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should read YAML files', async () => {
      const file = path.join(dir, 'params.yaml');
      await fs.writeFile(file, 'model_building:\n  epochs: 3\n  dropout: 0.5\n');

      const params = await loadParams(file);
      expect(params.model_building.epochs).toBe(3);
      expect(params.model_building.dropout).toBe(0.5);
      expect(params.data_ingestion.test_size).toBe(0.2);
    });

    it('should use defaults for an empty file', async () => {
      const file = path.join(dir, 'params.yaml');
      await fs.writeFile(file, '');

      expect(await loadParams(file)).toEqual(parseParams({}));
    });

    it('should use defaults when the file is missing', async () => {
      expect(await loadParams(path.join(dir, 'absent.yaml'))).toEqual(parseParams({}));
    });

    it('should reject malformed YAML', async () => {
      const file = path.join(dir, 'params.yaml');
      await fs.writeFile(file, 'model_building: [unclosed\n');

      await expect(loadParams(file)).rejects.toThrow(/^\[params\] Cannot parse/);
    });
  });
});
