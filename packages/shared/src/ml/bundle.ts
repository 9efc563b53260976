/**
 * Model bundle
 * Directory holding everything serving needs: vectorizer, network, weights and metadata
 */

import fs from 'fs/promises';
import path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { ModelBundleError, getErrorMessage } from '../utils/errors';
import { TfidfVectorizer } from './vectorizer';
import { SentimentClassifier } from './classifier';
import {
  layersModelFileSchema,
  modelMetadataSchema,
  type LayersModelFile,
  type ModelMetadata,
} from './schemas';

export const BUNDLE_FILES = {
  vectorizer: 'vectorizer.json',
  model: 'model.json',
  weights: 'weights.bin',
  metadata: 'metadata.json',
} as const;

export interface ModelBundle {
  vectorizer: TfidfVectorizer;
  classifier: SentimentClassifier;
  metadata: ModelMetadata;
}

async function readFileOrFail(dir: string, file: string): Promise<Buffer> {
  try {
    return await fs.readFile(path.join(dir, file));
  } catch (error) {
    throw new ModelBundleError(`Cannot read ${file}: ${getErrorMessage(error)}`, dir);
  }
}

async function readJson<T>(dir: string, file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const raw = await readFileOrFail(dir, file);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString('utf-8'));
  } catch (error) {
    throw new ModelBundleError(`Invalid JSON in ${file}: ${getErrorMessage(error)}`, dir);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ModelBundleError(`Malformed ${file}: ${result.error.issues[0]?.message ?? 'unknown issue'}`, dir);
  }
  return result.data;
}

async function writeJson(dir: string, file: string, value: unknown): Promise<void> {
  await fs.writeFile(path.join(dir, file), JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

/**
 * Write a bundle into dir, creating it if needed. Returns the file names written.
 */
export async function saveModelBundle(dir: string, bundle: ModelBundle): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });

  const artifacts = await bundle.classifier.toArtifacts();
  const modelFile: LayersModelFile = {
    format: 'layers-model',
    generatedBy: 'sentiment-service',
    modelTopology: artifacts.modelTopology,
    weightsManifest: [{ paths: [BUNDLE_FILES.weights], weights: artifacts.weightSpecs }],
  };

  await writeJson(dir, BUNDLE_FILES.vectorizer, bundle.vectorizer.toJSON());
  await writeJson(dir, BUNDLE_FILES.model, modelFile);
  await fs.writeFile(path.join(dir, BUNDLE_FILES.weights), Buffer.from(artifacts.weightData));
  await writeJson(dir, BUNDLE_FILES.metadata, bundle.metadata);

  return Object.values(BUNDLE_FILES);
}

export async function readBundleMetadata(dir: string): Promise<ModelMetadata> {
  return readJson(dir, BUNDLE_FILES.metadata, modelMetadataSchema);
}

/**
 * Merge fields into metadata.json, e.g. evaluation results after training
 */
export async function updateBundleMetadata(dir: string, patch: Partial<ModelMetadata>): Promise<ModelMetadata> {
  const current = await readBundleMetadata(dir);
  const next: ModelMetadata = { ...current, ...patch };
  await writeJson(dir, BUNDLE_FILES.metadata, next);
  return next;
}

export async function loadModelBundle(dir: string): Promise<ModelBundle> {
  const metadata = await readBundleMetadata(dir);
  const modelFile = await readJson(dir, BUNDLE_FILES.model, layersModelFileSchema);

  let vectorizer: TfidfVectorizer;
  try {
    vectorizer = TfidfVectorizer.fromJSON(JSON.parse((await readFileOrFail(dir, BUNDLE_FILES.vectorizer)).toString('utf-8')));
  } catch (error) {
    if (error instanceof ModelBundleError) throw error;
    throw new ModelBundleError(`Malformed ${BUNDLE_FILES.vectorizer}: ${getErrorMessage(error)}`, dir);
  }

  const weightSpecs = modelFile.weightsManifest.flatMap(group => group.weights);
  const weightFiles = modelFile.weightsManifest.flatMap(group => group.paths);
  const weightBuffers = await Promise.all(weightFiles.map(file => readFileOrFail(dir, file)));

  let classifier: SentimentClassifier;
  try {
    classifier = await SentimentClassifier.fromArtifacts({
      modelTopology: modelFile.modelTopology,
      weightSpecs,
      weightData: toArrayBuffer(Buffer.concat(weightBuffers)),
    });
  } catch (error) {
    throw new ModelBundleError(`Cannot restore network: ${getErrorMessage(error)}`, dir);
  }

  if (classifier.inputDim !== vectorizer.size) {
    classifier.dispose();
    throw new ModelBundleError(
      `Network expects ${classifier.inputDim} features but vectorizer produces ${vectorizer.size}`,
      dir
    );
  }

  return { vectorizer, classifier, metadata };
}
