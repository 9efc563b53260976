/**
 * MLflow tracking client
 * REST client for experiments, runs, proxied artifacts and the model registry.
 * Works against a self-hosted MLflow server or DagsHub's hosted one.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { RegistryError, getErrorMessage } from '../utils/errors';
import { withRetry, type RetryOptions } from '../utils/retry';
import { createLogger } from '../utils/logger';

const log = createLogger('MlflowClient');

const API = '/api/2.0/mlflow';
const ARTIFACTS_API = '/api/2.0/mlflow-artifacts/artifacts';

// ============================================
// Response schemas
// ============================================

const experimentSchema = z.object({
  experiment_id: z.string(),
  name: z.string(),
  artifact_location: z.string().optional(),
});

const runInfoSchema = z.object({
  run_id: z.string(),
  experiment_id: z.string(),
  artifact_uri: z.string().optional(),
  status: z.string().optional(),
  run_name: z.string().optional(),
});

const runResponseSchema = z.object({ run: z.object({ info: runInfoSchema }) });

const modelVersionSchema = z.object({
  name: z.string(),
  version: z.string(),
  current_stage: z.string().optional(),
  source: z.string().optional(),
  run_id: z.string().optional(),
  status: z.string().optional(),
});

const fileInfoSchema = z.object({
  path: z.string(),
  is_dir: z.boolean().optional(),
  file_size: z.union([z.number(), z.string()]).optional(),
});

const errorBodySchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

const emptySchema = z.object({}).passthrough();

export type Experiment = z.infer<typeof experimentSchema>;
export type RunInfo = z.infer<typeof runInfoSchema>;
export type ModelVersion = z.infer<typeof modelVersionSchema>;
export type ArtifactFile = z.infer<typeof fileInfoSchema>;

// ============================================
// Types
// ============================================

export interface MlflowClientOptions {
  trackingUri: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  retry?: RetryOptions;
}

export interface LogBatchInput {
  params?: Record<string, string | number | boolean>;
  metrics?: Record<string, number>;
  tags?: Record<string, string>;
}

export type RunStatus = 'FINISHED' | 'FAILED' | 'KILLED';

/** Where a model's files live: a run and a path inside its artifact root */
export interface ModelLocation {
  runId: string;
  artifactPath: string;
}

// ============================================
// URI helpers
// ============================================

/**
 * Parse runs:/<run_id>/<path>; null for any other URI
 */
export function parseRunsUri(uri: string): ModelLocation | null {
  const match = /^runs:\/+([^/]+)\/(.+)$/.exec(uri);
  if (!match) return null;
  return { runId: match[1], artifactPath: match[2].replace(/\/+$/, '') };
}

/**
 * Path of a run's artifact root on the artifact proxy.
 * Only proxied storage (mlflow-artifacts:) is reachable over HTTP.
 */
export function artifactBasePath(artifactUri: string): string {
  const match = /^mlflow-artifacts:(?:\/\/[^/]*)?\/(.*)$/.exec(artifactUri);
  if (!match) {
    throw new RegistryError(
      `Unsupported artifact store ${artifactUri}: only mlflow-artifacts: proxied storage is supported`
    );
  }
  return match[1].replace(/\/+$/, '');
}

function encodePath(value: string): string {
  return value.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}

function toRegistryError(error: unknown, config: AxiosRequestConfig): RegistryError {
  if (error instanceof RegistryError) return error;

  const request = `${(config.method ?? 'GET').toUpperCase()} ${config.url}`;
  if (axios.isAxiosError(error)) {
    const body = errorBodySchema.safeParse(error.response?.data);
    const errorCode = body.success ? body.data.error_code : undefined;
    const detail = body.success && body.data.message ? body.data.message : error.message;
    return new RegistryError(`${request} failed: ${detail}`, {
      status: error.response?.status,
      errorCode,
    });
  }
  return new RegistryError(`${request} failed: ${getErrorMessage(error)}`);
}

// ============================================
// Client
// ============================================

export class MlflowClient {
  private readonly http: AxiosInstance;
  private readonly retry: RetryOptions;
  /** Creates are not idempotent: retry only failures raised before the server acts */
  private readonly createRetry: RetryOptions;
  readonly trackingUri: string;

  constructor(options: MlflowClientOptions) {
    this.trackingUri = options.trackingUri.replace(/\/+$/, '');
    this.retry = {
      ...options.retry,
      onRetry: (error, attempt) => {
        log.warn(`Retrying tracker request (attempt ${attempt}): ${error.message}`);
        options.retry?.onRetry?.(error, attempt);
      },
    };
    this.createRetry = {
      ...this.retry,
      retryableErrors: ['ECONNREFUSED', 'EAI_AGAIN'],
      retryableStatuses: [429, 503],
    };
    this.http = axios.create({
      baseURL: this.trackingUri,
      timeout: options.timeoutMs ?? 30000,
      auth: options.username && options.password
        ? { username: options.username, password: options.password }
        : undefined,
    });
  }

  // ------------------------------------------
  // Experiments and runs
  // ------------------------------------------

  async getExperimentByName(name: string): Promise<Experiment | null> {
    try {
      const data = await this.request(z.object({ experiment: experimentSchema }), {
        method: 'GET',
        url: `${API}/experiments/get-by-name`,
        params: { experiment_name: name },
      });
      return data.experiment;
    } catch (error) {
      if (error instanceof RegistryError && error.errorCode === 'RESOURCE_DOES_NOT_EXIST') {
        return null;
      }
      throw error;
    }
  }

  async createExperiment(name: string): Promise<string> {
    const data = await this.request(z.object({ experiment_id: z.string() }), {
      method: 'POST',
      url: `${API}/experiments/create`,
      data: { name },
    }, this.createRetry);
    log.info(`Created experiment "${name}" (${data.experiment_id})`);
    return data.experiment_id;
  }

  async getOrCreateExperiment(name: string): Promise<string> {
    const existing = await this.getExperimentByName(name);
    return existing ? existing.experiment_id : this.createExperiment(name);
  }

  async createRun(
    experimentId: string,
    options: { runName?: string; tags?: Record<string, string> } = {}
  ): Promise<RunInfo> {
    const data = await this.request(runResponseSchema, {
      method: 'POST',
      url: `${API}/runs/create`,
      data: {
        experiment_id: experimentId,
        run_name: options.runName,
        start_time: Date.now(),
        tags: Object.entries(options.tags ?? {}).map(([key, value]) => ({ key, value })),
      },
    }, this.createRetry);
    return data.run.info;
  }

  async getRun(runId: string): Promise<RunInfo> {
    const data = await this.request(runResponseSchema, {
      method: 'GET',
      url: `${API}/runs/get`,
      params: { run_id: runId },
    });
    return data.run.info;
  }

  async logBatch(runId: string, input: LogBatchInput): Promise<void> {
    const timestamp = Date.now();
    await this.request(emptySchema, {
      method: 'POST',
      url: `${API}/runs/log-batch`,
      data: {
        run_id: runId,
        params: Object.entries(input.params ?? {}).map(([key, value]) => ({ key, value: String(value) })),
        metrics: Object.entries(input.metrics ?? {}).map(([key, value]) => ({ key, value, timestamp, step: 0 })),
        tags: Object.entries(input.tags ?? {}).map(([key, value]) => ({ key, value })),
      },
    });
  }

  async finishRun(runId: string, status: RunStatus = 'FINISHED'): Promise<void> {
    await this.request(emptySchema, {
      method: 'POST',
      url: `${API}/runs/update`,
      data: { run_id: runId, status, end_time: Date.now() },
    });
  }

  // ------------------------------------------
  // Artifacts
  // ------------------------------------------

  async uploadArtifact(run: RunInfo, artifactPath: string, content: Buffer): Promise<void> {
    await this.request(emptySchema, {
      method: 'PUT',
      url: this.artifactUrl(run, artifactPath),
      data: content,
      headers: { 'Content-Type': 'application/octet-stream' },
    });
  }

  /**
   * Upload the regular files of localDir under artifactPath. Returns the artifact paths written.
   */
  async uploadDirectory(run: RunInfo, localDir: string, artifactPath: string): Promise<string[]> {
    const entries = await fs.readdir(localDir, { withFileTypes: true });
    const uploaded: string[] = [];

    for (const entry of entries) {
      const target = `${artifactPath}/${entry.name}`;
      if (entry.isDirectory()) {
        uploaded.push(...await this.uploadDirectory(run, path.join(localDir, entry.name), target));
      } else if (entry.isFile()) {
        await this.uploadArtifact(run, target, await fs.readFile(path.join(localDir, entry.name)));
        uploaded.push(target);
      }
    }
    return uploaded;
  }

  async listArtifacts(runId: string, artifactPath?: string): Promise<ArtifactFile[]> {
    const data = await this.request(z.object({ files: z.array(fileInfoSchema).optional() }), {
      method: 'GET',
      url: `${API}/artifacts/list`,
      params: { run_id: runId, path: artifactPath },
    });
    return data.files ?? [];
  }

  async downloadArtifact(run: RunInfo, artifactPath: string): Promise<Buffer> {
    const config: AxiosRequestConfig = {
      method: 'GET',
      url: this.artifactUrl(run, artifactPath),
      responseType: 'arraybuffer',
    };
    try {
      const response = await withRetry(() => this.http.request<ArrayBuffer>(config), this.retry);
      return Buffer.from(response.data);
    } catch (error) {
      throw toRegistryError(error, config);
    }
  }

  /**
   * Copy every file under artifactPath of a run into destDir, keeping relative layout
   */
  async downloadArtifacts(runId: string, artifactPath: string, destDir: string): Promise<string[]> {
    const run = await this.getRun(runId);
    const files = await this.collectFiles(runId, artifactPath);
    if (files.length === 0) {
      throw new RegistryError(`Run ${runId} has no artifacts under ${artifactPath}`);
    }

    const written: string[] = [];
    for (const file of files) {
      const relative = path.posix.relative(artifactPath, file);
      if (!relative || relative.startsWith('..')) {
        throw new RegistryError(`Artifact ${file} lies outside ${artifactPath}`);
      }
      const target = path.join(destDir, ...relative.split('/'));
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await this.downloadArtifact(run, file));
      written.push(target);
    }

    log.info(`Downloaded ${written.length} artifacts from run ${runId}/${artifactPath}`);
    return written;
  }

  // ------------------------------------------
  // Model registry
  // ------------------------------------------

  /**
   * Create a registered model; an existing one with the same name is left as is
   */
  async createRegisteredModel(name: string): Promise<void> {
    try {
      await this.request(emptySchema, {
        method: 'POST',
        url: `${API}/registered-models/create`,
        data: { name },
      });
      log.info(`Created registered model "${name}"`);
    } catch (error) {
      if (error instanceof RegistryError && error.errorCode === 'RESOURCE_ALREADY_EXISTS') {
        return;
      }
      throw error;
    }
  }

  async createModelVersion(name: string, source: string, runId: string): Promise<ModelVersion> {
    const data = await this.request(z.object({ model_version: modelVersionSchema }), {
      method: 'POST',
      url: `${API}/model-versions/create`,
      data: { name, source, run_id: runId },
    }, this.createRetry);
    return data.model_version;
  }

  async getModelVersion(name: string, version: string): Promise<ModelVersion> {
    const data = await this.request(z.object({ model_version: modelVersionSchema }), {
      method: 'GET',
      url: `${API}/model-versions/get`,
      params: { name, version },
    });
    return data.model_version;
  }

  async transitionModelVersionStage(
    name: string,
    version: string,
    stage: string,
    archiveExistingVersions: boolean = false
  ): Promise<ModelVersion> {
    const data = await this.request(z.object({ model_version: modelVersionSchema }), {
      method: 'POST',
      url: `${API}/model-versions/transition-stage`,
      data: { name, version, stage, archive_existing_versions: archiveExistingVersions },
    });
    return data.model_version;
  }

  async getLatestVersions(name: string, stages: string[] = []): Promise<ModelVersion[]> {
    const data = await this.request(z.object({ model_versions: z.array(modelVersionSchema).optional() }), {
      method: 'POST',
      url: `${API}/registered-models/get-latest-versions`,
      data: { name, stages },
    });
    return data.model_versions ?? [];
  }

  /**
   * Resolve runs:/<run_id>/<path> or models:/<name>/<stage|version> to a run and artifact path
   */
  async resolveModelUri(uri: string): Promise<ModelLocation> {
    const runsUri = parseRunsUri(uri);
    if (runsUri) return runsUri;

    const match = /^models:\/+([^/]+)\/([^/]+)$/.exec(uri);
    if (!match) {
      throw new RegistryError(
        `Unsupported model URI ${uri}: expected runs:/<run_id>/<path> or models:/<name>/<stage|version>`
      );
    }

    const [, name, reference] = match;
    const version = /^\d+$/.test(reference)
      ? await this.getModelVersion(name, reference)
      : (await this.getLatestVersions(name, [reference]))[0];

    if (!version) {
      throw new RegistryError(`Model ${name} has no version in stage ${reference}`);
    }
    if (!version.run_id) {
      throw new RegistryError(`Model ${name} version ${version.version} is not linked to a run`);
    }

    return { runId: version.run_id, artifactPath: await this.artifactPathOf(version, version.run_id) };
  }

  /**
   * Download the files a model URI points at into destDir
   */
  async downloadModel(uri: string, destDir: string): Promise<string> {
    const location = await this.resolveModelUri(uri);
    await this.downloadArtifacts(location.runId, location.artifactPath, destDir);
    return destDir;
  }

  // ------------------------------------------
  // Internals
  // ------------------------------------------

  private async artifactPathOf(version: ModelVersion, runId: string): Promise<string> {
    const source = version.source ?? '';
    const runsUri = parseRunsUri(source);
    if (runsUri) return runsUri.artifactPath;

    const run = await this.getRun(runId);
    if (run.artifact_uri && source.startsWith(`${run.artifact_uri}/`)) {
      return source.slice(run.artifact_uri.length + 1);
    }
    throw new RegistryError(`Cannot locate files of ${version.name} version ${version.version} (source ${source})`);
  }

  private async collectFiles(runId: string, artifactPath: string): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await this.listArtifacts(runId, artifactPath)) {
      if (entry.is_dir) {
        files.push(...await this.collectFiles(runId, entry.path));
      } else {
        files.push(entry.path);
      }
    }
    return files;
  }

  private artifactUrl(run: RunInfo, artifactPath: string): string {
    if (!run.artifact_uri) {
      throw new RegistryError(`Run ${run.run_id} has no artifact location`);
    }
    return `${ARTIFACTS_API}/${encodePath(artifactBasePath(run.artifact_uri))}/${encodePath(artifactPath)}`;
  }

  private async request<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    config: AxiosRequestConfig,
    retry: RetryOptions = this.retry
  ): Promise<T> {
    let data: unknown;
    try {
      const response = await withRetry(() => this.http.request<unknown>(config), retry);
      data = response.data;
    } catch (error) {
      throw toRegistryError(error, config);
    }

    const parsed = schema.safeParse(data === '' || data === undefined ? {} : data);
    if (!parsed.success) {
      throw new RegistryError(
        `Unexpected response from ${config.url}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`
      );
    }
    return parsed.data;
  }
}

/**
 * Client for the configured tracking server, or null when none is configured
 */
export function createMlflowClient(config: {
  uri?: string;
  username?: string;
  password?: string;
}, retry?: RetryOptions): MlflowClient | null {
  if (!config.uri) return null;
  return new MlflowClient({
    trackingUri: config.uri,
    username: config.username,
    password: config.password,
    retry,
  });
}
