import 'dotenv/config';
import { createLogger } from './logger';

const log = createLogger('Config');

/**
 * Optional variable: undefined when unset or empty
 */
export function getOptionalEnv(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name];
    if (value) return value;
  }
  return undefined;
}

export function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    log.warn(`Invalid number for ${name}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export interface TrackingConfig {
  uri?: string;
  username?: string;
  password?: string;
}

/**
 * Tracking server settings. DagsHub credentials take precedence over the
 * generic MLflow ones.
 */
export function loadTrackingConfig(): TrackingConfig {
  return {
    uri: getOptionalEnv('MLFLOW_TRACKING_URI'),
    username: getOptionalEnv('DAGSHUB_USERNAME', 'MLFLOW_TRACKING_USERNAME'),
    password: getOptionalEnv('DAGSHUB_TOKEN', 'MLFLOW_TRACKING_PASSWORD'),
  };
}
