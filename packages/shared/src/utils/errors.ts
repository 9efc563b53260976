/**
 * Error handling utilities
 * Provides type-safe error conversions and the error types raised across the project
 */

/**
 * Safely converts unknown error to Error type
 * Handles cases where catch block receives non-Error values
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return new Error(String(error.message));
  }

  return new Error(String(error));
}

/**
 * Extracts error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * A model bundle directory is missing files or holds malformed ones
 */
export class ModelBundleError extends Error {
  constructor(message: string, readonly directory: string) {
    super(`${message} (${directory})`);
    this.name = 'ModelBundleError';
  }
}

/**
 * The tracking server rejected a request or could not be reached
 */
export class RegistryError extends Error {
  readonly status?: number;
  readonly errorCode?: string;

  constructor(message: string, details: { status?: number; errorCode?: string } = {}) {
    super(message);
    this.name = 'RegistryError';
    this.status = details.status;
    this.errorCode = details.errorCode;
  }
}

/**
 * A pipeline step cannot run with the data or configuration it was given
 */
export class PipelineError extends Error {
  constructor(message: string, readonly step: string) {
    super(`[${step}] ${message}`);
    this.name = 'PipelineError';
  }
}
