// src/utils/errorHandler.ts
import { logger } from './logger.js';

export class AppError extends Error {
  constructor(
    public message: string,
    public exitCode: number = 1,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed or missing configuration. Raised before any external call. */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 2, 'CONFIG_ERROR', details);
  }
}

/** Bad arguments or a missing input file supplied by the user. */
export class InputError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 2, 'INPUT_ERROR', details);
  }
}

export class TemplateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'TEMPLATE_ERROR', details);
  }
}

export class InferenceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'INFERENCE_ERROR', details);
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'TIMEOUT_ERROR', details);
  }
}

export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'STORAGE_ERROR', details);
  }
}

export class MissingSceneError extends AppError {
  constructor(
    message: string,
    public missingScenes: number[] = []
  ) {
    super(message, 1, 'MISSING_SCENE', { missingScenes });
  }
}

export class ExportError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'EXPORT_ERROR', details);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Report an error that escaped a command and return the process exit code.
 */
export const handleError = (error: unknown, verbose: boolean = false): number => {
  if (error instanceof AppError) {
    logger.error(`${error.name}: ${error.message}`);
    if (verbose && error.details !== undefined) {
      logger.error('Details', error.details);
    }
    return error.exitCode;
  }

  logger.error(errorMessage(error), verbose ? error : undefined);
  return 1;
};
