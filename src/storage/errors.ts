/**
 * Persistence Error Types
 *
 * Raised by PersistenceEngine implementations. PersistenceBinding recovers
 * from the load-side kinds; save-side failures always surface.
 */

export type PersistenceErrorCode = 'UNKNOWN_FORMAT' | 'LOAD_FAILED' | 'SAVE_FAILED' | 'FILE_MISSING';

/**
 * Base persistence error.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    public readonly code: PersistenceErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * No codec is registered for the requested format.
 */
export class UnknownFormatError extends PersistenceError {
  constructor(
    path: string,
    public readonly format: string
  ) {
    super(path, `Unknown data format "${format}" for ${path}`, 'UNKNOWN_FORMAT');
    this.name = 'UnknownFormatError';
  }
}

/**
 * File exists but could not be read or decoded.
 */
export class DataLoadError extends PersistenceError {
  constructor(path: string, cause: unknown) {
    super(
      path,
      `Failed to load ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'LOAD_FAILED',
      { cause }
    );
    this.name = 'DataLoadError';
  }
}

/**
 * Tree could not be encoded or written.
 */
export class DataSaveError extends PersistenceError {
  constructor(path: string, cause: unknown) {
    super(
      path,
      `Failed to save ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'SAVE_FAILED',
      { cause }
    );
    this.name = 'DataSaveError';
  }
}

/**
 * Data file does not exist.
 */
export class DataFileMissingError extends PersistenceError {
  constructor(path: string) {
    super(path, `Data file not found: ${path}`, 'FILE_MISSING');
    this.name = 'DataFileMissingError';
  }
}

/**
 * Errors PersistenceBinding.load() recovers from outside debug mode.
 */
export function isRecoverableLoadError(error: unknown): error is PersistenceError {
  return (
    error instanceof UnknownFormatError ||
    error instanceof DataLoadError ||
    error instanceof DataFileMissingError
  );
}
