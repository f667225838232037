/**
 * @fileoverview Error taxonomy for the retrieval engine.
 * Every error raised by the core extends RetrievalError and carries a
 * stable `code` that the serving boundary can report.
 *
 * @module core/errors
 */

export type ErrorCode = 'configuration' | 'not_found' | 'decode' | 'encoding' | 'persistence';

export class RetrievalError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'RetrievalError';
  }
}

/** Invalid settings, e.g. a chunk overlap not smaller than the chunk size. */
export class ConfigurationError extends RetrievalError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

/** Missing file or directory target. */
export class NotFoundError extends RetrievalError {
  readonly path: string;

  constructor(path: string, what: 'file' | 'directory' = 'file') {
    super('not_found', `${what === 'file' ? 'File' : 'Directory'} not found: ${path}`);
    this.path = path;
    this.name = 'NotFoundError';
  }
}

/** Malformed structured record, JSON line, or undecodable text. */
export class DecodeError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super('decode', message, { cause });
    this.name = 'DecodeError';
  }
}

/** The encoder was misused or returned unusable output. */
export class EncodingError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super('encoding', message, { cause });
    this.name = 'EncodingError';
  }
}

/** Corrupt or partial store artifacts. Recovered from at load time. */
export class PersistenceError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super('persistence', message, { cause });
    this.name = 'PersistenceError';
  }
}

export const isRetrievalError = (e: unknown): e is RetrievalError => e instanceof RetrievalError;
