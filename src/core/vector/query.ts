/**
 * @fileoverview Request/response façade over the vector index for the
 * serving boundary. Every call returns a Result; "not ready" is its own
 * error variant so callers can retry instead of treating it as fatal.
 */

import { z } from 'zod';
import type { AsyncResult, Result } from '../../types/base.js';
import type { DocMeta, EmbeddingEncoder, IndexStats, SearchHit } from './types.js';
import type { VectorIndex } from './db.js';
import { docMeta } from './schema.js';
import { isRetrievalError, type ErrorCode } from '../errors.js';
import { attempt, err, errorMessage, mapResult, ok } from '../../utils/result.js';
import { createLogger } from '../../utils/log.js';

const log = createLogger('query');

// =============================================================================
// Types
// =============================================================================

export type ServiceError =
  | { readonly type: 'not_ready'; readonly message: string }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'internal'; readonly message: string; readonly code?: ErrorCode | undefined };

export interface QueryResponse {
  query: string;
  results: SearchHit[];
}

export interface IngestResponse {
  documentId: string;
}

export interface HealthStatus {
  status: 'healthy';
  indexLoaded: boolean;
  encoderReady: boolean;
}

/** Shared handles built once at startup. Absent while startup is still running. */
export interface ServiceHandles {
  index?: VectorIndex | null;
  encoder?: EmbeddingEncoder | null;
}

export interface QueryDefaults {
  topK: number;
  threshold: number;
}

export const DEFAULT_QUERY: QueryDefaults = {
  topK: 5,
  threshold: 0.7,
};

const queryArgs = z.object({
  query: z.string({ invalid_type_error: 'query must be a string' }),
  topK: z.number().int('topK must be an integer').positive('topK must be positive'),
  threshold: z.number().finite('threshold must be a finite number'),
});

const ingestArgs = z.object({
  text: z.string({ invalid_type_error: 'text must be a string' }),
  metadata: docMeta.optional(),
});

const NOT_READY: ServiceError = { type: 'not_ready', message: 'Vector store not loaded' };

const toServiceError = (e: unknown): ServiceError =>
  ({ type: 'internal', message: errorMessage(e), code: isRetrievalError(e) ? e.code : undefined });

const invalid = (issues: z.ZodIssue[]): ServiceError =>
  ({ type: 'invalid', message: issues.map(i => i.message).join('; ') });

// =============================================================================
// Query Service
// =============================================================================

export class QueryService {
  private index: VectorIndex | null;
  private encoder: EmbeddingEncoder | null;
  private readonly defaults: QueryDefaults;

  constructor(handles: ServiceHandles = {}, defaults: Partial<QueryDefaults> = {}) {
    this.index = handles.index ?? null;
    this.encoder = handles.encoder ?? null;
    this.defaults = { ...DEFAULT_QUERY, ...defaults };
  }

  /** Install the handles once startup has built them. */
  attach(handles: ServiceHandles): void {
    if (handles.index !== undefined) this.index = handles.index;
    if (handles.encoder !== undefined) this.encoder = handles.encoder;
  }

  health(): HealthStatus {
    return {
      status: 'healthy',
      indexLoaded: this.index?.isLoaded() ?? false,
      encoderReady: this.encoder !== null,
    };
  }

  async query(text: string, topK = this.defaults.topK, threshold = this.defaults.threshold): AsyncResult<QueryResponse, ServiceError> {
    const index = this.ready();
    if (!index) return err(NOT_READY);

    const args = queryArgs.safeParse({ query: text, topK, threshold });
    if (!args.success) return err(invalid(args.error.issues));

    const res = await attempt(() => index.search(args.data.query, args.data.topK, args.data.threshold), toServiceError);
    if (!res.ok) log.error(`Query failed: ${res.error.message}`);
    return mapResult(res, results => ({ query: args.data.query, results }));
  }

  async ingest(text: string, metadata?: DocMeta): AsyncResult<IngestResponse, ServiceError> {
    const index = this.ready();
    if (!index) return err(NOT_READY);

    const args = ingestArgs.safeParse({ text, metadata });
    if (!args.success) return err(invalid(args.error.issues));

    const res = await attempt(() => index.addDocument(args.data.text, args.data.metadata ?? {}), toServiceError);
    if (!res.ok) log.error(`Ingestion failed: ${res.error.message}`);
    return mapResult(res, documentId => ({ documentId }));
  }

  async save(): AsyncResult<void, ServiceError> {
    const index = this.ready();
    if (!index) return err(NOT_READY);
    const res = await attempt(() => index.save(), toServiceError);
    if (!res.ok) {
      log.error(`Save failed: ${res.error.message}`);
      return res;
    }
    return res.value ? ok(undefined) : err(NOT_READY);
  }

  stats(): Result<IndexStats, ServiceError> {
    return this.index ? ok(this.index.getStats()) : err(NOT_READY);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private ready(): VectorIndex | null {
    return this.index?.isLoaded() ? this.index : null;
  }
}
