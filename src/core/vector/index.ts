/**
 * @fileoverview Vector indexing and retrieval infrastructure.
 * Chunking, embedding, exact nearest-neighbor storage, ingestion and the
 * query façade used at the serving boundary.
 */

// Types - single source of truth
export * from './types.js';

// Utilities
export * from './utils.js';

// Schemas
export { jsonValue, docMeta, sideTable, type SideTable } from './schema.js';

// Chunking
export { Chunker, chunkText, chunkSpans, validateChunking, DEFAULT_OPTS as DEFAULT_CHUNKER, type ChunkerOpts } from './chunker.js';

// Embedding
export { Embedder, DEFAULT_EMBEDDER, OPENAI_DEFAULT_BASE, embedFnFor, type EmbedderOpts, type EmbedFn } from './embedder.js';

// Storage
export { FlatIndex } from './flat.js';
export { VectorIndex, DEFAULT_DB, type DbOpts } from './db.js';

// Ingestion
export { IngestionPipeline, DEFAULT_INGEST, type IngestOpts } from './ingestion.js';

// Query
export {
  QueryService,
  DEFAULT_QUERY,
  type QueryDefaults,
  type QueryResponse,
  type IngestResponse,
  type HealthStatus,
  type ServiceError,
  type ServiceHandles,
} from './query.js';
