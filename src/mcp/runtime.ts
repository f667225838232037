/**
 * @fileoverview Startup wiring for the server: one encoder, one index and one
 * ingestion pipeline, built once and handed to the query service.
 *
 * @module mcp/runtime
 */

import type { RagConfig } from '../types/config.js';
import {
  Embedder,
  IngestionPipeline,
  QueryService,
  VectorIndex,
  type EmbeddingEncoder,
  type LoadOutcome,
} from '../core/vector/index.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('runtime');

// ============================================================
// Encoder Factory
// ============================================================

export type EncoderFactory = (config: RagConfig) => Promise<EmbeddingEncoder>;

/** Connects to the configured embeddings endpoint. */
export const loadEncoder: EncoderFactory = config =>
  Embedder.create({
    model: config.embedding.model,
    baseUrl: config.embedding.baseUrl,
    apiKey: config.embedding.apiKey,
    batch: config.embedding.batch,
    norm: config.embedding.normalize,
  });

// ============================================================
// Runtime
// ============================================================

export class Runtime {
  readonly config: RagConfig;
  readonly service: QueryService;
  private pipeline: IngestionPipeline | null = null;

  constructor(config: RagConfig) {
    this.config = config;
    this.service = new QueryService({}, config.query);
  }

  /**
   * Build the encoder, load (or create) the persisted index and attach both
   * to the query service. Requests that arrive earlier get "not ready".
   */
  async start(makeEncoder: EncoderFactory = loadEncoder): Promise<LoadOutcome> {
    const encoder = await makeEncoder(this.config);
    const index = new VectorIndex(encoder, { path: this.config.store.path, name: this.config.store.indexName });
    const outcome = await index.load();

    this.pipeline = new IngestionPipeline(index, {
      chunkSize: this.config.chunking.size,
      chunkOverlap: this.config.chunking.overlap,
      batchSize: this.config.ingestion.batchSize,
    });
    this.service.attach({ index, encoder });

    log.info(`Vector store ${outcome} with ${index.size} documents`);
    return outcome;
  }

  /** Ingestion pipeline, or null while startup is still running. */
  ingestion(): IngestionPipeline | null {
    return this.pipeline;
  }
}
