/**
 * @fileoverview Configuration types for the retrieval engine.
 * Mirrors the structure of the optional .ragcore.json file.
 *
 * @module types/config
 */

// ============================================================
// Enumerations
// ============================================================

/**
 * Log verbosity, from most to least verbose.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// ============================================================
// Sections
// ============================================================

/**
 * Where the index artifacts live.
 */
export interface StoreConfig {
    /** Directory holding the artifacts (created on save) */
    readonly path: string;
    /** Base name of the artifact pair */
    readonly indexName: string;
}

/**
 * Embedding endpoint settings. Any OpenAI-compatible embeddings API works.
 */
export interface EmbeddingConfig {
    /** Embedding model id as the endpoint names it */
    readonly model: string;
    /** Endpoint base URL, e.g. http://localhost:11434/v1 for Ollama */
    readonly baseUrl: string;
    /** API key; OPENAI_API_KEY is used when absent */
    readonly apiKey?: string;
    /** Maximum texts per request */
    readonly batch: number;
    /** Scale vectors to unit length before indexing */
    readonly normalize: boolean;
}

/**
 * Sliding-window chunking settings, in characters.
 */
export interface ChunkingConfig {
    readonly size: number;
    readonly overlap: number;
}

/**
 * Ingestion defaults.
 */
export interface IngestionConfig {
    /** Documents per add call when streaming line-delimited input */
    readonly batchSize: number;
    /** Default glob for directory ingestion */
    readonly pattern: string;
    readonly recursive: boolean;
}

/**
 * Query defaults applied at the serving boundary.
 */
export interface QueryConfig {
    readonly topK: number;
    readonly threshold: number;
}

export interface LogConfig {
    readonly level: LogLevel;
}

// ============================================================
// Root
// ============================================================

/**
 * Complete engine configuration.
 */
export interface RagConfig {
    readonly version: 1;
    readonly store: StoreConfig;
    readonly embedding: EmbeddingConfig;
    readonly chunking: ChunkingConfig;
    readonly ingestion: IngestionConfig;
    readonly query: QueryConfig;
    readonly log: LogConfig;
}
