/**
 * @fileoverview Barrel file for shared type definitions.
 * Re-exports all types from Layer 0 type modules.
 *
 * @module types
 */

// Base types (foundational, no dependencies)
export type {
    JsonPrimitive,
    JsonValue,
    JsonObject,
    Result,
    AsyncResult,
} from './base.js';

// Config types (no dependencies)
export type {
    LogLevel,
    StoreConfig,
    EmbeddingConfig,
    ChunkingConfig,
    IngestionConfig,
    QueryConfig,
    LogConfig,
    RagConfig,
} from './config.js';
