/**
 * @fileoverview Vector infrastructure types - single source of truth.
 * All vector-related types centralized here.
 */

import type { JsonObject } from '../../types/base.js';

// =============================================================================
// Core Data Structures
// =============================================================================

/** Metadata attached to a stored document. Plain JSON so it persists as-is. */
export type DocMeta = JsonObject;

/** A window of a longer text. Never persisted on its own. */
export interface Chunk {
  text: string;
  /** Code-point offset of the first character (inclusive) */
  start: number;
  /** Code-point offset one past the last character */
  end: number;
}

/** A stored document as seen by readers. `id` is its insertion position. */
export interface StoredDoc {
  id: number;
  text: string;
  metadata: DocMeta;
}

// =============================================================================
// Encoder
// =============================================================================

/**
 * Capability set every embedding backend provides.
 * Vectors returned by `encode` all have length `dimension()`.
 */
export interface EmbeddingEncoder {
  encode(batch: readonly string[]): Promise<Float32Array[]>;
  encodeSingle(text: string): Promise<Float32Array>;
  dimension(): number;
}

// =============================================================================
// Search
// =============================================================================

export interface SearchHit {
  id: number;
  text: string;
  metadata: DocMeta;
  /** 1 / (1 + distance), in (0, 1] */
  score: number;
  /** Squared Euclidean distance to the query vector */
  distance: number;
}

/** Raw neighbor from the flat index, nearest first. */
export interface Neighbor {
  id: number;
  distance: number;
}

// =============================================================================
// Index
// =============================================================================

export type IndexState = 'uninitialized' | 'empty' | 'populated';

export interface IndexStats {
  totalDocuments: number;
  dimension: number;
  loaded: boolean;
  storePath: string;
  indexName: string;
}

/** How `load()` ended: restored from disk, fresh because nothing was there, or fresh after a failure. */
export type LoadOutcome = 'loaded' | 'created' | 'recovered';

// =============================================================================
// Ingestion Reports
// =============================================================================

export interface FileFailure {
  path: string;
  error: string;
}

export interface DirectoryReport {
  matched: number;
  ingested: number;
  documents: number;
  failed: FileFailure[];
}

export interface JsonlReport {
  lines: number;
  ingested: number;
  skipped: number;
}

// =============================================================================
// Helpers
// =============================================================================

/** Similarity score for a squared L2 distance. Strictly decreasing, bounded in (0, 1]. */
export const scoreOf = (distance: number): number => 1 / (1 + distance);

export const hit = (doc: StoredDoc, distance: number): SearchHit => ({
  id: doc.id,
  text: doc.text,
  metadata: doc.metadata,
  score: scoreOf(distance),
  distance,
});
