/**
 * @fileoverview Shared utilities for vector infrastructure.
 * Vector math and metadata helpers.
 */

import type { DocMeta } from './types.js';

// =============================================================================
// Vector Math
// =============================================================================

/** Squared Euclidean distance between `q` and the row of `data` starting at `offset` */
export const squaredL2At = (q: Float32Array, data: Float32Array, offset: number): number => {
  let sum = 0;
  for (let i = 0; i < q.length; i++) {
    const d = (q[i] ?? 0) - (data[offset + i] ?? 0);
    sum += d * d;
  }
  return sum;
};

/** True when every component is a finite number */
export const isFiniteVector = (v: Float32Array): boolean => v.every(Number.isFinite);

// =============================================================================
// Metadata
// =============================================================================

/** Independent deep copy, so chunks of one text never share a metadata object */
export const cloneMeta = (meta: DocMeta | undefined): DocMeta => (meta ? structuredClone(meta) : {});

/** Plain-object check for parsed JSON */
export const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);
