/**
 * @fileoverview Exact nearest-neighbor index over squared Euclidean distance.
 * Rows live in one growable Float32Array; search is a full scan.
 *
 * Binary layout (little-endian):
 *   0  'RIDX'        magic
 *   4  u32 version   (1)
 *   8  u32 dim
 *   12 u32 count
 *   16 f32[count * dim]
 */

import type { Neighbor } from './types.js';
import { squaredL2At, isFiniteVector } from './utils.js';
import { EncodingError, PersistenceError } from '../errors.js';

// =============================================================================
// Constants
// =============================================================================

const MAGIC = 0x58444952; // 'RIDX' read as little-endian u32
const VERSION = 1;
const HEADER_BYTES = 16;
const MIN_CAPACITY = 16;

// =============================================================================
// Flat Index
// =============================================================================

export class FlatIndex {
  readonly dim: number;
  private data: Float32Array;
  private n = 0;

  constructor(dim: number) {
    if (!Number.isInteger(dim) || dim < 1) throw new EncodingError(`Index dimension must be a positive integer, got ${dim}`);
    this.dim = dim;
    this.data = new Float32Array(MIN_CAPACITY * dim);
  }

  get count(): number { return this.n; }

  /** Append rows. Validates every row before any is written. */
  add(vecs: readonly Float32Array[]): void {
    for (const [i, v] of vecs.entries()) {
      if (v.length !== this.dim) throw new EncodingError(`Vector ${i} has dimension ${v.length}, index expects ${this.dim}`);
      if (!isFiniteVector(v)) throw new EncodingError(`Vector ${i} contains non-finite values`);
    }
    this.reserve(this.n + vecs.length);
    for (const v of vecs) {
      this.data.set(v, this.n * this.dim);
      this.n++;
    }
  }

  /** The `k` nearest rows, nearest first; ties go to the lower id. */
  search(q: Float32Array, k: number): Neighbor[] {
    if (q.length !== this.dim) throw new EncodingError(`Query has dimension ${q.length}, index expects ${this.dim}`);
    const limit = Math.min(Math.floor(k), this.n);
    if (limit < 1) return [];

    const best: Neighbor[] = [];
    for (let id = 0; id < this.n; id++) {
      const distance = squaredL2At(q, this.data, id * this.dim);
      if (best.length === limit && distance >= (best[limit - 1]?.distance ?? Infinity)) continue;
      let pos = best.length;
      while (pos > 0 && (best[pos - 1]?.distance ?? -Infinity) > distance) pos--;
      best.splice(pos, 0, { id, distance });
      if (best.length > limit) best.pop();
    }
    return best;
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  serialize(): Uint8Array {
    const buf = new Uint8Array(HEADER_BYTES + this.n * this.dim * 4);
    const view = new DataView(buf.buffer);
    view.setUint32(0, MAGIC, true);
    view.setUint32(4, VERSION, true);
    view.setUint32(8, this.dim, true);
    view.setUint32(12, this.n, true);
    for (let i = 0; i < this.n * this.dim; i++) view.setFloat32(HEADER_BYTES + i * 4, this.data[i] ?? 0, true);
    return buf;
  }

  static deserialize(bytes: Uint8Array): FlatIndex {
    if (bytes.byteLength < HEADER_BYTES) throw new PersistenceError(`Index artifact truncated: ${bytes.byteLength} bytes`);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (view.getUint32(0, true) !== MAGIC) throw new PersistenceError('Index artifact has an unknown format');
    const version = view.getUint32(4, true);
    if (version !== VERSION) throw new PersistenceError(`Unsupported index format version ${version}`);

    const dim = view.getUint32(8, true), count = view.getUint32(12, true);
    if (dim < 1) throw new PersistenceError('Index artifact declares dimension 0');
    const expected = HEADER_BYTES + count * dim * 4;
    if (bytes.byteLength !== expected) {
      throw new PersistenceError(`Index artifact size mismatch: expected ${expected} bytes, found ${bytes.byteLength}`);
    }

    const idx = new FlatIndex(dim);
    idx.reserve(count);
    for (let i = 0; i < count * dim; i++) idx.data[i] = view.getFloat32(HEADER_BYTES + i * 4, true);
    idx.n = count;
    return idx;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private reserve(rows: number): void {
    if (rows * this.dim <= this.data.length) return;
    let cap = Math.max(this.data.length / this.dim, MIN_CAPACITY);
    while (cap < rows) cap *= 2;
    const next = new Float32Array(cap * this.dim);
    next.set(this.data.subarray(0, this.n * this.dim));
    this.data = next;
  }
}
