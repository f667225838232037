/**
 * @fileoverview Sliding-window chunker for long documents.
 * Splits text into fixed-size windows that overlap by a fixed amount.
 */

import type { Chunk } from './types.js';
import { ConfigurationError } from '../errors.js';

// =============================================================================
// Config
// =============================================================================

export interface ChunkerOpts {
  /** Window length in characters */
  size: number;
  /** Characters shared by consecutive windows */
  overlap: number;
}

export const DEFAULT_OPTS: ChunkerOpts = {
  size: 500,
  overlap: 50,
};

/** Throws ConfigurationError unless `size` and `overlap` describe a forward-moving window. */
export function validateChunking(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= size) {
    throw new ConfigurationError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size})`);
  }
}

// =============================================================================
// Chunking
// =============================================================================

/**
 * Split text into windows of `size` characters advancing by `size - overlap`.
 * Text no longer than `size` comes back as a single unchanged chunk.
 *
 * Characters are code points: a surrogate pair is never split, and offsets
 * count code points rather than UTF-16 units.
 */
export function chunkSpans(text: string, size: number, overlap: number): Chunk[] {
  validateChunking(size, overlap);
  const chars = Array.from(text);
  if (chars.length <= size) return [{ text, start: 0, end: chars.length }];

  const stride = size - overlap;
  const out: Chunk[] = [];
  for (let start = 0; start < chars.length; start += stride) {
    const end = Math.min(start + size, chars.length);
    out.push({ text: chars.slice(start, end).join(''), start, end });
  }
  return out;
}

export const chunkText = (text: string, size: number, overlap: number): string[] =>
  chunkSpans(text, size, overlap).map(c => c.text);

// =============================================================================
// Chunker
// =============================================================================

export class Chunker {
  private opts: ChunkerOpts;

  constructor(opts: Partial<ChunkerOpts> = {}) {
    this.opts = { ...DEFAULT_OPTS, ...opts };
    validateChunking(this.opts.size, this.opts.overlap);
  }

  get size(): number { return this.opts.size; }
  get overlap(): number { return this.opts.overlap; }

  /** Windows with their offsets */
  split(text: string): Chunk[] { return chunkSpans(text, this.opts.size, this.opts.overlap); }

  /** Window texts only */
  chunk(text: string): string[] { return chunkText(text, this.opts.size, this.opts.overlap); }
}
