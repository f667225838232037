/**
 * @fileoverview Embedding generation through the AI SDK.
 * Talks to any OpenAI-compatible embeddings endpoint (OpenAI itself, or a
 * local server such as Ollama's /v1 API) via `embedMany`.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { embedMany, type EmbeddingModel } from 'ai';
import type { EmbeddingEncoder } from './types.js';
import { EncodingError } from '../errors.js';
import { createLogger } from '../../utils/log.js';
import { errorMessage } from '../../utils/result.js';

const log = createLogger('embedder');

// =============================================================================
// Config
// =============================================================================

export interface EmbedderOpts {
  model: string;
  baseUrl: string;
  /** Falls back to OPENAI_API_KEY when unset */
  apiKey?: string | undefined;
  batch: number;
  norm: boolean;
}

export const OPENAI_DEFAULT_BASE = 'https://api.openai.com/v1';

export const DEFAULT_EMBEDDER: EmbedderOpts = {
  model: 'text-embedding-3-small',
  baseUrl: OPENAI_DEFAULT_BASE,
  batch: 32,
  norm: false,
};

const PROBE_TEXT = 'dimension probe';

// =============================================================================
// Backend Shape
// =============================================================================

/** One row per input text, in input order. */
export type EmbedFn = (texts: string[]) => Promise<number[][]>;

/** Adapts an AI SDK embedding model to an {@link EmbedFn}. */
export function embedFnFor(model: EmbeddingModel<string>): EmbedFn {
  return async texts => {
    const result = await embedMany({ model, values: texts });
    return result.embeddings;
  };
}

// =============================================================================
// Embedder
// =============================================================================

export class Embedder implements EmbeddingEncoder {
  private readonly run: EmbedFn;
  private readonly opts: EmbedderOpts;
  private readonly dim: number;

  private constructor(run: EmbedFn, opts: EmbedderOpts, dim: number) {
    this.run = run;
    this.opts = opts;
    this.dim = dim;
  }

  /** Connect to the configured endpoint and fix the output dimension. */
  static async create(opts: Partial<EmbedderOpts> = {}): Promise<Embedder> {
    const o = { ...DEFAULT_EMBEDDER, ...opts };
    log.info(`Using embedding model ${o.model} at ${o.baseUrl}`);

    const provider = createOpenAI({ apiKey: o.apiKey, baseURL: o.baseUrl });
    const embedder = await Embedder.fromEmbedFn(embedFnFor(provider.textEmbeddingModel(o.model)), o);
    log.info(`Embedding model ready. Dimension: ${embedder.dimension()}`);
    return embedder;
  }

  /** Wrap an embedding backend; probes it once for the output dimension. */
  static async fromEmbedFn(run: EmbedFn, opts: Partial<EmbedderOpts> = {}): Promise<Embedder> {
    const o = { ...DEFAULT_EMBEDDER, ...opts };
    if (!Number.isInteger(o.batch) || o.batch < 1) throw new EncodingError(`Batch size must be a positive integer, got ${o.batch}`);

    let rows: number[][];
    try {
      rows = await run([PROBE_TEXT]);
    } catch (e) {
      throw new EncodingError(`Model ${o.model} is unavailable: ${errorMessage(e)}`, e);
    }
    const dim = rows.length === 1 ? rows[0]?.length ?? 0 : 0;
    if (dim < 1) {
      throw new EncodingError(`Model ${o.model} produced ${rows.length} rows of width ${rows[0]?.length ?? 0} for one text`);
    }
    return new Embedder(run, o, dim);
  }

  get model(): string { return this.opts.model; }

  dimension(): number { return this.dim; }

  async encode(batch: readonly string[]): Promise<Float32Array[]> {
    if (!batch.length) throw new EncodingError('Cannot encode an empty batch');

    const out: Float32Array[] = [];
    for (let i = 0; i < batch.length; i += this.opts.batch) {
      const texts = batch.slice(i, i + this.opts.batch);
      out.push(...await this.runBatch(texts));
    }
    return out;
  }

  async encodeSingle(text: string): Promise<Float32Array> {
    const [v] = await this.encode([text]);
    if (!v) throw new EncodingError('Embedding failed');
    return v;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async runBatch(texts: string[]): Promise<Float32Array[]> {
    let rows: number[][];
    try {
      rows = await this.run(texts);
    } catch (e) {
      throw new EncodingError(`Model inference failed: ${errorMessage(e)}`, e);
    }

    if (rows.length !== texts.length || rows.some(r => r.length !== this.dim)) {
      throw new EncodingError(`Expected ${texts.length} rows of width ${this.dim}, got [${rows.map(r => r.length).join(', ')}]`);
    }
    return rows.map(r => this.opts.norm ? unit(r) : Float32Array.from(r));
  }
}

/** Scales a row to unit L2 length; a zero row stays zero. */
function unit(row: readonly number[]): Float32Array {
  let sq = 0;
  for (const x of row) sq += x * x;
  const len = Math.sqrt(sq);
  return Float32Array.from(row, x => len > 0 ? x / len : 0);
}
