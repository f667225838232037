/**
 * @fileoverview Vector index with a parallel document/metadata side table.
 * Single owner of stored documents; persists as an artifact pair under the
 * configured store directory.
 *
 * Mutations (add, clear, load, save) run one at a time through a write queue.
 * Searches are not queued: rows and side-table entries are appended in one
 * synchronous step, so a reader never observes one without the other.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DocMeta, EmbeddingEncoder, IndexState, IndexStats, LoadOutcome, SearchHit, StoredDoc } from './types.js';
import { hit } from './types.js';
import { FlatIndex } from './flat.js';
import { sideTable, type SideTable } from './schema.js';
import { cloneMeta } from './utils.js';
import { ConfigurationError, EncodingError, PersistenceError } from '../errors.js';
import { createLogger } from '../../utils/log.js';
import { errorMessage } from '../../utils/result.js';

const log = createLogger('db');

// =============================================================================
// Config
// =============================================================================

export interface DbOpts {
  /** Store directory */
  path: string;
  /** Artifact base name */
  name: string;
}

export const DEFAULT_DB: DbOpts = {
  path: './vector_store',
  name: 'vector_index',
};

const exists = async (p: string): Promise<boolean> => {
  try { await fs.promises.stat(p); return true; } catch { return false; }
};

/** Write via a temporary sibling and rename, so a crash never leaves a half-written artifact */
const writeAtomic = async (file: string, data: string | Uint8Array): Promise<void> => {
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.promises.writeFile(tmp, data);
  await fs.promises.rename(tmp, file);
};

// =============================================================================
// Vector Index
// =============================================================================

export class VectorIndex {
  private readonly encoder: EmbeddingEncoder;
  private readonly opts: DbOpts;
  private index: FlatIndex | null = null;
  private docs: string[] = [];
  private metas: DocMeta[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(encoder: EmbeddingEncoder, opts: Partial<DbOpts> = {}) {
    this.encoder = encoder;
    this.opts = { ...DEFAULT_DB, ...opts };
    log.debug(`Vector store configured at ${this.opts.path}`);
  }

  get indexPath(): string { return path.join(this.opts.path, `${this.opts.name}.index`); }
  get metaPath(): string { return path.join(this.opts.path, `${this.opts.name}_metadata.json`); }
  get size(): number { return this.index?.count ?? 0; }

  get state(): IndexState {
    if (!this.index) return 'uninitialized';
    return this.index.count ? 'populated' : 'empty';
  }

  isLoaded(): boolean { return this.index !== null; }

  /** Create the backing index if there is none yet. */
  initialize(): void {
    if (!this.index) this.reset();
  }

  // ---------------------------------------------------------------------------
  // Insertion
  // ---------------------------------------------------------------------------

  /**
   * Encode `texts` in one batch and append them. Returns the assigned ids.
   * Nothing is appended if encoding fails.
   */
  add(texts: readonly string[], metas?: readonly (DocMeta | undefined)[]): Promise<number[]> {
    return this.exclusive(async () => {
      if (!texts.length) return [];
      if (metas && metas.length !== texts.length) {
        throw new ConfigurationError(`Got ${metas.length} metadata entries for ${texts.length} texts`);
      }
      this.initialize();

      const vecs = await this.encoder.encode(texts);
      if (vecs.length !== texts.length) throw new EncodingError(`Encoder returned ${vecs.length} vectors for ${texts.length} texts`);

      const index = this.requireIndex();
      const first = index.count;
      index.add(vecs);
      for (const [i, t] of texts.entries()) {
        this.docs.push(t);
        this.metas.push(cloneMeta(metas?.[i]));
      }

      log.info(`Added ${texts.length} documents to vector store`);
      return texts.map((_, i) => first + i);
    });
  }

  /** Single-document convenience; returns the id as a string. */
  async addDocument(text: string, meta?: DocMeta): Promise<string> {
    const [id] = await this.add([text], [meta]);
    if (id === undefined) throw new EncodingError('Document was not stored');
    return String(id);
  }

  // ---------------------------------------------------------------------------
  // Search
  // ---------------------------------------------------------------------------

  /**
   * Nearest stored documents to `query`, scored `1 / (1 + d)` with `d` the
   * squared L2 distance. Results below `threshold` are dropped; the rest come
   * back best first. An uninitialized or empty index yields `[]`.
   */
  async search(query: string, topK = 5, threshold = 0.7): Promise<SearchHit[]> {
    if (!this.index?.count) {
      log.warn('Vector store is empty');
      return [];
    }
    if (topK < 1) return [];

    const q = await this.encoder.encodeSingle(query);
    // Re-read after the await: a clear() may have swapped the index meanwhile
    const index = this.index, docs = this.docs, metas = this.metas;
    if (!index?.count) return [];

    const hits = index.search(q, topK)
      .map(n => hit({ id: n.id, text: docs[n.id] ?? '', metadata: cloneMeta(metas[n.id]) }, n.distance))
      .filter(h => h.score >= threshold);

    log.debug(`Found ${hits.length} results for query`);
    return hits;
  }

  /** Stored document by id, or null */
  get(id: number): StoredDoc | null {
    const text = this.docs[id];
    if (text === undefined) return null;
    return { id, text, metadata: cloneMeta(this.metas[id]) };
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /** Write both artifacts. Returns false (and writes nothing) when there is no index. */
  save(): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.index) {
        log.warn('No index to save');
        return false;
      }
      const table: SideTable = { documents: this.docs, metadata: this.metas };
      const bytes = this.index.serialize();
      const json = JSON.stringify(table);

      await fs.promises.mkdir(this.opts.path, { recursive: true });
      await writeAtomic(this.indexPath, bytes);
      await writeAtomic(this.metaPath, json);
      log.info(`Saved vector store to ${this.opts.path}`);
      return true;
    });
  }

  /**
   * Restore both artifacts. Missing artifacts give a fresh empty index;
   * partial, corrupt or mismatched artifacts are logged and also give a fresh
   * empty index. Never throws for artifact problems.
   */
  load(): Promise<LoadOutcome> {
    return this.exclusive(async () => {
      const [hasIndex, hasMeta] = await Promise.all([exists(this.indexPath), exists(this.metaPath)]);
      if (!hasIndex && !hasMeta) {
        log.info('No existing index found, creating new one');
        this.reset();
        return 'created';
      }

      try {
        const restored = await this.readArtifacts(hasIndex, hasMeta);
        this.index = restored.index;
        this.docs = restored.table.documents;
        this.metas = restored.table.metadata;
        log.info(`Loaded vector store with ${restored.index.count} documents`);
        return 'loaded';
      } catch (e) {
        const failure = e instanceof PersistenceError ? e : new PersistenceError(`Unreadable store: ${errorMessage(e)}`, e);
        log.error(`Failed to load vector store: ${failure.message}`);
        log.info('Creating new index');
        this.reset();
        return 'recovered';
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Maintenance
  // ---------------------------------------------------------------------------

  getStats(): IndexStats {
    return {
      totalDocuments: this.size,
      dimension: this.encoder.dimension(),
      loaded: this.isLoaded(),
      storePath: this.opts.path,
      indexName: this.opts.name,
    };
  }

  /** Drop every document; a fresh empty index of the same dimension remains. */
  clear(): Promise<void> {
    return this.exclusive(async () => {
      this.reset();
      log.info('Cleared vector store');
    });
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private reset(): void {
    this.index = new FlatIndex(this.encoder.dimension());
    this.docs = [];
    this.metas = [];
    log.debug(`Created new index with dimension ${this.encoder.dimension()}`);
  }

  private requireIndex(): FlatIndex {
    if (!this.index) throw new PersistenceError('Index is not initialized');
    return this.index;
  }

  private async readArtifacts(hasIndex: boolean, hasMeta: boolean): Promise<{ index: FlatIndex; table: SideTable }> {
    if (!hasIndex) throw new PersistenceError(`Missing index artifact ${this.indexPath}`);
    if (!hasMeta) throw new PersistenceError(`Missing metadata artifact ${this.metaPath}`);

    const [bytes, raw] = await Promise.all([
      fs.promises.readFile(this.indexPath),
      fs.promises.readFile(this.metaPath, 'utf-8'),
    ]);

    const index = FlatIndex.deserialize(bytes);
    if (index.dim !== this.encoder.dimension()) {
      throw new PersistenceError(`Stored index has dimension ${index.dim}, encoder produces ${this.encoder.dimension()}`);
    }

    let parsed: unknown;
    try { parsed = JSON.parse(raw); } catch (e) { throw new PersistenceError('Metadata artifact is not valid JSON', e); }
    const table = sideTable.safeParse(parsed);
    if (!table.success) throw new PersistenceError(`Metadata artifact is malformed: ${table.error.issues[0]?.message ?? 'invalid'}`);

    const { documents, metadata } = table.data;
    if (documents.length !== metadata.length || documents.length !== index.count) {
      throw new PersistenceError(`Artifact counts disagree: ${index.count} vectors, ${documents.length} documents, ${metadata.length} metadata`);
    }
    return { index, table: table.data };
  }

  /** Run `fn` after every previously queued mutation has settled. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn);
    // The caller observes failures through `run`; the queue only needs to settle
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }
}
