/**
 * @fileoverview Ingestion pipeline: turns raw text, files, directories,
 * record batches and line-delimited JSON into stored documents.
 *
 * Single-item entry points (ingestText, ingestFile) propagate errors.
 * Batch entry points (ingestDirectory, ingestRecords, ingestJsonl) log
 * per-item failures and keep going.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { TextDecoderStream } from 'stream/web';
import { glob } from 'glob';
import { z } from 'zod';
import type { DirectoryReport, DocMeta, FileFailure, JsonlReport } from './types.js';
import type { JsonObject } from '../../types/base.js';
import type { VectorIndex } from './db.js';
import { Chunker, DEFAULT_OPTS as DEFAULT_CHUNKER } from './chunker.js';
import { docMeta } from './schema.js';
import { cloneMeta, isRecord } from './utils.js';
import { ConfigurationError, DecodeError, NotFoundError } from '../errors.js';
import { createLogger } from '../../utils/log.js';
import { errorMessage } from '../../utils/result.js';

const log = createLogger('ingest');

// =============================================================================
// Config
// =============================================================================

export interface IngestOpts {
  chunkSize: number;
  chunkOverlap: number;
  /** Documents per add call while streaming line-delimited input */
  batchSize: number;
}

export const DEFAULT_INGEST: IngestOpts = {
  chunkSize: DEFAULT_CHUNKER.size,
  chunkOverlap: DEFAULT_CHUNKER.overlap,
  batchSize: 100,
};

const TEXT_EXTS = new Set(['.txt', '.md']);

const jsonlLine = z.object({
  prompt: z.string(),
  metadata: docMeta.optional(),
});

// =============================================================================
// Pipeline
// =============================================================================

export class IngestionPipeline {
  private readonly index: VectorIndex;
  private readonly chunker: Chunker;
  private readonly batchSize: number;

  constructor(index: VectorIndex, opts: Partial<IngestOpts> = {}) {
    const o = { ...DEFAULT_INGEST, ...opts };
    if (!Number.isInteger(o.batchSize) || o.batchSize < 1) {
      throw new ConfigurationError(`Batch size must be a positive integer, got ${o.batchSize}`);
    }
    this.index = index;
    this.chunker = new Chunker({ size: o.chunkSize, overlap: o.chunkOverlap });
    this.batchSize = o.batchSize;
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  /** Chunk `text` and store every chunk with its own copy of `meta`. Returns chunks stored. */
  async ingestText(text: string, meta?: DocMeta): Promise<number> {
    const chunks = this.chunker.chunk(text);
    await this.index.add(chunks, chunks.map(() => cloneMeta(meta)));
    log.info(`Ingested text in ${chunks.length} chunks`);
    return chunks.length;
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  /**
   * Ingest one file, tagged with its provenance. `.json` roots that are
   * objects become one document, arrays one document per element; `.jsonl`
   * streams line records; everything else is read as UTF-8 text.
   * Returns documents stored.
   */
  async ingestFile(filePath: string, meta?: DocMeta): Promise<number> {
    const st = await fs.promises.stat(filePath).catch(() => null);
    if (!st?.isFile()) throw new NotFoundError(filePath);

    const ext = path.extname(filePath).toLowerCase();
    const fileMeta: DocMeta = {
      ...cloneMeta(meta),
      source: filePath,
      filename: path.basename(filePath),
      extension: ext,
    };

    let stored: number;
    if (ext === '.json') stored = await this.ingestJson(filePath, fileMeta);
    else if (ext === '.jsonl') stored = (await this.ingestJsonl(filePath, fileMeta)).ingested;
    else {
      if (!TEXT_EXTS.has(ext)) log.debug(`Unknown extension '${ext}', reading ${filePath} as text`);
      stored = await this.ingestText(await this.readText(filePath), fileMeta);
    }

    log.info(`Ingested file: ${filePath}`);
    return stored;
  }

  /** Ingest every file under `root` matching `pattern`; one bad file does not stop the rest. */
  async ingestDirectory(root: string, pattern = '*.txt', recursive = true): Promise<DirectoryReport> {
    const st = await fs.promises.stat(root).catch(() => null);
    if (!st?.isDirectory()) throw new NotFoundError(root, 'directory');

    const files = (await glob(recursive ? `**/${pattern}` : pattern, { cwd: root, nodir: true, absolute: true })).sort();
    log.info(`Found ${files.length} files matching pattern '${pattern}'`);

    const failed: FileFailure[] = [];
    let ingested = 0, documents = 0;
    for (const f of files) {
      try {
        documents += await this.ingestFile(f);
        ingested++;
      } catch (e) {
        log.error(`Failed to ingest ${f}: ${errorMessage(e)}`);
        failed.push({ path: f, error: errorMessage(e) });
      }
    }

    log.info(`Completed ingestion of ${files.length} files (${failed.length} failed)`);
    return { matched: files.length, ingested, documents, failed };
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  /**
   * Store one document per record whose `textField` holds a string, in a
   * single add call. Metadata is `record_index` plus either the allow-listed
   * fields or every other field. Returns documents stored.
   */
  async ingestRecords(records: readonly JsonObject[], textField = 'text', metaFields?: readonly string[]): Promise<number> {
    const texts: string[] = [];
    const metas: DocMeta[] = [];

    for (const [i, rec] of records.entries()) {
      const text = rec[textField];
      if (typeof text !== 'string') {
        log.warn(`Record ${i} missing text field '${textField}', skipping`);
        continue;
      }

      const meta: DocMeta = { record_index: i };
      const fields = metaFields ?? Object.keys(rec).filter(k => k !== textField);
      for (const f of fields) {
        const v = Object.hasOwn(rec, f) ? rec[f] : undefined;
        if (v !== undefined) meta[f] = structuredClone(v);
      }

      texts.push(text);
      metas.push(meta);
    }

    await this.index.add(texts, metas);
    log.info(`Ingested ${texts.length} records`);
    return texts.length;
  }

  /**
   * Stream a line-delimited JSON file. Each line's `prompt` becomes the text
   * and its `metadata` object, plus `line_number` (1-based), the metadata.
   * Malformed lines are logged and skipped. Bytes that are not UTF-8 abort
   * the file with DecodeError; batches flushed before that point stay stored.
   */
  async ingestJsonl(filePath: string, meta?: DocMeta): Promise<JsonlReport> {
    const st = await fs.promises.stat(filePath).catch(() => null);
    if (!st?.isFile()) throw new NotFoundError(filePath);

    const report: JsonlReport = { lines: 0, ingested: 0, skipped: 0 };
    let texts: string[] = [], metas: DocMeta[] = [];

    const flush = async (): Promise<void> => {
      if (!texts.length) return;
      const batch = texts, batchMetas = metas;
      texts = [];
      metas = [];
      try {
        await this.index.add(batch, batchMetas);
        report.ingested += batch.length;
      } catch (e) {
        log.error(`Batch of ${batch.length} lines failed: ${errorMessage(e)}`);
        report.skipped += batch.length;
      }
    };

    for await (const line of utf8Lines(filePath)) {
      const lineNumber = ++report.lines;
      if (!line.trim()) continue;

      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch (e) {
        log.error(`Line ${lineNumber}: JSON parse failed - ${errorMessage(e)}`);
        report.skipped++;
        continue;
      }

      const rec = jsonlLine.safeParse(data);
      if (!rec.success) {
        const issue = rec.error.issues[0];
        log.warn(`Line ${lineNumber}: ${issue ? `${issue.path.join('.') || 'line'}: ${issue.message}` : 'invalid record'}, skipping`);
        report.skipped++;
        continue;
      }

      texts.push(rec.data.prompt);
      metas.push({ ...cloneMeta(meta), ...rec.data.metadata, line_number: lineNumber });
      if (texts.length >= this.batchSize) await flush();
    }
    await flush();

    log.info(`Ingested ${report.ingested} of ${report.lines} lines from ${filePath} (${report.skipped} skipped)`);
    return report;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async ingestJson(filePath: string, fileMeta: DocMeta): Promise<number> {
    const raw = await this.readText(filePath);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      const de = new DecodeError(`Malformed JSON in ${filePath}: ${errorMessage(e)}`, e);
      log.error(de.message);
      throw de;
    }

    if (Array.isArray(data)) {
      const texts = data.map(item => JSON.stringify(item, null, 2));
      await this.index.add(texts, texts.map((_, i) => ({ ...cloneMeta(fileMeta), item_index: i })));
      return texts.length;
    }
    if (isRecord(data)) {
      await this.index.add([JSON.stringify(data, null, 2)], [fileMeta]);
      return 1;
    }
    return this.ingestText(String(data), fileMeta);
  }

  private async readText(filePath: string): Promise<string> {
    const bytes = await fs.promises.readFile(filePath);
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (e) {
      const de = new DecodeError(`Failed to read file ${filePath}: not valid UTF-8 text`, e);
      log.error(de.message);
      throw de;
    }
  }
}

/** Lines of a UTF-8 file, split on LF or CRLF, with strict decoding. */
async function* utf8Lines(filePath: string): AsyncGenerator<string> {
  const text = Readable.toWeb(fs.createReadStream(filePath)).pipeThrough(new TextDecoderStream('utf-8', { fatal: true }));
  let rest = '';
  try {
    for await (const chunk of text) {
      const parts = (rest + chunk).split(/\r?\n/);
      rest = parts.pop() ?? '';
      yield* parts;
    }
  } catch (e) {
    if (!(e instanceof TypeError)) throw e;
    const de = new DecodeError(`Failed to read file ${filePath}: not valid UTF-8 text`, e);
    log.error(de.message);
    throw de;
  }
  if (rest) yield rest;
}
