/**
 * @fileoverview MCP Tools registration.
 * @module mcp/tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';

import { docMeta, type DocMeta, type ServiceError } from '../../core/vector/index.js';
import { isRetrievalError } from '../../core/errors.js';
import { errorMessage } from '../../utils/result.js';
import type { Result } from '../../types/base.js';
import type { Runtime } from '../runtime.js';

// ============================================================
// Responses
// ============================================================

export interface ToolResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

const reply = (value: unknown): ToolResponse => ({
  content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
});

const failure = (error: ServiceError): ToolResponse => ({
  content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
  isError: true,
});

const fromResult = <T>(result: Result<T, ServiceError>): ToolResponse =>
  result.ok ? reply(result.value) : failure(result.error);

// ============================================================
// Handlers
// ============================================================

export interface IngestPathArgs {
  path: string;
  pattern?: string | undefined;
  recursive?: boolean | undefined;
}

/**
 * Tool handlers bound to a runtime. Kept separate from registration so they
 * can be called without a transport.
 */
export function createHandlers(runtime: Runtime) {
  const { service } = runtime;

  return {
    health: (): ToolResponse => reply(service.health()),

    query: async (args: { query: string; topK?: number | undefined; threshold?: number | undefined }): Promise<ToolResponse> =>
      fromResult(await service.query(args.query, args.topK, args.threshold)),

    ingest: async (args: { text: string; metadata?: DocMeta | undefined }): Promise<ToolResponse> =>
      fromResult(await service.ingest(args.text, args.metadata)),

    ingestPath: async (args: IngestPathArgs): Promise<ToolResponse> => {
      const pipeline = runtime.ingestion();
      if (!pipeline) return failure({ type: 'not_ready', message: 'Vector store not loaded' });

      const target = path.resolve(args.path);
      try {
        const st = await fs.promises.stat(target).catch(() => null);
        if (st?.isDirectory()) {
          const report = await pipeline.ingestDirectory(
            target,
            args.pattern ?? runtime.config.ingestion.pattern,
            args.recursive ?? runtime.config.ingestion.recursive,
          );
          return reply({ path: target, ...report });
        }
        const documents = await pipeline.ingestFile(target);
        return reply({ path: target, documents });
      } catch (e) {
        return failure({ type: 'internal', message: errorMessage(e), code: isRetrievalError(e) ? e.code : undefined });
      }
    },

    save: async (): Promise<ToolResponse> => {
      const res = await service.save();
      return res.ok ? reply({ saved: true }) : failure(res.error);
    },

    stats: (): ToolResponse => fromResult(service.stats()),
  };
}

// ============================================================
// Tool Registration
// ============================================================

export function registerTools(server: McpServer, runtime: Runtime): void {
  const handlers = createHandlers(runtime);
  const defaults = runtime.config.query;

  // --------------------------------------------------------
  // rag_health
  // --------------------------------------------------------
  server.tool(
    'rag_health',
    'Report whether the vector store and embedding model are loaded.',
    async () => handlers.health()
  );

  // --------------------------------------------------------
  // rag_query
  // --------------------------------------------------------
  server.tool(
    'rag_query',
    'Retrieve the stored passages most similar to a query.',
    {
      query: z.string().describe('Natural language query'),
      topK: z.number().int().min(1).default(defaults.topK).describe('Maximum number of results'),
      threshold: z.number().default(defaults.threshold)
        .describe('Minimum similarity score, where score = 1 / (1 + squared distance)'),
    },
    async (args) => handlers.query(args)
  );

  // --------------------------------------------------------
  // rag_ingest
  // --------------------------------------------------------
  server.tool(
    'rag_ingest',
    'Store one text as a single document (not chunked).',
    {
      text: z.string().describe('Document text'),
      metadata: docMeta.optional().describe('JSON metadata stored with the document'),
    },
    async (args) => handlers.ingest(args)
  );

  // --------------------------------------------------------
  // rag_ingest_path
  // --------------------------------------------------------
  server.tool(
    'rag_ingest_path',
    'Ingest a file (.txt, .md, .json, .jsonl) or every matching file under a directory.',
    {
      path: z.string().describe('File or directory path'),
      pattern: z.string().optional().describe('Glob for directory ingestion (default *.txt)'),
      recursive: z.boolean().optional().describe('Search subdirectories'),
    },
    async (args) => handlers.ingestPath(args)
  );

  // --------------------------------------------------------
  // rag_save
  // --------------------------------------------------------
  server.tool(
    'rag_save',
    'Persist the vector store to disk.',
    async () => handlers.save()
  );

  // --------------------------------------------------------
  // rag_stats
  // --------------------------------------------------------
  server.tool(
    'rag_stats',
    'Report document count, dimension and store location.',
    async () => handlers.stats()
  );
}
