/**
 * @fileoverview ragcore MCP Server - Main entry point.
 * Exposes retrieval and ingestion over the Model Context Protocol.
 *
 * @module mcp/server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { registerTools } from './tools/index.js';
import { Runtime, loadEncoder, type EncoderFactory } from './runtime.js';
import { loadConfig } from '../state/config.js';
import { isRetrievalError } from '../core/errors.js';
import { createLogger, setLogLevel } from '../utils/log.js';
import { errorMessage } from '../utils/result.js';

const log = createLogger('mcp');

// ============================================================
// Server Configuration
// ============================================================

const SERVER_NAME = 'ragcore';
const SERVER_VERSION = '1.0.0';

// ============================================================
// Server Instance
// ============================================================

export function createServer(runtime: Runtime): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, runtime);

  return server;
}

/** One-line account of a startup failure, with the engine error code when there is one. */
export function describeFailure(error: unknown): string {
  const code = isRetrievalError(error) ? ` [${error.code}]` : '';
  return `Startup failed${code}: ${errorMessage(error)}`;
}

// ============================================================
// Main Entry Point
// ============================================================

export async function startServer(makeEncoder: EncoderFactory = loadEncoder): Promise<void> {
  const config = await loadConfig();
  if (!config.ok) {
    throw new Error(`Invalid configuration (${config.error.type}): ${config.error.message}`);
  }
  setLogLevel(config.value.log.level);

  const runtime = new Runtime(config.value);
  const server = createServer(runtime);
  const transport = new StdioServerTransport();

  log.info(`Starting server v${SERVER_VERSION}`);

  await server.connect(transport);

  log.info('Server connected, connecting to the embedding endpoint');

  // Tools answer "not ready" until this finishes
  await runtime.start(makeEncoder);

  log.info('Vector store ready');
}
