#!/usr/bin/env node
/**
 * @fileoverview ragcore-mcp executable: starts the stdio server and exits on
 * SIGINT/SIGTERM or a startup failure. The index is not saved on exit; call
 * rag_save first to keep ingested documents.
 *
 * @module mcp
 */

import { describeFailure, startServer } from './server.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('mcp');

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    log.info(`Received ${signal}, shutting down`);
    process.exit(0);
  });
}

startServer().catch((error: unknown) => {
  log.error(describeFailure(error));
  process.exit(1);
});
