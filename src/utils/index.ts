/**
 * @fileoverview Barrel file for utility functions.
 * Layer 1 - pure utility functions that import only from types/.
 *
 * @module utils
 */

// Result type helpers for type-safe error handling
export { ok, err, mapResult, attempt, errorMessage } from './result.js';

// Scoped stderr logging
export { createLogger, setLogLevel, parseLevel, type Logger } from './log.js';
