/**
 * @fileoverview Scoped stderr logger.
 * stdout is reserved for the MCP JSON-RPC stream, so every level writes to
 * stderr through console.error with a `[ragcore:<scope>]` prefix.
 *
 * @module utils/log
 */

import type { LogLevel } from '../types/config.js';

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

let threshold: number = LEVELS[parseLevel(process.env['RAG_LOG_LEVEL']) ?? 'info'];

/**
 * Parses a level name, returning undefined for anything unknown.
 */
export function parseLevel(raw: string | undefined): LogLevel | undefined {
    if (!raw) return undefined;
    const lower = raw.toLowerCase();
    return LEVEL_NAMES.find(l => l === lower);
}

/**
 * Sets the process-wide minimum level.
 */
export function setLogLevel(level: LogLevel): void {
    threshold = LEVELS[level];
}

export interface Logger {
    debug(msg: string, ...details: unknown[]): void;
    info(msg: string, ...details: unknown[]): void;
    warn(msg: string, ...details: unknown[]): void;
    error(msg: string, ...details: unknown[]): void;
}

/**
 * Creates a logger whose lines carry the given scope.
 *
 * @example
 * const log = createLogger('db');
 * log.info('Loaded 12 documents');
 * // stderr: [ragcore:db] Loaded 12 documents
 */
export function createLogger(scope: string): Logger {
    const prefix = `[ragcore:${scope}]`;
    const emit = (level: LogLevel, msg: string, details: unknown[]): void => {
        if (LEVELS[level] < threshold) return;
        const tag = level === 'info' ? prefix : `${prefix} ${level.toUpperCase()}`;
        console.error(`${tag} ${msg}`, ...details);
    };
    return {
        debug: (msg, ...details) => emit('debug', msg, details),
        info: (msg, ...details) => emit('info', msg, details),
        warn: (msg, ...details) => emit('warn', msg, details),
        error: (msg, ...details) => emit('error', msg, details),
    };
}
