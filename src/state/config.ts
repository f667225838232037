/**
 * @fileoverview Configuration management for the retrieval engine.
 * Handles defaults, the optional .ragcore.json file, environment overrides,
 * validation and merging.
 *
 * Precedence, lowest first: defaults, .ragcore.json, RAG_* environment.
 *
 * @module state/config
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type { RagConfig } from '../types/config.js';
import { ok, err, errorMessage } from '../utils/result.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for configuration operations.
 */
export type ConfigError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

// ============================================================
// Constants
// ============================================================

export const CONFIG_FILE = '.ragcore.json';

const posInt = z.number().int().positive();

/**
 * Shape of a partial configuration, as found in .ragcore.json or
 * assembled from the environment.
 */
const overrideSchema = z.object({
    version: z.literal(1).optional(),
    store: z.object({
        path: z.string().min(1),
        indexName: z.string().regex(/^[\w.-]+$/, 'indexName may only contain letters, digits, _, . and -'),
    }).partial().strict().optional(),
    embedding: z.object({
        model: z.string().min(1),
        baseUrl: z.string().url(),
        apiKey: z.string().min(1),
        batch: posInt,
        normalize: z.boolean(),
    }).partial().strict().optional(),
    chunking: z.object({
        size: posInt,
        overlap: z.number().int().nonnegative(),
    }).partial().strict().optional(),
    ingestion: z.object({
        batchSize: posInt,
        pattern: z.string().min(1),
        recursive: z.boolean(),
    }).partial().strict().optional(),
    query: z.object({
        topK: posInt,
        threshold: z.number().finite(),
    }).partial().strict().optional(),
    log: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
    }).partial().strict().optional(),
}).strict();

export type ConfigOverride = z.infer<typeof overrideSchema>;

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default configuration.
 *
 * @example
 * const config = getDefault();
 * console.log(config.chunking.size); // 500
 */
export function getDefault(): RagConfig {
    return {
        version: 1,
        store: { path: './vector_store', indexName: 'vector_index' },
        embedding: {
            model: 'text-embedding-3-small',
            baseUrl: 'https://api.openai.com/v1',
            batch: 32,
            normalize: false,
        },
        chunking: { size: 500, overlap: 50 },
        ingestion: { batchSize: 100, pattern: '*.txt', recursive: true },
        query: { topK: 5, threshold: 0.7 },
        log: { level: 'info' },
    };
}

// ============================================================
// Validation
// ============================================================

/**
 * Validates a parsed object as a partial configuration.
 *
 * @param obj - The object to validate (usually parsed JSON)
 * @returns Result with the typed override or a validation error
 */
export function validateConfig(obj: unknown): Result<ConfigOverride, ConfigError> {
    const parsed = overrideSchema.safeParse(obj);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
        return err({ type: 'validation', message: `${where}${issue?.message ?? 'invalid configuration'}` });
    }
    return ok(parsed.data);
}

/**
 * Checks constraints that span fields of a complete configuration.
 */
export function checkConfig(config: RagConfig): Result<RagConfig, ConfigError> {
    if (config.chunking.overlap >= config.chunking.size) {
        return err({
            type: 'validation',
            message: `chunking.overlap (${config.chunking.overlap}) must be smaller than chunking.size (${config.chunking.size})`,
        });
    }
    return ok(config);
}

// ============================================================
// Merging
// ============================================================

/**
 * Merges a partial configuration over a base configuration.
 * Each section is merged field by field.
 *
 * @example
 * const merged = mergeConfigs(getDefault(), { chunking: { size: 800 } });
 * // merged.chunking: { size: 800, overlap: 50 }
 */
export function mergeConfigs(base: RagConfig, override: ConfigOverride): RagConfig {
    return {
        version: 1,
        store: { ...base.store, ...override.store },
        embedding: { ...base.embedding, ...override.embedding },
        chunking: { ...base.chunking, ...override.chunking },
        ingestion: { ...base.ingestion, ...override.ingestion },
        query: { ...base.query, ...override.query },
        log: { ...base.log, ...override.log },
    };
}

// ============================================================
// Environment
// ============================================================

type Env = Readonly<Record<string, string | undefined>>;

/** Drops keys whose value is undefined; returns undefined when nothing is left. */
function compact(section: Record<string, unknown>): Record<string, unknown> | undefined {
    const entries = Object.entries(section).filter(([, v]) => v !== undefined);
    return entries.length ? Object.fromEntries(entries) : undefined;
}

function num(raw: string | undefined): number | undefined {
    return raw === undefined || raw.trim() === '' ? undefined : Number(raw);
}

/**
 * Reads RAG_* environment variables into a validated override.
 *
 * @example
 * const result = envOverrides({ RAG_CHUNK_SIZE: '800' });
 * // result: { ok: true, value: { chunking: { size: 800 } } }
 */
export function envOverrides(env: Env = process.env): Result<ConfigOverride, ConfigError> {
    const raw = compact({
        store: compact({ path: env['RAG_STORE_PATH'], indexName: env['RAG_INDEX_NAME'] }),
        embedding: compact({
            model: env['RAG_EMBEDDING_MODEL'],
            baseUrl: env['RAG_EMBEDDING_BASE_URL'],
            apiKey: env['RAG_EMBEDDING_API_KEY'],
        }),
        chunking: compact({ size: num(env['RAG_CHUNK_SIZE']), overlap: num(env['RAG_CHUNK_OVERLAP']) }),
        ingestion: compact({ batchSize: num(env['RAG_BATCH_SIZE']) }),
        log: compact({ level: env['RAG_LOG_LEVEL']?.toLowerCase() }),
    });
    return validateConfig(raw ?? {});
}

// ============================================================
// Loading
// ============================================================

/**
 * Loads configuration for a working directory.
 * Reads .ragcore.json if it exists, then applies the environment.
 *
 * @param dir - Directory that may hold .ragcore.json
 * @param env - Environment to read RAG_* variables from
 * @returns AsyncResult with the complete configuration or error
 *
 * @example
 * const result = await loadConfig(process.cwd());
 * if (result.ok) {
 *   console.log('Store at', result.value.store.path);
 * }
 */
export async function loadConfig(dir: string = process.cwd(), env: Env = process.env): AsyncResult<RagConfig, ConfigError> {
    const file = path.join(dir, CONFIG_FILE);

    let fileOverride: ConfigOverride = {};
    let json: string | null;
    try {
        json = await fs.promises.readFile(file, 'utf-8');
    } catch (e) {
        if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) {
            return err({ type: 'io', message: `Failed to read ${CONFIG_FILE}: ${errorMessage(e)}` });
        }
        json = null;
    }

    if (json !== null) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(json);
        } catch (e) {
            return err({ type: 'parse', message: `Invalid JSON in ${CONFIG_FILE}: ${errorMessage(e)}` });
        }
        const validated = validateConfig(parsed);
        if (!validated.ok) return validated;
        fileOverride = validated.value;
    }

    const fromEnv = envOverrides(env);
    if (!fromEnv.ok) return fromEnv;

    return checkConfig(mergeConfigs(mergeConfigs(getDefault(), fileOverride), fromEnv.value));
}
