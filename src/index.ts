/**
 * @fileoverview Public API of ragcore: chunking, embedding, the exact vector
 * index, ingestion and the query façade, plus configuration loading.
 *
 * @module ragcore
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './core/errors.js';
export * from './core/vector/index.js';
export {
    CONFIG_FILE,
    getDefault,
    validateConfig,
    checkConfig,
    mergeConfigs,
    envOverrides,
    loadConfig,
    type ConfigError,
    type ConfigOverride,
} from './state/config.js';
export { Runtime, loadEncoder, type EncoderFactory } from './mcp/runtime.js';
