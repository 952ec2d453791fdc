/**
 * Configuration module exports.
 */

export * from './types.js';
export { loadConfig, resolveConfig, validateConfig, deepMerge, ConfigValidationError } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
