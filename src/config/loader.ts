/**
 * Configuration loader for vocabulary bindings.
 * 
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type { VocabConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.VOCAB_CONFIG or './vocab.config.yaml') */
  configPath?: string;
  /** Receives warnings about missing files and unset variables */
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 * 
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, logger?: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Empty string if no value and no default
    logger?.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, logger?: Logger): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, logger);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, logger));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, logger);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (source overrides target).
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  
  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  
  return result;
}

function defaults(): Record<string, unknown> {
  const { schema, logging, codecs } = structuredClone(DEFAULT_CONFIG);
  return { schema, logging, codecs };
}

/**
 * Environment substitution yields strings; accept "true"/"false" for flags.
 */
const flagSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform(value => value === 'true'),
]);

const configSchema = z.object({
  schema: z.object({
    path: z.string().min(1, 'path must not be empty'),
    recursive: flagSchema,
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  }),
  codecs: z.object({
    duration: z.object({
      legacyMonths: flagSchema,
    }),
  }),
});

/**
 * Validate a complete configuration.
 *
 * @throws ConfigValidationError naming the first offending path
 */
export function validateConfig(config: unknown): VocabConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const [issue] = result.error.issues;
    const path = issue?.path.join('.') ?? '';
    let value: unknown = config;
    for (const segment of issue?.path ?? []) {
      value = isPlainObject(value) ? value[String(segment)] : undefined;
    }
    throw new ConfigValidationError(issue?.message ?? result.error.message, path, value);
  }
  return result.data;
}

/**
 * Load configuration from a YAML file.
 * 
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<VocabConfig> {
  const configPath = options.configPath 
    ?? process.env['VOCAB_CONFIG'] 
    ?? './vocab.config.yaml';
  
  const absolutePath = resolve(configPath);
  
  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    options.logger?.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return structuredClone(DEFAULT_CONFIG);
  }
  
  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }
  
  return resolveConfig(parsed ?? {}, options);
}

/**
 * Substitute, merge over defaults and validate an already parsed config.
 */
export function resolveConfig(parsed: unknown, options: Pick<LoadConfigOptions, 'logger'> = {}): VocabConfig {
  const substituted = substituteEnvVarsRecursive(parsed, options.logger);
  if (!isPlainObject(substituted)) {
    throw new ConfigValidationError('must be an object', '', substituted);
  }
  
  return validateConfig(deepMerge(defaults(), substituted));
}
