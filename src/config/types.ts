/**
 * Configuration types for vocabulary loading.
 * 
 * These types define the structure of vocab.config.yaml and provide
 * type-safe access to the configuration.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface VocabConfig {
  schema: SchemaConfig;
  logging: LoggingConfig;
  codecs: CodecsConfig;
}

/**
 * Where the vocabulary schema lives.
 */
export interface SchemaConfig {
  /** Schema document, or directory of `*.vocab.*` documents (default: './vocab') */
  path: string;
  /** Whether to search the directory recursively (default: true) */
  recursive: boolean;
}

export interface LoggingConfig {
  /** Log level (default: 'info') */
  level: LogLevel;
}

export interface CodecsConfig {
  duration: {
    /** Write xsd:duration months the way older tooling does (default: false) */
    legacyMonths: boolean;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: VocabConfig = {
  schema: {
    path: './vocab',
    recursive: true,
  },
  logging: {
    level: 'info',
  },
  codecs: {
    duration: {
      legacyMonths: false,
    },
  },
};
