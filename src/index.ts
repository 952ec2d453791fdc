/**
 * vocab-bind: schema-driven JSON bindings for ActivityStreams-style vocabularies.
 * 
 * This is the main entry point for the library.
 */

// JSON values and errors
export * from './core/json.js';
export * from './core/errors.js';
export { parseWire, WireParseError } from './core/wire.js';

// Runtime primitives
export * from './runtime/index.js';

// XSD scalars
export * from './xsd/index.js';

// @context
export * from './jsonld/index.js';

// Schema loading and registry
export * from './schema/index.js';

// Bindings
export * from './bindings/index.js';

// Configuration and logging
export * from './config/index.js';
export { createLogger, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger.js';

export { loadVocabulary } from './vocabulary.js';
export type { LoadVocabularyOptions } from './vocabulary.js';
