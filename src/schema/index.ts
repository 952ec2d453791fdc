/**
 * Schema module exports.
 */

export * from './types.js';
export * from './valueType.js';
export * from './SchemaDocument.js';
export * from './SchemaLoader.js';
export * from './TypeRegistry.js';
export * from './InheritanceResolver.js';
