/**
 * JSON-LD module exports.
 */

export * from './Context.js';
