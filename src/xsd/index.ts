/**
 * XSD scalar codecs.
 */

export * from './DateTime.js';
export * from './Duration.js';
