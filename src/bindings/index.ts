/**
 * Bindings module exports.
 */

export * from './PropertyBinding.js';
export * from './ObjectBinding.js';
export * from './SubtypeBinding.js';
export * from './ValueCodecResolver.js';
export * from './VocabularyBindings.js';
export * from './BindingGenerator.js';
