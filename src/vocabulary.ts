/**
 * loadVocabulary: load the configured schema and compile its bindings.
 */

import { compileVocabulary } from './bindings/BindingGenerator.js';
import type { VocabularyBindings } from './bindings/VocabularyBindings.js';
import type { VocabConfig } from './config/types.js';
import { createLogger, type Logger } from './logging/logger.js';
import { loadSchema } from './schema/SchemaLoader.js';

export interface LoadVocabularyOptions {
  logger?: Logger;
}

/**
 * @throws SchemaError when the schema cannot be loaded or compiled
 */
export async function loadVocabulary(
  config: VocabConfig,
  options: LoadVocabularyOptions = {},
): Promise<VocabularyBindings> {
  const logger = options.logger ?? createLogger('vocabulary', { level: config.logging.level });
  const types = await loadSchema(config.schema.path, config.schema.recursive);
  logger.debug({ path: config.schema.path, types: types.length }, 'Loaded vocabulary schema');
  return compileVocabulary(types, {
    logger,
    codecs: { duration: { legacyMonths: config.codecs.duration.legacyMonths } },
  });
}
