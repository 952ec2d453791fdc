/**
 * Small vocabulary shared by the binding tests.
 */

import pino from 'pino';
import { langContainer, simple, typeDef } from '../schema/testing.js';
import type { TypeDef } from '../schema/types.js';
import { compileVocabulary } from './BindingGenerator.js';
import type { VocabularyBindings } from './VocabularyBindings.js';

export function sampleTypes(): TypeDef[] {
  return [
    typeDef('Object', {
      properties: {
        id: simple('uri', 'Functional'),
        type: simple('string'),
        name: langContainer('string', 'nameMap'),
        tag: simple('string', 'Normal', { aliases: ['label'] }),
        published: simple('xsd:dateTime', 'Functional'),
        attributedTo: simple('Remotable<Subtypes<Object>>'),
      },
    }),
    typeDef('Note', { extends: ['Object'], properties: { content: langContainer('string', 'contentMap') } }),
    typeDef('Person', { extends: ['Object'], properties: { preferredUsername: simple('string', 'Functional') } }),
    typeDef('Thing', {
      properties: {
        id: simple('uri', 'Required'),
        title: langContainer('string', 'titleMap', 'Required'),
        keywords: langContainer('string', 'keywordsMap', 'Normal'),
        value: simple('Or<integer, string>', 'Functional'),
      },
    }),
  ];
}

export function sampleVocabulary(): VocabularyBindings {
  return compileVocabulary(sampleTypes(), { logger: pino({ level: 'silent' }) });
}

/**
 * Run `action` and hand back what it threw.
 */
export function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (err) {
    return err;
  }
  throw new Error('expected the action to throw');
}
