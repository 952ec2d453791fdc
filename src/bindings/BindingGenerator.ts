/**
 * BindingGenerator: compiles type declarations into VocabularyBindings.
 *
 * Compilation runs once per schema:
 * 1. index the types and check the inheritance graph
 * 2. resolve each type's effective properties
 * 3. resolve each property's value type into a codec
 * 4. build the exact and polymorphic bindings of each type
 */

import { createLogger, type Logger } from '../logging/logger.js';
import { InheritanceResolver, canonicalTag } from '../schema/InheritanceResolver.js';
import { createTypeRegistry } from '../schema/TypeRegistry.js';
import type { PropertyDef, TypeDef } from '../schema/types.js';
import { ObjectBinding } from './ObjectBinding.js';
import { PropertyBinding } from './PropertyBinding.js';
import { SubtypeBinding } from './SubtypeBinding.js';
import { ValueCodecResolver, type CodecOptions } from './ValueCodecResolver.js';
import { VocabularyBindings } from './VocabularyBindings.js';

export interface CompileOptions {
  codecs?: CodecOptions;
  logger?: Logger;
}

function propertyBinding(name: string, def: PropertyDef, resolver: ValueCodecResolver, typeName: string): PropertyBinding {
  const valueCodec = resolver.resolve(typeName, name, def.valueType);
  const common = {
    name,
    kind: def.kind,
    tag: canonicalTag(name, def),
    aliases: def.aliases,
    uri: def.uri,
    doc: def.doc,
    valueCodec,
  };
  if (def.shape === 'LangContainer') {
    return new PropertyBinding({
      ...common,
      shape: 'LangContainer',
      containerTag: def.containerTag,
      containerAliases: def.containerAliases,
    });
  }
  return new PropertyBinding({ ...common, shape: 'Simple' });
}

/**
 * Compile type declarations into bindings.
 *
 * @throws SchemaError on any schema problem; no bindings are produced
 */
export function compileVocabulary(types: TypeDef[], options: CompileOptions = {}): VocabularyBindings {
  const logger = options.logger ?? createLogger('bindings');
  const registry = createTypeRegistry(types);
  registry.assertResolved();

  const order = registry.getTopologicalOrder();
  const inheritance = new InheritanceResolver(registry, logger);

  const objects = new Map<string, ObjectBinding>();
  const envelopes = new Map<string, SubtypeBinding>();

  const codecs = new ValueCodecResolver(
    {
      hasType: name => registry.has(name),
      objectCodec: name => bindings.get(name),
      subtypesCodec: name => bindings.subtypesOf(name),
    },
    options.codecs,
  );

  let propertyCount = 0;
  for (const typeName of order) {
    const type = registry.get(typeName);
    if (type === undefined) {
      continue;
    }
    const properties = [...inheritance.resolve(typeName)].map(
      ([name, def]) => propertyBinding(name, def, codecs, typeName),
    );
    propertyCount += properties.length;
    objects.set(typeName, new ObjectBinding(typeName, type.uri, properties, logger));
  }

  for (const typeName of order) {
    const members = registry.subtypes(typeName).flatMap(name => {
      const binding = objects.get(name);
      return binding === undefined ? [] : [binding];
    });
    const [base] = members;
    if (base !== undefined) {
      envelopes.set(typeName, new SubtypeBinding(base, members));
    }
  }

  const bindings = new VocabularyBindings(objects, envelopes);
  logger.debug({ types: objects.size, properties: propertyCount }, 'Compiled vocabulary');
  return bindings;
}
