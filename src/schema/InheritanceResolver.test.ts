/**
 * Tests for property inheritance.
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import type { Logger } from '../logging/logger.js';
import { InheritanceResolver, applyPreferredName } from './InheritanceResolver.js';
import { createTypeRegistry } from './TypeRegistry.js';
import { langContainer, simple, typeDef } from './testing.js';
import type { TypeDef } from './types.js';

function resolverFor(types: TypeDef[], logger?: Logger): InheritanceResolver {
  return new InheritanceResolver(createTypeRegistry(types), logger);
}

describe('InheritanceResolver', () => {
  it('unions ancestors before own properties', () => {
    const resolver = resolverFor([
      typeDef('Object', { properties: { id: simple('uri', 'Functional'), name: simple('string') } }),
      typeDef('Activity', { extends: ['Object'], properties: { actor: simple('uri') } }),
      typeDef('Create', { extends: ['Activity'], properties: { result: simple('uri') } }),
    ]);

    expect([...resolver.resolve('Create').keys()]).toEqual(['id', 'name', 'actor', 'result']);
  });

  it('keeps the first position of a redefined property with the later definition', () => {
    const resolver = resolverFor([
      typeDef('Object', { properties: { id: simple('uri', 'Functional'), name: simple('string') } }),
      typeDef('Named', { extends: ['Object'], properties: { name: simple('string', 'Required') } }),
    ]);

    const properties = resolver.resolve('Named');
    expect([...properties.keys()]).toEqual(['id', 'name']);
    expect(properties.get('name')?.kind).toBe('Required');
  });

  it('merges several supertypes in declaration order', () => {
    const resolver = resolverFor([
      typeDef('A', { properties: { a: simple('string'), shared: simple('string') } }),
      typeDef('B', { properties: { b: simple('string'), shared: simple('integer') } }),
      typeDef('C', { extends: ['A', 'B'] }),
    ]);

    const properties = resolver.resolve('C');
    expect([...properties.keys()]).toEqual(['a', 'shared', 'b']);
    expect(properties.get('shared')?.valueType).toBe('integer');
  });

  it('drops excepted properties', () => {
    const resolver = resolverFor([
      typeDef('Activity', { properties: { actor: simple('uri'), object: simple('uri') } }),
      typeDef('IntransitiveActivity', { extends: ['Activity'], except: ['object'] }),
    ]);

    expect([...resolver.resolve('IntransitiveActivity').keys()]).toEqual(['actor']);
  });

  it('applies preferred names and keeps the old key as an alias', () => {
    const resolver = resolverFor([
      typeDef('Collection', { properties: { items: simple('uri') } }),
      typeDef('OrderedCollection', {
        extends: ['Collection'],
        preferred: { items: { shape: 'Simple', tag: 'orderedItems' } },
      }),
    ]);

    expect(resolver.resolve('OrderedCollection').get('items')).toMatchObject({
      tag: 'orderedItems',
      aliases: ['items'],
    });
    expect(resolver.resolve('Collection').get('items')?.tag).toBeUndefined();
  });

  it('renames both halves of a language container', () => {
    const renamed = applyPreferredName(
      'Titled',
      'name',
      langContainer('string', 'nameMap'),
      { shape: 'LangContainer', tag: 'title', containerTag: 'titleMap' },
    );

    expect(renamed).toMatchObject({
      tag: 'title',
      aliases: ['name'],
      containerTag: 'titleMap',
      containerAliases: ['nameMap'],
    });
  });

  it('rejects a preferred name of the wrong shape', () => {
    const resolver = resolverFor([
      typeDef('Object', {
        properties: { name: langContainer('string', 'nameMap') },
        preferred: { name: { shape: 'Simple', tag: 'title' } },
      }),
    ]);

    expect(() => resolver.resolve('Object')).toThrow(
      "Preferred name for Object.name does not match the property's shape",
    );
  });

  it('warns about preferred names that target nothing', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
    const resolver = resolverFor(
      [typeDef('Object', { preferred: { missing: { shape: 'Simple', tag: 'x' } } })],
      logger,
    );

    expect(resolver.resolve('Object').size).toBe(0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 40,
      type: 'Object',
      property: 'missing',
      msg: 'Preferred name targets no property',
    });
  });

  it('rejects unknown supertypes', () => {
    const resolver = resolverFor([typeDef('Note', { extends: ['Object'] })]);

    expect(() => resolver.resolve('Note')).toThrow('Type Note extends unknown type Object');
  });

  it('rejects inheritance cycles', () => {
    const resolver = resolverFor([typeDef('A', { extends: ['B'] }), typeDef('B', { extends: ['A'] })]);

    expect(() => resolver.resolve('A')).toThrow('Inheritance cycle: A -> B -> A');
  });

  it('memoizes resolved types', () => {
    const resolver = resolverFor([typeDef('Object', { properties: { id: simple('uri') } })]);

    expect(resolver.resolve('Object')).toBe(resolver.resolve('Object'));
  });
});
