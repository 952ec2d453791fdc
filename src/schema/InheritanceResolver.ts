/**
 * InheritanceResolver: computes the effective properties of each type.
 *
 * Effective properties of T are the union of its supertypes' effective
 * properties (visited in `extends` order, depth first) followed by T's own,
 * minus T's `except_properties`, with T's preferred names applied. A name
 * seen again keeps its first position but takes the later definition, so
 * own properties win collisions.
 */

import { SchemaError } from '../core/errors.js';
import type { Logger } from '../logging/logger.js';
import type { TypeRegistry } from './TypeRegistry.js';
import type { PreferredName, PropertyDef, TypeDef } from './types.js';

export type EffectiveProperties = ReadonlyMap<string, PropertyDef>;

/**
 * Canonical wire key of a property's default half.
 */
export function canonicalTag(name: string, def: PropertyDef): string {
  return def.tag ?? name;
}

/**
 * Apply a preferred name; the previous canonical key becomes an alias.
 *
 * @throws SchemaError (KindMismatch) when the override's shape differs
 */
export function applyPreferredName(
  typeName: string,
  name: string,
  def: PropertyDef,
  preferred: PreferredName,
): PropertyDef {
  const previous = canonicalTag(name, def);
  const aliases = [...new Set([...def.aliases, previous])];

  if (def.shape === 'Simple' && preferred.shape === 'Simple') {
    return { ...def, tag: preferred.tag, aliases };
  }
  if (def.shape === 'LangContainer' && preferred.shape === 'LangContainer') {
    return {
      ...def,
      tag: preferred.tag,
      aliases,
      containerTag: preferred.containerTag,
      containerAliases: [...new Set([...def.containerAliases, def.containerTag])],
    };
  }
  throw SchemaError.kindMismatch(typeName, name);
}

export class InheritanceResolver {
  private readonly resolved = new Map<string, EffectiveProperties>();
  private readonly resolving: string[] = [];

  constructor(
    private readonly registry: TypeRegistry,
    private readonly logger?: Logger,
  ) {}

  /**
   * Effective properties of a type, in first-insertion order.
   *
   * @throws SchemaError (UnknownSupertype, CyclicInheritance, KindMismatch)
   */
  resolve(typeName: string): EffectiveProperties {
    const cached = this.resolved.get(typeName);
    if (cached !== undefined) {
      return cached;
    }

    const type = this.registry.get(typeName);
    if (type === undefined) {
      throw new SchemaError('UnknownSupertype', `Unknown type ${typeName}`, typeName);
    }

    const onPath = this.resolving.indexOf(typeName);
    if (onPath >= 0) {
      throw SchemaError.cyclicInheritance([...this.resolving.slice(onPath), typeName]);
    }

    this.resolving.push(typeName);
    try {
      const properties = this.collect(type);
      this.resolved.set(typeName, properties);
      return properties;
    } finally {
      this.resolving.pop();
    }
  }

  private collect(type: TypeDef): EffectiveProperties {
    const merged = new Map<string, PropertyDef>();

    for (const superName of type.extends) {
      if (!this.registry.has(superName)) {
        throw SchemaError.unknownSupertype(type.name, superName);
      }
      for (const [name, def] of this.resolve(superName)) {
        merged.set(name, def);
      }
    }
    for (const [name, def] of type.properties) {
      merged.set(name, def);
    }
    for (const name of type.exceptProperties) {
      merged.delete(name);
    }

    for (const [name, preferred] of type.preferredPropertyName) {
      const def = merged.get(name);
      if (def === undefined) {
        this.logger?.warn({ type: type.name, property: name }, 'Preferred name targets no property');
        continue;
      }
      merged.set(name, applyPreferredName(type.name, name, def, preferred));
    }

    return merged;
  }
}
