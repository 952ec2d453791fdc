/**
 * Builders for type declarations in tests.
 */

import type { PreferredName, PropertyDef, SimplePropertyDef, TypeDef } from './types.js';
import type { PropertyKind } from '../runtime/Property.js';

export function simple(valueType: string, kind: PropertyKind = 'Normal', extra: Partial<Omit<SimplePropertyDef, 'shape'>> = {}): PropertyDef {
  return {
    shape: 'Simple',
    valueType,
    aliases: [],
    uri: `https://ex.org/ns#${valueType}`,
    kind,
    ...extra,
  };
}

export function langContainer(
  valueType: string,
  containerTag: string,
  kind: PropertyKind = 'Functional',
): PropertyDef {
  return {
    shape: 'LangContainer',
    valueType,
    aliases: [],
    containerTag,
    containerAliases: [],
    uri: `https://ex.org/ns#${containerTag}`,
    kind,
  };
}

export function typeDef(
  name: string,
  options: {
    extends?: string[];
    properties?: Record<string, PropertyDef>;
    except?: string[];
    preferred?: Record<string, PreferredName>;
  } = {},
): TypeDef {
  return {
    name,
    uri: `https://ex.org/ns#${name}`,
    extends: options.extends ?? [],
    properties: new Map(Object.entries(options.properties ?? {})),
    exceptProperties: options.except ?? [],
    preferredPropertyName: new Map(Object.entries(options.preferred ?? {})),
  };
}
