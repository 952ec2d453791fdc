/**
 * Types for vocabulary schemas.
 *
 * A vocabulary schema declares object types, their supertypes and their
 * properties. Property definitions come in two shapes: a plain property
 * with one wire key, and a language container with a second wire key
 * holding a language-code map.
 */

import type { SchemaErrorCode } from '../core/errors.js';
import type { PropertyKind } from '../runtime/Property.js';

export type PropertyShape = 'Simple' | 'LangContainer';

interface PropertyDefBase {
  /** Value type expression (`string`, `Remotable<Object>`, ...) */
  valueType: string;
  /** Canonical wire key; the property name when absent */
  tag?: string;
  /** Additional wire keys accepted on input */
  aliases: string[];
  /** IRI of the property in its vocabulary */
  uri: string;
  doc?: string;
  kind: PropertyKind;
}

export interface SimplePropertyDef extends PropertyDefBase {
  shape: 'Simple';
}

export interface LangContainerPropertyDef extends PropertyDefBase {
  shape: 'LangContainer';
  /** Wire key of the language map */
  containerTag: string;
  containerAliases: string[];
}

export type PropertyDef = SimplePropertyDef | LangContainerPropertyDef;

/**
 * Per-type override of a property's canonical wire key(s).
 */
export type PreferredName =
  | { shape: 'Simple'; tag: string }
  | { shape: 'LangContainer'; tag: string; containerTag: string };

/**
 * A type declaration, as written in a schema document.
 */
export interface TypeDef {
  name: string;
  uri: string;
  doc?: string;
  /** Direct supertypes, in declaration order */
  extends: string[];
  /** Own properties, in declaration order */
  properties: Map<string, PropertyDef>;
  /** Inherited property names this type drops */
  exceptProperties: string[];
  preferredPropertyName: Map<string, PreferredName>;
  /** File the type was loaded from, relative to the schema root */
  source?: string;
}

/**
 * Result of loading a single schema document.
 */
export interface SchemaLoadResult {
  /** Whether loading succeeded */
  success: boolean;
  /** Types declared by the document (if successful) */
  types?: TypeDef[];
  /** Error message (if failed) */
  error?: string;
  /** Error code (if failed with a SchemaError) */
  code?: SchemaErrorCode;
}

/**
 * A document that failed to load.
 */
export interface SchemaLoadError {
  path: string;
  error: string;
  code?: SchemaErrorCode;
}

/**
 * Result of loading all schema documents from a directory.
 */
export interface SchemaLoadAllResult {
  /** Types from documents that loaded successfully */
  types: TypeDef[];
  /** Errors encountered during loading */
  errors: SchemaLoadError[];
}

/**
 * Options for schema loading.
 */
export interface SchemaLoadOptions {
  /** Base directory for resolving relative paths */
  basePath: string;
  /** File patterns to include (default: ['*.vocab.yaml', '*.vocab.yml', '*.vocab.json']) */
  patterns?: string[];
  /** Whether to recursively search directories */
  recursive?: boolean;
}

/**
 * Type inheritance graph node.
 */
export interface TypeDependencyNode {
  name: string;
  /** Direct supertypes */
  dependsOn: Set<string>;
  /** Direct subtypes */
  dependedBy: Set<string>;
}

export type TypeDependencyGraph = Map<string, TypeDependencyNode>;

/**
 * Result of checking the inheritance graph.
 */
export interface SupertypeResolutionResult {
  /** Whether every supertype exists and the graph is acyclic */
  resolved: boolean;
  /** Supertypes referenced but not declared */
  unresolved: Array<{ type: string; supertype: string }>;
  /** Inheritance cycles detected */
  cycles: string[][];
}
