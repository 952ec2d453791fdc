/**
 * VocabularyBindings: the compiled form of a vocabulary schema: one
 * ObjectBinding and one SubtypeBinding per type. Immutable once built.
 */

import { SchemaError } from '../core/errors.js';
import { withContextCodec, type WithContext } from '../jsonld/Context.js';
import type { ObjectCodec } from '../runtime/Codec.js';
import { Variant, VocabObject } from '../runtime/VocabObject.js';
import type { ObjectBinding } from './ObjectBinding.js';
import type { SubtypeBinding } from './SubtypeBinding.js';

export interface DocumentOptions {
  /** Read the body through the type's polymorphic envelope */
  polymorphic?: boolean;
}

export class VocabularyBindings {
  constructor(
    private readonly objects: ReadonlyMap<string, ObjectBinding>,
    private readonly envelopes: ReadonlyMap<string, SubtypeBinding>,
  ) {
    Object.freeze(this);
  }

  /** Type names, supertypes before subtypes */
  get typeNames(): string[] {
    return [...this.objects.keys()];
  }

  has(typeName: string): boolean {
    return this.objects.has(typeName);
  }

  /**
   * Codec of exactly `typeName`.
   *
   * @throws SchemaError (UnknownValueType) for an unknown type
   */
  get(typeName: string): ObjectBinding {
    const binding = this.objects.get(typeName);
    if (binding === undefined) {
      throw new SchemaError('UnknownValueType', `Unknown type ${typeName}`, typeName);
    }
    return binding;
  }

  /**
   * Codec of `typeName` or any of its subtypes.
   *
   * @throws SchemaError (UnknownValueType) for an unknown type
   */
  subtypesOf(typeName: string): SubtypeBinding {
    const binding = this.envelopes.get(typeName);
    if (binding === undefined) {
      throw new SchemaError('UnknownValueType', `Unknown type ${typeName}`, typeName);
    }
    return binding;
  }

  /**
   * `typeName` followed by every type extending it, breadth-first.
   */
  subtypes(typeName: string): string[] {
    return this.subtypesOf(typeName).memberNames();
  }

  /**
   * Codec for a whole document: an optional `@context` next to the body.
   */
  document(typeName: string, options: { polymorphic: true }): ObjectCodec<WithContext<Variant>>;
  document(typeName: string, options?: { polymorphic?: false }): ObjectCodec<WithContext<VocabObject>>;
  document(typeName: string, options: DocumentOptions): ObjectCodec<WithContext<Variant>> | ObjectCodec<WithContext<VocabObject>>;
  document(typeName: string, options: DocumentOptions = {}): ObjectCodec<WithContext<Variant>> | ObjectCodec<WithContext<VocabObject>> {
    return options.polymorphic === true
      ? withContextCodec(this.subtypesOf(typeName))
      : withContextCodec(this.get(typeName));
  }

  /**
   * Convert a value of `target` or any subtype into a value of `target`.
   * Fields `target` shares with the value's type are copied by name; the
   * rest take their empty value.
   *
   * @throws SchemaError (NotASubtype) when the value's type does not extend `target`
   */
  upcast(value: VocabObject | Variant, target: string): VocabObject {
    const object = value instanceof Variant ? value.value : value;
    const binding = this.get(target);
    if (!this.subtypesOf(target).memberNames().includes(object.type)) {
      throw SchemaError.notASubtype(object.type, target);
    }
    if (object.type === target) {
      return object;
    }
    return binding.create(object.properties);
  }
}
