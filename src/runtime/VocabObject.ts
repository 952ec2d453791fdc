/**
 * Decoded values of schema types.
 */

import { ID_PROPERTY, Identified, objectIdOf } from './ObjectId.js';

/**
 * An instance of one schema type.
 *
 * `properties` holds one entry per effective property of `type`, keyed by
 * property name: Required → value, Functional → value or `undefined`,
 * Normal → array, LangContainer → `LangContainer`.
 */
export class VocabObject extends Identified {
  constructor(
    readonly type: string,
    readonly properties: Readonly<Record<string, unknown>>,
  ) {
    super();
  }

  get(property: string): unknown {
    return this.properties[property];
  }

  objectId(): string | undefined {
    return objectIdOf(this.properties[ID_PROPERTY]);
  }
}

/**
 * One case of a polymorphic envelope: a value of type `variant` read where
 * `base` (or any of its subtypes) was expected.
 */
export class Variant extends Identified {
  constructor(
    readonly base: string,
    readonly variant: string,
    readonly value: VocabObject,
  ) {
    super();
  }

  objectId(): string | undefined {
    return this.value.objectId();
  }
}
