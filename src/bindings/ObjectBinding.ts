/**
 * ObjectBinding: the codec of one schema type, read and written as a
 * flat JSON object.
 */

import { captureDecode, DecodeError, type DecodeResult } from '../core/errors.js';
import { describeWire, entriesOf, isWireObject, keyPath, type JsonObject, type WireValue } from '../core/json.js';
import type { Logger } from '../logging/logger.js';
import type { ObjectCodec } from '../runtime/Codec.js';
import { VocabObject } from '../runtime/VocabObject.js';
import type { PropertyBinding, PropertyHalf, PropertyState } from './PropertyBinding.js';

interface WireSlot {
  property: PropertyBinding;
  half: PropertyHalf;
}

export class ObjectBinding implements ObjectCodec<VocabObject> {
  readonly name: string;
  private readonly byName: ReadonlyMap<string, PropertyBinding>;
  private readonly slots: ReadonlyMap<string, WireSlot>;

  constructor(
    readonly typeName: string,
    readonly uri: string,
    readonly properties: readonly PropertyBinding[],
    logger?: Logger,
  ) {
    this.name = typeName;
    this.byName = new Map(properties.map(property => [property.name, property]));

    const slots = new Map<string, WireSlot>();
    for (const property of properties) {
      for (const [key, half] of property.wireKeys()) {
        const taken = slots.get(key);
        if (taken === undefined) {
          slots.set(key, { property, half });
        } else if (taken.property !== property) {
          logger?.warn(
            { type: typeName, key, kept: taken.property.name, dropped: property.name },
            'Wire key claimed by two properties',
          );
        }
      }
    }
    this.slots = slots;
  }

  property(name: string): PropertyBinding | undefined {
    return this.byName.get(name);
  }

  hasWireKey(key: string): boolean {
    return this.slots.has(key);
  }

  /** Every accepted wire key */
  wireKeys(): string[] {
    return [...this.slots.keys()];
  }

  /**
   * @throws DecodeError
   */
  decode(input: WireValue, path = '$'): VocabObject {
    if (!isWireObject(input)) {
      throw DecodeError.typeMismatch(`expected ${this.typeName} object, found ${describeWire(input)}`, path);
    }

    const states = new Map<PropertyBinding, PropertyState>();
    for (const [key, value] of entriesOf(input)) {
      const slot = this.slots.get(key);
      if (slot === undefined) {
        continue;
      }
      let state = states.get(slot.property);
      if (state === undefined) {
        state = {};
        states.set(slot.property, state);
      }
      slot.property.accept(state, slot.half, value, keyPath(path, key));
    }

    const fields: Record<string, unknown> = {};
    for (const property of this.properties) {
      fields[property.name] = property.finish(states.get(property) ?? {}, path);
    }
    return new VocabObject(this.typeName, fields);
  }

  tryDecode(input: WireValue): DecodeResult<VocabObject> {
    return captureDecode(() => this.decode(input));
  }

  encode(value: VocabObject): JsonObject {
    const out: JsonObject = {};
    for (const property of this.properties) {
      property.encodeInto(value.get(property.name), out);
    }
    return out;
  }

  empty(): VocabObject {
    return this.create({});
  }

  /**
   * Build a value of this type; fields not given take their empty value.
   * Unknown field names are dropped.
   */
  create(fields: Readonly<Record<string, unknown>>): VocabObject {
    const complete: Record<string, unknown> = {};
    for (const property of this.properties) {
      complete[property.name] = Object.hasOwn(fields, property.name) ? fields[property.name] : property.empty();
    }
    return new VocabObject(this.typeName, complete);
  }
}
