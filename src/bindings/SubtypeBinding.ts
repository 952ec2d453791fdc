/**
 * SubtypeBinding: the polymorphic envelope of a base type: one case per
 * type that is, or transitively extends, the base.
 *
 * The case is chosen by the object's `type` key, matched against member
 * type names and IRIs. When `type` is absent or names no member, the
 * object is read as the base type itself.
 */

import { captureDecode, DecodeError, type DecodeResult } from '../core/errors.js';
import { describeWire, entriesOf, isWireArray, isWireObject, type JsonObject, type WireValue } from '../core/json.js';
import type { ObjectCodec } from '../runtime/Codec.js';
import { Variant } from '../runtime/VocabObject.js';
import type { ObjectBinding } from './ObjectBinding.js';

/** Wire key holding the type of a polymorphic object */
export const DISCRIMINANT_KEY = 'type';

export class SubtypeBinding implements ObjectCodec<Variant> {
  readonly name: string;
  private readonly byName: ReadonlyMap<string, ObjectBinding>;
  private readonly byUri: ReadonlyMap<string, ObjectBinding>;

  /**
   * @param base - Binding of the base type
   * @param members - Bindings of all members, the base first
   */
  constructor(
    private readonly base: ObjectBinding,
    readonly members: readonly ObjectBinding[],
  ) {
    this.name = `Subtypes<${base.typeName}>`;
    this.byName = new Map(members.map(member => [member.typeName, member]));
    const byUri = new Map<string, ObjectBinding>();
    for (const member of members) {
      if (!byUri.has(member.uri)) {
        byUri.set(member.uri, member);
      }
    }
    this.byUri = byUri;
  }

  get baseName(): string {
    return this.base.typeName;
  }

  /** Names of all member types, the base first */
  memberNames(): string[] {
    return this.members.map(member => member.typeName);
  }

  private match(tag: string): ObjectBinding | undefined {
    return this.byName.get(tag) ?? this.byUri.get(tag);
  }

  /**
   * Find the member named by the `type` value; an array names the first
   * member it recognizes.
   */
  private discriminate(input: WireValue): { tag?: string; member?: ObjectBinding } {
    let typeValue: WireValue | undefined;
    if (isWireObject(input)) {
      for (const [key, value] of entriesOf(input)) {
        if (key === DISCRIMINANT_KEY) {
          typeValue = value;
        }
      }
    }
    if (typeof typeValue === 'string') {
      return { tag: typeValue, member: this.match(typeValue) };
    }
    if (typeValue !== undefined && isWireArray(typeValue)) {
      const tags = typeValue.filter((item): item is string => typeof item === 'string');
      for (const tag of tags) {
        const member = this.match(tag);
        if (member !== undefined) {
          return { tag, member };
        }
      }
      return { tag: tags[0] };
    }
    return {};
  }

  /**
   * @throws DecodeError
   */
  decode(input: WireValue, path = '$'): Variant {
    if (!isWireObject(input)) {
      throw DecodeError.typeMismatch(`expected ${this.base.typeName} object, found ${describeWire(input)}`, path);
    }

    const { tag, member } = this.discriminate(input);
    if (member !== undefined) {
      return new Variant(this.base.typeName, member.typeName, member.decode(input, path));
    }

    const fallback = captureDecode(() => this.base.decode(input, path));
    if (fallback.success) {
      return new Variant(this.base.typeName, this.base.typeName, fallback.value);
    }
    throw DecodeError.unknownDiscriminant(tag, this.memberNames(), path);
  }

  tryDecode(input: WireValue): DecodeResult<Variant> {
    return captureDecode(() => this.decode(input));
  }

  /**
   * Write `type` followed by the member's fields. When the member declares
   * a property read from `type`, that property alone writes the key.
   */
  encode(value: Variant): JsonObject {
    const member = this.byName.get(value.variant) ?? this.base;
    const fields = member.encode(value.value);
    if (member.hasWireKey(DISCRIMINANT_KEY)) {
      return fields;
    }
    return { [DISCRIMINANT_KEY]: member.typeName, ...fields };
  }

  empty(): Variant {
    return new Variant(this.base.typeName, this.base.typeName, this.base.empty());
  }
}
