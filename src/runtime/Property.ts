/**
 * Cardinality containers.
 *
 * A Normal property holds 0..N values. On the wire it is omitted when
 * empty, written bare when it holds one value, and written as an array
 * when it holds two or more. Reading accepts an array, a single value, or
 * null (empty).
 */

import { indexPath, isWireArray, type JsonValue, type WireValue } from '../core/json.js';
import type { Codec } from './Codec.js';

export type PropertyKind = 'Required' | 'Functional' | 'Normal';

export const PROPERTY_KINDS: readonly PropertyKind[] = ['Required', 'Functional', 'Normal'];

export function decodeOneOrMany<T>(codec: Codec<T>, input: WireValue, path: string): T[] {
  if (input === null) {
    return [];
  }
  if (isWireArray(input)) {
    return input.map((item, index) => codec.decode(item, indexPath(path, index)));
  }
  return [codec.decode(input, path)];
}

/**
 * Wire shape of a sequence; `undefined` means the key is left out.
 */
export function encodeOneOrMany<T>(codec: Codec<T>, values: readonly T[]): JsonValue | undefined {
  if (values.length === 0) {
    return undefined;
  }
  if (values.length === 1) {
    return codec.encode(values[0]);
  }
  return values.map(value => codec.encode(value));
}

/**
 * Codec for a Normal (0..N) property's value.
 */
export function sequenceCodec<T>(codec: Codec<T>): Codec<readonly T[]> {
  return {
    name: `Property<${codec.name}>`,
    decode: (input, path) => decodeOneOrMany(codec, input, path),
    encode: values => encodeOneOrMany(codec, values) ?? null,
    empty: () => [],
  };
}

/**
 * Codec for a Functional (0..1) property's value; null reads as absent.
 */
export function optionalCodec<T>(codec: Codec<T>): Codec<T | undefined> {
  return {
    name: `Option<${codec.name}>`,
    decode: (input, path) => (input === null ? undefined : codec.decode(input, path)),
    encode: value => (value === undefined ? null : codec.encode(value)),
    empty: () => undefined,
  };
}
