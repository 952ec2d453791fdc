/**
 * Codec: the bidirectional JSON mapping every binding and primitive provides.
 */

import type { JsonObject, JsonValue, WireValue } from '../core/json.js';

export interface Codec<T> {
  /** Name shown in error messages (`string`, `Or<Link, Object>`, ...) */
  readonly name: string;

  /**
   * Decode a wire value. Throws DecodeError; never returns a partial value.
   *
   * @param path - JSON path of `input`, used in error messages
   */
  decode(input: WireValue, path: string): T;

  /** Encode a value; values produced by `decode` always encode. */
  encode(value: T): JsonValue;

  /** Type-appropriate empty value, used when upcasting fills absent fields. */
  empty(): T;
}

/**
 * Wrap a codec factory so that recursive value types can refer to
 * bindings that are still being built.
 */
export function lazyCodec<T>(name: string, resolve: () => Codec<T>): Codec<T> {
  let resolved: Codec<T> | undefined;
  const target = (): Codec<T> => {
    resolved ??= resolve();
    return resolved;
  };
  return {
    name,
    decode: (input, path) => target().decode(input, path),
    encode: value => target().encode(value),
    empty: () => target().empty(),
  };
}

/**
 * A codec whose wire form is always a JSON object, so that its fields can
 * share an object level with envelope keys such as `@context`.
 */
export interface ObjectCodec<T> extends Codec<T> {
  encode(value: T): JsonObject;
}
