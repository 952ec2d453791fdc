/**
 * Codecs for plain JSON scalars and identifiers.
 */

import { DecodeError } from '../core/errors.js';
import { describeWire, toJsonValue, type JsonValue } from '../core/json.js';
import type { Codec } from './Codec.js';

function mismatch(expected: string, input: Parameters<typeof describeWire>[0], path: string): DecodeError {
  return DecodeError.typeMismatch(`expected ${expected}, found ${describeWire(input)}`, path);
}

export const stringCodec: Codec<string> = {
  name: 'string',
  decode(input, path) {
    if (typeof input !== 'string') throw mismatch('a string', input, path);
    return input;
  },
  encode: value => value,
  empty: () => '',
};

export const numberCodec: Codec<number> = {
  name: 'number',
  decode(input, path) {
    if (typeof input !== 'number') throw mismatch('a number', input, path);
    return input;
  },
  encode: value => value,
  empty: () => 0,
};

export const integerCodec: Codec<number> = {
  name: 'integer',
  decode(input, path) {
    if (typeof input !== 'number' || !Number.isSafeInteger(input)) throw mismatch('an integer', input, path);
    return input;
  },
  encode: value => value,
  empty: () => 0,
};

export const booleanCodec: Codec<boolean> = {
  name: 'boolean',
  decode(input, path) {
    if (typeof input !== 'boolean') throw mismatch('a boolean', input, path);
    return input;
  },
  encode: value => value,
  empty: () => false,
};

/**
 * Check that a string parses as an absolute IRI.
 */
export function isIdentifier(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Identifier strings (absolute IRIs such as `https://example.org/note/1`).
 */
export const uriCodec: Codec<string> = {
  name: 'uri',
  decode(input, path) {
    if (typeof input !== 'string') throw mismatch('an identifier string', input, path);
    if (!isIdentifier(input)) {
      throw DecodeError.malformedScalar(`invalid identifier \`${input}\``, path);
    }
    return input;
  },
  encode: value => value,
  empty: () => '',
};

/**
 * Untyped JSON, kept as-is. Repeated keys collapse last-write-wins.
 */
export const jsonCodec: Codec<JsonValue> = {
  name: 'json',
  decode: input => toJsonValue(input),
  encode: value => value,
  empty: () => null,
};
