/**
 * Remotable<T>: a value that is either a bare reference (an identifier
 * string pointing at an object not embedded here) or the object inlined.
 *
 * Decoding tries the inline form first, then the identifier.
 */

import type { Codec } from './Codec.js';
import { Identified, objectIdOf } from './ObjectId.js';
import { decodeEither } from './Or.js';
import { uriCodec } from './scalars.js';

export class Remote extends Identified {
  readonly kind = 'remote' as const;

  constructor(readonly id: string) {
    super();
  }

  objectId(): string {
    return this.id;
  }
}

export class Inline<T> extends Identified {
  readonly kind = 'inline' as const;

  constructor(readonly value: T) {
    super();
  }

  objectId(): string | undefined {
    return objectIdOf(this.value);
  }
}

export type Remotable<T> = Remote | Inline<T>;

export function remotableCodec<T>(inner: Codec<T>): Codec<Remotable<T>> {
  const name = `Remotable<${inner.name}>`;
  return {
    name,
    decode(input, path) {
      const result = decodeEither(
        name,
        path,
        () => inner.decode(input, path),
        () => uriCodec.decode(input, path),
      );
      return 'first' in result ? new Inline(result.first) : new Remote(result.second);
    },
    encode(value) {
      return value.kind === 'inline' ? inner.encode(value.value) : uriCodec.encode(value.id);
    },
    empty() {
      return new Inline(inner.empty());
    },
  };
}
