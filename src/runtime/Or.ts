/**
 * Or<L, R>: ordered either-of.
 *
 * Decoding tries a complete decode as L first and only then as R, against
 * the same input. A value valid as both is always L.
 */

import { DecodeError, captureDecode } from '../core/errors.js';
import type { Codec } from './Codec.js';
import { Identified, objectIdOf } from './ObjectId.js';

export class OrLeft<L> extends Identified {
  readonly side = 'left' as const;

  constructor(readonly value: L) {
    super();
  }

  objectId(): string | undefined {
    return objectIdOf(this.value);
  }
}

export class OrRight<R> extends Identified {
  readonly side = 'right' as const;

  constructor(readonly value: R) {
    super();
  }

  objectId(): string | undefined {
    return objectIdOf(this.value);
  }
}

export type Or<L, R> = OrLeft<L> | OrRight<R>;

export function left<L, R>(value: Or<L, R>): L | undefined {
  return value.side === 'left' ? value.value : undefined;
}

export function right<L, R>(value: Or<L, R>): R | undefined {
  return value.side === 'right' ? value.value : undefined;
}

/**
 * Run two independent decodes in order; the first success wins.
 */
export function decodeEither<A, B>(
  name: string,
  path: string,
  first: () => A,
  second: () => B,
): { first: A } | { second: B } {
  const firstAttempt = captureDecode(first);
  if (firstAttempt.success) {
    return { first: firstAttempt.value };
  }
  const secondAttempt = captureDecode(second);
  if (secondAttempt.success) {
    return { second: secondAttempt.value };
  }
  const causes = [firstAttempt.error.message, secondAttempt.error.message];
  throw DecodeError.typeMismatch(`no branch of ${name} matched (${causes.join(' & ')})`, path, causes);
}

export function orCodec<L, R>(leftCodec: Codec<L>, rightCodec: Codec<R>): Codec<Or<L, R>> {
  const name = `Or<${leftCodec.name}, ${rightCodec.name}>`;
  return {
    name,
    decode(input, path) {
      const result = decodeEither(
        name,
        path,
        () => leftCodec.decode(input, path),
        () => rightCodec.decode(input, path),
      );
      return 'first' in result ? new OrLeft(result.first) : new OrRight(result.second);
    },
    encode(value) {
      return value.side === 'left' ? leftCodec.encode(value.value) : rightCodec.encode(value.value);
    },
    empty() {
      return new OrLeft(leftCodec.empty());
    },
  };
}
