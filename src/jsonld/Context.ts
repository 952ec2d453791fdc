/**
 * Context: the JSON-LD `@context` value, kept for its shape only.
 *
 * Accepted wire shapes are a single identifier string, a single inline
 * term-definition object, or an array mixing both. Identifiers are kept in
 * order; all inline objects are merged into one term map, later terms
 * overwriting earlier ones.
 */

import { DecodeError } from '../core/errors.js';
import {
  describeWire,
  entriesOf,
  indexPath,
  isWireArray,
  isWireObject,
  keyPath,
  setEntry,
  toJsonValue,
  type JsonEntries,
  type JsonObject,
  type JsonValue,
  type WireObject,
  type WireValue,
} from '../core/json.js';
import type { Codec, ObjectCodec } from '../runtime/Codec.js';
import { uriCodec } from '../runtime/scalars.js';

export const CONTEXT_KEY = '@context';

export class Context {
  constructor(
    readonly urls: readonly string[] = [],
    readonly inline: Readonly<JsonObject> = {},
  ) {}

  /** Term definition for a key, from the merged inline terms */
  term(key: string): JsonValue | undefined {
    return Object.hasOwn(this.inline, key) ? this.inline[key] : undefined;
  }

  isEmpty(): boolean {
    return this.urls.length === 0 && Object.keys(this.inline).length === 0;
  }
}

function inlineTerms(input: WireObject | JsonEntries, into: JsonObject): void {
  for (const [key, value] of entriesOf(input)) {
    setEntry(into, key, toJsonValue(value));
  }
}

export const contextCodec: Codec<Context> = {
  name: '@context',
  decode(input, path) {
    if (typeof input === 'string') {
      return new Context([uriCodec.decode(input, path)]);
    }
    const inline: JsonObject = {};
    if (isWireArray(input)) {
      const urls: string[] = [];
      input.forEach((element, index) => {
        if (typeof element === 'string') {
          urls.push(uriCodec.decode(element, indexPath(path, index)));
        } else if (isWireObject(element)) {
          inlineTerms(element, inline);
        } else {
          throw DecodeError.typeMismatch(
            `expected an identifier or term definitions, found ${describeWire(element)}`,
            indexPath(path, index),
          );
        }
      });
      return new Context(urls, inline);
    }
    if (isWireObject(input)) {
      inlineTerms(input, inline);
      return new Context([], inline);
    }
    throw DecodeError.typeMismatch(`expected a @context value, found ${describeWire(input)}`, path);
  },
  encode(context) {
    const hasInline = Object.keys(context.inline).length > 0;
    if (!hasInline) {
      const [only] = context.urls;
      return context.urls.length === 1 && only !== undefined ? only : [...context.urls];
    }
    if (context.urls.length === 0) {
      return { ...context.inline };
    }
    return [...context.urls, { ...context.inline }];
  },
  empty: () => new Context(),
};

/**
 * A typed body sharing its object level with an optional `@context`.
 */
export interface WithContext<T> {
  context?: Context;
  body: T;
}

/**
 * Wrap a body codec into a document codec that also reads and writes
 * `@context`. The body codec sees the whole object and ignores the
 * `@context` key like any other unknown key.
 */
export function withContextCodec<T>(body: ObjectCodec<T>): ObjectCodec<WithContext<T>> {
  return {
    name: `WithContext<${body.name}>`,
    decode(input: WireValue, path: string) {
      if (!isWireObject(input)) {
        throw DecodeError.typeMismatch(`expected a document object, found ${describeWire(input)}`, path);
      }
      let context: Context | undefined;
      for (const [key, value] of entriesOf(input)) {
        if (key !== CONTEXT_KEY) {
          continue;
        }
        if (context !== undefined) {
          throw DecodeError.duplicateField(CONTEXT_KEY, path);
        }
        context = contextCodec.decode(value, keyPath(path, key));
      }
      const decoded = body.decode(input, path);
      return context === undefined ? { body: decoded } : { context, body: decoded };
    },
    encode(document) {
      const fields = body.encode(document.body);
      if (document.context === undefined) {
        return fields;
      }
      return { [CONTEXT_KEY]: contextCodec.encode(document.context), ...fields };
    },
    empty: () => ({ body: body.empty() }),
  };
}
