/**
 * JSON value trees handed to and produced by the bindings.
 *
 * Encoding always produces a plain `JsonValue`. Decoding accepts the wider
 * `WireValue`, whose objects may also be ordered entry lists that repeat a
 * key (see `JsonEntries`), since repeated keys carry meaning for
 * many-valued properties and `JSON.parse` silently drops them.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * An object whose keys are kept in document order, duplicates included.
 */
export class JsonEntries {
  constructor(readonly entries: ReadonlyArray<readonly [string, WireValue]>) {}

  get size(): number {
    return this.entries.length;
  }
}

export type WireValue = JsonPrimitive | readonly WireValue[] | WireObject | JsonEntries;

export interface WireObject {
  readonly [key: string]: WireValue;
}

/**
 * Check whether a wire value is an object (either representation).
 */
export function isWireObject(value: WireValue): value is WireObject | JsonEntries {
  return value instanceof JsonEntries
    || (value !== null && typeof value === 'object' && !Array.isArray(value));
}

export function isWireArray(value: WireValue): value is readonly WireValue[] {
  return Array.isArray(value);
}

/**
 * Iterate the entries of a wire object in document order.
 */
export function entriesOf(value: WireObject | JsonEntries): ReadonlyArray<readonly [string, WireValue]> {
  if (value instanceof JsonEntries) {
    return value.entries;
  }
  return Object.entries(value);
}

/**
 * Add an own enumerable entry. Unlike assignment, this stores a `__proto__`
 * key as a plain entry instead of replacing the prototype.
 */
export function setEntry<V>(target: { [key: string]: V }, key: string, value: V): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Collapse a wire value into plain JSON. Repeated keys are last-write-wins.
 */
export function toJsonValue(value: WireValue): JsonValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (isWireArray(value)) {
    return value.map(toJsonValue);
  }
  const result: JsonObject = {};
  for (const [key, entry] of entriesOf(value)) {
    setEntry(result, key, toJsonValue(entry));
  }
  return result;
}

/**
 * Short description of a wire value's JSON type, for error messages.
 */
export function describeWire(value: WireValue): string {
  if (value === null) return 'null';
  if (isWireArray(value)) return 'array';
  if (isWireObject(value)) return 'object';
  return typeof value;
}

const PLAIN_KEY = /^[A-Za-z_$][\w$]*$/;

/**
 * Extend a JSON path (`$.actor[0].name`) with an object key.
 */
export function keyPath(path: string, key: string): string {
  return PLAIN_KEY.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

export function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}
