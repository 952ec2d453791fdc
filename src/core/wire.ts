/**
 * parseWire: read JSON text into a wire value tree that keeps repeated keys.
 *
 * The yaml parser accepts JSON as-is (YAML 1.2 flow syntax is a superset of
 * JSON) and, with `uniqueKeys: false`, hands back every key of a mapping in
 * order. Objects that repeat a key become `JsonEntries`; all others become
 * plain records. YAML-only syntax (plain strings, single quotes, block
 * collections) is rejected.
 */

import { parseDocument, isMap, isSeq, isScalar, Scalar } from 'yaml';
import { JsonEntries, setEntry, type WireObject, type WireValue } from './json.js';

export class WireParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireParseError';
  }
}

/** Unquoted scalars JSON allows: literals and numbers */
const JSON_PLAIN = /^(?:true|false|null|-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?)$/;

function sourceOf(node: Scalar, text: string): string {
  const range = node.range;
  return range ? text.slice(range[0], range[1]) : String(node.value);
}

/**
 * Reject scalar spellings JSON does not have (plain words, single quotes,
 * block scalars, `~`).
 */
function checkScalar(node: Scalar, text: string, role: 'key' | 'value'): void {
  if (node.type === Scalar.QUOTE_DOUBLE) {
    return;
  }
  if (role === 'value' && node.type === Scalar.PLAIN && JSON_PLAIN.test(sourceOf(node, text))) {
    return;
  }
  throw new WireParseError(`Invalid JSON ${role}: ${sourceOf(node, text)}`);
}

function scalarKey(key: unknown, text: string): string {
  if (isScalar(key)) {
    checkScalar(key, text, 'key');
    return String(key.value);
  }
  throw new WireParseError('Only string object keys are supported');
}

function toWire(node: unknown, text: string): WireValue {
  if (node === null || node === undefined) {
    return null;
  }

  if (isScalar(node)) {
    checkScalar(node, text, 'value');
    const value: unknown = node.value;
    if (value === null || typeof value === 'string' || typeof value === 'boolean' || typeof value === 'number') {
      return value;
    }
    throw new WireParseError(`Unsupported scalar: ${String(value)}`);
  }

  if (isSeq(node)) {
    if (node.flow !== true) {
      throw new WireParseError('Invalid JSON array: block sequence');
    }
    return node.items.map(item => toWire(item, text));
  }

  if (isMap(node)) {
    if (node.flow !== true) {
      throw new WireParseError('Invalid JSON object: block mapping');
    }
    const entries: Array<readonly [string, WireValue]> = [];
    const seen = new Set<string>();
    let repeated = false;

    for (const pair of node.items) {
      const key = scalarKey(pair.key, text);
      if (pair.value === null) {
        throw new WireParseError(`Invalid JSON object: no value for key ${key}`);
      }
      if (seen.has(key)) {
        repeated = true;
      }
      seen.add(key);
      entries.push([key, toWire(pair.value, text)]);
    }

    if (repeated) {
      return new JsonEntries(entries);
    }
    const record: { [key: string]: WireValue } = {};
    for (const [key, value] of entries) {
      setEntry(record, key, value);
    }
    return record satisfies WireObject;
  }

  throw new WireParseError('Unsupported node in document');
}

/**
 * Parse JSON text, keeping repeated object keys.
 *
 * @param text - JSON document text
 * @returns Wire value tree suitable for any binding's decode
 * @throws WireParseError for empty input or syntax outside JSON
 */
export function parseWire(text: string): WireValue {
  const doc = parseDocument(text, { uniqueKeys: false });

  if (doc.errors.length > 0) {
    const first = doc.errors[0];
    throw new WireParseError(`Invalid JSON document: ${first?.message ?? 'parse error'}`);
  }

  const contents: unknown = doc.contents;
  if (contents === null) {
    throw new WireParseError('Invalid JSON document: empty input');
  }
  return toWire(contents, text);
}
