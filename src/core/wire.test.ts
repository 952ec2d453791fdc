/**
 * Tests for reading JSON text into wire values.
 */

import { describe, it, expect } from 'vitest';
import { JsonEntries } from './json.js';
import { parseWire, WireParseError } from './wire.js';

describe('parseWire', () => {
  it('reads JSON scalars, arrays and objects', () => {
    expect(parseWire('[1, -2.5, 1e3, true, false, null, "s"]')).toEqual([1, -2.5, 1000, true, false, null, 's']);
    expect(parseWire('{"a": {"b": []}}')).toEqual({ a: { b: [] } });
    expect(parseWire('null')).toBeNull();
  });

  it('keeps repeated keys in document order', () => {
    const value = parseWire('{"tag": "a", "name": "n", "tag": "b"}');
    expect(value).toBeInstanceOf(JsonEntries);
    if (value instanceof JsonEntries) {
      expect(value.entries).toEqual([['tag', 'a'], ['name', 'n'], ['tag', 'b']]);
    }
  });

  it('keeps a key named __proto__ as an own entry', () => {
    const value = parseWire('{"__proto__": 1}');
    expect(Object.keys(value ?? {})).toEqual(['__proto__']);
    expect(JSON.stringify(value)).toBe('{"__proto__":1}');
  });

  it('rejects empty input', () => {
    expect(() => parseWire('')).toThrow(new WireParseError('Invalid JSON document: empty input'));
    expect(() => parseWire('  \n')).toThrow(WireParseError);
  });

  it('rejects unquoted keys and words', () => {
    expect(() => parseWire('{a: 1}')).toThrow('Invalid JSON key: a');
    expect(() => parseWire('{"a": yes}')).toThrow('Invalid JSON value: yes');
    expect(() => parseWire('{"a": ~}')).toThrow('Invalid JSON value: ~');
  });

  it('rejects other YAML-only syntax', () => {
    expect(() => parseWire("{'a': 1}")).toThrow(WireParseError);
    expect(() => parseWire('a: 1')).toThrow('Invalid JSON object: block mapping');
    expect(() => parseWire('- 1')).toThrow('Invalid JSON array: block sequence');
    expect(() => parseWire('{"a"}')).toThrow(WireParseError);
  });

  it('reports syntax errors', () => {
    expect(() => parseWire('{"a": [1, 2}')).toThrow(/^Invalid JSON document: /);
  });
});
