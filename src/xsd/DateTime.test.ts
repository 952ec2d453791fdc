/**
 * Tests for xsd:dateTime parsing and formatting.
 */

import { describe, it, expect } from 'vitest';
import { XsdDateTime, XsdDateTimeParseError, xsdDateTimeCodec } from './DateTime.js';
import { DecodeError } from '../core/errors.js';

function thrownBy(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('XsdDateTime', () => {
  describe('offset form', () => {
    it('parses an RFC 3339 value with Z', () => {
      const value = XsdDateTime.parse('2015-01-25T12:34:56Z');

      expect(value.form).toBe('offset');
      expect(value.offsetMinutes).toBe(0);
      expect(value.fields).toEqual({
        year: 2015, month: 1, day: 25, hour: 12, minute: 34, second: 56, nanosecond: 0,
      });
    });

    it('re-emits with seconds precision and an explicit offset', () => {
      expect(XsdDateTime.parse('2015-01-25T12:34:56Z').toString()).toBe('2015-01-25T12:34:56+00:00');
      expect(XsdDateTime.parse('2014-12-31T23:00:00-08:00').toString()).toBe('2014-12-31T23:00:00-08:00');
    });

    it('round-trips through its own output', () => {
      const first = XsdDateTime.parse('2015-01-25T12:34:56Z');
      const second = XsdDateTime.parse(first.toString());

      expect(second).toEqual(first);
    });

    it('keeps a non-zero fraction', () => {
      expect(XsdDateTime.parse('2015-01-25T12:34:56.25+05:30').toString()).toBe('2015-01-25T12:34:56.25+05:30');
    });

    it('computes the instant using the offset', () => {
      const value = XsdDateTime.parse('1970-01-01T01:00:00+01:00');
      expect(value.toEpochMilliseconds()).toBe(0);
    });
  });

  describe('naive form', () => {
    it('parses a value without offset', () => {
      const value = XsdDateTime.parse('2015-01-25T12:34:56.0000');

      expect(value.form).toBe('naive');
      expect(value.offsetMinutes).toBeUndefined();
      expect(value.fields.nanosecond).toBe(0);
    });

    it('re-emits a 4-digit fraction', () => {
      expect(XsdDateTime.parse('2015-01-25T12:34:56.0000').toString()).toBe('2015-01-25T12:34:56.0000');
      expect(XsdDateTime.parse('2015-01-25T12:34:56').toString()).toBe('2015-01-25T12:34:56.0000');
      expect(XsdDateTime.parse('2015-01-25T12:34:56.5').toString()).toBe('2015-01-25T12:34:56.5000');
    });

    it('keeps digits beyond the fourth', () => {
      expect(XsdDateTime.parse('2015-01-25T12:34:56.123456').toString()).toBe('2015-01-25T12:34:56.123456');
    });
  });

  describe('invalid input', () => {
    it.each([
      'not a date',
      '2015-13-01T00:00:00Z',
      '2015-02-29T00:00:00',
      '2015-01-25 12:34:56',
      '2015-01-25T24:00:00Z',
    ])('rejects %s', text => {
      expect(() => XsdDateTime.parse(text)).toThrow(XsdDateTimeParseError);
    });

    it('accepts February 29 in a leap year', () => {
      expect(XsdDateTime.parse('2016-02-29T00:00:00').fields.day).toBe(29);
    });
  });

  describe('xsdDateTimeCodec', () => {
    it('reports a grammar violation as MalformedScalar', () => {
      const error = thrownBy(() => xsdDateTimeCodec.decode('yesterday', '$.published'));

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ code: 'MalformedScalar', path: '$.published' });
    });

    it('reports a non-string as TypeMismatch', () => {
      expect(() => xsdDateTimeCodec.decode(42, '$')).toThrow('expected an xsd:dateTime string at $');
    });

    it('encodes to the remembered form', () => {
      const value = xsdDateTimeCodec.decode('2015-01-25T12:34:56Z', '$');
      expect(xsdDateTimeCodec.encode(value)).toBe('2015-01-25T12:34:56+00:00');
    });
  });
});
