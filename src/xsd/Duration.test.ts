/**
 * Tests for xsd:duration parsing and formatting.
 */

import { describe, it, expect } from 'vitest';
import { XsdDuration, XsdDurationParseError, xsdDurationCodec } from './Duration.js';

describe('XsdDuration', () => {
  describe('parse', () => {
    it('reads every component', () => {
      const value = XsdDuration.parse('P3Y6M4DT12H30M5S');

      expect(value).toMatchObject({
        negative: false, years: 3, months: 6, days: 4, hours: 12, minutes: 30, seconds: 5,
      });
    });

    it('treats missing components as zero', () => {
      expect(XsdDuration.parse('PT2H')).toMatchObject({
        years: 0, months: 0, days: 0, hours: 2, minutes: 0, seconds: 0,
      });
      expect(XsdDuration.parse('P1D').days).toBe(1);
    });

    it('reads the leading sign', () => {
      expect(XsdDuration.parse('P-1D').negative).toBe(true);
    });

    it('tells minutes from months by the T separator', () => {
      const value = XsdDuration.parse('P1MT1M');
      expect(value.months).toBe(1);
      expect(value.minutes).toBe(1);
    });

    it('accepts an empty time section', () => {
      expect(XsdDuration.parse('P1DT')).toMatchObject({ days: 1, hours: 0, minutes: 0, seconds: 0 });
    });

    it.each(['', 'P1H', '3Y', 'P1Y2Y', 'PT1.5S', 'P-1D-'])('rejects %j', text => {
      expect(() => XsdDuration.parse(text)).toThrow(XsdDurationParseError);
    });
  });

  describe('format', () => {
    it('reproduces the component layout', () => {
      expect(XsdDuration.parse('P3Y6M4DT12H30M5S').format()).toBe('P3Y6M4DT12H30M5S');
      expect(XsdDuration.parse('PT90M').format()).toBe('PT90M');
      expect(XsdDuration.parse('P-1DT1S').format()).toBe('P-1DT1S');
    });

    it('omits zero components', () => {
      expect(new XsdDuration({ years: 1, minutes: 5 }).format()).toBe('P1YT5M');
    });

    it('writes a zero duration as PT0S', () => {
      expect(XsdDuration.zero().format()).toBe('PT0S');
    });

    it('writes the years value into the months slot in legacy mode', () => {
      expect(XsdDuration.parse('P3Y6M').format({ legacyMonths: true })).toBe('P3Y3M');
    });
  });

  describe('xsdDurationCodec', () => {
    it('round-trips through the codec', () => {
      const codec = xsdDurationCodec();
      const value = codec.decode('P1Y2M3DT4H5M6S', '$');

      expect(codec.encode(value)).toBe('P1Y2M3DT4H5M6S');
      expect(codec.decode(codec.encode(value), '$')).toEqual(value);
    });

    it('applies legacy formatting when configured', () => {
      const codec = xsdDurationCodec({ legacyMonths: true });
      expect(codec.encode(codec.decode('P2Y1M', '$'))).toBe('P2Y2M');
    });

    it('reports grammar violations as MalformedScalar', () => {
      expect(() => xsdDurationCodec().decode('P1H', '$.duration')).toThrow(
        'Invalid xsd:duration P1H: does not match P[-][nY][nM][nD][T[nH][nM][nS]] at $.duration',
      );
    });
  });
});
