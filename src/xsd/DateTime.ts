/**
 * xsd:dateTime values.
 *
 * Two grammars are accepted, and the one a value was read with decides how
 * it is written back:
 * - RFC 3339 with an explicit offset (`2015-01-25T12:34:56Z`), re-emitted
 *   with whole seconds and a numeric offset (`+00:00`);
 * - a naive `YYYY-MM-DDTHH:MM:SS[.fraction]` with no offset, re-emitted with
 *   zero-padded fields and a 4-digit fractional-second suffix.
 *
 * Neither form truncates sub-second precision on output: an offset value
 * with a non-zero fraction keeps it (`12:34:56.5+00:00`), and a naive value
 * writes as many fraction digits beyond the fourth as it needs
 * (`12:34:56.123456`). This departs from strict seconds and 4-digit output
 * so that decode followed by encode never changes a value.
 */

import { DecodeError } from '../core/errors.js';
import type { Codec } from '../runtime/Codec.js';

export type DateTimeForm = 'offset' | 'naive';

export interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Sub-second part in nanoseconds (0..999_999_999) */
  nanosecond: number;
}

const OFFSET_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const NAIVE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Convert fraction digits to nanoseconds; digits past the ninth are dropped.
 */
function fractionToNanos(digits: string | undefined): number {
  if (digits === undefined) {
    return 0;
  }
  return Number(digits.slice(0, 9).padEnd(9, '0'));
}

/**
 * Fraction digits for a nanosecond value, trailing zeros trimmed down to
 * `minDigits`.
 */
function nanosToFraction(nanos: number, minDigits: number): string {
  let digits = pad(nanos, 9);
  while (digits.length > minDigits && digits.endsWith('0')) {
    digits = digits.slice(0, -1);
  }
  return digits;
}

function validFields(fields: DateTimeFields): boolean {
  return fields.month >= 1 && fields.month <= 12
    && fields.day >= 1 && fields.day <= daysInMonth(fields.year, fields.month)
    && fields.hour <= 23
    && fields.minute <= 59
    && fields.second <= 60;
}

export class XsdDateTimeParseError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid xsd:dateTime: ${input}`);
    this.name = 'XsdDateTimeParseError';
  }
}

export class XsdDateTime {
  private constructor(
    readonly form: DateTimeForm,
    readonly fields: Readonly<DateTimeFields>,
    /** Offset from UTC in minutes; present only for the offset form */
    readonly offsetMinutes: number | undefined,
  ) {}

  static naive(fields: DateTimeFields): XsdDateTime {
    return new XsdDateTime('naive', { ...fields }, undefined);
  }

  static withOffset(fields: DateTimeFields, offsetMinutes: number): XsdDateTime {
    return new XsdDateTime('offset', { ...fields }, offsetMinutes);
  }

  /**
   * Parse either grammar, trying the offset form first.
   *
   * @throws XsdDateTimeParseError when neither grammar matches
   */
  static parse(text: string): XsdDateTime {
    const withOffset = OFFSET_PATTERN.exec(text);
    if (withOffset !== null) {
      const fields = XsdDateTime.fieldsOf(withOffset);
      const [, , , , , , , , zulu, sign, offsetHour, offsetMinute] = withOffset;
      let offset = 0;
      if (zulu === undefined) {
        const hours = Number(offsetHour);
        const minutes = Number(offsetMinute);
        if (hours > 23 || minutes > 59) {
          throw new XsdDateTimeParseError(text);
        }
        offset = (sign === '-' ? -1 : 1) * (hours * 60 + minutes);
      }
      if (validFields(fields)) {
        return XsdDateTime.withOffset(fields, offset);
      }
      throw new XsdDateTimeParseError(text);
    }

    const naive = NAIVE_PATTERN.exec(text);
    if (naive !== null) {
      const fields = XsdDateTime.fieldsOf(naive);
      if (validFields(fields)) {
        return XsdDateTime.naive(fields);
      }
    }
    throw new XsdDateTimeParseError(text);
  }

  private static fieldsOf(match: RegExpExecArray): DateTimeFields {
    const [, year, month, day, hour, minute, second, fraction] = match;
    return {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: Number(second),
      nanosecond: fractionToNanos(fraction),
    };
  }

  /**
   * Milliseconds since the Unix epoch; naive values are read as UTC.
   */
  toEpochMilliseconds(): number {
    const { year, month, day, hour, minute, second, nanosecond } = this.fields;
    const utc = Date.UTC(year, month - 1, day, hour, minute, second, Math.floor(nanosecond / 1_000_000));
    return utc - (this.offsetMinutes ?? 0) * 60_000;
  }

  toString(): string {
    const { year, month, day, hour, minute, second, nanosecond } = this.fields;
    const base = `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;

    if (this.form === 'naive') {
      return `${base}.${nanosToFraction(nanosecond, 4)}`;
    }

    const fraction = nanosecond === 0 ? '' : `.${nanosToFraction(nanosecond, 1)}`;
    const offset = this.offsetMinutes ?? 0;
    const sign = offset < 0 ? '-' : '+';
    const magnitude = Math.abs(offset);
    return `${base}${fraction}${sign}${pad(Math.floor(magnitude / 60), 2)}:${pad(magnitude % 60, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Codec for `xsd:dateTime` property values.
 */
export const xsdDateTimeCodec: Codec<XsdDateTime> = {
  name: 'xsd:dateTime',
  decode(input, path) {
    if (typeof input !== 'string') {
      throw DecodeError.typeMismatch('expected an xsd:dateTime string', path);
    }
    try {
      return XsdDateTime.parse(input);
    } catch (err) {
      if (err instanceof XsdDateTimeParseError) {
        throw DecodeError.malformedScalar(err.message, path);
      }
      throw err;
    }
  },
  encode(value) {
    return value.toString();
  },
  empty() {
    return XsdDateTime.naive({ year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0, nanosecond: 0 });
  },
};
