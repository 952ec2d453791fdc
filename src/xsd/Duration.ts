/**
 * xsd:duration values: `P[-][nY][nM][nD][T[nH][nM][nS]]`.
 *
 * Components are kept exactly as written (no carrying of 90 minutes into
 * hours), so a value re-encodes to the same component layout with zero
 * components left out.
 */

import { DecodeError } from '../core/errors.js';
import type { Codec } from '../runtime/Codec.js';

export interface DurationComponents {
  negative: boolean;
  years: number;
  months: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export interface DurationFormatOptions {
  /**
   * Write the years magnitude into the months slot, matching the output of
   * older tooling byte for byte.
   */
  legacyMonths?: boolean;
}

const DURATION_PATTERN =
  /^P(-)?(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

export class XsdDurationParseError extends Error {
  constructor(public readonly input: string, reason = 'does not match P[-][nY][nM][nD][T[nH][nM][nS]]') {
    super(`Invalid xsd:duration ${input}: ${reason}`);
    this.name = 'XsdDurationParseError';
  }
}

function component(text: string | undefined, input: string): number {
  if (text === undefined) {
    return 0;
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new XsdDurationParseError(input, `component ${text} is too large`);
  }
  return value;
}

export class XsdDuration implements Readonly<DurationComponents> {
  readonly negative: boolean;
  readonly years: number;
  readonly months: number;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;

  constructor(components: Partial<DurationComponents> = {}) {
    this.negative = components.negative ?? false;
    this.years = components.years ?? 0;
    this.months = components.months ?? 0;
    this.days = components.days ?? 0;
    this.hours = components.hours ?? 0;
    this.minutes = components.minutes ?? 0;
    this.seconds = components.seconds ?? 0;
  }

  static zero(): XsdDuration {
    return new XsdDuration();
  }

  /**
   * @throws XsdDurationParseError on grammar violations
   */
  static parse(text: string): XsdDuration {
    const match = DURATION_PATTERN.exec(text);
    if (match === null) {
      throw new XsdDurationParseError(text);
    }
    const [, sign, years, months, days, hours, minutes, seconds] = match;
    return new XsdDuration({
      negative: sign !== undefined,
      years: component(years, text),
      months: component(months, text),
      days: component(days, text),
      hours: component(hours, text),
      minutes: component(minutes, text),
      seconds: component(seconds, text),
    });
  }

  /** Total length of the time section in seconds */
  get timeSeconds(): number {
    return this.hours * 3600 + this.minutes * 60 + this.seconds;
  }

  format(options: DurationFormatOptions = {}): string {
    let out = 'P';
    if (this.negative) {
      out += '-';
    }
    if (this.years !== 0) {
      out += `${this.years}Y`;
    }
    if (this.months !== 0) {
      out += `${options.legacyMonths === true ? this.years : this.months}M`;
    }
    if (this.days !== 0) {
      out += `${this.days}D`;
    }
    if (this.timeSeconds !== 0) {
      out += 'T';
      if (this.hours !== 0) out += `${this.hours}H`;
      if (this.minutes !== 0) out += `${this.minutes}M`;
      if (this.seconds !== 0) out += `${this.seconds}S`;
    }
    return out === 'P' || out === 'P-' ? `${out}T0S` : out;
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Build the `xsd:duration` codec.
 */
export function xsdDurationCodec(options: DurationFormatOptions = {}): Codec<XsdDuration> {
  return {
    name: 'xsd:duration',
    decode(input, path) {
      if (typeof input !== 'string') {
        throw DecodeError.typeMismatch('expected an xsd:duration string', path);
      }
      try {
        return XsdDuration.parse(input);
      } catch (err) {
        if (err instanceof XsdDurationParseError) {
          throw DecodeError.malformedScalar(err.message, path);
        }
        throw err;
      }
    },
    encode(value) {
      return value.format(options);
    },
    empty() {
      return XsdDuration.zero();
    },
  };
}
