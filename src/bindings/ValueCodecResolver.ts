/**
 * ValueCodecResolver: turns property value type expressions into codecs.
 *
 * Names of schema types are checked when a property is compiled, but
 * their codecs are looked up on first use, so types may refer to each
 * other (and themselves) in any order.
 */

import { SchemaError } from '../core/errors.js';
import type { Codec } from '../runtime/Codec.js';
import { lazyCodec } from '../runtime/Codec.js';
import { orCodec } from '../runtime/Or.js';
import { remotableCodec } from '../runtime/Remotable.js';
import {
  booleanCodec,
  integerCodec,
  jsonCodec,
  numberCodec,
  stringCodec,
  uriCodec,
} from '../runtime/scalars.js';
import { formatValueType, parseValueType, type ValueTypeExpr } from '../schema/valueType.js';
import { xsdDateTimeCodec } from '../xsd/DateTime.js';
import { xsdDurationCodec, type DurationFormatOptions } from '../xsd/Duration.js';

export interface CodecOptions {
  duration?: DurationFormatOptions;
}

/**
 * Lookups into the bindings being generated.
 */
export interface BindingLookup {
  hasType(name: string): boolean;
  objectCodec(name: string): Codec<unknown>;
  subtypesCodec(name: string): Codec<unknown>;
}

/** Generic type constructors and their arity */
const GENERICS: ReadonlyMap<string, number> = new Map([
  ['Or', 2],
  ['Remotable', 1],
  ['Untypable', 1],
  ['Subtypes', 1],
]);

export class ValueCodecResolver {
  private readonly scalars: ReadonlyMap<string, Codec<unknown>>;

  constructor(
    private readonly lookup: BindingLookup,
    options: CodecOptions = {},
  ) {
    this.scalars = new Map<string, Codec<unknown>>([
      ['string', stringCodec],
      ['number', numberCodec],
      ['integer', integerCodec],
      ['boolean', booleanCodec],
      ['uri', uriCodec],
      ['json', jsonCodec],
      ['xsd:dateTime', xsdDateTimeCodec],
      ['xsd:duration', xsdDurationCodec(options.duration)],
    ]);
  }

  /**
   * @throws SchemaError (UnknownValueType)
   */
  resolve(typeName: string, property: string, source: string): Codec<unknown> {
    const parsed = parseValueType(source);
    if (!parsed.success) {
      throw SchemaError.unknownValueType(typeName, property, parsed.error);
    }
    return this.build(parsed.expr, detail => SchemaError.unknownValueType(typeName, property, detail));
  }

  private build(expr: ValueTypeExpr, fail: (detail: string) => SchemaError): Codec<unknown> {
    const arity = GENERICS.get(expr.name);
    if (arity === undefined && expr.args.length > 0) {
      throw fail(`${expr.name} takes no type arguments`);
    }
    if (arity !== undefined && expr.args.length !== arity) {
      throw fail(`${expr.name} takes ${arity} type argument(s), got ${expr.args.length}`);
    }

    const args = expr.args.map(arg => this.build(arg, fail));
    const [first, second] = args;

    switch (expr.name) {
      case 'Or':
        if (first !== undefined && second !== undefined) return orCodec(first, second);
        break;
      case 'Remotable':
        if (first !== undefined) return remotableCodec(first);
        break;
      case 'Untypable':
        if (first !== undefined) return orCodec(first, jsonCodec);
        break;
      case 'Subtypes': {
        const [target] = expr.args;
        if (target === undefined || target.args.length > 0 || !this.lookup.hasType(target.name)) {
          throw fail(`Subtypes takes a schema type, got ${formatValueType(expr)}`);
        }
        return lazyCodec(`Subtypes<${target.name}>`, () => this.lookup.subtypesCodec(target.name));
      }
      default:
        break;
    }

    const scalar = this.scalars.get(expr.name);
    if (scalar !== undefined) {
      return scalar;
    }
    if (this.lookup.hasType(expr.name)) {
      return lazyCodec(expr.name, () => this.lookup.objectCodec(expr.name));
    }
    throw fail(`unknown type ${formatValueType(expr)}`);
  }
}
