/**
 * Error taxonomy for schema compilation and document decoding.
 *
 * SchemaError is raised while compiling a vocabulary and aborts binding
 * generation. DecodeError is terminal for one decode call; no partial
 * value is ever returned alongside it.
 */

export type SchemaErrorCode =
  | 'UnknownSupertype'
  | 'KindMismatch'
  | 'CyclicInheritance'
  | 'UnknownValueType'
  | 'InvalidDocument'
  | 'DuplicateType'
  | 'NotASubtype';

export class SchemaError extends Error {
  constructor(
    public readonly code: SchemaErrorCode,
    message: string,
    /** Type the problem was found in, when there is one */
    public readonly typeName?: string,
  ) {
    super(message);
    this.name = 'SchemaError';
  }

  static unknownSupertype(typeName: string, supertype: string): SchemaError {
    return new SchemaError(
      'UnknownSupertype',
      `Type ${typeName} extends unknown type ${supertype}`,
      typeName,
    );
  }

  static kindMismatch(typeName: string, property: string): SchemaError {
    return new SchemaError(
      'KindMismatch',
      `Preferred name for ${typeName}.${property} does not match the property's shape`,
      typeName,
    );
  }

  static cyclicInheritance(cycle: string[]): SchemaError {
    return new SchemaError(
      'CyclicInheritance',
      `Inheritance cycle: ${cycle.join(' -> ')}`,
      cycle[0],
    );
  }

  static invalidDocument(location: string, issuePath: ReadonlyArray<string | number>, detail: string): SchemaError {
    const at = issuePath.length > 0 ? ` at ${issuePath.join('.')}` : '';
    const [first] = issuePath;
    return new SchemaError(
      'InvalidDocument',
      `Invalid schema document ${location}${at}: ${detail}`,
      typeof first === 'string' ? first : undefined,
    );
  }

  static duplicateType(typeName: string, first: string, second: string): SchemaError {
    return new SchemaError(
      'DuplicateType',
      `Type ${typeName} is defined in both ${first} and ${second}`,
      typeName,
    );
  }

  static notASubtype(typeName: string, base: string): SchemaError {
    return new SchemaError('NotASubtype', `Type ${typeName} is not a subtype of ${base}`, typeName);
  }

  static unknownValueType(typeName: string, property: string, detail: string): SchemaError {
    return new SchemaError(
      'UnknownValueType',
      `Cannot resolve value type of ${typeName}.${property}: ${detail}`,
      typeName,
    );
  }
}

export type DecodeErrorCode =
  | 'MissingRequiredField'
  | 'DuplicateField'
  | 'TypeMismatch'
  | 'UnknownDiscriminant'
  | 'MalformedScalar';

export class DecodeError extends Error {
  /** Field name, for MissingRequiredField and DuplicateField */
  public readonly field?: string;
  /** Underlying failure messages, for TypeMismatch */
  public readonly causes: readonly string[];
  /** Discriminant value, for UnknownDiscriminant */
  public readonly tag?: string;
  /** Accepted discriminant values, for UnknownDiscriminant */
  public readonly expected: readonly string[];

  constructor(
    public readonly code: DecodeErrorCode,
    public readonly detail: string,
    public readonly path: string,
    extra: {
      field?: string;
      causes?: readonly string[];
      tag?: string;
      expected?: readonly string[];
    } = {},
  ) {
    super(`${detail} at ${path}`);
    this.name = 'DecodeError';
    this.field = extra.field;
    this.causes = extra.causes ?? [];
    this.tag = extra.tag;
    this.expected = extra.expected ?? [];
  }

  static missingRequiredField(field: string, path: string): DecodeError {
    return new DecodeError('MissingRequiredField', `missing field \`${field}\``, path, { field });
  }

  static duplicateField(field: string, path: string): DecodeError {
    return new DecodeError('DuplicateField', `duplicate field \`${field}\``, path, { field });
  }

  static typeMismatch(detail: string, path: string, causes: readonly string[] = []): DecodeError {
    return new DecodeError('TypeMismatch', detail, path, { causes });
  }

  static unknownDiscriminant(tag: string | undefined, expected: readonly string[], path: string): DecodeError {
    const shown = tag === undefined ? 'no type' : `type \`${tag}\``;
    return new DecodeError(
      'UnknownDiscriminant',
      `${shown} matched none of: ${expected.join(', ')}`,
      path,
      { tag, expected },
    );
  }

  static malformedScalar(detail: string, path: string): DecodeError {
    return new DecodeError('MalformedScalar', detail, path);
  }
}

/**
 * Outcome of a non-throwing decode.
 */
export type DecodeResult<T> =
  | { success: true; value: T }
  | { success: false; error: DecodeError };

/**
 * Run a throwing decode and capture a DecodeError as a failed result.
 * Any other exception is a bug and propagates.
 */
export function captureDecode<T>(run: () => T): DecodeResult<T> {
  try {
    return { success: true, value: run() };
  } catch (err) {
    if (err instanceof DecodeError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
