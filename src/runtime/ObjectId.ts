/**
 * Object identity for values that may carry or reference an identifier.
 */

/** Property holding an object's identifier (`@id` in JSON-LD terms) */
export const ID_PROPERTY = 'id';

export abstract class Identified {
  /**
   * The identifier of the object this value is or refers to, if known.
   */
  abstract objectId(): string | undefined;
}

/**
 * Identifier of an arbitrary decoded value: strings are taken as
 * identifiers, composite values answer for themselves.
 */
export function objectIdOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Identified) {
    return value.objectId();
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const id = objectIdOf(item);
      if (id !== undefined) {
        return id;
      }
    }
  }
  return undefined;
}
