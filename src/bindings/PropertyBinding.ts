/**
 * PropertyBinding: how one effective property of a type is read from and
 * written to the fields of a wire object.
 *
 * A Simple property owns one wire key (plus aliases). A LangContainer
 * property owns two: the language-neutral value and the language map.
 * Each half follows the property's cardinality kind:
 *
 * | kind       | absent       | repeated key        | written            |
 * |------------|--------------|---------------------|--------------------|
 * | Required   | error        | DuplicateField      | always             |
 * | Functional | `undefined`  | DuplicateField      | when present       |
 * | Normal     | `[]`         | values concatenated | omitted / bare / array |
 */

import { DecodeError } from '../core/errors.js';
import { setEntry, type JsonObject, type WireValue } from '../core/json.js';
import type { Codec } from '../runtime/Codec.js';
import { LangContainer, languageMapCodec, mergeLanguageMaps, type LanguageMap } from '../runtime/LangContainer.js';
import { encodeOneOrMany, optionalCodec, sequenceCodec, type PropertyKind } from '../runtime/Property.js';
import type { PropertyShape } from '../schema/types.js';

/** Which half of a property a wire key feeds */
export type PropertyHalf = 'default' | 'container';

/**
 * Values collected for one property while scanning a wire object.
 */
export interface PropertyState {
  value?: { current: unknown };
  perLang?: { current: LanguageMap<unknown> };
}

export interface PropertyBindingOptions {
  name: string;
  shape: PropertyShape;
  kind: PropertyKind;
  tag: string;
  aliases: readonly string[];
  containerTag?: string;
  containerAliases?: readonly string[];
  uri: string;
  doc?: string;
  valueCodec: Codec<unknown>;
}

function toArray(value: unknown): readonly unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value === undefined ? [] : [value];
}

export class PropertyBinding {
  readonly name: string;
  readonly shape: PropertyShape;
  readonly kind: PropertyKind;
  /** Canonical wire key of the value (or language-neutral value) */
  readonly tag: string;
  readonly aliases: readonly string[];
  /** Canonical wire key of the language map, for LangContainer */
  readonly containerTag?: string;
  readonly containerAliases: readonly string[];
  readonly uri: string;
  readonly doc?: string;
  readonly valueCodec: Codec<unknown>;

  /** Codec of one wire occurrence of the default half, cardinality applied */
  private readonly wireCodec: Codec<unknown>;
  private readonly mapCodec: Codec<LanguageMap<unknown>>;

  constructor(options: PropertyBindingOptions) {
    this.name = options.name;
    this.shape = options.shape;
    this.kind = options.kind;
    this.tag = options.tag;
    this.aliases = [...options.aliases];
    this.containerTag = options.containerTag;
    this.containerAliases = [...(options.containerAliases ?? [])];
    this.uri = options.uri;
    this.doc = options.doc;
    this.valueCodec = options.valueCodec;
    this.wireCodec = this.kind === 'Normal'
      ? sequenceCodec(this.valueCodec)
      : this.kind === 'Functional' ? optionalCodec(this.valueCodec) : this.valueCodec;
    this.mapCodec = languageMapCodec(this.wireCodec);
  }

  /**
   * Every wire key this property accepts, with the half it feeds.
   * Canonical keys come before aliases.
   */
  wireKeys(): Array<readonly [string, PropertyHalf]> {
    const keys: Array<readonly [string, PropertyHalf]> = [this.tag, ...this.aliases].map(key => [key, 'default'] as const);
    if (this.containerTag !== undefined) {
      for (const key of [this.containerTag, ...this.containerAliases]) {
        keys.push([key, 'container']);
      }
    }
    return keys;
  }

  /**
   * Fold one wire occurrence into the collected state.
   *
   * @throws DecodeError (DuplicateField, or whatever the value codec raises)
   */
  accept(state: PropertyState, half: PropertyHalf, input: WireValue, path: string): void {
    if (half === 'default') {
      const decoded = this.wireCodec.decode(input, path);
      if (state.value === undefined) {
        state.value = { current: decoded };
      } else if (this.kind === 'Normal') {
        state.value = { current: [...toArray(state.value.current), ...toArray(decoded)] };
      } else {
        throw DecodeError.duplicateField(this.name, path);
      }
      return;
    }

    const decoded = this.mapCodec.decode(input, path);
    if (state.perLang === undefined) {
      state.perLang = { current: decoded };
    } else if (this.kind === 'Normal') {
      state.perLang = { current: mergeLanguageMaps(state.perLang.current, decoded) };
    } else {
      throw DecodeError.duplicateField(this.name, path);
    }
  }

  /**
   * Build the field value once the whole object has been scanned.
   *
   * @param path - Path of the object, for MissingRequiredField
   */
  finish(state: PropertyState, path: string): unknown {
    if (this.shape === 'LangContainer') {
      const perLang = state.perLang?.current ?? {};
      const defaultValue = state.value?.current;
      if (this.kind === 'Required' && defaultValue === undefined && Object.keys(perLang).length === 0) {
        throw DecodeError.missingRequiredField(this.name, path);
      }
      return new LangContainer(defaultValue, perLang);
    }

    switch (this.kind) {
      case 'Required':
        if (state.value === undefined) {
          throw DecodeError.missingRequiredField(this.name, path);
        }
        return state.value.current;
      case 'Functional':
        return state.value?.current;
      case 'Normal':
        return state.value?.current ?? [];
    }
  }

  /**
   * Write the field's wire keys into `out`.
   */
  encodeInto(value: unknown, out: JsonObject): void {
    if (this.shape === 'LangContainer') {
      if (!(value instanceof LangContainer)) {
        return;
      }
      const container: LangContainer<unknown> = value;
      this.encodeValue(container.defaultValue, out);
      this.encodeMap(container.perLang, out);
      return;
    }
    this.encodeValue(value, out);
  }

  private encodeValue(value: unknown, out: JsonObject): void {
    if (this.kind === 'Normal') {
      const encoded = encodeOneOrMany(this.valueCodec, toArray(value));
      if (encoded !== undefined) {
        out[this.tag] = encoded;
      }
      return;
    }
    if (value !== undefined) {
      out[this.tag] = this.valueCodec.encode(value);
    }
  }

  private encodeMap(perLang: LanguageMap<unknown>, out: JsonObject): void {
    if (this.containerTag === undefined) {
      return;
    }
    // An empty entry is written as null, which reads back as the same entry.
    const map: JsonObject = {};
    for (const [language, value] of Object.entries(perLang)) {
      const encoded = this.kind === 'Normal'
        ? encodeOneOrMany(this.valueCodec, toArray(value))
        : value === undefined ? undefined : this.valueCodec.encode(value);
      setEntry(map, language, encoded ?? null);
    }
    if (Object.keys(map).length > 0) {
      out[this.containerTag] = map;
    }
  }

  /**
   * Type-appropriate empty value, used when upcasting fills absent fields.
   */
  empty(): unknown {
    if (this.shape === 'LangContainer') {
      return new LangContainer(undefined);
    }
    switch (this.kind) {
      case 'Required':
        return this.valueCodec.empty();
      case 'Functional':
        return undefined;
      case 'Normal':
        return [];
    }
  }
}
