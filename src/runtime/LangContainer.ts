/**
 * LangContainer: a property split into a language-neutral value and a map
 * from language code to value (`name` / `nameMap` in ActivityStreams).
 */

import { DecodeError } from '../core/errors.js';
import { entriesOf, isWireObject, keyPath, setEntry, type JsonObject } from '../core/json.js';
import type { Codec } from './Codec.js';

export type LanguageMap<V> = Readonly<Record<string, V>>;

export class LangContainer<V> {
  constructor(
    readonly defaultValue: V | undefined,
    readonly perLang: LanguageMap<V> = {},
  ) {}

  get languages(): string[] {
    return Object.keys(this.perLang);
  }

  /** Value for a language, falling back to the language-neutral value */
  get(language?: string): V | undefined {
    if (language !== undefined && Object.hasOwn(this.perLang, language)) {
      return this.perLang[language];
    }
    return this.defaultValue;
  }

  isEmpty(): boolean {
    return this.defaultValue === undefined && this.languages.length === 0;
  }

  /**
   * Combine with a later container: the later default replaces this one when
   * present, and language keys are unioned with later values winning.
   */
  merge(other: LangContainer<V>): LangContainer<V> {
    return new LangContainer(
      other.defaultValue ?? this.defaultValue,
      mergeLanguageMaps(this.perLang, other.perLang),
    );
  }

  /**
   * Like merge, but values present on both sides are combined with `combine`.
   */
  deepMerge(other: LangContainer<V>, combine: (current: V, next: V) => V): LangContainer<V> {
    const perLang: Record<string, V> = { ...this.perLang };
    for (const [language, value] of Object.entries(other.perLang)) {
      const current = Object.hasOwn(perLang, language) ? perLang[language] : undefined;
      setEntry(perLang, language, current === undefined ? value : combine(current, value));
    }
    const defaultValue = this.defaultValue === undefined || other.defaultValue === undefined
      ? other.defaultValue ?? this.defaultValue
      : combine(this.defaultValue, other.defaultValue);
    return new LangContainer(defaultValue, perLang);
  }
}

/**
 * Union of two language maps; the later map wins for a shared language.
 */
export function mergeLanguageMaps<V>(current: LanguageMap<V>, next: LanguageMap<V>): LanguageMap<V> {
  return { ...current, ...next };
}

/**
 * Codec for the language map half of a LangContainer property.
 */
export function languageMapCodec<V>(valueCodec: Codec<V>): Codec<LanguageMap<V>> {
  return {
    name: `LanguageMap<${valueCodec.name}>`,
    decode(input, path) {
      if (!isWireObject(input)) {
        throw DecodeError.typeMismatch('expected a language map object', path);
      }
      const map: Record<string, V> = {};
      for (const [language, value] of entriesOf(input)) {
        setEntry(map, language, valueCodec.decode(value, keyPath(path, language)));
      }
      return map;
    },
    encode(map) {
      const out: JsonObject = {};
      for (const [language, value] of Object.entries(map)) {
        setEntry(out, language, valueCodec.encode(value));
      }
      return out;
    },
    empty: () => ({}),
  };
}
