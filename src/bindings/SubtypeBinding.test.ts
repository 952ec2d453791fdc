/**
 * Tests for polymorphic dispatch on `type`.
 */

import { describe, it, expect } from 'vitest';
import { DecodeError } from '../core/errors.js';
import { parseWire } from '../core/wire.js';
import { LangContainer } from '../runtime/LangContainer.js';
import { Variant } from '../runtime/VocabObject.js';
import { sampleVocabulary, thrownBy } from './testing.js';

const vocab = sampleVocabulary();
const objects = vocab.subtypesOf('Object');
const things = vocab.subtypesOf('Thing');

describe('SubtypeBinding', () => {
  it('lists the base first, then subtypes', () => {
    expect(objects.name).toBe('Subtypes<Object>');
    expect(objects.memberNames()).toEqual(['Object', 'Note', 'Person']);
    expect(vocab.subtypes('Note')).toEqual(['Note']);
  });

  it('dispatches on the type name', () => {
    const decoded = objects.decode({ type: 'Note', content: 'hi' });
    expect(decoded.base).toBe('Object');
    expect(decoded.variant).toBe('Note');
    expect(decoded.value.get('content')).toEqual(new LangContainer('hi', {}));
  });

  it('dispatches on the type IRI', () => {
    expect(objects.decode({ type: 'https://ex.org/ns#Person' }).variant).toBe('Person');
  });

  it('takes the first recognized entry of a type array', () => {
    expect(objects.decode({ type: ['Unknown', 'Person', 'Note'] }).variant).toBe('Person');
  });

  it('uses the last of repeated type keys', () => {
    expect(objects.decode(parseWire('{"type": "Person", "type": "Note"}')).variant).toBe('Note');
  });

  it('falls back to the base type for unknown or missing types', () => {
    const unknown = objects.decode({ type: 'Unknown', tag: 'x' });
    expect(unknown.variant).toBe('Object');
    expect(unknown.value.get('type')).toEqual(['Unknown']);
    expect(unknown.value.get('tag')).toEqual(['x']);

    expect(objects.decode({}).variant).toBe('Object');
  });

  it('propagates the error of a matched member', () => {
    const err = thrownBy(() => objects.decode({ type: 'Note', published: 5 }));
    expect(err).toBeInstanceOf(DecodeError);
    if (err instanceof DecodeError) {
      expect(err.code).toBe('TypeMismatch');
      expect(err.path).toBe('$.published');
    }
  });

  it('reports an unknown discriminant when the base type cannot read the object either', () => {
    const err = thrownBy(() => things.decode({ type: 'Nope' }));
    expect(err).toBeInstanceOf(DecodeError);
    if (err instanceof DecodeError) {
      expect(err.code).toBe('UnknownDiscriminant');
      expect(err.tag).toBe('Nope');
      expect(err.expected).toEqual(['Thing']);
      expect(err.message).toBe('type `Nope` matched none of: Thing at $');
    }

    const untyped = thrownBy(() => things.decode({}));
    expect(untyped).toBeInstanceOf(DecodeError);
    if (untyped instanceof DecodeError) {
      expect(untyped.message).toBe('no type matched none of: Thing at $');
    }
  });

  it('lets a declared type property write the type key', () => {
    const decoded = objects.decode({ type: 'Note', content: 'hi' });
    expect(objects.encode(decoded)).toEqual({ type: 'Note', content: 'hi' });

    const untyped = objects.decode({ tag: 'x' });
    expect(objects.encode(untyped)).toEqual({ tag: 'x' });
  });

  it('writes the case name when the type declares no type property', () => {
    const decoded = things.decode({ id: 'https://ex.org/t/1', title: 'T' });
    expect(things.encode(decoded)).toEqual({ type: 'Thing', id: 'https://ex.org/t/1', title: 'T' });
    expect(things.decode(things.encode(decoded))).toEqual(decoded);
  });

  it('round-trips nested polymorphic values', () => {
    const wire = {
      type: 'Note',
      id: 'https://ex.org/notes/1',
      attributedTo: [
        { type: 'Person', id: 'https://ex.org/people/1', preferredUsername: 'sam' },
        'https://ex.org/people/2',
      ],
    };
    const decoded = objects.decode(wire);
    expect(objects.encode(decoded)).toEqual(wire);
    expect(decoded.objectId()).toBe('https://ex.org/notes/1');
  });

  it('has the base type as its empty value', () => {
    expect(objects.empty()).toEqual(new Variant('Object', 'Object', vocab.get('Object').empty()));
  });
});
