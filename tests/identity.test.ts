import { describe, expect, it } from 'vitest';
import { IDENTITY_NAMESPACE, contentKey, deriveId, recordContentKey } from '../src/lib/identity.js';

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('deriveId', () => {
  it('is a name-based v5 identifier', () => {
    expect(deriveId('Hello, World!', '1b671a64-40d5-491e-99b0-da01ff1f3341')).toBe(
      '630eb68f-e0fa-5ecc-887a-7c7a62614681'
    );
    expect(deriveId('P1Wall')).toMatch(UUID_V5);
  });

  it('is deterministic and content-sensitive', () => {
    expect(deriveId('P1Wall')).toBe(deriveId('P1Wall'));
    expect(deriveId('P1Wall')).not.toBe(deriveId('P1Roof'));
    expect(deriveId('P1Wall')).toBe(deriveId('P1Wall', IDENTITY_NAMESPACE));
  });

  it('gives every key of a fixed corpus its own identifier', () => {
    const corpus = ['', 'P1', 'P1Wall', 'P1Wallsteel', 'P1Wallconcrete', 'W21Concrete', '21', 'Frame', 'frame'];
    const ids = corpus.map((key) => deriveId(key));
    expect(new Set(ids).size).toBe(corpus.length);
    expect(corpus.map((key) => deriveId(key))).toEqual(ids);
  });
});

describe('contentKey', () => {
  it('concatenates present parts only', () => {
    expect(contentKey('a', null, 'b', undefined, '', 3)).toBe('ab3');
    expect(contentKey()).toBe('');
  });

  it('serializes whole records', () => {
    expect(recordContentKey({ a: '1', b: null })).toBe('{"a":"1","b":null}');
  });
});
