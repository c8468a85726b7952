/**
 * Tests for GenericValue construction, native conversion and equality.
 */

import {
  double,
  fromNative,
  integer,
  isMappingValue,
  mapping,
  sequence,
  string,
  toNative,
  toNativeObject,
  valuesEqual,
} from '../../codec/GenericValue';
import { EncodingError } from '../../errors';

describe('fromNative()', () => {
  it('maps integral numbers to integer and the rest to double', () => {
    expect(fromNative(1)).toEqual({ kind: 'integer', value: 1 });
    expect(fromNative(2.0)).toEqual({ kind: 'integer', value: 2 });
    expect(fromNative(1.5)).toEqual({ kind: 'double', value: 1.5 });
    expect(fromNative(2 ** 60)).toEqual({ kind: 'double', value: 2 ** 60 });
  });

  it('converts nested objects, arrays and string-keyed maps', () => {
    const value = fromNative({ list: [true, 'x'], nested: new Map([['k', null]]) });
    expect(value).toEqual(
      mapping({
        list: sequence([{ kind: 'boolean', value: true }, string('x')]),
        nested: mapping({ k: { kind: 'null' } }),
      })
    );
  });

  it.each([
    ['undefined', { a: undefined }, 'Unsupported value of type undefined at $.a'],
    ['a function', [1, () => 1], 'Unsupported value of type function at $[1]'],
    ['a bigint', 10n, 'Unsupported value of type bigint at $'],
    ['NaN', Number.NaN, 'Non-finite number NaN at $'],
    ['a Date', new Date(0), 'Unsupported value of type Date at $'],
    ['a non-string map key', new Map([[1, 'x']]), 'Mapping keys must be strings at $'],
  ])('rejects %s', (_label, input, message) => {
    expect(() => fromNative(input)).toThrow(EncodingError);
    expect(() => fromNative(input)).toThrow(message);
  });

  it('turns -0 into integer zero', () => {
    const value = fromNative(-0);
    expect(valuesEqual(value, integer(0))).toBe(true);
    expect(Object.is(value.kind === 'integer' && value.value, 0)).toBe(true);
  });

  it('accepts objects without a prototype', () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare['a'] = 1;
    expect(fromNative(bare)).toEqual(mapping({ a: integer(1) }));
  });
});

describe('toNative()', () => {
  it('reverses fromNative for plain data', () => {
    const data = { id: 3, ratio: 0.25, tags: ['a', 'b'], meta: { ok: true, note: null } };
    expect(toNative(fromNative(data))).toEqual(data);
  });

  it('keeps a "__proto__" key as an own property', () => {
    const result = toNativeObject(mapping([['__proto__', integer(1)]]));
    expect(Object.keys(result)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
  });
});

describe('valuesEqual()', () => {
  it('distinguishes integer from double', () => {
    expect(valuesEqual(integer(1), double(1))).toBe(false);
  });

  it('ignores mapping key order', () => {
    const a = mapping({ x: integer(1), y: string('z') });
    const b = mapping({ y: string('z'), x: integer(1) });
    expect(valuesEqual(a, b)).toBe(true);
  });

  it('compares sequences element by element', () => {
    expect(valuesEqual(sequence([integer(1)]), sequence([integer(1), integer(2)]))).toBe(false);
  });
});

describe('constructors', () => {
  it('rejects integers outside the safe range', () => {
    expect(() => integer(2 ** 53)).toThrow(EncodingError);
  });

  it('freezes what they build', () => {
    const seq = sequence([integer(1)]);
    expect(Object.isFrozen(seq)).toBe(true);
    expect(Object.isFrozen(seq.items)).toBe(true);
  });

  it('rejects mutation of mapping entries', () => {
    const { entries } = mapping({ a: integer(1) });
    const mutate = (action: (map: Map<string, unknown>) => void) => () => {
      if (entries instanceof Map) action(entries);
    };

    expect(mutate((map) => map.set('b', 2))).toThrow('Mapping values are immutable');
    expect(mutate((map) => map.delete('a'))).toThrow(TypeError);
    expect(mutate((map) => map.clear())).toThrow(TypeError);
    expect(entries.get('a')).toEqual(integer(1));
    expect(entries.size).toBe(1);
  });

  it('recognizes mapping values but not look-alike objects', () => {
    expect(isMappingValue(mapping({}))).toBe(true);
    expect(isMappingValue({ kind: 'mapping', entries: {} })).toBe(false);
  });
});
