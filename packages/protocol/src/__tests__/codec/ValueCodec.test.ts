/**
 * Tests for the GenericValue text codec: decode priority, error reporting,
 * canonical encoding and nested round trips.
 */

import { decode, encode, type DecodeResult } from '../../codec/ValueCodec';
import {
  boolean,
  double,
  fromNative,
  integer,
  mapping,
  nullValue,
  sequence,
  string,
  valuesEqual,
  type GenericValue,
} from '../../codec/GenericValue';
import { DecodeError, EncodingError } from '../../errors';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function decodeOk(text: string | Uint8Array): GenericValue {
  const result = decode(text);
  if (!result.ok) throw result.error;
  return result.value;
}

function decodeErr(text: string | Uint8Array): DecodeError {
  const result: DecodeResult = decode(text);
  if (result.ok) throw new Error(`Expected malformed input, decoded ${result.value.kind}`);
  return result.error;
}

/** Follows `key` into a mapping and then `index` into a sequence. */
function step(value: GenericValue, key: string): GenericValue {
  if (value.kind !== 'mapping') throw new Error(`Expected mapping, got ${value.kind}`);
  const next = value.entries.get(key);
  if (next === undefined) throw new Error(`Missing key ${key}`);
  return next;
}

function first(value: GenericValue): GenericValue {
  if (value.kind !== 'sequence') throw new Error(`Expected sequence, got ${value.kind}`);
  expect(value.items).toHaveLength(1);
  return value.items[0];
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

describe('decode()', () => {
  it('reads an integral literal as an integer, never a double', () => {
    expect(decodeOk('1')).toEqual({ kind: 'integer', value: 1 });
    expect(decodeOk('-42')).toEqual({ kind: 'integer', value: -42 });
  });

  it('reads fractional and exponent literals as doubles', () => {
    expect(decodeOk('1.0')).toEqual({ kind: 'double', value: 1 });
    expect(decodeOk('-0.5')).toEqual({ kind: 'double', value: -0.5 });
    expect(decodeOk('1e3')).toEqual({ kind: 'double', value: 1000 });
  });

  it('falls back to a double for integers beyond the safe range', () => {
    expect(decodeOk('9007199254740993')).toEqual({ kind: 'double', value: 9007199254740992 });
  });

  it('reads booleans, null and strings', () => {
    expect(decodeOk('true')).toEqual({ kind: 'boolean', value: true });
    expect(decodeOk(' false ')).toEqual({ kind: 'boolean', value: false });
    expect(decodeOk('null')).toEqual({ kind: 'null' });
    expect(decodeOk('"a\\nb\\"c"')).toEqual({ kind: 'string', value: 'a\nb"c' });
  });

  it('decodes unicode escapes including surrogate pairs', () => {
    expect(decodeOk('"\\u00e9\\ud83d\\ude00"')).toEqual({ kind: 'string', value: 'é😀' });
  });

  it('decodes sequences element by element', () => {
    expect(decodeOk('[1, 2.5, "x", null, []]')).toEqual(
      sequence([integer(1), double(2.5), string('x'), nullValue(), sequence([])])
    );
  });

  it('keeps mapping keys in wire order', () => {
    const value = decodeOk('{"b": 1, "a": {"c": true}}');
    expect(value.kind).toBe('mapping');
    if (value.kind !== 'mapping') return;
    expect(Array.from(value.entries.keys())).toEqual(['b', 'a']);
    expect(value.entries.get('a')).toEqual(mapping({ c: boolean(true) }));
  });

  it('lets the last duplicate key win', () => {
    const value = decodeOk('{"a": 1, "a": 2}');
    expect(value).toEqual(mapping([['a', integer(2)]]));
  });

  it('accepts UTF-8 bytes', () => {
    expect(decodeOk(Buffer.from('"héllo"', 'utf8'))).toEqual(string('héllo'));
  });

  describe('malformed input', () => {
    it.each([
      ['truncated mapping', '{"a":'],
      ['trailing comma', '[1,]'],
      ['leading zero', '01'],
      ['trailing content', '1 2'],
      ['bare word', 'nul'],
      ['unquoted key', '{a: 1}'],
      ['unterminated string', '"abc'],
      ['empty input', ''],
    ])('rejects %s', (_label, text) => {
      const error = decodeErr(text);
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.reason).toBe('malformed');
    });

    it('rejects invalid UTF-8', () => {
      expect(decodeErr(new Uint8Array([0x22, 0xff, 0x22])).message).toBe('Invalid UTF-8 sequence');
    });

    it('reports the offset of the problem', () => {
      expect(decodeErr('[1, x]').offset).toBe(4);
    });

    it('rejects nesting beyond the depth limit', () => {
      const deep = '['.repeat(300) + ']'.repeat(300);
      expect(decodeErr(deep).message).toContain('Nesting deeper than 256');
    });
  });
});

// ─── Encoding ─────────────────────────────────────────────────────────────────

describe('encode()', () => {
  it('writes integers without a decimal point and doubles with one', () => {
    expect(encode(integer(3))).toBe('3');
    expect(encode(double(2))).toBe('2.0');
    expect(encode(double(0.5))).toBe('0.5');
    expect(encode(double(1e21))).toBe('1e+21');
  });

  it('escapes strings and writes containers compactly', () => {
    const value = mapping({
      text: string('say "hi"\n'),
      list: sequence([boolean(true), nullValue()]),
    });
    expect(encode(value)).toBe('{"text":"say \\"hi\\"\\n","list":[true,null]}');
  });

  it('rejects a non-finite double with its path', () => {
    expect(() => encode(double(Number.NaN))).toThrow(EncodingError);
    expect(() => encode(mapping({ x: double(Number.POSITIVE_INFINITY) }))).toThrow(
      'Non-finite double Infinity at $.x'
    );
  });
});

// ─── Round trips ──────────────────────────────────────────────────────────────

describe('decode(encode(v))', () => {
  it('returns the same variant for every shape', () => {
    const value = mapping({
      int: integer(7),
      whole: double(7),
      frac: double(-3.25),
      flag: boolean(false),
      text: string('tab\there'),
      none: nullValue(),
      list: sequence([integer(1), double(1), string('1')]),
      empty: mapping({}),
    });
    const decoded = decodeOk(encode(value));
    expect(valuesEqual(decoded, value)).toBe(true);
    expect(decoded).toEqual(value);
  });

  it('preserves a five-level mapping-of-sequences-of-mappings at every level', () => {
    const value = fromNative({
      level1: [{ level2: [{ level3: [{ level4: [{ level5: { leaf: 1.5, n: 3, s: 'deep', b: false, z: null } }] }] }] }],
    });

    const decoded = decodeOk(encode(value));

    const l2 = first(step(decoded, 'level1'));
    const l3 = first(step(l2, 'level2'));
    const l4 = first(step(l3, 'level3'));
    const l5 = first(step(l4, 'level4'));
    const leaf = step(l5, 'level5');

    expect(step(leaf, 'leaf')).toEqual({ kind: 'double', value: 1.5 });
    expect(step(leaf, 'n')).toEqual({ kind: 'integer', value: 3 });
    expect(step(leaf, 's')).toEqual({ kind: 'string', value: 'deep' });
    expect(step(leaf, 'b')).toEqual({ kind: 'boolean', value: false });
    expect(step(leaf, 'z')).toEqual({ kind: 'null' });

    expect(l2).toEqual(first(step(value, 'level1')));
    expect(valuesEqual(decoded, value)).toBe(true);
  });

  it('reads integer negative zero back as zero', () => {
    const decoded = decodeOk('-0');
    expect(decoded).toEqual({ kind: 'integer', value: 0 });
    expect(encode(decoded)).toBe('0');
    expect(valuesEqual(decodeOk(encode(decoded)), decoded)).toBe(true);
  });

  it('keeps negative zero as a double', () => {
    const decoded = decodeOk(encode(double(-0)));
    expect(decoded.kind).toBe('double');
    expect(valuesEqual(decoded, double(-0))).toBe(true);
  });
});
