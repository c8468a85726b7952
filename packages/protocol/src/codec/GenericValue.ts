/**
 * Schema-free, JSON-shaped value carried as envelope payload.
 *
 * Numbers are split into `integer` and `double` so that a value read off the
 * wire keeps the representation it arrived with. Values are immutable; the
 * constructors below freeze what they build.
 */
import { EncodingError } from '../errors';

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface DoubleValue {
  readonly kind: 'double';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface NullValue {
  readonly kind: 'null';
}

export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: readonly GenericValue[];
}

export interface MappingValue {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, GenericValue>;
}

export type GenericValue =
  | IntegerValue
  | DoubleValue
  | BooleanValue
  | StringValue
  | NullValue
  | SequenceValue
  | MappingValue;

export type GenericValueKind = GenericValue['kind'];

/** Plain JavaScript counterpart of a GenericValue. */
export type NativeValue = number | boolean | string | null | NativeValue[] | NativeObject;

export interface NativeObject {
  [key: string]: NativeValue;
}

// ─── Constructors ─────────────────────────────────────────────────────────────

const NULL: NullValue = Object.freeze({ kind: 'null' });

export function integer(value: number): IntegerValue {
  if (!Number.isSafeInteger(value)) {
    throw new EncodingError(`Integer out of range: ${value}`, '$');
  }
  // -0 has no integer spelling on the wire.
  return Object.freeze({ kind: 'integer', value: value === 0 ? 0 : value });
}

export function double(value: number): DoubleValue {
  return Object.freeze({ kind: 'double', value });
}

export function boolean(value: boolean): BooleanValue {
  return Object.freeze({ kind: 'boolean', value });
}

export function string(value: string): StringValue {
  return Object.freeze({ kind: 'string', value });
}

export function nullValue(): NullValue {
  return NULL;
}

export function sequence(items: readonly GenericValue[]): SequenceValue {
  return Object.freeze({ kind: 'sequence', items: Object.freeze([...items]) });
}

export function mapping(
  entries: Iterable<readonly [string, GenericValue]> | Record<string, GenericValue>
): MappingValue {
  const map = new FrozenMap<string, GenericValue>(
    isIterable(entries) ? entries : Object.entries(entries)
  );
  return Object.freeze({ kind: 'mapping', entries: map });
}

/** A Map filled once at construction; its mutators throw. */
class FrozenMap<K, V> extends Map<K, V> {
  constructor(entries: Iterable<readonly [K, V]>) {
    super();
    for (const [key, value] of entries) super.set(key, value);
    Object.freeze(this);
  }

  set(_key: K, _value: V): this {
    throw new TypeError('Mapping values are immutable');
  }

  delete(_key: K): boolean {
    throw new TypeError('Mapping values are immutable');
  }

  clear(): void {
    throw new TypeError('Mapping values are immutable');
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

export function isMappingValue(value: unknown): value is MappingValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'mapping' &&
    'entries' in value &&
    value.entries instanceof Map
  );
}

// ─── Native conversion ────────────────────────────────────────────────────────

/**
 * Converts a plain JavaScript value. Integral numbers within the safe range
 * become `integer`, every other finite number becomes `double`, so `2.0`
 * written in source is an integer here.
 *
 * @throws EncodingError for anything outside the JSON-shaped variant set.
 */
export function fromNative(input: unknown, path = '$'): GenericValue {
  if (input === null) return NULL;

  switch (typeof input) {
    case 'number':
      if (!Number.isFinite(input)) {
        throw new EncodingError(`Non-finite number ${String(input)}`, path);
      }
      return Number.isSafeInteger(input) ? integer(input) : double(input);
    case 'boolean':
      return boolean(input);
    case 'string':
      return string(input);
    case 'object':
      break;
    default:
      throw new EncodingError(`Unsupported value of type ${typeof input}`, path);
  }

  if (Array.isArray(input)) {
    const items: GenericValue[] = [];
    for (let i = 0; i < input.length; i++) {
      items.push(fromNative(input[i], `${path}[${i}]`));
    }
    return sequence(items);
  }

  if (input instanceof Map) {
    const entries: [string, GenericValue][] = [];
    for (const [key, value] of input) {
      if (typeof key !== 'string') {
        throw new EncodingError('Mapping keys must be strings', path);
      }
      entries.push([key, fromNative(value, `${path}.${key}`)]);
    }
    return mapping(entries);
  }

  const proto: unknown = Object.getPrototypeOf(input);
  if (proto !== Object.prototype && proto !== null) {
    const name = input.constructor?.name ?? 'object';
    throw new EncodingError(`Unsupported value of type ${name}`, path);
  }

  const entries: [string, GenericValue][] = [];
  for (const [key, value] of Object.entries(input)) {
    entries.push([key, fromNative(value, `${path}.${key}`)]);
  }
  return mapping(entries);
}

/** Converts back to plain JavaScript; `integer` and `double` both become `number`. */
export function toNative(value: GenericValue): NativeValue {
  switch (value.kind) {
    case 'integer':
    case 'double':
    case 'boolean':
    case 'string':
      return value.value;
    case 'null':
      return null;
    case 'sequence':
      return value.items.map(toNative);
    case 'mapping':
      // fromEntries defines own properties, so a "__proto__" key stays data.
      return Object.fromEntries(
        Array.from(value.entries, ([key, item]) => [key, toNative(item)] as const)
      );
  }
}

export function toNativeObject(value: MappingValue): NativeObject {
  return Object.fromEntries(
    Array.from(value.entries, ([key, item]) => [key, toNative(item)] as const)
  );
}

// ─── Equality ─────────────────────────────────────────────────────────────────

/** Structural equality; the variant must match, mapping key order is ignored. */
export function valuesEqual(a: GenericValue, b: GenericValue): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'integer':
    case 'double':
    case 'boolean':
    case 'string':
      return b.kind === a.kind && 'value' in b && Object.is(b.value, a.value);
    case 'sequence':
      return (
        b.kind === 'sequence' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case 'mapping': {
      if (b.kind !== 'mapping' || a.entries.size !== b.entries.size) return false;
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
  }
}
