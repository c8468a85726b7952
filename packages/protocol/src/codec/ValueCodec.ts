/**
 * Text codec for GenericValue.
 *
 * `JSON.parse` cannot tell `2` from `2.0`, so decoding goes through a small
 * recursive-descent reader that looks at the literal itself. Each value is
 * interpreted in a fixed priority order: integer, double, boolean, string,
 * sequence, mapping, null. A malformed element fails the whole input.
 */
import { DecodeError, EncodingError } from '../errors';
import {
  boolean,
  double,
  integer,
  mapping,
  nullValue,
  sequence,
  string,
  type GenericValue,
} from './GenericValue';

export type DecodeResult =
  | { readonly ok: true; readonly value: GenericValue }
  | { readonly ok: false; readonly error: DecodeError };

export const MAX_DEPTH = 256;

const utf8 = new TextDecoder('utf-8', { fatal: true });

// ─── Decoding ─────────────────────────────────────────────────────────────────

export function decode(bytes: string | Uint8Array): DecodeResult {
  let text: string;
  if (typeof bytes === 'string') {
    text = bytes;
  } else {
    try {
      text = utf8.decode(bytes);
    } catch {
      return { ok: false, error: new DecodeError('Invalid UTF-8 sequence') };
    }
  }

  try {
    const reader = new Reader(text);
    reader.skipWhitespace();
    const value = reader.readValue(0);
    reader.skipWhitespace();
    if (!reader.atEnd()) {
      throw reader.fail('Unexpected trailing content');
    }
    return { ok: true, value };
  } catch (err) {
    if (err instanceof DecodeError) return { ok: false, error: err };
    throw err;
  }
}

const INTEGER_LITERAL = /^-?(?:0|[1-9]\d*)$/;
const NUMBER_LITERAL = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const NUMBER_CHARS = /[-+.eE0-9]/;

class Reader {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  fail(message: string): DecodeError {
    return new DecodeError(message, this.pos);
  }

  skipWhitespace(): void {
    while (!this.atEnd()) {
      const ch = this.text[this.pos];
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') break;
      this.pos++;
    }
  }

  readValue(depth: number): GenericValue {
    if (depth > MAX_DEPTH) throw this.fail(`Nesting deeper than ${MAX_DEPTH}`);
    if (this.atEnd()) throw this.fail('Unexpected end of input');

    const ch = this.text[this.pos];
    if (ch === '-' || (ch >= '0' && ch <= '9')) return this.readNumber();
    if (ch === 't' || ch === 'f') return this.readBoolean();
    if (ch === '"') return string(this.readString());
    if (ch === '[') return this.readSequence(depth);
    if (ch === '{') return this.readMapping(depth);
    if (ch === 'n') {
      this.expectWord('null');
      return nullValue();
    }
    throw this.fail(`Unexpected character ${JSON.stringify(ch)}`);
  }

  private readNumber(): GenericValue {
    const start = this.pos;
    while (!this.atEnd() && NUMBER_CHARS.test(this.text[this.pos])) this.pos++;
    const literal = this.text.slice(start, this.pos);

    if (INTEGER_LITERAL.test(literal)) {
      const value = Number(literal);
      // Outside the safe range an integer cannot be held exactly; read it as a double.
      if (Number.isSafeInteger(value)) return integer(value);
    }
    if (NUMBER_LITERAL.test(literal)) {
      const value = Number(literal);
      if (Number.isFinite(value)) return double(value);
    }
    this.pos = start;
    throw this.fail(`Invalid number literal ${JSON.stringify(literal)}`);
  }

  private readBoolean(): GenericValue {
    if (this.text.startsWith('true', this.pos)) {
      this.expectWord('true');
      return boolean(true);
    }
    this.expectWord('false');
    return boolean(false);
  }

  private expectWord(word: string): void {
    if (!this.text.startsWith(word, this.pos)) {
      throw this.fail(`Expected ${word}`);
    }
    this.pos += word.length;
  }

  private readString(): string {
    const start = this.pos;
    this.pos++; // opening quote
    let out = '';
    for (;;) {
      if (this.atEnd()) {
        this.pos = start;
        throw this.fail('Unterminated string');
      }
      const ch = this.text[this.pos];
      if (ch === '"') {
        this.pos++;
        return out;
      }
      if (ch === '\\') {
        out += this.readEscape();
        continue;
      }
      if (ch < ' ') throw this.fail('Unescaped control character in string');
      out += ch;
      this.pos++;
    }
  }

  private readEscape(): string {
    this.pos++; // backslash
    const ch = this.text[this.pos];
    this.pos++;
    switch (ch) {
      case '"':
        return '"';
      case '\\':
        return '\\';
      case '/':
        return '/';
      case 'b':
        return '\b';
      case 'f':
        return '\f';
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      case 'u': {
        const hex = this.text.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw this.fail('Invalid unicode escape');
        this.pos += 4;
        return String.fromCharCode(parseInt(hex, 16));
      }
      default:
        this.pos--;
        throw this.fail('Invalid escape sequence');
    }
  }

  private readSequence(depth: number): GenericValue {
    this.pos++; // [
    const items: GenericValue[] = [];
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return sequence(items);
    }
    for (;;) {
      this.skipWhitespace();
      items.push(this.readValue(depth + 1));
      this.skipWhitespace();
      const ch = this.text[this.pos];
      this.pos++;
      if (ch === ']') return sequence(items);
      if (ch !== ',') {
        this.pos--;
        throw this.fail('Expected "," or "]" in sequence');
      }
    }
  }

  private readMapping(depth: number): GenericValue {
    this.pos++; // {
    const entries = new Map<string, GenericValue>();
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return mapping(entries);
    }
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] !== '"') throw this.fail('Expected string key in mapping');
      const key = this.readString();
      this.skipWhitespace();
      if (this.text[this.pos] !== ':') throw this.fail('Expected ":" after mapping key');
      this.pos++;
      this.skipWhitespace();
      // Duplicate keys: the last occurrence wins.
      entries.delete(key);
      entries.set(key, this.readValue(depth + 1));
      this.skipWhitespace();
      const ch = this.text[this.pos];
      this.pos++;
      if (ch === '}') return mapping(entries);
      if (ch !== ',') {
        this.pos--;
        throw this.fail('Expected "," or "}" in mapping');
      }
    }
  }
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Serializes compactly. Doubles always carry a decimal point or an exponent,
 * so `decode(encode(v))` yields the same variant back.
 *
 * @throws EncodingError for a non-finite double.
 */
export function encode(value: GenericValue): string {
  return write(value, '$');
}

function write(value: GenericValue, path: string): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'double':
      return formatDouble(value.value, path);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return JSON.stringify(value.value);
    case 'null':
      return 'null';
    case 'sequence':
      return `[${value.items.map((item, i) => write(item, `${path}[${i}]`)).join(',')}]`;
    case 'mapping': {
      const parts: string[] = [];
      for (const [key, item] of value.entries) {
        parts.push(`${JSON.stringify(key)}:${write(item, `${path}.${key}`)}`);
      }
      return `{${parts.join(',')}}`;
    }
  }
}

function formatDouble(n: number, path: string): string {
  if (!Number.isFinite(n)) {
    throw new EncodingError(`Non-finite double ${String(n)}`, path);
  }
  if (Object.is(n, -0)) return '-0.0';
  const text = String(n);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}
