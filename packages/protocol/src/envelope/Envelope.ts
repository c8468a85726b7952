/**
 * Message envelope: a closed `type` tag around a schema-free payload.
 *
 * Wire shape:
 *   {"type": "<tag>", "payload": {...} | null, "timestamp": "<ISO-8601>", "sessionId": "<id>" | null}
 *
 * The correlation id travels as `sessionId` on the wire.
 */
import { z } from 'zod';
import { DecodeError, EncodingError } from '../errors';
import { decode, encode } from '../codec/ValueCodec';
import {
  fromNative,
  isMappingValue,
  mapping,
  nullValue,
  string,
  toNative,
  type GenericValue,
  type MappingValue,
  type NativeObject,
} from '../codec/GenericValue';
import { HEADER_KEYS, isMessageType, type MessageType } from '../types/protocol';

export interface MessageEnvelope {
  readonly type: MessageType;
  readonly payload: MappingValue | null;
  readonly timestamp: Date;
  readonly correlationId: string | null;
}

/** A well-formed frame whose `type` is outside the known vocabulary. */
export interface UnrecognizedFrame {
  readonly rawType: string;
  readonly payload: MappingValue | null;
  readonly timestamp: Date;
  readonly correlationId: string | null;
}

export type InboundFrame =
  | { readonly kind: 'envelope'; readonly envelope: MessageEnvelope }
  | { readonly kind: 'unrecognized'; readonly frame: UnrecognizedFrame }
  | { readonly kind: 'malformed'; readonly error: DecodeError };

export interface EnvelopeOptions {
  correlationId?: string | null;
  timestamp?: Date;
}

/**
 * Builds an immutable envelope. A native payload is converted eagerly, so an
 * unsupported value fails here rather than when the frame is written.
 *
 * @throws EncodingError
 */
export function createEnvelope(
  type: MessageType,
  payload?: NativeObject | MappingValue | null,
  options: EnvelopeOptions = {}
): MessageEnvelope {
  const timestamp = options.timestamp ?? new Date();
  if (Number.isNaN(timestamp.getTime())) {
    throw new EncodingError('Invalid timestamp', '$.timestamp');
  }
  return Object.freeze({
    type,
    payload: toPayload(payload),
    timestamp,
    correlationId: options.correlationId ?? null,
  });
}

function toPayload(payload: NativeObject | MappingValue | null | undefined): MappingValue | null {
  if (payload === null || payload === undefined) return null;
  if (isMappingValue(payload)) return payload;
  const value = fromNative(payload, '$.payload');
  if (value.kind !== 'mapping') {
    throw new EncodingError('Payload must be a mapping', '$.payload');
  }
  return value;
}

/** @throws EncodingError when the payload holds a non-finite double. */
export function encodeEnvelope(envelope: MessageEnvelope): string {
  const fields: [string, GenericValue][] = [
    ['type', string(envelope.type)],
    ['payload', envelope.payload ?? nullValue()],
    ['timestamp', string(envelope.timestamp.toISOString())],
    ['sessionId', envelope.correlationId === null ? nullValue() : string(envelope.correlationId)],
  ];
  return encode(mapping(fields));
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

// Timestamps are ISO-8601 strings; numeric epoch milliseconds are accepted too.
const HeaderSchema = z.object({
  type: z.string().min(1),
  timestamp: z.union([z.string().datetime({ offset: true }), z.number().finite()]).optional(),
  sessionId: z.string().nullable().optional(),
});

const headerKeys = new Set<string>(HEADER_KEYS);

/** Never throws: malformed input comes back as `{ kind: 'malformed' }`. */
export function decodeEnvelope(bytes: string | Uint8Array): InboundFrame {
  const decoded = decode(bytes);
  if (!decoded.ok) return { kind: 'malformed', error: decoded.error };

  const root = decoded.value;
  if (root.kind !== 'mapping') {
    return { kind: 'malformed', error: new DecodeError(`Frame is a ${root.kind}, expected a mapping`) };
  }

  const header = HeaderSchema.safeParse({
    type: nativeField(root, 'type'),
    timestamp: nativeField(root, 'timestamp'),
    sessionId: nativeField(root, 'sessionId'),
  });
  if (!header.success) {
    const detail = header.error.issues
      .map((issue) => `${issue.path.join('.') || 'frame'}: ${issue.message}`)
      .join('; ');
    return { kind: 'malformed', error: new DecodeError(`Invalid envelope header (${detail})`) };
  }

  const payload = readPayload(root);
  if (payload instanceof DecodeError) return { kind: 'malformed', error: payload };

  const { type, timestamp, sessionId } = header.data;
  const date = timestamp === undefined ? new Date() : new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    return { kind: 'malformed', error: new DecodeError(`Envelope timestamp out of range: ${timestamp}`) };
  }
  const fields = { payload, timestamp: date, correlationId: sessionId ?? null };

  if (isMessageType(type)) {
    return { kind: 'envelope', envelope: Object.freeze({ type, ...fields }) };
  }
  return { kind: 'unrecognized', frame: Object.freeze({ rawType: type, ...fields }) };
}

function nativeField(root: MappingValue, key: string): unknown {
  const value = root.entries.get(key);
  return value === undefined ? undefined : toNative(value);
}

function readPayload(root: MappingValue): MappingValue | null | DecodeError {
  const payload = root.entries.get('payload');
  if (payload === undefined) {
    // Flat frame: everything outside the header is the payload.
    const rest = Array.from(root.entries).filter(([key]) => !headerKeys.has(key));
    return rest.length > 0 ? mapping(rest) : null;
  }
  if (payload.kind === 'null') return null;
  if (payload.kind === 'mapping') return payload;
  return new DecodeError(`Envelope payload is a ${payload.kind}, expected a mapping or null`);
}
