import type { MessageEnvelope, UnrecognizedFrame } from '@tether/protocol';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export type ErrorContext =
  /** An inbound text frame failed to decode and was dropped. */
  | { type: 'decode'; frame: string }
  /** The socket reported an error or a write failed. */
  | { type: 'transport' }
  /** The outbound queue evicted its oldest entry. */
  | { type: 'overflow'; dropped: MessageEnvelope };

/**
 * Receives everything a Connection reports, in the order it happened. Calls
 * are synchronous; an observer that throws is logged and skipped.
 */
export interface ConnectionObserver {
  onStateChanged(state: ConnectionState): void;
  onMessage(envelope: MessageEnvelope): void;
  /** Binary frames, passed through without decoding. */
  onRawData(data: Uint8Array): void;
  onUnrecognized?(frame: UnrecognizedFrame): void;
  onError?(error: Error, context: ErrorContext): void;
  onReconnectScheduled?(attempt: number, delayMs: number): void;
}
