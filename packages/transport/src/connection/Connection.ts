import { decodeEnvelope, encodeEnvelope, type MessageEnvelope } from '@tether/protocol';
import {
  ConnectionOptionsSchema,
  parseOptions,
  type ConnectionSettings,
  type ConnectionSettingsInput,
} from '../config/options';
import { ConfigError, StateError, TransportError } from '../errors';
import { KeepaliveMonitor } from '../keepalive/KeepaliveMonitor';
import { createLogger, type Logger } from '../logger';
import { OutboundQueue } from '../queue/OutboundQueue';
import { ExponentialBackoffPolicy, type ReconnectionPolicy } from '../reconnect/ReconnectionPolicy';
import { authorize, redactUrl } from '../transport/auth';
import { wsSocketFactory, type SocketFactory, type TransportSocket } from '../transport/socket';
import type { ConnectionObserver, ConnectionState, ErrorContext } from './types';

export interface ConnectionOptions extends ConnectionSettingsInput {
  policy?: ReconnectionPolicy;
  socketFactory?: SocketFactory;
  logger?: Logger;
}

const NORMAL_CLOSURE = 1000;

/**
 * One persistent WebSocket to a peer. Reconnects with back-off after any
 * transport loss until `disconnect()` is called or the policy gives up, and
 * buffers outbound envelopes while the socket is down.
 *
 * State flow:
 *   disconnected → connecting → connected → reconnecting → connected | failed
 *   any state → disconnected (via `disconnect()`)
 */
export class Connection {
  private socket: TransportSocket | null = null;
  /** Bumped whenever a socket is replaced; events from older sockets are ignored. */
  private generation = 0;
  private socketError: Error | null = null;
  private currentState: ConnectionState = 'disconnected';
  private attempt = 0;
  private failure: Error | null = null;
  private endpoint: URL | null = null;
  private token: string | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly settings: ConnectionSettings;
  private readonly policy: ReconnectionPolicy;
  private readonly socketFactory: SocketFactory;
  private readonly log: Logger;
  private readonly queue: OutboundQueue;
  private readonly keepalive: KeepaliveMonitor;

  constructor(
    private readonly observer: ConnectionObserver,
    options: ConnectionOptions = {}
  ) {
    this.settings = parseOptions(ConnectionOptionsSchema, options, 'connection');
    this.policy = options.policy ?? new ExponentialBackoffPolicy();
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.log = options.logger ?? createLogger(this.settings.name);

    this.queue = new OutboundQueue(this.settings.queue, (dropped) => {
      this.log.warn(`Outbound queue full, dropped oldest ${dropped.envelope.type} message`);
      this.report(new StateError('Outbound queue overflow', this.currentState), {
        type: 'overflow',
        dropped: dropped.envelope,
      });
    });

    this.keepalive = new KeepaliveMonitor(
      {
        sendProbe: () => this.ping(),
        onTimeout: () => {
          this.log.warn(`No pong within ${this.keepalive.settings.timeoutMs}ms`);
          this.handleTransportLoss(new TransportError('Keepalive timeout'));
        },
      },
      this.settings.keepalive
    );
  }

  /**
   * Opens the socket and starts the state machine. Returns false, doing
   * nothing, unless the connection is `disconnected` or `failed`.
   *
   * @throws ConfigError when `endpoint` is not a ws: or wss: URL.
   */
  connect(endpoint: string | URL, token?: string | null): boolean {
    if (this.currentState !== 'disconnected' && this.currentState !== 'failed') {
      this.log.warn(`connect() ignored while ${this.currentState}`);
      return false;
    }
    this.endpoint = parseEndpoint(endpoint);
    this.token = token ?? null;
    this.attempt = 0;
    this.failure = null;
    this.setState('connecting');
    this.openSocket();
    return true;
  }

  /**
   * Writes the envelope now when connected, otherwise queues it. Always
   * returns true: the envelope has been accepted for delivery.
   *
   * @throws EncodingError when the payload cannot be encoded.
   */
  send(envelope: MessageEnvelope): boolean {
    const frame = encodeEnvelope(envelope);
    if (this.currentState === 'connected') {
      try {
        this.write(frame);
        return true;
      } catch (error) {
        this.queue.enqueue(envelope, frame);
        this.handleTransportLoss(toError(error));
        return true;
      }
    }
    this.queue.enqueue(envelope, frame);
    this.log.debug(`Queued ${envelope.type} (${this.queue.size} pending)`);
    return true;
  }

  /** Writes a frame as-is. Only while connected; nothing is queued. */
  sendRaw(data: string | Uint8Array): boolean {
    if (this.currentState !== 'connected') return false;
    try {
      this.write(data);
      return true;
    } catch (error) {
      this.handleTransportLoss(toError(error));
      return false;
    }
  }

  /** Closes the socket and discards queued messages. Safe to call repeatedly. */
  disconnect(): void {
    this.cancelReconnect();
    this.keepalive.stop();
    this.queue.clear();
    this.attempt = 0;
    this.releaseSocket(true);
    this.setState('disconnected');
  }

  /** Skips the remaining back-off delay. Returns false unless a retry is pending. */
  reconnectNow(): boolean {
    if (this.currentState !== 'reconnecting' || this.reconnectTimer === null) return false;
    this.cancelReconnect();
    this.retry();
    return true;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === 'connected';
  }

  get reconnectAttempt(): number {
    return this.attempt;
  }

  get lastError(): Error | null {
    return this.failure;
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private openSocket(): void {
    const endpoint = this.endpoint;
    if (endpoint === null) throw new StateError('No endpoint to connect to', this.currentState);

    const generation = ++this.generation;
    const live = (): boolean => generation === this.generation;
    this.socketError = null;

    const { tokenAttachment, tokenQueryParam, handshakeTimeoutMs } = this.settings;
    const { url, headers } = authorize(endpoint, this.token, tokenAttachment, tokenQueryParam);
    this.log.info(`Connecting to ${redactUrl(url, tokenQueryParam)}`);

    try {
      this.socket = this.socketFactory(
        { url, headers, handshakeTimeoutMs },
        {
          onOpen: () => {
            if (live()) this.handleOpen();
          },
          onMessage: (data) => {
            if (live()) this.handleMessage(data);
          },
          onPong: () => {
            if (live()) this.handlePong();
          },
          onClose: (code, reason) => {
            if (live()) this.handleClose(code, reason);
          },
          onError: (error) => {
            if (live()) this.handleSocketError(error);
          },
        }
      );
    } catch (error) {
      this.log.error('Could not open socket:', toError(error).message);
      this.handleTransportLoss(toError(error));
    }
  }

  private handleOpen(): void {
    this.log.info('Transport open, verifying');
    this.keepalive.verify();
  }

  private handlePong(): void {
    const answered = this.keepalive.acknowledge();
    const verifying = this.currentState === 'connecting' || this.currentState === 'reconnecting';
    if (answered && verifying) this.markConnected();
  }

  private markConnected(): void {
    this.attempt = 0;
    this.failure = null;
    this.currentState = 'connected';
    this.keepalive.start();

    // Queued messages go out before the observer can send anything new.
    const result = this.queue.drain((message) => this.write(message.frame));
    if (result.written > 0) this.log.info(`Flushed ${result.written} queued message(s)`);

    this.log.info('Connected');
    this.notify('onStateChanged', () => this.observer.onStateChanged('connected'));

    if (!result.complete) {
      this.handleTransportLoss(toError(result.error));
    }
  }

  private handleMessage(data: string | Uint8Array): void {
    if (typeof data !== 'string') {
      this.notify('onRawData', () => this.observer.onRawData(data));
      return;
    }

    const frame = decodeEnvelope(data);
    switch (frame.kind) {
      case 'envelope':
        this.notify('onMessage', () => this.observer.onMessage(frame.envelope));
        break;
      case 'unrecognized':
        if (this.observer.onUnrecognized) {
          this.notify('onUnrecognized', () => this.observer.onUnrecognized?.(frame.frame));
        } else {
          this.log.debug(`Ignoring frame of unknown type "${frame.frame.rawType}"`);
        }
        break;
      case 'malformed':
        this.log.warn(`Dropped malformed frame: ${frame.error.message}`);
        this.report(frame.error, { type: 'decode', frame: data });
        break;
    }
  }

  private handleClose(code: number, reason: string): void {
    const detail = reason ? `${code} ${reason}` : `${code}`;
    this.log.info(`Disconnected (${detail})`);
    this.handleTransportLoss(this.socketError ?? new TransportError(`Socket closed (${detail})`, code));
  }

  private handleSocketError(error: Error): void {
    // 'close' follows 'error'; the close handler drives the state change.
    this.log.error('Error:', error.message);
    this.socketError = error;
    this.report(error, { type: 'transport' });
  }

  private handleTransportLoss(error: Error): void {
    if (this.currentState === 'disconnected' || this.currentState === 'failed') return;

    this.failure = error;
    this.keepalive.stop();
    this.releaseSocket(false);
    this.attempt++;

    if (this.policy.shouldGiveUp(this.attempt)) {
      this.log.error(`Giving up after ${this.attempt - 1} retries: ${error.message}`);
      this.queue.clear();
      this.setState('failed');
      return;
    }

    const attempt = this.attempt;
    const delay = this.policy.nextDelay(attempt);
    this.log.info(`Reconnecting in ${delay}ms (attempt ${attempt})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.retry();
    }, delay);

    this.setState('reconnecting');
    if (this.currentState === 'reconnecting') {
      this.notify('onReconnectScheduled', () => this.observer.onReconnectScheduled?.(attempt, delay));
    }
  }

  private retry(): void {
    if (this.currentState !== 'reconnecting') return;
    this.openSocket();
  }

  private write(data: string | Uint8Array): void {
    const socket = this.socket;
    if (socket === null) throw new StateError('No open socket', this.currentState);
    const generation = this.generation;
    socket.send(data, (error) => {
      if (error && generation === this.generation) {
        this.log.error('Write failed:', error.message);
        this.report(error, { type: 'transport' });
      }
    });
  }

  private ping(): void {
    try {
      this.socket?.ping();
    } catch (error) {
      this.log.error('Ping failed:', toError(error).message);
      this.handleTransportLoss(toError(error));
    }
  }

  private releaseSocket(graceful: boolean): void {
    const socket = this.socket;
    this.socket = null;
    this.generation++;
    if (socket === null) return;
    try {
      if (graceful) {
        socket.close(NORMAL_CLOSURE, 'Client disconnect');
      } else {
        socket.terminate();
      }
    } catch (error) {
      this.log.debug('Socket teardown failed:', toError(error).message);
    }
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(next: ConnectionState): void {
    if (next === this.currentState) return;
    this.currentState = next;
    this.notify('onStateChanged', () => this.observer.onStateChanged(next));
  }

  private report(error: Error, context: ErrorContext): void {
    this.notify('onError', () => this.observer.onError?.(error, context));
  }

  private notify(callback: string, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.log.error(`Observer ${callback} threw:`, error);
    }
  }
}

function parseEndpoint(endpoint: string | URL): URL {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigError(`Invalid endpoint "${String(endpoint)}": ${toError(error).message}`);
  }
  if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    throw new ConfigError(`Endpoint must use ws: or wss:, got ${url.protocol}`);
  }
  return url;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
