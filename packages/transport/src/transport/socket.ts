/**
 * The seam between Connection and the network. The default factory opens a
 * `ws` WebSocket; tests substitute an in-process socket.
 */
import WebSocket from 'ws';

export interface SocketRequest {
  url: URL;
  headers: Record<string, string>;
  handshakeTimeoutMs: number;
}

export interface SocketHandlers {
  onOpen(): void;
  /** Text frames arrive as strings, binary frames as bytes. */
  onMessage(data: string | Uint8Array): void;
  onPong(): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface TransportSocket {
  send(data: string | Uint8Array, callback: (error?: Error) => void): void;
  ping(): void;
  close(code: number, reason: string): void;
  terminate(): void;
}

export type SocketFactory = (request: SocketRequest, handlers: SocketHandlers) => TransportSocket;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): string | Uint8Array {
  const buffer = toBuffer(data);
  return isBinary ? new Uint8Array(buffer) : buffer.toString('utf8');
}

export const wsSocketFactory: SocketFactory = (request, handlers) => {
  const ws = new WebSocket(request.url, {
    headers: request.headers,
    handshakeTimeout: request.handshakeTimeoutMs,
  });

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data, isBinary) => handlers.onMessage(toFrame(data, isBinary)));
  ws.on('pong', () => handlers.onPong());
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  ws.on('error', (err) => handlers.onError(err));

  return {
    send: (data, callback) => ws.send(data, callback),
    ping: () => ws.ping(),
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
  };
};
