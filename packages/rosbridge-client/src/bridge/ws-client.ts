/**
 * WebSocket transport to a rosbridge server.
 */

import WebSocket from 'ws';
import { HEARTBEAT_INTERVAL_MS, HEARTBEAT_STALE_MS, WS_CLOSE_NORMAL } from '../constants.js';
import { BridgeConnectionError, ProtocolError } from '../errors.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';

export interface TransportHandlers {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onError: (err: Error) => void;
  onClose: (code: number, reason: string) => void;
}

/**
 * A bidirectional channel of text frames. One instance carries exactly one
 * connection attempt; reconnecting means opening a new transport.
 */
export interface BridgeTransport {
  open(handlers: TransportHandlers): void;
  send(text: string): void;
  close(): void;
  readonly isOpen: boolean;
}

export interface TransportOptions {
  /** Extra HTTP headers for the upgrade request. */
  headers?: Record<string, string>;
  logger?: Logger;
  heartbeatIntervalMs?: number;
  heartbeatStaleMs?: number;
}

export type TransportFactory = (url: string, options: TransportOptions) => BridgeTransport;

/**
 * Transport backed by the `ws` package.
 *
 * Pings the server every 15s and terminates the socket when no pong was
 * seen for 30s; a stale socket then surfaces as an ordinary close.
 */
export class WebSocketTransport implements BridgeTransport {
  private ws: WebSocket | null = null;
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private lastPongTime = 0;
  private readonly logger: Logger;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatStaleMs: number;

  constructor(private readonly url: string, private readonly options: TransportOptions = {}) {
    this.logger = options.logger ?? rootLogger.child('WebSocketTransport');
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.heartbeatStaleMs = options.heartbeatStaleMs ?? HEARTBEAT_STALE_MS;
  }

  open(handlers: TransportHandlers): void {
    if (this.ws) {
      throw new BridgeConnectionError('Transport already opened', this.url);
    }

    const ws = new WebSocket(this.url, { headers: this.options.headers });
    this.ws = ws;

    ws.on('open', () => {
      this.logger.debug('Socket open', { url: this.url });
      this.lastPongTime = Date.now();
      this.startHeartbeat();
      handlers.onOpen();
    });

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        handlers.onError(new ProtocolError('Binary frames are not supported'));
        return;
      }
      handlers.onMessage(rawDataToString(data));
    });

    ws.on('pong', () => {
      this.lastPongTime = Date.now();
    });

    ws.on('error', (err: Error) => {
      this.logger.warn('Socket error', { url: this.url, reason: err.message });
      handlers.onError(new BridgeConnectionError(err.message, this.url));
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.stopHeartbeat();
      this.ws = null;
      handlers.onClose(code, reason.toString());
    });
  }

  send(text: string): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new BridgeConnectionError('Not connected to bridge', this.url);
    }
    this.ws.send(text);
  }

  /** Start the close handshake. The close callback fires once it completes. */
  close(): void {
    this.stopHeartbeat();
    this.ws?.close(WS_CLOSE_NORMAL);
  }

  get isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatInterval = setInterval(() => {
      if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;

      if (Date.now() - this.lastPongTime > this.heartbeatStaleMs) {
        this.logger.warn('Heartbeat timeout, closing stale connection', { url: this.url });
        this.ws.terminate();
        return;
      }

      this.ws.ping();
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }
}

export const createWebSocketTransport: TransportFactory = (url, options) =>
  new WebSocketTransport(url, options);

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
