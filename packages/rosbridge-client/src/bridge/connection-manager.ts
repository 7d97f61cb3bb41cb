/**
 * Owns the single logical connection to a rosbridge server: transport
 * lifecycle with reconnection, queued writes until ready, and request/reply
 * correlation for service calls and ROS 2 action goals.
 */

import {
  DEFAULT_BRIDGE_URL,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_RECONNECT_INTERVAL_MS,
  DEFAULT_RECONNECT_INTERVAL_MS,
  DEFAULT_SERVICE_TIMEOUT_MS,
} from '../constants.js';
import { EventBus, type EventListener } from '../core/event-bus.js';
import type { ServiceResponse } from '../core/message.js';
import {
  BridgeConnectionError,
  ConnectionClosedError,
  ConnectionTimeoutError,
  RosBridgeError,
  ServiceError,
  ServiceTimeoutError,
} from '../errors.js';
import { Logger, describeError, logger as rootLogger } from '../utils/logger.js';
import { CorrelationTable } from './correlation-table.js';
import { Dispatcher, type ActionOutcome } from './dispatcher.js';
import {
  decodeEnvelope,
  encodeEnvelope,
  parseInbound,
  type CallServiceEnvelope,
  type CancelActionGoalEnvelope,
  type OutboundEnvelope,
  type SendActionGoalEnvelope,
} from './protocol.js';
import { createWebSocketTransport, type BridgeTransport, type TransportFactory } from './ws-client.js';

export interface ConnectionManagerOptions {
  url?: string;
  /** Reconnect after a dropped connection. @default true */
  reconnect?: boolean;
  /** First reconnect delay; doubles per failed attempt. @default 1000 */
  reconnectIntervalMs?: number;
  /** Upper bound of the reconnect delay. @default 30000 */
  maxReconnectIntervalMs?: number;
  /** Default deadline of blocking service calls. @default 10000 */
  serviceTimeoutMs?: number;
  /** Default deadline of `run()`. @default 10000 */
  connectTimeoutMs?: number;
  headers?: Record<string, string>;
  transportFactory?: TransportFactory;
  logger?: Logger;
}

export interface CloseEvent {
  code: number;
  reason: string;
}

type Timer = ReturnType<typeof setTimeout>;

export class ConnectionManager {
  readonly url: string;
  readonly serviceTimeoutMs: number;
  readonly connectTimeoutMs: number;

  private readonly reconnect: boolean;
  private readonly reconnectIntervalMs: number;
  private readonly maxReconnectIntervalMs: number;
  private readonly headers?: Record<string, string>;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;

  private readonly events: EventBus;
  private readonly services = new CorrelationTable<ServiceResponse, unknown>();
  private readonly actions = new CorrelationTable<ActionOutcome, unknown, unknown>();
  private readonly dispatcher: Dispatcher;

  private transport: BridgeTransport | null = null;
  private ready = false;
  private established = false;
  private connecting = false;
  private manualClose = false;
  private reopenAfterClose = false;
  private counter = 0;
  private reconnectAttempts = 0;
  private reconnectTimer: Timer | null = null;
  private timers = new Set<Timer>();
  private terminationWaiters: Array<() => void> = [];

  constructor(options: ConnectionManagerOptions = {}) {
    this.url = options.url ?? DEFAULT_BRIDGE_URL;
    this.reconnect = options.reconnect ?? true;
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? DEFAULT_RECONNECT_INTERVAL_MS;
    this.maxReconnectIntervalMs = options.maxReconnectIntervalMs ?? DEFAULT_MAX_RECONNECT_INTERVAL_MS;
    this.serviceTimeoutMs = options.serviceTimeoutMs ?? DEFAULT_SERVICE_TIMEOUT_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.headers = options.headers;
    this.transportFactory = options.transportFactory ?? createWebSocketTransport;
    this.logger = options.logger ?? rootLogger.child('ConnectionManager');

    this.events = new EventBus(this.logger.child('EventBus'));
    this.dispatcher = new Dispatcher({
      events: this.events,
      services: this.services,
      actions: this.actions,
      logger: this.logger.child('Dispatcher'),
    });
  }

  // --- Lifecycle ---

  get isConnected(): boolean {
    return this.ready;
  }

  get isConnecting(): boolean {
    return this.connecting;
  }

  /**
   * Open the connection. No-op while connected or while an attempt is in
   * flight. During a close handshake the new attempt starts once it completes.
   */
  connect(): void {
    if (this.ready || this.connecting) return;
    this.manualClose = false;
    this.clearReconnectTimer();
    if (this.transport) {
      this.reopenAfterClose = true;
      return;
    }
    this.openTransport();
  }

  /**
   * Close deliberately: no reconnection follows. `closing` fires while the
   * connection is still usable, before the close handshake starts. From then
   * on the client counts as disconnected and sends wait for the next `ready`.
   */
  close(): void {
    this.manualClose = true;
    this.reopenAfterClose = false;
    this.clearReconnectTimer();

    const transport = this.transport;
    if (!transport) return;

    if (this.ready) {
      this.logger.info('Closing connection', { url: this.url });
      this.events.emit('closing');
      this.ready = false;
    }
    transport.close();
  }

  /** Connect and resolve once the connection is ready. */
  run(timeoutMs = this.connectTimeoutMs): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ready) {
        resolve();
        return;
      }

      const onReady: EventListener = () => {
        clearTimeout(timer);
        resolve();
      };
      this.events.once('ready', onReady);
      const timer = setTimeout(() => {
        this.events.off('ready', onReady);
        reject(new ConnectionTimeoutError(this.url, timeoutMs));
      }, timeoutMs);

      try {
        this.connect();
      } catch (err) {
        clearTimeout(timer);
        this.events.off('ready', onReady);
        reject(err);
      }
    });
  }

  /** Connect and resolve only when `terminate()` is called. */
  runForever(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.terminationWaiters.push(resolve);
      try {
        this.connect();
      } catch (err) {
        this.terminationWaiters = this.terminationWaiters.filter(waiter => waiter !== resolve);
        reject(err);
      }
    });
  }

  /**
   * Close, cancel every timer scheduled through `callLater` and fail all
   * pending requests with `ConnectionClosedError`.
   */
  terminate(): void {
    this.close();

    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    const error = new ConnectionClosedError();
    this.services.rejectAll(error);
    this.actions.rejectAll(error);

    for (const waiter of this.terminationWaiters.splice(0)) {
      waiter();
    }
  }

  /**
   * Run `callback` now if connected (on a later turn of the event loop when
   * `runInBackground`), otherwise once the next `ready` fires.
   */
  onReady(callback: () => void, runInBackground = true): void {
    if (!this.ready) {
      this.events.once('ready', callback);
      return;
    }
    if (!runInBackground) {
      callback();
      return;
    }
    setImmediate(() => {
      try {
        callback();
      } catch (err) {
        this.reportError('Ready callback threw', err);
      }
    });
  }

  /** Schedule a callback that `terminate()` cancels. Returns a cancel function. */
  callLater(delayMs: number, callback: () => void): () => void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        callback();
      } catch (err) {
        this.reportError('Scheduled callback threw', err);
      }
    }, delayMs);
    this.timers.add(timer);

    return () => {
      clearTimeout(timer);
      this.timers.delete(timer);
    };
  }

  // --- Messaging ---

  /** Next value of the per-connection request counter, starting at 1. */
  nextId(): number {
    this.counter += 1;
    return this.counter;
  }

  /** Write the envelope now when connected, otherwise on the next `ready`. */
  sendOnReady(envelope: OutboundEnvelope): void {
    if (this.ready && this.transport?.isOpen) {
      this.write(envelope);
      return;
    }
    this.events.once('ready', () => this.write(envelope));
  }

  callAsyncService(
    envelope: CallServiceEnvelope,
    onSuccess: (response: ServiceResponse) => void,
    onError: (error: unknown) => void
  ): void {
    this.services.register(envelope.id, { onSuccess, onError });
    try {
      this.sendOnReady(envelope);
    } catch (err) {
      this.services.remove(envelope.id);
      throw err;
    }
  }

  /**
   * Call a service and wait for its response.
   *
   * At the deadline the request is abandoned: the promise rejects with
   * `ServiceTimeoutError` and a reply arriving afterwards is discarded.
   */
  callSyncService(envelope: CallServiceEnvelope, timeoutMs = this.serviceTimeoutMs): Promise<ServiceResponse> {
    return new Promise((resolve, reject) => {
      let timer: Timer | undefined;

      this.callAsyncService(
        envelope,
        response => {
          clearTimeout(timer);
          resolve(response);
        },
        error => {
          clearTimeout(timer);
          reject(error instanceof RosBridgeError ? error : new ServiceError(envelope.service, error));
        }
      );

      timer = setTimeout(() => {
        this.services.abandon(envelope.id);
        this.logger.warn('Service call timed out', { id: envelope.id, service: envelope.service, timeoutMs });
        reject(new ServiceTimeoutError(envelope.service, timeoutMs));
      }, timeoutMs);
    });
  }

  sendActionGoal(
    envelope: SendActionGoalEnvelope,
    resultback: (outcome: ActionOutcome) => void,
    feedback: ((values: unknown) => void) | undefined,
    errback: (error: unknown) => void
  ): void {
    this.actions.register(envelope.id, {
      onSuccess: resultback,
      onError: errback,
      onProgress: feedback,
    });
    try {
      this.sendOnReady(envelope);
    } catch (err) {
      this.actions.remove(envelope.id);
      throw err;
    }
  }

  cancelActionGoal(envelope: CancelActionGoalEnvelope): void {
    this.sendOnReady(envelope);
  }

  /** Stop waiting for a goal; its later feedback and result are discarded. */
  abandonActionGoal(id: string): void {
    this.actions.abandon(id);
  }

  // --- Events ---

  on(event: string, listener: EventListener): () => void {
    return this.events.on(event, listener);
  }

  once(event: string, listener: EventListener): () => void {
    return this.events.once(event, listener);
  }

  off(event: string, listener?: EventListener): void {
    this.events.off(event, listener);
  }

  emit(event: string, ...args: unknown[]): boolean {
    return this.events.emit(event, ...args);
  }

  // --- Internals ---

  private openTransport(): void {
    this.connecting = true;
    const transport = this.transportFactory(this.url, {
      headers: this.headers,
      logger: this.logger.child('WebSocketTransport'),
    });
    this.transport = transport;

    const isCurrent = () => this.transport === transport;

    try {
      transport.open({
        onOpen: () => {
          if (isCurrent()) this.handleOpen();
        },
        onMessage: text => {
          if (isCurrent()) this.handleMessage(text);
        },
        onError: err => {
          if (isCurrent()) this.reportError('Transport error', err);
        },
        onClose: (code, reason) => {
          if (isCurrent()) this.handleClose(code, reason);
        },
      });
    } catch (err) {
      this.transport = null;
      this.connecting = false;
      throw err;
    }
  }

  private handleOpen(): void {
    this.connecting = false;
    this.ready = true;
    this.established = true;
    this.reconnectAttempts = 0;
    this.logger.info('Connected to bridge', { url: this.url });
    this.events.emit('ready');
  }

  private handleClose(code: number, reason: string): void {
    const wasEstablished = this.established;
    this.transport = null;
    this.ready = false;
    this.established = false;
    this.connecting = false;

    if (wasEstablished) {
      this.logger.info('Connection closed', { url: this.url, code, reason });
      const event: CloseEvent = { code, reason };
      this.events.emit('close', event);
    } else {
      this.logger.warn('Connection attempt failed', { url: this.url, code, reason });
    }

    if (this.reopenAfterClose) {
      this.reopenAfterClose = false;
      try {
        this.openTransport();
      } catch (err) {
        this.reportError('Reconnect failed', err);
      }
      return;
    }
    if (this.manualClose || !this.reconnect) return;
    this.scheduleReconnect();
  }

  private handleMessage(text: string): void {
    try {
      const envelope = parseInbound(decodeEnvelope(text));
      this.logger.debug('Received', { op: envelope.op });
      this.dispatcher.dispatch(envelope);
    } catch (err) {
      this.reportError('Failed to handle inbound frame', err);
    }
  }

  private write(envelope: OutboundEnvelope): void {
    const transport = this.transport;
    if (!transport) {
      throw new BridgeConnectionError('Not connected to bridge', this.url);
    }
    this.logger.debug('Sending', { op: envelope.op });
    transport.send(encodeEnvelope(envelope));
  }

  private scheduleReconnect(): void {
    const delayMs = Math.min(
      this.reconnectIntervalMs * 2 ** this.reconnectAttempts,
      this.maxReconnectIntervalMs
    );
    this.reconnectAttempts += 1;
    this.logger.info('Reconnecting', { url: this.url, attempt: this.reconnectAttempts, delayMs });

    this.clearReconnectTimer();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.manualClose) return;
      try {
        this.openTransport();
      } catch (err) {
        this.reportError('Reconnect failed', err);
        this.scheduleReconnect();
      }
    }, delayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private reportError(message: string, err: unknown): void {
    this.logger.error(message, describeError(err));
    this.events.emit('error', err);
  }
}
