/**
 * Named-event bus used for connection lifecycle events (`ready`, `closing`,
 * `close`, `error`) and for routing inbound messages to topic and service
 * listeners by name.
 */

import { Logger, describeError, logger as rootLogger } from '../utils/logger.js';

export type EventListener = (...args: unknown[]) => void;

/**
 * Ordered registry of distinct listeners per event name.
 *
 * Each event maps the listener the caller registered to the function that is
 * actually invoked; they differ only for `once` listeners, whose wrapper
 * removes itself first. Keying by the caller's listener makes registration
 * idempotent and lets `off` remove a `once` listener before it fires.
 */
export class EventBus {
  private events = new Map<string, Map<EventListener, EventListener>>();
  private logger: Logger;

  constructor(logger: Logger = rootLogger.child('EventBus')) {
    this.logger = logger;
  }

  /** Subscribe to an event. Returns an unsubscribe function. */
  on(event: string, listener: EventListener): () => void {
    this.add(event, listener, listener);
    return () => this.off(event, listener);
  }

  /** Subscribe for a single emission. Returns an unsubscribe function. */
  once(event: string, listener: EventListener): () => void {
    const wrapper: EventListener = (...args) => {
      this.off(event, listener);
      listener(...args);
    };
    this.add(event, listener, wrapper);
    return () => this.off(event, listener);
  }

  /** Remove one listener, or every listener of the event when none is given. */
  off(event: string, listener?: EventListener): void {
    const registered = this.events.get(event);
    if (!registered) return;

    if (listener === undefined) {
      this.events.delete(event);
      return;
    }

    registered.delete(listener);
    if (registered.size === 0) {
      this.events.delete(event);
    }
  }

  /**
   * Call every listener of the event in registration order. Returns true when
   * at least one listener was called.
   *
   * A throwing listener does not stop its siblings: the error is logged and
   * re-emitted as `error` with the failing event name as second argument.
   */
  emit(event: string, ...args: unknown[]): boolean {
    const registered = this.events.get(event);
    if (!registered || registered.size === 0) return false;

    for (const invoke of [...registered.values()]) {
      try {
        invoke(...args);
      } catch (err) {
        this.logger.error(`Listener for "${event}" threw`, describeError(err));
        if (event !== 'error') {
          this.emit('error', err, event);
        }
      }
    }
    return true;
  }

  listeners(event: string): EventListener[] {
    return [...(this.events.get(event)?.keys() ?? [])];
  }

  listenerCount(event?: string): number {
    if (event !== undefined) {
      return this.events.get(event)?.size ?? 0;
    }
    let total = 0;
    for (const registered of this.events.values()) {
      total += registered.size;
    }
    return total;
  }

  removeAllListeners(event?: string): void {
    if (event !== undefined) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  private add(event: string, listener: EventListener, invoke: EventListener): void {
    let registered = this.events.get(event);
    if (!registered) {
      registered = new Map();
      this.events.set(event, registered);
    }
    if (registered.has(listener)) return;
    registered.set(listener, invoke);
  }
}
