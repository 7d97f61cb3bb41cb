/**
 * Parameter on the ROS parameter server, accessed through rosapi. Values
 * travel JSON-encoded.
 */

import { ProtocolError } from '../errors.js';
import type { Ros } from '../ros.js';
import { Logger, describeError } from '../utils/logger.js';

export type ParamCallback<T> = (value: T) => void;
export type ParamErrback = (error: unknown) => void;

export class Param {
  private readonly logger: Logger;

  constructor(private readonly ros: Ros, readonly name: string, logger?: Logger) {
    this.logger = logger ?? ros.logger.child('Param');
  }

  /** Current value, or null when the parameter is not set. */
  get(timeoutMs?: number): Promise<unknown>;
  get(callback: ParamCallback<unknown>, errback?: ParamErrback): void;
  get(callbackOrTimeout?: ParamCallback<unknown> | number, errback?: ParamErrback): Promise<unknown> | void {
    const pending = this.fetch(typeof callbackOrTimeout === 'number' ? callbackOrTimeout : undefined);
    if (typeof callbackOrTimeout !== 'function') return pending;
    this.settle(pending, callbackOrTimeout, errback);
  }

  set(value: unknown, timeoutMs?: number): Promise<void>;
  set(value: unknown, callback: ParamCallback<void>, errback?: ParamErrback): void;
  set(value: unknown, callbackOrTimeout?: ParamCallback<void> | number, errback?: ParamErrback): Promise<void> | void {
    const pending = this.ros.setParam(
      this.name,
      JSON.stringify(value),
      typeof callbackOrTimeout === 'number' ? callbackOrTimeout : undefined
    );
    if (typeof callbackOrTimeout !== 'function') return pending;
    this.settle(pending, callbackOrTimeout, errback);
  }

  delete(timeoutMs?: number): Promise<void>;
  delete(callback: ParamCallback<void>, errback?: ParamErrback): void;
  delete(callbackOrTimeout?: ParamCallback<void> | number, errback?: ParamErrback): Promise<void> | void {
    const pending = this.ros.deleteParam(
      this.name,
      typeof callbackOrTimeout === 'number' ? callbackOrTimeout : undefined
    );
    if (typeof callbackOrTimeout !== 'function') return pending;
    this.settle(pending, callbackOrTimeout, errback);
  }

  private async fetch(timeoutMs?: number): Promise<unknown> {
    const encoded = await this.ros.getParam(this.name, timeoutMs);
    if (encoded === '') return null;
    try {
      return JSON.parse(encoded);
    } catch {
      throw new ProtocolError(`Parameter "${this.name}" holds malformed JSON`);
    }
  }

  private settle<T>(pending: Promise<T>, callback: ParamCallback<T>, errback?: ParamErrback): void {
    pending
      .then(callback, error => {
        if (errback) {
          errback(error);
        } else {
          this.logger.warn('Parameter request failed', { param: this.name, ...describeError(error) });
        }
      })
      .catch((err: unknown) => {
        this.logger.error('Parameter callback threw', { param: this.name, ...describeError(err) });
      });
  }
}
