/**
 * ROS service: call it as a client, or advertise it and answer requests.
 */

import {
  requestId,
  CallServiceMessageSchema,
  type CallServiceEnvelope,
  type ServiceResponseEnvelope,
} from '../bridge/protocol.js';
import type { EventListener } from './event-bus.js';
import { ValidationError } from '../errors.js';
import type { Ros } from '../ros.js';
import { Logger, describeError } from '../utils/logger.js';
import type { ServiceRequest, ServiceResponse } from './message.js';

/**
 * Fills `response` for one inbound request. Returning (or resolving) false
 * reports the call as failed to the caller.
 */
export type ServiceHandler = (
  request: ServiceRequest,
  response: ServiceResponse
) => boolean | Promise<boolean>;

export type ServiceCallback = (response: ServiceResponse) => void;
export type ServiceErrback = (error: unknown) => void;

export class Service {
  private advertised = false;
  private requestListener: EventListener | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly ros: Ros,
    readonly name: string,
    readonly serviceType: string,
    logger?: Logger
  ) {
    this.logger = logger ?? ros.logger.child('Service');
  }

  get isAdvertised(): boolean {
    return this.advertised;
  }

  /** Call the service and wait for the response. */
  call(request: ServiceRequest, timeoutMs?: number): Promise<ServiceResponse>;
  /** Call the service and return immediately; the outcome arrives through the callbacks. */
  call(request: ServiceRequest, callback: ServiceCallback, errback?: ServiceErrback): void;
  call(
    request: ServiceRequest,
    callbackOrTimeout?: ServiceCallback | number,
    errback?: ServiceErrback
  ): Promise<ServiceResponse> | void {
    if (this.advertised) {
      if (typeof callbackOrTimeout === 'function') {
        this.logger.warn('Ignoring call to a service this client advertises', { service: this.name });
        return;
      }
      return Promise.reject(
        new ValidationError(`Service "${this.name}" is advertised by this client and cannot be called`, 'service')
      );
    }

    const envelope: CallServiceEnvelope = {
      op: 'call_service',
      id: requestId('call_service', this.name, this.ros.nextId()),
      service: this.name,
      args: request,
    };

    if (typeof callbackOrTimeout === 'function') {
      this.ros.callAsyncService(
        envelope,
        callbackOrTimeout,
        errback ?? (error => this.logger.warn('Service call failed', { service: this.name, values: error }))
      );
      return;
    }
    return this.ros.callSyncService(envelope, callbackOrTimeout);
  }

  /** Serve this service. No-op when already advertised. */
  advertise(handler: ServiceHandler): void {
    if (this.advertised) return;

    const listener: EventListener = message => this.handleRequest(handler, message);
    this.requestListener = listener;
    this.ros.on(this.name, listener);
    this.ros.sendOnReady({ op: 'advertise_service', service: this.name, type: this.serviceType });
    this.advertised = true;
  }

  unadvertise(): void {
    if (!this.advertised) return;

    this.ros.sendOnReady({ op: 'unadvertise_service', service: this.name, type: this.serviceType });
    if (this.requestListener) {
      this.ros.off(this.name, this.requestListener);
      this.requestListener = null;
    }
    this.advertised = false;
  }

  private handleRequest(handler: ServiceHandler, message: unknown): void {
    const parsed = CallServiceMessageSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.error('Malformed service request', { service: this.name });
      return;
    }

    const { id, args } = parsed.data;
    const response: ServiceResponse = {};

    let outcome: boolean | Promise<boolean>;
    try {
      outcome = handler(args, response);
    } catch (err) {
      this.logger.error('Service handler threw', { service: this.name, ...describeError(err) });
      this.respond(id, response, false);
      return;
    }

    if (typeof outcome === 'boolean') {
      this.respond(id, response, outcome);
      return;
    }

    outcome
      .then(result => this.respond(id, response, result))
      .catch((err: unknown) => {
        this.logger.error('Service handler failed', { service: this.name, ...describeError(err) });
        this.respond(id, response, false);
      });
  }

  private respond(id: string | undefined, values: ServiceResponse, result: boolean): void {
    const envelope: ServiceResponseEnvelope = { op: 'service_response', service: this.name, values, result };
    if (id !== undefined) envelope.id = id;

    try {
      this.ros.sendOnReady(envelope);
    } catch (err) {
      this.logger.error('Failed to send service response', { service: this.name, ...describeError(err) });
    }
  }
}
