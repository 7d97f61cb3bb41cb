/**
 * ROS topic: subscribe to it, or advertise it and publish messages.
 */

import { requestId, type AdvertiseEnvelope, type SubscribeEnvelope } from '../bridge/protocol.js';
import { DEFAULT_TOPIC_QUEUE_SIZE, SUPPORTED_COMPRESSION_TYPES, TOPIC_RECONNECT_DELAY_MS } from '../constants.js';
import { ValidationError } from '../errors.js';
import type { Ros } from '../ros.js';
import type { Logger } from '../utils/logger.js';
import type { EventListener } from './event-bus.js';
import { isMessage, type Message } from './message.js';

export type Compression = (typeof SUPPORTED_COMPRESSION_TYPES)[number];

export interface TopicOptions {
  /** @default 'none' */
  compression?: string;
  /** Ask the bridge to keep the last message for late subscribers. */
  latch?: boolean;
  /** Minimum milliseconds between messages sent to this client. */
  throttleRate?: number;
  /** Bridge-side publisher queue. @default 100 */
  queueSize?: number;
  /** Bridge-side subscriber queue; 0 disables queueing. */
  queueLength?: number;
  /** Subscribe and advertise again after a dropped connection. @default true */
  reconnectOnClose?: boolean;
  logger?: Logger;
}

export type MessageCallback = (message: Message) => void;

function isCompression(value: string): value is Compression {
  return SUPPORTED_COMPRESSION_TYPES.some(supported => supported === value);
}

/**
 * Subscription and advertisement are each idempotent: repeating `subscribe`
 * or `advertise` while active sends nothing, as does repeating `unsubscribe`
 * or `unadvertise` while inactive.
 */
export class Topic {
  readonly compression: Compression;
  readonly latch: boolean;
  readonly throttleRate: number;
  readonly queueSize: number;
  readonly queueLength: number;

  private subscribeId: string | null = null;
  private advertiseId: string | null = null;
  private messageListener: EventListener | null = null;
  private detachCloseListener: (() => void) | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly ros: Ros,
    readonly name: string,
    readonly messageType: string,
    options: TopicOptions = {}
  ) {
    const compression = options.compression ?? 'none';
    if (!isCompression(compression)) {
      throw new ValidationError(
        `Unsupported compression "${compression}", expected one of: ${SUPPORTED_COMPRESSION_TYPES.join(', ')}`,
        'compression'
      );
    }
    this.compression = compression;
    this.latch = options.latch ?? false;
    this.throttleRate = options.throttleRate ?? 0;
    this.queueSize = options.queueSize ?? DEFAULT_TOPIC_QUEUE_SIZE;
    this.queueLength = options.queueLength ?? 0;
    this.logger = options.logger ?? ros.logger.child('Topic');

    if (options.reconnectOnClose ?? true) {
      this.detachCloseListener = this.ros.on('close', () => {
        const { subscribeId, advertiseId } = this;
        this.ros.callLater(TOPIC_RECONNECT_DELAY_MS, () => this.reestablish(subscribeId, advertiseId));
      });
    }
  }

  get isSubscribed(): boolean {
    return this.subscribeId !== null;
  }

  get isAdvertised(): boolean {
    return this.advertiseId !== null;
  }

  subscribe(callback: MessageCallback): void {
    if (this.subscribeId !== null) return;

    const listener: EventListener = message => {
      if (isMessage(message)) callback(message);
    };
    this.messageListener = listener;
    this.ros.on(this.name, listener);

    this.subscribeId = requestId('subscribe', this.name, this.ros.nextId());
    this.ros.sendOnReady(this.subscribeEnvelope(this.subscribeId));
  }

  unsubscribe(): void {
    if (this.subscribeId === null) return;

    if (this.messageListener) {
      this.ros.off(this.name, this.messageListener);
      this.messageListener = null;
    }
    this.ros.sendOnReady({ op: 'unsubscribe', id: this.subscribeId, topic: this.name });
    this.subscribeId = null;
  }

  advertise(): void {
    if (this.advertiseId !== null) return;

    this.advertiseId = requestId('advertise', this.name, this.ros.nextId());
    this.ros.sendOnReady(this.advertiseEnvelope(this.advertiseId));
  }

  unadvertise(): void {
    if (this.advertiseId === null) return;

    this.ros.sendOnReady({ op: 'unadvertise', id: this.advertiseId, topic: this.name });
    this.advertiseId = null;
  }

  /** Publish a message, advertising the topic first if needed. */
  publish(message: Message): void {
    this.advertise();
    this.ros.sendOnReady({
      op: 'publish',
      id: requestId('publish', this.name, this.ros.nextId()),
      topic: this.name,
      msg: message,
      latch: this.latch,
    });
  }

  /** Unsubscribe, unadvertise and stop following reconnects. */
  dispose(): void {
    this.unsubscribe();
    this.unadvertise();
    this.detachCloseListener?.();
    this.detachCloseListener = null;
  }

  /**
   * Renew the subscription and advertisement that were live when the
   * connection dropped. One replaced in the meantime is already queued.
   */
  private reestablish(subscribeId: string | null, advertiseId: string | null): void {
    if (subscribeId !== null && this.subscribeId === subscribeId) {
      this.subscribeId = requestId('subscribe', this.name, this.ros.nextId());
      this.logger.info('Resubscribing after reconnect', { topic: this.name, id: this.subscribeId });
      this.ros.sendOnReady(this.subscribeEnvelope(this.subscribeId));
    }
    if (advertiseId !== null && this.advertiseId === advertiseId) {
      this.advertiseId = requestId('advertise', this.name, this.ros.nextId());
      this.logger.info('Re-advertising after reconnect', { topic: this.name, id: this.advertiseId });
      this.ros.sendOnReady(this.advertiseEnvelope(this.advertiseId));
    }
  }

  private subscribeEnvelope(id: string): SubscribeEnvelope {
    return {
      op: 'subscribe',
      id,
      type: this.messageType,
      topic: this.name,
      compression: this.compression,
      throttle_rate: this.throttleRate,
      queue_length: this.queueLength,
    };
  }

  private advertiseEnvelope(id: string): AdvertiseEnvelope {
    return {
      op: 'advertise',
      id,
      type: this.messageType,
      topic: this.name,
      latch: this.latch,
      queue_size: this.queueSize,
    };
  }
}
