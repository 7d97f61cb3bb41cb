/**
 * Transform listener backed by tf2_web_republisher: the server republishes
 * the requested frames, relative to a fixed frame, on a topic it creates
 * for this client.
 */

import { z } from 'zod';
import {
  DEFAULT_TF_SERVICE_NAME,
  DEFAULT_TF_TOPIC_TIMEOUT_MS,
  DEFAULT_TF_UPDATE_DELAY_MS,
} from '../constants.js';
import type { Message } from '../core/message.js';
import { Service } from '../core/service.js';
import type { Stamp } from '../core/time.js';
import { Topic } from '../core/topic.js';
import type { Ros } from '../ros.js';
import { Logger, describeError } from '../utils/logger.js';

export interface TFClientOptions {
  /** @default '/base_link' */
  fixedFrame?: string;
  /** @default 2.0 */
  angularThreshold?: number;
  /** @default 0.01 */
  translationThreshold?: number;
  /** Republish rate in Hz. @default 10 */
  rate?: number;
  /** Delay between the first new subscription and the republisher request. @default 50 */
  updateDelayMs?: number;
  /** Republisher stops the topic after this long without subscribers. @default 2000 */
  topicTimeoutMs?: number;
  /** @default '/republish_tfs' */
  repubServiceName?: string;
  logger?: Logger;
}

const Vector3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() });
const QuaternionSchema = z.object({ x: z.number(), y: z.number(), z: z.number(), w: z.number() });

const TransformStampedSchema = z.object({
  child_frame_id: z.string(),
  transform: z.object({
    translation: Vector3Schema,
    rotation: QuaternionSchema,
  }),
}).passthrough();

const TFArraySchema = z.object({ transforms: z.array(TransformStampedSchema) });
const RepublishResponseSchema = z.object({ topic_name: z.string() });

export interface Transform {
  translation: z.infer<typeof Vector3Schema>;
  rotation: z.infer<typeof QuaternionSchema>;
}

export type TransformCallback = (transform: Transform) => void;

interface FrameInfo {
  callbacks: TransformCallback[];
  transform: Transform | null;
}

function normalizeFrameId(frameId: string): string {
  return frameId.startsWith('/') ? frameId.slice(1) : frameId;
}

export class TFClient {
  readonly fixedFrame: string;
  readonly angularThreshold: number;
  readonly translationThreshold: number;
  readonly rate: number;
  readonly updateDelayMs: number;
  readonly topicTimeout: Stamp;

  private readonly logger: Logger;
  private readonly repubService: Service;
  private readonly frames = new Map<string, FrameInfo>();
  private currentTopic: Topic | null = null;
  private goalUpdateRequested = false;

  constructor(private readonly ros: Ros, options: TFClientOptions = {}) {
    this.fixedFrame = options.fixedFrame ?? '/base_link';
    this.angularThreshold = options.angularThreshold ?? 2.0;
    this.translationThreshold = options.translationThreshold ?? 0.01;
    this.rate = options.rate ?? 10.0;
    this.updateDelayMs = options.updateDelayMs ?? DEFAULT_TF_UPDATE_DELAY_MS;

    const timeoutMs = options.topicTimeoutMs ?? DEFAULT_TF_TOPIC_TIMEOUT_MS;
    const secs = Math.floor(timeoutMs / 1000);
    this.topicTimeout = { secs, nsecs: Math.floor((timeoutMs - secs * 1000) * 1_000_000) };

    this.logger = options.logger ?? ros.logger.child('TFClient');
    this.repubService = new Service(
      ros,
      options.repubServiceName ?? DEFAULT_TF_SERVICE_NAME,
      'tf2_web_republisher/RepublishTFs',
      this.logger.child('Service')
    );
  }

  /** Frames with at least one subscriber. */
  get frameIds(): string[] {
    return [...this.frames.keys()];
  }

  /**
   * Call `callback` with every update of `frameId` relative to the fixed
   * frame. A transform already received is delivered immediately.
   */
  subscribe(frameId: string, callback: TransformCallback): void {
    const id = normalizeFrameId(frameId);
    let frame = this.frames.get(id);

    if (!frame) {
      frame = { callbacks: [], transform: null };
      this.frames.set(id, frame);
      if (!this.goalUpdateRequested) {
        this.ros.callLater(this.updateDelayMs, () => this.updateGoal());
        this.goalUpdateRequested = true;
      }
    } else if (frame.transform) {
      callback(frame.transform);
    }

    frame.callbacks.push(callback);
  }

  /** Remove one callback, or the whole frame when no callback is given. */
  unsubscribe(frameId: string, callback?: TransformCallback): void {
    const id = normalizeFrameId(frameId);
    const frame = this.frames.get(id);
    if (!frame) return;

    if (callback) {
      frame.callbacks = frame.callbacks.filter(cb => cb !== callback);
    }
    if (!callback || frame.callbacks.length === 0) {
      this.frames.delete(id);
    }
  }

  /** Ask the republisher for the subscribed frames. */
  updateGoal(): void {
    const request: Message = {
      source_frames: this.frameIds,
      target_frame: this.fixedFrame,
      angular_thres: this.angularThreshold,
      trans_thres: this.translationThreshold,
      rate: this.rate,
      timeout: this.topicTimeout,
    };

    this.repubService.call(
      request,
      response => this.processResponse(response),
      error => this.logger.warn('Republish request failed', { service: this.repubService.name, values: error })
    );
    this.goalUpdateRequested = false;
  }

  dispose(): void {
    this.currentTopic?.dispose();
    this.currentTopic = null;
  }

  private processResponse(response: Message): void {
    const parsed = RepublishResponseSchema.safeParse(response);
    if (!parsed.success) {
      this.logger.warn('Malformed republish response', { service: this.repubService.name });
      return;
    }

    this.currentTopic?.dispose();
    const topic = new Topic(this.ros, parsed.data.topic_name, 'tf2_web_republisher/TFArray', {
      logger: this.logger.child('Topic'),
    });
    topic.subscribe(message => this.processTFArray(message));
    this.currentTopic = topic;
  }

  private processTFArray(message: Message): void {
    const parsed = TFArraySchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed TF array', { topic: this.currentTopic?.name });
      return;
    }

    for (const stamped of parsed.data.transforms) {
      const frame = this.frames.get(normalizeFrameId(stamped.child_frame_id));
      if (!frame) continue;

      const transform: Transform = {
        translation: stamped.transform.translation,
        rotation: stamped.transform.rotation,
      };
      frame.transform = transform;

      for (const callback of [...frame.callbacks]) {
        try {
          callback(transform);
        } catch (err) {
          this.logger.error('Transform callback threw', { frame: stamped.child_frame_id, ...describeError(err) });
        }
      }
    }
  }
}
