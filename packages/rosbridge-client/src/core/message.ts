/**
 * Message payload types.
 *
 * Message bodies are schema-free from the client's point of view: whatever
 * JSON object the bridge or the caller provides is passed through untouched.
 */

import { Time } from './time.js';

export type Message = Record<string, unknown>;
export type ServiceRequest = Record<string, unknown>;
export type ServiceResponse = Record<string, unknown>;

export function isMessage(value: unknown): value is Message {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface HeaderOptions {
  seq?: number;
  stamp?: Time | { secs: number; nsecs: number };
  frameId?: string;
}

/** Build a `std_msgs/Header` message. */
export function createHeader(options: HeaderOptions = {}): Message {
  const stamp = options.stamp instanceof Time
    ? options.stamp
    : options.stamp
      ? new Time(options.stamp.secs, options.stamp.nsecs)
      : Time.zero();

  return {
    seq: options.seq ?? 0,
    stamp: stamp.toJSON(),
    frame_id: options.frameId ?? '',
  };
}
