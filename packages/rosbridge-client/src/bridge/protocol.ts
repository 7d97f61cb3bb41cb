/**
 * rosbridge wire protocol: envelope types, codec and inbound validation.
 * @see https://github.com/RobotWebTools/rosbridge_suite/blob/ros2/ROSBRIDGE_PROTOCOL.md
 */

import { z } from 'zod';
import { ProtocolError, UnhandledOperationError } from '../errors.js';
import type { Message } from '../core/message.js';

export const Op = {
  PUBLISH: 'publish',
  SUBSCRIBE: 'subscribe',
  UNSUBSCRIBE: 'unsubscribe',
  ADVERTISE: 'advertise',
  UNADVERTISE: 'unadvertise',
  CALL_SERVICE: 'call_service',
  SERVICE_RESPONSE: 'service_response',
  ADVERTISE_SERVICE: 'advertise_service',
  UNADVERTISE_SERVICE: 'unadvertise_service',
  SEND_ACTION_GOAL: 'send_action_goal',
  CANCEL_ACTION_GOAL: 'cancel_action_goal',
  ACTION_FEEDBACK: 'action_feedback',
  ACTION_RESULT: 'action_result',
  STATUS: 'status',
  SET_LEVEL: 'set_level',
} as const;

export type OpValue = (typeof Op)[keyof typeof Op];

/** Any decoded frame: an `op` tag plus operation-specific fields. */
export type Envelope = { op: string } & Record<string, unknown>;

/** Correlation id of the form `{op}:{name}:{counter}`. */
export function requestId(op: string, name: string, counter: number): string {
  return `${op}:${name}:${counter}`;
}

// --- Outbound envelopes ---

export interface SubscribeEnvelope {
  op: 'subscribe';
  id: string;
  type: string;
  topic: string;
  compression: string;
  throttle_rate: number;
  queue_length: number;
}

export interface UnsubscribeEnvelope {
  op: 'unsubscribe';
  id: string;
  topic: string;
}

export interface PublishEnvelope {
  op: 'publish';
  id: string;
  topic: string;
  msg: Message;
  latch: boolean;
}

export interface AdvertiseEnvelope {
  op: 'advertise';
  id: string;
  type: string;
  topic: string;
  latch: boolean;
  queue_size: number;
}

export interface UnadvertiseEnvelope {
  op: 'unadvertise';
  id: string;
  topic: string;
}

export interface CallServiceEnvelope {
  op: 'call_service';
  id: string;
  service: string;
  args: Message;
}

export interface ServiceResponseEnvelope {
  op: 'service_response';
  id?: string;
  service: string;
  values: Message;
  result: boolean;
}

export interface AdvertiseServiceEnvelope {
  op: 'advertise_service';
  service: string;
  type: string;
}

export interface UnadvertiseServiceEnvelope {
  op: 'unadvertise_service';
  service: string;
  type: string;
}

export interface SendActionGoalEnvelope {
  op: 'send_action_goal';
  id: string;
  action: string;
  action_type: string;
  args: Message;
  feedback: boolean;
}

export interface CancelActionGoalEnvelope {
  op: 'cancel_action_goal';
  id: string;
  action: string;
  args: Message;
}

export interface SetLevelEnvelope {
  op: 'set_level';
  id: string;
  level: string;
}

export type OutboundEnvelope =
  | SubscribeEnvelope
  | UnsubscribeEnvelope
  | PublishEnvelope
  | AdvertiseEnvelope
  | UnadvertiseEnvelope
  | CallServiceEnvelope
  | ServiceResponseEnvelope
  | AdvertiseServiceEnvelope
  | UnadvertiseServiceEnvelope
  | SendActionGoalEnvelope
  | CancelActionGoalEnvelope
  | SetLevelEnvelope;

// --- Inbound envelopes ---

export const PublishMessageSchema = z.object({
  op: z.literal('publish'),
  id: z.string().optional(),
  topic: z.string(),
  msg: z.record(z.unknown()),
}).passthrough();

export const ServiceResponseMessageSchema = z.object({
  op: z.literal('service_response'),
  id: z.string(),
  service: z.string(),
  values: z.unknown(),
  result: z.boolean().optional(),
}).passthrough();

export const CallServiceMessageSchema = z.object({
  op: z.literal('call_service'),
  id: z.string().optional(),
  service: z.string(),
  args: z.record(z.unknown()).optional().default({}),
}).passthrough();

export const ActionFeedbackMessageSchema = z.object({
  op: z.literal('action_feedback'),
  id: z.string(),
  action: z.string(),
  values: z.unknown(),
}).passthrough();

export const ActionResultMessageSchema = z.object({
  op: z.literal('action_result'),
  id: z.string(),
  action: z.string(),
  values: z.unknown(),
  status: z.number().int(),
  result: z.boolean().optional(),
}).passthrough();

export const StatusMessageSchema = z.object({
  op: z.literal('status'),
  id: z.string().optional(),
  level: z.string().optional(),
  msg: z.string().optional(),
}).passthrough();

export const InboundEnvelopeSchema = z.discriminatedUnion('op', [
  PublishMessageSchema,
  ServiceResponseMessageSchema,
  CallServiceMessageSchema,
  ActionFeedbackMessageSchema,
  ActionResultMessageSchema,
  StatusMessageSchema,
]);

export type InboundEnvelope = z.infer<typeof InboundEnvelopeSchema>;
export type InboundOp = InboundEnvelope['op'];
export type CallServiceMessage = z.infer<typeof CallServiceMessageSchema>;
export type StatusMessage = z.infer<typeof StatusMessageSchema>;

const INBOUND_OPS: ReadonlySet<string> = new Set<InboundOp>([
  'publish',
  'service_response',
  'call_service',
  'action_feedback',
  'action_result',
  'status',
]);

// --- Codec ---

/** Serialize one envelope into the text of one WebSocket frame. */
export function encodeEnvelope(envelope: OutboundEnvelope | Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Decode the text of one frame into an envelope.
 * @throws ProtocolError when the text is not a JSON object with a string `op`
 */
export function decodeEnvelope(text: string): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`Malformed JSON frame: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProtocolError('Frame is not a JSON object');
  }
  if (!('op' in parsed) || typeof parsed.op !== 'string') {
    throw new ProtocolError('Frame has no "op" field');
  }
  return { ...parsed, op: parsed.op };
}

/**
 * Validate a decoded envelope against the inbound operation it claims to be.
 * @throws UnhandledOperationError for an op the client has no handler for
 * @throws ProtocolError when required fields are missing or mistyped
 */
export function parseInbound(envelope: Envelope): InboundEnvelope {
  if (!INBOUND_OPS.has(envelope.op)) {
    throw new UnhandledOperationError(envelope.op);
  }

  const result = InboundEnvelopeSchema.safeParse(envelope);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError(`Invalid "${envelope.op}" message: ${issues}`, envelope.op);
  }
  return result.data;
}
