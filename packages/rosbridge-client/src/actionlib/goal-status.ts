/**
 * actionlib_msgs types shared by the action client and the action server.
 */

import { z } from 'zod';

export const GoalStatus = {
  PENDING: 0,
  ACTIVE: 1,
  PREEMPTED: 2,
  SUCCEEDED: 3,
  ABORTED: 4,
  REJECTED: 5,
  PREEMPTING: 6,
  RECALLING: 7,
  RECALLED: 8,
  LOST: 9,
} as const;

export type GoalStatusCode = (typeof GoalStatus)[keyof typeof GoalStatus];

const ACTIVE_STATES: ReadonlySet<number> = new Set<number>([
  GoalStatus.PENDING,
  GoalStatus.ACTIVE,
  GoalStatus.PREEMPTING,
  GoalStatus.RECALLING,
]);

/** Whether a goal in this state may still produce a result. */
export function isActiveStatus(status: number): boolean {
  return ACTIVE_STATES.has(status);
}

export const StampSchema = z.object({
  secs: z.number().int(),
  nsecs: z.number().int(),
});

export const GoalIdSchema = z.object({
  stamp: StampSchema.default({ secs: 0, nsecs: 0 }),
  id: z.string().default(''),
}).passthrough();

export const GoalStatusMessageSchema = z.object({
  goal_id: GoalIdSchema,
  status: z.number().int(),
  text: z.string().optional(),
}).passthrough();

export const GoalStatusArraySchema = z.object({
  status_list: z.array(GoalStatusMessageSchema),
}).passthrough();

export const ActionFeedbackSchema = z.object({
  status: GoalStatusMessageSchema,
  feedback: z.unknown(),
}).passthrough();

export const ActionResultSchema = z.object({
  status: GoalStatusMessageSchema,
  result: z.unknown(),
}).passthrough();

export const ActionGoalSchema = z.object({
  goal_id: GoalIdSchema,
  goal: z.record(z.unknown()),
}).passthrough();

export type GoalIdMessage = z.infer<typeof GoalIdSchema>;
export type GoalStatusMessage = z.infer<typeof GoalStatusMessageSchema>;
export type ActionGoalMessage = z.infer<typeof ActionGoalSchema>;
