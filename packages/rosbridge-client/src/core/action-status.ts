/**
 * Status codes the bridge reports in `action_result` for ROS 2 actions
 * (action_msgs/GoalStatus).
 */

export const ActionGoalStatus = {
  UNKNOWN: 0,
  ACCEPTED: 1,
  EXECUTING: 2,
  CANCELING: 3,
  SUCCEEDED: 4,
  CANCELED: 5,
  ABORTED: 6,
} as const;

export type ActionGoalStatusName = keyof typeof ActionGoalStatus;
export type ActionGoalStatusCode = (typeof ActionGoalStatus)[ActionGoalStatusName];

// Indexed by code
const STATUS_NAMES: readonly ActionGoalStatusName[] = [
  'UNKNOWN',
  'ACCEPTED',
  'EXECUTING',
  'CANCELING',
  'SUCCEEDED',
  'CANCELED',
  'ABORTED',
];

/** Codes outside the enumeration map to UNKNOWN. */
export function actionGoalStatusName(code: number): ActionGoalStatusName {
  if (!Number.isInteger(code) || code < 0 || code >= STATUS_NAMES.length) {
    return 'UNKNOWN';
  }
  return STATUS_NAMES[code];
}
