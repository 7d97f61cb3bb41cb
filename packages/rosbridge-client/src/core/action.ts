/**
 * ROS 2 action client speaking the bridge's native action operations
 * (`send_action_goal`, `cancel_action_goal`).
 */

import type { ActionOutcome } from '../bridge/dispatcher.js';
import { requestId } from '../bridge/protocol.js';
import { ActionError, GoalTimeoutError, RosBridgeError } from '../errors.js';
import type { Ros } from '../ros.js';
import type { Logger } from '../utils/logger.js';
import type { Message } from './message.js';

export { ActionGoalStatus, actionGoalStatusName } from './action-status.js';
export type { ActionGoalStatusCode, ActionGoalStatusName } from './action-status.js';
export type { ActionOutcome } from '../bridge/dispatcher.js';

export type ActionResultCallback = (result: ActionOutcome) => void;
export type ActionFeedbackCallback = (feedback: unknown) => void;
export type ActionErrback = (error: unknown) => void;

export interface SendGoalOptions {
  feedback?: ActionFeedbackCallback;
  /** Reject with `GoalTimeoutError` when no result arrived in time. */
  timeoutMs?: number;
}

export class Action {
  private readonly logger: Logger;

  constructor(
    private readonly ros: Ros,
    readonly name: string,
    readonly actionType: string,
    logger?: Logger
  ) {
    this.logger = logger ?? ros.logger.child('Action');
  }

  /**
   * Send a goal. Feedback is only requested from the bridge when a feedback
   * callback is given. Returns the goal id used by `cancelGoal`.
   */
  sendGoal(
    goal: Message,
    resultback: ActionResultCallback,
    feedback?: ActionFeedbackCallback,
    errback?: ActionErrback
  ): string {
    const id = requestId('send_action_goal', this.name, this.ros.nextId());

    this.ros.sendActionGoal(
      {
        op: 'send_action_goal',
        id,
        action: this.name,
        action_type: this.actionType,
        args: goal,
        feedback: feedback !== undefined,
      },
      resultback,
      feedback,
      errback ?? (error => this.logger.warn('Action goal failed', { action: this.name, id, result: error }))
    );
    return id;
  }

  /** Send a goal and resolve with its result; a failed goal rejects with `ActionError`. */
  sendGoalAsync(goal: Message, options: SendGoalOptions = {}): Promise<ActionOutcome> {
    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const id = this.sendGoal(
        goal,
        result => {
          clearTimeout(timer);
          resolve(result);
        },
        options.feedback,
        error => {
          clearTimeout(timer);
          reject(error instanceof RosBridgeError ? error : new ActionError(this.name, error));
        }
      );

      const { timeoutMs } = options;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.ros.abandonActionGoal(id);
          reject(new GoalTimeoutError(id, timeoutMs));
        }, timeoutMs);
      }
    });
  }

  cancelGoal(goalId: string): void {
    this.ros.cancelActionGoal({
      op: 'cancel_action_goal',
      id: goalId,
      action: this.name,
      args: {},
    });
  }
}
