/**
 * One goal sent through an actionlib `ActionClient`.
 */

import { randomUUID } from 'crypto';
import { EventBus, type EventListener } from '../core/event-bus.js';
import type { Message } from '../core/message.js';
import { GoalTimeoutError } from '../errors.js';
import type { ActionClient } from './action-client.js';
import { isActiveStatus, type ActionGoalMessage, type GoalStatusMessage } from './goal-status.js';

/**
 * Emits `status`, `feedback` and `result` as the server reports progress,
 * and `timeout` when `send` was given a deadline that passed unfinished.
 *
 * A goal is finished once a result arrived and its status is no longer
 * active. Messages for a finished goal are ignored.
 */
export class Goal {
  readonly goalId: string;
  readonly goalMessage: ActionGoalMessage;

  status: GoalStatusMessage | null = null;
  feedback: unknown = null;
  result: unknown = null;

  private hasResult = false;
  private readonly events: EventBus;

  constructor(private readonly client: ActionClient, goal: Message) {
    this.goalId = `goal_${randomUUID()}`;
    this.goalMessage = {
      goal_id: { stamp: { secs: 0, nsecs: 0 }, id: this.goalId },
      goal,
    };
    this.events = new EventBus(client.logger.child('Goal'));
    client.addGoal(this);
  }

  get isFinished(): boolean {
    return this.hasResult && (this.status === null || !isActiveStatus(this.status.status));
  }

  /**
   * Publish the goal. With `timeoutMs`, emits `timeout` if the goal is still
   * unfinished at the deadline; the goal itself is not cancelled.
   */
  send(resultCallback?: (result: unknown) => void, timeoutMs?: number): void {
    if (resultCallback) {
      this.on('result', result => resultCallback(result));
    }

    this.client.goalTopic.publish(this.goalMessage);

    if (timeoutMs !== undefined) {
      this.client.ros.callLater(timeoutMs, () => {
        if (!this.isFinished) this.emit('timeout');
      });
    }
  }

  cancel(): void {
    this.client.cancelTopic.publish({ stamp: { secs: 0, nsecs: 0 }, id: this.goalId });
  }

  /** Resolve with the result once finished; reject with `GoalTimeoutError` at the deadline. */
  wait(timeoutMs?: number): Promise<unknown> {
    return new Promise((resolve, reject) => {
      if (this.isFinished) {
        resolve(this.result);
        return;
      }

      let timer: ReturnType<typeof setTimeout> | undefined;
      const cleanup = () => {
        clearTimeout(timer);
        this.off('status', check);
        this.off('result', check);
      };
      const check: EventListener = () => {
        if (!this.isFinished) return;
        cleanup();
        resolve(this.result);
      };

      this.on('status', check);
      this.on('result', check);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new GoalTimeoutError(this.goalId, timeoutMs));
        }, timeoutMs);
      }
    });
  }

  // --- Updates routed by the action client ---

  updateStatus(status: GoalStatusMessage): void {
    if (this.isFinished) return;
    this.status = status;
    this.emit('status', status);
  }

  updateFeedback(status: GoalStatusMessage, feedback: unknown): void {
    if (this.isFinished) return;
    this.updateStatus(status);
    this.feedback = feedback;
    this.emit('feedback', feedback);
  }

  updateResult(status: GoalStatusMessage, result: unknown): void {
    if (this.isFinished) return;
    this.updateStatus(status);
    this.result = result;
    this.hasResult = true;
    this.emit('result', result);
  }

  // --- Events ---

  on(event: string, listener: EventListener): () => void {
    return this.events.on(event, listener);
  }

  once(event: string, listener: EventListener): () => void {
    return this.events.once(event, listener);
  }

  off(event: string, listener?: EventListener): void {
    this.events.off(event, listener);
  }

  emit(event: string, ...args: unknown[]): boolean {
    return this.events.emit(event, ...args);
  }
}
