/**
 * actionlib server that executes one goal at a time.
 */

import { ACTION_STATUS_INTERVAL_MS } from '../constants.js';
import { EventBus, type EventListener } from '../core/event-bus.js';
import { createHeader, isMessage, type Message } from '../core/message.js';
import { Time } from '../core/time.js';
import { Topic } from '../core/topic.js';
import type { Ros } from '../ros.js';
import { Logger, describeError } from '../utils/logger.js';
import {
  ActionGoalSchema,
  GoalIdSchema,
  GoalStatus,
  type ActionGoalMessage,
  type GoalIdMessage,
  type GoalStatusCode,
  type GoalStatusMessage,
} from './goal-status.js';

export type ExecuteCallback = (goal: Message) => void | Promise<void>;

/**
 * Holds at most one current goal and one next goal. A goal that arrives
 * while another executes becomes the next goal and requests preemption of
 * the current one (`cancel` event); the executor notices through
 * `isPreemptRequested()` and ends the current goal, which promotes the next
 * one (`goal` event).
 */
export class SimpleActionServer {
  private readonly logger: Logger;
  private readonly events: EventBus;
  private readonly statusPublisher: Topic;
  private readonly feedbackPublisher: Topic;
  private readonly resultPublisher: Topic;
  private readonly goalListener: Topic;
  private readonly cancelListener: Topic;

  private currentGoal: ActionGoalMessage | null = null;
  private nextGoal: ActionGoalMessage | null = null;
  private preemptRequested = false;
  private statusList: GoalStatusMessage[] = [];
  private stopStatusLoop: (() => void) | null = null;
  private detachExecutor: Array<() => void> = [];

  constructor(
    private readonly ros: Ros,
    readonly serverName: string,
    readonly actionName: string,
    logger?: Logger
  ) {
    this.logger = logger ?? ros.logger.child('SimpleActionServer');
    this.events = new EventBus(this.logger.child('EventBus'));

    const topicLogger = this.logger.child('Topic');
    this.statusPublisher = new Topic(ros, `${serverName}/status`, 'actionlib_msgs/GoalStatusArray', { logger: topicLogger });
    this.feedbackPublisher = new Topic(ros, `${serverName}/feedback`, `${actionName}Feedback`, { logger: topicLogger });
    this.resultPublisher = new Topic(ros, `${serverName}/result`, `${actionName}Result`, { logger: topicLogger });
    this.goalListener = new Topic(ros, `${serverName}/goal`, `${actionName}Goal`, { logger: topicLogger });
    this.cancelListener = new Topic(ros, `${serverName}/cancel`, 'actionlib_msgs/GoalID', { logger: topicLogger });

    this.statusPublisher.advertise();
    this.feedbackPublisher.advertise();
    this.resultPublisher.advertise();

    this.goalListener.subscribe(message => this.onGoalMessage(message));
    this.cancelListener.subscribe(message => this.onCancelMessage(message));
  }

  /**
   * Run `execute` for every goal that becomes current, and publish the goal
   * status array every 500ms. Calling again replaces the executor.
   */
  start(execute: ExecuteCallback): void {
    for (const detach of this.detachExecutor.splice(0)) detach();
    this.detachExecutor.push(
      this.on('goal', goal => {
        this.preemptRequested = false;
        if (isMessage(goal)) this.runExecute(execute, goal);
      }),
      this.on('cancel', () => {
        this.preemptRequested = true;
      })
    );

    if (!this.stopStatusLoop) this.scheduleStatus();
  }

  isPreemptRequested(): boolean {
    return this.preemptRequested;
  }

  get hasCurrentGoal(): boolean {
    return this.currentGoal !== null;
  }

  sendFeedback(feedback: Message): void {
    if (!this.currentGoal) {
      this.logger.warn('Feedback without a current goal', { server: this.serverName });
      return;
    }
    this.feedbackPublisher.publish({
      status: { goal_id: this.currentGoal.goal_id, status: GoalStatus.ACTIVE },
      feedback,
    });
  }

  setSucceeded(result: Message): void {
    this.finishCurrent(GoalStatus.SUCCEEDED, result);
  }

  setPreempted(): void {
    this.finishCurrent(GoalStatus.PREEMPTED, {});
  }

  setAborted(result: Message = {}): void {
    this.finishCurrent(GoalStatus.ABORTED, result);
  }

  /** Stop the status loop, detach the executor and release the topics. */
  dispose(): void {
    this.stopStatusLoop?.();
    this.stopStatusLoop = null;
    for (const detach of this.detachExecutor.splice(0)) detach();

    this.goalListener.dispose();
    this.cancelListener.dispose();
    this.statusPublisher.dispose();
    this.feedbackPublisher.dispose();
    this.resultPublisher.dispose();
  }

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

  // --- Internals ---

  private onGoalMessage(message: unknown): void {
    const parsed = ActionGoalSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed goal message', { server: this.serverName });
      return;
    }
    const goal = parsed.data;

    if (this.currentGoal) {
      this.nextGoal = goal;
      this.emit('cancel');
      return;
    }

    this.makeCurrent(goal);
  }

  private onCancelMessage(message: unknown): void {
    const parsed = GoalIdSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed cancel message', { server: this.serverName });
      return;
    }
    const cancel = parsed.data;
    const stampIsZero = Time.fromStamp(cancel.stamp).isZero();

    if (cancel.id === '' && stampIsZero) {
      this.nextGoal = null;
      if (this.currentGoal) this.emit('cancel');
      return;
    }

    let cancelCurrent = false;

    if (cancel.id !== '') {
      if (this.currentGoal && this.currentGoal.goal_id.id === cancel.id) {
        cancelCurrent = true;
      } else if (this.nextGoal && this.nextGoal.goal_id.id === cancel.id) {
        this.nextGoal = null;
      }
    }

    if (!stampIsZero) {
      if (this.nextGoal && isNotLaterThan(this.nextGoal.goal_id, cancel)) {
        this.nextGoal = null;
      }
      if (this.currentGoal && isNotLaterThan(this.currentGoal.goal_id, cancel)) {
        cancelCurrent = true;
      }
    }

    if (cancelCurrent) this.emit('cancel');
  }

  private makeCurrent(goal: ActionGoalMessage): void {
    this.currentGoal = goal;
    this.statusList = [{ goal_id: goal.goal_id, status: GoalStatus.ACTIVE }];
    this.emit('goal', goal.goal);
  }

  private finishCurrent(status: GoalStatusCode, result: Message): void {
    const current = this.currentGoal;
    if (!current) {
      this.logger.warn('No current goal to finish', { server: this.serverName, status });
      return;
    }

    this.resultPublisher.publish({
      status: { goal_id: current.goal_id, status },
      result,
    });

    const next = this.nextGoal;
    this.nextGoal = null;
    if (next) {
      this.makeCurrent(next);
    } else {
      this.currentGoal = null;
      this.statusList = [];
    }
  }

  private runExecute(execute: ExecuteCallback, goal: Message): void {
    const current = this.currentGoal;
    const abortOnFailure = (err: unknown) => {
      this.logger.error('Goal execution failed', { server: this.serverName, ...describeError(err) });
      if (current !== null && this.currentGoal === current) this.setAborted();
    };

    try {
      const outcome = execute(goal);
      if (outcome instanceof Promise) outcome.catch(abortOnFailure);
    } catch (err) {
      abortOnFailure(err);
    }
  }

  private scheduleStatus(): void {
    this.stopStatusLoop = this.ros.callLater(ACTION_STATUS_INTERVAL_MS, () => {
      this.publishStatus();
      this.scheduleStatus();
    });
  }

  private publishStatus(): void {
    this.statusPublisher.publish({
      header: createHeader({ stamp: Time.now() }),
      status_list: this.statusList,
    });
  }
}

function isNotLaterThan(goal: GoalIdMessage, cancel: GoalIdMessage): boolean {
  return Time.compare(goal.stamp, cancel.stamp) <= 0;
}
