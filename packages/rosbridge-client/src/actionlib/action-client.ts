/**
 * Client of an actionlib action server, over the server's five topics.
 */

import { EventBus, type EventListener } from '../core/event-bus.js';
import { Topic } from '../core/topic.js';
import type { Ros } from '../ros.js';
import { Logger } from '../utils/logger.js';
import type { Goal } from './goal.js';
import { ActionFeedbackSchema, ActionResultSchema, GoalStatusArraySchema } from './goal-status.js';

export interface ActionClientOptions {
  /** Emit `timeout` when no status message arrived within this window. */
  timeoutMs?: number;
  omitFeedback?: boolean;
  omitStatus?: boolean;
  omitResult?: boolean;
  logger?: Logger;
}

export class ActionClient {
  readonly logger: Logger;
  readonly goalTopic: Topic;
  readonly cancelTopic: Topic;

  private readonly statusListener: Topic;
  private readonly feedbackListener: Topic;
  private readonly resultListener: Topic;
  private readonly omitStatus: boolean;
  private readonly omitFeedback: boolean;
  private readonly omitResult: boolean;
  private readonly goals = new Map<string, Goal>();
  private readonly events: EventBus;
  private receivedStatus = false;

  constructor(
    readonly ros: Ros,
    readonly serverName: string,
    readonly actionName: string,
    options: ActionClientOptions = {}
  ) {
    this.logger = options.logger ?? ros.logger.child('ActionClient');
    this.events = new EventBus(this.logger.child('EventBus'));
    this.omitStatus = options.omitStatus ?? false;
    this.omitFeedback = options.omitFeedback ?? false;
    this.omitResult = options.omitResult ?? false;

    const topicLogger = this.logger.child('Topic');
    this.goalTopic = new Topic(ros, `${serverName}/goal`, `${actionName}Goal`, { logger: topicLogger });
    this.cancelTopic = new Topic(ros, `${serverName}/cancel`, 'actionlib_msgs/GoalID', { logger: topicLogger });
    this.statusListener = new Topic(ros, `${serverName}/status`, 'actionlib_msgs/GoalStatusArray', { logger: topicLogger });
    this.feedbackListener = new Topic(ros, `${serverName}/feedback`, `${actionName}Feedback`, { logger: topicLogger });
    this.resultListener = new Topic(ros, `${serverName}/result`, `${actionName}Result`, { logger: topicLogger });

    this.goalTopic.advertise();
    this.cancelTopic.advertise();

    if (!this.omitStatus) this.statusListener.subscribe(message => this.onStatusMessage(message));
    if (!this.omitFeedback) this.feedbackListener.subscribe(message => this.onFeedbackMessage(message));
    if (!this.omitResult) this.resultListener.subscribe(message => this.onResultMessage(message));

    const { timeoutMs } = options;
    if (timeoutMs !== undefined) {
      ros.callLater(timeoutMs, () => {
        if (!this.receivedStatus) this.emit('timeout');
      });
    }
  }

  addGoal(goal: Goal): void {
    this.goals.set(goal.goalId, goal);
  }

  /** Ids of the goals still waiting for their outcome. */
  get goalIds(): string[] {
    return [...this.goals.keys()];
  }

  /** Cancel every goal on the server. */
  cancel(): void {
    this.cancelTopic.publish({ stamp: { secs: 0, nsecs: 0 }, id: '' });
  }

  /** Release the action topics and forget every goal. */
  dispose(): void {
    this.goals.clear();
    this.goalTopic.dispose();
    this.cancelTopic.dispose();
    this.statusListener.dispose();
    this.feedbackListener.dispose();
    this.resultListener.dispose();
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

  private onStatusMessage(message: unknown): void {
    const parsed = GoalStatusArraySchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed status message', { server: this.serverName });
      return;
    }

    this.receivedStatus = true;
    for (const status of parsed.data.status_list) {
      const goal = this.goals.get(status.goal_id.id);
      if (!goal) continue;
      goal.updateStatus(status);
      this.forgetIfFinished(goal);
    }
  }

  private onFeedbackMessage(message: unknown): void {
    const parsed = ActionFeedbackSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed feedback message', { server: this.serverName });
      return;
    }

    const { status, feedback } = parsed.data;
    this.goals.get(status.goal_id.id)?.updateFeedback(status, feedback);
  }

  private onResultMessage(message: unknown): void {
    const parsed = ActionResultSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn('Malformed result message', { server: this.serverName });
      return;
    }

    const { status, result } = parsed.data;
    const goal = this.goals.get(status.goal_id.id);
    if (!goal) return;
    goal.updateResult(status, result);
    this.forgetIfFinished(goal);
  }

  private forgetIfFinished(goal: Goal): void {
    if (goal.isFinished) this.goals.delete(goal.goalId);
  }
}
