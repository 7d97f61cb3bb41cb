import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ActionClient } from './action-client.js';
import { Goal } from './goal.js';
import { GoalStatus } from './goal-status.js';
import { Ros } from '../ros.js';
import { GoalTimeoutError } from '../errors.js';
import { FakeBridge, silentLogger } from '../testing/fake-transport.js';

function status(goalId: string, code: number) {
  return { goal_id: { stamp: { secs: 0, nsecs: 0 }, id: goalId }, status: code, text: '' };
}

describe('ActionClient', () => {
  let bridge: FakeBridge;
  let ros: Ros;
  let client: ActionClient;

  beforeEach(() => {
    bridge = new FakeBridge();
    ros = new Ros({ transportFactory: bridge.factory, logger: silentLogger() });
    ros.connect();
    bridge.current.accept();
    client = new ActionClient(ros, '/fibonacci', 'actionlib_tutorials/Fibonacci');
  });

  afterEach(() => {
    ros.terminate();
    vi.useRealTimers();
  });

  it('advertises goal and cancel, and listens on status, feedback and result', () => {
    expect(bridge.current.framesOf('advertise').map(frame => [frame.topic, frame.type])).toEqual([
      ['/fibonacci/goal', 'actionlib_tutorials/FibonacciGoal'],
      ['/fibonacci/cancel', 'actionlib_msgs/GoalID'],
    ]);
    expect(bridge.current.framesOf('subscribe').map(frame => [frame.topic, frame.type])).toEqual([
      ['/fibonacci/status', 'actionlib_msgs/GoalStatusArray'],
      ['/fibonacci/feedback', 'actionlib_tutorials/FibonacciFeedback'],
      ['/fibonacci/result', 'actionlib_tutorials/FibonacciResult'],
    ]);
  });

  it('skips the listeners it is told to omit', () => {
    const quiet = new ActionClient(ros, '/dock', 'robot/Dock', { omitFeedback: true, omitStatus: true });
    const topics = bridge.current.framesOf('subscribe').map(frame => frame.topic);
    expect(topics).toContain('/dock/result');
    expect(topics).not.toContain('/dock/status');
    expect(topics).not.toContain('/dock/feedback');
    quiet.dispose();
  });

  it('cancel publishes an empty goal id', () => {
    client.cancel();
    expect(bridge.current.lastFrame).toMatchObject({
      op: 'publish',
      topic: '/fibonacci/cancel',
      msg: { stamp: { secs: 0, nsecs: 0 }, id: '' },
    });
  });

  it('emits timeout when no status arrives in time', () => {
    vi.useFakeTimers();
    const slow = new ActionClient(ros, '/slow', 'robot/Slow', { timeoutMs: 1000 });
    const onTimeout = vi.fn();
    slow.on('timeout', onTimeout);

    vi.advanceTimersByTime(1000);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('does not emit timeout once a status arrived', () => {
    vi.useFakeTimers();
    const watched = new ActionClient(ros, '/watched', 'robot/Watched', { timeoutMs: 1000 });
    const onTimeout = vi.fn();
    watched.on('timeout', onTimeout);

    bridge.current.receive({ op: 'publish', topic: '/watched/status', msg: { status_list: [] } });
    vi.advanceTimersByTime(1000);
    expect(onTimeout).not.toHaveBeenCalled();
  });

  describe('Goal', () => {
    it('publishes the goal with its id', () => {
      const goal = new Goal(client, { order: 5 });
      goal.send();

      expect(goal.goalId).toMatch(/^goal_[0-9a-f-]{36}$/);
      expect(bridge.current.lastFrame).toMatchObject({
        op: 'publish',
        topic: '/fibonacci/goal',
        msg: { goal_id: { stamp: { secs: 0, nsecs: 0 }, id: goal.goalId }, goal: { order: 5 } },
      });
    });

    it('is unfinished while active and finished once the result arrives', async () => {
      const goal = new Goal(client, { order: 5 });
      const onResult = vi.fn();
      goal.send(onResult);
      const result = goal.wait();
      expect(client.goalIds).toEqual([goal.goalId]);

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/status',
        msg: { status_list: [status(goal.goalId, GoalStatus.ACTIVE)] },
      });
      expect(goal.status?.status).toBe(GoalStatus.ACTIVE);
      expect(goal.isFinished).toBe(false);

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/feedback',
        msg: { status: status(goal.goalId, GoalStatus.ACTIVE), feedback: { sequence: [0, 1] } },
      });
      expect(goal.feedback).toEqual({ sequence: [0, 1] });

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/result',
        msg: { status: status(goal.goalId, GoalStatus.SUCCEEDED), result: { sequence: [0, 1, 1, 2, 3] } },
      });

      expect(goal.isFinished).toBe(true);
      expect(client.goalIds).toEqual([]);
      expect(onResult).toHaveBeenCalledWith({ sequence: [0, 1, 1, 2, 3] });
      await expect(result).resolves.toEqual({ sequence: [0, 1, 1, 2, 3] });
    });

    it('stays tracked after a result while its status is still active', () => {
      const goal = new Goal(client, { order: 5 });
      goal.send();

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/result',
        msg: { status: status(goal.goalId, GoalStatus.ACTIVE), result: { sequence: [0] } },
      });
      expect(client.goalIds).toEqual([goal.goalId]);

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/status',
        msg: { status_list: [status(goal.goalId, GoalStatus.SUCCEEDED)] },
      });
      expect(goal.isFinished).toBe(true);
      expect(client.goalIds).toEqual([]);
    });

    it('is forgotten when the client is disposed', () => {
      const goal = new Goal(client, { order: 5 });
      goal.send();
      client.dispose();
      expect(client.goalIds).toEqual([]);
    });

    it('ignores messages for other goals', () => {
      const goal = new Goal(client, { order: 5 });
      goal.send();

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/result',
        msg: { status: status('goal_other', GoalStatus.SUCCEEDED), result: {} },
      });
      expect(goal.isFinished).toBe(false);
      expect(goal.status).toBeNull();
    });

    it('ignores updates after it finished', () => {
      const goal = new Goal(client, { order: 1 });
      goal.send();
      const onStatus = vi.fn();

      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/result',
        msg: { status: status(goal.goalId, GoalStatus.ABORTED), result: null },
      });
      goal.on('status', onStatus);
      bridge.current.receive({
        op: 'publish',
        topic: '/fibonacci/status',
        msg: { status_list: [status(goal.goalId, GoalStatus.ACTIVE)] },
      });

      expect(onStatus).not.toHaveBeenCalled();
      expect(goal.status?.status).toBe(GoalStatus.ABORTED);
    });

    it('emits timeout when unfinished at the deadline', () => {
      vi.useFakeTimers();
      const goal = new Goal(client, { order: 5 });
      const onTimeout = vi.fn();
      goal.on('timeout', onTimeout);
      goal.send(undefined, 500);

      vi.advanceTimersByTime(500);
      expect(onTimeout).toHaveBeenCalledTimes(1);
    });

    it('wait rejects with GoalTimeoutError at the deadline', async () => {
      vi.useFakeTimers();
      const goal = new Goal(client, { order: 5 });
      goal.send();
      const assertion = expect(goal.wait(300)).rejects.toThrow(GoalTimeoutError);

      vi.advanceTimersByTime(300);
      await assertion;
    });

    it('cancel publishes its own id', () => {
      const goal = new Goal(client, { order: 5 });
      goal.cancel();
      expect(bridge.current.lastFrame).toMatchObject({
        topic: '/fibonacci/cancel',
        msg: { stamp: { secs: 0, nsecs: 0 }, id: goal.goalId },
      });
    });
  });
});
