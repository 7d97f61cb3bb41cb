import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Topic } from './topic.js';
import { Ros } from '../ros.js';
import { ValidationError } from '../errors.js';
import { FakeBridge, silentLogger } from '../testing/fake-transport.js';

describe('Topic', () => {
  let bridge: FakeBridge;
  let ros: Ros;

  beforeEach(() => {
    bridge = new FakeBridge();
    ros = new Ros({ transportFactory: bridge.factory, logger: silentLogger(), reconnectIntervalMs: 100 });
    ros.connect();
    bridge.current.accept();
  });

  afterEach(() => {
    ros.terminate();
    vi.useRealTimers();
  });

  describe('subscribe', () => {
    it('delivers a published message to the callback exactly once', () => {
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      const callback = vi.fn();
      topic.subscribe(callback);

      expect(bridge.current.frames).toEqual([{
        op: 'subscribe',
        id: 'subscribe:/chatter:1',
        type: 'std_msgs/String',
        topic: '/chatter',
        compression: 'none',
        throttle_rate: 0,
        queue_length: 0,
      }]);

      bridge.current.receive({ op: 'publish', topic: '/chatter', msg: { data: 'hi' } });
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith({ data: 'hi' });
    });

    it('passes the subscription options to the bridge', () => {
      const topic = new Topic(ros, '/camera/image', 'sensor_msgs/Image', {
        compression: 'png',
        throttleRate: 100,
        queueLength: 5,
      });
      topic.subscribe(vi.fn());

      expect(bridge.current.lastFrame).toMatchObject({ compression: 'png', throttle_rate: 100, queue_length: 5 });
    });

    it('is idempotent while subscribed', () => {
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      const first = vi.fn();
      const second = vi.fn();
      topic.subscribe(first);
      topic.subscribe(second);

      bridge.current.receive({ op: 'publish', topic: '/chatter', msg: { data: 'hi' } });
      expect(bridge.current.framesOf('subscribe')).toHaveLength(1);
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
      expect(topic.isSubscribed).toBe(true);
    });

    it('waits for the connection before subscribing', () => {
      const offline = new Ros({ transportFactory: bridge.factory, logger: silentLogger() });
      new Topic(offline, '/chatter', 'std_msgs/String').subscribe(vi.fn());

      offline.connect();
      bridge.current.accept();
      expect(bridge.current.framesOf('subscribe')).toHaveLength(1);
      offline.terminate();
    });
  });

  describe('unsubscribe', () => {
    it('stops delivery and tells the bridge once', () => {
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      const callback = vi.fn();
      topic.subscribe(callback);

      topic.unsubscribe();
      topic.unsubscribe();
      bridge.current.receive({ op: 'publish', topic: '/chatter', msg: { data: 'late' } });

      expect(bridge.current.framesOf('unsubscribe')).toEqual([
        { op: 'unsubscribe', id: 'subscribe:/chatter:1', topic: '/chatter' },
      ]);
      expect(callback).not.toHaveBeenCalled();
      expect(topic.isSubscribed).toBe(false);
    });

    it('leaves other listeners of the same topic in place', () => {
      const other = vi.fn();
      ros.on('/chatter', other);
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      topic.subscribe(vi.fn());

      topic.unsubscribe();
      bridge.current.receive({ op: 'publish', topic: '/chatter', msg: { data: 'still here' } });
      expect(other).toHaveBeenCalledWith({ data: 'still here' });
    });

    it('can subscribe again with a fresh id', () => {
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      topic.subscribe(vi.fn());
      topic.unsubscribe();
      topic.subscribe(vi.fn());

      expect(bridge.current.framesOf('subscribe').map(frame => frame.id)).toEqual([
        'subscribe:/chatter:1',
        'subscribe:/chatter:2',
      ]);
    });
  });

  describe('publish', () => {
    it('advertises before the first message', () => {
      const topic = new Topic(ros, '/cmd_vel', 'geometry_msgs/Twist');
      topic.publish({ linear: { x: 0.5, y: 0, z: 0 } });
      topic.publish({ linear: { x: 0, y: 0, z: 0 } });

      expect(bridge.current.frames).toEqual([
        { op: 'advertise', id: 'advertise:/cmd_vel:1', type: 'geometry_msgs/Twist', topic: '/cmd_vel', latch: false, queue_size: 100 },
        { op: 'publish', id: 'publish:/cmd_vel:2', topic: '/cmd_vel', msg: { linear: { x: 0.5, y: 0, z: 0 } }, latch: false },
        { op: 'publish', id: 'publish:/cmd_vel:3', topic: '/cmd_vel', msg: { linear: { x: 0, y: 0, z: 0 } }, latch: false },
      ]);
      expect(topic.isAdvertised).toBe(true);
    });

    it('carries latch and queue size', () => {
      const topic = new Topic(ros, '/map', 'nav_msgs/OccupancyGrid', { latch: true, queueSize: 1 });
      topic.publish({});
      expect(bridge.current.frames[0]).toMatchObject({ latch: true, queue_size: 1 });
      expect(bridge.current.frames[1]).toMatchObject({ latch: true });
    });

    it('unadvertise tells the bridge once', () => {
      const topic = new Topic(ros, '/cmd_vel', 'geometry_msgs/Twist');
      topic.advertise();
      topic.unadvertise();
      topic.unadvertise();

      expect(bridge.current.framesOf('unadvertise')).toEqual([
        { op: 'unadvertise', id: 'advertise:/cmd_vel:1', topic: '/cmd_vel' },
      ]);
    });
  });

  it('rejects an unsupported compression', () => {
    expect(() => new Topic(ros, '/x', 'std_msgs/String', { compression: 'jpeg' })).toThrow(ValidationError);
    expect(() => new Topic(ros, '/x', 'std_msgs/String', { compression: 'jpeg' })).toThrow(
      'Unsupported compression "jpeg", expected one of: none, png'
    );
  });

  describe('after a dropped connection', () => {
    it('subscribes and advertises again with fresh ids', () => {
      vi.useFakeTimers();
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      const callback = vi.fn();
      topic.subscribe(callback);
      topic.advertise();

      bridge.current.drop();
      vi.advanceTimersByTime(100);
      bridge.current.accept();
      vi.advanceTimersByTime(400);

      expect(bridge.transports).toHaveLength(2);
      expect(bridge.current.frames).toEqual([
        {
          op: 'subscribe',
          id: 'subscribe:/chatter:3',
          type: 'std_msgs/String',
          topic: '/chatter',
          compression: 'none',
          throttle_rate: 0,
          queue_length: 0,
        },
        { op: 'advertise', id: 'advertise:/chatter:4', type: 'std_msgs/String', topic: '/chatter', latch: false, queue_size: 100 },
      ]);

      bridge.current.receive({ op: 'publish', topic: '/chatter', msg: { data: 'back' } });
      expect(callback).toHaveBeenCalledWith({ data: 'back' });
    });

    it('subscribe inside the reconnect window sends one subscribe', () => {
      vi.useFakeTimers();
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      topic.subscribe(vi.fn());

      bridge.current.drop();
      topic.unsubscribe();
      topic.subscribe(vi.fn());
      vi.advanceTimersByTime(100);
      bridge.current.accept();
      vi.advanceTimersByTime(400);

      expect(bridge.current.framesOf('subscribe').map(frame => frame.id)).toEqual(['subscribe:/chatter:2']);

      topic.unsubscribe();
      expect(bridge.current.framesOf('unsubscribe').map(frame => frame.id)).toEqual([
        'subscribe:/chatter:1',
        'subscribe:/chatter:2',
      ]);
    });

    it('advertise inside the reconnect window sends one advertise', () => {
      vi.useFakeTimers();
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      topic.advertise();

      bridge.current.drop();
      topic.unadvertise();
      topic.advertise();
      vi.advanceTimersByTime(100);
      bridge.current.accept();
      vi.advanceTimersByTime(400);

      expect(bridge.current.framesOf('advertise').map(frame => frame.id)).toEqual(['advertise:/chatter:2']);
    });

    it('does nothing when reconnectOnClose is off', () => {
      vi.useFakeTimers();
      const topic = new Topic(ros, '/chatter', 'std_msgs/String', { reconnectOnClose: false });
      topic.subscribe(vi.fn());

      bridge.current.drop();
      vi.advanceTimersByTime(100);
      bridge.current.accept();
      vi.advanceTimersByTime(1000);

      expect(bridge.current.sent).toEqual([]);
    });

    it('does nothing once disposed', () => {
      vi.useFakeTimers();
      const topic = new Topic(ros, '/chatter', 'std_msgs/String');
      topic.subscribe(vi.fn());
      topic.dispose();

      bridge.current.drop();
      vi.advanceTimersByTime(100);
      bridge.current.accept();
      vi.advanceTimersByTime(1000);

      expect(bridge.transports[0]?.framesOf('unsubscribe')).toHaveLength(1);
      expect(bridge.current.sent).toEqual([]);
    });
  });
});
