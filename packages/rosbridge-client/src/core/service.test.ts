import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Service } from './service.js';
import { Ros } from '../ros.js';
import { ServiceError, ServiceTimeoutError, ValidationError } from '../errors.js';
import { FakeBridge, silentLogger } from '../testing/fake-transport.js';

const nextTurn = () => new Promise<void>(resolve => setImmediate(resolve));

describe('Service', () => {
  let bridge: FakeBridge;
  let ros: Ros;

  beforeEach(() => {
    bridge = new FakeBridge();
    ros = new Ros({ transportFactory: bridge.factory, logger: silentLogger() });
    ros.connect();
    bridge.current.accept();
  });

  afterEach(() => {
    ros.terminate();
    vi.useRealTimers();
  });

  describe('call', () => {
    it('resolves with the response values', async () => {
      const service = new Service(ros, '/add', 'example/AddTwoInts');
      const response = service.call({ a: 2, b: 40 });

      expect(bridge.current.lastFrame).toEqual({
        op: 'call_service',
        id: 'call_service:/add:1',
        service: '/add',
        args: { a: 2, b: 40 },
      });

      bridge.current.receive({
        op: 'service_response',
        id: 'call_service:/add:1',
        service: '/add',
        values: { sum: 42 },
        result: true,
      });
      await expect(response).resolves.toEqual({ sum: 42 });
    });

    it('rejects with the failure payload when result is false', async () => {
      const service = new Service(ros, '/add', 'example/AddTwoInts');
      const response = service.call({ a: 2, b: 40 });

      bridge.current.receive({
        op: 'service_response',
        id: 'call_service:/add:1',
        service: '/add',
        values: { error: 'bad' },
        result: false,
      });

      const error = await response.catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ServiceError);
      expect(error instanceof ServiceError ? error.values : undefined).toEqual({ error: 'bad' });
    });

    it('rejects with ServiceTimeoutError at the deadline', async () => {
      vi.useFakeTimers();
      const service = new Service(ros, '/slow', 'std_srvs/Trigger');
      const response = service.call({}, 250);
      const assertion = expect(response).rejects.toThrow(ServiceTimeoutError);

      vi.advanceTimersByTime(250);
      await assertion;
    });

    it('delivers to callbacks in callback mode', () => {
      const service = new Service(ros, '/add', 'example/AddTwoInts');
      const callback = vi.fn();
      const errback = vi.fn();

      service.call({ a: 1, b: 1 }, callback, errback);
      service.call({ a: 0, b: 0 }, callback, errback);

      bridge.current.receive({ op: 'service_response', id: 'call_service:/add:1', service: '/add', values: { sum: 2 }, result: true });
      bridge.current.receive({ op: 'service_response', id: 'call_service:/add:2', service: '/add', values: 'rejected', result: false });

      expect(callback).toHaveBeenCalledWith({ sum: 2 });
      expect(errback).toHaveBeenCalledWith('rejected');
    });
  });

  describe('advertise', () => {
    it('announces the service and answers requests through the handler', () => {
      const service = new Service(ros, '/add', 'example/AddTwoInts');
      service.advertise((request, response) => {
        response.sum = Number(request.a) + Number(request.b);
        return true;
      });

      expect(bridge.current.lastFrame).toEqual({ op: 'advertise_service', service: '/add', type: 'example/AddTwoInts' });
      expect(service.isAdvertised).toBe(true);

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/add', args: { a: 1, b: 2 } });
      expect(bridge.current.lastFrame).toEqual({
        op: 'service_response',
        id: 'srv:1',
        service: '/add',
        values: { sum: 3 },
        result: true,
      });
    });

    it('reports failure when the handler returns false', () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => false);

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/reset' });
      expect(bridge.current.lastFrame).toEqual({ op: 'service_response', id: 'srv:1', service: '/reset', values: {}, result: false });
    });

    it('reports failure when the handler throws', () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => {
        throw new Error('handler failed');
      });

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/reset' });
      expect(bridge.current.lastFrame).toMatchObject({ op: 'service_response', id: 'srv:1', result: false });
    });

    it('answers after an async handler settles', async () => {
      const service = new Service(ros, '/trigger', 'std_srvs/Trigger');
      service.advertise(async (_request, response) => {
        response.success = true;
        response.message = 'done';
        return true;
      });

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/trigger' });
      await nextTurn();

      expect(bridge.current.lastFrame).toEqual({
        op: 'service_response',
        id: 'srv:1',
        service: '/trigger',
        values: { success: true, message: 'done' },
        result: true,
      });
    });

    it('reports failure when an async handler rejects', async () => {
      const service = new Service(ros, '/trigger', 'std_srvs/Trigger');
      service.advertise(async () => {
        throw new Error('not ready');
      });

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/trigger' });
      await nextTurn();

      expect(bridge.current.lastFrame).toMatchObject({ op: 'service_response', result: false });
    });

    it('omits the id when the request had none', () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => true);

      bridge.current.receive({ op: 'call_service', service: '/reset', args: {} });
      expect(bridge.current.lastFrame).toEqual({ op: 'service_response', service: '/reset', values: {}, result: true });
    });

    it('is idempotent', () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => true);
      service.advertise(() => false);

      expect(bridge.current.framesOf('advertise_service')).toHaveLength(1);
    });

    it('refuses to call a service this client advertises', async () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => true);

      await expect(service.call({})).rejects.toThrow(ValidationError);
      const callback = vi.fn();
      service.call({}, callback);
      expect(callback).not.toHaveBeenCalled();
      expect(bridge.current.framesOf('call_service')).toHaveLength(0);
    });

    it('unadvertise stops answering', () => {
      const service = new Service(ros, '/reset', 'std_srvs/Empty');
      service.advertise(() => true);
      service.unadvertise();

      bridge.current.receive({ op: 'call_service', id: 'srv:1', service: '/reset' });

      expect(bridge.current.lastFrame).toEqual({ op: 'unadvertise_service', service: '/reset', type: 'std_srvs/Empty' });
      expect(service.isAdvertised).toBe(false);
    });
  });
});
