/**
 * @fileoverview Unit tests for broadcast failure handling
 *
 * `propagate` stops at the first failing subscriber and rethrows its error.
 * `isolate` visits everyone and throws one aggregate at the end.
 */

import {
  AggregateNotificationException,
  ISubscriber,
  NotificationException,
  SubjectRegistry,
  SubscriberFailure,
} from '../../../src';
import {
  Delivery,
  MemoryLogger,
  RecordingSubscriber,
  captureThrown,
  failingSubscriber,
} from '../../support/fixtures';

describe('SubjectRegistry failure policies', () => {
  let log: Delivery[];

  beforeEach(() => {
    log = [];
  });

  // ==========================================================================
  // propagate
  // ==========================================================================

  describe('propagate', () => {
    it('should stop at the first failure and rethrow the original error', () => {
      const boom = new Error('boom');
      const registry = new SubjectRegistry({ failurePolicy: 'propagate' });
      registry.register(new RecordingSubscriber('A', log));
      registry.register(failingSubscriber(boom));
      registry.register(new RecordingSubscriber('C', log));

      const thrown = captureThrown(() => registry.notifyAll('m'));

      expect(thrown).toBe(boom);
      expect(log).toEqual([{ to: 'A', message: 'm' }]);
    });

    it('should rethrow non-Error values unchanged', () => {
      const registry = new SubjectRegistry({ failurePolicy: 'propagate' });
      registry.register(failingSubscriber('bad'));

      expect(captureThrown(() => registry.notifyAll('m'))).toBe('bad');
    });

    it('should report the failure to onError before rethrowing', () => {
      const boom = new Error('boom');
      const failing = failingSubscriber(boom);
      const failures: SubscriberFailure<ISubscriber>[] = [];
      const registry = new SubjectRegistry({
        failurePolicy: 'propagate',
        onError: (failure) => failures.push(failure),
      });
      registry.register(new RecordingSubscriber('A', log));
      registry.register(failing);

      expect(() => registry.notifyAll('m')).toThrow('boom');
      expect(failures).toEqual([{ subscriber: failing, index: 1, error: boom }]);
    });

    it('should let the next broadcast start from the beginning again', () => {
      let calls = 0;
      const registry = new SubjectRegistry({ failurePolicy: 'propagate' });
      registry.register({
        receive: () => {
          calls += 1;
          if (calls === 1) throw new Error('first call only');
        },
      });
      registry.register(new RecordingSubscriber('B', log));

      expect(() => registry.notifyAll('one')).toThrow('first call only');
      registry.notifyAll('two');

      expect(log).toEqual([{ to: 'B', message: 'two' }]);
    });
  });

  // ==========================================================================
  // isolate
  // ==========================================================================

  describe('isolate', () => {
    it('should visit every subscriber and aggregate the failures', () => {
      const boom = new Error('boom');
      const registry = new SubjectRegistry({ name: 'orders', failurePolicy: 'isolate' });
      registry.register(new RecordingSubscriber('A', log));
      registry.register(failingSubscriber(boom));
      registry.register(new RecordingSubscriber('C', log));
      registry.register(failingSubscriber('bad'));

      const thrown = captureThrown(() => registry.notifyAll('m'));

      expect(log).toEqual([
        { to: 'A', message: 'm' },
        { to: 'C', message: 'm' },
      ]);
      expect(thrown).toBeInstanceOf(AggregateNotificationException);
      expect(thrown).toBeInstanceOf(NotificationException);
      if (!(thrown instanceof AggregateNotificationException)) return;

      expect(thrown.name).toBe('AggregateNotificationException');
      expect(thrown.message).toBe('2 subscriber(s) failed while notifying orders');
      expect(thrown.failures.map((f) => f.index)).toEqual([1, 3]);
      expect(thrown.errors[0]).toBe(boom);
      expect(thrown.errors[1].message).toBe('bad');
      expect(thrown.details).toEqual({ registry: 'orders', indexes: [1, 3] });
    });

    it('should not throw when every subscriber succeeds', () => {
      const registry = new SubjectRegistry({ failurePolicy: 'isolate' });
      registry.register(new RecordingSubscriber('A', log));

      expect(() => registry.notifyAll('m')).not.toThrow();
    });

    it('should call onError once per failure', () => {
      const indexes: number[] = [];
      const registry = new SubjectRegistry({
        failurePolicy: 'isolate',
        onError: (failure) => indexes.push(failure.index),
      });
      registry.register(failingSubscriber(new Error('one')));
      registry.register(new RecordingSubscriber('B', log));
      registry.register(failingSubscriber(new Error('two')));

      expect(() => registry.notifyAll('m')).toThrow(AggregateNotificationException);
      expect(indexes).toEqual([0, 2]);
    });

    it('should let an error thrown by onError escape immediately', () => {
      const registry = new SubjectRegistry({
        failurePolicy: 'isolate',
        onError: () => {
          throw new Error('hook failed');
        },
      });
      registry.register(failingSubscriber(new Error('boom')));
      registry.register(new RecordingSubscriber('B', log));

      expect(() => registry.notifyAll('m')).toThrow('hook failed');
      expect(log).toEqual([]);
    });

    it('should log each failure at error level', () => {
      const logger = new MemoryLogger();
      const boom = new Error('boom');
      const registry = new SubjectRegistry({
        name: 'orders',
        failurePolicy: 'isolate',
        logger,
      });
      registry.register(new RecordingSubscriber('A', log));
      registry.register(failingSubscriber(boom));

      expect(() => registry.notifyAll('m')).toThrow(AggregateNotificationException);

      const errors = logger.lines.filter((line) => line.level === 'error');
      expect(errors).toEqual([
        { level: 'error', message: '[orders] Subscriber 1 failed: boom', args: [boom] },
      ]);
    });
  });
});
