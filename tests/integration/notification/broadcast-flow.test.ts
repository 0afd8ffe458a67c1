/**
 * @fileoverview Integration test for a complete broadcast flow
 *
 * Registry, built-in LoggingSubscriber and recording subscribers sharing
 * one logger: registration, delivery, removal and clearing, checked through
 * the deliveries and the exact log output. A broadcast with nobody left
 * writes no line.
 */

import { LoggingSubscriber, SubjectRegistry } from '../../../src';
import { Delivery, MemoryLogger, RecordingSubscriber } from '../../support/fixtures';

describe('Broadcast flow', () => {
  it('should deliver, log and tear down in order', () => {
    const logger = new MemoryLogger();
    const deliveries: Delivery[] = [];
    const registry = new SubjectRegistry({ name: 'audit', logger });
    const recorder = new RecordingSubscriber('recorder', deliveries);

    registry.register(new LoggingSubscriber(logger));
    registry.register(recorder);
    registry.notifyAll('ping');
    registry.unregister(recorder);
    registry.notifyAll('pong');
    registry.clear();
    registry.notifyAll('silence');

    expect(deliveries).toEqual([{ to: 'recorder', message: 'ping' }]);
    expect(logger.lines.map((line) => `${line.level} ${line.message}`)).toEqual([
      'debug [audit] Registered subscriber (1 total)',
      'debug [audit] Registered subscriber (2 total)',
      'debug [audit] Notifying 2 subscriber(s)',
      'info Received: ping',
      'debug [audit] Unregistered subscriber (1 total)',
      'debug [audit] Notifying 1 subscriber(s)',
      'info Received: pong',
      'debug [audit] Cleared 1 subscriber(s)',
    ]);
  });
});
