/**
 * subject-registry - Async Subject Registry
 *
 * Same registration model as {@link SubjectRegistry}, for subscribers whose
 * `receive` returns a promise.
 */

import type { IAsyncSubscriber } from '../../domain/subscriber';
import type { SubscriberFailure } from '../../domain/exceptions';
import type { SubjectRegistryOptions } from '../config';
import type { IAsyncSubject } from './ISubject';
import { SubjectRegistryBase } from './SubjectRegistryBase';

/**
 * AsyncSubjectRegistry - sequential async broadcast
 *
 * @remarks
 * Subscribers are awaited one at a time, in registration order: subscriber
 * N+1 is not called until subscriber N has settled. The subscriber list is
 * captured before the first await, so anything registered while a broadcast
 * is in flight waits for the next one.
 *
 * A synchronous throw and a rejected promise are the same failure.
 *
 * @example
 * ```typescript
 * const registry = new AsyncSubjectRegistry({ failurePolicy: 'isolate' });
 *
 * registry.register(createAsyncSubscriber(async (m) => {
 *   await mailer.send(m);
 * }));
 *
 * await registry.notifyAll('order shipped');
 * ```
 */
export class AsyncSubjectRegistry
  extends SubjectRegistryBase<IAsyncSubscriber>
  implements IAsyncSubject
{
  async notifyAll(message: string): Promise<void> {
    const failures: SubscriberFailure<IAsyncSubscriber>[] = [];

    for (const [index, subscriber] of this.snapshot().entries()) {
      try {
        await subscriber.receive(message);
      } catch (error) {
        const failure = this.recordFailure(subscriber, index, error);
        if (this.failurePolicy === 'propagate') {
          throw error;
        }
        failures.push(failure);
      }
    }

    this.throwIfFailed(failures);
  }
}

/**
 * Create a new async subject registry
 */
export function createAsyncSubjectRegistry(
  options?: SubjectRegistryOptions<IAsyncSubscriber>,
): AsyncSubjectRegistry {
  return new AsyncSubjectRegistry(options);
}
