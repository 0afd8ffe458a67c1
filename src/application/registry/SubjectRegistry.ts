/**
 * subject-registry - Subject Registry
 *
 * Holds an ordered list of subscribers and broadcasts string messages to
 * them synchronously, in registration order.
 */

import type { ISubscriber } from '../../domain/subscriber';
import type { SubscriberFailure } from '../../domain/exceptions';
import type { SubjectRegistryOptions } from '../config';
import type { ISubject } from './ISubject';
import { SubjectRegistryBase } from './SubjectRegistryBase';

/**
 * SubjectRegistry - synchronous broadcast to registered subscribers
 *
 * @remarks
 * Each `notifyAll` visits the subscribers that were registered when the call
 * started. A subscriber added from inside `receive` first hears the next
 * broadcast; one removed from inside `receive` still hears the current one.
 *
 * With the default `propagate` policy the first subscriber that throws ends
 * the broadcast and its error reaches the caller unchanged. With `isolate`
 * every subscriber is visited and the failures are thrown together as an
 * {@link AggregateNotificationException}.
 *
 * @example
 * ```typescript
 * const registry = new SubjectRegistry({ name: 'orders' });
 *
 * registry.register(createSubscriber((m) => console.log('A got', m)));
 * registry.register(createSubscriber((m) => console.log('B got', m)));
 *
 * registry.notifyAll('hello');
 * // A got hello
 * // B got hello
 * ```
 */
export class SubjectRegistry
  extends SubjectRegistryBase<ISubscriber>
  implements ISubject
{
  notifyAll(message: string): void {
    const failures: SubscriberFailure<ISubscriber>[] = [];

    for (const [index, subscriber] of this.snapshot().entries()) {
      try {
        subscriber.receive(message);
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
 * Create a new subject registry
 */
export function createSubjectRegistry(
  options?: SubjectRegistryOptions<ISubscriber>,
): SubjectRegistry {
  return new SubjectRegistry(options);
}
