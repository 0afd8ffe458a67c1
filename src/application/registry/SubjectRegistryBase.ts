/**
 * subject-registry - Registry Base
 *
 * Registration bookkeeping and failure handling shared by the sync and
 * async registries. Delivery itself lives in the subclasses.
 */

import type { IAsyncSubscriber } from '../../domain/subscriber';
import {
  AggregateNotificationException,
  SubscriberFailure,
  toError,
} from '../../domain/exceptions';
import { ILogger, createPrefixedLogger } from '../../infrastructure/logging';
import {
  FailurePolicy,
  SubjectRegistryOptions,
  resolveRegistryOptions,
} from '../config';
import type { ISubscriberRegistry } from './ISubject';

/**
 * One registration. Wrapping the subscriber lets a disposer remove its own
 * entry even when the same handle is registered several times.
 */
interface Registration<TSubscriber> {
  readonly subscriber: TSubscriber;
}

export abstract class SubjectRegistryBase<TSubscriber extends IAsyncSubscriber>
  implements ISubscriberRegistry<TSubscriber>
{
  readonly name: string;
  readonly failurePolicy: FailurePolicy;
  protected readonly logger: ILogger;
  private readonly onError?: (failure: SubscriberFailure<TSubscriber>) => void;
  private registrations: Registration<TSubscriber>[] = [];

  constructor(options: SubjectRegistryOptions<TSubscriber> = {}) {
    const resolved = resolveRegistryOptions(options);
    this.name = resolved.name;
    this.failurePolicy = resolved.failurePolicy;
    this.logger = createPrefixedLogger(resolved.logger, resolved.name);
    this.onError = resolved.onError;
  }

  get size(): number {
    return this.registrations.length;
  }

  register(subscriber: TSubscriber): void {
    this.add(subscriber);
  }

  subscribe(subscriber: TSubscriber): () => void {
    const registration = this.add(subscriber);
    let active = true;

    return () => {
      if (!active) return;
      active = false;
      this.remove(this.registrations.indexOf(registration));
    };
  }

  unregister(subscriber: TSubscriber): boolean {
    return this.remove(
      this.registrations.findIndex((entry) => entry.subscriber === subscriber),
    );
  }

  has(subscriber: TSubscriber): boolean {
    return this.registrations.some((entry) => entry.subscriber === subscriber);
  }

  clear(): void {
    const count = this.registrations.length;
    this.registrations = [];
    this.logger.debug(`Cleared ${count} subscriber(s)`);
  }

  getSubscribers(): TSubscriber[] {
    return this.registrations.map((entry) => entry.subscriber);
  }

  /**
   * Subscribers to visit for one broadcast. Taken once per call, so changes
   * made by subscribers while the broadcast runs apply to the next one.
   * An empty broadcast logs nothing.
   */
  protected snapshot(): TSubscriber[] {
    const targets = this.getSubscribers();
    if (targets.length > 0) {
      this.logger.debug(`Notifying ${targets.length} subscriber(s)`);
    }
    return targets;
  }

  /**
   * Log a failed delivery and hand it to `onError`.
   */
  protected recordFailure(
    subscriber: TSubscriber,
    index: number,
    thrown: unknown,
  ): SubscriberFailure<TSubscriber> {
    const error = toError(thrown);
    const failure: SubscriberFailure<TSubscriber> = { subscriber, index, error };

    this.logger.error(`Subscriber ${index} failed: ${error.message}`, error);
    this.onError?.(failure);

    return failure;
  }

  /**
   * End of an `isolate` broadcast: raise the collected failures, if any.
   */
  protected throwIfFailed(failures: SubscriberFailure<TSubscriber>[]): void {
    if (failures.length > 0) {
      throw new AggregateNotificationException(this.name, failures);
    }
  }

  private add(subscriber: TSubscriber): Registration<TSubscriber> {
    const registration: Registration<TSubscriber> = { subscriber };
    this.registrations.push(registration);
    this.logger.debug(`Registered subscriber (${this.registrations.length} total)`);
    return registration;
  }

  private remove(index: number): boolean {
    if (index < 0) {
      return false;
    }

    this.registrations.splice(index, 1);
    this.logger.debug(`Unregistered subscriber (${this.registrations.length} total)`);
    return true;
  }
}
