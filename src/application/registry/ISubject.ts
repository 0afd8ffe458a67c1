/**
 * @fileoverview Subject contracts
 *
 * @module subject-registry/application/registry
 *
 * A subject owns an ordered list of subscribers and broadcasts messages to
 * them. Registration is split from delivery so that code which only needs to
 * add listeners can depend on {@link ISubscriberRegistry} alone.
 */

import type { IAsyncSubscriber, ISubscriber } from '../../domain/subscriber';

/**
 * Registration side of a subject
 *
 * @template TSubscriber - Subscriber type accepted by the subject
 */
export interface ISubscriberRegistry<TSubscriber extends IAsyncSubscriber> {
  /** Name used in log lines and errors */
  readonly name: string;

  /** Number of registrations, duplicates included */
  readonly size: number;

  /**
   * Append a subscriber. Registering the same handle twice makes it receive
   * every broadcast twice.
   */
  register(subscriber: TSubscriber): void;

  /**
   * Register and return a function that removes exactly this registration.
   * Calling the returned function more than once has no further effect.
   */
  subscribe(subscriber: TSubscriber): () => void;

  /**
   * Remove the earliest registration of `subscriber`.
   *
   * @returns `true` if a registration was removed
   */
  unregister(subscriber: TSubscriber): boolean;

  /** Whether `subscriber` has at least one registration */
  has(subscriber: TSubscriber): boolean;

  /** Remove every registration */
  clear(): void;

  /** Registered subscribers in delivery order (a copy) */
  getSubscribers(): TSubscriber[];
}

/**
 * Synchronous subject
 */
export interface ISubject extends ISubscriberRegistry<ISubscriber> {
  /**
   * Deliver `message` to every registered subscriber, in registration order.
   */
  notifyAll(message: string): void;
}

/**
 * Asynchronous subject. Subscribers are awaited one after another.
 */
export interface IAsyncSubject extends ISubscriberRegistry<IAsyncSubscriber> {
  notifyAll(message: string): Promise<void>;
}
