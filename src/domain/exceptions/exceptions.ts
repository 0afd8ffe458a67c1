/**
 * subject-registry - Exceptions
 *
 * Error types raised while configuring registries and delivering messages.
 */

import type { IAsyncSubscriber } from '../subscriber';

/**
 * One failed delivery
 */
export interface SubscriberFailure<TSubscriber extends IAsyncSubscriber = IAsyncSubscriber> {
  /** The subscriber whose `receive` threw or rejected */
  subscriber: TSubscriber;

  /** Position of the subscriber in the broadcast */
  index: number;

  /** The thrown value, normalised to an Error */
  error: Error;
}

// ==================== Built-in Exceptions ====================

/**
 * Base notification exception class
 */
export class NotificationException extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'NotificationException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised after a broadcast under the `isolate` policy when at least one
 * subscriber failed. Every subscriber was still visited.
 */
export class AggregateNotificationException extends NotificationException {
  constructor(
    registryName: string,
    public readonly failures: readonly SubscriberFailure[],
  ) {
    super(
      `${failures.length} subscriber(s) failed while notifying ${registryName}`,
      { registry: registryName, indexes: failures.map((f) => f.index) },
    );
    this.name = 'AggregateNotificationException';
  }

  /**
   * Underlying errors, in delivery order
   */
  get errors(): Error[] {
    return this.failures.map((failure) => failure.error);
  }
}

/**
 * Invalid configuration value
 */
export class ConfigurationException extends NotificationException {
  constructor(
    public readonly key: string,
    public readonly value: string,
    expected: readonly string[],
  ) {
    super(
      `Invalid value "${value}" for ${key}; expected one of: ${expected.join(', ')}`,
      { key, value, expected: [...expected] },
    );
    this.name = 'ConfigurationException';
  }
}

/**
 * Normalise a thrown value to an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
