/**
 * @fileoverview Subscriber - the receiving side of a broadcast
 *
 * @packageDocumentation
 * @module subject-registry/domain/subscriber
 *
 * ## Layer: DOMAIN (Core)
 *
 * A subscriber is anything that can `receive` a message. It carries no
 * identity beyond its object reference: registering the same object twice
 * makes it two registrations, and removal matches by reference.
 *
 * ```
 * SubjectRegistry.notifyAll('hello')
 *   ↓
 * subscriberA.receive('hello')
 *   ↓
 * subscriberB.receive('hello')
 * ```
 *
 * Subscribers are plain polymorphic objects. There is no base class to extend;
 * implement the interface directly, or build one from a function with
 * {@link createSubscriber}.
 *
 * @example Class-based subscriber
 * ```typescript
 * class AuditTrail implements ISubscriber {
 *   readonly entries: string[] = [];
 *
 *   receive(message: string): void {
 *     this.entries.push(message);
 *   }
 * }
 * ```
 *
 * @example Function-based subscriber
 * ```typescript
 * const printer = createSubscriber((message) => console.log(message));
 * registry.register(printer);
 * ```
 */

/**
 * A handle that receives broadcast messages synchronously.
 */
export interface ISubscriber {
  /**
   * Handle one broadcast message.
   *
   * @remarks
   * Throwing from here is a delivery failure. What happens to the remaining
   * subscribers depends on the registry's failure policy.
   */
  receive(message: string): void;
}

/**
 * A handle whose `receive` may complete asynchronously.
 *
 * Every {@link ISubscriber} is also a valid `IAsyncSubscriber`, so synchronous
 * subscribers can be registered on an async registry unchanged.
 */
export interface IAsyncSubscriber {
  receive(message: string): void | Promise<void>;
}

/**
 * Receive callback used to build a subscriber from a function
 */
export type ReceiveFunction = (message: string) => void;

/**
 * Async receive callback
 */
export type AsyncReceiveFunction = (message: string) => void | Promise<void>;

/**
 * Build a subscriber from a function.
 *
 * Each call returns a new object, so two subscribers built from the same
 * function are still distinct registrations.
 */
export function createSubscriber(fn: ReceiveFunction): ISubscriber {
  return {
    receive: (message: string) => fn(message),
  };
}

/**
 * Build an async subscriber from a function.
 */
export function createAsyncSubscriber(fn: AsyncReceiveFunction): IAsyncSubscriber {
  return {
    receive: (message: string) => fn(message),
  };
}

/**
 * Type guard: does `value` look like a subscriber?
 *
 * @example
 * ```typescript
 * const candidate: unknown = loadPlugin();
 * if (isSubscriber(candidate)) {
 *   registry.register(candidate);
 * }
 * ```
 */
export function isSubscriber(value: unknown): value is ISubscriber {
  return (
    typeof value === 'object' &&
    value !== null &&
    'receive' in value &&
    typeof value.receive === 'function'
  );
}
