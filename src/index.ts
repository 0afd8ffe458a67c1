/**
 * @fileoverview subject-registry - typed publish/subscribe notification core
 * @description
 * A subject keeps an ordered list of subscribers and broadcasts string
 * messages to them, in the order they registered.
 *
 * ## Layers
 *
 * - **Domain**: the subscriber capability and the exception types
 * - **Application**: `SubjectRegistry`, `AsyncSubjectRegistry` and their options
 * - **Infrastructure**: logging and built-in subscribers
 *
 * @packageDocumentation
 * @module subject-registry
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

// ** 1. Subscribers **
export { createSubscriber, createAsyncSubscriber, isSubscriber } from './domain/subscriber';

export type {
  ISubscriber,
  IAsyncSubscriber,
  ReceiveFunction,
  AsyncReceiveFunction,
} from './domain/subscriber';

// ** 2. Exceptions **
export {
  NotificationException,
  AggregateNotificationException,
  ConfigurationException,
  toError,
} from './domain/exceptions';

export type { SubscriberFailure } from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

// ** 1. Registries **
export {
  SubjectRegistryBase,
  SubjectRegistry,
  AsyncSubjectRegistry,
  createSubjectRegistry,
  createAsyncSubjectRegistry,
} from './application/registry';

export type { ISubscriberRegistry, ISubject, IAsyncSubject } from './application/registry';

// ** 2. Configuration **
export {
  FAILURE_POLICIES,
  FAILURE_POLICY_ENV,
  REGISTRY_NAME_ENV,
  DEFAULT_REGISTRY_OPTIONS,
  isFailurePolicy,
  resolveRegistryOptions,
} from './application/config';

export type {
  FailurePolicy,
  SubjectRegistryOptions,
  ResolvedRegistryOptions,
  RegistryEnvironment,
} from './application/config';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export { consoleLogger, silentLogger, createPrefixedLogger } from './infrastructure/logging';
export type { ILogger, LogLevel } from './infrastructure/logging';

export { LoggingSubscriber } from './infrastructure/subscribers';
