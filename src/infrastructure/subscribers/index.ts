/**
 * @module subject-registry/infrastructure/subscribers
 * @description Built-in subscriber implementations
 */

export { LoggingSubscriber } from './LoggingSubscriber';
