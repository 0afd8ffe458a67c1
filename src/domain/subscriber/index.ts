/**
 * @module subject-registry/domain/subscriber
 * @description Subscriber capability and helpers
 */

export type {
  ISubscriber,
  IAsyncSubscriber,
  ReceiveFunction,
  AsyncReceiveFunction,
} from './ISubscriber';

export { createSubscriber, createAsyncSubscriber, isSubscriber } from './ISubscriber';
