/**
 * subject-registry - Exception Module
 *
 * Notification and configuration errors
 */

export {
  NotificationException,
  AggregateNotificationException,
  ConfigurationException,
  toError,
} from './exceptions';

export type { SubscriberFailure } from './exceptions';
