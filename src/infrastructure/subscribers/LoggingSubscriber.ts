/**
 * subject-registry - Logging Subscriber
 *
 * Writes every received message to a logger.
 */

import type { ISubscriber } from '../../domain/subscriber';
import { ILogger, LogLevel, consoleLogger } from '../logging';

/**
 * LoggingSubscriber - prints each broadcast
 *
 * @example
 * ```typescript
 * registry.register(new LoggingSubscriber(consoleLogger, 'info', 'audit'));
 * registry.notifyAll('user signed in');
 * // [INFO] audit received: user signed in
 * ```
 */
export class LoggingSubscriber implements ISubscriber {
  constructor(
    private readonly logger: ILogger = consoleLogger,
    private readonly level: LogLevel = 'info',
    private readonly label?: string,
  ) {}

  receive(message: string): void {
    const line = this.label ? `${this.label} received: ${message}` : `Received: ${message}`;
    this.logger[this.level](line);
  }
}
