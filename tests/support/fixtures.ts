/**
 * @fileoverview Shared test doubles
 *
 * Recording subscribers and an in-memory logger used across the suites.
 */

import { ILogger, ISubscriber, LogLevel } from '../../src';

// ============================================================================
// Delivery Recording
// ============================================================================

/**
 * One observed delivery
 */
export interface Delivery {
  to: string;
  message: string;
}

/**
 * Subscriber that appends each delivery to a shared log
 */
export class RecordingSubscriber implements ISubscriber {
  constructor(
    public readonly label: string,
    private readonly log: Delivery[],
  ) {}

  receive(message: string): void {
    this.log.push({ to: this.label, message });
  }
}

/**
 * Subscriber that always throws the given value
 */
export function failingSubscriber(thrown: unknown): ISubscriber {
  return {
    receive: () => {
      throw thrown;
    },
  };
}

// ============================================================================
// Logging
// ============================================================================

export interface LogLine {
  level: LogLevel;
  message: string;
  args: unknown[];
}

/**
 * Logger that keeps every line in memory
 */
export class MemoryLogger implements ILogger {
  readonly lines: LogLine[] = [];

  debug(message: string, ...args: unknown[]): void {
    this.lines.push({ level: 'debug', message, args });
  }

  info(message: string, ...args: unknown[]): void {
    this.lines.push({ level: 'info', message, args });
  }

  warn(message: string, ...args: unknown[]): void {
    this.lines.push({ level: 'warn', message, args });
  }

  error(message: string, ...args: unknown[]): void {
    this.lines.push({ level: 'error', message, args });
  }

  messages(level: LogLevel): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Run `fn` and return whatever it threw
 */
export function captureThrown(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Await `promise` and return whatever it rejected with
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
