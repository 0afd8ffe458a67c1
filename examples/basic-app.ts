/**
 * subject-registry v1.0.0 - Basic Example
 *
 * Demonstrates:
 * - Registering class and function subscribers
 * - Broadcasting in registration order
 * - Removing subscribers
 * - Failure policies
 * - Async delivery
 */

import {
  AggregateNotificationException,
  AsyncSubjectRegistry,
  ISubscriber,
  LoggingSubscriber,
  SubjectRegistry,
  consoleLogger,
  createAsyncSubscriber,
  createPrefixedLogger,
  createSubscriber,
} from '../src/index';

// ==================== Subscribers ====================

class InboxSubscriber implements ISubscriber {
  readonly messages: string[] = [];

  constructor(private readonly owner: string) {}

  receive(message: string): void {
    this.messages.push(message);
    console.log(`[${this.owner}] inbox: ${message}`);
  }
}

// ==================== Sync Broadcast ====================

function syncDemo(): void {
  const registry = new SubjectRegistry({ name: 'newsletter', logger: consoleLogger });

  const alice = new InboxSubscriber('alice');
  const bob = new InboxSubscriber('bob');

  registry.register(alice);
  registry.notifyAll('issue #1');

  registry.register(bob);
  registry.register(new LoggingSubscriber(createPrefixedLogger(consoleLogger, 'archive')));
  registry.notifyAll('issue #2');

  registry.unregister(alice);
  registry.notifyAll('issue #3');

  console.log('alice got:', alice.messages);
  console.log('bob got:', bob.messages);
}

// ==================== Failure Policies ====================

function failureDemo(): void {
  const registry = new SubjectRegistry({
    name: 'alerts',
    failurePolicy: 'isolate',
    onError: (failure) => console.warn(`subscriber #${failure.index} failed`),
  });

  registry.register(createSubscriber((m) => console.log('pager:', m)));
  registry.register(
    createSubscriber(() => {
      throw new Error('sms gateway unreachable');
    }),
  );
  registry.register(createSubscriber((m) => console.log('email:', m)));

  try {
    registry.notifyAll('disk almost full');
  } catch (error) {
    if (error instanceof AggregateNotificationException) {
      console.log(error.message, error.errors.map((e) => e.message));
    } else {
      throw error;
    }
  }
}

// ==================== Async Broadcast ====================

async function asyncDemo(): Promise<void> {
  const registry = new AsyncSubjectRegistry({ name: 'webhooks' });

  registry.register(
    createAsyncSubscriber(async (m) => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      console.log('slow hook:', m);
    }),
  );
  registry.register(createSubscriber((m) => console.log('fast hook:', m)));

  await registry.notifyAll('deploy finished');
}

// ==================== Main ====================

async function main(): Promise<void> {
  syncDemo();
  failureDemo();
  await asyncDemo();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
