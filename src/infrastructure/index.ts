/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Cross-cutting pieces the registries depend on:
 *
 * - **Logging**: the `ILogger` contract and built-in loggers
 * - **Subscribers**: ready-made subscriber implementations
 *
 * @packageDocumentation
 * @module subject-registry/infrastructure
 *
 * @example
 * ```typescript
 * import { LoggingSubscriber, createPrefixedLogger, consoleLogger } from 'subject-registry';
 *
 * const audit = new LoggingSubscriber(createPrefixedLogger(consoleLogger, 'audit'));
 * registry.register(audit);
 * ```
 */

// Logging
export * from './logging';

// Built-in subscribers
export * from './subscribers';
